import { eq, desc } from 'drizzle-orm';
import { z } from 'zod';
import { db, crawlRuns } from '../index';
import type { CrawlRun, NewCrawlRun } from '../schema';

const logLinesSchema = z.array(z.string());

export async function createCrawlRun(data: NewCrawlRun) {
  const result = db.insert(crawlRuns).values(data).returning();
  return result.get();
}

export async function getRunsForVariation(variationId: number, limit = 20) {
  return db.query.crawlRuns.findMany({
    where: eq(crawlRuns.variationId, variationId),
    orderBy: [desc(crawlRuns.createdAt), desc(crawlRuns.id)],
    limit
  });
}

export async function getAllRecentRuns(limit = 50) {
  return db.query.crawlRuns.findMany({
    orderBy: [desc(crawlRuns.createdAt), desc(crawlRuns.id)],
    limit,
    with: {
      variation: {
        with: {
          product: true
        }
      }
    }
  });
}

// Stored logs are a JSON array of lines; anything else reads as no logs
export function parseRunLogs(run: Pick<CrawlRun, 'logs'>): string[] {
  if (!run.logs) return [];
  try {
    const parsed = logLinesSchema.safeParse(JSON.parse(run.logs));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}
