import PQueue from 'p-queue';
import { crawlCategory, crawlVariationIds, type CrawlSummary } from '../crawler';
import { errorMessage } from '../errors';

export type QueueItemStatus = 'pending' | 'running' | 'success' | 'error';

export type CrawlRequest =
  | { kind: 'variations'; variationIds: number[] }
  | { kind: 'category'; categoryId: number; limit?: number };

export interface QueueItem {
  id: string;
  request: CrawlRequest;
  status: QueueItemStatus;
  attempted?: number;
  succeeded?: number;
  failed?: number;
  skipped?: number;
  error?: string;
  addedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface QueueState {
  items: QueueItem[];
  pending: number;
  size: number;
  isProcessing: boolean;
  processedCount: number;
  lastProcessedAt: Date | null;
}

const MAX_COMPLETED_ITEMS = 100;

function describe(request: CrawlRequest): string {
  return request.kind === 'category'
    ? `category ${request.categoryId}`
    : `variations ${request.variationIds.join(', ')}`;
}

export class CrawlQueue {
  private pqueue: PQueue;
  private items: Map<string, QueueItem> = new Map();
  private processedCount = 0;
  private lastProcessedAt: Date | null = null;
  private idCounter = 0;

  constructor() {
    // One batch at a time so two requests never crawl the same sites in parallel
    this.pqueue = new PQueue({ concurrency: 1 });
  }

  private generateId(): string {
    return `q_${Date.now()}_${this.idCounter++}`;
  }

  getState(): QueueState {
    return {
      items: this.getRecentItems(MAX_COMPLETED_ITEMS),
      pending: this.pqueue.pending,
      size: this.pqueue.size,
      isProcessing: this.pqueue.pending > 0 || this.pqueue.size > 0,
      processedCount: this.processedCount,
      lastProcessedAt: this.lastProcessedAt
    };
  }

  private cleanupOldItems() {
    const completedItems = Array.from(this.items.values()).filter(
      (i) => i.status !== 'pending' && i.status !== 'running'
    );
    if (completedItems.length > MAX_COMPLETED_ITEMS) {
      completedItems.sort(
        (a, b) => (a.completedAt?.getTime() || 0) - (b.completedAt?.getTime() || 0)
      );
      const toRemove = completedItems.slice(0, completedItems.length - MAX_COMPLETED_ITEMS);
      for (const item of toRemove) {
        this.items.delete(item.id);
      }
    }
  }

  /**
   * Queue a crawl batch and resolve with its summary once it has run.
   * Rejects with the batch's error (unknown ids, unknown category, bad input).
   */
  async add(request: CrawlRequest): Promise<CrawlSummary> {
    const item: QueueItem = {
      id: this.generateId(),
      request,
      status: 'pending',
      addedAt: new Date()
    };
    this.items.set(item.id, item);
    console.log(`[Queue] Added ${item.id}: ${describe(request)} (${this.pqueue.size} waiting)`);

    return this.pqueue.add(() => this.processItem(item), { throwOnTimeout: true });
  }

  private async processItem(item: QueueItem): Promise<CrawlSummary> {
    item.status = 'running';
    item.startedAt = new Date();
    console.log(`[Queue] Running ${item.id}: ${describe(item.request)}`);

    try {
      const request = item.request;
      const summary =
        request.kind === 'category'
          ? await crawlCategory(request.categoryId, request.limit)
          : await crawlVariationIds(request.variationIds);

      item.status = 'success';
      item.attempted = summary.attempted;
      item.succeeded = summary.succeeded;
      item.failed = summary.failed;
      item.skipped = summary.skipped;
      console.log(`[Queue] Completed ${item.id}: ${summary.succeeded}/${summary.attempted} succeeded`);
      return summary;
    } catch (error) {
      item.status = 'error';
      item.error = errorMessage(error);
      console.error(`[Queue] Error for ${item.id}:`, item.error);
      throw error;
    } finally {
      item.completedAt = new Date();
      this.processedCount++;
      this.lastProcessedAt = new Date();
      this.cleanupOldItems();
    }
  }

  getRecentItems(limit = 20): QueueItem[] {
    return Array.from(this.items.values())
      .sort((a, b) => b.addedAt.getTime() - a.addedAt.getTime())
      .slice(0, limit);
  }

  // Wait for all current batches to complete
  async onIdle(): Promise<void> {
    return this.pqueue.onIdle();
  }
}

// Singleton instance
export const crawlQueue = new CrawlQueue();
