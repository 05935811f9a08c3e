import { Router } from 'express';
import type { Request, Router as RouterType } from 'express';
import { analyze, type AnalysisParams, type AnalysisType } from '../lib/analysis';
import { asyncHandler } from '../middleware/error-handler';
import { queryString } from './params';

const router: RouterType = Router();

function paramsFromQuery(req: Request): AnalysisParams {
  return {
    daysBack: queryString(req.query.daysBack),
    minChangePercent: queryString(req.query.minChangePercent),
    limit: queryString(req.query.limit),
    analysisType: queryString(req.query.analysisType)
  };
}

router.get(
  '/price-analysis',
  asyncHandler(async (req, res) => {
    res.json(await analyze(paramsFromQuery(req)));
  })
);

// Shortcuts that fix the analysis type
const shortcuts: Record<string, AnalysisType> = {
  '/price-drops': 'drops_only',
  '/price-increases': 'increases_only',
  '/volatile-prices': 'volatile_only'
};

for (const [path, analysisType] of Object.entries(shortcuts)) {
  router.get(
    path,
    asyncHandler(async (req, res) => {
      res.json(await analyze({ ...paramsFromQuery(req), analysisType }));
    })
  );
}

export { router as analysisRouter };
