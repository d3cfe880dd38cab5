import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AnalysisContext } from '../context.js';

export function createStatsRouter(ctx: AnalysisContext): Router {
  const router = Router();

  /** GET /api/stats - scan report and categorical counts */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ report: ctx.report, statistics: ctx.statistics.snapshot() });
  });

  return router;
}
