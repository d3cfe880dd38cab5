import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AnalysisContext } from '../context.js';
import { drawFrame } from '../services/replay/replay-engine.js';
import { RecordingSurface } from '../services/replay/recording-surface.js';

const frameParamsSchema = z.object({
  index: z.coerce.number().int().min(0),
});

export function createReplayRouter(ctx: AnalysisContext): Router {
  const router = Router();

  /** GET /api/replay - playback status */
  router.get('/', (_req: Request, res: Response) => {
    res.json(ctx.replay.status());
  });

  router.post('/pause', (_req: Request, res: Response) => {
    ctx.replay.pause();
    res.json(ctx.replay.status());
  });

  router.post('/resume', (_req: Request, res: Response) => {
    ctx.replay.resume();
    res.json(ctx.replay.status());
  });

  /** GET /api/replay/frames/:index - draw commands of one frame */
  router.get('/frames/:index', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { index } = frameParamsSchema.parse(req.params);
      const surface = new RecordingSurface(ctx.surface.width, ctx.surface.height);
      const drawn = drawFrame(ctx.history, index, surface);
      res.json({ index, drawn, commands: surface.frame });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
