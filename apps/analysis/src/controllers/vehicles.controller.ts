import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AnalysisContext } from '../context.js';
import { HttpError } from '../middleware/error-handler.js';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createVehiclesRouter(ctx: AnalysisContext): Router {
  const router = Router();

  /** GET /api/vehicles - vehicles with their sample counts */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const vehicles = ctx.history.list();
      const data = vehicles.slice(query.offset, query.offset + query.limit).map((v) => ({
        vehicleNumber: v.vehicleNumber,
        samples: v.records.length,
        firstTimestamp: v.records[0]?.timestamp ?? null,
        lastTimestamp: v.records[v.records.length - 1]?.timestamp ?? null,
      }));
      res.json({ data, total: vehicles.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/vehicles/:vehicleNumber - full timeline of one vehicle */
  router.get('/:vehicleNumber', (req: Request, res: Response, next: NextFunction) => {
    const vehicle = ctx.history.get(req.params['vehicleNumber'] ?? '');
    if (!vehicle) {
      next(HttpError.notFound('vehicle'));
      return;
    }
    res.json({ data: vehicle });
  });

  return router;
}
