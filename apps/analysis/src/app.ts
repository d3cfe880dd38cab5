import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';

import type { AnalysisContext } from './context.js';
import { createStatsRouter } from './controllers/stats.controller.js';
import { createVehiclesRouter } from './controllers/vehicles.controller.js';
import { createReplayRouter } from './controllers/replay.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { WsGateway } from './ws/ws-gateway.js';

export interface AppOptions {
  corsOrigin?: string;
  /** Request logging; off in tests. */
  requestLog?: boolean;
}

export function buildApp(ctx: AnalysisContext, options: AppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (options.requestLog ?? true) app.use(morgan('combined'));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/stats', createStatsRouter(ctx));
  app.use('/api/vehicles', createVehiclesRouter(ctx));
  app.use('/api/replay', createReplayRouter(ctx));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      vehicles: ctx.history.size,
      frameBound: ctx.replay.frameBound,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

/** HTTP server with the WebSocket draw surface attached on /ws. */
export function buildHttpServer(surface: { width: number; height: number }) {
  const httpServer = createServer();
  const wsGateway = new WsGateway(httpServer, surface.width, surface.height);
  return { httpServer, wsGateway };
}
