import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';

import type { AppContext } from './context.js';
import { pingsRouter } from './controllers/pings.controller.js';
import { congestionRouter } from './controllers/congestion.controller.js';
import { eventsRouter } from './controllers/events.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppOptions {
  corsOrigin?: string;
  /** Access log; off in tests. */
  accessLog?: boolean;
}

export function buildApp(ctx: AppContext, options: AppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (options.accessLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '64kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/v1/pings', pingsRouter(ctx.ingestion));
  app.use('/v1', congestionRouter(ctx.query));
  app.use('/v1/events', eventsRouter(ctx.events));

  app.get('/healthz', async (_req, res, next) => {
    try {
      res.json(await ctx.health());
    } catch (err) {
      next(err);
    }
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>, ctx: AppContext) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer);
  ctx.publisher.add('ws', wsGateway);
  return { httpServer, wsGateway };
}
