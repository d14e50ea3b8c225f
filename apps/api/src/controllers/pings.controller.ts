import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { PingIngestionPort } from '@congestion/domain';
import { parseUtcTimestamp } from '@congestion/domain';

/** Naive timestamps are taken as UTC. */
const timestampSchema = z.string().transform((raw, ctx) => {
  const ts = parseUtcTimestamp(raw);
  if (!ts) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'timestamp must be ISO-8601' });
    return z.NEVER;
  }
  return ts;
});

export const pingSchema = z.object({
  deviceId: z.string().trim().min(1).max(128),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  timestamp: timestampSchema.optional(),
  speedKmh: z.number().min(0).optional(),
});

export function pingsRouter(ingestion: PingIngestionPort): Router {
  const router = Router();

  /** POST /v1/pings — one location ping from a device */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ping = pingSchema.parse(req.body);
      const result = await ingestion.ingest(ping);
      res.status(202).json({ message: 'Ping received', ...result });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
