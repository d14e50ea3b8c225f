import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { CongestionEventReaderPort } from '@congestion/domain';
import { HttpError } from '../middleware/error-handler.js';

const eventsQuery = z.object({
  lastId: z
    .string()
    .regex(/^(0|\d+-\d+)$/, 'lastId must be 0 or a stream id')
    .default('0'),
  count: z.coerce.number().int().min(1).max(1000).default(100),
});

/** Without a reader (in-memory mode) the route answers 503. */
export function eventsRouter(reader: CongestionEventReaderPort | undefined): Router {
  const router = Router();

  /** GET /v1/events?lastId=&count= — tail of the congestion event stream */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { lastId, count } = eventsQuery.parse(req.query);
      if (!reader) {
        throw new HttpError(503, 'event stream requires EPHEMERAL_STORE=redis', 'events_unavailable');
      }
      const events = await reader.readEvents(lastId, count);
      const nextId = events.at(-1)?.id ?? lastId;
      res.json({ events, count: events.length, lastId: nextId });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
