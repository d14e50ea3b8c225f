import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { CongestionQueryPort } from '@congestion/domain';

const MAX_AREA_RADIUS = 5;

const pointQuery = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
});

const cellQuery = pointQuery.extend({
  debug: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === '1'),
});

const areaQuery = pointQuery.extend({
  radius: z.coerce.number().int().min(0).max(MAX_AREA_RADIUS).default(1),
});

export function congestionRouter(query: CongestionQueryPort): Router {
  const router = Router();

  /** GET /v1/congestion?lat=&lon=&debug= — current verdict for the cell at a point */
  router.get('/congestion', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { lat, lon, debug } = cellQuery.parse(req.query);
      const { verdict, ...cell } = await query.cellCongestion(lat, lon);
      res.json({
        ...cell,
        method: verdict.method,
        reason: verdict.reason,
        ...(debug ? { evidence: verdict.evidence } : {}),
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /v1/congestion/area?lat=&lon=&radius= */
  router.get('/congestion/area', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { lat, lon, radius } = areaQuery.parse(req.query);
      res.json(await query.areaCongestion(lat, lon, radius));
    } catch (err) {
      next(err);
    }
  });

  /** GET /v1/baseline?lat=&lon= — learned statistics and calibration state */
  router.get('/baseline', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { lat, lon } = pointQuery.parse(req.query);
      res.json(await query.baseline(lat, lon));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
