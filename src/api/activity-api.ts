/**
 * Activity Log API
 *
 * Endpoints for retrieving gateway activity events and stats.
 */

import { Router, Request, Response } from 'express';
import { getEvents, getTodayStats, isActivityType } from './activity-log.js';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createActivityRouter(): Router {
  const router = Router();

  /**
   * GET /api/activity: recent events
   * Query params: limit, type, search
   */
  router.get('/', (req: Request, res: Response) => {
    const limit = Math.min(Math.max(parseInt(queryString(req.query.limit) ?? '', 10) || 100, 1), 500);
    const rawType = queryString(req.query.type);
    if (rawType !== undefined && !isActivityType(rawType)) {
      res.status(400).json({ error: `Unknown activity type: ${rawType}` });
      return;
    }
    const type = isActivityType(rawType) ? rawType : undefined;
    const search = queryString(req.query.search);

    const events = getEvents({ limit, type, search });
    res.json({ events, count: events.length });
  });

  /**
   * GET /api/activity/stats: today's aggregate stats
   */
  router.get('/stats', (req: Request, res: Response) => {
    res.json(getTodayStats());
  });

  return router;
}
