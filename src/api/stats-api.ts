/**
 * Stats API
 *
 * Gateway metrics endpoint.
 */

import { Router, Request, Response } from 'express';
import type { GatewayConfig, RoutableKind } from '../types.js';
import { getEventCount, getTodayStats } from './activity-log.js';

export interface StatsSources {
  getConfig: () => GatewayConfig;
  handlerCounts: () => Record<RoutableKind, number>;
  pendingFollowUps: () => number;
  replayCacheSize: () => number;
  startedAt?: number;
}

export function createStatsRouter(sources: StatsSources): Router {
  const router = Router();
  const startTime = sources.startedAt ?? Date.now();

  router.get('/', (req: Request, res: Response) => {
    const config = sources.getConfig();
    const uptime = Date.now() - startTime;

    res.json({
      status: 'online',
      uptime,
      uptimeHuman: formatUptime(uptime),
      port: config.port,
      applicationId: config.discord.applicationId,
      responseBudgetMs: config.interactions.responseBudgetMs,
      handlers: sources.handlerCounts(),
      pendingFollowUps: sources.pendingFollowUps(),
      replayCache: {
        enabled: config.interactions.replayCacheTtlMs > 0,
        size: sources.replayCacheSize(),
      },
      totalEventsLogged: getEventCount(),
      today: getTodayStats(),
    });
  });

  return router;
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
