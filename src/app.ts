/**
 * Interactions Gateway - Application wiring
 *
 * Builds the services from a GatewayConfig and mounts them on an express
 * app. Kept separate from server.ts so tests can run the whole app on a
 * loopback port.
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Express } from 'express';
import { timingSafeEqual } from 'crypto';
import type { Logger } from 'pino';
import { Cache } from './cache.js';
import { DeadlineCoordinator } from './deadline.js';
import { DispatchRouter } from './dispatch-router.js';
import { FollowUpClient } from './followup.js';
import type { FollowUpDelivery } from './followup.js';
import { createInteractionEndpoint, createInteractionsRouter } from './interactions.js';
import type { InteractionEndpoint, ReplayCache } from './interactions.js';
import { logger as rootLogger } from './logger.js';
import { loadPublicKey } from './verify.js';
import { createActivityRouter } from './api/activity-api.js';
import { createStatsRouter } from './api/stats-api.js';
import type { GatewayConfig } from './types.js';

export interface GatewayServices {
  config: GatewayConfig;
  router: DispatchRouter;
  coordinator: DeadlineCoordinator;
  followUps: FollowUpDelivery;
  replayCache: ReplayCache;
  endpoint: InteractionEndpoint;
  log: Logger;
}

export interface ServiceOverrides {
  router?: DispatchRouter;
  followUps?: FollowUpDelivery;
  fetch?: typeof fetch;
  log?: Logger;
}

export function createServices(config: GatewayConfig, overrides: ServiceOverrides = {}): GatewayServices {
  const log = overrides.log ?? rootLogger;
  const router = overrides.router ?? new DispatchRouter();

  const followUps =
    overrides.followUps ??
    new FollowUpClient({
      applicationId: config.discord.applicationId,
      apiBaseUrl: config.discord.apiBaseUrl,
      ...config.followUp,
      fetch: overrides.fetch,
      log: log.child({ component: 'followup' }),
    });

  const coordinator = new DeadlineCoordinator({
    budgetMs: config.interactions.responseBudgetMs,
    followUps,
    windowMs: config.followUp.windowMs,
    log: log.child({ component: 'deadline' }),
  });

  const replayCache: ReplayCache = new Cache({ ttlMs: config.interactions.replayCacheTtlMs });

  const endpoint = createInteractionEndpoint({
    publicKey: loadPublicKey(config.discord.publicKey),
    router,
    coordinator,
    maxBodyBytes: config.interactions.maxBodyBytes,
    signatureMaxAgeSeconds: config.interactions.signatureMaxAgeSeconds,
    replayCache,
    log: log.child({ component: 'interactions' }),
  });

  return { config, router, coordinator, followUps, replayCache, endpoint, log };
}

/**
 * Bearer token authentication middleware for management API routes.
 * If ADMIN_TOKEN is not set, access is allowed.
 */
export function authMiddleware(adminToken: string, log: Logger) {
  let warned = false;
  return (req: Request, res: Response, next: NextFunction) => {
    if (!adminToken) {
      if (!warned) {
        log.warn('No ADMIN_TOKEN configured - API access is unrestricted');
        warned = true;
      }
      return next();
    }
    const auth = req.headers.authorization || '';
    const expected = `Bearer ${adminToken}`;
    if (auth.length === expected.length && timingSafeEqual(Buffer.from(auth), Buffer.from(expected))) {
      return next();
    }
    res.status(401).json({ error: 'Unauthorized' });
  };
}

export function createApp(services: GatewayServices): Express {
  const { config, router, coordinator, replayCache, endpoint, log } = services;
  const app = express();
  app.disable('x-powered-by');

  // Request logging
  app.use((req, res, next) => {
    log.debug({ method: req.method, path: req.path }, 'HTTP request');
    next();
  });

  app.use('/interactions', createInteractionsRouter(endpoint, config.interactions.maxBodyBytes, log.child({ component: 'interactions' })));

  // =========================================================================
  // Management API routes
  // =========================================================================

  app.use('/api', authMiddleware(config.adminToken, log));
  app.use('/api/activity', createActivityRouter());
  app.use(
    '/api/stats',
    createStatsRouter({
      getConfig: () => config,
      handlerCounts: () => router.counts(),
      pendingFollowUps: () => coordinator.pendingCount(),
      replayCacheSize: () => replayCache.size(),
    })
  );

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'interactions-gateway',
      handlers: router.size(),
      pendingFollowUps: coordinator.pendingCount(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
