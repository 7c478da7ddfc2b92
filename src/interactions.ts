/**
 * Interactions Gateway - HTTP Endpoint Front
 *
 * POST /interactions: body cap, signature check, classification, routing,
 * and the deadline-coordinated response. Every outcome maps to exactly one
 * HTTP response; nothing escapes as a 5xx once a request is classified.
 */

import express, { Router } from 'express';
import type { ErrorRequestHandler, Request, Response, NextFunction } from 'express';
import type { KeyObject } from 'crypto';
import type { APIInteractionResponse } from 'discord-api-types/v10';
import type { Logger } from 'pino';
import { classifyPayload } from './classify.js';
import type { Cache } from './cache.js';
import type { CoordinatedResponse, DeadlineCoordinator, FollowUpOutcome } from './deadline.js';
import type { DispatchRouter } from './dispatch-router.js';
import { errorMessage } from './errors.js';
import type { AuthenticationFailure } from './errors.js';
import { logger as rootLogger } from './logger.js';
import {
  ERROR_NOTICE_CONTENT,
  PONG,
  UNKNOWN_ROUTE_CONTENT,
  UNKNOWN_TYPE_CONTENT,
  emptyChoices,
  ephemeralMessage,
} from './replies.js';
import { isTimestampFresh, verifyRequest } from './verify.js';
import { logEvent } from './api/activity-log.js';
import type { RawRequest, RegisteredRoute, RoutableInteraction } from './types.js';

export type ReplayCache = Cache<Promise<APIInteractionResponse>>;

export interface InteractionEndpointDeps {
  publicKey: KeyObject;
  router: DispatchRouter;
  coordinator: DeadlineCoordinator;
  maxBodyBytes: number;
  /** 0 disables the freshness check. */
  signatureMaxAgeSeconds?: number;
  replayCache?: ReplayCache;
  /** Wall clock, for timestamp freshness and snowflake ages. */
  now?: () => number;
  log?: Logger;
}

export type EndpointOutcome =
  | 'too_large'
  | 'unauthorized'
  | 'malformed'
  | 'handshake'
  | 'unknown_type'
  | 'unrouted'
  | 'replayed'
  | 'responded_immediately'
  | 'deferred'
  | 'error';

export interface EndpointResponse {
  status: number;
  /** Null means an empty body. */
  body: APIInteractionResponse | null;
  outcome: EndpointOutcome;
  /** Present when the interaction was deferred. */
  followUp?: Promise<FollowUpOutcome>;
}

export interface InteractionEndpoint {
  handle(request: RawRequest): Promise<EndpointResponse>;
}

function empty(status: number, outcome: EndpointOutcome): EndpointResponse {
  return { status, body: null, outcome };
}

export function createInteractionEndpoint(deps: InteractionEndpointDeps): InteractionEndpoint {
  const log = deps.log ?? rootLogger.child({ component: 'interactions' });
  const now = deps.now ?? Date.now;
  const maxAge = deps.signatureMaxAgeSeconds ?? 0;

  function reject(reason: AuthenticationFailure): EndpointResponse {
    log.warn({ reason }, 'Rejected interaction request');
    logEvent('security', `Rejected interaction request (${reason})`, { reason });
    return empty(401, 'unauthorized');
  }

  async function dispatch(interaction: RoutableInteraction, route: RegisteredRoute): Promise<CoordinatedResponse> {
    try {
      return await deps.coordinator.run(interaction, route);
    } catch (error) {
      log.error(
        { err: error, interactionId: interaction.id, kind: interaction.kind, routingKey: interaction.routingKey },
        `Dispatch failed: ${errorMessage(error)}`
      );
      logEvent('error', `Dispatch failed for ${interaction.kind} "${interaction.routingKey}"`, {
        interactionId: interaction.id,
        kind: interaction.kind,
        route: interaction.routingKey,
        error: errorMessage(error),
      });
      const body = interaction.kind === 'autocomplete' ? emptyChoices() : ephemeralMessage(ERROR_NOTICE_CONTENT);
      return { state: 'responded_immediately', body };
    }
  }

  async function handle(request: RawRequest): Promise<EndpointResponse> {
    if (request.body.length > deps.maxBodyBytes) {
      log.warn({ bytes: request.body.length, limit: deps.maxBodyBytes }, 'Interaction body too large');
      return empty(413, 'too_large');
    }

    const verification = verifyRequest(request, deps.publicKey);
    if (verification.status !== 'valid') {
      return reject(verification.status === 'malformed_input' ? 'missing_headers' : 'invalid_signature');
    }
    if (request.timestamp !== undefined && !isTimestampFresh(request.timestamp, maxAge, now())) {
      return reject('stale_timestamp');
    }

    let json: unknown;
    try {
      json = JSON.parse(verification.payload.rawBody.toString('utf8'));
    } catch {
      log.debug({ reason: 'invalid_json' }, 'Malformed interaction body');
      return empty(400, 'malformed');
    }

    const classified = classifyPayload(json, verification.payload.receivedAt, now());
    if (!classified.ok) {
      log.debug({ reason: classified.error.reason, field: classified.error.field }, 'Malformed interaction body');
      return empty(400, 'malformed');
    }

    const interaction = classified.interaction;

    if (interaction.kind === 'handshake') {
      log.debug('Answered handshake');
      return { status: 200, body: PONG, outcome: 'handshake' };
    }

    if (interaction.kind === 'unknown') {
      log.warn({ interactionId: interaction.id, rawType: interaction.rawType }, 'Unknown interaction type');
      return { status: 200, body: ephemeralMessage(UNKNOWN_TYPE_CONTENT), outcome: 'unknown_type' };
    }

    const cached = deps.replayCache?.get(interaction.id);
    if (cached) {
      log.info({ interactionId: interaction.id }, 'Redelivered interaction; replaying first response');
      return { status: 200, body: await cached, outcome: 'replayed' };
    }

    logEvent('inbound', `${interaction.kind} "${interaction.routingKey}"`, {
      interactionId: interaction.id,
      kind: interaction.kind,
      route: interaction.routingKey,
    });

    const routed = deps.router.route(interaction);
    if (!routed.ok) {
      log.warn({ interactionId: interaction.id, kind: routed.kind, routingKey: routed.key }, 'No handler registered');
      const body = interaction.kind === 'autocomplete' ? emptyChoices() : ephemeralMessage(UNKNOWN_ROUTE_CONTENT);
      return { status: 200, body, outcome: 'unrouted' };
    }

    // Registered before the first await so a concurrent redelivery finds it
    const pending = dispatch(interaction, routed.route);
    deps.replayCache?.set(
      interaction.id,
      pending.then((response) => response.body)
    );

    const response = await pending;
    if (response.state === 'deferred') {
      return { status: 200, body: response.body, outcome: 'deferred', followUp: response.followUp };
    }
    return { status: 200, body: response.body, outcome: 'responded_immediately' };
  }

  return {
    async handle(request: RawRequest): Promise<EndpointResponse> {
      try {
        return await handle(request);
      } catch (error) {
        log.error({ err: error }, `Unexpected error handling interaction: ${errorMessage(error)}`);
        return { status: 200, body: ephemeralMessage(ERROR_NOTICE_CONTENT), outcome: 'error' };
      }
    },
  };
}

function bodyParserStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  if ('type' in err && err.type === 'entity.too.large') return 413;
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

function stampReceipt(req: Request, res: Response, next: NextFunction): void {
  res.locals.receivedAt = performance.now();
  next();
}

/**
 * Express router for the interactions endpoint. The body is read raw so the
 * signature is checked against the exact bytes Discord signed.
 */
export function createInteractionsRouter(
  endpoint: InteractionEndpoint,
  maxBodyBytes: number,
  log: Logger = rootLogger.child({ component: 'interactions' })
): Router {
  const router = Router();

  router.post('/', stampReceipt, express.raw({ type: () => true, limit: maxBodyBytes }), (req, res, next) => {
    const stamped: unknown = res.locals.receivedAt;
    const request: RawRequest = {
      body: Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0),
      signature: req.get('x-signature-ed25519'),
      timestamp: req.get('x-signature-timestamp'),
      receivedAt: typeof stamped === 'number' ? stamped : performance.now(),
    };

    endpoint
      .handle(request)
      .then((result) => {
        if (result.body === null) {
          res.status(result.status).end();
        } else {
          res.status(result.status).json(result.body);
        }
      })
      .catch(next);
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = bodyParserStatus(err);
    if (status !== null) {
      log.warn({ status }, `Rejected interaction body: ${errorMessage(err)}`);
      res.status(status).end();
      return;
    }
    log.error({ err }, `Interaction request failed: ${errorMessage(err)}`);
    res.status(500).end();
  };
  router.use(errorHandler);

  return router;
}
