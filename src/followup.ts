/**
 * Interactions Gateway - Follow-up Delivery
 *
 * Sends the eventual result of a deferred interaction to Discord's webhook
 * endpoints, authenticated only by the interaction token in the path.
 *
 * Retry policy:
 * - network errors, per-attempt timeouts, 5xx and 429 are retried
 * - 429 waits Retry-After (header or body `retry_after`, seconds)
 * - everything else uses capped exponential backoff with full jitter
 * - other 4xx fail at once
 * - no attempt starts after the follow-up window has closed
 */

import type { Logger } from 'pino';
import { DeliveryError, errorMessage } from './errors.js';
import { logger as rootLogger, redactWebhookUrl } from './logger.js';
import { logEvent } from './api/activity-log.js';

export type FollowUpMode = 'create' | 'edit_original';

export interface FollowUpTarget {
  interactionId: string;
  token: string;
  /** Wall-clock creation time; the window is measured from here. */
  createdAtMs: number;
}

export type DeliveryResult =
  | { ok: true; attempts: number; status: number }
  | { ok: false; error: DeliveryError };

export interface FollowUpDelivery {
  deliver(target: FollowUpTarget, payload: object, mode?: FollowUpMode): Promise<DeliveryResult>;
}

export interface FollowUpClientOptions {
  applicationId: string;
  apiBaseUrl: string;
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  windowMs: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
  log?: Logger;
}

type AttemptOutcome =
  | { ok: true; status: number }
  | { ok: false; error: DeliveryError; retryAfterMs: number | null };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Capped exponential backoff with full jitter: random(0, min(max, base * 2^n)).
 */
export function calculateDelayWithJitter(
  retry: number,
  initialDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = initialDelayMs * Math.pow(2, retry);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  return Math.floor(random() * cappedDelay);
}

/**
 * Seconds to wait from a 429, in ms. Header first, then the JSON body.
 */
export function parseRetryAfter(header: string | null, body: string): number | null {
  if (header) {
    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) return Math.ceil(seconds * 1000);
  }
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'retry_after' in parsed) {
      const seconds = parsed.retry_after;
      if (typeof seconds === 'number' && seconds >= 0) return Math.ceil(seconds * 1000);
    }
  } catch {
    return null;
  }
  return null;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export class FollowUpClient implements FollowUpDelivery {
  private readonly options: FollowUpClientOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(options: FollowUpClientOptions) {
    if (options.maxAttempts < 1) {
      throw new Error('Follow-up maxAttempts must be at least 1');
    }
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.log = options.log ?? rootLogger.child({ component: 'followup' });
  }

  webhookUrl(token: string, mode: FollowUpMode): string {
    const base = `${this.options.apiBaseUrl.replace(/\/+$/, '')}/webhooks/${this.options.applicationId}/${token}`;
    return mode === 'edit_original' ? `${base}/messages/@original` : base;
  }

  async deliver(target: FollowUpTarget, payload: object, mode: FollowUpMode = 'create'): Promise<DeliveryResult> {
    const { maxAttempts, initialDelayMs, maxDelayMs, windowMs } = this.options;
    const url = this.webhookUrl(target.token, mode);
    const safeUrl = redactWebhookUrl(url, target.token);
    const closesAt = target.createdAtMs + windowMs;
    const log = this.log.child({ interactionId: target.interactionId, mode });

    let lastError: DeliveryError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (this.now() >= closesAt) {
        lastError = new DeliveryError('window_expired', 'Follow-up window has closed', {
          attempts: attempt - 1,
          retryable: false,
        });
        break;
      }

      log.debug({ attempt, maxAttempts, url: safeUrl }, 'Delivering follow-up');
      const outcome = await this.attempt(url, payload, mode, attempt);

      if (outcome.ok) {
        log.info({ attempt, status: outcome.status }, 'Follow-up delivered');
        logEvent('followup', `Follow-up delivered for interaction ${target.interactionId}`, {
          interactionId: target.interactionId,
          attempts: attempt,
          status: outcome.status,
        });
        return { ok: true, attempts: attempt, status: outcome.status };
      }

      lastError = outcome.error;
      if (!outcome.error.retryable || attempt === maxAttempts) break;

      const delay = outcome.retryAfterMs ?? calculateDelayWithJitter(attempt - 1, initialDelayMs, maxDelayMs, this.random);
      if (this.now() + delay >= closesAt) {
        lastError = new DeliveryError('window_expired', 'Follow-up window closes before the next retry', {
          status: outcome.error.status,
          attempts: attempt,
          retryable: false,
        });
        break;
      }

      log.warn(
        { attempt, status: outcome.error.status, kind: outcome.error.kind, delayMs: delay },
        `Follow-up attempt failed: ${outcome.error.message}; retrying`
      );
      await this.sleep(delay);
    }

    const error =
      lastError ?? new DeliveryError('window_expired', 'Follow-up window has closed', { attempts: 0, retryable: false });

    log.error(
      { attempts: error.attempts, status: error.status, kind: error.kind, url: safeUrl },
      `Follow-up delivery failed: ${error.message}`
    );
    logEvent('error', `Follow-up delivery failed for interaction ${target.interactionId}`, {
      interactionId: target.interactionId,
      attempts: error.attempts,
      status: error.status ?? undefined,
      error: error.message,
    });

    return { ok: false, error };
  }

  private async attempt(url: string, payload: object, mode: FollowUpMode, attempt: number): Promise<AttemptOutcome> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: mode === 'edit_original' ? 'PATCH' : 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const timedOut = isTimeout(error);
      return {
        ok: false,
        error: new DeliveryError(
          timedOut ? 'timeout' : 'network',
          timedOut ? `Request timed out after ${this.options.timeoutMs}ms` : errorMessage(error),
          { attempts: attempt, retryable: true }
        ),
        retryAfterMs: null,
      };
    }

    const body = await response.text().catch(() => '');

    if (response.ok) {
      return { ok: true, status: response.status };
    }

    const status = response.status;
    if (status === 429) {
      return {
        ok: false,
        error: new DeliveryError('http', 'Rate limited (429)', { status, attempts: attempt, retryable: true }),
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after'), body),
      };
    }

    const retryable = status >= 500;
    return {
      ok: false,
      error: new DeliveryError('http', `Discord responded ${status}`, { status, attempts: attempt, retryable }),
      retryAfterMs: null,
    };
  }
}
