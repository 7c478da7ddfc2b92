/**
 * Interactions Gateway - Deadline Coordinator
 *
 * Discord expects the initial response within 3 seconds. Each interaction
 * runs through a small state machine:
 *
 *   started -> responded_immediately
 *   started -> deferred -> followup_sent | followup_failed
 *
 * The handler races a cutoff timer. If the handler settles first, its reply
 * is the HTTP body. If the cutoff wins (ties included), a kind-specific
 * deferred ack is returned, the handler keeps running unattended, and its
 * eventual result goes out exactly once as a follow-up.
 */

import { InteractionResponseType, MessageFlags } from 'discord-api-types/v10';
import type { APIInteractionResponse, APIInteractionResponseCallbackData } from 'discord-api-types/v10';
import type { Logger } from 'pino';
import { HandlerTimeoutError, InvalidReplyError, errorMessage } from './errors.js';
import type { DeliveryResult, FollowUpDelivery, FollowUpMode } from './followup.js';
import { logger as rootLogger } from './logger.js';
import { emptyChoices, ephemeralMessage, errorNoticeData, ERROR_NOTICE_CONTENT } from './replies.js';
import { logEvent } from './api/activity-log.js';
import type {
  HandlerContext,
  InteractionReply,
  RegisteredRoute,
  RoutableInteraction,
  RoutableKind,
  RouteOptions,
} from './types.js';

export interface FollowUpOutcome {
  state: 'followup_sent' | 'followup_failed';
  result: DeliveryResult | null;
}

export type CoordinatedResponse =
  | { state: 'responded_immediately'; body: APIInteractionResponse }
  | { state: 'deferred'; body: APIInteractionResponse; followUp: Promise<FollowUpOutcome> };

export interface PendingFollowUp {
  interactionId: string;
  kind: RoutableKind;
  routingKey: string;
  deferredAt: number;
  state: 'deferred' | 'followup_sent' | 'followup_failed';
  /** Delivery attempts made, once settled. */
  attempts: number;
  settled: Promise<FollowUpOutcome>;
}

export interface DeadlineCoordinatorOptions {
  budgetMs: number;
  followUps: FollowUpDelivery;
  /** Lifetime of the interaction token, counted from the snowflake time. */
  windowMs?: number;
  /** Part of the window kept back for sending the error notice. */
  windowMarginMs?: number;
  /** Monotonic clock for the response budget. */
  clock?: () => number;
  /** Wall clock, compared against interaction creation times. */
  now?: () => number;
  log?: Logger;
}

const DEFAULT_WINDOW_MS = 15 * 60 * 1000;
const DEFAULT_WINDOW_MARGIN_MS = 30000;

type HandlerOutcome = { ok: true; reply: InteractionReply } | { ok: false; error: unknown };

type Conversion<T> = { ok: true; value: T } | { ok: false; error: InvalidReplyError };

/**
 * Single-assignment slot for the initial response of one interaction.
 */
export class ResponseSlot {
  private chosen: 'immediate' | 'deferred' | null = null;

  claim(path: 'immediate' | 'deferred'): boolean {
    if (this.chosen !== null) return false;
    this.chosen = path;
    return true;
  }

  get value(): 'immediate' | 'deferred' | null {
    return this.chosen;
  }
}

/**
 * Initial response for a reply, or why the reply is not valid for this kind.
 */
export function toInitialResponse(kind: RoutableKind, reply: InteractionReply): Conversion<APIInteractionResponse> {
  switch (reply.kind) {
    case 'message':
      if (kind === 'autocomplete') break;
      return { ok: true, value: { type: InteractionResponseType.ChannelMessageWithSource, data: reply.data } };
    case 'update':
      if (kind !== 'component' && kind !== 'modal') break;
      return { ok: true, value: { type: InteractionResponseType.UpdateMessage, data: reply.data } };
    case 'choices':
      if (kind !== 'autocomplete') break;
      return {
        ok: true,
        value: { type: InteractionResponseType.ApplicationCommandAutocompleteResult, data: { choices: reply.choices } },
      };
    case 'modal':
      if (kind !== 'command' && kind !== 'component') break;
      return { ok: true, value: { type: InteractionResponseType.Modal, data: reply.data } };
  }
  return { ok: false, error: new InvalidReplyError(`A ${reply.kind} reply is not valid for a ${kind} interaction`) };
}

/**
 * Follow-up request for a reply produced after deferral. Modals and
 * autocomplete choices cannot be sent out of band.
 */
export function toFollowUp(
  kind: RoutableKind,
  reply: InteractionReply
): Conversion<{ mode: FollowUpMode; payload: APIInteractionResponseCallbackData }> {
  if (reply.kind === 'message' && kind !== 'autocomplete') {
    return { ok: true, value: { mode: 'create', payload: reply.data } };
  }
  if (reply.kind === 'update' && (kind === 'component' || kind === 'modal')) {
    return { ok: true, value: { mode: 'edit_original', payload: reply.data } };
  }
  return { ok: false, error: new InvalidReplyError(`A ${reply.kind} reply cannot be delivered as a follow-up`) };
}

/**
 * Ack returned when the cutoff wins. Null for autocomplete, which Discord
 * does not allow to be deferred.
 */
export function deferredAck(kind: RoutableKind, options: RouteOptions): APIInteractionResponse | null {
  const deferredMessage = (ephemeral: boolean): APIInteractionResponse =>
    ephemeral
      ? { type: InteractionResponseType.DeferredChannelMessageWithSource, data: { flags: MessageFlags.Ephemeral } }
      : { type: InteractionResponseType.DeferredChannelMessageWithSource };

  switch (kind) {
    case 'command':
      return deferredMessage(options.ephemeral ?? false);
    case 'component':
      return (options.deferAs ?? 'update') === 'update'
        ? { type: InteractionResponseType.DeferredMessageUpdate }
        : deferredMessage(options.ephemeral ?? false);
    case 'modal':
      return deferredMessage(options.ephemeral ?? true);
    case 'autocomplete':
      return null;
  }
}

export class DeadlineCoordinator {
  private readonly budgetMs: number;
  private readonly followUps: FollowUpDelivery;
  private readonly windowMs: number;
  private readonly windowMarginMs: number;
  private readonly clock: () => number;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly pending = new Set<PendingFollowUp>();

  constructor(options: DeadlineCoordinatorOptions) {
    if (!(options.budgetMs > 0)) {
      throw new Error('Response budget must be a positive number of milliseconds');
    }
    this.budgetMs = options.budgetMs;
    this.followUps = options.followUps;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.windowMarginMs = Math.min(options.windowMarginMs ?? DEFAULT_WINDOW_MARGIN_MS, this.windowMs);
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? Date.now;
    this.log = options.log ?? rootLogger.child({ component: 'deadline' });
  }

  async run(interaction: RoutableInteraction, route: RegisteredRoute): Promise<CoordinatedResponse> {
    const deadline = interaction.receivedAt + this.budgetMs;
    const slot = new ResponseSlot();
    const controller = new AbortController();
    const log = this.log.child({
      interactionId: interaction.id,
      kind: interaction.kind,
      routingKey: interaction.routingKey,
    });

    const ctx: HandlerContext = {
      interaction,
      deadline,
      remainingMs: () => Math.max(0, deadline - this.clock()),
      signal: controller.signal,
      log,
    };

    const work: Promise<HandlerOutcome> = Promise.resolve()
      .then(() => route.handler(ctx))
      .then(
        (reply): HandlerOutcome => ({ ok: true, reply }),
        (error: unknown): HandlerOutcome => ({ ok: false, error })
      );

    let timer: ReturnType<typeof setTimeout> | undefined;
    const cutoff = new Promise<'cutoff'>((resolve) => {
      timer = setTimeout(() => resolve('cutoff'), Math.max(0, deadline - this.clock()));
    });

    const first = await Promise.race([work, cutoff]);
    clearTimeout(timer);

    const late = first === 'cutoff' || this.clock() >= deadline;

    if (!late && first !== 'cutoff' && slot.claim('immediate')) {
      return { state: 'responded_immediately', body: this.immediateBody(interaction, first, log) };
    }

    if (!slot.claim('deferred')) {
      throw new Error(`Initial response already chosen for interaction ${interaction.id}`);
    }

    const ack = deferredAck(interaction.kind, route.options);
    if (ack === null) {
      log.warn({ budgetMs: this.budgetMs }, 'Autocomplete missed the response budget; answering with no choices');
      controller.abort();
      return { state: 'responded_immediately', body: emptyChoices() };
    }

    controller.abort();
    return { state: 'deferred', body: ack, followUp: this.schedule(interaction, work, log) };
  }

  private immediateBody(
    interaction: RoutableInteraction,
    outcome: HandlerOutcome,
    log: Logger
  ): APIInteractionResponse {
    const conversion = outcome.ok
      ? toInitialResponse(interaction.kind, outcome.reply)
      : { ok: false as const, error: outcome.error };

    if (conversion.ok) return conversion.value;

    log.error({ err: conversion.error }, `Handler failed before the deadline: ${errorMessage(conversion.error)}`);
    logEvent('error', `Handler error for ${interaction.kind} "${interaction.routingKey}"`, {
      interactionId: interaction.id,
      kind: interaction.kind,
      route: interaction.routingKey,
      state: 'responded_immediately',
      error: errorMessage(conversion.error),
    });

    return interaction.kind === 'autocomplete' ? emptyChoices() : ephemeralMessage(ERROR_NOTICE_CONTENT);
  }

  private schedule(interaction: RoutableInteraction, work: Promise<HandlerOutcome>, log: Logger): Promise<FollowUpOutcome> {
    const deferredAt = this.clock();
    log.info({ elapsedMs: Math.round(deferredAt - interaction.receivedAt) }, 'Interaction deferred');
    logEvent('deferred', `Deferred ${interaction.kind} "${interaction.routingKey}"`, {
      interactionId: interaction.id,
      kind: interaction.kind,
      route: interaction.routingKey,
      state: 'deferred',
      elapsedMs: Math.round(deferredAt - interaction.receivedAt),
    });

    const entry: PendingFollowUp = {
      interactionId: interaction.id,
      kind: interaction.kind,
      routingKey: interaction.routingKey,
      deferredAt,
      state: 'deferred',
      attempts: 0,
      settled: Promise.resolve<FollowUpOutcome>({ state: 'followup_failed', result: null }),
    };

    // A handler still running when the token is about to expire gets the
    // error notice instead; its eventual result is dropped.
    const giveUpInMs = Math.max(0, interaction.createdAtMs + this.windowMs - this.windowMarginMs - this.now());
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expiry = new Promise<HandlerOutcome>((resolve) => {
      timer = setTimeout(
        () => resolve({ ok: false, error: new HandlerTimeoutError('Handler did not finish within the follow-up window') }),
        giveUpInMs
      );
    });

    entry.settled = Promise.race([work, expiry])
      .then((outcome) => {
        clearTimeout(timer);
        return this.deliverOutcome(interaction, outcome, log);
      })
      .catch((error: unknown): FollowUpOutcome => {
        log.error({ err: error }, `Follow-up pipeline failed: ${errorMessage(error)}`);
        return { state: 'followup_failed', result: null };
      })
      .then((outcome) => {
        entry.state = outcome.state;
        entry.attempts = outcome.result === null ? 0 : outcome.result.ok ? outcome.result.attempts : outcome.result.error.attempts;
        this.pending.delete(entry);
        return outcome;
      });

    this.pending.add(entry);
    return entry.settled;
  }

  private async deliverOutcome(
    interaction: RoutableInteraction,
    outcome: HandlerOutcome,
    log: Logger
  ): Promise<FollowUpOutcome> {
    const conversion = outcome.ok ? toFollowUp(interaction.kind, outcome.reply) : { ok: false as const, error: outcome.error };

    let mode: FollowUpMode = 'create';
    let payload: APIInteractionResponseCallbackData;

    if (conversion.ok) {
      mode = conversion.value.mode;
      payload = conversion.value.payload;
    } else {
      log.error({ err: conversion.error }, `Handler failed after deferral: ${errorMessage(conversion.error)}`);
      logEvent('error', `Handler error for ${interaction.kind} "${interaction.routingKey}" after deferral`, {
        interactionId: interaction.id,
        kind: interaction.kind,
        route: interaction.routingKey,
        state: 'deferred',
        error: errorMessage(conversion.error),
      });
      payload = errorNoticeData();
    }

    const result = await this.followUps.deliver(
      { interactionId: interaction.id, token: interaction.token, createdAtMs: interaction.createdAtMs },
      payload,
      mode
    );

    return { state: result.ok ? 'followup_sent' : 'followup_failed', result };
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Wait for in-flight follow-ups, up to timeoutMs. Resolves with the number
   * still pending.
   */
  async drain(timeoutMs: number): Promise<number> {
    if (this.pending.size === 0) return 0;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });

    await Promise.race([Promise.allSettled([...this.pending].map((p) => p.settled)), timeout]);
    clearTimeout(timer);

    return this.pending.size;
  }
}
