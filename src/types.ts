/**
 * Interactions Gateway - Type Definitions
 */

import type {
  APIApplicationCommandOptionChoice,
  APIInteractionResponseCallbackData,
  APIModalInteractionResponseCallbackData,
} from 'discord-api-types/v10';
import type { Logger } from 'pino';

// ---------------------------------------------------------------------------
// Gateway Configuration
// ---------------------------------------------------------------------------

export interface GatewayConfig {
  port: number;
  host: string;
  discord: {
    publicKey: string;
    applicationId: string;
    apiBaseUrl: string;
  };
  interactions: {
    responseBudgetMs: number;
    maxBodyBytes: number;
    signatureMaxAgeSeconds: number;
    replayCacheTtlMs: number;
  };
  followUp: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
    windowMs: number;
  };
  logLevel: string;
  debug: boolean;
  adminToken: string;
}

// ---------------------------------------------------------------------------
// Inbound request
// ---------------------------------------------------------------------------

/** Immutable capture of one inbound POST, before any trust is established. */
export interface RawRequest {
  readonly body: Buffer;
  readonly signature: string | undefined;
  readonly timestamp: string | undefined;
  /** Monotonic receipt time (performance.now()), start of the response budget. */
  readonly receivedAt: number;
}

// ---------------------------------------------------------------------------
// Classified interactions
// ---------------------------------------------------------------------------

export type InteractionKind = 'handshake' | 'command' | 'component' | 'autocomplete' | 'modal' | 'unknown';

/** Kinds a handler can be registered for. */
export type RoutableKind = 'command' | 'component' | 'autocomplete' | 'modal';

interface InteractionBase {
  id: string;
  /** Follow-up credential. Never log it. */
  token: string;
  receivedAt: number;
  /** Wall-clock creation time, from the snowflake id when it parses. */
  createdAtMs: number;
  routingKey: string;
  applicationId?: string;
  guildId?: string;
  channelId?: string;
  userId?: string;
  raw: Record<string, unknown>;
}

export interface HandshakeInteraction extends InteractionBase {
  kind: 'handshake';
}

export interface CommandInteraction extends InteractionBase {
  kind: 'command';
  name: string;
  commandType: number;
  subcommandPath: string[];
  options: Record<string, unknown>;
}

export interface ComponentInteraction extends InteractionBase {
  kind: 'component';
  customId: string;
  componentType: number;
  values: string[];
}

export interface FocusedOption {
  /** Sub-command names followed by the focused option's name. */
  path: string[];
  name: string;
  value: unknown;
}

export interface AutocompleteInteraction extends InteractionBase {
  kind: 'autocomplete';
  name: string;
  subcommandPath: string[];
  focused: FocusedOption | null;
}

export interface ModalInteraction extends InteractionBase {
  kind: 'modal';
  customId: string;
  fields: Record<string, string>;
}

export interface UnknownInteraction extends InteractionBase {
  kind: 'unknown';
  rawType: number;
}

export type Interaction =
  | HandshakeInteraction
  | CommandInteraction
  | ComponentInteraction
  | AutocompleteInteraction
  | ModalInteraction
  | UnknownInteraction;

export type RoutableInteraction = Extract<Interaction, { kind: RoutableKind }>;

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export type InteractionReply =
  | { kind: 'message'; data: APIInteractionResponseCallbackData }
  | { kind: 'update'; data: APIInteractionResponseCallbackData }
  | { kind: 'choices'; choices: APIApplicationCommandOptionChoice[] }
  | { kind: 'modal'; data: APIModalInteractionResponseCallbackData };

export interface HandlerContext<I extends RoutableInteraction = RoutableInteraction> {
  interaction: I;
  /** Monotonic time by which the initial response must be chosen. */
  deadline: number;
  remainingMs(): number;
  /** Aborted when the interaction is deferred. The handler may keep running. */
  signal: AbortSignal;
  log: Logger;
}

export type InteractionHandler<I extends RoutableInteraction = RoutableInteraction> = (
  ctx: HandlerContext<I>
) => InteractionReply | Promise<InteractionReply>;

export interface RouteOptions {
  /** Deferred acks and error notices are ephemeral. */
  ephemeral?: boolean;
  /** Component interactions only: how a deferral acknowledges the click. */
  deferAs?: 'message' | 'update';
}

export type RouteMatcher = string | { prefix: string };

export interface RegisteredRoute {
  kind: RoutableKind;
  matcher: RouteMatcher;
  handler: InteractionHandler;
  options: RouteOptions;
}
