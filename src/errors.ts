/**
 * Interactions Gateway - Error taxonomy
 *
 * Components return these as values; nothing here is thrown across a
 * component boundary.
 */

export type AuthenticationFailure = 'missing_headers' | 'invalid_signature' | 'stale_timestamp';

export type MalformedRequestReason =
  | 'invalid_json'
  | 'not_an_object'
  | 'missing_type'
  | 'missing_credential'
  | 'missing_field';

export type DeliveryErrorKind = 'network' | 'timeout' | 'http' | 'window_expired';

export class DeliveryError extends Error {
  readonly kind: DeliveryErrorKind;
  readonly status: number | null;
  readonly attempts: number;
  readonly retryable: boolean;

  constructor(
    kind: DeliveryErrorKind,
    message: string,
    options: { status?: number | null; attempts: number; retryable: boolean }
  ) {
    super(message);
    this.name = 'DeliveryError';
    this.kind = kind;
    this.status = options.status ?? null;
    this.attempts = options.attempts;
    this.retryable = options.retryable;
  }
}

/** Raised inside the coordinator when a handler returns a reply its kind cannot use. */
export class InvalidReplyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidReplyError';
  }
}

/** A deferred handler was still running when the follow-up window closed. */
export class HandlerTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
