/**
 * Interactions Gateway - Logger
 *
 * Shared pino instance. Interaction tokens are follow-up credentials, so
 * every `token` field is redacted before a line is written.
 */

import pino from 'pino';

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): pino.Logger {
  return pino({
    name: 'interactions-gateway',
    level,
    redact: {
      paths: ['token', '*.token', 'headers.authorization', 'headers["x-signature-ed25519"]'],
      censor: '[redacted]',
    },
  });
}

export const logger = createLogger();

/** Replace the interaction token in a webhook URL so it can be logged. */
export function redactWebhookUrl(url: string, token: string): string {
  return token ? url.split(token).join('[token]') : url;
}
