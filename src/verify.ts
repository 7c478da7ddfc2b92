/**
 * Interactions Gateway - Signature Verification
 *
 * Discord signs every interaction POST with Ed25519 over
 * `X-Signature-Timestamp || rawBody`. Verification uses the application's
 * public key, loaded once at startup.
 */

import { createPublicKey, verify, type KeyObject } from 'crypto';
import type { RawRequest } from './types.js';

export type VerificationStatus = 'valid' | 'invalid' | 'malformed_input';

const SIGNATURE_HEX = /^[0-9a-f]{128}$/i;
const PUBLIC_KEY_HEX = /^[0-9a-f]{64}$/i;

const VERIFIER: unique symbol = Symbol('verifier');

/**
 * A request whose signature has been checked. Only this module holds the
 * token the constructor requires.
 */
export class VerifiedPayload {
  readonly rawBody: Buffer;
  readonly receivedAt: number;

  constructor(token: typeof VERIFIER, rawBody: Buffer, receivedAt: number) {
    if (token !== VERIFIER) {
      throw new Error('VerifiedPayload can only be created by the verifier');
    }
    this.rawBody = rawBody;
    this.receivedAt = receivedAt;
  }
}

/**
 * Build a KeyObject from the hex public key shown in the Developer Portal.
 * Throws on a malformed key; this is a startup configuration error.
 */
export function loadPublicKey(hex: string): KeyObject {
  if (!PUBLIC_KEY_HEX.test(hex)) {
    throw new Error('Discord public key must be 64 hex characters');
  }
  return createPublicKey({
    key: {
      kty: 'OKP',
      crv: 'Ed25519',
      x: Buffer.from(hex, 'hex').toString('base64url'),
    },
    format: 'jwk',
  });
}

export function verifySignature(
  rawBody: Buffer,
  signatureHex: string | undefined,
  timestamp: string | undefined,
  publicKey: KeyObject
): VerificationStatus {
  if (!signatureHex || !timestamp) return 'malformed_input';
  if (!SIGNATURE_HEX.test(signatureHex)) return 'invalid';

  try {
    const message = Buffer.concat([Buffer.from(timestamp, 'utf8'), rawBody]);
    return verify(null, message, publicKey, Buffer.from(signatureHex, 'hex')) ? 'valid' : 'invalid';
  } catch {
    return 'invalid';
  }
}

export type RequestVerification =
  | { status: 'valid'; payload: VerifiedPayload }
  | { status: 'invalid' | 'malformed_input' };

export function verifyRequest(request: RawRequest, publicKey: KeyObject): RequestVerification {
  const status = verifySignature(request.body, request.signature, request.timestamp, publicKey);
  if (status !== 'valid') return { status };
  return { status, payload: new VerifiedPayload(VERIFIER, request.body, request.receivedAt) };
}

/**
 * Reject signatures whose timestamp is further than maxAgeSeconds from now.
 * A maxAgeSeconds of 0 disables the check.
 */
export function isTimestampFresh(timestamp: string, maxAgeSeconds: number, nowMs: number = Date.now()): boolean {
  if (maxAgeSeconds <= 0) return true;
  if (!/^\d+$/.test(timestamp)) return false;
  const ageSeconds = Math.abs(nowMs / 1000 - Number(timestamp));
  return ageSeconds <= maxAgeSeconds;
}
