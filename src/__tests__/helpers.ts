import { generateKeyPairSync, sign } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import type { DeliveryResult, FollowUpDelivery, FollowUpMode, FollowUpTarget } from '../followup.js';
import type {
  AutocompleteInteraction,
  CommandInteraction,
  ComponentInteraction,
  ModalInteraction,
} from '../types.js';

export interface TestSigner {
  publicKey: KeyObject;
  publicKeyHex: string;
  sign(body: string | Buffer, timestamp: string): string;
}

export function createSigner(): TestSigner {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  const jwk = publicKey.export({ format: 'jwk' });
  return {
    publicKey,
    publicKeyHex: Buffer.from(jwk.x ?? '', 'base64url').toString('hex'),
    sign(body, timestamp) {
      const message = Buffer.concat([Buffer.from(timestamp, 'utf8'), Buffer.from(body)]);
      return sign(null, message, privateKey).toString('hex');
    },
  };
}

export interface RecordedFollowUp {
  target: FollowUpTarget;
  payload: object;
  mode: FollowUpMode;
}

export class RecordingDelivery implements FollowUpDelivery {
  readonly calls: RecordedFollowUp[] = [];
  result: DeliveryResult = { ok: true, attempts: 1, status: 200 };

  async deliver(target: FollowUpTarget, payload: object, mode: FollowUpMode = 'create'): Promise<DeliveryResult> {
    this.calls.push({ target, payload, mode });
    return this.result;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Snowflake for 2026-01-01T00:00:00Z
export const TEST_INTERACTION_ID = String((1767225600000n - 1420070400000n) << 22n);
export const TEST_CREATED_AT_MS = 1767225600000;

/** Wall clock pinned one second after the test interactions were created. */
export function testWallClock(): number {
  return TEST_CREATED_AT_MS + 1000;
}

const base = {
  id: TEST_INTERACTION_ID,
  token: 'test-token',
  createdAtMs: TEST_CREATED_AT_MS,
  raw: {},
};

export function commandInteraction(overrides: Partial<CommandInteraction> = {}): CommandInteraction {
  return {
    ...base,
    receivedAt: performance.now(),
    kind: 'command',
    routingKey: 'ping',
    name: 'ping',
    commandType: 1,
    subcommandPath: [],
    options: {},
    ...overrides,
  };
}

export function componentInteraction(overrides: Partial<ComponentInteraction> = {}): ComponentInteraction {
  return {
    ...base,
    receivedAt: performance.now(),
    kind: 'component',
    routingKey: 'confirm',
    customId: 'confirm',
    componentType: 2,
    values: [],
    ...overrides,
  };
}

export function autocompleteInteraction(overrides: Partial<AutocompleteInteraction> = {}): AutocompleteInteraction {
  return {
    ...base,
    receivedAt: performance.now(),
    kind: 'autocomplete',
    routingKey: 'search',
    name: 'search',
    subcommandPath: [],
    focused: { path: ['query'], name: 'query', value: 'ab' },
    ...overrides,
  };
}

export function modalInteraction(overrides: Partial<ModalInteraction> = {}): ModalInteraction {
  return {
    ...base,
    receivedAt: performance.now(),
    kind: 'modal',
    routingKey: 'feedback',
    customId: 'feedback',
    fields: {},
    ...overrides,
  };
}
