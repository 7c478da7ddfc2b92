/**
 * Interactions Gateway - Payload Classification
 *
 * Turns a verified JSON body into a typed Interaction. Unknown interaction
 * types classify as `unknown` so the endpoint can still answer safely;
 * only structurally broken bodies are errors.
 */

import { ApplicationCommandOptionType, InteractionType } from 'discord-api-types/v10';
import type { MalformedRequestReason } from './errors.js';
import type { FocusedOption, Interaction } from './types.js';

/** Discord epoch (2015-01-01T00:00:00Z) in ms. */
const DISCORD_EPOCH = 1420070400000n;

export interface ClassificationError {
  reason: Exclude<MalformedRequestReason, 'invalid_json'>;
  field?: string;
}

export type ClassificationResult =
  | { ok: true; interaction: Interaction }
  | { ok: false; error: ClassificationError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = source?.[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function numberField(source: Record<string, unknown> | undefined, key: string, fallback: number): number {
  const value = source?.[key];
  return typeof value === 'number' ? value : fallback;
}

function recordArray(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Creation time encoded in a snowflake, or null if the id is not one.
 */
export function snowflakeTimestamp(id: string): number | null {
  if (!/^\d{1,20}$/.test(id)) return null;
  const ms = (BigInt(id) >> 22n) + DISCORD_EPOCH;
  return Number(ms);
}

function isNestingOption(option: Record<string, unknown>): boolean {
  return (
    option.type === ApplicationCommandOptionType.Subcommand ||
    option.type === ApplicationCommandOptionType.SubcommandGroup
  );
}

/**
 * Walk sub-command groups and sub-commands down to the leaf options.
 */
function flattenCommandOptions(options: unknown): {
  subcommandPath: string[];
  leaves: Record<string, unknown>[];
} {
  const subcommandPath: string[] = [];
  let current = recordArray(options);

  while (current.length === 1 && isNestingOption(current[0])) {
    const name = stringField(current[0], 'name');
    if (name) subcommandPath.push(name);
    current = recordArray(current[0].options);
  }

  return { subcommandPath, leaves: current };
}

function findFocused(subcommandPath: string[], leaves: Record<string, unknown>[]): FocusedOption | null {
  const focused = leaves.find((option) => option.focused === true);
  if (!focused) return null;
  const name = stringField(focused, 'name') ?? '';
  return { path: [...subcommandPath, name], name, value: focused.value };
}

/**
 * Flatten modal action rows (or label wrappers) into custom_id -> value.
 */
function collectModalFields(components: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const row of recordArray(components)) {
    const single = row.component;
    const inner = isRecord(single) ? [single] : recordArray(row.components);
    for (const input of inner) {
      const customId = stringField(input, 'custom_id');
      const value = input.value;
      if (customId && typeof value === 'string') {
        fields[customId] = value;
      }
    }
  }
  return fields;
}

export function classifyPayload(body: unknown, receivedAt: number, nowMs: number = Date.now()): ClassificationResult {
  if (!isRecord(body)) {
    return { ok: false, error: { reason: 'not_an_object' } };
  }

  const type = body.type;
  if (typeof type !== 'number' || !Number.isInteger(type)) {
    return { ok: false, error: { reason: 'missing_type' } };
  }

  const id = stringField(body, 'id');
  const token = stringField(body, 'token');

  if (type !== InteractionType.Ping) {
    if (!id) return { ok: false, error: { reason: 'missing_credential', field: 'id' } };
    if (!token) return { ok: false, error: { reason: 'missing_credential', field: 'token' } };
  }

  const rawData = body.data;
  const data = isRecord(rawData) ? rawData : undefined;
  const rawMember = body.member;
  const memberUser = isRecord(rawMember) ? rawMember.user : undefined;
  const directUser = body.user;
  const user = isRecord(memberUser) ? memberUser : isRecord(directUser) ? directUser : undefined;
  const createdAt = id ? snowflakeTimestamp(id) : null;

  const base = {
    id: id ?? '',
    token: token ?? '',
    receivedAt,
    createdAtMs: createdAt ?? nowMs,
    applicationId: stringField(body, 'application_id'),
    guildId: stringField(body, 'guild_id'),
    channelId: stringField(body, 'channel_id'),
    userId: stringField(user, 'id'),
    raw: body,
  };

  switch (type) {
    case InteractionType.Ping:
      return { ok: true, interaction: { ...base, kind: 'handshake', routingKey: '' } };

    case InteractionType.ApplicationCommand: {
      const name = stringField(data, 'name');
      if (!name) return { ok: false, error: { reason: 'missing_field', field: 'data.name' } };
      const { subcommandPath, leaves } = flattenCommandOptions(data?.options);
      const options: Record<string, unknown> = {};
      for (const leaf of leaves) {
        const optionName = stringField(leaf, 'name');
        if (optionName) options[optionName] = leaf.value;
      }
      return {
        ok: true,
        interaction: {
          ...base,
          kind: 'command',
          routingKey: name,
          name,
          commandType: numberField(data, 'type', 1),
          subcommandPath,
          options,
        },
      };
    }

    case InteractionType.MessageComponent: {
      const customId = stringField(data, 'custom_id');
      if (!customId) return { ok: false, error: { reason: 'missing_field', field: 'data.custom_id' } };
      const rawValues = data?.values;
      const values = Array.isArray(rawValues)
        ? rawValues.filter((v): v is string => typeof v === 'string')
        : [];
      return {
        ok: true,
        interaction: {
          ...base,
          kind: 'component',
          routingKey: customId,
          customId,
          componentType: numberField(data, 'component_type', 0),
          values,
        },
      };
    }

    case InteractionType.ApplicationCommandAutocomplete: {
      const name = stringField(data, 'name');
      if (!name) return { ok: false, error: { reason: 'missing_field', field: 'data.name' } };
      const { subcommandPath, leaves } = flattenCommandOptions(data?.options);
      return {
        ok: true,
        interaction: {
          ...base,
          kind: 'autocomplete',
          routingKey: name,
          name,
          subcommandPath,
          focused: findFocused(subcommandPath, leaves),
        },
      };
    }

    case InteractionType.ModalSubmit: {
      const customId = stringField(data, 'custom_id');
      if (!customId) return { ok: false, error: { reason: 'missing_field', field: 'data.custom_id' } };
      return {
        ok: true,
        interaction: {
          ...base,
          kind: 'modal',
          routingKey: customId,
          customId,
          fields: collectModalFields(data?.components),
        },
      };
    }

    default:
      return { ok: true, interaction: { ...base, kind: 'unknown', routingKey: '', rawType: type } };
  }
}
