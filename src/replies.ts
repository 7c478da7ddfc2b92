/**
 * Interactions Gateway - Reply helpers and fixed response bodies
 */

import { InteractionResponseType, MessageFlags } from 'discord-api-types/v10';
import type {
  APIApplicationCommandOptionChoice,
  APIInteractionResponse,
  APIInteractionResponseCallbackData,
  APIModalInteractionResponseCallbackData,
} from 'discord-api-types/v10';
import type { InteractionReply } from './types.js';

export const UNKNOWN_TYPE_CONTENT = '❌ Unknown interaction type';
export const UNKNOWN_ROUTE_CONTENT = '❌ This interaction is no longer available.';
export const ERROR_NOTICE_CONTENT = '❌ Something went wrong while handling this interaction.';

export function message(data: APIInteractionResponseCallbackData | string): InteractionReply {
  return { kind: 'message', data: typeof data === 'string' ? { content: data } : data };
}

export function update(data: APIInteractionResponseCallbackData): InteractionReply {
  return { kind: 'update', data };
}

export function choices(list: APIApplicationCommandOptionChoice[]): InteractionReply {
  return { kind: 'choices', choices: list };
}

export function modal(data: APIModalInteractionResponseCallbackData): InteractionReply {
  return { kind: 'modal', data };
}

export const PONG: APIInteractionResponse = { type: InteractionResponseType.Pong };

export function ephemeralMessage(content: string): APIInteractionResponse {
  return {
    type: InteractionResponseType.ChannelMessageWithSource,
    data: { content, flags: MessageFlags.Ephemeral },
  };
}

export function emptyChoices(): APIInteractionResponse {
  return { type: InteractionResponseType.ApplicationCommandAutocompleteResult, data: { choices: [] } };
}

export function errorNoticeData(): APIInteractionResponseCallbackData {
  return { content: ERROR_NOTICE_CONTENT, flags: MessageFlags.Ephemeral };
}
