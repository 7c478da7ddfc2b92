/**
 * Built-in `/ping` and `/ping-button` commands.
 *
 * `/ping` answers with "pong". `/ping-button` also attaches a button whose
 * custom id (`ping:<n>`) carries a click counter; clicking it edits the
 * message in place through the prefix-routed component handler.
 */

import { ButtonStyle, ComponentType } from 'discord-api-types/v10';
import type { APIActionRowComponent, APIButtonComponent } from 'discord-api-types/v10';
import type { DispatchRouter } from '../dispatch-router.js';
import { message, update } from '../replies.js';

export const PING_COMMAND = 'ping';
export const PING_BUTTON_COMMAND = 'ping-button';
export const PING_BUTTON_PREFIX = 'ping';

export function pingAgainRow(count: number): APIActionRowComponent<APIButtonComponent> {
  return {
    type: ComponentType.ActionRow,
    components: [
      {
        type: ComponentType.Button,
        style: ButtonStyle.Secondary,
        label: 'Again',
        custom_id: `${PING_BUTTON_PREFIX}:${count}`,
      },
    ],
  };
}

export function registerPingHandlers(router: DispatchRouter): void {
  router.onCommand(PING_COMMAND, () => message('pong'));
  router.onCommand(PING_BUTTON_COMMAND, () => message({ content: 'pong (0)', components: [pingAgainRow(0)] }));

  router.onComponent({ prefix: PING_BUTTON_PREFIX }, ({ interaction }) => {
    const previous = Number(interaction.customId.split(':')[1]);
    const count = Number.isInteger(previous) && previous >= 0 ? previous + 1 : 1;
    return update({ content: `pong (${count})`, components: [pingAgainRow(count)] });
  });
}
