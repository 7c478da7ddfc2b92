/**
 * Interactions Gateway - Dispatch Router
 *
 * Maps (kind, command name or custom id) to a handler. Exact matches are
 * looked up first, then the custom id's prefix (the segment before the
 * first ':'). Both are single Map reads, so lookup cost does not grow with
 * the number of registered handlers.
 */

import type {
  AutocompleteInteraction,
  CommandInteraction,
  ComponentInteraction,
  InteractionHandler,
  ModalInteraction,
  RegisteredRoute,
  RoutableInteraction,
  RoutableKind,
  RouteMatcher,
  RouteOptions,
} from './types.js';

export const CUSTOM_ID_SEPARATOR = ':';

const ROUTABLE_KINDS: readonly RoutableKind[] = ['command', 'component', 'autocomplete', 'modal'];

export type RouteResult =
  | { ok: true; route: RegisteredRoute }
  | { ok: false; error: 'not_found'; kind: RoutableKind; key: string };

interface KindTable {
  exact: Map<string, RegisteredRoute>;
  prefix: Map<string, RegisteredRoute>;
}

function describeMatcher(matcher: RouteMatcher): string {
  return typeof matcher === 'string' ? matcher : `${matcher.prefix}${CUSTOM_ID_SEPARATOR}*`;
}

export class DispatchRouter {
  private tables = new Map<RoutableKind, KindTable>(
    ROUTABLE_KINDS.map((kind) => [kind, { exact: new Map(), prefix: new Map() }])
  );

  private table(kind: RoutableKind): KindTable {
    const table = this.tables.get(kind);
    if (!table) throw new Error(`Unsupported interaction kind: ${kind}`);
    return table;
  }

  /**
   * Register a handler. Throws on a duplicate (kind, matcher) pair.
   * Prefix matchers are only meaningful for custom ids.
   */
  register(kind: RoutableKind, matcher: RouteMatcher, handler: InteractionHandler, options: RouteOptions = {}): this {
    const table = this.table(kind);
    const route: RegisteredRoute = { kind, matcher, handler, options };

    if (typeof matcher === 'string') {
      if (!matcher) throw new Error(`Empty ${kind} matcher`);
      if (table.exact.has(matcher)) {
        throw new Error(`Duplicate ${kind} handler for "${matcher}"`);
      }
      table.exact.set(matcher, route);
      return this;
    }

    if (kind !== 'component' && kind !== 'modal') {
      throw new Error(`Prefix matchers are only supported for components and modals, not ${kind}`);
    }
    if (!matcher.prefix || matcher.prefix.includes(CUSTOM_ID_SEPARATOR)) {
      throw new Error(`Invalid ${kind} prefix "${matcher.prefix}"`);
    }
    if (table.prefix.has(matcher.prefix)) {
      throw new Error(`Duplicate ${kind} handler for "${describeMatcher(matcher)}"`);
    }
    table.prefix.set(matcher.prefix, route);
    return this;
  }

  onCommand(name: string, handler: InteractionHandler<CommandInteraction>, options?: RouteOptions): this {
    return this.register(
      'command',
      name,
      (ctx) => {
        const { interaction } = ctx;
        if (interaction.kind !== 'command') throw new Error(`Expected command, got ${interaction.kind}`);
        return handler({ ...ctx, interaction });
      },
      options
    );
  }

  onComponent(matcher: RouteMatcher, handler: InteractionHandler<ComponentInteraction>, options?: RouteOptions): this {
    return this.register(
      'component',
      matcher,
      (ctx) => {
        const { interaction } = ctx;
        if (interaction.kind !== 'component') throw new Error(`Expected component, got ${interaction.kind}`);
        return handler({ ...ctx, interaction });
      },
      options
    );
  }

  onAutocomplete(name: string, handler: InteractionHandler<AutocompleteInteraction>): this {
    return this.register('autocomplete', name, (ctx) => {
      const { interaction } = ctx;
      if (interaction.kind !== 'autocomplete') throw new Error(`Expected autocomplete, got ${interaction.kind}`);
      return handler({ ...ctx, interaction });
    });
  }

  onModal(matcher: RouteMatcher, handler: InteractionHandler<ModalInteraction>, options?: RouteOptions): this {
    return this.register(
      'modal',
      matcher,
      (ctx) => {
        const { interaction } = ctx;
        if (interaction.kind !== 'modal') throw new Error(`Expected modal, got ${interaction.kind}`);
        return handler({ ...ctx, interaction });
      },
      options
    );
  }

  route(interaction: RoutableInteraction): RouteResult {
    const table = this.table(interaction.kind);
    const key = interaction.routingKey;

    const exact = table.exact.get(key);
    if (exact) return { ok: true, route: exact };

    const separatorAt = key.indexOf(CUSTOM_ID_SEPARATOR);
    if (separatorAt > 0) {
      const byPrefix = table.prefix.get(key.slice(0, separatorAt));
      if (byPrefix) return { ok: true, route: byPrefix };
    }

    return { ok: false, error: 'not_found', kind: interaction.kind, key };
  }

  counts(): Record<RoutableKind, number> {
    const result = { command: 0, component: 0, autocomplete: 0, modal: 0 };
    for (const [kind, table] of this.tables) {
      result[kind] = table.exact.size + table.prefix.size;
    }
    return result;
  }

  size(): number {
    let total = 0;
    for (const table of this.tables.values()) total += table.exact.size + table.prefix.size;
    return total;
  }
}
