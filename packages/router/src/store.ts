// ============================================================================
// @routeconf/router: Route store (build-then-swap reloading)
// ============================================================================

import type { RouteTable } from './types.js';

/**
 * Holds the table requests are matched against. Tables are never edited in
 * place: a reload builds a complete new table and publishes it with a single
 * reference assignment, so a request sees either the old table or the new one.
 */
export interface RouteStore {
  /** The table currently published. */
  current(): RouteTable;

  /** Publish `next` and return the table it replaced. */
  swap(next: RouteTable): RouteTable;

  /**
   * Build a new table and publish it. If `build` throws or rejects, the
   * current table stays published and the error is rethrown.
   *
   * @returns The table that was replaced
   */
  reload(build: () => RouteTable | Promise<RouteTable>): Promise<RouteTable>;
}

/**
 * Create a store publishing `initial`.
 *
 * ```ts
 * const store = createRouteStore(await loadRouteFile('routes.conf'));
 * // later, e.g. on SIGHUP
 * await store.reload(() => loadRouteFile('routes.conf'));
 * ```
 */
export function createRouteStore(initial: RouteTable): RouteStore {
  let table = initial;

  function swap(next: RouteTable): RouteTable {
    const previous = table;
    table = next;
    return previous;
  }

  return {
    current: () => table,
    swap,
    async reload(build) {
      const next = await build();
      return swap(next);
    },
  };
}

/**
 * Narrow a table-or-store option to a store.
 */
export function isRouteStore(value: RouteTable | RouteStore): value is RouteStore {
  return 'current' in value && typeof value.current === 'function';
}
