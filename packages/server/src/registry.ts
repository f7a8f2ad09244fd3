// ============================================================================
// @routeconf/server: Action registry
// ============================================================================
//
// Actions are looked up by the `Controller.method` key of a route's action
// descriptor. Handlers are registered explicitly at startup; nothing is
// discovered or invoked by name at request time.
// ============================================================================

import { actionKey } from '@routeconf/router';
import type { ActionDescriptor, RouteTable } from '@routeconf/router';
import type { ActionHandler } from './types.js';

export interface ActionRegistry {
  /** Register one action. Throws if `target.methodName` is already registered. */
  register(target: string, methodName: string, handler: ActionHandler): ActionRegistry;

  /** Register every method of a controller object. */
  registerController(target: string, methods: Record<string, ActionHandler>): ActionRegistry;

  /** The handler for a descriptor, if one is registered. */
  resolve(action: ActionDescriptor): ActionHandler | undefined;

  /** Distinct actions referenced by `table` that have no handler, in route order. */
  missing(table: RouteTable): ActionDescriptor[];
}

/**
 * Thrown when routes reference actions the registry cannot resolve.
 */
export class UnregisteredActionError extends Error {
  actions: ActionDescriptor[];

  constructor(actions: ActionDescriptor[]) {
    super(`No handler registered for ${actions.map(actionKey).join(', ')}`);
    this.name = 'UnregisteredActionError';
    this.actions = actions;
  }
}

/**
 * Create an empty registry.
 *
 * ```ts
 * const registry = createActionRegistry()
 *   .registerController('PageController', {
 *     showPage: ({ params, args }) => `<h1>${params.id ?? args.id}</h1>`,
 *   });
 * ```
 */
export function createActionRegistry(): ActionRegistry {
  const handlers = new Map<string, ActionHandler>();

  const registry: ActionRegistry = {
    register(target, methodName, handler) {
      const key = actionKey({ target, methodName });
      if (handlers.has(key)) {
        throw new Error(`Action '${key}' is already registered`);
      }
      handlers.set(key, handler);
      return registry;
    },

    registerController(target, methods) {
      for (const [methodName, handler] of Object.entries(methods)) {
        registry.register(target, methodName, handler);
      }
      return registry;
    },

    resolve(action) {
      return handlers.get(actionKey(action));
    },

    missing(table) {
      const seen = new Set<string>();
      const result: ActionDescriptor[] = [];
      for (const route of table.routes) {
        const key = actionKey(route.action);
        if (!handlers.has(key) && !seen.has(key)) {
          seen.add(key);
          result.push(route.action);
        }
      }
      return result;
    },
  };

  return registry;
}

/**
 * Throws `UnregisteredActionError` unless every route in `table` resolves.
 * Run it on a freshly loaded table before publishing it.
 */
export function assertActionsRegistered(table: RouteTable, registry: ActionRegistry): void {
  const missing = registry.missing(table);
  if (missing.length > 0) {
    throw new UnregisteredActionError(missing);
  }
}
