// ============================================================================
// @routeconf/router: Reverse routing
// ============================================================================
//
// Builds the URL a request would need to reach an action:
//
//   GET /page/{id}  PageController.showPage
//
//   reverseRoute(table, 'PageController.showPage', { id: 'about us', lang: 'en' })
//   // { method: 'GET', path: '/page/about%20us?lang=en' }
//
// ============================================================================

import { actionKey } from './action.js';
import type { CompiledRoute, RouteMethod, RouteTable } from './types.js';

export interface ReversedRoute {
  method: RouteMethod;
  /** Encoded path, with leftover arguments as a query string. */
  path: string;
  route: CompiledRoute;
}

/**
 * Finds the first route, in declaration order, that can produce a URL for
 * `action` from `args`.
 *
 * A route fits when its static arguments agree with `args`, and every path
 * parameter is present in `args` and satisfies its constraint.
 *
 * @param action - 'Controller.method'
 * @param args - Path parameters, static arguments and query parameters
 */
export function reverseRoute(
  table: RouteTable,
  action: string,
  args: Record<string, string> = {},
): ReversedRoute | null {
  for (const route of table.routes) {
    if (actionKey(route.action) !== action) {
      continue;
    }
    const path = buildPath(route, args);
    if (path !== null) {
      return { method: route.method, path, route };
    }
  }
  return null;
}

function buildPath(route: CompiledRoute, args: Record<string, string>): string | null {
  const { staticArgs } = route.action;
  for (const [key, value] of Object.entries(staticArgs)) {
    if (Object.hasOwn(args, key) && args[key] !== value) {
      return null;
    }
  }

  const parts: string[] = [];
  for (const segment of route.segments) {
    if (segment.kind === 'static') {
      parts.push(segment.literal);
      continue;
    }
    if (!Object.hasOwn(args, segment.name)) {
      return null;
    }
    const encoded = encodeURIComponent(args[segment.name]);
    if (!segment.constraint.test(encoded)) {
      return null;
    }
    parts.push(encoded);
  }

  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(args)) {
    if (!route.params.includes(key) && !Object.hasOwn(staticArgs, key)) {
      query.append(key, value);
    }
  }

  const path = '/' + parts.join('/');
  const search = query.toString();
  return search ? `${path}?${search}` : path;
}
