// ============================================================================
// @routeconf/router: Request matching
// ============================================================================
//
// A linear scan in declaration order. The first route whose method and
// segments accept the request wins, even when a later route would also match,
// so an earlier specific route can shadow a later general one on purpose.
// ============================================================================

import { splitPath } from './pattern.js';
import type { CompiledRoute, RouteResolution, RouteTable } from './types.js';

/** Query string or fragment at the end of a request path. */
export const QUERY_OR_FRAGMENT_RE = /[?#].*$/s;

/**
 * Resolves a request to the first matching route in the table.
 *
 * Never throws: a request no route accepts yields `{ found: false }` with the
 * method and path exactly as given.
 *
 * @param table - Route table built by `loadRoutes`
 * @param method - Request method, any case
 * @param path - Request path; a query string or fragment is ignored
 *
 * @example
 * const result = matchRoute(table, 'get', '/page/home');
 * if (result.found) {
 *   result.route.action.methodName; // 'showPage'
 *   result.params;                  // { id: 'home' }
 * }
 */
export function matchRoute(table: RouteTable, method: string, path: string): RouteResolution {
  const requestMethod = method.trim().toUpperCase();
  const parts = splitPath(normalizeRequestPath(path));

  for (const route of table.routes) {
    if (!acceptsMethod(route, requestMethod)) {
      continue;
    }

    const values = route.match(parts);
    if (values === null) {
      continue;
    }

    const params = Object.fromEntries(
      route.params.map((name, i): [string, string] => [name, decodeSegment(values[i])]),
    );
    return { found: true, route, params, method, path };
  }

  return { found: false, method, path };
}

/**
 * Whether a route accepts an upper-cased request method. `*` routes accept
 * everything and HEAD requests fall back to GET routes.
 */
export function acceptsMethod(route: CompiledRoute, requestMethod: string): boolean {
  return (
    route.method === '*' ||
    route.method === requestMethod ||
    (requestMethod === 'HEAD' && route.method === 'GET')
  );
}

/**
 * Drops any query string or fragment, ensures a leading '/' and removes a
 * trailing '/' (except for the root).
 */
export function normalizeRequestPath(path: string): string {
  let pathname = path.replace(QUERY_OR_FRAGMENT_RE, '');
  if (!pathname.startsWith('/')) {
    pathname = '/' + pathname;
  }
  if (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  return pathname;
}

/** Diagnostic key for a route, e.g. 'GET /page/{id}'. */
export function routeKey(route: CompiledRoute): string {
  return `${route.method} ${route.path}`;
}

/**
 * Percent-decodes a captured segment. A malformed escape sequence leaves the
 * segment as it was received.
 */
function decodeSegment(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    if (err instanceof URIError) {
      return value;
    }
    throw err;
  }
}
