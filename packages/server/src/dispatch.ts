// ============================================================================
// @routeconf/server: Dispatcher
// ============================================================================
//
// Matches a request against the published route table, resolves the action
// from the registry and runs it. No transport here: `createRouteHandler`
// writes the result to a Node.js response.
// ============================================================================

import { isRouteStore, matchRoute } from '@routeconf/router';
import type { RouteStore, RouteTable } from '@routeconf/router';
import { contentTypeFor, resolveFormat } from './format.js';
import { UnregisteredActionError } from './registry.js';
import type { ActionRegistry } from './registry.js';
import type { ActionResult, DispatchResponse, DispatchResult, RouteRequest } from './types.js';

export interface DispatchOptions {
  /** A fixed table, or a store whose current table is read per request. */
  routes: RouteTable | RouteStore;
  registry: ActionRegistry;
}

/**
 * Route and run one request.
 *
 * A request no route accepts resolves to `{ found: false }` so the caller
 * can choose the fallback. Errors thrown by the action propagate.
 *
 * @throws UnregisteredActionError when the matched route's action has no handler
 */
export async function dispatch(request: RouteRequest, options: DispatchOptions): Promise<DispatchResult> {
  const table = isRouteStore(options.routes) ? options.routes.current() : options.routes;
  const resolution = matchRoute(table, request.method, request.path);
  if (!resolution.found) {
    return { found: false, miss: resolution };
  }

  const { route, params } = resolution;
  const handler = options.registry.resolve(route.action);
  if (!handler) {
    throw new UnregisteredActionError([route.action]);
  }

  const format = resolveFormat(request, resolution);
  const result = await handler({
    request: { ...request, format },
    route,
    params,
    args: route.action.staticArgs,
    format,
  });

  return { found: true, match: resolution, response: toResponse(result, format) };
}

/**
 * Normalize an action result: nothing → 204, a string → 200 in the request
 * format, a response object → its status, headers and body (JSON unless the
 * body is a string).
 */
export function toResponse(result: ActionResult, format: string): DispatchResponse {
  if (result === undefined) {
    return { status: 204, headers: {}, body: '' };
  }

  if (typeof result === 'string') {
    return { status: 200, headers: { 'Content-Type': contentTypeFor(format) }, body: result };
  }

  const { status = 200, headers = {}, body } = result;
  if (body === undefined) {
    return { status, headers: { ...headers }, body: '' };
  }
  if (typeof body === 'string') {
    return { status, headers: { 'Content-Type': contentTypeFor(format), ...headers }, body };
  }
  return {
    status,
    headers: { 'Content-Type': contentTypeFor('json'), ...headers },
    body: JSON.stringify(body),
  };
}
