// ============================================================================
// @routeconf/server: HTTP request handler
// ============================================================================

import type { IncomingMessage, ServerResponse } from 'node:http';
import { isRouteStore } from '@routeconf/router';
import type { RouteMiss, RouterLogger, RouteStore, RouteTable } from '@routeconf/router';
import { dispatch } from './dispatch.js';
import { assertActionsRegistered } from './registry.js';
import type { ActionRegistry } from './registry.js';
import { adaptRequest } from './request.js';

export interface RouteHandlerOptions {
  /** A fixed table, or a store to allow reloading while serving. */
  routes: RouteTable | RouteStore;
  registry: ActionRegistry;
  /** Fallback for requests no route accepts. Defaults to a plain 404. */
  notFound?: (req: IncomingMessage, res: ServerResponse, miss: RouteMiss) => void;
  /** Defaults to `console`. */
  logger?: RouterLogger;
}

/**
 * Create a Node.js HTTP request handler that routes every request through
 * the route table.
 *
 * Every action referenced by the current table must be registered: the
 * handler refuses to start otherwise.
 *
 * @param options - Handler configuration
 * @returns A `(req, res)` function suitable for Node's `http.createServer`
 * @throws UnregisteredActionError when a route's action has no handler
 *
 * @example
 * const store = createRouteStore(await loadRouteFile('conf/routes', { prefix: '/app' }));
 * http.createServer(createRouteHandler({ routes: store, registry })).listen(8080);
 */
export function createRouteHandler(
  options: RouteHandlerOptions,
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const { routes, registry, notFound } = options;
  const logger = options.logger ?? console;

  assertActionsRegistered(isRouteStore(routes) ? routes.current() : routes, registry);

  return async (req: IncomingMessage, res: ServerResponse) => {
    const request = adaptRequest(req);

    try {
      const result = await dispatch(request, { routes, registry });

      if (!result.found) {
        const { miss } = result;
        logger.debug(`[routeconf] no route found for method[${miss.method}] and path[${miss.path}]`);
        if (notFound) {
          notFound(req, res, miss);
        } else {
          res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
          res.end('Not Found');
        }
        return;
      }

      const { status, headers, body } = result.response;
      res.writeHead(status, headers);
      res.end(body);
    } catch (err) {
      logger.error(`[routeconf] error handling ${request.method} ${request.path}:`, err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
      }
      res.end('Internal Server Error');
    }
  };
}
