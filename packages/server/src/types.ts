// ============================================================================
// @routeconf/server: Type definitions
// ============================================================================

import type { IncomingHttpHeaders } from 'node:http';
import type { CompiledRoute, RouteMatch, RouteMiss } from '@routeconf/router';

/**
 * An inbound request reduced to what routing and actions need.
 */
export interface RouteRequest {
  /** Upper-cased method, after any method override. */
  method: string;

  /** Path without query string. */
  path: string;

  /** The request target as received, e.g. '/page/x?lang=en'. */
  url: string;

  query: URLSearchParams;

  headers: IncomingHttpHeaders;

  /** Response format ('html', 'json', ...), set once a route has matched. */
  format: string | null;
}

/**
 * Everything an action receives.
 */
export interface ActionContext {
  request: RouteRequest;
  route: CompiledRoute;

  /** Decoded path parameters. */
  params: Record<string, string>;

  /** Static arguments declared on the route line. */
  args: Readonly<Record<string, string>>;

  format: string;
}

/**
 * A response described by an action. A non-string `body` is sent as JSON.
 */
export interface ActionResponse {
  status?: number;
  headers?: Record<string, string>;
  body?: unknown;
}

/**
 * What an action may return: a response, a string body, or nothing (204).
 */
export type ActionResult = ActionResponse | string | undefined;

export type ActionHandler = (context: ActionContext) => ActionResult | Promise<ActionResult>;

/**
 * An action result normalized for writing to the wire.
 */
export interface DispatchResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type DispatchResult =
  | { found: true; match: RouteMatch; response: DispatchResponse }
  | { found: false; miss: RouteMiss };
