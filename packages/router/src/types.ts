// ============================================================================
// @routeconf/router: Route type definitions
// ============================================================================

/** HTTP verbs accepted in a route file. */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** A route's method: a concrete verb, or `*` for any verb. */
export type RouteMethod = HttpMethod | '*';

/**
 * One `/`-delimited token of a compiled path template.
 */
export type PathSegment =
  | {
      kind: 'static';
      /** Text the request segment must equal exactly (case-sensitive). */
      literal: string;
    }
  | {
      kind: 'param';
      name: string;
      /** Anchored single-segment matcher. */
      constraint: RegExp;
      /** Verbatim regex text from `{<regex>name}`, or null for the default. */
      pattern: string | null;
    };

/**
 * Tests split request path segments against a route. Returns the raw captured
 * parameter values in segment order, or null.
 */
export type SegmentMatcher = (parts: readonly string[]) => string[] | null;

/**
 * The target a route resolves to. The matching engine never inspects it.
 */
export interface ActionDescriptor {
  /** Controller identifier, e.g. 'PageController' or 'admin.Users'. */
  readonly target: string;

  /** Method name on the controller, e.g. 'showPage'. */
  readonly methodName: string;

  /** Arguments declared in the route line, e.g. `(id:'home')`. Passed through as strings. */
  readonly staticArgs: Readonly<Record<string, string>>;
}

/**
 * A route line compiled into a matcher. Frozen once built.
 */
export interface CompiledRoute {
  readonly method: RouteMethod;

  /** Path template as declared in the route file. */
  readonly template: string;

  /** Effective template with the servlet prefix applied. */
  readonly path: string;

  readonly segments: readonly PathSegment[];

  /** Parameter names in segment order. */
  readonly params: readonly string[];

  readonly action: ActionDescriptor;

  /** Position among the routes of the table; the only priority key. */
  readonly declarationOrder: number;

  /** 1-based line in the route source. */
  readonly line: number;

  readonly match: SegmentMatcher;
}

/**
 * A load-time lint finding. Findings never change matching behaviour.
 */
export interface RouteWarning {
  kind: 'shadowed';
  /** The route that can never be selected. */
  route: CompiledRoute;
  /** The earlier route that wins every request `route` could match. */
  by: CompiledRoute;
  message: string;
}

/**
 * The ordered, immutable collection of compiled routes built by a load.
 */
export interface RouteTable {
  /** Normalized servlet prefix applied to every template ('' for none). */
  readonly prefix: string;

  /** Name of the source the table was loaded from. */
  readonly source: string;

  readonly routes: readonly CompiledRoute[];

  readonly warnings: readonly RouteWarning[];
}

/**
 * A request resolved to exactly one route.
 */
export interface RouteMatch {
  found: true;

  route: CompiledRoute;

  /** Decoded parameter values keyed by name, in segment order. */
  params: Record<string, string>;

  /** Method as given by the caller. */
  method: string;

  /** Path as given by the caller. */
  path: string;
}

/**
 * No route accepted the request. A normal outcome (usually an HTTP 404).
 */
export interface RouteMiss {
  found: false;
  method: string;
  path: string;
}

export type RouteResolution = RouteMatch | RouteMiss;

/**
 * The subset of `console` the router and its hosts write to.
 */
export type RouterLogger = Pick<Console, 'debug' | 'warn' | 'error'>;
