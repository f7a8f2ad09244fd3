// ============================================================================
// @routeconf/router: Public API
// ============================================================================

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export { HTTP_METHODS } from './types.js';
export type {
  HttpMethod,
  RouteMethod,
  PathSegment,
  SegmentMatcher,
  ActionDescriptor,
  CompiledRoute,
  RouteWarning,
  RouteTable,
  RouteMatch,
  RouteMiss,
  RouteResolution,
  RouterLogger,
} from './types.js';

export { RoutePatternError, RouteFileParseError, RouteActionError } from './errors.js';
export type { RoutePatternErrorCode, RouteLoadErrorCode } from './errors.js';

// ---------------------------------------------------------------------------
// Loading (startup)
// ---------------------------------------------------------------------------

export { compilePath, normalizePrefix } from './pattern.js';
export type { CompiledPath } from './pattern.js';
export { parseAction, actionKey } from './action.js';
export { loadRoutes, parseMethod } from './loader.js';
export type { LoadOptions } from './loader.js';
export { loadRouteFile } from './route-file.js';
export { findShadowedRoutes } from './lint.js';

// ---------------------------------------------------------------------------
// Matching (per request)
// ---------------------------------------------------------------------------

export { matchRoute, normalizeRequestPath, routeKey } from './matcher.js';
export { reverseRoute } from './reverse.js';
export type { ReversedRoute } from './reverse.js';
export { createRouteStore, isRouteStore } from './store.js';
export type { RouteStore } from './store.js';
