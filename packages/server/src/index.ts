// ============================================================================
// @routeconf/server: Public API
// ============================================================================

export { adaptRequest, METHOD_OVERRIDE_HEADER } from './request.js';
export { resolveFormat, contentTypeFor, FORMAT_CONTENT_TYPES } from './format.js';
export {
  createActionRegistry,
  assertActionsRegistered,
  UnregisteredActionError,
} from './registry.js';
export type { ActionRegistry } from './registry.js';
export { dispatch, toResponse } from './dispatch.js';
export type { DispatchOptions } from './dispatch.js';
export { createRouteHandler } from './handler.js';
export type { RouteHandlerOptions } from './handler.js';

export type {
  RouteRequest,
  ActionContext,
  ActionResponse,
  ActionResult,
  ActionHandler,
  DispatchResponse,
  DispatchResult,
} from './types.js';
