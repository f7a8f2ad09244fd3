// ============================================================================
// @routeconf/server: Response format resolution
// ============================================================================

import type { RouteMatch } from '@routeconf/router';
import type { RouteRequest } from './types.js';

/** Content types for the formats `resolveFormat` can produce from `Accept`. */
export const FORMAT_CONTENT_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  json: 'application/json; charset=utf-8',
  xml: 'application/xml; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
};

/**
 * Decides the response format for a matched request.
 *
 * A `format` path parameter or static argument wins. Otherwise the `Accept`
 * header is checked for html, then xml, then plain text, then json; anything
 * else is html.
 */
export function resolveFormat(request: RouteRequest, match: RouteMatch): string {
  const declared = match.params.format ?? match.route.action.staticArgs.format;
  if (declared) {
    return declared;
  }
  const accept = request.headers.accept;
  if (!accept) {
    return 'html';
  }
  if (accept.includes('application/xhtml') || accept.includes('text/html') || accept.startsWith('*/*')) {
    return 'html';
  }
  if (accept.includes('application/xml') || accept.includes('text/xml')) {
    return 'xml';
  }
  if (accept.includes('text/plain')) {
    return 'txt';
  }
  if (accept.includes('application/json') || accept.includes('text/javascript')) {
    return 'json';
  }
  return 'html';
}

/** Content type for a format, falling back to plain text. */
export function contentTypeFor(format: string): string {
  return FORMAT_CONTENT_TYPES[format] ?? FORMAT_CONTENT_TYPES.txt;
}
