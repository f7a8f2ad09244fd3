// ============================================================================
// @routeconf/server: node:http request adapter
// ============================================================================

import type { IncomingMessage } from 'node:http';
import type { RouteRequest } from './types.js';

/** Header that lets a POST stand in for PUT, DELETE, etc. */
export const METHOD_OVERRIDE_HEADER = 'x-http-method-override';

/** Start of the query string or fragment in a request target. */
const QUERY_START_RE = /[?#]/;

/**
 * Adapts a Node.js request for routing.
 *
 * A POST carrying `X-HTTP-Method-Override` is routed as the method it names,
 * for clients that can only send GET and POST.
 */
export function adaptRequest(req: IncomingMessage): RouteRequest {
  const url = req.url ?? '/';
  const queryAt = url.search(QUERY_START_RE);
  const path = queryAt === -1 ? url : url.slice(0, queryAt);

  let search = '';
  if (queryAt !== -1 && url[queryAt] === '?') {
    const fragmentAt = url.indexOf('#', queryAt);
    search = fragmentAt === -1 ? url.slice(queryAt + 1) : url.slice(queryAt + 1, fragmentAt);
  }

  let method = (req.method ?? 'GET').toUpperCase();
  const override = req.headers[METHOD_OVERRIDE_HEADER];
  if (method === 'POST' && typeof override === 'string' && override.trim() !== '') {
    method = override.trim().toUpperCase();
  }

  return {
    method,
    path: path === '' ? '/' : path,
    url,
    query: new URLSearchParams(search),
    headers: req.headers,
    format: null,
  };
}
