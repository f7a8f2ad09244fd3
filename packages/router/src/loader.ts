// ============================================================================
// @routeconf/router: Route loader
// ============================================================================
//
// Route file syntax, one route per line:
//
//   # comment
//   GET     /home                            PageController.showPage(id:'home')
//   GET     /page/{id}                       PageController.showPage
//   POST    /customer/{<[0-9]+>customerid}   CustomerController.createCustomer
//   *       /status                          StatusController.show
//
// Loading is all-or-nothing: the first bad line aborts the whole load.
// ============================================================================

import { parseAction } from './action.js';
import { RouteActionError, RouteFileParseError, RoutePatternError } from './errors.js';
import type { RouteLoadErrorCode } from './errors.js';
import { findShadowedRoutes } from './lint.js';
import { compilePath, findParamEnd, normalizePrefix } from './pattern.js';
import type { CompiledPath } from './pattern.js';
import { HTTP_METHODS } from './types.js';
import type { CompiledRoute, RouteMethod, RouterLogger, RouteTable } from './types.js';

/** Byte order mark at the start of a source. */
export const BOM_RE = /^\uFEFF/;

/** Line separators (LF or CRLF). */
export const LINE_BREAK_RE = /\r?\n/;

/** Comment marker at the start of a trimmed line. */
export const COMMENT_MARKER = '#';

const WHITESPACE_RE = /\s/;

export interface LoadOptions {
  /** Servlet prefix prepended to every path template. Defaults to ''. */
  prefix?: string;

  /** Source name used in error messages and `RouteTable.source`. Defaults to 'routes'. */
  filename?: string;

  /** Receives shadowed-route warnings. Defaults to `console`; `null` silences them. */
  logger?: Pick<RouterLogger, 'warn'> | null;
}

/**
 * Parses a route source into an immutable route table.
 *
 * @param source - Full text of the route file
 * @param options - Prefix, source name and logger
 * @returns The route table, in declaration order
 * @throws RouteFileParseError on the first line that fails to parse
 *
 * @example
 * const table = loadRoutes('GET /page/{id} Pages.show', { prefix: '/app' });
 * table.routes[0].path; // '/app/page/{id}'
 */
export function loadRoutes(source: string, options: LoadOptions = {}): RouteTable {
  const filename = options.filename ?? 'routes';
  const prefix = normalizePrefix(options.prefix ?? '');
  const logger = options.logger === undefined ? console : options.logger;

  const lines = source.replace(BOM_RE, '').split(LINE_BREAK_RE);
  const routes: CompiledRoute[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '' || line.startsWith(COMMENT_MARKER)) {
      continue;
    }
    routes.push(compileLine(line, i + 1, routes.length, prefix, filename));
  }

  const warnings = findShadowedRoutes(routes);
  if (logger) {
    for (const warning of warnings) {
      logger.warn(`[routeconf] ${filename}: ${warning.message}`);
    }
  }

  return Object.freeze({
    prefix,
    source: filename,
    routes: Object.freeze(routes),
    warnings: Object.freeze(warnings),
  });
}

/**
 * Resolves a METHOD column (case-insensitive) to a route method.
 *
 * @returns The upper-cased method, or null for an unknown verb
 */
export function parseMethod(token: string): RouteMethod | null {
  const upper = token.trim().toUpperCase();
  if (upper === '*') {
    return '*';
  }
  return HTTP_METHODS.find((method) => method === upper) ?? null;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function compileLine(
  line: string,
  lineNumber: number,
  declarationOrder: number,
  prefix: string,
  filename: string,
): CompiledRoute {
  const fail = (code: RouteLoadErrorCode, message: string, cause?: unknown): RouteFileParseError =>
    new RouteFileParseError(
      code,
      message,
      filename,
      lineNumber,
      cause === undefined ? undefined : { cause },
    );

  const methodEnd = line.search(WHITESPACE_RE);
  if (methodEnd === -1) {
    throw fail('malformed-line', `Expected 'METHOD PATH ACTION', got '${line}'`);
  }

  const methodToken = line.slice(0, methodEnd);
  const method = parseMethod(methodToken);
  if (method === null) {
    throw fail('unknown-method', `Unknown HTTP method '${methodToken}'`);
  }

  const rest = line.slice(methodEnd).trimStart();
  const pathEnd = findPathEnd(rest);
  if (pathEnd === -1) {
    throw fail('unbalanced-braces', `Unclosed parameter brace in '${rest}'`);
  }

  const template = rest.slice(0, pathEnd);
  const actionText = rest.slice(pathEnd).trim();
  if (actionText === '') {
    throw fail('malformed-line', `Missing action after path '${template}'`);
  }

  let compiled: CompiledPath;
  try {
    compiled = compilePath(template, prefix);
  } catch (err) {
    if (err instanceof RoutePatternError) {
      throw fail(err.code, err.message, err);
    }
    throw err;
  }

  let action: CompiledRoute['action'];
  try {
    action = parseAction(actionText);
  } catch (err) {
    if (err instanceof RouteActionError) {
      throw fail('malformed-action', err.message, err);
    }
    throw err;
  }

  return Object.freeze({
    method,
    template,
    path: compiled.path,
    segments: compiled.segments,
    params: compiled.params,
    action,
    declarationOrder,
    line: lineNumber,
    match: compiled.match,
  });
}

/**
 * Index of the first whitespace outside parameter braces, so constraints such
 * as `{<[a-z ]+>name}` or `{<[^} ]+>name}` stay inside the path column.
 * Returns -1 when a brace is never closed.
 */
function findPathEnd(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '{') {
      i = findParamEnd(text, i);
      if (i === -1) {
        return -1;
      }
    } else if (WHITESPACE_RE.test(ch)) {
      return i;
    }
  }
  return text.length;
}
