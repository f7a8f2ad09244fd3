// ============================================================================
// @routeconf/router: Path pattern compiler
// ============================================================================
//
// Play-style path templates:
//
//   /home                          → static 'home'
//   /page/{id}                     → static 'page', param 'id' (default constraint)
//   /customer/{<[0-9]+>customerid} → static 'customer', param 'customerid' /^(?:[0-9]+)$/
//   /archive/{<[0-9]{4}>year}      → braces inside a constraint are allowed
//   /tag/{<[^}]+>tag}              → so are braces inside a character class
//
// A parameter always occupies a whole segment.
// ============================================================================

import { RoutePatternError } from './errors.js';
import type { PathSegment, SegmentMatcher } from './types.js';

// ---------------------------------------------------------------------------
// Regex constants
// ---------------------------------------------------------------------------

/** Default parameter constraint: one or more characters other than '/'. */
export const DEFAULT_CONSTRAINT_RE = /^[^/]+$/;

/** Legal parameter names. */
export const PARAM_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Brace characters, which never belong in a static segment. */
export const BRACE_RE = /[{}]/;

// ---------------------------------------------------------------------------
// compilePath: compile a path template into segments and a matcher
// ---------------------------------------------------------------------------

export interface CompiledPath {
  /** Effective template with the prefix applied. */
  path: string;
  segments: readonly PathSegment[];
  params: readonly string[];
  match: SegmentMatcher;
}

/**
 * Compiles a path template, with an optional servlet prefix, into typed
 * segments and a matcher over split request segments.
 *
 * @param template - Declared template like '/customer/{<[0-9]+>customerid}'
 * @param prefix - Servlet prefix like '/myservlet'
 * @throws RoutePatternError for malformed templates, bad or duplicate
 *   parameter names and invalid constraints
 *
 * @example
 * const { params, match } = compilePath('/page/{id}', '/app');
 * params;                           // ['id']
 * match(['app', 'page', 'home']);   // ['home']
 * match(['page', 'home']);          // null
 */
export function compilePath(template: string, prefix = ''): CompiledPath {
  if (!template.startsWith('/')) {
    throw new RoutePatternError('malformed-path', "Path template must start with '/'", template);
  }

  const normalizedPrefix = normalizePrefix(prefix);
  let path = normalizedPrefix + (template === '/' ? '' : template);
  if (path === '') {
    path = '/';
  }
  if (path.length > 1 && path.endsWith('/')) {
    path = path.slice(0, -1);
  }

  const segments: PathSegment[] = [];
  const params: string[] = [];
  let rest = path.slice(1);

  while (rest.length > 0) {
    let token: string;

    if (rest.startsWith('{')) {
      const end = findParamEnd(rest, 0);
      if (end === -1 || (end + 1 < rest.length && rest[end + 1] !== '/')) {
        throw new RoutePatternError(
          'unbalanced-braces',
          'Unbalanced parameter braces, or a parameter that is not a whole segment',
          template,
        );
      }
      token = rest.slice(0, end + 1);
      const { name, pattern } = splitParamToken(token.slice(1, -1), template);

      checkParamName(name, params, template);
      params.push(name);
      segments.push(
        Object.freeze({
          kind: 'param' as const,
          name,
          constraint: pattern === null ? DEFAULT_CONSTRAINT_RE : compileConstraint(pattern, name, template),
          pattern,
        }),
      );
    } else {
      const slash = rest.indexOf('/');
      token = slash === -1 ? rest : rest.slice(0, slash);
      if (token.length === 0) {
        throw new RoutePatternError('malformed-path', 'Empty path segment', template);
      }
      if (BRACE_RE.test(token)) {
        throw new RoutePatternError(
          'unbalanced-braces',
          `Unbalanced parameter braces in segment '${token}'`,
          template,
        );
      }
      segments.push(Object.freeze({ kind: 'static' as const, literal: token }));
    }

    rest = rest.slice(token.length);
    if (rest.startsWith('/')) {
      rest = rest.slice(1);
      if (rest.length === 0) {
        throw new RoutePatternError('malformed-path', 'Empty path segment', template);
      }
    }
  }

  return {
    path,
    segments: Object.freeze(segments),
    params: Object.freeze(params),
    match: createSegmentMatcher(segments),
  };
}

/**
 * Normalizes a servlet prefix to '' or '/name' (leading slash, no trailing slash).
 */
export function normalizePrefix(prefix: string): string {
  let normalized = prefix.trim();
  while (normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  if (normalized === '') {
    return '';
  }
  return normalized.startsWith('/') ? normalized : '/' + normalized;
}

/**
 * Index of the brace closing the `{` at `start`, or -1 when it is never
 * closed. Nested braces count, while braces inside a `[...]` character class
 * or escaped with a backslash do not.
 *
 * @example
 * findParamEnd('{<[0-9]{4}>year}/x', 0);  // 15
 * findParamEnd('{<[^}]+>name}', 0);       // 12
 */
export function findParamEnd(text: string, start: number): number {
  let depth = 0;
  let inClass = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      i++;
    } else if (inClass) {
      inClass = ch !== ']';
    } else if (ch === '[') {
      inClass = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Splits a normalized request path into segments. '/' yields no segments.
 */
export function splitPath(path: string): string[] {
  return path === '/' ? [] : path.slice(1).split('/');
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function checkParamName(name: string, seen: readonly string[], template: string): void {
  if (name.length === 0) {
    throw new RoutePatternError('empty-param-name', 'Empty parameter name', template);
  }
  if (!PARAM_NAME_RE.test(name)) {
    throw new RoutePatternError('invalid-param-name', `Invalid parameter name '${name}'`, template);
  }
  if (seen.includes(name)) {
    throw new RoutePatternError('duplicate-param', `Duplicate parameter '${name}'`, template);
  }
}

/** `<regex>name` or `name`, the text between a parameter's braces. */
function splitParamToken(inner: string, template: string): { name: string; pattern: string | null } {
  if (!inner.startsWith('<')) {
    return { name: inner, pattern: null };
  }
  // Names never contain '>', so the last one ends the constraint.
  const close = inner.lastIndexOf('>');
  if (close === -1) {
    throw new RoutePatternError('unbalanced-braces', "Constraint is missing its closing '>'", template);
  }
  return { name: inner.slice(close + 1), pattern: inner.slice(1, close) };
}

function compileConstraint(pattern: string, name: string, template: string): RegExp {
  if (pattern.length === 0) {
    throw new RoutePatternError('invalid-constraint', `Empty constraint for parameter '${name}'`, template);
  }
  try {
    // Dynamic regex: the constraint text is taken verbatim from the route file.
    return new RegExp(`^(?:${pattern})$`);
  } catch (err) {
    throw new RoutePatternError(
      'invalid-constraint',
      `Invalid constraint <${pattern}> for parameter '${name}'`,
      template,
      { cause: err },
    );
  }
}

/**
 * Builds the matcher for a fixed segment list: segment count first, then each
 * segment in order, stopping at the first one that fails.
 */
function createSegmentMatcher(segments: readonly PathSegment[]): SegmentMatcher {
  const count = segments.length;

  return (parts) => {
    if (parts.length !== count) {
      return null;
    }

    const values: string[] = [];
    for (let i = 0; i < count; i++) {
      const segment = segments[i];
      const part = parts[i];

      if (segment.kind === 'static') {
        if (part !== segment.literal) {
          return null;
        }
      } else {
        if (!segment.constraint.test(part)) {
          return null;
        }
        values.push(part);
      }
    }
    return values;
  };
}
