// ============================================================================
// @routeconf/router: Shadowed route detection
// ============================================================================
//
// First match wins, so a route declared after a more general one for the
// same method can never be selected:
//
//   GET /page/{id}    Pages.show
//   GET /page/home    Pages.home     ← shadowed by line 1
//
// Detection is conservative: it only reports a route when every request it
// could match is provably matched by one earlier route.
// ============================================================================

import type { CompiledRoute, PathSegment, RouteMethod, RouteWarning } from './types.js';

/**
 * Finds routes that an earlier route always wins against.
 *
 * @param routes - Routes in declaration order
 * @returns One warning per shadowed route, naming the first route that shadows it
 */
export function findShadowedRoutes(routes: readonly CompiledRoute[]): RouteWarning[] {
  const warnings: RouteWarning[] = [];

  for (let i = 1; i < routes.length; i++) {
    const route = routes[i];
    for (let j = 0; j < i; j++) {
      const earlier = routes[j];
      if (covers(earlier, route)) {
        warnings.push({
          kind: 'shadowed',
          route,
          by: earlier,
          message:
            `Route '${route.method} ${route.path}' (line ${route.line}) can never match: ` +
            `'${earlier.method} ${earlier.path}' (line ${earlier.line}) is declared first`,
        });
        break;
      }
    }
  }

  return warnings;
}

/**
 * Whether every request matched by `later` is matched by `earlier`.
 */
function covers(earlier: CompiledRoute, later: CompiledRoute): boolean {
  if (!methodCovers(earlier.method, later.method)) {
    return false;
  }
  if (earlier.segments.length !== later.segments.length) {
    return false;
  }
  return earlier.segments.every((segment, i) => segmentCovers(segment, later.segments[i]));
}

function methodCovers(earlier: RouteMethod, later: RouteMethod): boolean {
  if (earlier === '*' || earlier === later) {
    return true;
  }
  // HEAD requests fall back to GET routes.
  return earlier === 'GET' && later === 'HEAD';
}

function segmentCovers(earlier: PathSegment, later: PathSegment): boolean {
  if (earlier.kind === 'static') {
    return later.kind === 'static' && later.literal === earlier.literal;
  }

  if (later.kind === 'static') {
    return earlier.constraint.test(later.literal);
  }

  if (earlier.pattern === null) {
    // The default constraint accepts every segment except the empty one.
    return !later.constraint.test('');
  }

  return later.pattern === earlier.pattern;
}
