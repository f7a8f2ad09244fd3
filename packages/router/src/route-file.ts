// ============================================================================
// @routeconf/router: Route file reading
// ============================================================================

import { readFile } from 'node:fs/promises';
import { RouteFileParseError } from './errors.js';
import { loadRoutes } from './loader.js';
import type { LoadOptions } from './loader.js';
import type { RouteTable } from './types.js';

/**
 * Reads a route file and loads it with `loadRoutes`.
 *
 * @param file - Path to the route file (UTF-8)
 * @param options - As for `loadRoutes`; `filename` defaults to `file`
 * @throws RouteFileParseError with code 'unreadable-source' when the file
 *   cannot be read, or any load error from its contents
 */
export async function loadRouteFile(file: string, options: LoadOptions = {}): Promise<RouteTable> {
  const filename = options.filename ?? file;

  let source: string;
  try {
    source = await readFile(file, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RouteFileParseError(
      'unreadable-source',
      `Cannot read route file (${reason})`,
      filename,
      0,
      { cause: err },
    );
  }

  return loadRoutes(source, { ...options, filename });
}
