// ---------------------------------------------------------------------------
// @routeconf/cli: Commands
// ---------------------------------------------------------------------------
// `check`, `routes`, `match` and `reverse` against a route file. Each command
// writes through a CliIO and returns the process exit code.
// ---------------------------------------------------------------------------

import { createRequire } from 'node:module';
import { green, red, yellow, bold, dim } from 'kolorist';
import {
  loadRouteFile,
  matchRoute,
  reverseRoute,
  routeKey,
  RouteFileParseError,
} from '@routeconf/router';
import type { ActionDescriptor, CompiledRoute, RouteTable } from '@routeconf/router';
import type { ParsedArgs } from './args.js';

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

const consoleIO: CliIO = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

/** Key/value pairs on the command line, e.g. `id=home`. */
const ARG_PAIR_RE = /^([^=]+)=(.*)$/s;

/** Characters a quoted static argument value must escape. */
const QUOTED_SPECIAL_RE = /[\\']/g;

export async function runCli(args: ParsedArgs, io: CliIO = consoleIO): Promise<number> {
  try {
    switch (args.command) {
      case 'check':
        return await check(args, io);
      case 'routes':
        return await listRoutes(args, io);
      case 'match':
        return await match(args, io);
      case 'reverse':
        return await reverse(args, io);
      case '-v':
      case '--version':
        printVersion(io);
        return 0;
      case '-h':
      case '--help':
      case undefined:
        printHelp(io);
        return 0;
      default:
        io.error(`Unknown command: ${args.command}`);
        printHelp(io);
        return 1;
    }
  } catch (err) {
    if (err instanceof RouteFileParseError) {
      io.error(`${red('error')} ${err.message}`);
      return 1;
    }
    throw err;
  }
}

// ---- Commands ---------------------------------------------------------------

async function check(args: ParsedArgs, io: CliIO): Promise<number> {
  const [file] = args.rest;
  if (!file) {
    return usage(io, 'routeconf check <file>');
  }

  const table = await load(file, args);
  const count = table.routes.length;
  io.log(`${green('✓')} ${count} route${count === 1 ? '' : 's'} loaded from ${file}`);
  for (const warning of table.warnings) {
    io.log(`${yellow('warning')} ${warning.message}`);
  }
  return 0;
}

async function listRoutes(args: ParsedArgs, io: CliIO): Promise<number> {
  const [file] = args.rest;
  if (!file) {
    return usage(io, 'routeconf routes <file>');
  }

  const { routes } = await load(file, args);
  const methodWidth = Math.max(0, ...routes.map((r) => r.method.length));
  const pathWidth = Math.max(0, ...routes.map((r) => r.path.length));
  for (const route of routes) {
    io.log(
      `${route.method.padEnd(methodWidth)}  ${route.path.padEnd(pathWidth)}  ${formatAction(route.action)}`,
    );
  }
  return 0;
}

async function match(args: ParsedArgs, io: CliIO): Promise<number> {
  const [file, method, path] = args.rest;
  if (!file || !method || !path) {
    return usage(io, 'routeconf match <file> <method> <path>');
  }

  const result = matchRoute(await load(file, args), method, path);
  if (!result.found) {
    io.error(`${red('✗')} no route found for method[${method}] and path[${path}]`);
    return 1;
  }

  io.log(`${green('✓')} ${describeRoute(result.route)}`);
  for (const [name, value] of Object.entries(result.params)) {
    io.log(`  ${name} = ${value}`);
  }
  return 0;
}

async function reverse(args: ParsedArgs, io: CliIO): Promise<number> {
  const [file, action, ...pairs] = args.rest;
  if (!file || !action) {
    return usage(io, 'routeconf reverse <file> <Controller.method> [name=value ...]');
  }

  const values: Record<string, string> = {};
  for (const pair of pairs) {
    const m = ARG_PAIR_RE.exec(pair);
    if (!m) {
      io.error(`${red('error')} Expected name=value, got '${pair}'`);
      return 1;
    }
    values[m[1]] = m[2];
  }

  const reversed = reverseRoute(await load(file, args), action, values);
  if (!reversed) {
    io.error(`${red('✗')} no route for ${action} accepts the given arguments`);
    return 1;
  }

  io.log(`${reversed.method} ${reversed.path}`);
  return 0;
}

// ---- Helpers ----------------------------------------------------------------

function load(file: string, args: ParsedArgs): Promise<RouteTable> {
  return loadRouteFile(file, { prefix: args.prefix, logger: null });
}

export function formatAction(action: ActionDescriptor): string {
  const entries = Object.entries(action.staticArgs);
  const base = `${action.target}.${action.methodName}`;
  if (entries.length === 0) {
    return base;
  }
  const list = entries.map(([key, value]) => `${key}:'${value.replace(QUOTED_SPECIAL_RE, '\\$&')}'`);
  return `${base}(${list.join(', ')})`;
}

function describeRoute(route: CompiledRoute): string {
  return `${routeKey(route)} -> ${formatAction(route.action)} ${dim(`(line ${route.line})`)}`;
}

function usage(io: CliIO, synopsis: string): number {
  io.error(`${red('error')} Usage: ${synopsis}`);
  return 1;
}

function printVersion(io: CliIO): void {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../package.json');
  const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : 'unknown';
  io.log(`routeconf v${version}`);
}

function printHelp(io: CliIO): void {
  io.log(`
  ${bold('routeconf')}: route file tools

  Usage:
    routeconf <command> [options]

  Commands:
    check    <file>                          Load a route file and report shadowed routes
    routes   <file>                          List routes in declaration order
    match    <file> <method> <path>          Show the route a request resolves to
    reverse  <file> <action> [name=value]    Build the URL for an action

  Options:
    -p, --prefix <prefix>  Servlet prefix applied to every route
    -h, --help             Show this help
    -v, --version          Show version
`);
}
