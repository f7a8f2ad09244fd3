#!/usr/bin/env node
// ---------------------------------------------------------------------------
// @routeconf/cli: CLI for route files
// ---------------------------------------------------------------------------
// Provides `routeconf check`, `routeconf routes`, `routeconf match` and
// `routeconf reverse`.
// ---------------------------------------------------------------------------

import { parseArgs } from './args.js';
import { runCli } from './commands.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(parseArgs(process.argv));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
