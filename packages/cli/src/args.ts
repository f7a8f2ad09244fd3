// ---------------------------------------------------------------------------
// @routeconf/cli: Argument parsing
// ---------------------------------------------------------------------------

export interface ParsedArgs {
  command: string | undefined;
  /** Servlet prefix from `--prefix`. */
  prefix: string;
  /** Non-flag arguments after the command. */
  rest: string[];
}

/** Flags that stand in for a command. */
const STANDALONE_FLAGS: readonly string[] = ['-h', '--help', '-v', '--version'];

function pickCommand(first: string | undefined): string | undefined {
  if (!first) {
    return undefined;
  }
  if (STANDALONE_FLAGS.includes(first)) {
    return first;
  }
  return first.startsWith('-') ? undefined : first;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const command = pickCommand(args[0]);
  const flagArgs = command === undefined ? args : args.slice(1);

  let prefix = '';
  const rest: string[] = [];

  for (let i = 0; i < flagArgs.length; i++) {
    const arg = flagArgs[i];
    if ((arg === '--prefix' || arg === '-p') && flagArgs[i + 1] !== undefined) {
      prefix = flagArgs[++i];
    } else if (arg.startsWith('--prefix=')) {
      prefix = arg.slice('--prefix='.length);
    } else {
      rest.push(arg);
    }
  }

  return { command, prefix, rest };
}
