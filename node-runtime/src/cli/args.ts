export interface CliArgs {
  command?: string;
  file?: string;
  dryRun: boolean;
  logDir?: string;
  out?: string;
  wait?: string;
  /** Flags this parser does not know, as given. */
  unknown: string[];
}

const VALUE_FLAGS = ['log-dir', 'out', 'wait'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(key: string): key is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === key);
}

/** `<command> [file] [--dry-run] [--log-dir <dir>] [--out <file>] [--wait <sec>]` */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { dryRun: false, unknown: [] };
  const positional: string[] = [];
  let index = 0;

  while (index < argv.length) {
    const token = argv[index];
    if (!token.startsWith('--')) {
      positional.push(token);
      index += 1;
      continue;
    }

    const key = token.slice(2);
    if (key === 'dry-run') {
      args.dryRun = true;
      index += 1;
      continue;
    }

    if (isValueFlag(key)) {
      const value = argv[index + 1];
      if (value !== undefined && !value.startsWith('--')) {
        if (key === 'log-dir') args.logDir = value;
        else if (key === 'out') args.out = value;
        else args.wait = value;
        index += 2;
        continue;
      }
    }

    args.unknown.push(token);
    index += 1;
  }

  [args.command, args.file] = positional;
  return args;
}
