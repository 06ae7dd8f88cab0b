/**
 * Command line argument parsing for the lutgrid CLI.
 */

export const SUBCOMMANDS = ['show', 'new', 'plot', 'plane', 'lookup', 'nudge', 'diff'] as const;

export type Subcommand = (typeof SUBCOMMANDS)[number];

export interface CLIArgs {
  help: boolean;
  verbose: boolean;
  /** Explicit settings file given with --config */
  configPath?: string;
  subcommand?: Subcommand;
  /** Positional arguments after the subcommand */
  positional: string[];
  /** --format for `plot` */
  format?: string;
  /** --range for `lookup` and `nudge` */
  range?: string;
}

/**
 * Thrown for arguments the CLI cannot make sense of. main() prints the
 * message and exits with status 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isSubcommand(value: string): value is Subcommand {
  return SUBCOMMANDS.some(command => command === value);
}

// Negative numbers are positional values, not options
function isNumeric(arg: string): boolean {
  return arg.trim() !== '' && Number.isFinite(Number(arg));
}

export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    help: false,
    verbose: false,
    positional: [],
  };

  const takeValue = (i: number, option: string): string => {
    if (i >= args.length) {
      throw new UsageError(`${option} requires a value`);
    }
    return args[i];
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--verbose':
      case '-v':
        result.verbose = true;
        break;
      case '--config':
        i++;
        result.configPath = takeValue(i, arg);
        break;
      case '--format':
      case '-f':
        i++;
        result.format = takeValue(i, arg);
        break;
      case '--range':
      case '-r':
        i++;
        result.range = takeValue(i, arg);
        break;
      default:
        if (arg.startsWith('-') && !isNumeric(arg)) {
          throw new UsageError(`Unknown option: ${arg}`);
        } else if (result.subcommand === undefined) {
          if (!isSubcommand(arg)) {
            throw new UsageError(`Unknown command: ${arg}`);
          }
          result.subcommand = arg;
        } else {
          result.positional.push(arg);
        }
    }
    i++;
  }

  return result;
}
