/**
 * Command-line options for the headless runner
 */

export interface RunOptions {
  config: string | null;
  overrides: string | null;
  save: boolean;
  dbPath: string;
  label: string;
  sweep: string | null;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `
Farm Year Simulation Runner

Usage: npm run simulate -- --config <file> [options]

Options:
  --config, -c <file>       Scenario JSON file (required)
  --overrides <file>        Overrides file applied over the scenario
  --save                    Record the run in the SQLite database
  --db <path>               Database path (default: farm-year.db)
  --label <text>            Label stored with a saved run
  --sweep <p>:<from>:<to>[:<step>]
                            Sweep fermentation, preserving, drying or vessels
  --verbose, -v             Print every simulated day
  --help, -h                Show this help

Examples:
  npm run simulate -- --config config/example-scenario.json
  npm run simulate -- -c config/example-scenario.json --sweep fermentation:20:60:10
  npm run simulate -- -c config/example-scenario.json --overrides config/example-overrides.json --save
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseArgs(args: readonly string[]): RunOptions {
  const options: RunOptions = {
    config: null,
    overrides: null,
    save: false,
    dbPath: 'farm-year.db',
    label: '',
    sweep: null,
    verbose: false,
    help: false,
  };

  const valueAfter = (i: number, flag: string): string => {
    const next = args[i + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new CliUsageError(`${flag} needs a value`);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--config':
      case '-c':
        options.config = valueAfter(i, arg);
        i++;
        break;
      case '--overrides':
        options.overrides = valueAfter(i, arg);
        i++;
        break;
      case '--save':
        options.save = true;
        break;
      case '--db':
        options.dbPath = valueAfter(i, arg);
        i++;
        break;
      case '--label':
        options.label = valueAfter(i, arg);
        i++;
        break;
      case '--sweep':
        options.sweep = valueAfter(i, arg);
        i++;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        // A bare path is taken as the scenario file
        if (!arg.startsWith('-') && options.config === null) {
          options.config = arg;
          break;
        }
        throw new CliUsageError(`Unknown option ${arg}`);
    }
  }

  if (!options.help && options.config === null) {
    throw new CliUsageError('--config is required');
  }
  return options;
}
