import { parseArgs } from 'node:util';

export interface ExtractCommandArgs {
  name: 'extract';
  folder?: string;
  outputFolder?: string;
  output?: string;
  debug: boolean;
}

export interface SpreadsheetCommandArgs {
  name: 'spreadsheet';
  inputFolder?: string;
  output?: string;
  debug: boolean;
}

export interface HelpCommandArgs {
  name: 'help';
  debug: boolean;
}

export type CliCommandArgs =
  | ExtractCommandArgs
  | SpreadsheetCommandArgs
  | HelpCommandArgs;

export const USAGE = `Usage: ct-dose <command> [options]

Commands:
  extract       Extract dose reports from PDFs into JSON (default)
    --folder <dir>          Folder with the PDF reports
    --output-folder <dir>   Folder for the JSON files
    --output <file>         Aggregate JSON file name
  spreadsheet   Build the dose spreadsheet from exported JSON
    --input-folder <dir>    Folder with the exported JSON
    --output <file>         Spreadsheet path (.xlsx)

Options:
  --debug       Verbose logging
  -h, --help    Show this message`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';

    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

const COMMAND_OPTIONS = {
  extract: ['folder', 'output-folder', 'output', 'debug', 'help'],
  spreadsheet: ['input-folder', 'output', 'debug', 'help'],
} as const;

function parseRawArguments(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        folder: { type: 'string' },
        'output-folder': { type: 'string' },
        'input-folder': { type: 'string' },
        output: { type: 'string' },
        debug: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new CliUsageError(
      error instanceof Error ? error.message : String(error),
    );
  }
}

/**
 * Parses argv (without the node executable and script path).
 * @throws CliUsageError for unknown commands or options
 */
export function parseCliArguments(argv: readonly string[]): CliCommandArgs {
  const { values, positionals } = parseRawArguments(argv);

  const debug = values.debug === true;
  if (values.help === true) {
    return { name: 'help', debug };
  }
  if (positionals.length > 1) {
    throw new CliUsageError(
      `Unexpected argument: ${positionals.slice(1).join(' ')}`,
    );
  }

  const commandName = positionals[0] ?? 'extract';
  if (commandName !== 'extract' && commandName !== 'spreadsheet') {
    throw new CliUsageError(`Unknown command: ${commandName}`);
  }

  const allowed: readonly string[] = COMMAND_OPTIONS[commandName];
  const misplaced = Object.entries(values)
    .filter(([option, value]) => value !== undefined && !allowed.includes(option))
    .map(([option]) => option);
  if (misplaced.length > 0) {
    throw new CliUsageError(
      `Option --${misplaced[0]} is not valid for "${commandName}"`,
    );
  }

  if (commandName === 'extract') {
    return {
      name: 'extract',
      folder: values.folder,
      outputFolder: values['output-folder'],
      output: values.output,
      debug,
    };
  }
  return {
    name: 'spreadsheet',
    inputFolder: values['input-folder'],
    output: values.output,
    debug,
  };
}
