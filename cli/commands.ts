/**
 * Commands behind the `mana` CLI
 *
 * Usage:
 *   mana parse '{U}{5}{U/B}'        canonical form, in source order
 *   mana sort '{U}{C}{5}'           canonical form, sorted
 *   mana value '{5}{U}{U/B}'        mana value
 *   mana describe '{R/G/P}'         one line per symbol
 *
 * Options: --json, --sort (parse only), --verbose, --help
 * Exit codes: 0 success, 1 invalid mana cost, 2 usage error
 */

import {
  describeManaSymbol,
  formatDiagnostic,
  manaValue,
  parseManaCost,
  render,
  renderManaSymbol,
  sortManaCost,
  type ManaCost
} from '../src';
import { debug, debugError, setDebugLevel } from '../src/utils/debug';
import { config as defaultConfig, type ManaCliConfig, type OutputFormat } from './config';

export type CommandName = 'parse' | 'sort' | 'value' | 'describe';

const COMMANDS: readonly CommandName[] = ['parse', 'sort', 'value', 'describe'];

export interface CliIO {
  log(line: string): void;
  error(line: string): void;
}

const consoleIO: CliIO = {
  log: line => console.log(line),
  error: line => console.error(line)
};

interface CLIOptions {
  command?: CommandName;
  input: string[];
  format?: OutputFormat;
  sort?: boolean;
  verbose?: boolean;
  help?: boolean;
}

export const USAGE = `Usage: mana <parse|sort|value|describe> [--json] [--sort] [--verbose] <cost>`;

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

function parseArgs(args: readonly string[]): CLIOptions | string {
  const options: CLIOptions = { input: [] };

  for (const arg of args) {
    switch (arg) {
      case '--json':
        options.format = 'json';
        break;
      case '--sort':
        options.sort = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          return `Unknown option: ${arg}`;
        }
        if (options.command === undefined) {
          if (!isCommandName(arg)) {
            return `Unknown command: ${arg}`;
          }
          options.command = arg;
        } else {
          options.input.push(arg);
        }
    }
  }

  return options;
}

function costOutput(command: CommandName, cost: ManaCost, format: OutputFormat): string[] {
  if (format === 'json') {
    const payload = {
      cost: render(cost),
      manaValue: manaValue(cost),
      symbols: cost.map(symbol => ({
        ...symbol,
        text: renderManaSymbol(symbol),
        description: describeManaSymbol(symbol)
      }))
    };
    return [JSON.stringify(payload)];
  }

  switch (command) {
    case 'parse':
    case 'sort':
      return [render(cost)];
    case 'value':
      return [String(manaValue(cost))];
    case 'describe':
      return cost.map(symbol => `${renderManaSymbol(symbol)}\t${describeManaSymbol(symbol)}`);
    default: {
      const unhandled: never = command;
      return unhandled;
    }
  }
}

/**
 * Run one CLI invocation and return its exit code
 */
export function runManaCli(
  args: readonly string[],
  io: CliIO = consoleIO,
  config: ManaCliConfig = defaultConfig
): number {
  const options = parseArgs(args);

  if (typeof options === 'string') {
    io.error(options);
    io.error(USAGE);
    return 2;
  }

  if (options.help) {
    io.log(USAGE);
    return 0;
  }

  if (options.command === undefined) {
    io.error(USAGE);
    return 2;
  }

  setDebugLevel(options.verbose ? 2 : config.debugLevel);

  const command = options.command;
  const input = options.input.join(' ');
  debug(1, `[cli] ${command} '${input}'`);

  const result = parseManaCost(input);
  if (!result.ok) {
    debugError(1, `[cli] ${result.error.name}: ${result.error.message}`);
    io.error(formatDiagnostic(input, result.error));
    return 1;
  }

  const shouldSort = command === 'sort' || (command === 'parse' && (options.sort ?? config.sortOutput));
  const cost = shouldSort ? sortManaCost(result.cost) : result.cost;

  for (const line of costOutput(command, cost, options.format ?? config.outputFormat)) {
    io.log(line);
  }
  return 0;
}
