import { loadConnectionConfig } from '../shared/config.js';
import { debug } from '../shared/debug.js';
import type { ConnectionConfigInput } from '../shared/types.js';
import { handleInspectCommand } from './inspect.js';
import { handleRunCommand } from './run.js';
import type { CommandResult } from './types.js';

export const USAGE = 'Usage: taxograph <run|inspect>';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Output sinks for the CLI. Results go to `out`, errors and usage to `err`.
 */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const COMMANDS = new Map<string, (config: ConnectionConfigInput) => CommandResult>([
  ['run', handleRunCommand],
  ['inspect', handleInspectCommand],
]);

/**
 * Dispatches a command line and returns the process exit code.
 */
export function runCli(args: readonly string[], io: CliIo): number {
  const [name, ...rest] = args;
  const command = name === undefined ? undefined : COMMANDS.get(name);

  if (command === undefined || rest.length > 0) {
    debug('cli', 'Rejected command line', { args: [...args] });
    io.err(USAGE);
    return EXIT_USAGE;
  }

  const config = loadConnectionConfig();
  if (!config.ok) {
    io.err(`${config.error.kind}: ${config.error.message}`);
    return EXIT_FAILURE;
  }

  const result = command(config.value);
  if (!result.success) {
    io.err(result.message);
    return EXIT_FAILURE;
  }

  io.out(result.message);
  return EXIT_OK;
}
