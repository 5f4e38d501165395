/**
 * hub-anonymize command tree
 */

import { Command } from 'commander';
import type { Logger } from '@hubanon/activity';
import { AnonymizeCommand } from './commands/anonymize.js';
import { createExitHandler, formatOutput } from './utils.js';

export const CLI_VERSION = '0.1.0';

export interface ProgramIO {
  /** Receives formatted command output (default: console.log) */
  print?: (text: string) => void;
  /** Receives the exit code (default: sets process.exitCode) */
  exit?: (code: number) => void;
  /** Logger override, mainly for tests */
  logger?: Logger;
}

export function createProgram(io: ProgramIO = {}): Command {
  const print = io.print ?? ((text: string) => console.log(text));
  const exit = io.exit ?? createExitHandler();

  const program = new Command();

  program
    .name('hub-anonymize')
    .description('Publish JupyterHub server activity with pseudonymous users and k-anonymous hour buckets')
    .version(CLI_VERSION);

  // hub-anonymize anonymize <input> <output>
  program
    .command('anonymize <input> <output>')
    .description('Extract, pseudonymize and suppress sparse hours from a newline-delimited JSON log')
    .option('-k, --min-entries-per-hour <n>', 'minimum records an hour needs to be published', '5')
    .option('--truncate-timestamps', 'write hour-truncated instead of full-resolution timestamps')
    .option('-j, --json', 'print the run summary as JSON')
    .option('--log-level <level>', 'diagnostic log level (fatal, error, warn, info, debug, trace, silent)')
    .action(async (input: string, output: string, options: Record<string, unknown>) => {
      const command = new AnonymizeCommand(io.logger);
      const json = options.json === true;

      const result = await command.execute(input, output, {
        minEntriesPerHour: options.minEntriesPerHour,
        truncateTimestamps: options.truncateTimestamps === true,
        json,
        logLevel: options.logLevel,
      });

      print(formatOutput(result, json));
      exit(result.success ? 0 : 1);
    });

  return program;
}
