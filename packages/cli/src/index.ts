/**
 * @hubanon/cli - command-line front end for the activity anonymizer
 */

export {
  AnonymizeCommand,
  AnonymizeOptionsSchema,
  LOG_LEVELS,
  type AnonymizeOptions,
  type RawAnonymizeOptions,
} from './commands/anonymize.js';
export { createProgram, CLI_VERSION, type ProgramIO } from './program.js';
export { formatOutput, createExitHandler, handleError, timing } from './utils.js';
export type { AnonymizeResult, CommandResult } from './types.js';
