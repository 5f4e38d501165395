/**
 * hub-anonymize anonymize <input> <output>
 *
 * Runs the anonymization pipeline over one log file under a freshly
 * generated run key. The key is discarded when the command returns.
 */

import { z } from 'zod';
import {
  DEFAULT_MIN_ENTRIES_PER_HOUR,
  anonymizeFile,
  createLogger,
  type Logger,
} from '@hubanon/activity';
import { createRunKey } from '@hubanon/privacy';
import type { AnonymizeResult, CommandResult } from '../types.js';
import { handleError, timing } from '../utils.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const AnonymizeOptionsSchema = z.object({
  minEntriesPerHour: z.coerce.number().int().positive().default(DEFAULT_MIN_ENTRIES_PER_HOUR),
  truncateTimestamps: z.boolean().default(false),
  json: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type AnonymizeOptions = z.output<typeof AnonymizeOptionsSchema>;

/** Unvalidated option values as they arrive from the command line */
export type RawAnonymizeOptions = { [K in keyof AnonymizeOptions]?: unknown };

export class AnonymizeCommand {
  constructor(private readonly logger?: Logger) {}

  async execute(
    inputPath: string,
    outputPath: string,
    options: RawAnonymizeOptions = {}
  ): Promise<CommandResult<AnonymizeResult>> {
    const timer = timing();

    const parsed = AnonymizeOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return {
        success: false,
        error: `Invalid option ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid value'}`,
        code: 'E_INVALID_CONFIG',
        timing: timer.end(),
      };
    }

    const logger = this.logger ?? createLogger({ level: parsed.data.logLevel });

    try {
      const summary = await anonymizeFile(inputPath, outputPath, {
        key: createRunKey(),
        minEntriesPerHour: parsed.data.minEntriesPerHour,
        truncateTimestamps: parsed.data.truncateTimestamps,
        logger,
      });

      return {
        success: true,
        data: { input: inputPath, output: outputPath, summary },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
