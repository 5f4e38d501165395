/**
 * CLI utilities and formatting
 */

import chalk from 'chalk';
import { isActivityLogError } from '@hubanon/activity';
import type { AnonymizeResult, CommandResult } from './types.js';

export function formatOutput(result: CommandResult<AnonymizeResult>, json = false): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success || !result.data) {
    const code = result.code ? ` (${result.code})` : '';
    return chalk.red(`Error${code}: ${result.error ?? 'Unknown error'}`);
  }

  return formatAnonymizeResult(result.data);
}

function formatAnonymizeResult(data: AnonymizeResult): string {
  const { summary } = data;
  const lines = [
    `Input: ${data.input}`,
    `Output: ${chalk.blue(data.output)}`,
    `Lines read: ${summary.linesRead} (${summary.candidateLines} activity lines)`,
    `Emitted: ${chalk.green(`${summary.recordsEmitted} records in ${summary.hoursEmitted} hours`)}`,
    `Suppressed: ${chalk.yellow(`${summary.recordsSuppressed} records in ${summary.hoursSuppressed} hours`)} ` +
      `(threshold ${summary.minEntriesPerHour} per hour)`,
    `Timestamps: ${summary.timestampResolution === 'hour' ? 'truncated to the hour' : 'full resolution'}`,
  ];

  return lines.join('\n');
}

export function createExitHandler() {
  return (code: number) => {
    process.exitCode = code;
  };
}

export function handleError(error: unknown): CommandResult<never> {
  if (isActivityLogError(error)) {
    return { success: false, error: error.message, code: error.code };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}

export function timing() {
  const started = Date.now();
  return {
    started,
    end: () => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}
