/**
 * Anonymization pipeline
 *
 * One forward pass: raw line -> ActivityRecord -> hour bucket -> emit or
 * suppress -> output line. The first fatal error halts the run; lines already
 * written stay written.
 */

import { once } from 'events';
import { open, type FileHandle } from 'fs/promises';
import { createInterface } from 'readline';
import { finished } from 'stream/promises';
import type { Writable } from 'stream';
import type { RunKey } from '@hubanon/privacy';
import { ActivityErrorCodes, ActivityLogError, isActivityLogError } from './errors.js';
import { extractActivity } from './extractor.js';
import { formatOutputLine } from './jsonl.js';
import { createLogger, type Logger } from './logger.js';
import { HourBucketSuppressor } from './suppressor.js';
import type { BucketDecision, RunSummary, TimestampResolution } from './types.js';
import { isActivityCandidate } from './wire-format.js';

export interface AnonymizeOptions {
  /** Secret key of this run */
  key: RunKey;
  /** Minimum records per hour bucket (default: 5) */
  minEntriesPerHour?: number;
  /** Write hour-truncated instead of full-resolution timestamps */
  truncateTimestamps?: boolean;
  /** Diagnostics logger (default: stderr logger) */
  logger?: Logger;
}

/**
 * Receives output lines (without trailing newline) in order.
 */
export interface LineSink {
  write(line: string): void | Promise<void>;
}

/**
 * Anonymize a stream of raw log lines into a sink.
 *
 * @throws ActivityLogError on the first malformed activity line, with its line number
 */
export async function anonymizeLog(
  lines: AsyncIterable<string> | Iterable<string>,
  sink: LineSink,
  options: AnonymizeOptions
): Promise<RunSummary> {
  const logger = options.logger ?? createLogger();
  const suppressor = new HourBucketSuppressor({ minEntriesPerHour: options.minEntriesPerHour });
  const resolution: TimestampResolution = options.truncateTimestamps ? 'hour' : 'full';

  const summary: RunSummary = {
    linesRead: 0,
    candidateLines: 0,
    recordsEmitted: 0,
    recordsSuppressed: 0,
    hoursEmitted: 0,
    hoursSuppressed: 0,
    minEntriesPerHour: suppressor.minEntriesPerHour,
    timestampResolution: resolution,
  };

  if (resolution === 'full') {
    logger.warn(
      { timestampResolution: resolution },
      'Emitting full-resolution timestamps; suppression is decided on hour buckets only'
    );
  }

  const apply = async (decision: BucketDecision | null): Promise<void> => {
    if (!decision) return;

    if (decision.kind === 'suppressed') {
      summary.hoursSuppressed += 1;
      summary.recordsSuppressed += decision.count;
      logger.info(
        {
          hour: decision.hour.toISOString(),
          count: decision.count,
          threshold: decision.threshold,
          shortfall: decision.shortfall,
        },
        `Suppressed hour ${decision.hour.toISOString()}: ${decision.count} records, ` +
          `threshold ${decision.threshold} (short by ${decision.shortfall})`
      );
      return;
    }

    for (const record of decision.records) {
      await sink.write(formatOutputLine(record, resolution));
    }
    summary.hoursEmitted += 1;
    summary.recordsEmitted += decision.records.length;
    logger.debug(
      { hour: decision.hour.toISOString(), count: decision.records.length },
      'Emitted hour bucket'
    );
  };

  try {
    for await (const line of lines) {
      summary.linesRead += 1;
      if (!isActivityCandidate(line)) continue;

      summary.candidateLines += 1;
      try {
        const record = extractActivity(line, options.key);
        if (record) {
          await apply(suppressor.push(record));
        }
      } catch (e) {
        throw isActivityLogError(e) ? e.atLine(summary.linesRead) : e;
      }
    }

    await apply(suppressor.finish());
  } catch (e) {
    if (isActivityLogError(e)) {
      logger.fatal(
        {
          code: e.code,
          lineNumber: e.lineNumber,
          entry: e.details.entry,
          tokens: e.details.tokens,
          details: e.details,
        },
        `Halting run: ${e.message}`
      );
    }
    throw e;
  }

  logger.info({ summary }, 'Anonymization run complete');
  return summary;
}

/**
 * Sink writing newline-terminated lines to a stream, honoring backpressure.
 */
export function createStreamSink(stream: Writable): LineSink {
  return {
    async write(line: string) {
      if (!stream.write(line + '\n')) {
        await once(stream, 'drain');
      }
    },
  };
}

/**
 * Anonymize a newline-delimited JSON log file into an output file.
 *
 * Both files are closed on every exit path. On a fatal error the output
 * written so far is left in place.
 *
 * @throws ActivityLogError (E_INPUT_UNREADABLE, E_OUTPUT_UNWRITABLE) when a path cannot be opened
 */
export async function anonymizeFile(
  inputPath: string,
  outputPath: string,
  options: AnonymizeOptions
): Promise<RunSummary> {
  const inputHandle = await openFile(inputPath, 'r', ActivityErrorCodes.INPUT_UNREADABLE);

  let outputHandle: FileHandle;
  try {
    outputHandle = await openFile(outputPath, 'w', ActivityErrorCodes.OUTPUT_UNWRITABLE);
  } catch (e) {
    await inputHandle.close();
    throw e;
  }

  const input = inputHandle.createReadStream({ encoding: 'utf8' });
  const output = outputHandle.createWriteStream({ encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    return await anonymizeLog(lines, createStreamSink(output), options);
  } finally {
    lines.close();
    input.destroy();
    output.end();
    await finished(output);
  }
}

async function openFile(
  path: string,
  flags: 'r' | 'w',
  code: typeof ActivityErrorCodes.INPUT_UNREADABLE | typeof ActivityErrorCodes.OUTPUT_UNWRITABLE
): Promise<FileHandle> {
  try {
    return await open(path, flags);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ActivityLogError(
      code,
      `Cannot open ${flags === 'r' ? 'input' : 'output'} file: ${reason}`,
      { path },
      { cause: e }
    );
  }
}
