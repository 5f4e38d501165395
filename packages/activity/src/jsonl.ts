/**
 * Output record serialization (JSON Lines)
 *
 * Each emitted record is written as one independent JSON object per line.
 */

import type { ActivityRecord, OutputRecord, TimestampResolution } from './types.js';

/**
 * Map an activity record to its published shape.
 */
export function toOutputRecord(
  record: ActivityRecord,
  resolution: TimestampResolution = 'full'
): OutputRecord {
  const timestamp = resolution === 'hour' ? record.timestampHour : record.timestampTrue;

  return {
    timestamp: timestamp.toISOString(),
    user: record.userPseudonym,
    action: record.action,
    hub: record.hub,
    spawn_time: record.spawnTime,
  };
}

/**
 * Format a record as a single JSONL line (no trailing newline).
 *
 * @example
 * ```typescript
 * formatOutputLine(record);
 * // '{"timestamp":"2018-01-21T21:09:10.123Z","user":"9f2c...","action":"start","hub":"prod","spawn_time":"1.234"}'
 * ```
 */
export function formatOutputLine(
  record: ActivityRecord,
  resolution: TimestampResolution = 'full'
): string {
  return JSON.stringify(toOutputRecord(record, resolution));
}

/**
 * Format multiple records to JSONL, one per line, with a trailing newline
 * when non-empty.
 */
export function formatOutputLines(
  records: ActivityRecord[],
  resolution: TimestampResolution = 'full'
): string {
  if (records.length === 0) {
    return '';
  }
  return records.map((record) => formatOutputLine(record, resolution)).join('\n') + '\n';
}
