/**
 * Log timestamp parsing and hour truncation.
 *
 * Log timestamps carry no zone and are read as UTC.
 */

import { ActivityErrorCodes, ActivityLogError } from './errors.js';

const MS_PER_HOUR = 3_600_000;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
// Fraction may carry up to nanoseconds; digits past milliseconds are dropped
const TIME_PATTERN = /^(\d{2}):(\d{2}):(\d{2})(?:[.,](\d{1,9}))?$/;

/**
 * Parse the date and time tokens of a log line into one instant.
 *
 * @param date - `YYYY-MM-DD`
 * @param time - `HH:MM:SS` with an optional `.fraction`
 * @throws ActivityLogError (E_BAD_TIMESTAMP)
 */
export function parseLogTimestamp(date: string, time: string): Date {
  const dateMatch = DATE_PATTERN.exec(date);
  const timeMatch = TIME_PATTERN.exec(time);

  if (!dateMatch || !timeMatch) {
    throw badTimestamp(date, time);
  }

  const year = Number(dateMatch[1]);
  const month = Number(dateMatch[2]);
  const day = Number(dateMatch[3]);
  const hours = Number(timeMatch[1]);
  const minutes = Number(timeMatch[2]);
  const seconds = Number(timeMatch[3]);
  const millis = Number((timeMatch[4] ?? '').padEnd(3, '0').slice(0, 3));

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw badTimestamp(date, time);
  }

  const instant = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));

  // Date.UTC rolls 2018-02-30 over into March; reject instead
  if (
    instant.getUTCFullYear() !== year ||
    instant.getUTCMonth() !== month - 1 ||
    instant.getUTCDate() !== day
  ) {
    throw badTimestamp(date, time);
  }

  return instant;
}

/**
 * Zero the minutes, seconds and milliseconds of an instant (UTC).
 */
export function truncateToHour(instant: Date): Date {
  return new Date(Math.floor(instant.getTime() / MS_PER_HOUR) * MS_PER_HOUR);
}

function badTimestamp(date: string, time: string): ActivityLogError {
  return new ActivityLogError(
    ActivityErrorCodes.BAD_TIMESTAMP,
    `Unparseable log timestamp "${date} ${time}"`,
    { date, time }
  );
}
