/**
 * Event extractor / pseudonymizer
 *
 * Turns one raw log line into a normalized ActivityRecord, replacing the raw
 * username with its pseudonym under the run key.
 */

import { pseudonymize, type RunKey } from '@hubanon/privacy';
import { ActivityLogError } from './errors.js';
import { parseLogTimestamp, truncateToHour } from './time.js';
import type { ActivityRecord } from './types.js';
import {
  HUB_LABEL,
  isActivityCandidate,
  parseRawLine,
  readPayloadFields,
  tokenizePayload,
} from './wire-format.js';

/**
 * Extract an activity record from a raw log line.
 *
 * @param line - One line of the source log
 * @param key - Secret key of the current run
 * @returns The record, or null when the line is not an activity line
 * @throws ActivityLogError when a candidate line cannot be fully extracted
 */
export function extractActivity(line: string, key: RunKey): ActivityRecord | null {
  if (!isActivityCandidate(line)) {
    return null;
  }

  const entry = parseRawLine(line);
  const tokens = tokenizePayload(entry.textPayload);
  const fields = readPayloadFields(tokens, entry);

  let timestampTrue: Date;
  try {
    timestampTrue = parseLogTimestamp(fields.date, fields.time);
  } catch (e) {
    if (e instanceof ActivityLogError) {
      throw new ActivityLogError(e.code, e.message, { ...e.details, entry, tokens }, { cause: e });
    }
    throw e;
  }

  return {
    timestampTrue,
    timestampHour: truncateToHour(timestampTrue),
    userPseudonym: pseudonymize(fields.username, key),
    action: fields.action,
    hub: entry.labels[HUB_LABEL],
    spawnTime: fields.spawnTime,
  };
}
