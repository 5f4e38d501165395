/**
 * JupyterHub activity log wire format
 *
 * Source lines are JSON log entries whose `textPayload` is a free-text
 * JupyterHub message, e.g.
 *
 *   [I 2018-01-21 21:09:10.123 JupyterHub log:158] User alice took 1.234 seconds to start
 *
 * Fields are read by position after splitting on whitespace. The layout is
 * unversioned upstream, so all positional knowledge lives in this module.
 */

import { z } from 'zod';
import { ActivityErrorCodes, ActivityLogError } from './errors.js';
import type { ActivityAction } from './types.js';

/** Version of the positional layout understood by this module */
export const LOG_FORMAT_VERSION = 1;

/** Substring present in every spawn/stop duration message */
export const ACTIVITY_MARKER = 'seconds to';

/** Label carrying the hub / cluster release */
export const HUB_LABEL = 'k8s-pod/release';

export const TOKEN_INDEX = {
  DATE: 1,
  TIME: 2,
  USERNAME: 6,
  SPAWN_TIME: 8,
} as const;

/** Tokens needed by every activity line (indices 0..USERNAME) */
export const MIN_TOKENS = TOKEN_INDEX.USERNAME + 1;

/** Tokens needed by a start line (indices 0..SPAWN_TIME) */
export const MIN_START_TOKENS = TOKEN_INDEX.SPAWN_TIME + 1;

export const RawLogLineSchema = z
  .object({
    textPayload: z.string(),
    labels: z.object({ [HUB_LABEL]: z.string() }).passthrough(),
  })
  .passthrough();

export type RawLogLine = z.infer<typeof RawLogLineSchema>;

/**
 * Fields read from a payload
 */
export interface PayloadFields {
  date: string;
  time: string;
  username: string;
  action: ActivityAction;
  /** Empty for stop actions */
  spawnTime: string;
}

/**
 * Cheap pre-filter: only lines containing the marker are parsed.
 */
export function isActivityCandidate(line: string): boolean {
  return line.includes(ACTIVITY_MARKER);
}

/**
 * Parse and validate one raw JSON log line.
 *
 * @throws ActivityLogError (E_MALFORMED_LINE)
 */
export function parseRawLine(line: string): RawLogLine {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (e) {
    throw new ActivityLogError(
      ActivityErrorCodes.MALFORMED_LINE,
      `Activity line is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      { raw: line },
      { cause: e }
    );
  }

  const result = RawLogLineSchema.safeParse(parsed);
  if (!result.success) {
    throw new ActivityLogError(
      ActivityErrorCodes.MALFORMED_LINE,
      'Activity line lacks textPayload or hub label',
      { entry: parsed, issues: result.error.issues },
      { cause: result.error }
    );
  }

  return result.data;
}

/**
 * Split a payload into whitespace-separated tokens.
 */
export function tokenizePayload(textPayload: string): string[] {
  const trimmed = textPayload.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

/**
 * The action keyword is the last token; anything containing "start" is a start.
 */
export function actionFromToken(token: string): ActivityAction {
  return token.includes('start') ? 'start' : 'stop';
}

/**
 * Read the positional fields of a tokenized payload.
 *
 * @param tokens - Output of tokenizePayload
 * @param entry - Parsed log entry, attached to errors for diagnosis
 * @throws ActivityLogError (E_TOKEN_LAYOUT) when a required token is missing
 */
export function readPayloadFields(tokens: string[], entry: RawLogLine): PayloadFields {
  const layoutError = (required: number) =>
    new ActivityLogError(
      ActivityErrorCodes.TOKEN_LAYOUT,
      `Activity payload has ${tokens.length} tokens, layout v${LOG_FORMAT_VERSION} needs ${required}`,
      { entry, tokens }
    );

  if (tokens.length < MIN_TOKENS) {
    throw layoutError(MIN_TOKENS);
  }

  const action = actionFromToken(tokens[tokens.length - 1] ?? '');
  if (action === 'start' && tokens.length < MIN_START_TOKENS) {
    throw layoutError(MIN_START_TOKENS);
  }

  return {
    date: tokens[TOKEN_INDEX.DATE] ?? '',
    time: tokens[TOKEN_INDEX.TIME] ?? '',
    username: tokens[TOKEN_INDEX.USERNAME] ?? '',
    action,
    spawnTime: action === 'start' ? (tokens[TOKEN_INDEX.SPAWN_TIME] ?? '') : '',
  };
}
