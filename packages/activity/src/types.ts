/**
 * Activity record types
 */

/** Server lifecycle action */
export type ActivityAction = 'start' | 'stop';

/**
 * Normalized activity record extracted from one log line.
 *
 * Carries the pseudonym only; the raw username never leaves the extractor.
 */
export interface ActivityRecord {
  /** Full-resolution event instant (UTC, millisecond precision) */
  timestampTrue: Date;
  /** timestampTrue truncated to the start of its hour; the bucketing key */
  timestampHour: Date;
  /** Hex HMAC digest of the raw username under the run key */
  userPseudonym: string;
  action: ActivityAction;
  /** Hub / cluster release the event occurred on */
  hub: string;
  /** Spawn duration for starts, empty string for stops */
  spawnTime: string;
}

/**
 * Published record shape, one per output line.
 * Property order is the order written to the file.
 */
export interface OutputRecord {
  timestamp: string;
  user: string;
  action: ActivityAction;
  hub: string;
  spawn_time: string;
}

/**
 * Which timestamp is written to output.
 * - full: the full-resolution instant (matches historical output)
 * - hour: the hour-truncated instant used for bucketing
 */
export type TimestampResolution = 'full' | 'hour';

/**
 * Outcome of closing an hour bucket
 */
export type BucketDecision =
  | {
      kind: 'emitted';
      hour: Date;
      records: ActivityRecord[];
    }
  | {
      kind: 'suppressed';
      hour: Date;
      count: number;
      threshold: number;
      shortfall: number;
    };

/**
 * Counters for one processing run. Never contains key material or usernames.
 */
export interface RunSummary {
  linesRead: number;
  candidateLines: number;
  recordsEmitted: number;
  recordsSuppressed: number;
  hoursEmitted: number;
  hoursSuppressed: number;
  minEntriesPerHour: number;
  timestampResolution: TimestampResolution;
}
