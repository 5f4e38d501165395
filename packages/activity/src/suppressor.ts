/**
 * Bucketed suppressor
 *
 * Groups time-ordered activity records into hour buckets and releases a
 * bucket only when it holds at least `minEntriesPerHour` records. Buckets are
 * all-or-nothing: either every record of the hour is emitted, in arrival
 * order, or none is.
 *
 * Only one bucket is open at a time. It closes when a record of a later hour
 * arrives or when the input ends (finish()).
 */

import { DEFAULT_K_THRESHOLD, assertValidThreshold, checkKAnonymity } from '@hubanon/privacy';
import { ActivityErrorCodes, ActivityLogError } from './errors.js';
import type { ActivityRecord, BucketDecision } from './types.js';

export const DEFAULT_MIN_ENTRIES_PER_HOUR = DEFAULT_K_THRESHOLD;

export interface SuppressorOptions {
  /** Minimum records an hour needs to be released (default: 5) */
  minEntriesPerHour?: number;
}

type SuppressorState =
  | { kind: 'idle' }
  | { kind: 'open'; hour: Date; records: ActivityRecord[] }
  | { kind: 'closed' };

export class HourBucketSuppressor {
  readonly minEntriesPerHour: number;
  private state: SuppressorState = { kind: 'idle' };

  constructor(options: SuppressorOptions = {}) {
    const minEntriesPerHour = options.minEntriesPerHour ?? DEFAULT_MIN_ENTRIES_PER_HOUR;
    try {
      assertValidThreshold(minEntriesPerHour);
    } catch (e) {
      throw new ActivityLogError(
        ActivityErrorCodes.INVALID_CONFIG,
        `minEntriesPerHour must be a positive integer, got ${minEntriesPerHour}`,
        { minEntriesPerHour },
        { cause: e }
      );
    }
    this.minEntriesPerHour = minEntriesPerHour;
  }

  /** Hour of the currently open bucket, if any */
  get openHour(): Date | undefined {
    return this.state.kind === 'open' ? this.state.hour : undefined;
  }

  /**
   * Add a record.
   *
   * @returns The decision for the bucket this record closed, or null
   * @throws ActivityLogError (E_OUT_OF_ORDER) when the record's hour precedes the open bucket
   */
  push(record: ActivityRecord): BucketDecision | null {
    const state = this.state;

    switch (state.kind) {
      case 'closed':
        throw new Error('HourBucketSuppressor is closed');

      case 'idle':
        this.open(record);
        return null;

      case 'open': {
        const openTime = state.hour.getTime();
        const recordTime = record.timestampHour.getTime();

        if (recordTime === openTime) {
          state.records.push(record);
          return null;
        }

        if (recordTime < openTime) {
          throw new ActivityLogError(
            ActivityErrorCodes.OUT_OF_ORDER,
            `Record for hour ${record.timestampHour.toISOString()} arrived after hour ${state.hour.toISOString()}`,
            {
              openHour: state.hour.toISOString(),
              recordHour: record.timestampHour.toISOString(),
            }
          );
        }

        const decision = this.decide(state.hour, state.records);
        this.open(record);
        return decision;
      }
    }
  }

  /**
   * Close the open bucket at end of input. Further calls throw.
   *
   * @returns The decision for the last bucket, or null when no record was seen
   */
  finish(): BucketDecision | null {
    const state = this.state;
    if (state.kind === 'closed') {
      throw new Error('HourBucketSuppressor is closed');
    }

    this.state = { kind: 'closed' };
    return state.kind === 'open' ? this.decide(state.hour, state.records) : null;
  }

  private open(record: ActivityRecord): void {
    this.state = { kind: 'open', hour: record.timestampHour, records: [record] };
  }

  private decide(hour: Date, records: ActivityRecord[]): BucketDecision {
    const check = checkKAnonymity(records.length, { kThreshold: this.minEntriesPerHour });

    if (check.meetsThreshold) {
      return { kind: 'emitted', hour, records };
    }

    return {
      kind: 'suppressed',
      hour,
      count: check.groupSize,
      threshold: check.kThreshold,
      shortfall: check.shortfall,
    };
  }
}
