import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ActivityErrorCodes, ActivityLogError } from '../src/errors.js';
import { parseLogTimestamp, truncateToHour } from '../src/time.js';

describe('log timestamps', () => {
  describe('parseLogTimestamp', () => {
    it('should parse date and time as UTC', () => {
      expect(parseLogTimestamp('2018-01-21', '21:09:10').toISOString()).toBe('2018-01-21T21:09:10.000Z');
    });

    it('should keep milliseconds', () => {
      expect(parseLogTimestamp('2018-01-21', '21:09:10.123').toISOString()).toBe('2018-01-21T21:09:10.123Z');
    });

    it('should pad short fractions and drop sub-millisecond digits', () => {
      expect(parseLogTimestamp('2018-01-21', '21:09:10.5').toISOString()).toBe('2018-01-21T21:09:10.500Z');
      expect(parseLogTimestamp('2018-01-21', '21:09:10.987654').toISOString()).toBe(
        '2018-01-21T21:09:10.987Z'
      );
    });

    it('should accept a comma decimal separator', () => {
      expect(parseLogTimestamp('2018-01-21', '21:09:10,250').toISOString()).toBe('2018-01-21T21:09:10.250Z');
    });

    it.each([
      ['2018-1-21', '21:09:10'],
      ['2018-01-21', '21:09'],
      ['2018-02-30', '10:00:00'],
      ['2018-13-01', '10:00:00'],
      ['2018-01-21', '24:00:00'],
      ['2018-01-21', '10:60:00'],
      ['JupyterHub', 'log:158]'],
    ])('should reject %s %s', (date, time) => {
      let error: unknown;
      try {
        parseLogTimestamp(date, time);
      } catch (e) {
        error = e;
      }
      if (!(error instanceof ActivityLogError)) throw new Error('expected ActivityLogError');
      expect(error.code).toBe(ActivityErrorCodes.BAD_TIMESTAMP);
      expect(error.message).toBe(`Unparseable log timestamp "${date} ${time}"`);
      expect(error.details).toEqual({ date, time });
    });
  });

  describe('truncateToHour', () => {
    it('should zero minutes, seconds and milliseconds', () => {
      const truncated = truncateToHour(new Date('2018-01-21T21:59:59.999Z'));
      expect(truncated.toISOString()).toBe('2018-01-21T21:00:00.000Z');
    });

    it('should leave whole hours unchanged', () => {
      expect(truncateToHour(new Date('2018-01-21T09:00:00.000Z')).toISOString()).toBe(
        '2018-01-21T09:00:00.000Z'
      );
    });

    // whole hours since the epoch plus a sub-hour remainder, both within 32-bit ranges
    const instant = fc.record({
      hours: fc.integer({ min: 0, max: 1_100_000 }),
      remainder: fc.integer({ min: 0, max: 3_599_999 }),
    });

    it('should subtract exactly the sub-hour remainder (property)', () => {
      fc.assert(
        fc.property(instant, ({ hours, remainder }) => {
          const truncated = truncateToHour(new Date(hours * 3_600_000 + remainder));
          expect(truncated.getTime()).toBe(hours * 3_600_000);
          expect(truncated.getUTCMinutes()).toBe(0);
          expect(truncated.getUTCSeconds()).toBe(0);
          expect(truncated.getUTCMilliseconds()).toBe(0);
        })
      );
    });

    it('should be idempotent (property)', () => {
      fc.assert(
        fc.property(instant, ({ hours, remainder }) => {
          const once = truncateToHour(new Date(hours * 3_600_000 + remainder));
          expect(truncateToHour(once).getTime()).toBe(once.getTime());
        })
      );
    });
  });
});
