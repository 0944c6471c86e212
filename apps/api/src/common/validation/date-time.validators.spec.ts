import { validateSync } from 'class-validator';
import {
  IsCalendarDateTime,
  IsHistoryTimestamp,
  isCalendarDateTime,
  isHistoryTimestamp,
} from './date-time.validators';

class Sample {
  @IsCalendarDateTime()
  at: unknown;

  @IsHistoryTimestamp()
  stamp: unknown;

  constructor(at: unknown, stamp: unknown) {
    this.at = at;
    this.stamp = stamp;
  }
}

describe('isCalendarDateTime', () => {
  it('should accept calendar dates and date-times', () => {
    expect(isCalendarDateTime('2026-03-02T10:00:00.000Z')).toBe(true);
    expect(isCalendarDateTime('2026-03-02T10:00:00+01:00')).toBe(true);
    expect(isCalendarDateTime('2026-03-02')).toBe(true);
  });

  /** TEST: week and ordinal dates are valid ISO 8601 but not usable instants here */
  it('should reject week and ordinal dates', () => {
    expect(isCalendarDateTime('2026-W10')).toBe(false);
    expect(isCalendarDateTime('2026-W10-1')).toBe(false);
    expect(isCalendarDateTime('2026-060')).toBe(false);
  });

  it('should reject impossible days and non-strings', () => {
    expect(isCalendarDateTime('2026-02-30T10:00:00Z')).toBe(false);
    expect(isCalendarDateTime('yesterday')).toBe(false);
    expect(isCalendarDateTime(1772445300000)).toBe(false);
    expect(isCalendarDateTime(undefined)).toBe(false);
  });
});

describe('isHistoryTimestamp', () => {
  it('should accept finite epoch milliseconds', () => {
    expect(isHistoryTimestamp(1772445300000)).toBe(true);
    expect(isHistoryTimestamp(0)).toBe(true);
  });

  it('should reject numeric strings, objects and non-finite numbers', () => {
    expect(isHistoryTimestamp('1772445300000')).toBe(false);
    expect(isHistoryTimestamp({ a: 1 })).toBe(false);
    expect(isHistoryTimestamp(Number.NaN)).toBe(false);
    expect(isHistoryTimestamp(Number.POSITIVE_INFINITY)).toBe(false);
  });
});

describe('date-time decorators', () => {
  it('should pass a valid instance', () => {
    expect(validateSync(new Sample('2026-03-02T10:00:00.000Z', 1772445300000))).toEqual([]);
  });

  it('should report both properties with their messages', () => {
    const errors = validateSync(new Sample('2026-060', '1772445300000'));

    expect(errors.map((e) => e.constraints)).toEqual([
      { isCalendarDateTime: 'at must be an ISO 8601 calendar date or date-time' },
      { isHistoryTimestamp: 'stamp must be an ISO 8601 calendar date-time or epoch milliseconds' },
    ]);
  });
});
