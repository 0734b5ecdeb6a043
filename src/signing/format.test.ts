import { describe, it, expect } from 'vitest';
import { formatAmzDate, formatDateStamp } from './format.js';
import { ClockSourceError } from '../errors/index.js';

describe('date formatting', () => {
  const date = new Date(Date.UTC(2015, 7, 30, 12, 36, 0));

  it('should format the amz date in UTC', () => {
    expect(formatAmzDate(date)).toBe('20150830T123600Z');
  });

  it('should format the date stamp in UTC', () => {
    expect(formatDateStamp(date)).toBe('20150830');
  });

  it('should use the UTC day near midnight', () => {
    const lateUtc = new Date('2021-01-31T23:59:59.999Z');
    expect(formatAmzDate(lateUtc)).toBe('20210131T235959Z');
    expect(formatDateStamp(lateUtc)).toBe('20210131');
  });

  it('should reject invalid dates', () => {
    expect(() => formatAmzDate(new Date('not a date'))).toThrow(ClockSourceError);
  });
});
