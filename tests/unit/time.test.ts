import { describe, it, expect } from 'vitest';
/**
 * Unit tests for time helpers
 */

import {
  DurationParseError,
  deltaFromSeconds,
  formatTimestamp,
  humanizeDelta,
  parseDuration,
  parseTimestamp,
  timeSince,
  untilExpiration,
} from '../../src/utils/time';

const t0 = new Date(Date.UTC(2024, 2, 1, 12, 0, 0));

describe('humanizeDelta', () => {
  it('joins the last two units with "and"', () => {
    expect(humanizeDelta({ days: 2, hours: 2 }, 'seconds', 2)).toBe('2 days and 2 hours');
    expect(humanizeDelta({ hours: 1, minutes: 30, seconds: 5 })).toBe('1 hour, 30 minutes and 5 seconds');
  });

  it('stops at the precision unit', () => {
    expect(humanizeDelta({ days: 2, hours: 2 }, 'days', 2)).toBe('2 days');
  });

  it('describes an empty delta relative to the precision', () => {
    expect(humanizeDelta({})).toBe('less than a second');
    expect(humanizeDelta({ seconds: 20 }, 'minutes')).toBe('less than a minute');
  });

  it('rejects a non-positive unit count', () => {
    expect(() => humanizeDelta({ days: 1 }, 'seconds', 0)).toThrow(RangeError);
  });
});

describe('deltaFromSeconds', () => {
  it('breaks seconds into days, hours, minutes and seconds', () => {
    expect(deltaFromSeconds(90061)).toEqual({ days: 1, hours: 1, minutes: 1, seconds: 1 });
  });
});

describe('timeSince and untilExpiration', () => {
  it('describes elapsed time with two units', () => {
    const past = new Date(t0.getTime() - (3 * 3600 + 5 * 60 + 9) * 1000);
    expect(timeSince(past, t0)).toBe('3 hours and 5 minutes ago');
  });

  it('returns null without a future expiry', () => {
    expect(untilExpiration(null, t0)).toBeNull();
    expect(untilExpiration(new Date(t0.getTime() - 1000), t0)).toBeNull();
  });

  it('describes the remaining time', () => {
    expect(untilExpiration(new Date(t0.getTime() + 90_000), t0)).toBe('1 minute and 30 seconds');
  });
});

describe('parseDuration', () => {
  it('parses units in descending order', () => {
    expect(parseDuration('1d12h', t0)).toBe(129600);
    expect(parseDuration('30m', t0)).toBe(1800);
    expect(parseDuration('2w', t0)).toBe(1209600);
    expect(parseDuration('1h 30m', t0)).toBe(5400);
    expect(parseDuration('5min', t0)).toBe(300);
    expect(parseDuration('90s', t0)).toBe(90);
  });

  it('follows the calendar for months and years', () => {
    const midJanuary = new Date(Date.UTC(2024, 0, 15));
    expect(parseDuration('1mo', midJanuary)).toBe(31 * 86400);
    expect(parseDuration('1y', t0)).toBe(365 * 86400);
  });

  it.each(['', 'abc', '0s', '1h1d', '10 parsecs', '999999y'])('rejects %j', (input) => {
    expect(() => parseDuration(input, t0)).toThrow(DurationParseError);
  });

  it('names the input in the error message', () => {
    expect(() => parseDuration('soon', t0)).toThrow('"soon" is not a valid duration string.');
  });
});

describe('timestamps', () => {
  it('formats in UTC with the fixed format', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02 03:04:05');
  });

  it('parses what it formats', () => {
    expect(parseTimestamp('2024-01-02 03:04:05').getTime()).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
  });

  it('supports other token layouts', () => {
    const date = new Date(Date.UTC(2023, 11, 31, 23, 59, 58));
    expect(formatTimestamp(date, 'DD/MM/YYYY HH.mm.ss')).toBe('31/12/2023 23.59.58');
    expect(parseTimestamp('31/12/2023 23.59.58', 'DD/MM/YYYY HH.mm.ss').getTime()).toBe(date.getTime());
  });

  it('rejects text that does not follow the format', () => {
    expect(() => parseTimestamp('2024-01-02T03:04:05Z')).toThrow(
      'Timestamp "2024-01-02T03:04:05Z" does not match format "YYYY-MM-DD HH:mm:ss"'
    );
  });
});
