import { describe, expect, it } from 'vitest';
import { INVALID_TIMESTAMP, formatDiscordTimestamp, formatDuration } from './timestamp.js';

const EPOCH = '1700000000'; // 2023-11-14 22:13:20 UTC, a Tuesday
const NOW = new Date(1_700_000_000_000);

function fmt(code: string | undefined, now = NOW): string {
  return formatDiscordTimestamp(EPOCH, code, now, 'UTC');
}

describe('formatDiscordTimestamp', () => {
  it('formats the fixed styles', () => {
    expect(fmt('t')).toBe('22:13 UTC');
    expect(fmt('T')).toBe('22:13:20 UTC');
    expect(fmt('d')).toBe('2023/11/14 UTC');
    expect(fmt('D')).toBe('November 14, 2023 UTC');
    expect(fmt('f')).toBe('November 14, 2023 at 22:13 UTC');
    expect(fmt('F')).toBe('Tuesday, November 14, 2023 at 22:13 UTC');
  });

  it('names US zones by abbreviation and other zones by GMT offset', () => {
    expect(formatDiscordTimestamp(EPOCH, 't', NOW, 'America/New_York')).toBe('17:13 EST');
    expect(formatDiscordTimestamp(EPOCH, 't', NOW, 'Europe/Berlin')).toBe('23:13 GMT+1');
  });

  it('defaults to the short date/time style', () => {
    expect(fmt(undefined)).toBe('November 14, 2023 at 22:13 UTC');
  });

  it('formats relative times in both directions', () => {
    expect(fmt('R', new Date(1_700_003_725_000))).toBe('1h2m5s ago');
    expect(fmt('R', new Date(1_699_999_955_000))).toBe('in 45s');
  });

  it('returns the placeholder for bad input', () => {
    expect(formatDiscordTimestamp('soon', 'f', NOW, 'UTC')).toBe(INVALID_TIMESTAMP);
    expect(fmt('x')).toBe(INVALID_TIMESTAMP);
    expect(formatDiscordTimestamp('99999999999999999', 'f', NOW, 'UTC')).toBe(INVALID_TIMESTAMP);
  });
});

describe('formatDuration', () => {
  it('drops leading zero units', () => {
    expect(formatDuration(45_000)).toBe('45s');
    expect(formatDuration(120_000)).toBe('2m0s');
    expect(formatDuration(3_600_000)).toBe('1h0m0s');
    expect(formatDuration(-61_500)).toBe('1m1s');
  });
});
