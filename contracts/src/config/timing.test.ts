import { describe, test, expect, afterEach, vi } from 'vitest';
import { TIMING, calculateBackoff, formatDuration, parseDuration, validateTimingConstraints } from './timing';

describe('parseDuration', () => {
  test('units', () => {
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('5s')).toBe(5000);
    expect(parseDuration('28m')).toBe(1_680_000);
    expect(parseDuration('1h')).toBe(3_600_000);
    expect(parseDuration('1.5s')).toBe(1500);
  });

  test('a bare zero needs no unit', () => {
    expect(parseDuration('0')).toBe(0);
  });

  test('rejects garbage', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration: soon');
    expect(() => parseDuration('5')).toThrow('Invalid duration: 5');
  });
});

describe('TIMING from the environment', () => {
  afterEach(() => {
    delete process.env.RIFT_DELETE_DEADLINE;
    vi.resetModules();
  });

  test('RIFT_DELETE_DEADLINE=0 loads and disables the delete deadline', async () => {
    vi.resetModules();
    process.env.RIFT_DELETE_DEADLINE = '0';
    const timing = await import('./timing');
    expect(timing.TIMING.DELETE_DEADLINE_MS).toBe(0);
  });

  test('RIFT_DELETE_DEADLINE takes a duration', async () => {
    vi.resetModules();
    process.env.RIFT_DELETE_DEADLINE = '10m';
    const timing = await import('./timing');
    expect(timing.TIMING.DELETE_DEADLINE_MS).toBe(600_000);
  });
});

describe('calculateBackoff', () => {
  test('doubles from the base', () => {
    expect([0, 1, 2, 3].map((a) => calculateBackoff(a, 1000))).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe('formatDuration', () => {
  test('picks the largest whole-ish unit', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(12_000)).toBe('12s');
    expect(formatDuration(1_680_000)).toBe('28m');
  });
});

describe('validateTimingConstraints', () => {
  test('the loaded constants are consistent', () => {
    expect(() => validateTimingConstraints()).not.toThrow();
  });

  test('reports every violated constraint', () => {
    expect(() =>
      validateTimingConstraints({
        ...TIMING,
        POLL_INTERVAL_MS: 60_000,
        CREATE_DEADLINE_MS: 30_000,
        DELETE_DEADLINE_MS: 1_000,
      }),
    ).toThrow(
      'Timing constraint violations:\n' +
        'Polling: poll_interval must be < create_deadline\n' +
        'Polling: delete_deadline must be 0 or > poll_interval',
    );
  });
});
