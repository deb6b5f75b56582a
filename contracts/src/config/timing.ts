// config/timing.ts - Centralized Timing Constants

// =============================================================================
// DURATION PARSING
// =============================================================================

/** "<number><unit>" with unit ms|s|m|h|d; a bare "0" is zero. */
export function parseDuration(value: string): number {
  if (value.trim() === '0') return 0;
  const match = value.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) throw new Error(`Invalid duration: ${value}`);
  const [, num, unit] = match;
  const n = parseFloat(num ?? '');
  switch ((unit ?? '').toLowerCase()) {
    case 'ms':
      return n;
    case 's':
      return n * 1000;
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    case 'd':
      return n * 86_400_000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

function getEnvDuration(key: string, defaultMs: number): number {
  const value = process.env[key];
  return value ? parseDuration(value) : defaultMs;
}

// =============================================================================
// BASE TIMING CONSTANTS
// =============================================================================

export const TIMING = {
  // POLLING -- Constraint: poll_interval < create_deadline
  POLL_INTERVAL_MS: getEnvDuration('RIFT_POLL_INTERVAL', 5_000), // 5s
  // Provisioning normally takes 2-6m; the ceiling only catches a stuck rent
  CREATE_DEADLINE_MS: getEnvDuration('RIFT_CREATE_DEADLINE', 1_680_000), // 28m
  // 0 disables the delete deadline
  DELETE_DEADLINE_MS: getEnvDuration('RIFT_DELETE_DEADLINE', 0),

  // TRANSPORT -- Constraint: request_timeout < create_deadline
  REQUEST_TIMEOUT_MS: getEnvDuration('RIFT_REQUEST_TIMEOUT', 10_000), // 10s
  RETRY_BASE_DELAY_MS: getEnvDuration('RIFT_RETRY_BASE_DELAY', 1_000), // 1s
  RETRY_COUNT: parseInt(process.env.RIFT_RETRY_COUNT || '4', 10),
} as const;

export type TimingConfig = typeof TIMING;

// =============================================================================
// CONSTRAINT VALIDATION
// =============================================================================

export function validateTimingConstraints(timing: TimingConfig = TIMING): void {
  const errors: string[] = [];

  if (timing.POLL_INTERVAL_MS <= 0) {
    errors.push('Polling: poll_interval must be > 0');
  }
  if (timing.POLL_INTERVAL_MS >= timing.CREATE_DEADLINE_MS) {
    errors.push('Polling: poll_interval must be < create_deadline');
  }
  if (timing.DELETE_DEADLINE_MS !== 0 && timing.DELETE_DEADLINE_MS <= timing.POLL_INTERVAL_MS) {
    errors.push('Polling: delete_deadline must be 0 or > poll_interval');
  }
  if (timing.REQUEST_TIMEOUT_MS >= timing.CREATE_DEADLINE_MS) {
    errors.push('Transport: request_timeout must be < create_deadline');
  }
  if (!Number.isInteger(timing.RETRY_COUNT) || timing.RETRY_COUNT < 0) {
    errors.push('Transport: retry_count must be a non-negative integer');
  }

  if (errors.length > 0) {
    throw new Error(`Timing constraint violations:\n${errors.join('\n')}`);
  }
}

// Validate at module load -- fail fast
validateTimingConstraints();

// =============================================================================
// HELPERS
// =============================================================================

/** Exponential backoff: base, 2x base, 4x base, ... (attempt is 0-based) */
export function calculateBackoff(attempt: number, baseMs: number = TIMING.RETRY_BASE_DELAY_MS): number {
  return baseMs * Math.pow(2, attempt);
}

/** Format milliseconds to human-readable string */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${ms / 1000}s`;
  if (ms < 3_600_000) return `${ms / 60_000}m`;
  if (ms < 86_400_000) return `${ms / 3_600_000}h`;
  return `${ms / 86_400_000}d`;
}
