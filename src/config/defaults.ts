/**
 * Default Configuration Constants
 *
 * Every tunable of the scheduler and its periodic tasks, centralized. The
 * runtime.yaml schema and the component constructors both fall back to these.
 */

export const MIB = 1024 * 1024;
export const GIB = 1024 * MIB;

/**
 * Admission and queue draining
 */
export const SCHEDULER = {
  /** Retries of a reservation that lost a race against a concurrent commit */
  MAX_ADMISSION_ATTEMPTS: 3,

  /** Unfittable jobs skipped in one tier before a drain pass gives up */
  MAX_SKIPS_PER_TIER: 16,

  /** Longest a job may wait in the queue before it is failed (ms) */
  MAX_QUEUE_WAIT_MS: 600_000, // 10 minutes

  /** Queue-timeout and retention sweep interval (ms) */
  TIMEOUT_SWEEP_INTERVAL_MS: 1_000,

  /** How long terminal jobs remain queryable (ms) */
  JOB_RETENTION_MS: 300_000, // 5 minutes
} as const;

/**
 * Resident model eviction and rebalancing
 */
export const EVICTION = {
  /** A model unused this long is idle for the rebalance pass (ms) */
  IDLE_MODEL_TTL_MS: 300_000,

  /** Fraction above the healthy-device average that triggers rebalancing */
  REBALANCE_THRESHOLD: 0.2,

  REBALANCE_INTERVAL_MS: 60_000,
} as const;

/**
 * Device health sweep
 */
export const HEALTH = {
  INTERVAL_MS: 5_000,
  MAX_TEMPERATURE_C: 85,
  /** Errors tolerated inside the window; one more quarantines the device */
  MAX_ERRORS: 10,
  ERROR_WINDOW_MS: 60_000,
  /** Consecutive good sweeps before an auto-quarantined device recovers */
  RECOVERY_SWEEPS: 3,
  UTILIZATION_WARN_PCT: 95,
  MEMORY_WARN_PCT: 95,
} as const;

export const METRICS = {
  INTERVAL_MS: 2_000,
  /** Queue-wait samples kept per tier */
  WAIT_SAMPLE_WINDOW: 1_000,
} as const;

/**
 * Per-kind VRAM estimates (bytes) at reference resolution
 */
export const ESTIMATES = {
  IMAGE_BYTES: 12_000 * MIB,
  VIDEO_BYTES: 16_000 * MIB,
  SPEECH_BYTES: 8_000 * MIB,
} as const;

export const DEFAULT_LOG_LEVEL = 'info';
