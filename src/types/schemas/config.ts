/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml. Keys are snake_case as on disk;
 * the loader maps the validated result onto component options.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { EVICTION, ESTIMATES, HEALTH, METRICS, SCHEDULER } from '../../config/defaults.js';
import { PRIORITY_TIERS } from '../devices.js';

const bytes = (label: string) => z.number().int().positive(`${label} must be a positive byte count`);

/**
 * One GPU
 */
export const DeviceConfigSchema = z.object({
  id: z.number().int().min(0, 'must be >= 0'),
  name: z.string().min(1, 'Device name cannot be empty'),
  total_vram_bytes: bytes('total_vram_bytes'),
  nvlink_peers: z.array(z.number().int().min(0)).default([]),
});

const DeviceIdList = z.array(z.number().int().min(0));

/**
 * Admission, queueing and job retention
 */
export const SchedulerConfigSchema = z
  .object({
    max_admission_attempts: z.number().int().min(1, 'must be >= 1').default(SCHEDULER.MAX_ADMISSION_ATTEMPTS),
    max_skips_per_tier: z.number().int().min(1, 'must be >= 1').default(SCHEDULER.MAX_SKIPS_PER_TIER),
    max_queue_wait_ms: z.number().int().positive('must be positive').default(SCHEDULER.MAX_QUEUE_WAIT_MS),
    timeout_sweep_interval_ms: z
      .number()
      .int()
      .positive('must be positive')
      .default(SCHEDULER.TIMEOUT_SWEEP_INTERVAL_MS),
    job_retention_ms: z.number().int().min(0, 'must be >= 0').default(SCHEDULER.JOB_RETENTION_MS),
    /** Optional bound per tier; absent tiers are unbounded */
    tier_capacity: z.record(z.enum(PRIORITY_TIERS), z.number().int().positive()).default({}),
    /** Preferred devices per job kind, tried before the rest */
    kind_affinity: z
      .object({
        image: DeviceIdList.optional(),
        video: DeviceIdList.optional(),
        speech: DeviceIdList.optional(),
      })
      .default({}),
  })
  .default({});

/**
 * A model made resident at startup
 */
export const ResidentModelConfigSchema = z.object({
  device_id: z.number().int().min(0),
  name: z.string().min(1, 'Model name cannot be empty'),
  vram_bytes: bytes('vram_bytes'),
});

export const EvictionConfigSchema = z
  .object({
    /** Never evicted */
    baseline_models: z.array(ResidentModelConfigSchema).default([]),
    /** Evictable under pressure */
    resident_models: z.array(ResidentModelConfigSchema).default([]),
    idle_model_ttl_ms: z.number().int().min(0).default(EVICTION.IDLE_MODEL_TTL_MS),
    rebalance_enabled: z.boolean().default(true),
    rebalance_threshold: z.number().min(0).max(10).default(EVICTION.REBALANCE_THRESHOLD),
    rebalance_interval_ms: z.number().int().positive().default(EVICTION.REBALANCE_INTERVAL_MS),
  })
  .default({});

export const HealthConfigSchema = z
  .object({
    interval_ms: z.number().int().positive().default(HEALTH.INTERVAL_MS),
    max_temperature_c: z.number().positive().default(HEALTH.MAX_TEMPERATURE_C),
    max_errors: z.number().int().min(0).default(HEALTH.MAX_ERRORS),
    error_window_ms: z.number().int().positive().default(HEALTH.ERROR_WINDOW_MS),
    recovery_sweeps: z.number().int().min(1, 'must be >= 1').default(HEALTH.RECOVERY_SWEEPS),
    utilization_warn_pct: z.number().min(0).max(100).default(HEALTH.UTILIZATION_WARN_PCT),
    memory_warn_pct: z.number().min(0).max(100).default(HEALTH.MEMORY_WARN_PCT),
  })
  .default({});

export const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    interval_ms: z.number().int().positive().default(METRICS.INTERVAL_MS),
  })
  .default({});

export const EstimatesConfigSchema = z
  .object({
    image_bytes: bytes('image_bytes').default(ESTIMATES.IMAGE_BYTES),
    video_bytes: bytes('video_bytes').default(ESTIMATES.VIDEO_BYTES),
    speech_bytes: bytes('speech_bytes').default(ESTIMATES.SPEECH_BYTES),
  })
  .default({});

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  })
  .default({});

/**
 * Complete runtime configuration
 */
export const RuntimeConfigSchema = z
  .object({
    devices: z.array(DeviceConfigSchema).min(1, 'At least one device is required'),
    scheduler: SchedulerConfigSchema,
    eviction: EvictionConfigSchema,
    health: HealthConfigSchema,
    metrics: MetricsConfigSchema,
    estimates: EstimatesConfigSchema,
    logging: LoggingConfigSchema,
  })
  .superRefine((config, ctx) => {
    const ids = new Set<number>();
    config.devices.forEach((device, index) => {
      if (ids.has(device.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate device id ${device.id}`,
          path: ['devices', index, 'id'],
        });
      }
      ids.add(device.id);
    });

    const models = [...config.eviction.baseline_models, ...config.eviction.resident_models];
    models.forEach((model) => {
      if (!ids.has(model.device_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Model ${model.name} references unknown device ${model.device_id}`,
          path: ['eviction'],
        });
      }
    });
  });

export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;
export type ResidentModelConfig = z.infer<typeof ResidentModelConfigSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
