/**
 * Configuration Loader
 *
 * Loads runtime.yaml with environment-specific overrides, expands `${VAR}`
 * references from the process environment and validates the result.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import type { GatewayOptions } from '../api/gateway.js';
import { ConfigurationError } from '../utils/errors.js';

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Arrays and scalars from `source` replace those in
 * `target`.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }
  return output;
}

/**
 * Replace `${NAME}` and `${NAME:-fallback}` with environment values.
 *
 * @throws ConfigurationError for an unset variable without fallback
 */
export function interpolateEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g, (_match, name: string, fallback?: string) => {
    const value = env[name];
    if (value !== undefined && value !== '') {
      return value;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new ConfigurationError(`Environment variable ${name} is not set`);
  });
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }
  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: string): Environment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'} ${issue.message}`)
    .join('\n');
}

/**
 * Validate a raw configuration object
 *
 * @throws ConfigurationError listing every failing field
 */
export function validateConfig(raw: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    throw new ConfigurationError(`Configuration validation failed:\n${formatIssues(parseResult.error)}`);
  }
  return parseResult.data;
}

/**
 * Load, merge and validate configuration from a YAML file
 */
export function loadConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  const finalPath = configPath ?? defaultConfigPath();

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigurationError(`Configuration file not found: ${finalPath}`, cause);
  }

  let document: unknown;
  try {
    document = yaml.load(interpolateEnv(fileContents));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigurationError(`Failed to parse configuration ${finalPath}`, cause);
  }
  if (!isPlainObject(document)) {
    throw new ConfigurationError(`Configuration ${finalPath} must be a YAML mapping`);
  }

  const { environments, ...base } = document;
  let merged: PlainObject = base;
  const env = resolveEnvironment(environment);
  if (isPlainObject(environments)) {
    const overrides = environments[env];
    if (isPlainObject(overrides)) {
      merged = deepMerge(base, overrides);
    }
  }

  return validateConfig(merged);
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

export function initializeConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Map the snake_case configuration onto gateway options
 */
export function toGatewayOptions(config: RuntimeConfig): GatewayOptions {
  const { scheduler, eviction, health, metrics, estimates } = config;
  const toModel = (model: RuntimeConfig['eviction']['resident_models'][number]) => ({
    deviceId: model.device_id,
    name: model.name,
    vramBytes: model.vram_bytes,
  });

  return {
    devices: config.devices.map((device) => ({
      id: device.id,
      name: device.name,
      totalVram: device.total_vram_bytes,
      nvlinkPeers: device.nvlink_peers,
    })),
    scheduler: {
      maxAdmissionAttempts: scheduler.max_admission_attempts,
      maxSkipsPerTier: scheduler.max_skips_per_tier,
      maxQueueWaitMs: scheduler.max_queue_wait_ms,
      timeoutSweepIntervalMs: scheduler.timeout_sweep_interval_ms,
      jobRetentionMs: scheduler.job_retention_ms,
      tierCapacity: scheduler.tier_capacity,
      kindAffinity: scheduler.kind_affinity,
    },
    eviction: {
      baselineModels: eviction.baseline_models.map(toModel),
      residentModels: eviction.resident_models.map(toModel),
      idleModelTtlMs: eviction.idle_model_ttl_ms,
      rebalanceEnabled: eviction.rebalance_enabled,
      rebalanceThreshold: eviction.rebalance_threshold,
      rebalanceIntervalMs: eviction.rebalance_interval_ms,
    },
    health: {
      intervalMs: health.interval_ms,
      maxTemperatureC: health.max_temperature_c,
      maxErrors: health.max_errors,
      errorWindowMs: health.error_window_ms,
      recoverySweeps: health.recovery_sweeps,
      utilizationWarnPct: health.utilization_warn_pct,
      memoryWarnPct: health.memory_warn_pct,
    },
    metrics: {
      enabled: metrics.enabled,
      intervalMs: metrics.interval_ms,
    },
    estimates: {
      imageBytes: estimates.image_bytes,
      videoBytes: estimates.video_bytes,
      speechBytes: estimates.speech_bytes,
    },
    logLevel: config.logging.level,
  };
}
