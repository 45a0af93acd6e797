/**
 * GPU Gateway
 *
 * Composition root. Builds one instance of every component from options (or
 * runtime.yaml), wires their events and owns the lifecycle of the periodic
 * tasks.
 *
 * @example
 * ```typescript
 * const gateway = createGpuGatewayFromConfig(undefined, 'production', { executor, telemetry });
 * gateway.start();
 * const jobId = gateway.scheduler.submit({ kind: 'image', params: { prompt: 'a lighthouse at dusk' } });
 * // ...
 * gateway.shutdown();
 * ```
 */

import type { Logger } from 'pino';
import { AllocationLedger } from '../core/allocation-ledger.js';
import { DeviceRegistry } from '../core/device-registry.js';
import { ProfileVramEstimator, type VramEstimator, type VramProfile } from '../core/vram-estimator.js';
import { VramOptimizer, type ModelRuntime } from '../core/vram-optimizer.js';
import { HealthMonitor, type HealthThresholds } from '../monitoring/health-monitor.js';
import { MetricsIngestor, type DeviceTelemetrySource } from '../monitoring/metrics-ingestor.js';
import {
  GpuScheduler,
  type GpuSchedulerOptions,
  type JobExecutor,
  type ShutdownReport,
} from '../scheduling/GpuScheduler.js';
import type { DeviceSpec } from '../types/devices.js';
import { DEFAULT_LOG_LEVEL, EVICTION, HEALTH, METRICS } from '../config/defaults.js';
import { loadConfig, toGatewayOptions, type Environment } from '../config/loader.js';
import { ConfigurationError, InsufficientCapacityError, UnknownDeviceError } from '../utils/errors.js';
import { childLogger, createRootLogger } from '../utils/logger-helpers.js';

export interface ModelPlacement {
  deviceId: number;
  name: string;
  vramBytes: number;
}

export type SchedulerTuning = Omit<
  GpuSchedulerOptions,
  'registry' | 'ledger' | 'optimizer' | 'estimator' | 'executor' | 'logger' | 'now'
>;

export interface GatewayOptions {
  devices: DeviceSpec[];
  scheduler?: SchedulerTuning;
  eviction?: {
    /** Never evicted */
    baselineModels?: ModelPlacement[];
    /** Made resident at startup, evictable */
    residentModels?: ModelPlacement[];
    idleModelTtlMs?: number;
    rebalanceEnabled?: boolean;
    rebalanceThreshold?: number;
    rebalanceIntervalMs?: number;
  };
  health?: Partial<HealthThresholds> & { intervalMs?: number };
  metrics?: { enabled?: boolean; intervalMs?: number };
  estimates?: Partial<VramProfile>;
  logLevel?: string;
  logger?: Logger;
  executor?: JobExecutor;
  runtime?: ModelRuntime;
  telemetry?: DeviceTelemetrySource;
  estimator?: VramEstimator;
  now?: () => number;
}

/** Collaborators that cannot be expressed in configuration */
export type GatewayDependencies = Pick<
  GatewayOptions,
  'logger' | 'executor' | 'runtime' | 'telemetry' | 'estimator' | 'now'
>;

export class GpuGateway {
  public readonly logger: Logger;
  public readonly registry: DeviceRegistry;
  public readonly ledger: AllocationLedger;
  public readonly optimizer: VramOptimizer;
  public readonly scheduler: GpuScheduler;
  public readonly healthMonitor: HealthMonitor;
  public readonly ingestor?: MetricsIngestor;

  private readonly now: () => number;
  private readonly rebalanceEnabled: boolean;
  private readonly rebalanceIntervalMs: number;
  private started = false;

  constructor(options: GatewayOptions) {
    this.logger = options.logger ?? createRootLogger(options.logLevel ?? DEFAULT_LOG_LEVEL);
    const now = options.now;
    this.now = now ?? Date.now;
    const eviction = options.eviction ?? {};

    this.registry = new DeviceRegistry({
      devices: options.devices,
      logger: childLogger(this.logger, 'device-registry'),
      now,
    });
    this.ledger = new AllocationLedger({
      registry: this.registry,
      logger: childLogger(this.logger, 'allocation-ledger'),
      now,
    });
    this.optimizer = new VramOptimizer({
      registry: this.registry,
      ledger: this.ledger,
      runtime: options.runtime,
      idleModelTtlMs: eviction.idleModelTtlMs,
      rebalanceThreshold: eviction.rebalanceThreshold,
      logger: childLogger(this.logger, 'vram-optimizer'),
      now,
    });
    this.scheduler = new GpuScheduler({
      ...options.scheduler,
      registry: this.registry,
      ledger: this.ledger,
      optimizer: this.optimizer,
      estimator: options.estimator ?? new ProfileVramEstimator(options.estimates),
      executor: options.executor,
      logger: childLogger(this.logger, 'scheduler'),
      now,
    });
    this.healthMonitor = new HealthMonitor({
      ...options.health,
      intervalMs: options.health?.intervalMs ?? HEALTH.INTERVAL_MS,
      registry: this.registry,
      logger: childLogger(this.logger, 'health-monitor'),
      now,
    });
    if (options.telemetry && (options.metrics?.enabled ?? true)) {
      this.ingestor = new MetricsIngestor({
        registry: this.registry,
        source: options.telemetry,
        intervalMs: options.metrics?.intervalMs ?? METRICS.INTERVAL_MS,
        logger: childLogger(this.logger, 'metrics-ingestor'),
      });
    }

    this.rebalanceEnabled = eviction.rebalanceEnabled ?? true;
    this.rebalanceIntervalMs = eviction.rebalanceIntervalMs ?? EVICTION.REBALANCE_INTERVAL_MS;

    this.placeModels(eviction.baselineModels ?? [], true);
    this.placeModels(eviction.residentModels ?? [], false);
  }

  public start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.scheduler.start();
    this.healthMonitor.start();
    this.ingestor?.start();
    if (this.rebalanceEnabled) {
      this.optimizer.startRebalance(this.rebalanceIntervalMs);
    }
    this.logger.info(
      { devices: this.registry.size, telemetry: this.ingestor !== undefined, rebalance: this.rebalanceEnabled },
      'GPU gateway started'
    );
  }

  /**
   * Stop periodic tasks; admission keeps working
   */
  public stop(): void {
    this.started = false;
    this.scheduler.stop();
    this.healthMonitor.stop();
    this.ingestor?.stop();
    this.optimizer.stopRebalance();
  }

  /**
   * Stop everything, fail queued jobs and log reservations that are lost
   */
  public shutdown(): ShutdownReport {
    this.stop();
    return this.scheduler.shutdown();
  }

  public isStarted(): boolean {
    return this.started;
  }

  private placeModels(models: ModelPlacement[], baseline: boolean): void {
    const now = this.now();
    for (const model of models) {
      try {
        this.ledger.addResidentModel({ ...model, baseline, lastUsedAt: now });
      } catch (err) {
        if (err instanceof InsufficientCapacityError || err instanceof UnknownDeviceError) {
          throw new ConfigurationError(
            `Model ${model.name} does not fit on device ${model.deviceId}`,
            err
          );
        }
        throw err;
      }
    }
  }
}

export function createGpuGateway(options: GatewayOptions): GpuGateway {
  return new GpuGateway(options);
}

/**
 * Build a gateway from runtime.yaml
 */
export function createGpuGatewayFromConfig(
  configPath?: string,
  environment?: Environment,
  dependencies: GatewayDependencies = {}
): GpuGateway {
  const config = loadConfig(configPath, environment);
  return new GpuGateway({ ...toGatewayOptions(config), ...dependencies });
}
