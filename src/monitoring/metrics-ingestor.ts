/**
 * Metrics Ingestor
 *
 * Pulls device readings from an external telemetry source on an interval and
 * applies them to the registry. A failed read is logged and counted; the
 * next tick carries on. Ticks never overlap.
 */

import type { Logger } from 'pino';
import type { DeviceRegistry } from '../core/device-registry.js';
import { DeviceReadingSchema, type DeviceReading } from '../types/schemas/telemetry.js';
import { METRICS } from '../config/defaults.js';
import { TimerGuard } from '../utils/timer-guard.js';

export interface DeviceTelemetrySource {
  read(): Promise<DeviceReading[]>;
}

export interface MetricsIngestorOptions {
  registry: DeviceRegistry;
  source: DeviceTelemetrySource;
  intervalMs?: number;
  logger?: Logger;
}

export interface IngestorStats {
  collections: number;
  failures: number;
  applied: number;
  /** Readings for unknown devices or failing validation */
  rejected: number;
}

export class MetricsIngestor {
  private readonly registry: DeviceRegistry;
  private readonly source: DeviceTelemetrySource;
  private readonly intervalMs: number;
  private readonly logger?: Logger;
  private readonly timer: TimerGuard;
  private inFlight = false;
  private stats: IngestorStats = { collections: 0, failures: 0, applied: 0, rejected: 0 };

  constructor(options: MetricsIngestorOptions) {
    this.registry = options.registry;
    this.source = options.source;
    this.intervalMs = options.intervalMs ?? METRICS.INTERVAL_MS;
    this.logger = options.logger;
    this.timer = new TimerGuard('metrics-ingest', this.logger);
  }

  public start(): void {
    this.timer.every(this.intervalMs, async () => {
      await this.collect();
    });
  }

  public stop(): void {
    this.timer.clear();
  }

  /**
   * Read once and apply every valid reading
   *
   * @returns number of readings applied (0 when skipped or failed)
   */
  public async collect(): Promise<number> {
    if (this.inFlight) {
      this.logger?.debug('Previous telemetry read still running, skipping tick');
      return 0;
    }
    this.inFlight = true;
    this.stats.collections += 1;
    try {
      const readings = await this.source.read();
      let applied = 0;
      for (const reading of readings) {
        const parsed = DeviceReadingSchema.safeParse(reading);
        if (!parsed.success) {
          this.stats.rejected += 1;
          this.logger?.warn({ issues: parsed.error.issues }, 'Discarding invalid telemetry reading');
          continue;
        }
        const { deviceId, ...metrics } = parsed.data;
        if (this.registry.ingestMetrics(deviceId, metrics)) {
          applied += 1;
        } else {
          this.stats.rejected += 1;
        }
      }
      this.stats.applied += applied;
      return applied;
    } catch (err) {
      this.stats.failures += 1;
      this.logger?.warn({ err, failures: this.stats.failures }, 'Telemetry read failed');
      return 0;
    } finally {
      this.inFlight = false;
    }
  }

  public getStats(): IngestorStats {
    return { ...this.stats };
  }
}
