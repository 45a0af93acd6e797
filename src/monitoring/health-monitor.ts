/**
 * Health Monitor
 *
 * Periodic sweep over the device registry:
 * - quarantines devices running too hot or reporting too many errors
 *   (the registry's `deviceUnhealthy` event triggers scheduler failover)
 * - returns devices it quarantined itself to service after a run of
 *   consecutive good sweeps; operator quarantines are left alone
 * - raises alerts for utilization and memory pressure
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { DeviceSnapshot } from '../types/devices.js';
import type { DeviceRegistry } from '../core/device-registry.js';
import { HEALTH } from '../config/defaults.js';
import { safeDivide } from '../utils/math-helpers.js';
import { TimerGuard } from '../utils/timer-guard.js';

export interface HealthThresholds {
  maxTemperatureC: number;
  maxErrors: number;
  errorWindowMs: number;
  recoverySweeps: number;
  utilizationWarnPct: number;
  memoryWarnPct: number;
}

export interface HealthMonitorOptions extends Partial<HealthThresholds> {
  registry: DeviceRegistry;
  intervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface HealthAlert {
  deviceId: number;
  kind: 'utilization' | 'memory';
  valuePct: number;
  thresholdPct: number;
  at: number;
}

export interface HealthSweepResult {
  quarantined: number[];
  recovered: number[];
  alerts: HealthAlert[];
}

export interface HealthMonitorEvents {
  deviceQuarantined: (deviceId: number, reason: string) => void;
  deviceRecovered: (deviceId: number) => void;
  alert: (alert: HealthAlert) => void;
}

export class HealthMonitor extends EventEmitter<HealthMonitorEvents> {
  private readonly registry: DeviceRegistry;
  private readonly thresholds: HealthThresholds;
  private readonly intervalMs: number;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly timer: TimerGuard;
  /** Consecutive good sweeps of each auto-quarantined device */
  private readonly goodSweeps = new Map<number, number>();

  constructor(options: HealthMonitorOptions) {
    super();
    this.registry = options.registry;
    this.thresholds = {
      maxTemperatureC: options.maxTemperatureC ?? HEALTH.MAX_TEMPERATURE_C,
      maxErrors: options.maxErrors ?? HEALTH.MAX_ERRORS,
      errorWindowMs: options.errorWindowMs ?? HEALTH.ERROR_WINDOW_MS,
      recoverySweeps: Math.max(1, options.recoverySweeps ?? HEALTH.RECOVERY_SWEEPS),
      utilizationWarnPct: options.utilizationWarnPct ?? HEALTH.UTILIZATION_WARN_PCT,
      memoryWarnPct: options.memoryWarnPct ?? HEALTH.MEMORY_WARN_PCT,
    };
    this.intervalMs = options.intervalMs ?? HEALTH.INTERVAL_MS;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.timer = new TimerGuard('health-sweep', this.logger);
  }

  public start(): void {
    this.timer.every(this.intervalMs, () => {
      this.sweep();
    });
    this.logger?.info({ intervalMs: this.intervalMs, ...this.thresholds }, 'Health monitor started');
  }

  public stop(): void {
    this.timer.clear();
  }

  public isRunning(): boolean {
    return this.timer.isActive();
  }

  public sweep(now: number = this.now()): HealthSweepResult {
    const result: HealthSweepResult = { quarantined: [], recovered: [], alerts: [] };

    for (const device of this.registry.listDevices()) {
      const fault = this.findFault(device, now);

      if (device.healthy) {
        this.goodSweeps.delete(device.id);
        if (fault) {
          this.quarantine(device.id, fault, result);
          continue;
        }
        result.alerts.push(...this.checkPressure(device, now));
        continue;
      }

      if (device.quarantineSource !== 'monitor') {
        this.goodSweeps.delete(device.id);
        continue;
      }
      const streak = fault ? 0 : (this.goodSweeps.get(device.id) ?? 0) + 1;
      if (streak >= this.thresholds.recoverySweeps) {
        this.goodSweeps.delete(device.id);
        if (this.registry.markHealthy(device.id)) {
          result.recovered.push(device.id);
          this.logger?.info({ deviceId: device.id, sweeps: streak }, 'Device recovered');
          this.emit('deviceRecovered', device.id);
        }
      } else {
        this.goodSweeps.set(device.id, streak);
      }
    }

    for (const alert of result.alerts) {
      this.emit('alert', alert);
    }
    return result;
  }

  private findFault(device: DeviceSnapshot, now: number): string | undefined {
    const { maxTemperatureC, maxErrors, errorWindowMs } = this.thresholds;
    if (device.temperatureC > maxTemperatureC) {
      return `temperature ${device.temperatureC}C exceeds ${maxTemperatureC}C`;
    }
    const errors = this.registry.errorCount(device.id, errorWindowMs, now);
    if (errors > maxErrors) {
      return `${errors} errors within ${errorWindowMs}ms`;
    }
    return undefined;
  }

  private quarantine(deviceId: number, reason: string, result: HealthSweepResult): void {
    if (!this.registry.markUnhealthy(deviceId, reason, 'monitor')) {
      return;
    }
    this.goodSweeps.set(deviceId, 0);
    result.quarantined.push(deviceId);
    this.emit('deviceQuarantined', deviceId, reason);
  }

  private checkPressure(device: DeviceSnapshot, now: number): HealthAlert[] {
    const alerts: HealthAlert[] = [];
    const { utilizationWarnPct, memoryWarnPct } = this.thresholds;
    if (device.utilizationPct > utilizationWarnPct) {
      alerts.push({
        deviceId: device.id,
        kind: 'utilization',
        valuePct: device.utilizationPct,
        thresholdPct: utilizationWarnPct,
        at: now,
      });
    }
    const memoryPct = safeDivide(device.usedVram, device.totalVram) * 100;
    if (memoryPct > memoryWarnPct) {
      alerts.push({ deviceId: device.id, kind: 'memory', valuePct: memoryPct, thresholdPct: memoryWarnPct, at: now });
    }
    for (const alert of alerts) {
      this.logger?.warn(alert, 'Device pressure above threshold');
    }
    return alerts;
  }
}
