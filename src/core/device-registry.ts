/**
 * Device Registry
 *
 * Owns the GPU inventory and the live metrics pushed by telemetry. Readers get
 * frozen snapshots; mutation goes through the registry only.
 *
 * Responsibilities:
 * - Device identity, NVLink topology and live metrics
 * - Health flag with the source of the quarantine (monitor or operator)
 * - Rolling per-device error log consulted by the health monitor
 * - Hot-plug (add/remove) of devices
 *
 * Health transitions are emitted synchronously: a `deviceUnhealthy` listener
 * (the scheduler's failover) has run to completion before `markUnhealthy`
 * returns.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type {
  DeviceErrorKind,
  DeviceMetrics,
  DeviceSnapshot,
  DeviceSpec,
  QuarantineSource,
} from '../types/devices.js';
import { LedgerInvariantError, UnknownDeviceError, ValidationError } from '../utils/errors.js';
import { clamp } from '../utils/math-helpers.js';

/**
 * Ledger view consulted when deriving `usedVram`
 */
export interface CommittedVramSource {
  committedVram(deviceId: number): number;
  reservationCount(deviceId: number): number;
}

export interface DeviceRegistryEvents {
  deviceUnhealthy: (device: DeviceSnapshot, reason: string) => void;
  deviceHealthy: (device: DeviceSnapshot) => void;
  metricsUpdated: (device: DeviceSnapshot) => void;
  deviceAdded: (device: DeviceSnapshot) => void;
  deviceRemoved: (deviceId: number) => void;
}

export interface DeviceRegistryOptions {
  devices: DeviceSpec[];
  logger?: Logger;
  now?: () => number;
  /** Error entries retained per device */
  errorLogLimit?: number;
}

interface DeviceErrorEntry {
  at: number;
  kind: DeviceErrorKind;
}

interface DeviceState {
  spec: DeviceSpec;
  nvlinkPeers: ReadonlySet<number>;
  externalUsedVram: number;
  utilizationPct: number;
  temperatureC: number;
  healthy: boolean;
  unhealthyReason?: string;
  quarantineSource?: QuarantineSource;
  lastMetricsAt?: number;
  errors: DeviceErrorEntry[];
}

const DEFAULT_ERROR_LOG_LIMIT = 1_000;

export class DeviceRegistry extends EventEmitter<DeviceRegistryEvents> {
  private readonly devices = new Map<number, DeviceState>();
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly errorLogLimit: number;
  private committed?: CommittedVramSource;

  constructor(options: DeviceRegistryOptions) {
    super();
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.errorLogLimit = options.errorLogLimit ?? DEFAULT_ERROR_LOG_LIMIT;
    for (const spec of options.devices) {
      this.insert(spec);
    }
  }

  /**
   * Attach the ledger. Called once by the ledger's constructor.
   */
  public setCommittedVramSource(source: CommittedVramSource): void {
    this.committed = source;
  }

  public listDevices(): readonly DeviceSnapshot[] {
    return Array.from(this.devices.values(), (state) => this.snapshot(state));
  }

  public getDevice(deviceId: number): DeviceSnapshot | undefined {
    const state = this.devices.get(deviceId);
    return state ? this.snapshot(state) : undefined;
  }

  public has(deviceId: number): boolean {
    return this.devices.has(deviceId);
  }

  public get size(): number {
    return this.devices.size;
  }

  /**
   * Overwrite live readings of a device
   *
   * @throws UnknownDeviceError
   */
  public updateMetrics(deviceId: number, metrics: DeviceMetrics): DeviceSnapshot {
    const state = this.require(deviceId);
    state.utilizationPct = clamp(metrics.utilizationPct, 0, 100);
    state.temperatureC = metrics.temperatureC;
    state.externalUsedVram = clamp(Math.round(metrics.usedVram), 0, state.spec.totalVram);
    state.lastMetricsAt = this.now();

    const snapshot = this.snapshot(state);
    this.emit('metricsUpdated', snapshot);
    return snapshot;
  }

  /**
   * Telemetry entry point: a reading for a device that no longer exists is
   * logged and dropped.
   *
   * @returns whether the reading was applied
   */
  public ingestMetrics(deviceId: number, metrics: DeviceMetrics): boolean {
    try {
      this.updateMetrics(deviceId, metrics);
      return true;
    } catch (err) {
      if (err instanceof UnknownDeviceError) {
        this.logger?.warn({ deviceId }, 'Ignoring metrics for unknown device');
        return false;
      }
      throw err;
    }
  }

  /**
   * Quarantine a device. No-op if already unhealthy.
   *
   * @returns true on a healthy -> unhealthy transition
   */
  public markUnhealthy(deviceId: number, reason: string, source: QuarantineSource = 'manual'): boolean {
    const state = this.require(deviceId);
    if (!state.healthy) {
      return false;
    }
    state.healthy = false;
    state.unhealthyReason = reason;
    state.quarantineSource = source;
    this.logger?.warn({ deviceId, reason, source }, 'Device marked unhealthy');
    this.emit('deviceUnhealthy', this.snapshot(state), reason);
    return true;
  }

  /**
   * Return a device to service and clear its error log.
   *
   * @returns true on an unhealthy -> healthy transition
   */
  public markHealthy(deviceId: number): boolean {
    const state = this.require(deviceId);
    if (state.healthy) {
      return false;
    }
    state.healthy = true;
    state.unhealthyReason = undefined;
    state.quarantineSource = undefined;
    state.errors = [];
    this.logger?.info({ deviceId }, 'Device marked healthy');
    this.emit('deviceHealthy', this.snapshot(state));
    return true;
  }

  /**
   * Append to the device's error log
   *
   * @returns false if the device is unknown
   */
  public recordError(deviceId: number, kind: DeviceErrorKind): boolean {
    const state = this.devices.get(deviceId);
    if (!state) {
      this.logger?.warn({ deviceId, kind }, 'Ignoring error for unknown device');
      return false;
    }
    state.errors.push({ at: this.now(), kind });
    if (state.errors.length > this.errorLogLimit) {
      state.errors.splice(0, state.errors.length - this.errorLogLimit);
    }
    return true;
  }

  /**
   * Errors recorded within `(now - windowMs, now]`
   */
  public errorCount(deviceId: number, windowMs: number, now: number = this.now()): number {
    const state = this.require(deviceId);
    const since = now - windowMs;
    let count = 0;
    for (const entry of state.errors) {
      if (entry.at > since && entry.at <= now) {
        count += 1;
      }
    }
    return count;
  }

  /**
   * Register a new device
   *
   * @throws ValidationError when the id is taken
   */
  public addDevice(spec: DeviceSpec): DeviceSnapshot {
    if (this.devices.has(spec.id)) {
      throw new ValidationError(`Device ${spec.id} is already registered`, [
        { path: 'id', message: 'duplicate device id' },
      ]);
    }
    const snapshot = this.snapshot(this.insert(spec));
    this.logger?.info({ deviceId: spec.id, name: spec.name, totalVram: spec.totalVram }, 'Device added');
    this.emit('deviceAdded', snapshot);
    return snapshot;
  }

  /**
   * Remove a device that holds no reservations
   *
   * @throws UnknownDeviceError
   * @throws LedgerInvariantError when reservations are still live on it
   */
  public removeDevice(deviceId: number): void {
    this.require(deviceId);
    const live = this.committed?.reservationCount(deviceId) ?? 0;
    if (live > 0) {
      throw new LedgerInvariantError(`Device ${deviceId} still holds ${live} reservations`, {
        deviceId,
        reservations: live,
      });
    }
    this.devices.delete(deviceId);
    this.logger?.info({ deviceId }, 'Device removed');
    this.emit('deviceRemoved', deviceId);
  }

  private insert(spec: DeviceSpec): DeviceState {
    if (!Number.isInteger(spec.totalVram) || spec.totalVram <= 0) {
      throw new ValidationError(`Device ${spec.id} has invalid totalVram`, [
        { path: 'totalVram', message: 'must be a positive integer' },
      ]);
    }
    const state: DeviceState = {
      spec: { ...spec },
      nvlinkPeers: new Set(spec.nvlinkPeers ?? []),
      externalUsedVram: 0,
      utilizationPct: 0,
      temperatureC: 0,
      healthy: true,
      errors: [],
    };
    this.devices.set(spec.id, state);
    return state;
  }

  private require(deviceId: number): DeviceState {
    const state = this.devices.get(deviceId);
    if (!state) {
      throw new UnknownDeviceError(deviceId);
    }
    return state;
  }

  private snapshot(state: DeviceState): DeviceSnapshot {
    const committed = this.committed?.committedVram(state.spec.id) ?? 0;
    return Object.freeze({
      id: state.spec.id,
      name: state.spec.name,
      totalVram: state.spec.totalVram,
      usedVram: Math.min(state.spec.totalVram, Math.max(committed, state.externalUsedVram)),
      externalUsedVram: state.externalUsedVram,
      utilizationPct: state.utilizationPct,
      temperatureC: state.temperatureC,
      healthy: state.healthy,
      unhealthyReason: state.unhealthyReason,
      quarantineSource: state.quarantineSource,
      nvlinkPeers: state.nvlinkPeers,
      lastMetricsAt: state.lastMetricsAt,
    });
  }
}
