/**
 * VRAM Optimizer
 *
 * Frees VRAM by evicting idle resident models, never job reservations.
 *
 * Responsibilities:
 * - LRU eviction on demand from admission (all-or-nothing)
 * - Making models resident, evicting others to fit them
 * - Background rebalance of devices whose committed VRAM is far above the
 *   healthy-device average
 *
 * Ledger mutations are synchronous. The runtime unload that physically frees
 * the memory is started after the commit and is never awaited inside it.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { LoadedModel } from '../types/devices.js';
import type { AllocationLedger } from './allocation-ledger.js';
import type { DeviceRegistry } from './device-registry.js';
import { EVICTION } from '../config/defaults.js';
import { EvictionFailedError, InsufficientCapacityError, UnknownDeviceError } from '../utils/errors.js';
import { safeAverage, safeDivide } from '../utils/math-helpers.js';
import { TimerGuard } from '../utils/timer-guard.js';

/**
 * Adapter to the inference runtime that actually holds the weights
 */
export interface ModelRuntime {
  unloadModel(deviceId: number, name: string): Promise<void>;
}

export type EvictionReason = 'capacity' | 'rebalance';

export interface VramOptimizerEvents {
  modelEvicted: (model: LoadedModel, reason: EvictionReason) => void;
  modelLoaded: (model: LoadedModel) => void;
}

export interface VramOptimizerOptions {
  registry: DeviceRegistry;
  ledger: AllocationLedger;
  runtime?: ModelRuntime;
  idleModelTtlMs?: number;
  rebalanceThreshold?: number;
  logger?: Logger;
  now?: () => number;
}

export interface ModelLoadRequest {
  name: string;
  vramBytes: number;
  baseline?: boolean;
}

export interface RebalanceResult {
  averageRatio: number;
  /** Devices found above average x (1 + threshold) */
  overloadedDevices: number[];
  evicted: LoadedModel[];
}

export class VramOptimizer extends EventEmitter<VramOptimizerEvents> {
  private readonly registry: DeviceRegistry;
  private readonly ledger: AllocationLedger;
  private readonly runtime?: ModelRuntime;
  private readonly idleModelTtlMs: number;
  private readonly rebalanceThreshold: number;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly rebalanceTimer: TimerGuard;

  constructor(options: VramOptimizerOptions) {
    super();
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.runtime = options.runtime;
    this.idleModelTtlMs = options.idleModelTtlMs ?? EVICTION.IDLE_MODEL_TTL_MS;
    this.rebalanceThreshold = options.rebalanceThreshold ?? EVICTION.REBALANCE_THRESHOLD;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.rebalanceTimer = new TimerGuard('vram-rebalance', this.logger);
  }

  /**
   * Evict least-recently-used idle models until the device has `neededBytes`
   * free. Nothing is evicted unless the target is reachable.
   *
   * @returns whether the device now has `neededBytes` free
   */
  public tryFreeCapacity(deviceId: number, neededBytes: number): boolean {
    try {
      this.freeCapacity(deviceId, neededBytes);
      return true;
    } catch (err) {
      if (err instanceof EvictionFailedError) {
        this.logger?.debug(
          { deviceId, neededBytes, reachable: err.reachableBytes },
          'Eviction cannot reach requested capacity'
        );
        return false;
      }
      throw err;
    }
  }

  /**
   * Throwing variant of {@link tryFreeCapacity}
   *
   * @returns the evicted models (empty when the device already had room)
   * @throws EvictionFailedError when `neededBytes` stays out of reach
   */
  public freeCapacity(deviceId: number, neededBytes: number): LoadedModel[] {
    const device = this.registry.getDevice(deviceId);
    if (!device || !device.healthy) {
      throw new EvictionFailedError(deviceId, neededBytes, 0);
    }
    if (this.ledger.freeVram(deviceId) >= neededBytes) {
      return [];
    }

    const committed = this.ledger.committedVram(deviceId);
    const freeAfter = (reclaimed: number): number => device.totalVram - (committed - reclaimed);

    const chosen: LoadedModel[] = [];
    let reclaimed = 0;
    for (const model of this.evictionCandidates(deviceId)) {
      chosen.push(model);
      reclaimed += model.vramBytes;
      if (freeAfter(reclaimed) >= neededBytes) {
        break;
      }
    }

    if (freeAfter(reclaimed) < neededBytes) {
      throw new EvictionFailedError(deviceId, neededBytes, Math.max(0, freeAfter(reclaimed)));
    }

    return this.evict(
      deviceId,
      chosen.map((model) => model.name),
      'capacity'
    );
  }

  /**
   * Bytes that eviction could recover on a device
   */
  public reclaimableVram(deviceId: number): number {
    let total = 0;
    for (const model of this.ledger.residentModels(deviceId)) {
      if (!model.baseline) {
        total += model.vramBytes;
      }
    }
    return total;
  }

  /**
   * Free VRAM the device would have if every evictable model were gone
   */
  public potentialFreeVram(deviceId: number): number {
    const device = this.registry.getDevice(deviceId);
    if (!device) {
      throw new UnknownDeviceError(deviceId);
    }
    const committed = this.ledger.committedVram(deviceId) - this.reclaimableVram(deviceId);
    return Math.max(0, device.totalVram - committed);
  }

  /**
   * Make a model resident, evicting idle models if needed. A model that is
   * already resident is only touched.
   *
   * @returns false if the model cannot fit even after eviction
   */
  public loadModel(deviceId: number, request: ModelLoadRequest): boolean {
    const resident = this.ledger.residentModels(deviceId).find((model) => model.name === request.name);
    if (resident) {
      this.ledger.touchModel(deviceId, request.name, this.now());
      return true;
    }
    if (!this.tryFreeCapacity(deviceId, request.vramBytes)) {
      this.logger?.warn({ deviceId, model: request.name, vramBytes: request.vramBytes }, 'Model does not fit');
      return false;
    }
    try {
      const loaded = this.ledger.addResidentModel({
        name: request.name,
        deviceId,
        vramBytes: request.vramBytes,
        lastUsedAt: this.now(),
        baseline: request.baseline ?? false,
      });
      this.emit('modelLoaded', loaded);
      return true;
    } catch (err) {
      if (err instanceof InsufficientCapacityError) {
        return false;
      }
      throw err;
    }
  }

  public touchModel(deviceId: number, name: string): boolean {
    return this.ledger.touchModel(deviceId, name, this.now());
  }

  /**
   * Evict idle models from devices whose committed share is more than
   * `rebalanceThreshold` above the healthy-device average, down to that bound.
   */
  public rebalance(now: number = this.now()): RebalanceResult {
    const devices = this.registry.listDevices().filter((device) => device.healthy);
    const ratios = new Map<number, number>();
    for (const device of devices) {
      ratios.set(device.id, safeDivide(this.ledger.committedVram(device.id), device.totalVram));
    }
    const averageRatio = safeAverage(Array.from(ratios.values()));
    const result: RebalanceResult = { averageRatio, overloadedDevices: [], evicted: [] };
    if (devices.length < 2 || averageRatio === 0) {
      return result;
    }

    const bound = averageRatio * (1 + this.rebalanceThreshold);
    for (const device of devices) {
      const ratio = ratios.get(device.id) ?? 0;
      if (ratio <= bound) {
        continue;
      }
      result.overloadedDevices.push(device.id);

      const target = bound * device.totalVram;
      let committed = this.ledger.committedVram(device.id);
      const names: string[] = [];
      for (const model of this.evictionCandidates(device.id)) {
        if (committed <= target) {
          break;
        }
        if (now - model.lastUsedAt < this.idleModelTtlMs) {
          continue;
        }
        names.push(model.name);
        committed -= model.vramBytes;
      }
      if (names.length > 0) {
        result.evicted.push(...this.evict(device.id, names, 'rebalance'));
      }
    }

    if (result.evicted.length > 0) {
      this.logger?.info(
        {
          averageRatio,
          overloadedDevices: result.overloadedDevices,
          evicted: result.evicted.map((model) => `${model.deviceId}:${model.name}`),
        },
        'Rebalance evicted idle models'
      );
    }
    return result;
  }

  public startRebalance(intervalMs: number = EVICTION.REBALANCE_INTERVAL_MS): void {
    this.rebalanceTimer.every(intervalMs, () => {
      this.rebalance();
    });
  }

  public stopRebalance(): void {
    this.rebalanceTimer.clear();
  }

  /**
   * Non-baseline models, least recently used first (name breaks ties)
   */
  private evictionCandidates(deviceId: number): LoadedModel[] {
    return this.ledger
      .residentModels(deviceId)
      .filter((model) => !model.baseline)
      .sort((a, b) => a.lastUsedAt - b.lastUsedAt || a.name.localeCompare(b.name));
  }

  private evict(deviceId: number, names: string[], reason: EvictionReason): LoadedModel[] {
    const victims = this.ledger.evictModels(deviceId, names);
    for (const model of victims) {
      this.logger?.info({ deviceId, model: model.name, vramBytes: model.vramBytes, reason }, 'Model evicted');
      this.emit('modelEvicted', model, reason);
      this.unloadInBackground(model);
    }
    return victims;
  }

  private unloadInBackground(model: LoadedModel): void {
    const runtime = this.runtime;
    if (!runtime) {
      return;
    }
    Promise.resolve()
      .then(() => runtime.unloadModel(model.deviceId, model.name))
      .catch((err: unknown) => {
        this.logger?.error({ err, deviceId: model.deviceId, model: model.name }, 'Model unload failed');
      });
  }
}
