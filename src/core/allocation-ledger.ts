/**
 * Allocation Ledger
 *
 * Authoritative record of VRAM commitments per device: job reservations and
 * resident models. Every mutation is a synchronous check-and-commit with no
 * await in between, so concurrent admissions on the event loop are
 * linearized and a device can never be overcommitted.
 *
 * Free VRAM of a device:
 *
 *   totalVram - (reserved + resident)
 *
 * A release frees its bytes at once. Driver-reported usage only feeds the
 * device snapshot and the memory pressure alerts.
 */

import type { Logger } from 'pino';
import type { LoadedModel, PriorityTier, Reservation } from '../types/devices.js';
import type { CommittedVramSource, DeviceRegistry } from './device-registry.js';
import {
  DeviceUnhealthyError,
  InsufficientCapacityError,
  LedgerInvariantError,
  UnknownDeviceError,
} from '../utils/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';

export interface AllocationLedgerOptions {
  registry: DeviceRegistry;
  logger?: Logger;
  now?: () => number;
}

interface DeviceBook {
  reserved: number;
  resident: number;
  /** jobId -> reservation, insertion ordered */
  reservations: Map<string, Reservation>;
  /** model name -> model */
  models: Map<string, LoadedModel>;
}

export class AllocationLedger implements CommittedVramSource {
  private readonly registry: DeviceRegistry;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly books = new Map<number, DeviceBook>();
  private readonly byJob = new Map<string, Reservation>();

  constructor(options: AllocationLedgerOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.registry.setCommittedVramSource(this);
    this.registry.on('deviceRemoved', (deviceId) => this.books.delete(deviceId));
  }

  /**
   * Reserve `vramBytes` on a device for a job
   *
   * @throws LedgerInvariantError for a non-positive size or a job that already holds a reservation
   * @throws UnknownDeviceError
   * @throws DeviceUnhealthyError
   * @throws InsufficientCapacityError when the reservation does not fit
   */
  public tryReserve(
    deviceId: number,
    jobId: string,
    vramBytes: number,
    priorityTier: PriorityTier
  ): Reservation {
    if (!Number.isInteger(vramBytes) || vramBytes <= 0) {
      throw new LedgerInvariantError(`Invalid reservation size ${vramBytes} for job ${jobId}`, {
        jobId,
        vramBytes,
      });
    }
    const existing = this.byJob.get(jobId);
    if (existing) {
      this.logger?.error({ jobId, deviceId: existing.deviceId }, 'Job already holds a reservation');
      throw new LedgerInvariantError(`Job ${jobId} already holds a reservation on device ${existing.deviceId}`, {
        jobId,
        deviceId: existing.deviceId,
      });
    }
    const device = this.registry.getDevice(deviceId);
    if (!device) {
      throw new UnknownDeviceError(deviceId);
    }
    if (!device.healthy) {
      throw new DeviceUnhealthyError(deviceId, device.unhealthyReason);
    }

    const free = this.freeVram(deviceId);
    if (vramBytes > free) {
      throw new InsufficientCapacityError(deviceId, vramBytes, free);
    }

    const book = this.book(deviceId);
    const reservation: Reservation = Object.freeze({
      jobId,
      deviceId,
      vramBytes,
      createdAt: this.now(),
      priorityTier,
    });
    book.reservations.set(jobId, reservation);
    book.reserved += vramBytes;
    this.byJob.set(jobId, reservation);

    this.assertDeviceInvariants(deviceId, () => {
      book.reservations.delete(jobId);
      book.reserved -= vramBytes;
      this.byJob.delete(jobId);
    });

    lazyLog(
      this.logger,
      'debug',
      () => ({ jobId, deviceId, vramBytes, free: this.freeVram(deviceId) }),
      'Reservation committed'
    );
    return reservation;
  }

  /**
   * Drop a job's reservation. Idempotent.
   *
   * @returns the released reservation, or undefined if the job held none
   */
  public release(jobId: string): Reservation | undefined {
    const reservation = this.byJob.get(jobId);
    if (!reservation) {
      return undefined;
    }
    this.byJob.delete(jobId);
    const book = this.books.get(reservation.deviceId);
    if (book?.reservations.delete(jobId)) {
      book.reserved -= reservation.vramBytes;
    }
    lazyLog(
      this.logger,
      'debug',
      () => ({ jobId, deviceId: reservation.deviceId, vramBytes: reservation.vramBytes }),
      'Reservation released'
    );
    return reservation;
  }

  /**
   * Capacity left for new reservations. Only ledger commitments count;
   * driver-reported usage is for display and alerts.
   */
  public freeVram(deviceId: number): number {
    const device = this.registry.getDevice(deviceId);
    if (!device) {
      throw new UnknownDeviceError(deviceId);
    }
    return Math.max(0, device.totalVram - this.committedVram(deviceId));
  }

  public reservedVram(deviceId: number): number {
    return this.books.get(deviceId)?.reserved ?? 0;
  }

  public residentVram(deviceId: number): number {
    return this.books.get(deviceId)?.resident ?? 0;
  }

  public committedVram(deviceId: number): number {
    const book = this.books.get(deviceId);
    return book ? book.reserved + book.resident : 0;
  }

  public reservationCount(deviceId: number): number {
    return this.books.get(deviceId)?.reservations.size ?? 0;
  }

  public getReservation(jobId: string): Reservation | undefined {
    return this.byJob.get(jobId);
  }

  /**
   * Reservations on a device, oldest first
   */
  public reservationsOn(deviceId: number): Reservation[] {
    const book = this.books.get(deviceId);
    return book ? Array.from(book.reservations.values()) : [];
  }

  public allReservations(): Reservation[] {
    return Array.from(this.byJob.values());
  }

  /**
   * Make a model resident on a device
   *
   * @throws InsufficientCapacityError when the model does not fit
   * @throws LedgerInvariantError when a model of that name is already resident
   */
  public addResidentModel(model: Omit<LoadedModel, 'loaded'>): LoadedModel {
    const device = this.registry.getDevice(model.deviceId);
    if (!device) {
      throw new UnknownDeviceError(model.deviceId);
    }
    if (!Number.isInteger(model.vramBytes) || model.vramBytes <= 0) {
      throw new LedgerInvariantError(`Invalid model size ${model.vramBytes} for ${model.name}`, {
        model: model.name,
        vramBytes: model.vramBytes,
      });
    }
    const book = this.book(model.deviceId);
    if (book.models.has(model.name)) {
      throw new LedgerInvariantError(`Model ${model.name} is already resident on device ${model.deviceId}`, {
        model: model.name,
        deviceId: model.deviceId,
      });
    }
    const free = this.freeVram(model.deviceId);
    if (model.vramBytes > free) {
      throw new InsufficientCapacityError(model.deviceId, model.vramBytes, free);
    }

    const loaded: LoadedModel = Object.freeze({ ...model, loaded: true });
    book.models.set(model.name, loaded);
    book.resident += model.vramBytes;
    this.assertDeviceInvariants(model.deviceId, () => {
      book.models.delete(model.name);
      book.resident -= model.vramBytes;
    });

    this.logger?.debug({ deviceId: model.deviceId, model: model.name, vramBytes: model.vramBytes }, 'Model resident');
    return loaded;
  }

  /**
   * Forget a resident model (baseline included)
   */
  public removeResidentModel(deviceId: number, name: string): LoadedModel | undefined {
    const book = this.books.get(deviceId);
    const model = book?.models.get(name);
    if (!book || !model) {
      return undefined;
    }
    book.models.delete(name);
    book.resident -= model.vramBytes;
    return model;
  }

  public residentModels(deviceId: number): LoadedModel[] {
    const book = this.books.get(deviceId);
    return book ? Array.from(book.models.values()) : [];
  }

  /**
   * Record a use of a resident model for LRU ordering
   *
   * @returns false if the model is not resident
   */
  public touchModel(deviceId: number, name: string, at: number = this.now()): boolean {
    const book = this.books.get(deviceId);
    const model = book?.models.get(name);
    if (!book || !model) {
      return false;
    }
    book.models.set(name, Object.freeze({ ...model, lastUsedAt: at }));
    return true;
  }

  /**
   * Evict a set of models atomically. Either every named model is removed or
   * none is.
   *
   * @throws LedgerInvariantError for an unknown or baseline model
   */
  public evictModels(deviceId: number, names: readonly string[]): LoadedModel[] {
    const book = this.books.get(deviceId);
    const victims: LoadedModel[] = [];
    for (const name of new Set(names)) {
      const model = book?.models.get(name);
      if (!model) {
        throw new LedgerInvariantError(`Model ${name} is not resident on device ${deviceId}`, { deviceId, model: name });
      }
      if (model.baseline) {
        throw new LedgerInvariantError(`Baseline model ${name} cannot be evicted`, { deviceId, model: name });
      }
      victims.push(model);
    }
    if (!book) {
      return victims;
    }
    for (const model of victims) {
      book.models.delete(model.name);
      book.resident -= model.vramBytes;
    }
    return victims;
  }

  /**
   * Check the ledger against every device
   *
   * @returns a description of each violation (empty when consistent)
   */
  public verifyInvariants(): string[] {
    const violations: string[] = [];
    for (const device of this.registry.listDevices()) {
      violations.push(...this.deviceViolations(device.id, device.totalVram));
    }
    for (const [jobId, reservation] of this.byJob) {
      if (this.books.get(reservation.deviceId)?.reservations.get(jobId) !== reservation) {
        violations.push(`reservation of job ${jobId} missing from device ${reservation.deviceId}`);
      }
    }
    return violations;
  }

  private deviceViolations(deviceId: number, totalVram: number): string[] {
    const book = this.books.get(deviceId);
    if (!book) {
      return [];
    }
    const violations: string[] = [];
    let reserved = 0;
    for (const reservation of book.reservations.values()) {
      reserved += reservation.vramBytes;
    }
    let resident = 0;
    for (const model of book.models.values()) {
      resident += model.vramBytes;
    }
    if (reserved !== book.reserved) {
      violations.push(`device ${deviceId}: reserved total ${book.reserved} != sum ${reserved}`);
    }
    if (resident !== book.resident) {
      violations.push(`device ${deviceId}: resident total ${book.resident} != sum ${resident}`);
    }
    if (reserved + resident > totalVram) {
      violations.push(`device ${deviceId}: committed ${reserved + resident} exceeds total ${totalVram}`);
    }
    return violations;
  }

  /**
   * Roll back the last commit and reject it if the device book is inconsistent
   */
  private assertDeviceInvariants(deviceId: number, rollback: () => void): void {
    const device = this.registry.getDevice(deviceId);
    const violations = device ? this.deviceViolations(deviceId, device.totalVram) : [];
    if (violations.length === 0) {
      return;
    }
    rollback();
    this.logger?.fatal({ deviceId, violations }, 'Ledger invariant violated, commit rejected');
    throw new LedgerInvariantError(`Ledger invariant violated on device ${deviceId}`, { deviceId, violations });
  }

  private book(deviceId: number): DeviceBook {
    let book = this.books.get(deviceId);
    if (!book) {
      book = { reserved: 0, resident: 0, reservations: new Map(), models: new Map() };
      this.books.set(deviceId, book);
    }
    return book;
  }
}
