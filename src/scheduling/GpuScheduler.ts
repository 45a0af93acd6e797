/**
 * GPU Scheduler
 *
 * Admission control for media-generation jobs over a pool of GPUs.
 *
 * Architecture:
 * - Submitted jobs are validated, sized by the VRAM estimator and admitted
 *   immediately when a healthy device has room; otherwise they queue in one of
 *   four strict-priority tiers
 * - Admission picks the device with the most free VRAM (lowest utilization,
 *   then lowest id break ties) and tries one model eviction before giving up
 * - Every release schedules a drain pass on a microtask; the pass walks each
 *   tier head-first, skipping jobs that do not fit yet
 * - An unhealthy device transition fails over synchronously: its reservations
 *   are released and their jobs go back to the head of their tiers
 *
 * All state changes happen on synchronous code paths. Executor signals are
 * started after the state change and never awaited.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { AllocationLedger } from '../core/allocation-ledger.js';
import type { DeviceRegistry } from '../core/device-registry.js';
import type { VramEstimator } from '../core/vram-estimator.js';
import type { VramOptimizer } from '../core/vram-optimizer.js';
import { ProfileVramEstimator } from '../core/vram-estimator.js';
import {
  PRIORITY_TIERS,
  type DeviceSnapshot,
  type DeviceTableRow,
  type Reservation,
} from '../types/devices.js';
import {
  TERMINAL_JOB_STATES,
  type CompletionOptions,
  type Job,
  type JobKind,
  type JobState,
  type JobVariant,
  type JobView,
  type QueueAhead,
} from '../types/jobs.js';
import { JobRequestSchema, type JobRequest } from '../types/schemas/job.js';
import { SCHEDULER } from '../config/defaults.js';
import {
  DeviceUnhealthyError,
  GatewayError,
  InsufficientCapacityError,
  InvalidJobStateError,
  QueueFullError,
  QueueTimeoutError,
  UnknownJobError,
  ValidationError,
  toFailureReason,
} from '../utils/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { SchedulerMetrics, type SchedulerMetricsSnapshot } from './SchedulerMetrics.js';
import { TieredJobQueue, type QueueDepth, type TierCapacity } from './TieredJobQueue.js';

/**
 * Worker side of the scheduler. Executors acknowledge with `markRunning` and
 * report the outcome with `complete`.
 */
export interface JobExecutor {
  dispatch(job: JobView, deviceId: number): void | Promise<void>;
  stop(jobId: string, reason: string): void | Promise<void>;
}

export interface DrainResult {
  admitted: string[];
  timedOut: string[];
  skipped: number;
  /** The pass ended early on the per-tier skip limit */
  truncated: boolean;
}

export interface ShutdownReport {
  failedQueued: string[];
  lostReservations: Reservation[];
}

export interface GpuSchedulerEvents {
  jobQueued: (job: JobView) => void;
  jobAdmitted: (job: JobView, deviceId: number) => void;
  jobRunning: (job: JobView) => void;
  jobCompleted: (job: JobView) => void;
  jobFailed: (job: JobView, reason: string) => void;
  jobCancelled: (job: JobView) => void;
  jobRequeued: (job: JobView, fromDeviceId: number) => void;
  drainCompleted: (result: DrainResult) => void;
}

export interface GpuSchedulerOptions {
  registry: DeviceRegistry;
  ledger: AllocationLedger;
  optimizer: VramOptimizer;
  estimator?: VramEstimator;
  executor?: JobExecutor;
  maxAdmissionAttempts?: number;
  maxSkipsPerTier?: number;
  maxQueueWaitMs?: number;
  timeoutSweepIntervalMs?: number;
  jobRetentionMs?: number;
  tierCapacity?: TierCapacity;
  /** Devices tried first per job kind */
  kindAffinity?: Partial<Record<JobKind, number[]>>;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

export interface GpuSchedulerMetrics extends SchedulerMetricsSnapshot {
  queueDepth: QueueDepth;
  activeReservations: number;
  trackedJobs: number;
}

interface Candidate {
  device: DeviceSnapshot;
  free: number;
  preferred: boolean;
}

const JOB_KINDS: readonly JobKind[] = ['image', 'video', 'speech'];

const ACTIVE_STATES: ReadonlySet<JobState> = new Set<JobState>(['admitted', 'running']);

function toVariant(request: JobRequest): JobVariant {
  switch (request.kind) {
    case 'image':
      return { kind: 'image', params: request.params };
    case 'video':
      return { kind: 'video', params: request.params };
    case 'speech':
      return { kind: 'speech', params: request.params };
  }
}

export class GpuScheduler extends EventEmitter<GpuSchedulerEvents> {
  private readonly registry: DeviceRegistry;
  private readonly ledger: AllocationLedger;
  private readonly optimizer: VramOptimizer;
  private readonly estimator: VramEstimator;
  private readonly executor?: JobExecutor;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly generateId: () => string;

  private readonly maxAdmissionAttempts: number;
  private readonly maxSkipsPerTier: number;
  private readonly maxQueueWaitMs: number;
  private readonly timeoutSweepIntervalMs: number;
  private readonly jobRetentionMs: number;
  private readonly kindAffinity: Partial<Record<JobKind, ReadonlySet<number>>>;

  private readonly queue: TieredJobQueue<Job>;
  private readonly jobs = new Map<string, Job>();
  private readonly metrics = new SchedulerMetrics();
  private readonly sweeper: TimerGuard;

  private drainScheduled = false;
  private closed = false;

  constructor(options: GpuSchedulerOptions) {
    super();
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.optimizer = options.optimizer;
    this.estimator = options.estimator ?? new ProfileVramEstimator();
    this.executor = options.executor;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;

    this.maxAdmissionAttempts = Math.max(1, options.maxAdmissionAttempts ?? SCHEDULER.MAX_ADMISSION_ATTEMPTS);
    this.maxSkipsPerTier = Math.max(1, options.maxSkipsPerTier ?? SCHEDULER.MAX_SKIPS_PER_TIER);
    this.maxQueueWaitMs = options.maxQueueWaitMs ?? SCHEDULER.MAX_QUEUE_WAIT_MS;
    this.timeoutSweepIntervalMs = options.timeoutSweepIntervalMs ?? SCHEDULER.TIMEOUT_SWEEP_INTERVAL_MS;
    this.jobRetentionMs = options.jobRetentionMs ?? SCHEDULER.JOB_RETENTION_MS;
    this.kindAffinity = {};
    for (const kind of JOB_KINDS) {
      const ids = options.kindAffinity?.[kind];
      if (ids && ids.length > 0) {
        this.kindAffinity[kind] = new Set(ids);
      }
    }

    this.queue = new TieredJobQueue<Job>(options.tierCapacity);
    this.sweeper = new TimerGuard('queue-timeout-sweep', this.logger);

    this.registry.on('deviceUnhealthy', (device, reason) => {
      this.failover(device.id, reason);
    });
    this.registry.on('deviceHealthy', () => this.scheduleDrain());
    this.registry.on('deviceAdded', () => this.scheduleDrain());
    this.optimizer.on('modelEvicted', (_model, reason) => {
      if (reason === 'rebalance') {
        this.scheduleDrain();
      }
    });
  }

  /**
   * Accept a job request
   *
   * The request is admitted right away when a device has room, otherwise it
   * is queued. Capacity never makes this throw.
   *
   * @returns the job id
   * @throws ValidationError when the request is malformed or the id is taken
   */
  public submit(request: unknown): string {
    if (this.closed) {
      throw new GatewayError('Scheduler is shut down', 'SCHEDULER_CLOSED');
    }
    const parsed = JobRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw ValidationError.fromZod('Invalid job request', parsed.error);
    }
    const data = parsed.data;
    const id = data.id ?? this.generateId();
    if (this.jobs.has(id)) {
      throw new ValidationError(`Job ${id} already exists`, [{ path: 'id', message: 'duplicate job id' }]);
    }

    const variant = toVariant(data);
    const vramEstimate = data.vramEstimate ?? this.estimator.estimate(variant);
    if (!Number.isInteger(vramEstimate) || vramEstimate <= 0) {
      throw new ValidationError(`Invalid VRAM estimate ${vramEstimate} for job ${id}`, [
        { path: 'vramEstimate', message: 'must be a positive integer' },
      ]);
    }
    const now = this.now();
    const job: Job = {
      ...variant,
      id,
      tenantId: data.tenantId,
      priorityTier: data.priority,
      vramEstimate,
      state: 'queued',
      submittedAt: now,
      queuedAt: now,
      attempt: 0,
    };
    this.jobs.set(id, job);
    this.metrics.increment('submitted');

    lazyLog(
      this.logger,
      'debug',
      () => ({ jobId: id, kind: job.kind, tier: job.priorityTier, vramEstimate: job.vramEstimate }),
      'Job submitted'
    );

    if (this.tryAdmit(job) === null) {
      this.enqueue(job);
    }
    return id;
  }

  /**
   * Try to place a queued job now
   *
   * @returns the device id, or null when nothing fits
   */
  public admit(jobId: string): number | null {
    const job = this.requireJob(jobId);
    if (job.state !== 'queued') {
      throw new InvalidJobStateError(jobId, job.state, 'admit');
    }
    return this.tryAdmit(job);
  }

  /**
   * Executor acknowledgement: admitted -> running
   *
   * @returns false when the job is no longer admitted (cancelled, failed over)
   */
  public markRunning(jobId: string, attempt?: number): boolean {
    const job = this.requireJob(jobId);
    if (job.state !== 'admitted' || (attempt !== undefined && attempt !== job.attempt)) {
      this.logger?.debug({ jobId, state: job.state, attempt }, 'Ignoring stale running acknowledgement');
      return false;
    }
    job.state = 'running';
    job.startedAt = this.now();
    this.emit('jobRunning', this.view(job));
    return true;
  }

  /**
   * Executor outcome: releases the reservation and schedules a drain pass
   *
   * @returns false for a stale report (job not active, or another attempt)
   */
  public complete(jobId: string, success: boolean, outcome: string | CompletionOptions = {}): boolean {
    const job = this.requireJob(jobId);
    const options: CompletionOptions = typeof outcome === 'string' ? { reason: outcome } : outcome;
    if (!ACTIVE_STATES.has(job.state) || (options.attempt !== undefined && options.attempt !== job.attempt)) {
      this.logger?.debug({ jobId, state: job.state, attempt: options.attempt }, 'Ignoring stale completion');
      return false;
    }

    const deviceId = job.deviceId;
    this.ledger.release(jobId);
    if (success) {
      job.state = 'completed';
      job.finishedAt = this.now();
      this.metrics.increment('completed');
      this.emit('jobCompleted', this.view(job));
    } else {
      if (options.deviceFault && deviceId !== undefined) {
        this.registry.recordError(deviceId, 'execution');
      }
      this.fail(job, options.reason ?? 'execution failed');
    }
    this.scheduleDrain();
    return true;
  }

  /**
   * Cancel a job in any non-terminal state
   *
   * @returns false for unknown or already finished jobs
   */
  public cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    if (job.state === 'queued') {
      this.queue.remove(jobId);
      this.finishCancelled(job);
      return true;
    }
    if (TERMINAL_JOB_STATES.has(job.state)) {
      return false;
    }

    this.ledger.release(jobId);
    this.finishCancelled(job);
    this.signalStop(jobId, 'cancelled');
    this.scheduleDrain();
    return true;
  }

  /**
   * @throws UnknownJobError
   */
  public status(jobId: string): JobState {
    return this.requireJob(jobId).state;
  }

  public getJob(jobId: string): JobView | undefined {
    const job = this.jobs.get(jobId);
    return job ? this.view(job) : undefined;
  }

  /**
   * One synchronous pass over the queue
   *
   * Tiers are visited in priority order and walked from the head. Jobs past
   * the queue wait limit are failed; jobs that do not fit stay in place.
   * After `maxSkipsPerTier` skips in one tier the pass ends.
   */
  public drain(): DrainResult {
    const result: DrainResult = { admitted: [], timedOut: [], skipped: 0, truncated: false };
    if (this.closed || this.queue.size === 0) {
      return result;
    }
    const now = this.now();

    tiers: for (const tier of PRIORITY_TIERS) {
      let skips = 0;
      for (const job of this.queue.tierEntries(tier)) {
        if (job.state !== 'queued') {
          continue;
        }
        if (now - job.queuedAt > this.maxQueueWaitMs) {
          this.timeOut(job, now);
          result.timedOut.push(job.id);
          continue;
        }
        if (this.tryAdmit(job) !== null) {
          result.admitted.push(job.id);
          continue;
        }
        skips += 1;
        result.skipped += 1;
        if (skips >= this.maxSkipsPerTier) {
          result.truncated = true;
          break tiers;
        }
      }
    }

    this.metrics.increment('drainPasses');
    lazyLog(
      this.logger,
      'debug',
      () => ({ ...result, remaining: this.queue.size }),
      'Drain pass completed'
    );
    this.emit('drainCompleted', result);
    return result;
  }

  /**
   * Release every reservation on a device and put its jobs back at the head
   * of their tiers, oldest job first. Runs synchronously from the registry's
   * `deviceUnhealthy` event.
   *
   * @returns ids of the requeued jobs
   */
  public failover(deviceId: number, reason: string): string[] {
    const displaced: Job[] = [];
    for (const reservation of this.ledger.reservationsOn(deviceId)) {
      this.ledger.release(reservation.jobId);
      const job = this.jobs.get(reservation.jobId);
      if (job && ACTIVE_STATES.has(job.state)) {
        displaced.push(job);
      }
    }

    const now = this.now();
    for (const job of displaced) {
      job.state = 'queued';
      job.deviceId = undefined;
      job.admittedAt = undefined;
      job.startedAt = undefined;
      job.queuedAt = now;
    }
    // Youngest first, so the oldest ends up at the head of its tier
    for (let i = displaced.length - 1; i >= 0; i--) {
      const job = displaced[i];
      if (job) {
        this.queue.requeueFront(job);
      }
    }

    const stopReason = `device ${deviceId} unhealthy: ${reason}`;
    for (const job of displaced) {
      this.metrics.increment('requeued');
      this.emit('jobRequeued', this.view(job), deviceId);
      this.signalStop(job.id, stopReason);
    }

    if (displaced.length > 0) {
      this.logger?.warn(
        { deviceId, reason, requeued: displaced.map((job) => job.id) },
        'Device failover requeued jobs'
      );
    }
    this.scheduleDrain();
    return displaced.map((job) => job.id);
  }

  /**
   * Operator release of a job's reservation. The job fails with
   * `force released`.
   *
   * @throws UnknownJobError
   * @throws InvalidJobStateError when the job holds no reservation
   */
  public forceRelease(jobId: string): Reservation {
    const job = this.requireJob(jobId);
    const reservation = ACTIVE_STATES.has(job.state) ? this.ledger.release(jobId) : undefined;
    if (!reservation) {
      throw new InvalidJobStateError(jobId, job.state, 'force release');
    }
    this.logger?.warn({ jobId, deviceId: reservation.deviceId }, 'Reservation force released');
    this.fail(job, 'force released');
    this.signalStop(jobId, 'force released');
    this.scheduleDrain();
    return reservation;
  }

  public quarantineDevice(deviceId: number, reason = 'quarantined by operator'): boolean {
    return this.registry.markUnhealthy(deviceId, reason, 'manual');
  }

  public restoreDevice(deviceId: number): boolean {
    return this.registry.markHealthy(deviceId);
  }

  public getDeviceTable(): DeviceTableRow[] {
    return this.registry.listDevices().map((device) => ({
      id: device.id,
      name: device.name,
      totalVram: device.totalVram,
      freeVram: this.ledger.freeVram(device.id),
      usedVram: device.usedVram,
      reservedVram: this.ledger.reservedVram(device.id),
      residentVram: this.ledger.residentVram(device.id),
      utilizationPct: device.utilizationPct,
      temperatureC: device.temperatureC,
      healthy: device.healthy,
      unhealthyReason: device.unhealthyReason,
      activeJobs: this.ledger.reservationCount(device.id),
    }));
  }

  /**
   * Work queued ahead of a job: everything in higher tiers plus the jobs in
   * front of it in its own tier
   *
   * @returns undefined when the job is not queued
   * @throws UnknownJobError
   */
  public queueAhead(jobId: string): QueueAhead | undefined {
    const job = this.requireJob(jobId);
    if (job.state !== 'queued') {
      return undefined;
    }
    const ahead: QueueAhead = { jobs: 0, vramBytes: 0 };
    for (const tier of PRIORITY_TIERS) {
      for (const entry of this.queue.tierEntries(tier)) {
        if (entry.id === jobId) {
          return ahead;
        }
        ahead.jobs += 1;
        ahead.vramBytes += entry.vramEstimate;
      }
    }
    return ahead;
  }

  public getQueueDepth(): QueueDepth {
    return this.queue.depth();
  }

  public getMetrics(): GpuSchedulerMetrics {
    return {
      ...this.metrics.getSnapshot(this.now()),
      queueDepth: this.queue.depth(),
      activeReservations: this.ledger.allReservations().length,
      trackedJobs: this.jobs.size,
    };
  }

  /**
   * Fail queued jobs past the wait limit and forget terminal jobs past
   * retention
   *
   * @returns ids of the timed-out jobs
   */
  public sweep(now: number = this.now()): string[] {
    const timedOut: string[] = [];
    for (const tier of PRIORITY_TIERS) {
      for (const job of this.queue.tierEntries(tier)) {
        if (now - job.queuedAt > this.maxQueueWaitMs) {
          this.timeOut(job, now);
          timedOut.push(job.id);
        }
      }
    }
    for (const [id, job] of this.jobs) {
      if (job.finishedAt !== undefined && now - job.finishedAt >= this.jobRetentionMs) {
        this.jobs.delete(id);
      }
    }
    return timedOut;
  }

  public start(): void {
    if (this.closed) {
      return;
    }
    this.sweeper.every(this.timeoutSweepIntervalMs, () => {
      this.sweep();
    });
    this.logger?.info(
      { maxQueueWaitMs: this.maxQueueWaitMs, sweepIntervalMs: this.timeoutSweepIntervalMs },
      'Scheduler started'
    );
  }

  public stop(): void {
    this.sweeper.clear();
  }

  /**
   * Stop accepting work, fail every queued job and report reservations that
   * are still held by running work
   */
  public shutdown(reason = 'shutdown'): ShutdownReport {
    this.stop();
    this.closed = true;

    const failedQueued: string[] = [];
    for (const job of this.queue.clear()) {
      this.fail(job, reason);
      failedQueued.push(job.id);
    }

    const lostReservations = this.ledger.allReservations();
    for (const reservation of lostReservations) {
      this.logger?.error(
        { jobId: reservation.jobId, deviceId: reservation.deviceId, vramBytes: reservation.vramBytes },
        'Reservation lost at shutdown'
      );
    }
    this.logger?.info(
      { failedQueued: failedQueued.length, lostReservations: lostReservations.length },
      'Scheduler shut down'
    );
    return { failedQueued, lostReservations };
  }

  public isClosed(): boolean {
    return this.closed;
  }

  /**
   * Select, reserve and commit. Races on the ledger are retried against a
   * fresh device snapshot.
   */
  private tryAdmit(job: Job): number | null {
    for (let attempt = 1; attempt <= this.maxAdmissionAttempts; attempt++) {
      const deviceId = this.selectDevice(job);
      if (deviceId === null) {
        return null;
      }
      try {
        this.ledger.tryReserve(deviceId, job.id, job.vramEstimate, job.priorityTier);
      } catch (err) {
        if (err instanceof InsufficientCapacityError || err instanceof DeviceUnhealthyError) {
          const reason = err.code;
          this.metrics.increment('admissionRetries');
          lazyLog(
            this.logger,
            'debug',
            () => ({ jobId: job.id, deviceId, attempt, reason }),
            'Reservation lost a race, retrying'
          );
          continue;
        }
        throw err;
      }
      this.commitAdmission(job, deviceId);
      return deviceId;
    }
    return null;
  }

  /**
   * Most free VRAM first, then lowest utilization, then lowest id. Devices in
   * the kind's affinity set go before all others. With no fit, one eviction
   * attempt on the device that could free the most.
   */
  private selectDevice(job: Job): number | null {
    const affinity = this.kindAffinity[job.kind];
    const healthy = this.registry.listDevices().filter((device) => device.healthy);

    const fitting: Candidate[] = [];
    for (const device of healthy) {
      const free = this.ledger.freeVram(device.id);
      if (free >= job.vramEstimate) {
        fitting.push({ device, free, preferred: affinity?.has(device.id) ?? false });
      }
    }
    const best = fitting.sort(compareCandidates)[0];
    if (best) {
      return best.device.id;
    }

    const evictable: Candidate[] = healthy
      .filter((device) => device.totalVram >= job.vramEstimate)
      .map((device) => ({
        device,
        free: this.optimizer.potentialFreeVram(device.id),
        preferred: affinity?.has(device.id) ?? false,
      }));
    const target = evictable.sort(compareCandidates)[0];
    if (!target) {
      return null;
    }

    this.metrics.increment('evictionAttempts');
    if (!this.optimizer.tryFreeCapacity(target.device.id, job.vramEstimate)) {
      return null;
    }
    this.metrics.increment('evictionSuccesses');
    return target.device.id;
  }

  private commitAdmission(job: Job, deviceId: number): void {
    const now = this.now();
    this.queue.remove(job.id);
    job.state = 'admitted';
    job.deviceId = deviceId;
    job.admittedAt = now;
    job.attempt += 1;
    this.metrics.recordAdmitted(job.priorityTier, now - job.queuedAt);
    this.optimizer.touchModel(deviceId, job.params.model);

    lazyLog(
      this.logger,
      'debug',
      () => ({ jobId: job.id, deviceId, vramEstimate: job.vramEstimate, free: this.ledger.freeVram(deviceId) }),
      'Job admitted'
    );
    const view = this.view(job);
    this.emit('jobAdmitted', view, deviceId);
    this.dispatch(view, deviceId);
  }

  private enqueue(job: Job): void {
    try {
      this.queue.enqueue(job);
    } catch (err) {
      if (err instanceof QueueFullError) {
        this.metrics.increment('rejectedQueueFull');
        this.fail(job, toFailureReason(err));
        return;
      }
      throw err;
    }
    lazyLog(
      this.logger,
      'debug',
      () => ({ jobId: job.id, tier: job.priorityTier, depth: this.queue.size }),
      'Job queued'
    );
    this.emit('jobQueued', this.view(job));
  }

  private timeOut(job: Job, now: number): void {
    this.queue.remove(job.id);
    const error = new QueueTimeoutError(job.id, now - job.queuedAt, this.maxQueueWaitMs);
    this.metrics.increment('timedOut');
    this.logger?.warn({ jobId: job.id, waitedMs: error.waitedMs }, 'Job timed out in queue');
    this.fail(job, error.message);
  }

  private fail(job: Job, reason: string): void {
    job.state = 'failed';
    job.failureReason = reason;
    job.finishedAt = this.now();
    this.metrics.increment('failed');
    this.emit('jobFailed', this.view(job), reason);
  }

  private finishCancelled(job: Job): void {
    job.state = 'cancelled';
    job.finishedAt = this.now();
    this.metrics.increment('cancelled');
    this.logger?.debug({ jobId: job.id }, 'Job cancelled');
    this.emit('jobCancelled', this.view(job));
  }

  /**
   * Coalesced drain on the next microtask
   */
  private scheduleDrain(): void {
    if (this.drainScheduled || this.closed) {
      return;
    }
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      try {
        this.drain();
      } catch (err) {
        this.logger?.error({ err }, 'Drain pass failed');
      }
    });
  }

  private dispatch(view: JobView, deviceId: number): void {
    const executor = this.executor;
    if (!executor) {
      return;
    }
    Promise.resolve()
      .then(() => executor.dispatch(view, deviceId))
      .catch((err: unknown) => this.handleDispatchFailure(view.id, view.attempt, err));
  }

  private handleDispatchFailure(jobId: string, attempt: number, err: unknown): void {
    this.logger?.error({ err, jobId, attempt }, 'Job dispatch failed');
    const job = this.jobs.get(jobId);
    if (!job || job.attempt !== attempt || !ACTIVE_STATES.has(job.state)) {
      return;
    }
    this.ledger.release(jobId);
    this.fail(job, `dispatch failed: ${toFailureReason(err)}`);
    this.scheduleDrain();
  }

  private signalStop(jobId: string, reason: string): void {
    const executor = this.executor;
    if (!executor) {
      return;
    }
    Promise.resolve()
      .then(() => executor.stop(jobId, reason))
      .catch((err: unknown) => {
        this.logger?.warn({ err, jobId }, 'Executor stop signal failed');
      });
  }

  private requireJob(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new UnknownJobError(jobId);
    }
    return job;
  }

  private view(job: Job): JobView {
    const position = job.state === 'queued' ? this.queue.positionOf(job.id) : -1;
    const waitEnd = job.admittedAt ?? (job.state === 'queued' ? this.now() : job.finishedAt);
    return Object.freeze({
      ...job,
      ...copyVariant(job),
      queuePosition: position >= 0 ? position : undefined,
      waitedMs: waitEnd !== undefined ? Math.max(0, waitEnd - job.queuedAt) : undefined,
    });
  }
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.preferred !== b.preferred) {
    return a.preferred ? -1 : 1;
  }
  return b.free - a.free || a.device.utilizationPct - b.device.utilizationPct || a.device.id - b.device.id;
}

function copyVariant(job: Job): JobVariant {
  switch (job.kind) {
    case 'image':
      return { kind: 'image', params: Object.freeze({ ...job.params }) };
    case 'video':
      return { kind: 'video', params: Object.freeze({ ...job.params }) };
    case 'speech':
      return { kind: 'speech', params: Object.freeze({ ...job.params }) };
  }
}
