/**
 * Scheduler Metrics
 *
 * Counters for the job lifecycle plus per-tier queue-wait statistics
 * (time from entering the queue to admission).
 */

import { PRIORITY_TIERS, type PriorityTier } from '../types/devices.js';
import { METRICS } from '../config/defaults.js';
import { percentile, safeAverage } from '../utils/math-helpers.js';

export interface WaitTimeStats {
  samples: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}

export interface SchedulerCounters {
  submitted: number;
  admitted: number;
  completed: number;
  failed: number;
  cancelled: number;
  requeued: number;
  timedOut: number;
  rejectedQueueFull: number;
  admissionRetries: number;
  evictionAttempts: number;
  evictionSuccesses: number;
  drainPasses: number;
}

export interface SchedulerMetricsSnapshot {
  counters: SchedulerCounters;
  waitTimes: Record<PriorityTier, WaitTimeStats>;
  timestamp: number;
}

const EMPTY_COUNTERS: SchedulerCounters = {
  submitted: 0,
  admitted: 0,
  completed: 0,
  failed: 0,
  cancelled: 0,
  requeued: 0,
  timedOut: 0,
  rejectedQueueFull: 0,
  admissionRetries: 0,
  evictionAttempts: 0,
  evictionSuccesses: 0,
  drainPasses: 0,
};

export class SchedulerMetrics {
  private counters: SchedulerCounters = { ...EMPTY_COUNTERS };
  private readonly waitSamples = new Map<PriorityTier, number[]>();
  private readonly maxSamples: number;

  constructor(maxSamples: number = METRICS.WAIT_SAMPLE_WINDOW) {
    this.maxSamples = Math.max(1, maxSamples);
    for (const tier of PRIORITY_TIERS) {
      this.waitSamples.set(tier, []);
    }
  }

  public increment(counter: keyof SchedulerCounters, by = 1): void {
    this.counters[counter] += by;
  }

  /**
   * Record an admission and the time the job spent queued
   */
  public recordAdmitted(tier: PriorityTier, waitedMs: number): void {
    this.counters.admitted += 1;
    const samples = this.waitSamples.get(tier);
    if (!samples) {
      return;
    }
    samples.push(Math.max(0, waitedMs));
    if (samples.length > this.maxSamples) {
      samples.splice(0, samples.length - this.maxSamples);
    }
  }

  public getCounters(): SchedulerCounters {
    return { ...this.counters };
  }

  public getSnapshot(now: number = Date.now()): SchedulerMetricsSnapshot {
    const waitTimes: Record<PriorityTier, WaitTimeStats> = {
      realtime: this.waitStats('realtime'),
      high: this.waitStats('high'),
      normal: this.waitStats('normal'),
      batch: this.waitStats('batch'),
    };
    return { counters: this.getCounters(), waitTimes, timestamp: now };
  }

  public reset(): void {
    this.counters = { ...EMPTY_COUNTERS };
    for (const tier of PRIORITY_TIERS) {
      this.waitSamples.set(tier, []);
    }
  }

  private waitStats(tier: PriorityTier): WaitTimeStats {
    const samples = this.waitSamples.get(tier) ?? [];
    return {
      samples: samples.length,
      avg: safeAverage(samples),
      p50: percentile(samples, 50),
      p95: percentile(samples, 95),
      max: samples.reduce((acc, value) => Math.max(acc, value), 0),
    };
  }
}
