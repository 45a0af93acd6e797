/**
 * Shared test fixtures: manual clock, silent logger, recording executor and
 * a fully wired scheduler harness.
 */

import { pino, type Logger } from 'pino';
import { AllocationLedger } from '../../src/core/allocation-ledger.js';
import { DeviceRegistry } from '../../src/core/device-registry.js';
import { VramOptimizer, type ModelRuntime } from '../../src/core/vram-optimizer.js';
import { GpuScheduler, type GpuSchedulerOptions, type JobExecutor } from '../../src/scheduling/GpuScheduler.js';
import type { DeviceSpec, PriorityTier } from '../../src/types/devices.js';
import type { JobView } from '../../src/types/jobs.js';

export const BASE_TIME = 1_000_000;

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export class ManualClock {
  private current: number;

  constructor(start = BASE_TIME) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

/**
 * Let queued microtasks (drain passes, executor signals) run
 */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

export function device(id: number, totalVram: number): DeviceSpec {
  return { id, name: `gpu-${id}`, totalVram };
}

/**
 * Image job with an explicit VRAM size
 */
export function imageJob(id: string, vramEstimate: number, priority: PriorityTier = 'normal') {
  return { kind: 'image' as const, id, priority, vramEstimate, params: { prompt: `render ${id}` } };
}

export class RecordingExecutor implements JobExecutor {
  readonly dispatched: Array<{ jobId: string; deviceId: number; attempt: number }> = [];
  readonly stopped: Array<{ jobId: string; reason: string }> = [];

  dispatch(job: JobView, deviceId: number): void {
    this.dispatched.push({ jobId: job.id, deviceId, attempt: job.attempt });
  }

  stop(jobId: string, reason: string): void {
    this.stopped.push({ jobId, reason });
  }
}

export class RecordingRuntime implements ModelRuntime {
  readonly unloaded: Array<{ deviceId: number; name: string }> = [];

  async unloadModel(deviceId: number, name: string): Promise<void> {
    this.unloaded.push({ deviceId, name });
  }
}

export type HarnessOptions = Partial<
  Omit<GpuSchedulerOptions, 'registry' | 'ledger' | 'optimizer' | 'logger' | 'now'>
> & {
  runtime?: ModelRuntime;
};

export interface Harness {
  clock: ManualClock;
  logger: Logger;
  registry: DeviceRegistry;
  ledger: AllocationLedger;
  optimizer: VramOptimizer;
  scheduler: GpuScheduler;
}

export function createHarness(devices: DeviceSpec[], options: HarnessOptions = {}): Harness {
  const clock = new ManualClock();
  const logger = silentLogger();
  const { runtime, ...schedulerOptions } = options;
  const registry = new DeviceRegistry({ devices, logger, now: clock.now });
  const ledger = new AllocationLedger({ registry, logger, now: clock.now });
  const optimizer = new VramOptimizer({ registry, ledger, runtime, logger, now: clock.now });
  const scheduler = new GpuScheduler({
    ...schedulerOptions,
    registry,
    ledger,
    optimizer,
    logger,
    now: clock.now,
  });
  return { clock, logger, registry, ledger, optimizer, scheduler };
}
