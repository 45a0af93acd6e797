import { describe, it, expect, vi } from 'vitest';
import type { JobExecutor } from '../../../src/scheduling/GpuScheduler.js';
import type { JobView } from '../../../src/types/jobs.js';
import {
  GatewayError,
  InsufficientCapacityError,
  InvalidJobStateError,
  UnknownJobError,
  ValidationError,
} from '../../../src/utils/errors.js';
import {
  RecordingExecutor,
  RecordingRuntime,
  createHarness,
  device,
  flushMicrotasks,
  imageJob,
} from '../../helpers/fixtures.js';

describe('GpuScheduler', () => {
  describe('device selection', () => {
    it('should pick the device with the most free VRAM', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000), device(1, 10000)]);
      ledger.tryReserve(0, 'external', 2000, 'normal');

      scheduler.submit(imageJob('job-a', 1000));

      expect(scheduler.getJob('job-a')?.deviceId).toBe(1);
    });

    it('should break ties by lowest id', () => {
      const { scheduler } = createHarness([device(0, 10000), device(1, 10000)]);

      scheduler.submit(imageJob('job-a', 1000));

      expect(scheduler.getJob('job-a')?.deviceId).toBe(0);
    });

    it('should break ties by utilization before id', () => {
      const { registry, scheduler } = createHarness([device(0, 10000), device(1, 10000)]);
      registry.updateMetrics(0, { utilizationPct: 50, temperatureC: 40, usedVram: 0 });

      scheduler.submit(imageJob('job-a', 1000));

      expect(scheduler.getJob('job-a')?.deviceId).toBe(1);
    });

    it('should try affinity devices first', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000), device(1, 10000)], {
        kindAffinity: { image: [1] },
      });
      ledger.tryReserve(1, 'external', 2000, 'normal');

      scheduler.submit(imageJob('job-a', 1000));
      scheduler.submit(imageJob('job-b', 8000));

      expect(scheduler.getJob('job-a')?.deviceId).toBe(1);
      expect(scheduler.getJob('job-b')?.deviceId).toBe(0);
    });
  });

  describe('admission and release', () => {
    it('should queue a job until enough VRAM is released on one device', async () => {
      const { ledger, scheduler } = createHarness([device(0, 20000)]);

      scheduler.submit(imageJob('A', 6000, 'realtime'));
      expect(scheduler.status('A')).toBe('admitted');
      expect(ledger.reservedVram(0)).toBe(6000);

      scheduler.submit(imageJob('B', 6000, 'normal'));
      expect(ledger.reservedVram(0)).toBe(12000);

      scheduler.submit(imageJob('C', 6000, 'batch'));
      expect(ledger.reservedVram(0)).toBe(18000);

      scheduler.submit(imageJob('D', 9000, 'normal'));
      expect(scheduler.status('D')).toBe('queued');
      expect(scheduler.getQueueDepth().total).toBe(1);

      expect(scheduler.complete('A', true)).toBe(true);
      await flushMicrotasks();
      expect(scheduler.status('D')).toBe('queued');

      scheduler.complete('B', true);
      await flushMicrotasks();
      expect(scheduler.status('D')).toBe('admitted');
      expect(scheduler.getJob('D')?.deviceId).toBe(0);
      expect(ledger.reservedVram(0)).toBe(15000);
      expect(scheduler.getQueueDepth().total).toBe(0);
    });

    it('should drain tiers in priority order', async () => {
      const { scheduler } = createHarness([device(0, 10000)]);
      const admitted: string[] = [];
      scheduler.on('jobAdmitted', (job) => admitted.push(job.id));

      scheduler.submit(imageJob('blocker', 10000));
      scheduler.submit(imageJob('A', 1000, 'batch'));
      scheduler.submit(imageJob('B', 1000, 'normal'));
      scheduler.submit(imageJob('C', 1000, 'realtime'));
      scheduler.submit(imageJob('D', 1000, 'high'));

      scheduler.complete('blocker', true);
      await flushMicrotasks();

      expect(admitted).toEqual(['blocker', 'C', 'D', 'B', 'A']);
    });

    it('should dispatch admitted jobs to the executor', async () => {
      const executor = new RecordingExecutor();
      const { scheduler } = createHarness([device(0, 10000)], { executor });

      scheduler.submit(imageJob('job-a', 1000));
      await flushMicrotasks();

      expect(executor.dispatched).toEqual([{ jobId: 'job-a', deviceId: 0, attempt: 1 }]);
    });

    it('should never admit a job larger than every device', () => {
      const { scheduler } = createHarness([device(0, 10000), device(1, 10000)]);

      scheduler.submit(imageJob('huge', 20000));

      expect(scheduler.status('huge')).toBe('queued');
      expect(scheduler.getMetrics().counters.evictionAttempts).toBe(0);
    });

    it('should admit a queued job on demand', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000)]);
      ledger.tryReserve(0, 'external', 10000, 'normal');
      scheduler.submit(imageJob('job-a', 4000));

      expect(scheduler.admit('job-a')).toBeNull();
      ledger.release('external');
      expect(scheduler.admit('job-a')).toBe(0);
      expect(() => scheduler.admit('job-a')).toThrow(InvalidJobStateError);
    });
  });

  describe('eviction', () => {
    it('should evict an idle model to admit a job', async () => {
      const runtime = new RecordingRuntime();
      const { ledger, scheduler } = createHarness([device(0, 20000)], { runtime });
      ledger.addResidentModel({ name: 'flux', deviceId: 0, vramBytes: 5000, lastUsedAt: 0, baseline: false });
      scheduler.submit(imageJob('big', 15000));

      scheduler.submit(imageJob('small', 4000));

      expect(scheduler.getJob('small')?.deviceId).toBe(0);
      expect(ledger.residentModels(0)).toEqual([]);
      const counters = scheduler.getMetrics().counters;
      expect(counters.evictionAttempts).toBe(1);
      expect(counters.evictionSuccesses).toBe(1);
      await flushMicrotasks();
      expect(runtime.unloaded).toEqual([{ deviceId: 0, name: 'flux' }]);
    });

    it('should queue the job when eviction cannot free enough', () => {
      const { ledger, scheduler } = createHarness([device(0, 20000)]);
      ledger.addResidentModel({ name: 'flux', deviceId: 0, vramBytes: 5000, lastUsedAt: 0, baseline: false });
      scheduler.submit(imageJob('big', 15000));

      scheduler.submit(imageJob('medium', 6000));

      expect(scheduler.status('medium')).toBe('queued');
      expect(ledger.residentVram(0)).toBe(5000);
      const counters = scheduler.getMetrics().counters;
      expect(counters.evictionAttempts).toBe(1);
      expect(counters.evictionSuccesses).toBe(0);
    });
  });

  describe('failover', () => {
    it('should requeue jobs of an unhealthy device at the head of their tiers', async () => {
      const executor = new RecordingExecutor();
      const { clock, ledger, scheduler } = createHarness([device(2, 30000)], { executor });
      const requeued = vi.fn();
      scheduler.on('jobRequeued', requeued);

      scheduler.submit(imageJob('j1', 10000, 'normal'));
      clock.advance(1);
      scheduler.submit(imageJob('j2', 10000, 'high'));
      clock.advance(1);
      scheduler.submit(imageJob('j3', 10000, 'normal'));
      scheduler.submit(imageJob('q1', 10000, 'normal'));
      scheduler.submit(imageJob('q2', 10000, 'high'));
      scheduler.markRunning('j1');

      expect(scheduler.quarantineDevice(2, 'fan failure')).toBe(true);

      expect(ledger.reservedVram(2)).toBe(0);
      expect(requeued).toHaveBeenCalledTimes(3);
      expect(scheduler.getJob('j1')?.queuePosition).toBe(0);
      expect(scheduler.getJob('j3')?.queuePosition).toBe(1);
      expect(scheduler.getJob('q1')?.queuePosition).toBe(2);
      expect(scheduler.getJob('j2')?.queuePosition).toBe(0);
      expect(scheduler.getJob('q2')?.queuePosition).toBe(1);
      expect(scheduler.status('j1')).toBe('queued');
      expect(scheduler.getJob('j1')?.deviceId).toBeUndefined();

      await flushMicrotasks();
      expect(executor.stopped).toEqual([
        { jobId: 'j1', reason: 'device 2 unhealthy: fan failure' },
        { jobId: 'j2', reason: 'device 2 unhealthy: fan failure' },
        { jobId: 'j3', reason: 'device 2 unhealthy: fan failure' },
      ]);
      expect(scheduler.getQueueDepth().total).toBe(5);

      expect(scheduler.restoreDevice(2)).toBe(true);
      await flushMicrotasks();

      expect(scheduler.status('j2')).toBe('admitted');
      expect(scheduler.status('q2')).toBe('admitted');
      expect(scheduler.status('j1')).toBe('admitted');
      expect(scheduler.status('j3')).toBe('queued');
      expect(scheduler.status('q1')).toBe('queued');
      expect(scheduler.getJob('j1')?.attempt).toBe(2);
      expect(scheduler.getMetrics().counters.requeued).toBe(3);
    });

    it('should ignore completion reports from a previous attempt', async () => {
      const { scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('job-a', 4000));
      scheduler.quarantineDevice(0);
      scheduler.restoreDevice(0);
      await flushMicrotasks();

      expect(scheduler.getJob('job-a')?.attempt).toBe(2);
      expect(scheduler.markRunning('job-a', 1)).toBe(false);
      expect(scheduler.complete('job-a', true, { attempt: 1 })).toBe(false);
      expect(scheduler.status('job-a')).toBe('admitted');
      expect(scheduler.complete('job-a', true, { attempt: 2 })).toBe(true);
      expect(scheduler.status('job-a')).toBe('completed');
    });

    it('should not recover a manually quarantined device by itself', async () => {
      const { scheduler } = createHarness([device(0, 10000)]);
      scheduler.quarantineDevice(0, 'maintenance');

      scheduler.submit(imageJob('job-a', 1000));
      await flushMicrotasks();

      expect(scheduler.status('job-a')).toBe('queued');
      expect(scheduler.getDeviceTable()[0]?.unhealthyReason).toBe('maintenance');
    });
  });

  describe('admission races', () => {
    it('should retry a reservation that lost a race', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000), device(1, 10000)]);
      vi.spyOn(ledger, 'tryReserve').mockImplementationOnce(() => {
        throw new InsufficientCapacityError(0, 5000, 0);
      });

      scheduler.submit(imageJob('job-a', 5000));

      expect(scheduler.status('job-a')).toBe('admitted');
      expect(scheduler.getMetrics().counters.admissionRetries).toBe(1);
    });

    it('should queue the job once retries are exhausted', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000)], { maxAdmissionAttempts: 1 });
      vi.spyOn(ledger, 'tryReserve').mockImplementationOnce(() => {
        throw new InsufficientCapacityError(0, 5000, 0);
      });

      scheduler.submit(imageJob('job-a', 5000));

      expect(scheduler.status('job-a')).toBe('queued');
      expect(ledger.reservedVram(0)).toBe(0);
    });
  });

  describe('queue limits', () => {
    it('should fail a job that waited too long', () => {
      const { clock, scheduler } = createHarness([device(0, 10000)], { maxQueueWaitMs: 1000 });
      scheduler.submit(imageJob('blocker', 10000));
      scheduler.submit(imageJob('late', 5000));

      clock.advance(1000);
      expect(scheduler.sweep()).toEqual([]);
      clock.advance(1);
      expect(scheduler.sweep()).toEqual(['late']);

      const job = scheduler.getJob('late');
      expect(job?.state).toBe('failed');
      expect(job?.failureReason).toBe('Job late waited 1001ms in queue (max 1000ms)');
      expect(scheduler.getMetrics().counters.timedOut).toBe(1);
    });

    it('should time out jobs found during a drain pass', () => {
      const { clock, scheduler } = createHarness([device(0, 10000)], { maxQueueWaitMs: 1000 });
      scheduler.submit(imageJob('blocker', 10000));
      scheduler.submit(imageJob('late', 5000));
      clock.advance(1001);

      const result = scheduler.drain();

      expect(result.timedOut).toEqual(['late']);
      expect(result.admitted).toEqual([]);
      expect(scheduler.status('late')).toBe('failed');
    });

    it('should end a pass after too many skips in one tier', () => {
      const { scheduler } = createHarness([device(0, 10000)], { maxSkipsPerTier: 2 });
      scheduler.submit(imageJob('blocker-1', 9000));
      scheduler.submit(imageJob('blocker-2', 1000));
      scheduler.submit(imageJob('big-1', 5000));
      scheduler.submit(imageJob('big-2', 5000));
      scheduler.submit(imageJob('small', 1000));
      scheduler.complete('blocker-2', true);

      const result = scheduler.drain();

      expect(result).toEqual({ admitted: [], timedOut: [], skipped: 2, truncated: true });
      expect(scheduler.status('small')).toBe('queued');
    });

    it('should admit a small job behind large ones within the skip limit', () => {
      const { scheduler } = createHarness([device(0, 10000)], { maxSkipsPerTier: 3 });
      scheduler.submit(imageJob('blocker-1', 9000));
      scheduler.submit(imageJob('blocker-2', 1000));
      scheduler.submit(imageJob('big-1', 5000));
      scheduler.submit(imageJob('big-2', 5000));
      scheduler.submit(imageJob('small', 1000));
      scheduler.complete('blocker-2', true);

      const result = scheduler.drain();

      expect(result).toEqual({ admitted: ['small'], timedOut: [], skipped: 2, truncated: false });
      expect(scheduler.status('big-1')).toBe('queued');
    });

    it('should fail a job whose tier is full', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000)], { tierCapacity: { batch: 1 } });
      ledger.tryReserve(0, 'external', 10000, 'normal');

      scheduler.submit(imageJob('first', 1000, 'batch'));
      const id = scheduler.submit(imageJob('second', 1000, 'batch'));

      expect(id).toBe('second');
      expect(scheduler.status('first')).toBe('queued');
      expect(scheduler.getJob('second')?.failureReason).toBe('QUEUE_FULL: Queue tier batch is full (capacity 1)');
      expect(scheduler.getMetrics().counters.rejectedQueueFull).toBe(1);
    });
  });

  describe('cancel', () => {
    it('should cancel a queued job', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000)]);
      ledger.tryReserve(0, 'external', 10000, 'normal');
      scheduler.submit(imageJob('job-a', 1000));

      expect(scheduler.cancel('job-a')).toBe(true);
      expect(scheduler.status('job-a')).toBe('cancelled');
      expect(scheduler.getQueueDepth().total).toBe(0);
    });

    it('should release an admitted job and let the queue move', async () => {
      const executor = new RecordingExecutor();
      const { ledger, scheduler } = createHarness([device(0, 10000)], { executor });
      scheduler.submit(imageJob('running', 10000));
      scheduler.submit(imageJob('waiting', 5000));
      scheduler.markRunning('running');

      expect(scheduler.cancel('running')).toBe(true);
      expect(ledger.getReservation('running')).toBeUndefined();

      await flushMicrotasks();
      expect(executor.stopped).toEqual([{ jobId: 'running', reason: 'cancelled' }]);
      expect(scheduler.status('waiting')).toBe('admitted');
    });

    it('should refuse finished and unknown jobs', () => {
      const { scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('job-a', 1000));
      scheduler.complete('job-a', true);

      expect(scheduler.cancel('job-a')).toBe(false);
      expect(scheduler.cancel('missing')).toBe(false);
      expect(() => scheduler.status('missing')).toThrow(UnknownJobError);
    });
  });

  describe('completion', () => {
    it('should record device faults against the device', () => {
      const { registry, scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('job-a', 1000));
      scheduler.submit(imageJob('job-b', 1000));

      scheduler.complete('job-a', false, { reason: 'cuda out of memory', deviceFault: true });
      scheduler.complete('job-b', false);

      expect(registry.errorCount(0, 60000)).toBe(1);
      expect(scheduler.getJob('job-a')?.failureReason).toBe('cuda out of memory');
      expect(scheduler.getJob('job-b')?.failureReason).toBe('execution failed');
      expect(scheduler.complete('job-a', true)).toBe(false);
    });

    it('should track running acknowledgements', () => {
      const { clock, scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('job-a', 1000));
      clock.advance(250);

      expect(scheduler.markRunning('job-a')).toBe(true);
      expect(scheduler.getJob('job-a')?.startedAt).toBe(clock.now());
      expect(scheduler.markRunning('job-a')).toBe(false);
    });

    it('should fail a job whose dispatch throws', async () => {
      const executor: JobExecutor = {
        dispatch: () => {
          throw new Error('worker pool offline');
        },
        stop: () => undefined,
      };
      const { ledger, scheduler } = createHarness([device(0, 10000)], { executor });

      scheduler.submit(imageJob('job-a', 1000));
      await flushMicrotasks();

      expect(scheduler.status('job-a')).toBe('failed');
      expect(scheduler.getJob('job-a')?.failureReason).toBe('dispatch failed: worker pool offline');
      expect(ledger.reservedVram(0)).toBe(0);
    });
  });

  describe('forceRelease', () => {
    it('should release the reservation and fail the job', async () => {
      const executor = new RecordingExecutor();
      const { ledger, scheduler } = createHarness([device(0, 10000)], { executor });
      scheduler.submit(imageJob('job-a', 4000));

      const reservation = scheduler.forceRelease('job-a');

      expect(reservation.vramBytes).toBe(4000);
      expect(ledger.freeVram(0)).toBe(10000);
      expect(scheduler.getJob('job-a')?.failureReason).toBe('force released');
      await flushMicrotasks();
      expect(executor.stopped).toEqual([{ jobId: 'job-a', reason: 'force released' }]);
    });

    it('should refuse a job without a reservation', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000)]);
      ledger.tryReserve(0, 'external', 10000, 'normal');
      scheduler.submit(imageJob('job-a', 1000));

      expect(() => scheduler.forceRelease('job-a')).toThrow('Cannot force release job job-a in state queued');
    });
  });

  describe('submit validation', () => {
    it('should reject a malformed request', () => {
      const { scheduler } = createHarness([device(0, 10000)]);

      let caught: unknown;
      try {
        scheduler.submit({ kind: 'image', params: {} });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      const paths = caught instanceof ValidationError ? caught.errors.map((error) => error.path) : [];
      expect(paths).toContain('params.prompt');
    });

    it('should reject an unknown kind', () => {
      const { scheduler } = createHarness([device(0, 10000)]);

      expect(() => scheduler.submit({ kind: 'hologram', params: {} })).toThrow(ValidationError);
    });

    it('should reject a duplicate id', () => {
      const { scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('job-a', 1000));

      expect(() => scheduler.submit(imageJob('job-a', 1000))).toThrow('Job job-a already exists');
    });

    it('should size jobs with the estimator and generate ids', () => {
      const { scheduler } = createHarness([device(0, 100000)], {
        estimator: { estimate: () => 4321 },
        generateId: () => 'generated-1',
      });

      const id = scheduler.submit({ kind: 'speech', params: { text: 'hello' } });

      expect(id).toBe('generated-1');
      const job = scheduler.getJob(id);
      expect(job?.vramEstimate).toBe(4321);
      expect(job?.priorityTier).toBe('normal');
      expect(job?.kind).toBe('speech');
    });
  });

  describe('estimator output', () => {
    it('should reject a fractional estimate without keeping the job', () => {
      const { scheduler } = createHarness([device(0, 100000)], { estimator: { estimate: () => 1000.5 } });

      expect(() => scheduler.submit({ kind: 'speech', id: 'X', params: { text: 'hello' } })).toThrow(
        'Invalid VRAM estimate 1000.5 for job X'
      );
      expect(scheduler.getJob('X')).toBeUndefined();
      expect(scheduler.getQueueDepth().total).toBe(0);

      scheduler.submit({ kind: 'speech', id: 'X', vramEstimate: 1000, params: { text: 'hello' } });
      expect(scheduler.status('X')).toBe('admitted');
    });

    it('should reject a zero estimate', () => {
      const { scheduler } = createHarness([device(0, 100000)], { estimator: { estimate: () => 0 } });

      expect(() => scheduler.submit({ kind: 'speech', params: { text: 'hello' } })).toThrow(ValidationError);
      expect(scheduler.getMetrics().trackedJobs).toBe(0);
    });
  });

  describe('with live telemetry', () => {
    it('should admit a waiting job as soon as a running job is cancelled', async () => {
      const { registry, ledger, scheduler } = createHarness([device(0, 20000)]);
      scheduler.submit(imageJob('A', 12000));
      scheduler.markRunning('A');
      registry.updateMetrics(0, { utilizationPct: 90, temperatureC: 60, usedVram: 12000 });
      scheduler.submit(imageJob('B', 12000));
      expect(scheduler.status('B')).toBe('queued');

      expect(scheduler.cancel('A')).toBe(true);
      expect(ledger.freeVram(0)).toBe(20000);
      await flushMicrotasks();

      expect(scheduler.status('B')).toBe('admitted');
      expect(scheduler.getJob('B')?.deviceId).toBe(0);
    });

    it('should admit a waiting job when completion is reported before the next reading', async () => {
      const { registry, scheduler } = createHarness([device(0, 20000)]);
      scheduler.submit(imageJob('A', 12000));
      registry.updateMetrics(0, { utilizationPct: 90, temperatureC: 60, usedVram: 19000 });
      scheduler.submit(imageJob('B', 8000));
      expect(scheduler.status('B')).toBe('admitted');
      scheduler.submit(imageJob('C', 12000));

      scheduler.complete('A', true);
      await flushMicrotasks();

      expect(scheduler.status('C')).toBe('admitted');
      expect(registry.getDevice(0)?.usedVram).toBe(20000);
    });

    it('should place failed-over jobs on capacity freed after the failover', async () => {
      const { registry, scheduler } = createHarness([device(0, 10000), device(1, 10000)]);
      scheduler.submit(imageJob('j1', 8000));
      scheduler.submit(imageJob('j2', 8000));
      scheduler.submit(imageJob('q', 8000));
      expect(scheduler.getJob('j1')?.deviceId).toBe(0);
      expect(scheduler.getJob('j2')?.deviceId).toBe(1);
      registry.updateMetrics(1, { utilizationPct: 70, temperatureC: 55, usedVram: 9000 });

      registry.markUnhealthy(0, 'ecc errors');
      await flushMicrotasks();
      expect(scheduler.status('j1')).toBe('queued');

      scheduler.complete('j2', true);
      await flushMicrotasks();

      expect(scheduler.getJob('j1')?.deviceId).toBe(1);
      expect(scheduler.getJob('j1')?.attempt).toBe(2);
      expect(scheduler.status('q')).toBe('queued');
    });

    it('should run a drain pass after a rebalance eviction', async () => {
      const { ledger, optimizer, scheduler } = createHarness([device(0, 10000), device(1, 10000)]);
      ledger.addResidentModel({ name: 'idle', deviceId: 0, vramBytes: 6000, lastUsedAt: 0, baseline: false });
      scheduler.submit(imageJob('huge', 20000));
      const drained = vi.fn();
      scheduler.on('drainCompleted', drained);

      expect(optimizer.rebalance().evicted.map((model) => model.name)).toEqual(['idle']);
      await flushMicrotasks();

      expect(drained).toHaveBeenCalledTimes(1);
      expect(drained).toHaveBeenCalledWith({ admitted: [], timedOut: [], skipped: 1, truncated: false });
    });
  });

  describe('shutdown', () => {
    it('should fail queued jobs and report live reservations', () => {
      const { ledger, scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('running', 10000));
      scheduler.submit(imageJob('waiting', 1000));

      const report = scheduler.shutdown();

      expect(report.failedQueued).toEqual(['waiting']);
      expect(report.lostReservations.map((reservation) => reservation.jobId)).toEqual(['running']);
      expect(scheduler.getJob('waiting')?.failureReason).toBe('shutdown');
      expect(ledger.reservedVram(0)).toBe(10000);
      expect(scheduler.isClosed()).toBe(true);

      let caught: unknown;
      try {
        scheduler.submit(imageJob('late', 1000));
      } catch (err) {
        caught = err;
      }
      expect(caught instanceof GatewayError ? caught.code : undefined).toBe('SCHEDULER_CLOSED');
    });
  });

  describe('introspection', () => {
    it('should report per-device accounting', () => {
      const { ledger, registry, scheduler } = createHarness([device(0, 10000)]);
      ledger.addResidentModel({ name: 'flux', deviceId: 0, vramBytes: 2000, lastUsedAt: 0, baseline: true });
      registry.updateMetrics(0, { utilizationPct: 30, temperatureC: 60, usedVram: 1000 });
      scheduler.submit(imageJob('job-a', 3000));

      expect(scheduler.getDeviceTable()).toEqual([
        {
          id: 0,
          name: 'gpu-0',
          totalVram: 10000,
          freeVram: 5000,
          usedVram: 5000,
          reservedVram: 3000,
          residentVram: 2000,
          utilizationPct: 30,
          temperatureC: 60,
          healthy: true,
          unhealthyReason: undefined,
          activeJobs: 1,
        },
      ]);
    });

    it('should expose queue position and wait time', () => {
      const { clock, ledger, scheduler } = createHarness([device(0, 10000)]);
      ledger.tryReserve(0, 'external', 10000, 'normal');
      scheduler.submit(imageJob('first', 1000));
      scheduler.submit(imageJob('second', 1000));
      clock.advance(400);

      const view: JobView | undefined = scheduler.getJob('second');

      expect(view?.queuePosition).toBe(1);
      expect(view?.waitedMs).toBe(400);
      expect(Object.isFrozen(view)).toBe(true);
    });

    it('should report the work queued ahead of a job', () => {
      const { scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('blocker', 10000));
      scheduler.submit(imageJob('n1', 3000, 'normal'));
      scheduler.submit(imageJob('h1', 2000, 'high'));
      scheduler.submit(imageJob('n2', 4000, 'normal'));
      scheduler.submit(imageJob('b1', 1000, 'batch'));

      expect(scheduler.queueAhead('n2')).toEqual({ jobs: 2, vramBytes: 5000 });
      expect(scheduler.queueAhead('h1')).toEqual({ jobs: 0, vramBytes: 0 });
      expect(scheduler.queueAhead('b1')).toEqual({ jobs: 3, vramBytes: 9000 });
      expect(scheduler.queueAhead('blocker')).toBeUndefined();
      expect(() => scheduler.queueAhead('missing')).toThrow(UnknownJobError);
    });

    it('should hand out frozen copies of job parameters', () => {
      const { scheduler } = createHarness([device(0, 10000)]);
      scheduler.submit(imageJob('job-a', 1000));

      const view = scheduler.getJob('job-a');
      const again = scheduler.getJob('job-a');

      expect(view !== undefined && Object.isFrozen(view.params)).toBe(true);
      expect(again?.params).not.toBe(view?.params);
      expect(again?.params).toEqual(view?.params);
    });

    it('should forget terminal jobs after retention', () => {
      const { clock, scheduler } = createHarness([device(0, 10000)], { jobRetentionMs: 1000 });
      scheduler.submit(imageJob('job-a', 1000));
      scheduler.complete('job-a', true);

      clock.advance(999);
      scheduler.sweep();
      expect(scheduler.getJob('job-a')?.state).toBe('completed');

      clock.advance(1);
      scheduler.sweep();
      expect(scheduler.getJob('job-a')).toBeUndefined();
    });
  });

  it('should keep ledger invariants across a mixed workload', async () => {
    const { ledger, scheduler } = createHarness([device(0, 20000), device(1, 12000)]);
    let seed = 7;
    const nextRandom = (): number => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };
    const tiers = ['realtime', 'high', 'normal', 'batch'] as const;
    const ids: string[] = [];

    for (let i = 0; i < 200; i++) {
      const roll = nextRandom();
      if (roll < 0.5 || ids.length === 0) {
        const tier = tiers[Math.floor(nextRandom() * tiers.length)] ?? 'normal';
        const id = `job-${i}`;
        scheduler.submit(imageJob(id, 1000 + Math.floor(nextRandom() * 9000), tier));
        ids.push(id);
      } else {
        const id = ids[Math.floor(nextRandom() * ids.length)] ?? 'job-0';
        if (roll < 0.8) {
          scheduler.complete(id, nextRandom() < 0.7);
        } else {
          scheduler.cancel(id);
        }
      }
      if (i % 10 === 0) {
        await flushMicrotasks();
      }

      expect(ledger.verifyInvariants()).toEqual([]);
      expect(ledger.reservedVram(0)).toBeLessThanOrEqual(20000);
      expect(ledger.reservedVram(1)).toBeLessThanOrEqual(12000);
      for (const reservation of ledger.allReservations()) {
        const state = scheduler.status(reservation.jobId);
        expect(state === 'admitted' || state === 'running').toBe(true);
      }
    }
  });

  it('should sweep timed-out jobs on a timer', () => {
    vi.useFakeTimers();
    try {
      const { clock, scheduler } = createHarness([device(0, 10000)], {
        maxQueueWaitMs: 1000,
        timeoutSweepIntervalMs: 100,
      });
      scheduler.submit(imageJob('blocker', 10000));
      scheduler.submit(imageJob('late', 1000));

      scheduler.start();
      clock.advance(2000);
      vi.advanceTimersByTime(100);
      scheduler.stop();

      expect(scheduler.status('late')).toBe('failed');
    } finally {
      vi.useRealTimers();
    }
  });
});
