/**
 * Scheduling module exports
 */

export {
  GpuScheduler,
  type DrainResult,
  type GpuSchedulerEvents,
  type GpuSchedulerMetrics,
  type GpuSchedulerOptions,
  type JobExecutor,
  type ShutdownReport,
} from './GpuScheduler.js';
export {
  TieredJobQueue,
  type QueueableJob,
  type QueueDepth,
  type TierCapacity,
} from './TieredJobQueue.js';
export {
  SchedulerMetrics,
  type SchedulerCounters,
  type SchedulerMetricsSnapshot,
  type WaitTimeStats,
} from './SchedulerMetrics.js';
