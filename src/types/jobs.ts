/**
 * Job model
 *
 * A job is a tagged variant over its kind; each kind carries its own typed
 * parameter payload. Lifecycle:
 *
 *   queued -> admitted -> running -> completed | failed
 *   queued | admitted | running -> cancelled
 *   admitted | running -> queued           (device failover only)
 */

import type { PriorityTier } from './devices.js';
import type { ImageJobParams, SpeechJobParams, VideoJobParams } from './schemas/job.js';

export type JobKind = 'image' | 'video' | 'speech';

export type JobState = 'queued' | 'admitted' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'completed',
  'failed',
  'cancelled',
]);

export type JobVariant =
  | { kind: 'image'; params: ImageJobParams }
  | { kind: 'video'; params: VideoJobParams }
  | { kind: 'speech'; params: SpeechJobParams };

/**
 * Mutable job record owned by the scheduler
 */
export type Job = JobVariant & {
  id: string;
  tenantId?: string;
  priorityTier: PriorityTier;
  vramEstimate: number;
  state: JobState;
  submittedAt: number;
  /** Last time the job entered the queue (submission or failover) */
  queuedAt: number;
  /** Incremented on every admission; lets executors detect stale callbacks */
  attempt: number;
  deviceId?: number;
  admittedAt?: number;
  startedAt?: number;
  finishedAt?: number;
  failureReason?: string;
};

/**
 * Read-only job view handed to callers, executors and event listeners
 */
export type JobView = Readonly<Job> & {
  /** 0-based position inside its tier while queued */
  readonly queuePosition?: number;
  /** Time spent queued: until admission, until now while queued, or until it left the queue */
  readonly waitedMs?: number;
};

/**
 * Queued work that will be considered before a job
 */
export interface QueueAhead {
  jobs: number;
  vramBytes: number;
}

/**
 * Outcome reported by an executor
 */
export interface CompletionOptions {
  reason?: string;
  /** Attempt number the executor was dispatched with */
  attempt?: number;
  /** The failure was caused by the device rather than the job */
  deviceFault?: boolean;
}
