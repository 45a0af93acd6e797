/**
 * Tiered Job Queue
 *
 * Four FIFO tiers dequeued in strict order: realtime > high > normal > batch.
 * Within a tier jobs leave in arrival order, except for failover requeues
 * which go to the head.
 *
 * Holds job references only; admission decisions live in the scheduler.
 */

import { PRIORITY_TIERS, type PriorityTier } from '../types/devices.js';
import { InvalidJobStateError, QueueFullError } from '../utils/errors.js';

/**
 * Minimum shape of a queued item
 */
export interface QueueableJob {
  readonly id: string;
  readonly priorityTier: PriorityTier;
}

export type QueueDepth = Record<PriorityTier, number> & { total: number };

export type TierCapacity = Partial<Record<PriorityTier, number>>;

export class TieredJobQueue<T extends QueueableJob> {
  private readonly tiers = new Map<PriorityTier, T[]>();
  private readonly index = new Map<string, PriorityTier>();
  private readonly capacity: TierCapacity;

  constructor(capacity: TierCapacity = {}) {
    this.capacity = capacity;
    for (const tier of PRIORITY_TIERS) {
      this.tiers.set(tier, []);
    }
  }

  /**
   * Append to the tail of the job's tier
   *
   * @throws QueueFullError when the tier is at capacity
   */
  public enqueue(job: T): void {
    this.assertAbsent(job.id);
    const tier = this.tier(job.priorityTier);
    const limit = this.capacity[job.priorityTier];
    if (limit !== undefined && tier.length >= limit) {
      throw new QueueFullError(job.priorityTier, limit);
    }
    tier.push(job);
    this.index.set(job.id, job.priorityTier);
  }

  /**
   * Put a job back at the head of its tier. Never rejected for capacity.
   */
  public requeueFront(job: T): void {
    this.assertAbsent(job.id);
    this.tier(job.priorityTier).unshift(job);
    this.index.set(job.id, job.priorityTier);
  }

  /**
   * Remove and return the head of the highest non-empty tier
   */
  public dequeue(): T | undefined {
    for (const name of PRIORITY_TIERS) {
      const job = this.tier(name).shift();
      if (job) {
        this.index.delete(job.id);
        return job;
      }
    }
    return undefined;
  }

  public peek(): T | undefined {
    for (const name of PRIORITY_TIERS) {
      const job = this.tier(name)[0];
      if (job) {
        return job;
      }
    }
    return undefined;
  }

  public remove(jobId: string): T | undefined {
    const tierName = this.index.get(jobId);
    if (!tierName) {
      return undefined;
    }
    const tier = this.tier(tierName);
    const position = tier.findIndex((job) => job.id === jobId);
    this.index.delete(jobId);
    if (position < 0) {
      return undefined;
    }
    const [removed] = tier.splice(position, 1);
    return removed;
  }

  public has(jobId: string): boolean {
    return this.index.has(jobId);
  }

  /**
   * 0-based position inside the job's tier, or -1
   */
  public positionOf(jobId: string): number {
    const tierName = this.index.get(jobId);
    if (!tierName) {
      return -1;
    }
    return this.tier(tierName).findIndex((job) => job.id === jobId);
  }

  /**
   * Copy of a tier, head first
   */
  public tierEntries(tier: PriorityTier): T[] {
    return [...this.tier(tier)];
  }

  public depth(): QueueDepth {
    const depth: QueueDepth = { realtime: 0, high: 0, normal: 0, batch: 0, total: 0 };
    for (const name of PRIORITY_TIERS) {
      const count = this.tier(name).length;
      depth[name] = count;
      depth.total += count;
    }
    return depth;
  }

  public get size(): number {
    return this.index.size;
  }

  /**
   * Empty every tier and return what was queued, in dequeue order
   */
  public clear(): T[] {
    const drained: T[] = [];
    for (const name of PRIORITY_TIERS) {
      drained.push(...this.tier(name));
      this.tiers.set(name, []);
    }
    this.index.clear();
    return drained;
  }

  private tier(name: PriorityTier): T[] {
    let tier = this.tiers.get(name);
    if (!tier) {
      tier = [];
      this.tiers.set(name, tier);
    }
    return tier;
  }

  private assertAbsent(jobId: string): void {
    if (this.index.has(jobId)) {
      throw new InvalidJobStateError(jobId, 'queued', 'enqueue');
    }
  }
}
