/**
 * Device, reservation and resident-model types
 *
 * All VRAM quantities are integer byte counts.
 */

/**
 * Priority tiers in dequeue order (highest first)
 */
export const PRIORITY_TIERS = ['realtime', 'high', 'normal', 'batch'] as const;

export type PriorityTier = (typeof PRIORITY_TIERS)[number];

/**
 * Static description of a GPU, as found in configuration
 */
export interface DeviceSpec {
  id: number;
  name: string;
  totalVram: number;
  nvlinkPeers?: number[];
}

/**
 * Live readings pushed by the telemetry collector
 */
export interface DeviceMetrics {
  /** GPU utilization, 0-100 */
  utilizationPct: number;
  temperatureC: number;
  /** VRAM in use as reported by the driver (includes foreign processes) */
  usedVram: number;
}

/**
 * Who put a device into quarantine.
 *
 * Only devices quarantined by the health monitor recover automatically.
 */
export type QuarantineSource = 'monitor' | 'manual';

/**
 * Immutable view of one device
 */
export interface DeviceSnapshot {
  readonly id: number;
  readonly name: string;
  readonly totalVram: number;
  /**
   * max(ledger committed bytes, externally reported bytes), clamped to totalVram
   */
  readonly usedVram: number;
  readonly externalUsedVram: number;
  readonly utilizationPct: number;
  readonly temperatureC: number;
  readonly healthy: boolean;
  readonly unhealthyReason?: string;
  readonly quarantineSource?: QuarantineSource;
  readonly nvlinkPeers: ReadonlySet<number>;
  readonly lastMetricsAt?: number;
}

/**
 * A job's claim on a device's VRAM for the duration of its execution
 */
export interface Reservation {
  readonly jobId: string;
  readonly deviceId: number;
  readonly vramBytes: number;
  readonly createdAt: number;
  readonly priorityTier: PriorityTier;
}

/**
 * A model resident on a device, independent of job reservations.
 *
 * Baseline models form the platform's reserved floor and are never evicted.
 */
export interface LoadedModel {
  readonly name: string;
  readonly deviceId: number;
  readonly vramBytes: number;
  readonly loaded: boolean;
  readonly lastUsedAt: number;
  readonly baseline: boolean;
}

/**
 * Row of the operational device table
 */
export interface DeviceTableRow {
  id: number;
  name: string;
  totalVram: number;
  freeVram: number;
  usedVram: number;
  reservedVram: number;
  residentVram: number;
  utilizationPct: number;
  temperatureC: number;
  healthy: boolean;
  unhealthyReason?: string;
  activeJobs: number;
}

/**
 * Device-level fault categories counted by the health monitor
 */
export type DeviceErrorKind = 'execution' | 'ecc' | 'driver' | 'collection';
