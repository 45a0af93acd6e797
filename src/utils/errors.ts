/**
 * Error types for the GPU scheduler
 *
 * Capacity conditions (insufficient capacity, unhealthy device, failed
 * eviction) are recoverable: the scheduler turns them into queuing. Ledger
 * invariant violations are programming errors and reject the operation.
 */

import type { ZodError } from 'zod';

export type GatewayErrorCode =
  | 'INSUFFICIENT_CAPACITY'
  | 'UNKNOWN_DEVICE'
  | 'QUEUE_TIMEOUT'
  | 'QUEUE_FULL'
  | 'DEVICE_UNHEALTHY'
  | 'EVICTION_FAILED'
  | 'LEDGER_INVARIANT'
  | 'UNKNOWN_JOB'
  | 'INVALID_JOB_STATE'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'SCHEDULER_CLOSED';

/**
 * Base error class for scheduler errors
 */
export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly timestamp: number;

  constructor(
    message: string,
    code: GatewayErrorCode,
    context: Record<string, unknown> = {},
    retryable = false,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.context = context;
    this.retryable = retryable;
    this.timestamp = Date.now();
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        context: this.context,
        retryable: this.retryable,
        timestamp: this.timestamp,
      },
    };
  }
}

/**
 * No device can hold the requested VRAM (after eviction, if any)
 */
export class InsufficientCapacityError extends GatewayError {
  constructor(
    public readonly deviceId: number | undefined,
    public readonly requestedBytes: number,
    public readonly availableBytes: number
  ) {
    super(
      deviceId === undefined
        ? `No device can hold ${requestedBytes} bytes`
        : `Device ${deviceId} has ${availableBytes} bytes free, ${requestedBytes} requested`,
      'INSUFFICIENT_CAPACITY',
      { deviceId, requestedBytes, availableBytes },
      true
    );
    this.name = 'InsufficientCapacityError';
  }
}

/**
 * Stale device id (metrics race, device removed)
 */
export class UnknownDeviceError extends GatewayError {
  constructor(public readonly deviceId: number) {
    super(`Unknown device: ${deviceId}`, 'UNKNOWN_DEVICE', { deviceId });
    this.name = 'UnknownDeviceError';
  }
}

export class QueueTimeoutError extends GatewayError {
  constructor(
    public readonly jobId: string,
    public readonly waitedMs: number,
    public readonly maxWaitMs: number
  ) {
    super(
      `Job ${jobId} waited ${waitedMs}ms in queue (max ${maxWaitMs}ms)`,
      'QUEUE_TIMEOUT',
      { jobId, waitedMs, maxWaitMs }
    );
    this.name = 'QueueTimeoutError';
  }
}

export class QueueFullError extends GatewayError {
  constructor(public readonly tier: string, public readonly capacity: number) {
    super(`Queue tier ${tier} is full (capacity ${capacity})`, 'QUEUE_FULL', { tier, capacity }, true);
    this.name = 'QueueFullError';
  }
}

/**
 * The device is quarantined. Treated as insufficient capacity for queuing.
 */
export class DeviceUnhealthyError extends GatewayError {
  constructor(public readonly deviceId: number, reason?: string) {
    super(
      `Device ${deviceId} is unhealthy${reason ? `: ${reason}` : ''}`,
      'DEVICE_UNHEALTHY',
      { deviceId, reason },
      true
    );
    this.name = 'DeviceUnhealthyError';
  }
}

export class EvictionFailedError extends GatewayError {
  constructor(
    public readonly deviceId: number,
    public readonly neededBytes: number,
    public readonly reachableBytes: number
  ) {
    super(
      `Eviction on device ${deviceId} can reach ${reachableBytes} free bytes, ${neededBytes} needed`,
      'EVICTION_FAILED',
      { deviceId, neededBytes, reachableBytes },
      true
    );
    this.name = 'EvictionFailedError';
  }
}

/**
 * An operation would corrupt the ledger. Always a bug in the caller.
 */
export class LedgerInvariantError extends GatewayError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'LEDGER_INVARIANT', context);
    this.name = 'LedgerInvariantError';
  }
}

export class UnknownJobError extends GatewayError {
  constructor(public readonly jobId: string) {
    super(`Unknown job: ${jobId}`, 'UNKNOWN_JOB', { jobId });
    this.name = 'UnknownJobError';
  }
}

export class InvalidJobStateError extends GatewayError {
  constructor(
    public readonly jobId: string,
    public readonly state: string,
    operation: string
  ) {
    super(`Cannot ${operation} job ${jobId} in state ${state}`, 'INVALID_JOB_STATE', {
      jobId,
      state,
      operation,
    });
    this.name = 'InvalidJobStateError';
  }
}

export class ValidationError extends GatewayError {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>
  ) {
    super(message, 'VALIDATION_ERROR', { errors });
    this.name = 'ValidationError';
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join('.') : 'root',
        message: issue.message,
      }))
    );
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', {}, false, cause);
    this.name = 'ConfigurationError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Render an error as the reason string stored on a failed job
 */
export function toFailureReason(error: unknown): string {
  if (isGatewayError(error)) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
