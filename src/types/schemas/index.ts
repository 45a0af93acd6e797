/**
 * Zod schema exports
 *
 * @module schemas
 */

export * from './job.js';
export * from './config.js';
export * from './telemetry.js';
