/**
 * Type exports
 */

export * from './devices.js';
export * from './jobs.js';
export * from './schemas/index.js';
