export { GpuGateway, createGpuGateway, createGpuGatewayFromConfig } from './api/gateway.js';
export type { GatewayDependencies, GatewayOptions, ModelPlacement, SchedulerTuning } from './api/gateway.js';

export { DeviceRegistry } from './core/device-registry.js';
export type {
  CommittedVramSource,
  DeviceRegistryEvents,
  DeviceRegistryOptions,
} from './core/device-registry.js';
export { AllocationLedger, type AllocationLedgerOptions } from './core/allocation-ledger.js';
export { VramOptimizer } from './core/vram-optimizer.js';
export type {
  EvictionReason,
  ModelLoadRequest,
  ModelRuntime,
  RebalanceResult,
  VramOptimizerEvents,
  VramOptimizerOptions,
} from './core/vram-optimizer.js';
export { ProfileVramEstimator, type VramEstimator, type VramProfile } from './core/vram-estimator.js';

export * from './scheduling/index.js';
export * from './monitoring/index.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  toGatewayOptions,
  type Environment,
} from './config/loader.js';

export * from './utils/errors.js';
export * from './types/index.js';
