/**
 * Monitoring Module
 *
 * Device health sweeps and telemetry ingestion.
 */

export {
  HealthMonitor,
  type HealthAlert,
  type HealthMonitorEvents,
  type HealthMonitorOptions,
  type HealthSweepResult,
  type HealthThresholds,
} from './health-monitor.js';

export {
  MetricsIngestor,
  type DeviceTelemetrySource,
  type IngestorStats,
  type MetricsIngestorOptions,
} from './metrics-ingestor.js';
