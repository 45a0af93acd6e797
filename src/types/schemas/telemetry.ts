/**
 * Telemetry Schemas
 *
 * Readings arrive from an external collector (NVML exporter, sidecar) and are
 * checked before they touch the registry.
 *
 * @module schemas/telemetry
 */

import { z } from 'zod';

export const DeviceReadingSchema = z.object({
  deviceId: z.number().int().min(0),
  utilizationPct: z.number().min(0).max(100),
  temperatureC: z.number().finite(),
  usedVram: z.number().min(0).finite(),
});

export type DeviceReading = z.infer<typeof DeviceReadingSchema>;
