import type { DeviceQueryError } from "../utils/errors.js";

export interface RawDeviceReading {
  deviceId: string;
  name: string;
  ratedMaxPowerW: number | null;
  gpuUtilPct: number | null;
  memUtilPct: number | null;
  powerDrawW: number | null;
  temperatureC: number | null;
  memoryUsedMiB: number | null;
  memoryTotalMiB: number | null;
}

export interface RawHostReading {
  cpuUtilPct: number | null;
  ramUtilPct: number | null;
}

/**
 * Result of one successful source poll. Per-device failures travel in
 * `errors` alongside the readings that did succeed.
 */
export interface SourceReading {
  devices: RawDeviceReading[];
  host: RawHostReading | null;
  errors: Map<string, DeviceQueryError>;
}

export interface PollContext {
  signal?: AbortSignal;
}

interface SourceBase {
  readonly id: string;
  poll(context: PollContext): Promise<SourceReading>;
}

export interface GpuSource extends SourceBase {
  readonly kind: "gpu";
}

export interface HostSource extends SourceBase {
  readonly kind: "host";
}

export type MetricSource = GpuSource | HostSource;

export function emptyReading(): SourceReading {
  return { devices: [], host: null, errors: new Map() };
}
