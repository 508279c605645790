export const GPU_METRICS = [
  "gpu_util",
  "mem_util",
  "power_pct",
  "temp_c",
] as const;

export const HOST_METRICS = ["cpu_util", "ram_util"] as const;

export const METRIC_TYPES = [...GPU_METRICS, ...HOST_METRICS] as const;

export type GpuMetricType = (typeof GPU_METRICS)[number];
export type HostMetricType = (typeof HOST_METRICS)[number];
export type MetricType = GpuMetricType | HostMetricType;

export type Status = "normal" | "warm" | "hot";

/** Series target for host-scoped metrics */
export const HOST_TARGET = "host";

/**
 * A device id, or HOST_TARGET for host-level metrics.
 */
export type SeriesTarget = string;

export interface SeriesKey {
  target: SeriesTarget;
  metric: MetricType;
}

export interface Device {
  id: string;
  name: string;
  ratedMaxPowerW: number | null;
  sourceId: string;
}

export interface MetricRecord {
  readonly timestamp: number;
  readonly cycleId: number;
  readonly metric: MetricType;
  readonly deviceId?: string;
  readonly value: number;
  readonly status: Status;
}

export function isGpuMetric(metric: MetricType): metric is GpuMetricType {
  return (GPU_METRICS as readonly string[]).includes(metric);
}

export function isMetricType(value: string): value is MetricType {
  return (METRIC_TYPES as readonly string[]).includes(value);
}

export function seriesKeyOf(record: MetricRecord): SeriesKey {
  return { target: record.deviceId ?? HOST_TARGET, metric: record.metric };
}

export function formatSeriesKey(key: SeriesKey): string {
  return `${key.target}/${key.metric}`;
}
