import { METRIC_TYPES } from "./types.js";
import type { MetricType, Status } from "./types.js";

export interface ThresholdBucket {
  status: Status;
  /** Inclusive lower bound */
  min: number;
}

export type ThresholdTable = Record<MetricType, ThresholdBucket[]>;

function buckets(warm: number, hot: number): ThresholdBucket[] {
  return [
    { status: "normal", min: Number.NEGATIVE_INFINITY },
    { status: "warm", min: warm },
    { status: "hot", min: hot },
  ];
}

export const DEFAULT_THRESHOLDS: ThresholdTable = {
  temp_c: buckets(60, 80),
  gpu_util: buckets(70, 90),
  mem_util: buckets(75, 90),
  power_pct: buckets(80, 95),
  cpu_util: buckets(70, 90),
  ram_util: buckets(75, 90),
};

const SEVERITY: Record<Status, number> = { normal: 0, warm: 1, hot: 2 };

/**
 * Orders each metric's buckets by lower bound, then severity, so that
 * classification can take the last bucket whose bound the value reaches.
 */
export function buildThresholdTable(
  overrides: Partial<Record<MetricType, ThresholdBucket[]>> = {}
): ThresholdTable {
  const table = { ...DEFAULT_THRESHOLDS, ...overrides };
  for (const metric of METRIC_TYPES) {
    table[metric] = [...table[metric]].sort(
      (a, b) => a.min - b.min || SEVERITY[a.status] - SEVERITY[b.status]
    );
  }
  return table;
}

export function classify(
  table: ThresholdTable,
  metric: MetricType,
  value: number
): Status {
  let status: Status = "normal";
  for (const bucket of table[metric]) {
    if (value >= bucket.min) {
      status = bucket.status;
    }
  }
  return status;
}
