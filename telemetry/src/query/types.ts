import type {
  Device,
  MetricRecord,
  MetricType,
  SeriesTarget,
} from "../metrics/types.js";

export interface SeriesHistory {
  readonly target: SeriesTarget;
  readonly metric: MetricType;
  readonly records: readonly MetricRecord[];
}

/**
 * Read-only view of one published cycle. Every record in `latest` carries
 * this snapshot's `cycleId`; devices that failed or were skipped this cycle
 * have no entry there.
 */
export interface Snapshot {
  readonly cycleId: number;
  readonly timestamp: number | null;
  readonly degraded: boolean;
  readonly devices: readonly Readonly<Device>[];
  readonly latest: readonly MetricRecord[];
  readonly history?: readonly SeriesHistory[];
}

export interface Diagnostics {
  readonly cycleId: number;
  readonly degraded: boolean;
  readonly perDeviceErrors: Readonly<Record<string, string>>;
  readonly unavailableSources: Readonly<Record<string, string>>;
  readonly deviceErrorCounts: Readonly<Record<string, number>>;
  readonly clampedCount: number;
  readonly invalidCount: number;
  readonly cyclesCompleted: number;
  readonly degradedCycles: number;
  readonly lastCycleDurationMs: number | null;
}
