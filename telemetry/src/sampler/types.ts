import type { Device, MetricRecord } from "../metrics/types.js";
import type {
  DeviceQueryError,
  InvalidReadingError,
  SourceUnavailableError,
} from "../utils/errors.js";

export type SamplerState = "idle" | "polling" | "normalizing" | "publishing";

export interface SamplerTotals {
  cyclesCompleted: number;
  degradedCycles: number;
  clampedCount: number;
  invalidCount: number;
  deviceErrorCounts: Record<string, number>;
}

/**
 * Everything one completed cycle produced, handed to the publisher.
 */
export interface CycleReport {
  cycleId: number;
  timestamp: number;
  durationMs: number;
  degraded: boolean;
  records: MetricRecord[];
  deviceErrors: Map<string, DeviceQueryError>;
  unavailableSources: Map<string, SourceUnavailableError>;
  clampedCount: number;
  invalid: InvalidReadingError[];
  added: Device[];
  retired: Device[];
  totals: SamplerTotals;
}

export interface CyclePublisher {
  publish(report: CycleReport): void;
}
