import type { RawDeviceReading, RawHostReading } from "../sources/types.js";
import { InvalidReadingError } from "../utils/errors.js";
import { classify } from "./thresholds.js";
import type { ThresholdTable } from "./thresholds.js";
import type { MetricRecord, MetricType } from "./types.js";

export interface CycleStamp {
  cycleId: number;
  timestamp: number;
}

export interface NormalizeContext extends CycleStamp {
  thresholds: ThresholdTable;
}

export interface NormalizedReading {
  records: MetricRecord[];
  clampedCount: number;
  invalid: InvalidReadingError[];
}

/** Physically sensible GPU core temperature range, °C */
export const TEMPERATURE_BOUNDS = { min: 0, max: 150 } as const;

class RecordBuilder {
  readonly result: NormalizedReading = {
    records: [],
    clampedCount: 0,
    invalid: [],
  };

  constructor(
    private context: NormalizeContext,
    private deviceId?: string
  ) {}

  percentage(metric: MetricType, raw: number | null): void {
    if (raw === null) return;
    if (!Number.isFinite(raw)) {
      this.reject(metric, raw);
      return;
    }
    const clamped = Math.min(100, Math.max(0, raw));
    if (clamped !== raw) {
      this.result.clampedCount++;
    }
    this.emit(metric, clamped);
  }

  bounded(
    metric: MetricType,
    raw: number | null,
    bounds: { min: number; max: number }
  ): void {
    if (raw === null) return;
    if (!Number.isFinite(raw) || raw < bounds.min || raw > bounds.max) {
      this.reject(metric, raw);
      return;
    }
    this.emit(metric, raw);
  }

  reject(metric: MetricType, raw: number): void {
    this.result.invalid.push(new InvalidReadingError(metric, raw, this.deviceId));
  }

  private emit(metric: MetricType, value: number): void {
    const record: MetricRecord = {
      timestamp: this.context.timestamp,
      cycleId: this.context.cycleId,
      metric,
      value,
      status: classify(this.context.thresholds, metric, value),
      ...(this.deviceId !== undefined ? { deviceId: this.deviceId } : {}),
    };
    this.result.records.push(Object.freeze(record));
  }
}

/**
 * Draw as a share of rated power, or null when the rating is unknown.
 * Negative draw is not physically possible and is reported as invalid.
 */
function powerPercentage(
  builder: RecordBuilder,
  drawW: number | null,
  ratedMaxW: number | null
): void {
  if (drawW === null || ratedMaxW === null || !(ratedMaxW > 0)) return;
  if (!Number.isFinite(drawW) || drawW < 0) {
    builder.reject("power_pct", drawW);
    return;
  }
  builder.percentage("power_pct", (drawW / ratedMaxW) * 100);
}

function memoryUtilization(reading: RawDeviceReading): number | null {
  if (reading.memUtilPct !== null) return reading.memUtilPct;
  const { memoryUsedMiB, memoryTotalMiB } = reading;
  if (memoryUsedMiB === null || memoryTotalMiB === null || memoryTotalMiB <= 0) {
    return null;
  }
  return (memoryUsedMiB / memoryTotalMiB) * 100;
}

export function normalizeDevice(
  reading: RawDeviceReading,
  context: NormalizeContext
): NormalizedReading {
  const builder = new RecordBuilder(context, reading.deviceId);

  builder.percentage("gpu_util", reading.gpuUtilPct);
  builder.percentage("mem_util", memoryUtilization(reading));
  powerPercentage(builder, reading.powerDrawW, reading.ratedMaxPowerW);
  builder.bounded("temp_c", reading.temperatureC, TEMPERATURE_BOUNDS);

  return builder.result;
}

export function normalizeHost(
  reading: RawHostReading,
  context: NormalizeContext
): NormalizedReading {
  const builder = new RecordBuilder(context);

  builder.percentage("cpu_util", reading.cpuUtilPct);
  builder.percentage("ram_util", reading.ramUtilPct);

  return builder.result;
}

export function mergeNormalized(parts: NormalizedReading[]): NormalizedReading {
  return {
    records: parts.flatMap((p) => p.records),
    clampedCount: parts.reduce((sum, p) => sum + p.clampedCount, 0),
    invalid: parts.flatMap((p) => p.invalid),
  };
}
