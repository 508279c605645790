import type { HistoryReader } from "../history/history-store.js";
import { HOST_TARGET } from "../metrics/types.js";
import type {
  MetricRecord,
  MetricType,
  SeriesTarget,
} from "../metrics/types.js";
import type { CyclePublisher, CycleReport } from "../sampler/types.js";
import type { Diagnostics, SeriesHistory, Snapshot } from "./types.js";

const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  cycleId: 0,
  timestamp: null,
  degraded: false,
  devices: Object.freeze([]),
  latest: Object.freeze([]),
});

const EMPTY_DIAGNOSTICS: Diagnostics = Object.freeze({
  cycleId: 0,
  degraded: false,
  perDeviceErrors: Object.freeze({}),
  unavailableSources: Object.freeze({}),
  deviceErrorCounts: Object.freeze({}),
  clampedCount: 0,
  invalidCount: 0,
  cyclesCompleted: 0,
  degradedCycles: 0,
  lastCycleDurationMs: null,
});

export interface SnapshotOptions {
  includeHistory?: boolean;
}

/**
 * Query surface for consumers. Snapshots are built once per cycle at publish
 * time and frozen; readers only ever receive those published objects, so a
 * read can never observe a cycle that is still being applied.
 */
export class SnapshotService implements CyclePublisher {
  private published: Snapshot = EMPTY_SNAPSHOT;
  private publishedWithHistory: Snapshot = EMPTY_SNAPSHOT;
  private lastDiagnostics: Diagnostics = EMPTY_DIAGNOSTICS;

  constructor(private store: HistoryReader) {}

  publish(report: CycleReport): void {
    const devices = this.store.devices().map((d) => Object.freeze(d));
    const targets = new Set<SeriesTarget>([
      HOST_TARGET,
      ...devices.map((d) => d.id),
    ]);
    const keys = this.store
      .seriesKeys()
      .filter((key) => targets.has(key.target));

    const latest: MetricRecord[] = [];
    const history: SeriesHistory[] = [];
    for (const key of keys) {
      const record = this.store.latest(key);
      if (record && record.cycleId === report.cycleId) {
        latest.push(record);
      }
      history.push(
        Object.freeze({
          target: key.target,
          metric: key.metric,
          records: Object.freeze(this.store.window(key)),
        })
      );
    }

    const base = {
      cycleId: report.cycleId,
      timestamp: report.timestamp,
      degraded: report.degraded,
      devices: Object.freeze(devices),
      latest: Object.freeze(latest),
    };

    this.published = Object.freeze(base);
    this.publishedWithHistory = Object.freeze({
      ...base,
      history: Object.freeze(history),
    });
    this.lastDiagnostics = Object.freeze({
      cycleId: report.cycleId,
      degraded: report.degraded,
      perDeviceErrors: Object.freeze(
        Object.fromEntries(
          Array.from(report.deviceErrors, ([id, error]) => [id, error.message])
        )
      ),
      unavailableSources: Object.freeze(
        Object.fromEntries(
          Array.from(report.unavailableSources, ([id, error]) => [
            id,
            error.message,
          ])
        )
      ),
      deviceErrorCounts: Object.freeze({ ...report.totals.deviceErrorCounts }),
      clampedCount: report.totals.clampedCount,
      invalidCount: report.totals.invalidCount,
      cyclesCompleted: report.totals.cyclesCompleted,
      degradedCycles: report.totals.degradedCycles,
      lastCycleDurationMs: report.durationMs,
    });
  }

  currentSnapshot(options: SnapshotOptions = {}): Snapshot {
    return options.includeHistory ? this.publishedWithHistory : this.published;
  }

  /**
   * Latest record of one series in the current snapshot
   */
  latest(target: SeriesTarget, metric: MetricType): MetricRecord | undefined {
    return this.published.latest.find(
      (r) => (r.deviceId ?? HOST_TARGET) === target && r.metric === metric
    );
  }

  /**
   * Bounded history of one series, oldest first. The array is a copy and
   * does not change when later cycles are appended.
   */
  history(target: SeriesTarget, metric: MetricType): MetricRecord[] {
    return this.store.window({ target, metric });
  }

  diagnostics(): Diagnostics {
    return this.lastDiagnostics;
  }
}
