/**
 * TelemetryService - wires sources, store, sampler and query surface
 * together and owns their lifecycle
 */

import type { TelemetryConfig } from "./config.js";
import { HistoryStore } from "./history/history-store.js";
import type { MetricRecord, MetricType, SeriesTarget } from "./metrics/types.js";
import type { Diagnostics, Snapshot } from "./query/types.js";
import { SnapshotService } from "./query/snapshot-service.js";
import type { SnapshotOptions } from "./query/snapshot-service.js";
import { Sampler } from "./sampler/sampler.js";
import type { CycleReport } from "./sampler/types.js";
import { NvidiaSmiSource } from "./sources/nvidia-smi-source.js";
import { OsHostSource } from "./sources/os-host-source.js";
import type { MetricSource } from "./sources/types.js";
import type { CommandRunner } from "./utils/command.js";
import { createComponentLogger } from "./utils/logger.js";

const log = createComponentLogger("telemetry-service");

export interface TelemetryServiceDeps {
  /** Replaces the sources built from config */
  sources?: MetricSource[];
  runner?: CommandRunner;
  now?: () => number;
}

export function createSources(
  config: TelemetryConfig,
  runner?: CommandRunner
): MetricSource[] {
  const sources: MetricSource[] = [];
  if (config.enableGpu) {
    sources.push(
      new NvidiaSmiSource({
        binaryPath: config.nvidiaSmiPath,
        deviceQueryTimeoutMs: config.deviceQueryTimeoutMs,
        listTimeoutMs: config.deviceQueryTimeoutMs,
        maxParallelQueries: config.maxParallelQueries,
        runner,
      })
    );
  }
  if (config.enableHost) {
    sources.push(new OsHostSource());
  }
  return sources;
}

export class TelemetryService {
  private store: HistoryStore;
  private snapshots: SnapshotService;
  private sampler: Sampler;
  private sources: MetricSource[];

  constructor(private config: TelemetryConfig, deps: TelemetryServiceDeps = {}) {
    this.sources = deps.sources ?? createSources(config, deps.runner);
    this.store = new HistoryStore({
      capacity: config.historyCapacity,
      retireAfterMisses: config.retireAfterMisses,
    });
    this.snapshots = new SnapshotService(this.store);
    this.sampler = new Sampler({
      sources: this.sources,
      store: this.store,
      publisher: this.snapshots,
      thresholds: config.thresholds,
      intervalMs: config.pollIntervalMs,
      sourceTimeoutMs: config.sourceTimeoutMs,
      now: deps.now,
    });
  }

  /**
   * Probe sources and start sampling
   */
  async start(): Promise<void> {
    log.info(
      {
        sources: this.sources.map((s) => `${s.kind}:${s.id}`),
        historyCapacity: this.config.historyCapacity,
      },
      "Starting telemetry service"
    );

    for (const source of this.sources) {
      if (source instanceof NvidiaSmiSource) {
        await source.detect();
      }
    }

    this.sampler.start();
  }

  /**
   * Stop sampling; resolves after the in-flight cycle is published
   */
  async shutdown(): Promise<void> {
    log.info("Shutting down telemetry service");
    await this.sampler.stop();
    log.info("Telemetry service shut down");
  }

  onCycle(listener: (report: CycleReport) => void): () => void {
    this.sampler.on("cycle", listener);
    return () => {
      this.sampler.off("cycle", listener);
    };
  }

  runCycle(): Promise<CycleReport> {
    return this.sampler.runCycle();
  }

  currentSnapshot(options?: SnapshotOptions): Snapshot {
    return this.snapshots.currentSnapshot(options);
  }

  history(target: SeriesTarget, metric: MetricType): MetricRecord[] {
    return this.snapshots.history(target, metric);
  }

  diagnostics(): Diagnostics {
    return this.snapshots.diagnostics();
  }
}
