import { EventEmitter } from "events";
import type { HistoryStore } from "../history/history-store.js";
import {
  mergeNormalized,
  normalizeDevice,
  normalizeHost,
} from "../metrics/normalizer.js";
import type { NormalizedReading } from "../metrics/normalizer.js";
import { DEFAULT_THRESHOLDS } from "../metrics/thresholds.js";
import type { ThresholdTable } from "../metrics/thresholds.js";
import { seriesKeyOf } from "../metrics/types.js";
import type { Device } from "../metrics/types.js";
import type { MetricSource, SourceReading } from "../sources/types.js";
import { withTimeout } from "../utils/concurrency.js";
import {
  DeviceQueryError,
  SourceUnavailableError,
  serializeError,
  toError,
} from "../utils/errors.js";
import { createComponentLogger } from "../utils/logger.js";
import type {
  CyclePublisher,
  CycleReport,
  SamplerState,
  SamplerTotals,
} from "./types.js";

const log = createComponentLogger("sampler");

export interface SamplerOptions {
  sources: MetricSource[];
  store: HistoryStore;
  publisher: CyclePublisher;
  thresholds?: ThresholdTable;
  intervalMs?: number;
  sourceTimeoutMs?: number;
  /** How long an aborted source may take to hand back partial readings */
  sourceGraceMs?: number;
  now?: () => number;
}

type SourceOutcome =
  | { source: MetricSource; reading: SourceReading }
  | { source: MetricSource; error: SourceUnavailableError };

export declare interface Sampler {
  on(event: "cycle", listener: (report: CycleReport) => void): this;
  on(event: "state", listener: (state: SamplerState) => void): this;
  emit(event: "cycle", report: CycleReport): boolean;
  emit(event: "state", state: SamplerState): boolean;
}

/**
 * Drives the poll → normalize → publish cycle. It is the only writer to the
 * history store. Cycles never overlap, and nothing raised inside a cycle
 * stops the loop; only `stop()` does.
 */
export class Sampler extends EventEmitter {
  private sources: MetricSource[];
  private store: HistoryStore;
  private publisher: CyclePublisher;
  private thresholds: ThresholdTable;
  private intervalMs: number;
  private sourceTimeoutMs: number;
  private sourceGraceMs: number;
  private now: () => number;

  private state: SamplerState = "idle";
  private cycleId = 0;
  private lastTimestamp = 0;
  private running = false;
  private generation = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private degraded = false;
  private totals: SamplerTotals = {
    cyclesCompleted: 0,
    degradedCycles: 0,
    clampedCount: 0,
    invalidCount: 0,
    deviceErrorCounts: {},
  };

  constructor(options: SamplerOptions) {
    super();
    this.sources = options.sources;
    this.store = options.store;
    this.publisher = options.publisher;
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.intervalMs = options.intervalMs ?? 1000;
    this.sourceTimeoutMs = options.sourceTimeoutMs ?? 5000;
    this.sourceGraceMs = options.sourceGraceMs ?? 250;
    this.now = options.now ?? Date.now;
  }

  getState(): SamplerState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return; // Already sampling
    }
    this.running = true;
    log.info(
      { intervalMs: this.intervalMs, sources: this.sources.map((s) => s.id) },
      "Started sampler"
    );
    this.schedule(0, ++this.generation);
  }

  /**
   * Stops the loop. Resolves once the in-flight cycle, if any, has been
   * published.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      try {
        await this.inFlight;
      } catch (error) {
        log.error({ error: serializeError(error) }, "Final cycle failed");
      }
    }
    log.info({ cycles: this.totals.cyclesCompleted }, "Stopped sampler");
  }

  /**
   * Runs one cycle now. A call made while a cycle is in flight joins that
   * cycle instead of starting another.
   */
  runCycle(): Promise<CycleReport> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const cycle = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private schedule(delayMs: number, generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, delayMs);
  }

  /**
   * One loop iteration. Only the loop of the latest `start()` reschedules;
   * a tick left over from before a stop/start pair ends here.
   */
  private async tick(generation: number): Promise<void> {
    const started = this.now();
    try {
      await this.runCycle();
    } catch (error) {
      log.error({ error: serializeError(error) }, "Sampler cycle failed");
    }
    if (this.running && generation === this.generation) {
      const elapsed = this.now() - started;
      this.schedule(Math.max(0, this.intervalMs - elapsed), generation);
    }
  }

  private setState(state: SamplerState): void {
    this.state = state;
    this.emit("state", state);
  }

  private nextTimestamp(): number {
    this.lastTimestamp = Math.max(this.now(), this.lastTimestamp + 1);
    return this.lastTimestamp;
  }

  private async executeCycle(): Promise<CycleReport> {
    const cycleId = ++this.cycleId;
    const timestamp = this.nextTimestamp();
    const started = this.now();

    try {
      this.setState("polling");
      const outcomes = await Promise.all(
        this.sources.map((source) => this.pollSource(source))
      );

      this.setState("normalizing");
      const stamp = { cycleId, timestamp, thresholds: this.thresholds };
      const parts: NormalizedReading[] = [];
      const devices: Device[] = [];
      const unreadable: Device[] = [];
      const deviceErrors = new Map<string, DeviceQueryError>();
      const unavailableSources = new Map<string, SourceUnavailableError>();
      const polledSources = new Set<string>();

      for (const outcome of outcomes) {
        if ("error" in outcome) {
          unavailableSources.set(outcome.source.id, outcome.error);
          continue;
        }
        polledSources.add(outcome.source.id);
        const { reading } = outcome;
        for (const device of reading.devices) {
          devices.push({
            id: device.deviceId,
            name: device.name,
            ratedMaxPowerW: device.ratedMaxPowerW,
            sourceId: outcome.source.id,
          });
          parts.push(normalizeDevice(device, stamp));
        }
        if (reading.host) {
          parts.push(normalizeHost(reading.host, stamp));
        }
        for (const [id, error] of reading.errors) {
          deviceErrors.set(id, error);
          if (error.deviceName !== null) {
            unreadable.push({
              id,
              name: error.deviceName,
              ratedMaxPowerW: null,
              sourceId: outcome.source.id,
            });
          }
        }
      }
      const normalized = mergeNormalized(parts);

      this.setState("publishing");
      const changes = this.store.observeDevices({
        devices,
        present: deviceErrors.keys(),
        unreadable,
        polledSources,
      });
      for (const record of normalized.records) {
        this.store.append(seriesKeyOf(record), record);
      }

      const degraded = unavailableSources.size > 0;
      this.updateTotals(degraded, normalized, deviceErrors);
      this.logCycle(cycleId, degraded, unavailableSources, changes);

      const report: CycleReport = {
        cycleId,
        timestamp,
        durationMs: this.now() - started,
        degraded,
        records: normalized.records,
        deviceErrors,
        unavailableSources,
        clampedCount: normalized.clampedCount,
        invalid: normalized.invalid,
        added: changes.added,
        retired: changes.retired,
        totals: {
          ...this.totals,
          deviceErrorCounts: { ...this.totals.deviceErrorCounts },
        },
      };
      this.publisher.publish(report);
      this.emit("cycle", report);
      return report;
    } finally {
      this.setState("idle");
    }
  }

  private async pollSource(source: MetricSource): Promise<SourceOutcome> {
    try {
      const reading = await withTimeout(
        `source ${source.id}`,
        this.sourceTimeoutMs,
        (signal) => source.poll({ signal }),
        { graceMs: this.sourceGraceMs }
      );
      return { source, reading };
    } catch (error) {
      const unavailable =
        error instanceof SourceUnavailableError
          ? error
          : new SourceUnavailableError(
              source.id,
              toError(error).message,
              toError(error)
            );
      return { source, error: unavailable };
    }
  }

  private updateTotals(
    degraded: boolean,
    normalized: NormalizedReading,
    deviceErrors: Map<string, DeviceQueryError>
  ): void {
    const counts = this.totals.deviceErrorCounts;
    for (const id of deviceErrors.keys()) {
      counts[id] = (counts[id] ?? 0) + 1;
    }
    // Counts live as long as the device is tracked or still failing
    const tracked = new Set(this.store.devices().map((d) => d.id));
    for (const id of Object.keys(counts)) {
      if (!tracked.has(id) && !deviceErrors.has(id)) {
        delete counts[id];
      }
    }
    this.totals.cyclesCompleted++;
    if (degraded) this.totals.degradedCycles++;
    this.totals.clampedCount += normalized.clampedCount;
    this.totals.invalidCount += normalized.invalid.length;

    for (const invalid of normalized.invalid) {
      log.debug({ details: invalid.details }, "Discarded invalid reading");
    }
  }

  private logCycle(
    cycleId: number,
    degraded: boolean,
    unavailable: Map<string, SourceUnavailableError>,
    changes: { added: Device[]; retired: Device[] }
  ): void {
    for (const device of changes.added) {
      log.info({ deviceId: device.id, name: device.name }, "Device added");
    }
    for (const device of changes.retired) {
      log.warn({ deviceId: device.id, name: device.name }, "Device retired");
    }

    if (degraded && !this.degraded) {
      log.warn(
        {
          cycleId,
          sources: Object.fromEntries(
            Array.from(unavailable, ([id, error]) => [id, error.message])
          ),
        },
        "Telemetry degraded"
      );
    } else if (!degraded && this.degraded) {
      log.info({ cycleId }, "Telemetry recovered");
    }
    this.degraded = degraded;

    log.debug({ cycleId, degraded }, "Cycle published");
  }
}
