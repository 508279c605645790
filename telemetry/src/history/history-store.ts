import { formatSeriesKey, HOST_TARGET } from "../metrics/types.js";
import type { Device, MetricRecord, SeriesKey } from "../metrics/types.js";
import { RingBuffer } from "./ring-buffer.js";

/**
 * Read side of the store, handed to the query layer.
 */
export interface HistoryReader {
  readonly capacity: number;
  latest(key: SeriesKey): MetricRecord | undefined;
  window(key: SeriesKey): MetricRecord[];
  devices(): Device[];
  seriesKeys(): SeriesKey[];
}

export interface DeviceObservation {
  /** Devices read successfully this cycle */
  devices: Device[];
  /** Ids listed by a source but whose query failed this cycle */
  present: Iterable<string>;
  /**
   * Failed devices whose identity the source knows. Ones not yet tracked
   * are added without a reading.
   */
  unreadable?: Device[];
  /** Sources that answered this cycle; only their devices can go missing */
  polledSources: ReadonlySet<string>;
}

export interface DeviceChanges {
  added: Device[];
  retired: Device[];
}

export interface HistoryStoreOptions {
  capacity?: number;
  retireAfterMisses?: number;
}

interface Series {
  key: SeriesKey;
  buffer: RingBuffer<MetricRecord>;
}

interface TrackedDevice {
  device: Device;
  misses: number;
}

export class HistoryStore implements HistoryReader {
  readonly capacity: number;
  readonly retireAfterMisses: number;
  private series = new Map<string, Series>();
  private tracked = new Map<string, TrackedDevice>();

  constructor(options: HistoryStoreOptions = {}) {
    this.capacity = options.capacity ?? 15;
    this.retireAfterMisses = options.retireAfterMisses ?? 3;
  }

  append(key: SeriesKey, record: MetricRecord): void {
    const id = formatSeriesKey(key);
    let series = this.series.get(id);
    if (!series) {
      series = { key, buffer: new RingBuffer(this.capacity) };
      this.series.set(id, series);
    }
    series.buffer.push(record);
  }

  latest(key: SeriesKey): MetricRecord | undefined {
    return this.series.get(formatSeriesKey(key))?.buffer.last();
  }

  window(key: SeriesKey): MetricRecord[] {
    return this.series.get(formatSeriesKey(key))?.buffer.toArray() ?? [];
  }

  devices(): Device[] {
    return Array.from(this.tracked.values(), (t) => ({ ...t.device }));
  }

  seriesKeys(): SeriesKey[] {
    return Array.from(this.series.values(), (s) => ({ ...s.key }));
  }

  /**
   * Applies one cycle's view of which devices exist. A device goes missing
   * only when its own source answered without it; after
   * `retireAfterMisses` consecutive misses it is dropped along with its
   * series.
   */
  observeDevices(observation: DeviceObservation): DeviceChanges {
    const changes: DeviceChanges = { added: [], retired: [] };
    const seen = new Set<string>(observation.present);

    for (const device of observation.devices) {
      seen.add(device.id);
      const existing = this.tracked.get(device.id);
      if (existing) {
        existing.device = { ...device };
        existing.misses = 0;
      } else {
        this.tracked.set(device.id, { device: { ...device }, misses: 0 });
        changes.added.push({ ...device });
      }
    }

    for (const device of observation.unreadable ?? []) {
      seen.add(device.id);
      if (!this.tracked.has(device.id)) {
        this.tracked.set(device.id, { device: { ...device }, misses: 0 });
        changes.added.push({ ...device });
      }
    }

    for (const [id, entry] of this.tracked) {
      if (seen.has(id)) {
        entry.misses = 0;
        continue;
      }
      if (!observation.polledSources.has(entry.device.sourceId)) {
        continue;
      }
      entry.misses++;
      if (entry.misses >= this.retireAfterMisses) {
        this.retire(id);
        changes.retired.push({ ...entry.device });
      }
    }

    return changes;
  }

  private retire(deviceId: string): void {
    this.tracked.delete(deviceId);
    for (const [id, series] of this.series) {
      if (series.key.target === deviceId && deviceId !== HOST_TARGET) {
        this.series.delete(id);
      }
    }
  }
}
