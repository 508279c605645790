import { HOST_TARGET } from "../metrics/types.js";
import type { MetricRecord, MetricType, SeriesTarget } from "../metrics/types.js";
import type { Snapshot } from "./types.js";

const LABELS: Record<MetricType, { label: string; unit: string }> = {
  gpu_util: { label: "util", unit: "%" },
  mem_util: { label: "mem", unit: "%" },
  power_pct: { label: "pwr", unit: "%" },
  temp_c: { label: "temp", unit: "C" },
  cpu_util: { label: "cpu", unit: "%" },
  ram_util: { label: "ram", unit: "%" },
};

const GPU_ORDER: MetricType[] = ["gpu_util", "mem_util", "power_pct", "temp_c"];
const HOST_ORDER: MetricType[] = ["cpu_util", "ram_util"];

function describe(
  records: readonly MetricRecord[],
  target: SeriesTarget,
  order: MetricType[]
): string {
  const parts: string[] = [];
  for (const metric of order) {
    const record = records.find(
      (r) => (r.deviceId ?? HOST_TARGET) === target && r.metric === metric
    );
    if (!record) continue;
    const { label, unit } = LABELS[metric];
    const flag = record.status === "normal" ? "" : ` (${record.status})`;
    parts.push(`${label} ${record.value.toFixed(0)}${unit}${flag}`);
  }
  return parts.length > 0 ? parts.join(" ") : "no data";
}

/**
 * One-line text form of a snapshot, e.g.
 * `#12 RTX 3090 [util 45% mem 20% pwr 50% temp 55C] host [cpu 12% ram 40%]`.
 */
export function summarizeSnapshot(snapshot: Snapshot): string {
  const segments = [`#${snapshot.cycleId}${snapshot.degraded ? " degraded" : ""}`];
  for (const device of snapshot.devices) {
    segments.push(
      `${device.name} [${describe(snapshot.latest, device.id, GPU_ORDER)}]`
    );
  }
  segments.push(`host [${describe(snapshot.latest, HOST_TARGET, HOST_ORDER)}]`);
  return segments.join(" ");
}
