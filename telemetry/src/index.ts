export { TelemetryService, createSources } from "./telemetry-service.js";
export type { TelemetryServiceDeps } from "./telemetry-service.js";
export { loadConfig, loadThresholds } from "./config.js";
export type { TelemetryConfig } from "./config.js";
export { HistoryStore } from "./history/history-store.js";
export type { HistoryReader } from "./history/history-store.js";
export { SnapshotService } from "./query/snapshot-service.js";
export { summarizeSnapshot } from "./query/summary.js";
export type { Diagnostics, SeriesHistory, Snapshot } from "./query/types.js";
export { Sampler } from "./sampler/sampler.js";
export type { CycleReport, SamplerState } from "./sampler/types.js";
export { NvidiaSmiSource } from "./sources/nvidia-smi-source.js";
export { OsHostSource } from "./sources/os-host-source.js";
export type { MetricSource, SourceReading } from "./sources/types.js";
export { DEFAULT_THRESHOLDS, buildThresholdTable, classify } from "./metrics/thresholds.js";
export * from "./metrics/types.js";
export * from "./utils/errors.js";
