import { readFileSync } from "fs";
import { z } from "zod";
import { buildThresholdTable } from "./metrics/thresholds.js";
import type { ThresholdTable } from "./metrics/thresholds.js";
import { ConfigError, toError } from "./utils/errors.js";

export interface TelemetryConfig {
  pollIntervalMs: number;
  historyCapacity: number;
  retireAfterMisses: number;
  deviceQueryTimeoutMs: number;
  sourceTimeoutMs: number;
  maxParallelQueries: number;
  nvidiaSmiPath: string;
  enableGpu: boolean;
  enableHost: boolean;
  summaryIntervalMs: number;
  thresholds: ThresholdTable;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  POLL_INTERVAL_MS: positiveInt(1000),
  HISTORY_CAPACITY: positiveInt(15),
  RETIRE_AFTER_MISSES: positiveInt(3),
  DEVICE_QUERY_TIMEOUT_MS: positiveInt(2000),
  SOURCE_TIMEOUT_MS: positiveInt(5000),
  MAX_PARALLEL_QUERIES: positiveInt(4),
  NVIDIA_SMI_PATH: z.string().min(1).default("nvidia-smi"),
  ENABLE_GPU: flag(true),
  ENABLE_HOST: flag(true),
  SUMMARY_INTERVAL_MS: positiveInt(60000),
  THRESHOLDS_FILE: z.string().min(1).optional(),
});

const bucketSchema = z.object({
  status: z.enum(["normal", "warm", "hot"]),
  min: z.number(),
});

const bucketsSchema = z.array(bucketSchema).nonempty();

export const thresholdOverridesSchema = z
  .object({
    gpu_util: bucketsSchema,
    mem_util: bucketsSchema,
    power_pct: bucketsSchema,
    temp_c: bucketsSchema,
    cpu_util: bucketsSchema,
    ram_util: bucketsSchema,
  })
  .partial()
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
  );
}

/**
 * Reads a JSON file of per-metric threshold buckets, e.g.
 * `{ "temp_c": [{ "status": "warm", "min": 65 }, { "status": "hot", "min": 85 }] }`.
 * Metrics not named keep their defaults.
 */
export function loadThresholds(path: string): ThresholdTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `cannot read thresholds file ${path}: ${toError(error).message}`
    );
  }

  const parsed = thresholdOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `thresholds file ${path} is invalid`,
      formatIssues(parsed.error)
    );
  }
  return buildThresholdTable(parsed.data);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): TelemetryConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(issues.join("; "), issues);
  }
  const vars = parsed.data;

  return {
    pollIntervalMs: vars.POLL_INTERVAL_MS,
    historyCapacity: vars.HISTORY_CAPACITY,
    retireAfterMisses: vars.RETIRE_AFTER_MISSES,
    deviceQueryTimeoutMs: vars.DEVICE_QUERY_TIMEOUT_MS,
    sourceTimeoutMs: vars.SOURCE_TIMEOUT_MS,
    maxParallelQueries: vars.MAX_PARALLEL_QUERIES,
    nvidiaSmiPath: vars.NVIDIA_SMI_PATH,
    enableGpu: vars.ENABLE_GPU,
    enableHost: vars.ENABLE_HOST,
    summaryIntervalMs: vars.SUMMARY_INTERVAL_MS,
    thresholds: vars.THRESHOLDS_FILE
      ? loadThresholds(vars.THRESHOLDS_FILE)
      : buildThresholdTable(),
  };
}
