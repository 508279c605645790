import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadConfig, loadThresholds } from "../src/config.js";
import { DEFAULT_THRESHOLDS, classify } from "../src/metrics/thresholds.js";
import { ConfigError } from "../src/utils/errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gpulse-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("should apply defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      pollIntervalMs: 1000,
      historyCapacity: 15,
      retireAfterMisses: 3,
      deviceQueryTimeoutMs: 2000,
      sourceTimeoutMs: 5000,
      maxParallelQueries: 4,
      nvidiaSmiPath: "nvidia-smi",
      enableGpu: true,
      enableHost: true,
      summaryIntervalMs: 60000,
      thresholds: DEFAULT_THRESHOLDS,
    });
  });

  test("should read overrides from the environment", () => {
    const config = loadConfig({
      POLL_INTERVAL_MS: "2000",
      HISTORY_CAPACITY: "30",
      ENABLE_GPU: "false",
      ENABLE_HOST: "1",
      NVIDIA_SMI_PATH: "/usr/bin/nvidia-smi",
    });

    expect(config.pollIntervalMs).toBe(2000);
    expect(config.historyCapacity).toBe(30);
    expect(config.enableGpu).toBe(false);
    expect(config.enableHost).toBe(true);
    expect(config.nvidiaSmiPath).toBe("/usr/bin/nvidia-smi");
  });

  test("should reject values that are not positive integers", () => {
    expect(() => loadConfig({ HISTORY_CAPACITY: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ POLL_INTERVAL_MS: "fast" })).toThrow(ConfigError);
    expect(() => loadConfig({ ENABLE_GPU: "maybe" })).toThrow(ConfigError);
  });

  test("should name the offending variable", () => {
    expect(() => loadConfig({ RETIRE_AFTER_MISSES: "-1" })).toThrow(
      expect.objectContaining({
        name: "ConfigError",
        details: {
          issues: ["RETIRE_AFTER_MISSES: Number must be greater than 0"],
        },
      })
    );
  });

  test("should load threshold overrides from a file", () => {
    const path = join(dir, "thresholds.json");
    writeFileSync(
      path,
      JSON.stringify({
        temp_c: [
          { status: "warm", min: 70 },
          { status: "hot", min: 85 },
        ],
      })
    );

    const config = loadConfig({ THRESHOLDS_FILE: path });

    expect(classify(config.thresholds, "temp_c", 65)).toBe("normal");
    expect(classify(config.thresholds, "temp_c", 70)).toBe("warm");
    expect(classify(config.thresholds, "temp_c", 85)).toBe("hot");
    expect(config.thresholds.gpu_util).toEqual(DEFAULT_THRESHOLDS.gpu_util);
  });

  test("should reject a thresholds file with unknown metrics", () => {
    const path = join(dir, "thresholds.json");
    writeFileSync(path, JSON.stringify({ fan_speed: [{ status: "hot", min: 90 }] }));

    expect(() => loadThresholds(path)).toThrow(ConfigError);
  });

  test("should reject a thresholds file that cannot be read", () => {
    expect(() => loadThresholds(join(dir, "missing.json"))).toThrow(
      /cannot read thresholds file/
    );
  });
});
