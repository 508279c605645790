import { readFileSync } from "fs";
import { describe, expect, test, vi } from "vitest";
import {
  NvidiaSmiSource,
  parseDeviceXml,
  parseGpuList,
  parseQuantity,
} from "../src/sources/nvidia-smi-source.js";
import { CommandError } from "../src/utils/command.js";
import type { CommandRunner } from "../src/utils/command.js";
import { DeviceQueryError, SourceUnavailableError } from "../src/utils/errors.js";

const fixture = (name: string) =>
  readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");

const LIST = fixture("gpu-list.txt");
const CURRENT_XML = fixture("gpu-query.xml");
const LEGACY_XML = fixture("gpu-query-legacy.xml");

function fakeRunner(
  handlers: Record<string, () => Promise<string>>
): CommandRunner {
  return vi.fn(async (_command: string, args: string[]) => {
    const key = args.includes("-L") ? "list" : args[args.length - 1];
    const handler = handlers[key];
    if (!handler) {
      throw new CommandError(`unexpected call ${args.join(" ")}`, "exit", 6);
    }
    return handler();
  });
}

describe("parseGpuList", () => {
  test("should read top-level GPUs and skip MIG lines", () => {
    expect(parseGpuList(LIST)).toEqual([
      { index: 0, name: "Test GPU 24G", uuid: "GPU-aaaa-0001" },
      { index: 1, name: "Legacy GPU 8G", uuid: "GPU-bbbb-0002" },
    ]);
  });

  test("should return nothing for unrelated output", () => {
    expect(parseGpuList("No devices were found\n")).toEqual([]);
  });
});

describe("parseQuantity", () => {
  test("should strip units", () => {
    expect(parseQuantity("45 %")).toBe(45);
    expect(parseQuantity("150.25 W")).toBe(150.25);
    expect(parseQuantity("24576 MiB")).toBe(24576);
    expect(parseQuantity("61 C")).toBe(61);
  });

  test("should map unavailable values to null", () => {
    expect(parseQuantity("N/A")).toBeNull();
    expect(parseQuantity("[Not Supported]")).toBeNull();
    expect(parseQuantity(undefined)).toBeNull();
  });
});

describe("parseDeviceXml", () => {
  test("should read the current power readings layout", async () => {
    const reading = await parseDeviceXml(CURRENT_XML, {
      index: 0,
      name: "listed",
      uuid: "GPU-aaaa-0001",
    });

    expect(reading).toEqual({
      deviceId: "GPU-aaaa-0001",
      name: "Test GPU 24G",
      ratedMaxPowerW: 300,
      gpuUtilPct: 45,
      memUtilPct: 20,
      powerDrawW: 150,
      temperatureC: 61,
      memoryUsedMiB: 6144,
      memoryTotalMiB: 24576,
    });
  });

  test("should read the legacy layout with unavailable fields", async () => {
    const reading = await parseDeviceXml(LEGACY_XML, {
      index: 1,
      name: "listed",
      uuid: "GPU-bbbb-0002",
    });

    expect(reading).toEqual({
      deviceId: "GPU-bbbb-0002",
      name: "Legacy GPU 8G",
      ratedMaxPowerW: null,
      gpuUtilPct: null,
      memUtilPct: null,
      powerDrawW: 12.5,
      temperatureC: 40,
      memoryUsedMiB: 2048,
      memoryTotalMiB: 8192,
    });
  });

  test("should reject a document without a gpu element", async () => {
    await expect(
      parseDeviceXml("<nvidia_smi_log><attached_gpus>0</attached_gpus></nvidia_smi_log>", {
        index: 0,
        name: "listed",
        uuid: "GPU-x",
      })
    ).rejects.toThrow();
  });
});

describe("NvidiaSmiSource", () => {
  test("should return a reading for every GPU that answers", async () => {
    const source = new NvidiaSmiSource({
      runner: fakeRunner({
        list: async () => LIST,
        "GPU-aaaa-0001": async () => CURRENT_XML,
        "GPU-bbbb-0002": async () => LEGACY_XML,
      }),
    });

    const reading = await source.poll({});

    expect(reading.devices.map((d) => d.deviceId)).toEqual([
      "GPU-aaaa-0001",
      "GPU-bbbb-0002",
    ]);
    expect(reading.errors.size).toBe(0);
    expect(reading.host).toBeNull();
  });

  test("should isolate a failing GPU from the others", async () => {
    const source = new NvidiaSmiSource({
      runner: fakeRunner({
        list: async () => LIST,
        "GPU-aaaa-0001": async () => CURRENT_XML,
        "GPU-bbbb-0002": async () => {
          throw new CommandError("nvidia-smi exited with code 15", "exit", 15);
        },
      }),
    });

    const reading = await source.poll({});

    expect(reading.devices.map((d) => d.deviceId)).toEqual(["GPU-aaaa-0001"]);
    const error = reading.errors.get("GPU-bbbb-0002");
    expect(error).toBeInstanceOf(DeviceQueryError);
    expect(error?.deviceId).toBe("GPU-bbbb-0002");
    expect(error?.message).toBe(
      "Device query failed: GPU-bbbb-0002: nvidia-smi exited with code 15"
    );
  });

  test("should time out a GPU query that hangs", async () => {
    const source = new NvidiaSmiSource({
      deviceQueryTimeoutMs: 20,
      runner: fakeRunner({
        list: async () => LIST,
        "GPU-aaaa-0001": async () => CURRENT_XML,
        "GPU-bbbb-0002": () => new Promise<string>(() => {}),
      }),
    });

    const reading = await source.poll({});

    expect(reading.devices).toHaveLength(1);
    expect(reading.errors.get("GPU-bbbb-0002")?.message).toBe(
      "Device query failed: GPU-bbbb-0002: GPU GPU-bbbb-0002 timed out after 20ms"
    );
  });

  test("should report the source unavailable when the tool is missing", async () => {
    const source = new NvidiaSmiSource({
      binaryPath: "/opt/missing/nvidia-smi",
      runner: fakeRunner({
        list: async () => {
          throw new CommandError("spawn ENOENT", "not-found");
        },
      }),
    });

    const poll = source.poll({});
    await expect(poll).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(poll).rejects.toThrow(
      "Source unavailable: nvidia-smi: /opt/missing/nvidia-smi not found"
    );
  });

  test("should report the source unavailable when no GPUs are listed", async () => {
    const source = new NvidiaSmiSource({
      runner: fakeRunner({ list: async () => "No devices were found\n" }),
    });

    await expect(source.poll({})).rejects.toThrow(
      "Source unavailable: nvidia-smi: no GPUs reported"
    );
  });

  test("should keep at most maxParallelQueries queries in flight", async () => {
    const uuids = ["GPU-1", "GPU-2", "GPU-3", "GPU-4", "GPU-5"];
    let active = 0;
    let peak = 0;
    const handlers: Record<string, () => Promise<string>> = {
      list: async () =>
        uuids.map((id, i) => `GPU ${i}: Test GPU (UUID: ${id})`).join("\n"),
    };
    for (const id of uuids) {
      handlers[id] = async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return CURRENT_XML.replace("GPU-aaaa-0001", id);
      };
    }

    const source = new NvidiaSmiSource({
      maxParallelQueries: 2,
      runner: fakeRunner(handlers),
    });
    const reading = await source.poll({});

    expect(peak).toBe(2);
    expect(reading.devices.map((d) => d.deviceId)).toEqual(uuids);
  });

  test("should hand back finished readings when the poll is aborted", async () => {
    const uuids = ["GPU-1", "GPU-2", "GPU-3"];
    const signals: AbortSignal[] = [];
    const runner: CommandRunner = async (_command, args, options) => {
      if (args.includes("-L")) {
        return uuids.map((id, i) => `GPU ${i}: Test GPU (UUID: ${id})`).join("\n");
      }
      const id = args[args.length - 1];
      if (id === "GPU-1") {
        return CURRENT_XML.replace("GPU-aaaa-0001", id);
      }
      if (options.signal) signals.push(options.signal);
      return new Promise<string>(() => {});
    };
    const source = new NvidiaSmiSource({
      maxParallelQueries: 2,
      deviceQueryTimeoutMs: 1000,
      runner,
    });
    const controller = new AbortController();

    const poll = source.poll({ signal: controller.signal });
    setTimeout(() => controller.abort(), 20);
    const reading = await poll;

    expect(reading.devices.map((d) => d.deviceId)).toEqual(["GPU-1"]);
    expect(Array.from(reading.errors.keys())).toEqual(["GPU-2", "GPU-3"]);
    expect(reading.errors.get("GPU-2")?.message).toBe(
      "Device query failed: GPU-2: poll aborted"
    );
    expect(reading.errors.get("GPU-3")?.deviceName).toBe("Test GPU");
    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  test("should count listed GPUs in detect and return zero when unavailable", async () => {
    const present = new NvidiaSmiSource({
      runner: fakeRunner({ list: async () => LIST }),
    });
    const absent = new NvidiaSmiSource({
      runner: fakeRunner({
        list: async () => {
          throw new CommandError("spawn ENOENT", "not-found");
        },
      }),
    });

    expect(await present.detect()).toBe(2);
    expect(await absent.detect()).toBe(0);
  });
});
