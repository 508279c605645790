import { parseStringPromise } from "xml2js";
import { z } from "zod";
import { runCommand, CommandError } from "../utils/command.js";
import type { CommandRunner } from "../utils/command.js";
import {
  AbortedError,
  settleWithConcurrency,
  withTimeout,
} from "../utils/concurrency.js";
import {
  DeviceQueryError,
  SourceUnavailableError,
  toError,
} from "../utils/errors.js";
import { createComponentLogger } from "../utils/logger.js";
import type {
  GpuSource,
  PollContext,
  RawDeviceReading,
  SourceReading,
} from "./types.js";
import { emptyReading } from "./types.js";

const log = createComponentLogger("nvidia-smi");

export interface NvidiaSmiSourceOptions {
  id?: string;
  binaryPath?: string;
  deviceQueryTimeoutMs?: number;
  listTimeoutMs?: number;
  maxParallelQueries?: number;
  runner?: CommandRunner;
}

export interface ListedGpu {
  index: number;
  name: string;
  uuid: string;
}

const LIST_LINE = /^GPU\s+(\d+):\s+(.+?)\s+\(UUID:\s*([^)]+)\)\s*$/;

/**
 * Parses `nvidia-smi -L` output. MIG sub-device lines and anything else that
 * is not a top-level GPU line are skipped.
 */
export function parseGpuList(output: string): ListedGpu[] {
  const gpus: ListedGpu[] = [];
  for (const line of output.split("\n")) {
    const match = LIST_LINE.exec(line.trim());
    if (match) {
      gpus.push({
        index: parseInt(match[1], 10),
        name: match[2],
        uuid: match[3].trim(),
      });
    }
  }
  return gpus;
}

// Empty elements come back from xml2js as "" rather than an object
const text = z.string().optional().catch(undefined);
const section = <T extends z.ZodRawShape>(shape: T) =>
  z.object(shape).optional().catch(undefined);

const powerSchema = section({
  power_draw: text,
  instant_power_draw: text,
  average_power_draw: text,
  max_power_limit: text,
});

const gpuSchema = z.object({
  product_name: text,
  uuid: text,
  fb_memory_usage: section({ used: text, total: text }),
  utilization: section({ gpu_util: text, memory_util: text }),
  temperature: section({ gpu_temp: text }),
  power_readings: powerSchema,
  gpu_power_readings: powerSchema,
});

const logSchema = z.object({
  nvidia_smi_log: z.object({
    gpu: z.union([gpuSchema, z.array(gpuSchema).nonempty()]),
  }),
});

/**
 * Numeric part of an nvidia-smi value such as "45 %", "150.25 W" or
 * "24576 MiB". "N/A", "[Not Supported]" and the like yield null.
 */
export function parseQuantity(value: string | undefined): number | null {
  if (value === undefined) return null;
  const match = /^\s*(-?\d+(?:\.\d+)?)/.exec(value);
  if (!match) return null;
  const parsed = parseFloat(match[1]);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reads one device's `nvidia-smi -q -x -i <id>` document.
 */
export async function parseDeviceXml(
  xml: string,
  listed: ListedGpu
): Promise<RawDeviceReading> {
  const document: unknown = await parseStringPromise(xml, {
    explicitArray: false,
  });
  const parsed = logSchema.parse(document);
  const node = parsed.nvidia_smi_log.gpu;
  const gpu = Array.isArray(node) ? node[0] : node;
  const power = gpu.gpu_power_readings ?? gpu.power_readings;

  return {
    deviceId: gpu.uuid?.trim() || listed.uuid,
    name: gpu.product_name?.trim() || listed.name,
    ratedMaxPowerW: parseQuantity(power?.max_power_limit),
    gpuUtilPct: parseQuantity(gpu.utilization?.gpu_util),
    memUtilPct: parseQuantity(gpu.utilization?.memory_util),
    powerDrawW: parseQuantity(
      power?.power_draw ?? power?.instant_power_draw ?? power?.average_power_draw
    ),
    temperatureC: parseQuantity(gpu.temperature?.gpu_temp),
    memoryUsedMiB: parseQuantity(gpu.fb_memory_usage?.used),
    memoryTotalMiB: parseQuantity(gpu.fb_memory_usage?.total),
  };
}

export class NvidiaSmiSource implements GpuSource {
  readonly kind = "gpu" as const;
  readonly id: string;
  private binaryPath: string;
  private deviceQueryTimeoutMs: number;
  private listTimeoutMs: number;
  private maxParallelQueries: number;
  private runner: CommandRunner;

  constructor(options: NvidiaSmiSourceOptions = {}) {
    this.id = options.id ?? "nvidia-smi";
    this.binaryPath = options.binaryPath ?? "nvidia-smi";
    this.deviceQueryTimeoutMs = options.deviceQueryTimeoutMs ?? 2000;
    this.listTimeoutMs = options.listTimeoutMs ?? 2000;
    this.maxParallelQueries = options.maxParallelQueries ?? 4;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Probe the driver tool once and report how many GPUs it lists
   */
  async detect(): Promise<number> {
    try {
      const gpus = await this.listDevices({});
      log.info({ count: gpus.length }, "nvidia-smi detected");
      return gpus.length;
    } catch (error) {
      log.info(
        { reason: toError(error).message },
        "nvidia-smi not available, GPU cycles will report degraded"
      );
      return 0;
    }
  }

  async poll(context: PollContext = {}): Promise<SourceReading> {
    const listed = await this.listDevices(context);

    const results = await settleWithConcurrency(
      listed,
      this.maxParallelQueries,
      (gpu) => this.queryDevice(gpu, context)
    );

    const reading = emptyReading();

    results.forEach((result, i) => {
      const gpu = listed[i];
      if (result.status === "fulfilled") {
        reading.devices.push(result.value);
        return;
      }
      const error =
        result.reason instanceof DeviceQueryError
          ? result.reason
          : new DeviceQueryError(
              gpu.uuid,
              toError(result.reason).message,
              toError(result.reason),
              gpu.name
            );
      log.warn(
        { deviceId: gpu.uuid, index: gpu.index, error: error.message },
        "GPU query failed"
      );
      reading.errors.set(gpu.uuid, error);
    });

    if (context.signal?.aborted) {
      log.warn(
        { read: reading.devices.length, unfinished: reading.errors.size },
        "GPU poll cut short at source deadline"
      );
    }

    return reading;
  }

  private async listDevices(context: PollContext): Promise<ListedGpu[]> {
    let output: string;
    try {
      output = await this.runner(this.binaryPath, ["-L"], {
        timeoutMs: this.listTimeoutMs,
        signal: context.signal,
      });
    } catch (error) {
      const cause = toError(error);
      const reason =
        error instanceof CommandError && error.reason === "not-found"
          ? `${this.binaryPath} not found`
          : cause.message;
      throw new SourceUnavailableError(this.id, reason, cause);
    }

    const gpus = parseGpuList(output);
    if (gpus.length === 0) {
      throw new SourceUnavailableError(this.id, "no GPUs reported");
    }
    return gpus;
  }

  private async queryDevice(
    gpu: ListedGpu,
    context: PollContext
  ): Promise<RawDeviceReading> {
    if (context.signal?.aborted) {
      throw new DeviceQueryError(gpu.uuid, "poll aborted", undefined, gpu.name);
    }

    try {
      // Aborting the poll kills the running child as well
      const xml = await withTimeout(
        `GPU ${gpu.uuid}`,
        this.deviceQueryTimeoutMs,
        (signal) =>
          this.runner(this.binaryPath, ["-q", "-x", "-i", gpu.uuid], {
            timeoutMs: this.deviceQueryTimeoutMs,
            signal,
          }),
        { signal: context.signal }
      );
      return await parseDeviceXml(xml, gpu);
    } catch (error) {
      const cause = toError(error);
      const reason = error instanceof AbortedError ? "poll aborted" : cause.message;
      throw new DeviceQueryError(gpu.uuid, reason, cause, gpu.name);
    }
  }
}
