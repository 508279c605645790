import * as os from "os";
import { SourceUnavailableError, toError } from "../utils/errors.js";
import type { HostSource, SourceReading } from "./types.js";

/** The parts of the `os` module the host source reads */
export interface HostProbe {
  cpus(): os.CpuInfo[];
  totalmem(): number;
  freemem(): number;
}

interface CpuTimes {
  idle: number;
  total: number;
}

export class OsHostSource implements HostSource {
  readonly kind = "host" as const;
  readonly id: string;
  private probe: HostProbe;
  private lastCPUTimes: CpuTimes;

  constructor(options: { id?: string; probe?: HostProbe } = {}) {
    this.id = options.id ?? "os";
    this.probe = options.probe ?? os;
    this.lastCPUTimes = this.getCPUTimes();
  }

  async poll(): Promise<SourceReading> {
    try {
      return {
        devices: [],
        host: {
          cpuUtilPct: this.calculateCPUUtilization(),
          ramUtilPct: this.calculateRAMUtilization(),
        },
        errors: new Map(),
      };
    } catch (error) {
      const cause = toError(error);
      throw new SourceUnavailableError(this.id, cause.message, cause);
    }
  }

  private getCPUTimes(): CpuTimes {
    let idle = 0;
    let total = 0;

    for (const cpu of this.probe.cpus()) {
      const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
      total += user + nice + sys + cpuIdle + irq;
      idle += cpuIdle;
    }

    return { idle, total };
  }

  private calculateCPUUtilization(): number | null {
    const current = this.getCPUTimes();
    const idleDiff = current.idle - this.lastCPUTimes.idle;
    const totalDiff = current.total - this.lastCPUTimes.total;

    this.lastCPUTimes = current;

    // No ticks elapsed since the last poll
    if (totalDiff <= 0) {
      return null;
    }

    return 100 - (100 * idleDiff) / totalDiff;
  }

  private calculateRAMUtilization(): number | null {
    const totalMem = this.probe.totalmem();
    if (totalMem <= 0) {
      return null;
    }
    const usedMem = totalMem - this.probe.freemem();
    return (100 * usedMem) / totalMem;
  }
}
