import { spawn } from "child_process";
import { TelemetryError } from "./errors.js";

export interface CommandOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<string>;

export type CommandFailure = "not-found" | "exit" | "timeout" | "aborted" | "spawn";

export class CommandError extends TelemetryError {
  constructor(
    message: string,
    public readonly reason: CommandFailure,
    public readonly exitCode?: number | null
  ) {
    super(message, "COMMAND_FAILED", { reason, exitCode });
    this.name = "CommandError";
  }
}

/**
 * Runs a command to completion and resolves with its stdout. The child is
 * killed when the timeout elapses or the signal aborts.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new CommandError(`${command} aborted`, "aborted"));
      return;
    }

    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (error: CommandError | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      if (error) {
        reject(error);
      } else {
        resolve(stdout);
      }
    };

    const onAbort = () => {
      child.kill();
      finish(new CommandError(`${command} aborted`, "aborted"));
    };

    const timer = setTimeout(() => {
      child.kill();
      finish(
        new CommandError(
          `${command} timed out after ${options.timeoutMs}ms`,
          "timeout"
        )
      );
    }, options.timeoutMs);

    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (err: NodeJS.ErrnoException) => {
      const reason = err.code === "ENOENT" ? "not-found" : "spawn";
      finish(new CommandError(`${command}: ${err.message}`, reason));
    });

    child.on("close", (code) => {
      if (code === 0) {
        finish(null);
        return;
      }
      const detail = stderr.trim() || stdout.trim();
      finish(
        new CommandError(
          `${command} exited with code ${code}${detail ? `: ${detail}` : ""}`,
          "exit",
          code
        )
      );
    });
  });
};
