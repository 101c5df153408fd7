import { spawn } from "child_process";

import type { ProcessExecutor, ProcessOutput } from "./types.js";

/**
 * Spawn a command and capture stdout/stderr until it exits.
 *
 * Never rejects: start failures are reported through `spawnError`
 * and a timeout kills the process with SIGKILL.
 */
export const spawnProcess: ProcessExecutor = (command, args, options) => {
  return new Promise<ProcessOutput>((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const proc = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    // Decode across chunk boundaries so split multi-byte characters survive
    proc.stdout?.setEncoding("utf8");
    proc.stderr?.setEncoding("utf8");

    proc.stdout?.on("data", (data: string) => {
      stdout += data;
    });

    proc.stderr?.on("data", (data: string) => {
      stderr += data;
    });

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, options.timeoutMs);

    proc.on("close", (code) => {
      clearTimeout(timer);
      resolve({
        stdout,
        stderr,
        exitCode: code ?? 1,
        timedOut,
      });
    });

    proc.on("error", (error) => {
      clearTimeout(timer);
      resolve({
        stdout,
        stderr,
        exitCode: 1,
        timedOut: false,
        spawnError: error.message,
      });
    });
  });
};
