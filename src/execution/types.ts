/**
 * Script execution types
 */

/** How dependency declarations are written ahead of the rendered script */
export type PreambleStyle = "cargo" | "none";

export const PREAMBLE_STYLES: readonly PreambleStyle[] = ["cargo", "none"];

/** External interpreter configuration */
export interface RunnerConfig {
  /** Interpreter executable */
  command: string;
  /** Arguments placed before the script path */
  args: string[];
  /** Dependency preamble format */
  preamble: PreambleStyle;
  /** Extension of the temporary script file */
  extension: string;
  /** Kill the interpreter after this many milliseconds */
  timeoutMs: number;
}

/** Default runner: rust-script with a cargo manifest block */
export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  command: "rust-script",
  args: [],
  preamble: "cargo",
  extension: ".rs",
  timeoutMs: 30000,
};

/** Captured output of one interpreter invocation */
export interface ProcessOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  /** Set when the process could not be started at all */
  spawnError?: string;
}

/** Runs a command to completion and captures its output */
export type ProcessExecutor = (
  command: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<ProcessOutput>;
