/**
 * Script Runner
 *
 * Hands rendered template text to an external interpreter. Dependency
 * declarations become a manifest preamble at the top of the script.
 */

import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { ExecutionError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err, tryCatchAsync } from "../lib/result.js";
import { spawnProcess } from "./process.js";
import { DEFAULT_RUNNER_CONFIG } from "./types.js";

import type { MissingPlaceholderError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { Renderable } from "../templates/handle.js";
import type { PreambleStyle, ProcessExecutor, RunnerConfig } from "./types.js";

const log = logger.child("[runner]");

/**
 * Prefix the rendered text with a dependency manifest.
 *
 * The cargo style writes one embedded manifest block in doc comments;
 * with no dependencies (or style "none") the text is returned unchanged.
 */
export function buildScript(
  rendered: string,
  dependencies: readonly string[],
  preamble: PreambleStyle
): string {
  if (preamble === "none" || dependencies.length === 0) {
    return rendered;
  }

  const lines = [
    "//! ```cargo",
    "//! [dependencies]",
    ...dependencies.map((dependency) => `//! ${dependency}`),
    "//! ```",
  ];
  return `${lines.join("\n")}\n${rendered}`;
}

/** Runs rendered templates through an external interpreter */
export class ScriptRunner {
  private readonly config: RunnerConfig;

  constructor(
    config: Partial<RunnerConfig> = {},
    private readonly executor: ProcessExecutor = spawnProcess
  ) {
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
  }

  get settings(): Readonly<RunnerConfig> {
    return this.config;
  }

  /**
   * Render the source, write it to a temp file and run the interpreter on it
   *
   * @returns Captured stdout on a zero exit
   */
  async run(source: Renderable): Promise<Result<string, MissingPlaceholderError | ExecutionError>> {
    const rendered = source.render();
    if (!rendered.success) {
      return rendered;
    }

    const script = buildScript(rendered.data, source.dependencies, this.config.preamble);

    const prepared = await tryCatchAsync(async () => {
      const dir = await mkdtemp(join(tmpdir(), "splicer-run-"));
      const file = join(dir, `script${this.config.extension}`);
      await writeFile(file, script, "utf-8");
      return { dir, file };
    });
    if (!prepared.success) {
      return err(
        new ExecutionError(`Failed to write script: ${prepared.error.message}`, {
          command: this.config.command,
        })
      );
    }

    const { dir, file } = prepared.data;
    const args = [...this.config.args, file];
    log.debug(`${this.config.command} ${args.join(" ")}`);

    try {
      const output = await this.executor(this.config.command, args, {
        timeoutMs: this.config.timeoutMs,
      });

      if (output.spawnError !== undefined) {
        return err(
          new ExecutionError(`Failed to start ${this.config.command}: ${output.spawnError}`, {
            command: this.config.command,
          })
        );
      }

      if (output.timedOut) {
        return err(
          new ExecutionError(`${this.config.command} timed out after ${this.config.timeoutMs}ms`, {
            command: this.config.command,
            timeoutMs: this.config.timeoutMs,
            stderr: output.stderr,
          })
        );
      }

      if (output.exitCode !== 0) {
        return err(
          new ExecutionError(output.stderr, {
            command: this.config.command,
            exitCode: output.exitCode,
          })
        );
      }

      log.debug(`${this.config.command} exited 0 (${output.stdout.length} chars of output)`);
      return ok(output.stdout);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

/**
 * Create a ScriptRunner with the given configuration
 */
export function createRunner(config?: Partial<RunnerConfig>, executor?: ProcessExecutor): ScriptRunner {
  return new ScriptRunner(config, executor);
}
