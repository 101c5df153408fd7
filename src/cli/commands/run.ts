/**
 * Run command - assemble a manifest and execute it with the configured interpreter
 *
 * Dependencies of every emitted template (including the ones absorbed
 * through refs) become the script's manifest preamble.
 */

import ora from "ora";

import type { Command } from "commander";

import { ScriptRunner } from "../../execution/runner.js";
import { PREAMBLE_STYLES } from "../../execution/types.js";
import { ValidationError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { err } from "../../lib/result.js";
import { assembleManifestFile } from "../../manifest/index.js";
import { loadConfig, resolveRunnerConfig } from "../config.js";
import { applyLogLevel, commonOptions, fail, resolveStrict } from "../shared.js";

import type { PreambleStyle, ProcessExecutor, RunnerConfig } from "../../execution/types.js";
import type { SplicerError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";

/**
 * Assemble a manifest and run the result
 *
 * @returns Interpreter stdout
 */
export async function runManifestFile(
  manifestPath: string,
  runnerConfig: RunnerConfig,
  options: { strict?: boolean; executor?: ProcessExecutor } = {}
): Promise<Result<string, SplicerError>> {
  const assembly = await assembleManifestFile(manifestPath, { strict: options.strict });
  if (!assembly.success) {
    return assembly;
  }

  const { assembler } = assembly.data;
  if (assembler.size === 0) {
    return err(new ValidationError(`Manifest ${manifestPath} emits no templates`));
  }

  const runner = new ScriptRunner(runnerConfig, options.executor);
  return runner.run(assembler);
}

function isPreambleStyle(value: string): value is PreambleStyle {
  return PREAMBLE_STYLES.some((style) => style === value);
}

export function registerRunCommand(program: Command): void {
  program
    .command("run <manifest>")
    .description("Assemble a manifest and execute it with an external interpreter")
    .option("--command <cmd>", "Interpreter to invoke (default from config, else rust-script)")
    .option("--preamble <style>", "Dependency preamble: cargo, none")
    .option("--timeout <ms>", "Kill the interpreter after this many milliseconds")
    .option("--strict", "Reject malformed placeholder syntax")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (manifest: string, options: Record<string, unknown>) => {
      const common = commonOptions(options);
      const config = loadConfig();
      if (!config.success) {
        fail(config.error);
      }
      applyLogLevel(common, config.data);

      const overrides: Partial<RunnerConfig> = {};
      if (typeof options["command"] === "string") {
        overrides.command = options["command"];
      }
      if (typeof options["preamble"] === "string") {
        const preamble = options["preamble"];
        if (!isPreambleStyle(preamble)) {
          fail(new ValidationError(`Invalid preamble: ${preamble}. Use: ${PREAMBLE_STYLES.join(", ")}`));
        }
        overrides.preamble = preamble;
      }
      if (typeof options["timeout"] === "string") {
        const timeoutMs = Number.parseInt(options["timeout"], 10);
        if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
          fail(new ValidationError(`Invalid timeout: ${options["timeout"]}`));
        }
        overrides.timeoutMs = timeoutMs;
      }

      const runnerConfig = resolveRunnerConfig(config.data, overrides);
      const showSpinner = !common.quiet && process.stderr.isTTY;
      const spinner = showSpinner ? ora(`Running ${runnerConfig.command}...`).start() : null;

      const output = await runManifestFile(manifest, runnerConfig, {
        strict: resolveStrict(common, config.data),
      });

      if (!output.success) {
        spinner?.fail(`${runnerConfig.command} failed`);
        fail(output.error);
      }

      spinner?.succeed(`${runnerConfig.command} finished`);
      logger.debug(`${output.data.length} chars of output`);
      process.stdout.write(output.data);
    });
}
