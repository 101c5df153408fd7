/**
 * Configuration Management
 *
 * Reads project configuration from splicer.config.json in the working
 * directory. Environment variables override the file; CLI flags override both.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";

import { DEFAULT_RUNNER_CONFIG, PREAMBLE_STYLES } from "../execution/types.js";
import { ConfigError } from "../lib/errors.js";
import { isLogLevel, LOG_LEVEL_NAMES } from "../lib/logger.js";
import { ok, err, tryCatch } from "../lib/result.js";

import type { RunnerConfig } from "../execution/types.js";
import type { Result } from "../lib/result.js";

export const CONFIG_FILE_NAME = "splicer.config.json";

const LogLevelSchema = z.string().refine(isLogLevel, {
  message: `Log level must be one of: ${LOG_LEVEL_NAMES.join(", ")}`,
});

const PreambleSchema = z.string().refine(
  (value): value is RunnerConfig["preamble"] => PREAMBLE_STYLES.some((style) => style === value),
  { message: `Preamble must be one of: ${PREAMBLE_STYLES.join(", ")}` }
);

/**
 * Configuration schema
 */
export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.optional(),
  strict: z.boolean().optional(),
  runner: z
    .object({
      command: z.string().min(1).optional(),
      args: z.array(z.string()).optional(),
      preamble: PreambleSchema.optional(),
      extension: z.string().optional(),
      timeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Load configuration from disk, then apply environment overrides.
 * A missing file is an empty configuration.
 */
export function loadConfig(cwd: string = process.cwd(), env: Env = process.env): Result<Config, ConfigError> {
  const filePath = join(cwd, CONFIG_FILE_NAME);
  let config: Config = {};

  if (existsSync(filePath)) {
    const parsed = tryCatch(() => JSON.parse(readFileSync(filePath, "utf-8")) as unknown);
    if (!parsed.success) {
      return err(
        new ConfigError(`Failed to read ${CONFIG_FILE_NAME}`, {
          filePath,
          cause: parsed.error.message,
        })
      );
    }

    const validation = ConfigSchema.safeParse(parsed.data);
    if (!validation.success) {
      return err(
        new ConfigError(`Invalid ${CONFIG_FILE_NAME}`, {
          filePath,
          issues: validation.error.issues,
        })
      );
    }
    config = validation.data;
  }

  const envLevel = env["SPLICER_LOG_LEVEL"];
  if (envLevel !== undefined && envLevel.length > 0) {
    if (!isLogLevel(envLevel)) {
      return err(
        new ConfigError(`Invalid SPLICER_LOG_LEVEL: ${envLevel}`, { allowed: LOG_LEVEL_NAMES })
      );
    }
    config = { ...config, logLevel: envLevel };
  }

  const envRunner = env["SPLICER_RUNNER"];
  if (envRunner !== undefined && envRunner.length > 0) {
    config = { ...config, runner: { ...config.runner, command: envRunner } };
  }

  return ok(config);
}

/**
 * Merge configured runner settings and explicit overrides onto the defaults
 */
export function resolveRunnerConfig(
  config: Config,
  overrides: Partial<RunnerConfig> = {}
): RunnerConfig {
  const configured = config.runner ?? {};
  return {
    command: overrides.command ?? configured.command ?? DEFAULT_RUNNER_CONFIG.command,
    args: overrides.args ?? configured.args ?? DEFAULT_RUNNER_CONFIG.args,
    preamble: overrides.preamble ?? configured.preamble ?? DEFAULT_RUNNER_CONFIG.preamble,
    extension: overrides.extension ?? configured.extension ?? DEFAULT_RUNNER_CONFIG.extension,
    timeoutMs: overrides.timeoutMs ?? configured.timeoutMs ?? DEFAULT_RUNNER_CONFIG.timeoutMs,
  };
}

/**
 * Config file path for a directory (for display purposes)
 */
export function getConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, CONFIG_FILE_NAME);
}
