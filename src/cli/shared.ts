/**
 * Helpers shared by CLI commands
 */

import { ValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";
import { formatError } from "./formatters.js";

import type { Result } from "../lib/result.js";
import type { Config } from "./config.js";

/**
 * Options every command accepts
 */
export interface CommonOptions {
  verbose?: boolean;
  quiet?: boolean;
  strict?: boolean;
}

/**
 * Set the log level: --quiet, then --verbose, then config
 */
export function applyLogLevel(options: CommonOptions, config: Config): void {
  if (options.quiet) {
    logger.configure({ level: "error" });
  } else if (options.verbose) {
    logger.configure({ level: "debug" });
  } else if (config.logLevel !== undefined) {
    logger.configure({ level: config.logLevel });
  }
}

/**
 * Strict parsing from the flag, falling back to config
 */
export function resolveStrict(options: CommonOptions, config: Config): boolean {
  return options.strict ?? config.strict ?? false;
}

/**
 * Parse repeated `name=value` flags into ordered pairs.
 * Only the first `=` splits; the value may contain more.
 */
export function parseAssignments(
  assignments: readonly string[],
  flag: string
): Result<Array<[string, string]>, ValidationError> {
  const pairs: Array<[string, string]> = [];

  for (const assignment of assignments) {
    const index = assignment.indexOf("=");
    const name = index === -1 ? "" : assignment.slice(0, index).trim();
    if (name.length === 0) {
      return err(
        new ValidationError(`Invalid ${flag} '${assignment}': expected name=value`, {
          flag,
          assignment,
        })
      );
    }
    pairs.push([name, assignment.slice(index + 1)]);
  }

  return ok(pairs);
}

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Print a failure and exit non-zero
 */
export function fail(error: Error): never {
  console.error(formatError(error));
  process.exit(1);
}

/**
 * Read the options every command accepts from commander's option bag
 */
export function commonOptions(options: Record<string, unknown>): CommonOptions {
  return {
    verbose: Boolean(options["verbose"]),
    quiet: Boolean(options["quiet"]),
    strict: options["strict"] === true ? true : undefined,
  };
}

/**
 * Narrow a repeatable option's value to a string list
 */
export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}
