import fs from "fs/promises";

import { TemplateLoadError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err, tryCatchAsync } from "../lib/result.js";
import { TemplateHandle } from "./handle.js";
import { Template } from "./template.js";

import type { InvalidSyntaxError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { TemplateOptions } from "./template.js";

const log = logger.child("[loader]");

export type LoadOptions = Omit<TemplateOptions, "sourcePath">;

/**
 * Read template text from a file (UTF-8)
 */
export async function readTemplateText(filePath: string): Promise<Result<string, TemplateLoadError>> {
  const result = await tryCatchAsync(() => fs.readFile(filePath, "utf-8"));

  if (!result.success) {
    return err(
      new TemplateLoadError(`Failed to read template file: ${filePath}`, filePath, {
        cause: result.error.message,
      })
    );
  }

  log.debug(`read ${filePath} (${result.data.length} chars)`);
  return result;
}

/**
 * Load a template from a file, recording the path it came from
 */
export async function loadTemplate(
  filePath: string,
  options: LoadOptions = {}
): Promise<Result<Template, TemplateLoadError | InvalidSyntaxError>> {
  const text = await readTemplateText(filePath);
  if (!text.success) {
    return text;
  }

  const parsed = Template.parse(text.data, { ...options, sourcePath: filePath });
  if (parsed.success) {
    log.debug(`${filePath} declares: ${parsed.data.names.join(", ") || "(none)"}`);
  }
  return parsed;
}

/**
 * Load a template from a file and wrap it in a handle
 */
export async function loadHandle(
  filePath: string,
  options: LoadOptions = {}
): Promise<Result<TemplateHandle, TemplateLoadError | InvalidSyntaxError>> {
  const template = await loadTemplate(filePath, options);
  if (!template.success) {
    return template;
  }
  return ok(new TemplateHandle(template.data));
}
