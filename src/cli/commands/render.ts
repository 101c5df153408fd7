/**
 * Render command - bind values into one template file and print it
 *
 * --set values are broadcast to the template and every --ref template,
 * so a referenced file can be completed from the command line too.
 */

import type { Command } from "commander";

import { ValidationError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { err } from "../../lib/result.js";
import { Assembler } from "../../templates/assembler.js";
import { loadHandle } from "../../templates/loader.js";
import { loadConfig } from "../config.js";
import {
  applyLogLevel,
  collect,
  commonOptions,
  fail,
  parseAssignments,
  resolveStrict,
  stringList,
} from "../shared.js";

import type { SplicerError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import type { TemplateHandle } from "../../templates/handle.js";

const log = logger.child("[render]");

export interface RenderFileOptions {
  /** name=value pairs */
  set?: string[];
  /** name=path pairs; each file is rendered into the placeholder */
  ref?: string[];
  strict?: boolean;
}

/**
 * Render a template file with values and referenced template files
 */
export async function renderFile(
  filePath: string,
  options: RenderFileOptions = {}
): Promise<Result<string, SplicerError>> {
  const sets = parseAssignments(options.set ?? [], "--set");
  if (!sets.success) {
    return sets;
  }
  const refs = parseAssignments(options.ref ?? [], "--ref");
  if (!refs.success) {
    return refs;
  }

  const main = await loadHandle(filePath, { strict: options.strict });
  if (!main.success) {
    return main;
  }

  const children: Array<[string, TemplateHandle]> = [];
  const scope = new Assembler().addTemplate(main.data);
  for (const [name, refPath] of refs.data) {
    const child = await loadHandle(refPath, { strict: options.strict });
    if (!child.success) {
      return child;
    }
    children.push([name, child.data]);
    scope.addTemplate(child.data);
  }

  for (const [name, value] of sets.data) {
    if (!scope.handles.some((handle) => handle.declares(name))) {
      return err(
        new ValidationError(`No template declares placeholder '${name}'`, { placeholder: name })
      );
    }
    const bound = scope.setGlobal(name, value);
    if (!bound.success) {
      return bound;
    }
  }

  for (const [name, child] of children) {
    const composed = main.data.setRef(name, child);
    if (!composed.success) {
      return composed;
    }
    log.debug(`composed ${child.template.sourcePath ?? "template"} into ${name}`);
  }

  return main.data.render();
}

export function registerRenderCommand(program: Command): void {
  program
    .command("render <file>")
    .description("Render a template file with placeholder values")
    .option("-s, --set <name=value>", "Bind a placeholder (repeatable)", collect, [])
    .option("-r, --ref <name=file>", "Bind a placeholder to another rendered template file (repeatable)", collect, [])
    .option("--strict", "Reject malformed placeholder syntax")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (file: string, options: Record<string, unknown>) => {
      const common = commonOptions(options);
      const config = loadConfig();
      if (!config.success) {
        fail(config.error);
      }
      applyLogLevel(common, config.data);

      const rendered = await renderFile(file, {
        set: stringList(options["set"]),
        ref: stringList(options["ref"]),
        strict: resolveStrict(common, config.data),
      });
      if (!rendered.success) {
        fail(rendered.error);
      }

      process.stdout.write(rendered.data);
    });
}
