/**
 * Inspect command - list the placeholders a template declares
 */

import type { Command } from "commander";

import { ValidationError } from "../../lib/errors.js";
import { ok } from "../../lib/result.js";
import { Template } from "../../templates/template.js";
import { readTemplateText } from "../../templates/loader.js";
import { scanMarkers } from "../../templates/syntax.js";
import { loadConfig } from "../config.js";
import { formatReport, isValidOutputFormat } from "../formatters.js";
import { applyLogLevel, commonOptions, fail, resolveStrict } from "../shared.js";

import type { SplicerError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import type { PlaceholderReport } from "../formatters.js";

/**
 * Build a placeholder report for a template file
 */
export async function inspectTemplate(
  filePath: string,
  options: { strict?: boolean } = {}
): Promise<Result<PlaceholderReport, SplicerError>> {
  const text = await readTemplateText(filePath);
  if (!text.success) {
    return text;
  }

  const parsed = Template.parse(text.data, { strict: options.strict, sourcePath: filePath });
  if (!parsed.success) {
    return parsed;
  }

  const counts = new Map<string, number>();
  for (const marker of scanMarkers(text.data)) {
    counts.set(marker.name, (counts.get(marker.name) ?? 0) + 1);
  }

  return ok({
    source: filePath,
    placeholders: parsed.data.names.map((name) => ({ name, occurrences: counts.get(name) ?? 0 })),
  });
}

export function registerInspectCommand(program: Command): void {
  program
    .command("inspect <file>")
    .description("List the placeholders a template declares")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
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

      const outputFormat = String(options["output"] ?? "terminal");
      if (!isValidOutputFormat(outputFormat)) {
        fail(new ValidationError(`Invalid output format: ${outputFormat}. Use: terminal, json`));
      }

      const report = await inspectTemplate(file, { strict: resolveStrict(common, config.data) });
      if (!report.success) {
        fail(report.error);
      }

      console.log(formatReport(report.data, outputFormat));
    });
}
