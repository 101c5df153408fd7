/**
 * Assemble command - build a manifest and print every emitted template
 */

import type { Command } from "commander";

import { assembleManifestFile } from "../../manifest/index.js";
import { loadConfig } from "../config.js";
import { applyLogLevel, commonOptions, fail, resolveStrict } from "../shared.js";

import type { SplicerError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";

/**
 * Render a manifest's assembly to one text
 */
export async function assembleFile(
  manifestPath: string,
  options: { strict?: boolean } = {}
): Promise<Result<string, SplicerError>> {
  const assembly = await assembleManifestFile(manifestPath, options);
  if (!assembly.success) {
    return assembly;
  }
  return assembly.data.assembler.renderAll();
}

export function registerAssembleCommand(program: Command): void {
  program
    .command("assemble <manifest>")
    .description("Render every template of an assembly manifest")
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

      const output = await assembleFile(manifest, { strict: resolveStrict(common, config.data) });
      if (!output.success) {
        fail(output.error);
      }

      process.stdout.write(output.data);
    });
}
