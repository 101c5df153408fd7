#!/usr/bin/env node
/**
 * Splicer CLI entry point
 *
 * Commands:
 * - inspect  - List the placeholders a template declares
 * - render   - Render one template file with values and referenced files
 * - assemble - Render every template of an assembly manifest
 * - run      - Assemble a manifest and execute it with an external interpreter
 */

import { Command } from "commander";

import { VERSION } from "../version.js";
import { registerAssembleCommand } from "./commands/assemble.js";
import { registerInspectCommand } from "./commands/inspect.js";
import { registerRenderCommand } from "./commands/render.js";
import { registerRunCommand } from "./commands/run.js";

const program = new Command();

program
  .name("splicer")
  .description("Compose @[placeholder]@ templates into rendered text")
  .version(VERSION);

registerInspectCommand(program);
registerRenderCommand(program);
registerAssembleCommand(program);
registerRunCommand(program);

await program.parseAsync();
