import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { runManifestFile } from "@/cli/commands/run.js";
import { resolveRunnerConfig } from "@/cli/config.js";
import { ValidationError } from "@/lib/errors.js";
import { unwrap } from "@/lib/result.js";

import type { ProcessExecutor } from "@/execution/types.js";

describe("run command", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "splicer-run-cmd-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs the assembled manifest and returns stdout", async () => {
    const manifest = join(dir, "build.yml");
    await writeFile(
      manifest,
      [
        "templates:",
        "  - id: main",
        "    content: 'fn main() { @[body]@ }'",
        "    refs: { body: body }",
        "  - id: body",
        "    content: 'println!(\"hi\");'",
        "    dependencies: ['regex = \"1\"']",
        "    emit: false",
        "",
      ].join("\n")
    );

    const executor = vi.fn<ProcessExecutor>(async () => ({
      stdout: "hi\n",
      stderr: "",
      exitCode: 0,
      timedOut: false,
    }));
    const config = resolveRunnerConfig({}, { command: "interp" });

    expect(unwrap(await runManifestFile(manifest, config, { executor }))).toBe("hi\n");
    expect(executor).toHaveBeenCalledTimes(1);
    expect(executor.mock.calls[0]?.[0]).toBe("interp");
  });

  it("refuses a manifest that emits nothing", async () => {
    const manifest = join(dir, "build.yml");
    await writeFile(manifest, "templates:\n  - id: hidden\n    content: x\n    emit: false\n");
    const executor = vi.fn<ProcessExecutor>();

    const result = await runManifestFile(manifest, resolveRunnerConfig({}), { executor });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe(`Manifest ${manifest} emits no templates`);
    }
    expect(executor).not.toHaveBeenCalled();
  });
});
