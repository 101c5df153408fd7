/**
 * Script Runner Tests
 *
 * The interpreter is replaced by an in-process executor, so nothing is spawned.
 */

import { existsSync, readFileSync } from "fs";
import { basename } from "path";

import { describe, it, expect, vi } from "vitest";

import { ScriptRunner, buildScript, createRunner } from "@/execution/runner.js";
import { DEFAULT_RUNNER_CONFIG } from "@/execution/types.js";
import { Assembler, TemplateHandle } from "@/templates/index.js";
import { ExecutionError, MissingPlaceholderError } from "@/lib/errors.js";
import { unwrap } from "@/lib/result.js";

import type { ProcessExecutor, ProcessOutput } from "@/execution/types.js";

function handle(content: string): TemplateHandle {
  return unwrap(TemplateHandle.parse(content));
}

function output(overrides: Partial<ProcessOutput> = {}): ProcessOutput {
  return { stdout: "", stderr: "", exitCode: 0, timedOut: false, ...overrides };
}

/** Executor that records the script it was handed and replies with `reply` */
function fakeExecutor(reply: ProcessOutput) {
  const seen: { script: string; file: string }[] = [];
  const executor = vi.fn<ProcessExecutor>(async (_command, args) => {
    const file = args[args.length - 1] ?? "";
    seen.push({ script: readFileSync(file, "utf-8"), file });
    return reply;
  });
  return { executor, seen };
}

describe("Script Runner", () => {
  describe("buildScript", () => {
    it("returns the text unchanged without dependencies", () => {
      expect(buildScript("fn main() {}", [], "cargo")).toBe("fn main() {}");
    });

    it("returns the text unchanged with the none preamble", () => {
      expect(buildScript("fn main() {}", ['regex = "1"'], "none")).toBe("fn main() {}");
    });

    it("writes a cargo block with one dependency per line", () => {
      expect(buildScript("fn main() {}\n", ['regex = "1"', 'serde = "1"'], "cargo")).toBe(
        [
          "//! ```cargo",
          "//! [dependencies]",
          '//! regex = "1"',
          '//! serde = "1"',
          "//! ```",
          "fn main() {}",
          "",
        ].join("\n")
      );
    });
  });

  describe("configuration", () => {
    it("fills unset fields from the defaults", () => {
      const runner = createRunner({ command: "interp", timeoutMs: 5 });
      expect(runner.settings).toEqual({ ...DEFAULT_RUNNER_CONFIG, command: "interp", timeoutMs: 5 });
    });
  });

  describe("run", () => {
    it("writes the script, runs the command and returns stdout", async () => {
      const { executor, seen } = fakeExecutor(output({ stdout: "hi\n" }));
      const runner = new ScriptRunner({ command: "interp", args: ["--quiet"] }, executor);

      const source = handle('fn main() { println!("@[msg]@"); }').withDependency('regex = "1"');
      source.set("msg", "hi");

      const result = await runner.run(source);

      expect(unwrap(result)).toBe("hi\n");
      expect(executor).toHaveBeenCalledTimes(1);

      const [command, args, options] = executor.mock.calls[0] ?? [];
      expect(command).toBe("interp");
      expect(args?.[0]).toBe("--quiet");
      expect(args).toHaveLength(2);
      expect(options).toEqual({ timeoutMs: DEFAULT_RUNNER_CONFIG.timeoutMs });

      expect(seen[0]?.script).toBe(
        '//! ```cargo\n//! [dependencies]\n//! regex = "1"\n//! ```\nfn main() { println!("hi"); }'
      );
      expect(basename(seen[0]?.file ?? "")).toBe("script.rs");
    });

    it("uses the configured extension", async () => {
      const { executor, seen } = fakeExecutor(output());
      const runner = new ScriptRunner({ extension: ".txt" }, executor);

      await runner.run(handle("plain"));

      expect(basename(seen[0]?.file ?? "")).toBe("script.txt");
    });

    it("removes the temporary script afterwards", async () => {
      const { executor, seen } = fakeExecutor(output({ exitCode: 3, stderr: "boom" }));
      const runner = new ScriptRunner({}, executor);

      await runner.run(handle("plain"));

      expect(seen).toHaveLength(1);
      expect(existsSync(seen[0]?.file ?? "")).toBe(false);
    });

    it("runs an assembler with its combined dependencies", async () => {
      const { executor, seen } = fakeExecutor(output({ stdout: "ok" }));
      const runner = new ScriptRunner({}, executor);
      const assembler = new Assembler()
        .addTemplate(handle("use a;").withDependency("a"))
        .addTemplate(handle("use b;").withDependency("b"));

      expect(unwrap(await runner.run(assembler))).toBe("ok");
      expect(seen[0]?.script).toBe(
        "//! ```cargo\n//! [dependencies]\n//! a\n//! b\n//! ```\nuse a;\nuse b;\n"
      );
    });

    it("does not start the interpreter when rendering fails", async () => {
      const { executor } = fakeExecutor(output());
      const runner = new ScriptRunner({}, executor);

      const result = await runner.run(handle("@[missing]@"));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(MissingPlaceholderError);
      }
      expect(executor).not.toHaveBeenCalled();
    });

    it("returns stderr as the error on a non-zero exit", async () => {
      const { executor } = fakeExecutor(output({ exitCode: 101, stderr: "error[E0425]" }));
      const runner = new ScriptRunner({ command: "interp" }, executor);

      const result = await runner.run(handle("plain"));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ExecutionError);
        expect(result.error.message).toBe("error[E0425]");
        expect(result.error.context).toEqual({ command: "interp", exitCode: 101 });
      }
    });

    it("reports a command that could not be started", async () => {
      const { executor } = fakeExecutor(
        output({ exitCode: 1, spawnError: "spawn interp ENOENT" })
      );
      const runner = new ScriptRunner({ command: "interp" }, executor);

      const result = await runner.run(handle("plain"));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Failed to start interp: spawn interp ENOENT");
      }
    });

    it("reports a timeout", async () => {
      const { executor } = fakeExecutor(output({ exitCode: 1, timedOut: true }));
      const runner = new ScriptRunner({ command: "interp", timeoutMs: 250 }, executor);

      const result = await runner.run(handle("plain"));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("interp timed out after 250ms");
      }
    });
  });
});
