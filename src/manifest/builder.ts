import fs from "fs/promises";
import path from "path";

import YAML from "yaml";

import { CompositionError, TemplateLoadError, ValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err, tryCatch, tryCatchAsync } from "../lib/result.js";
import { Assembler } from "../templates/assembler.js";
import { TemplateHandle } from "../templates/handle.js";
import { loadHandle } from "../templates/loader.js";
import { ManifestSchema } from "./schema.js";

import type { SplicerError, InvalidSyntaxError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { Manifest, ManifestTemplate } from "./schema.js";

const log = logger.child("[manifest]");

/**
 * Options for building an assembly from a manifest
 */
export interface BuildOptions {
  /** Directory that template `file` paths are relative to */
  baseDir: string;
  /** Parse templates in strict mode */
  strict?: boolean;
}

/**
 * A built manifest: the output assembler plus every handle by id
 */
export interface Assembly {
  assembler: Assembler;
  handles: Map<string, TemplateHandle>;
}

interface Node {
  entry: ManifestTemplate;
  handle: TemplateHandle;
}

/**
 * Parse and validate manifest YAML
 */
export function parseManifest(text: string, source = "<inline>"): Result<Manifest, ValidationError> {
  const parsed = tryCatch(() => YAML.parse(text) as unknown);
  if (!parsed.success) {
    return err(
      new ValidationError(`Invalid YAML in manifest ${source}`, {
        source,
        cause: parsed.error.message,
      })
    );
  }

  const validation = ManifestSchema.safeParse(parsed.data);
  if (!validation.success) {
    return err(
      new ValidationError(`Invalid manifest ${source}`, {
        source,
        issues: validation.error.issues,
      })
    );
  }

  return ok(validation.data);
}

/**
 * Read and validate a manifest file
 */
export async function loadManifest(
  filePath: string
): Promise<Result<Manifest, TemplateLoadError | ValidationError>> {
  const text = await tryCatchAsync(() => fs.readFile(filePath, "utf-8"));
  if (!text.success) {
    return err(
      new TemplateLoadError(`Failed to read manifest: ${filePath}`, filePath, {
        cause: text.error.message,
      })
    );
  }
  return parseManifest(text.data, filePath);
}

async function createHandle(
  entry: ManifestTemplate,
  options: BuildOptions
): Promise<Result<TemplateHandle, TemplateLoadError | InvalidSyntaxError>> {
  const loaded =
    entry.file !== undefined
      ? await loadHandle(path.resolve(options.baseDir, entry.file), { strict: options.strict })
      : TemplateHandle.parse(entry.content ?? "", { strict: options.strict });

  if (!loaded.success) {
    return loaded;
  }

  for (const dependency of entry.dependencies) {
    loaded.data.withDependency(dependency);
  }
  return loaded;
}

/**
 * Build the handles a manifest describes and assemble the emitted ones.
 *
 * Order of operations: globals over every entry, then each entry's own
 * values (which win over globals), then refs depth-first so a child's own
 * refs are composed before the child is rendered into its parent.
 */
export async function buildAssembly(
  manifest: Manifest,
  options: BuildOptions
): Promise<Result<Assembly, SplicerError>> {
  const nodes = new Map<string, Node>();

  for (const entry of manifest.templates) {
    if (nodes.has(entry.id)) {
      return err(new ValidationError(`Duplicate template id: ${entry.id}`, { id: entry.id }));
    }

    const handle = await createHandle(entry, options);
    if (!handle.success) {
      return handle;
    }
    nodes.set(entry.id, { entry, handle: handle.data });
  }

  const pool = new Assembler();
  for (const node of nodes.values()) {
    pool.addTemplate(node.handle);
  }
  for (const [name, value] of Object.entries(manifest.globals)) {
    const bound = pool.setGlobal(name, value);
    if (!bound.success) {
      return bound;
    }
  }

  for (const { entry, handle } of nodes.values()) {
    for (const [name, value] of Object.entries(entry.values)) {
      const bound = handle.set(name, value);
      if (!bound.success) {
        return bound;
      }
    }
  }

  const composed = new Set<string>();

  const compose = (id: string, chain: string[]): Result<void, SplicerError> => {
    if (composed.has(id)) {
      return ok(undefined);
    }
    if (chain.includes(id)) {
      const cycle = [...chain, id];
      return err(new CompositionError(`Reference cycle: ${cycle.join(" -> ")}`, { cycle }));
    }

    const node = nodes.get(id);
    if (node === undefined) {
      return err(
        new CompositionError(`Unknown template reference: ${id}`, { id, from: chain.at(-1) })
      );
    }

    for (const [placeholder, refId] of Object.entries(node.entry.refs)) {
      const child = compose(refId, [...chain, id]);
      if (!child.success) {
        return child;
      }

      const target = nodes.get(refId);
      if (target === undefined) {
        return err(new CompositionError(`Unknown template reference: ${refId}`, { id: refId, from: id }));
      }

      const bound = node.handle.setRef(placeholder, target.handle);
      if (!bound.success) {
        return err(bound.error);
      }
      log.debug(`composed ${refId} into ${id}.${placeholder}`);
    }

    composed.add(id);
    return ok(undefined);
  };

  for (const id of nodes.keys()) {
    const result = compose(id, []);
    if (!result.success) {
      return result;
    }
  }

  const assembler = new Assembler();
  const handles = new Map<string, TemplateHandle>();
  for (const [id, node] of nodes) {
    handles.set(id, node.handle);
    if (node.entry.emit) {
      assembler.addTemplate(node.handle);
    }
  }

  log.debug(`assembled ${assembler.size} of ${nodes.size} templates`);
  return ok({ assembler, handles });
}

/**
 * Load a manifest file and build it, resolving files beside the manifest
 */
export async function assembleManifestFile(
  filePath: string,
  options: Omit<BuildOptions, "baseDir"> = {}
): Promise<Result<Assembly, SplicerError>> {
  const manifest = await loadManifest(filePath);
  if (!manifest.success) {
    return manifest;
  }
  return buildAssembly(manifest.data, { ...options, baseDir: path.dirname(filePath) });
}
