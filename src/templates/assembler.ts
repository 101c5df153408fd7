import { ok, err } from "../lib/result.js";

import type { MissingPlaceholderError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { Renderable, TemplateHandle } from "./handle.js";

/**
 * An ordered collection of handles rendered as one text.
 *
 * Global binds are broadcasts: they reach every handle that declares the
 * placeholder and skip the rest without error.
 */
export class Assembler implements Renderable {
  private readonly templates: TemplateHandle[] = [];

  get size(): number {
    return this.templates.length;
  }

  get handles(): readonly TemplateHandle[] {
    return this.templates;
  }

  /**
   * Append a handle; render order follows insertion order
   */
  addTemplate(handle: TemplateHandle): this {
    this.templates.push(handle);
    return this;
  }

  /**
   * Bind a value on every handle that declares `name`
   */
  setGlobal(name: string, value: string): Result<void, MissingPlaceholderError> {
    for (const handle of this.templates) {
      if (!handle.declares(name)) {
        continue;
      }
      const result = handle.set(name, value);
      if (!result.success) {
        return result;
      }
    }
    return ok(undefined);
  }

  /**
   * Compose `other` into every handle that declares `name`.
   *
   * Each target composes its own copy, so no state is shared between targets
   * and `other` itself is left untouched.
   */
  setRefGlobal(name: string, other: TemplateHandle): Result<void, MissingPlaceholderError> {
    for (const handle of this.templates) {
      if (!handle.declares(name)) {
        continue;
      }
      const result = handle.setRef(name, other.clone());
      if (!result.success) {
        return result;
      }
    }
    return ok(undefined);
  }

  /**
   * Render every handle in order, each followed by a newline
   */
  renderAll(): Result<string, MissingPlaceholderError> {
    let output = "";
    for (const handle of this.templates) {
      const rendered = handle.render();
      if (!rendered.success) {
        return err(rendered.error);
      }
      output += `${rendered.data}\n`;
    }
    return ok(output);
  }

  render(): Result<string, MissingPlaceholderError> {
    return this.renderAll();
  }

  /**
   * Dependencies of every handle, concatenated in list order
   */
  get dependencies(): readonly string[] {
    return this.templates.flatMap((handle) => [...handle.dependencies]);
  }
}
