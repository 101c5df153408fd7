import { ok } from "../lib/result.js";
import { Template } from "./template.js";

import type { InvalidSyntaxError, MissingPlaceholderError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { TemplateOptions } from "./template.js";

/**
 * Something that renders to text and carries dependency declarations
 */
export interface Renderable {
  render(): Result<string, MissingPlaceholderError>;
  readonly dependencies: readonly string[];
}

/**
 * A template plus the ordered dependency declarations its rendered text needs.
 *
 * Dependencies are opaque strings; only the script runner interprets them.
 * Composing another handle copies its rendered text and its dependencies,
 * so the two handles stay independent afterwards.
 */
export class TemplateHandle implements Renderable {
  private readonly deps: string[] = [];

  constructor(private readonly inner: Template) {}

  /**
   * Parse content and wrap it in a handle
   */
  static parse(
    content: string,
    options?: TemplateOptions
  ): Result<TemplateHandle, InvalidSyntaxError> {
    const parsed = Template.parse(content, options);
    if (!parsed.success) {
      return parsed;
    }
    return ok(new TemplateHandle(parsed.data));
  }

  get template(): Template {
    return this.inner;
  }

  get dependencies(): readonly string[] {
    return this.deps;
  }

  /**
   * Append a dependency declaration
   */
  withDependency(dependency: string): this {
    this.deps.push(dependency);
    return this;
  }

  declares(name: string): boolean {
    return this.inner.declares(name);
  }

  set(name: string, value: string): Result<void, MissingPlaceholderError> {
    return this.inner.set(name, value);
  }

  /**
   * Bind the rendered output of another handle to a placeholder.
   *
   * The other handle must render cleanly and `name` must be declared here;
   * on either failure nothing changes. On success its dependencies are
   * appended after this handle's own. The other handle is not modified.
   */
  setRef(name: string, other: TemplateHandle): Result<void, MissingPlaceholderError> {
    const rendered = other.render();
    if (!rendered.success) {
      return rendered;
    }

    const bound = this.inner.set(name, rendered.data);
    if (!bound.success) {
      return bound;
    }

    this.deps.push(...other.dependencies);
    return ok(undefined);
  }

  render(): Result<string, MissingPlaceholderError> {
    return this.inner.render();
  }

  /**
   * Deep copy: the template bindings and the dependency list
   */
  clone(): TemplateHandle {
    const copy = new TemplateHandle(this.inner.clone());
    copy.deps.push(...this.deps);
    return copy;
  }
}
