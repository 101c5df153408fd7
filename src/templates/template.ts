import { InvalidSyntaxError, MissingPlaceholderError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";
import { findSyntaxIssue, markerFor, placeholderPattern, scanMarkers } from "./syntax.js";

import type { Result } from "../lib/result.js";

/**
 * Options for parsing template content
 */
export interface TemplateOptions {
  /** Reject stray opening delimiters and blank names (default: false) */
  strict?: boolean;
  /** File the content was read from, if any */
  sourcePath?: string;
}

/**
 * Value held by a placeholder that has not been bound
 */
const UNBOUND = "";

/**
 * Raw text plus the closed set of placeholders it declares.
 *
 * The placeholder set is fixed at parse time: binding changes values,
 * never keys. Names keep the order of their first appearance in the
 * content, and render reports unbound names in that order.
 *
 * @example
 * ```typescript
 * const parsed = Template.parse("Hello @[name]@!");
 * if (parsed.success) {
 *   const template = parsed.data;
 *   template.set("name", "world");
 *   template.render(); // ok("Hello world!")
 * }
 * ```
 */
export class Template {
  private readonly placeholders: Map<string, string>;

  private constructor(
    readonly content: string,
    placeholders: Map<string, string>,
    readonly sourcePath?: string
  ) {
    this.placeholders = placeholders;
  }

  /**
   * Parse content into a template with every placeholder unbound
   *
   * @param content Raw template text
   * @param options Parse options
   * @returns The template, or a syntax error in strict mode
   */
  static parse(content: string, options: TemplateOptions = {}): Result<Template, InvalidSyntaxError> {
    if (options.strict) {
      const issue = findSyntaxIssue(content);
      if (issue) {
        return err(
          new InvalidSyntaxError(`Invalid template syntax: ${issue.message}`, issue.offset, {
            sourcePath: options.sourcePath,
          })
        );
      }
    }

    const placeholders = new Map<string, string>();
    for (const marker of scanMarkers(content)) {
      placeholders.set(marker.name, UNBOUND);
    }

    return ok(new Template(content, placeholders, options.sourcePath));
  }

  /**
   * Declared placeholder names, in order of first appearance
   */
  get names(): string[] {
    return [...this.placeholders.keys()];
  }

  declares(name: string): boolean {
    return this.placeholders.has(name);
  }

  /**
   * Current value of a placeholder: "" when unbound, undefined when undeclared
   */
  valueOf(name: string): string | undefined {
    return this.placeholders.get(name);
  }

  /**
   * Names that still hold the unbound sentinel
   */
  unbound(): string[] {
    return this.names.filter((name) => this.placeholders.get(name) === UNBOUND);
  }

  /**
   * Bind a value to a declared placeholder. Rebinding overwrites.
   *
   * Binding "" is accepted but leaves the placeholder unbound for render.
   */
  set(name: string, value: string): Result<void, MissingPlaceholderError> {
    if (!this.placeholders.has(name)) {
      return err(new MissingPlaceholderError(name, "undeclared"));
    }
    this.placeholders.set(name, value);
    return ok(undefined);
  }

  /**
   * Replace every exact `@[name]@` marker with its bound value.
   *
   * Fails on the first unbound placeholder before anything is substituted.
   * Substitution is a single pass over the original content, so bound
   * values are inserted literally and never re-expanded. Padded markers
   * such as `@[ name ]@` declare `name` but are left as written.
   */
  render(): Result<string, MissingPlaceholderError> {
    for (const [name, value] of this.placeholders) {
      if (value === UNBOUND) {
        return err(new MissingPlaceholderError(name, "unbound"));
      }
    }

    const rendered = this.content.replace(
      placeholderPattern(),
      (raw: string, name: string) => {
        if (raw !== markerFor(name.trim())) {
          return raw;
        }
        return this.placeholders.get(name) ?? raw;
      }
    );

    return ok(rendered);
  }

  /**
   * Independent copy with the same content and bindings
   */
  clone(): Template {
    return new Template(this.content, new Map(this.placeholders), this.sourcePath);
  }
}
