/**
 * Template Module
 *
 * Placeholder templates and their composition:
 * - Parse @[name]@ placeholders into a closed set
 * - Bind literal values or the rendered output of other templates
 * - Broadcast binds across an ordered assembly and render it as one text
 *
 * @example
 * ```typescript
 * import { TemplateHandle, Assembler, unwrap } from "splicer";
 *
 * const fn = unwrap(TemplateHandle.parse("fn @[name]@() {\n    @[body]@\n}"));
 * const print = unwrap(TemplateHandle.parse('println("@[message]@");'));
 *
 * print.set("message", "hi");
 * fn.set("name", "greet");
 * fn.setRef("body", print);
 *
 * const assembler = new Assembler().addTemplate(fn);
 * const result = assembler.renderAll();
 * ```
 */

export { Template, type TemplateOptions } from "./template.js";
export { TemplateHandle, type Renderable } from "./handle.js";
export { Assembler } from "./assembler.js";
export {
  OPEN_DELIMITER,
  CLOSE_DELIMITER,
  PLACEHOLDER_PATTERN,
  placeholderPattern,
  scanMarkers,
  findSyntaxIssue,
  markerFor,
  type ScannedMarker,
  type SyntaxIssue,
} from "./syntax.js";
export { loadTemplate, loadHandle, readTemplateText, type LoadOptions } from "./loader.js";
