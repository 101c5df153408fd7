import { describe, it, expect } from "vitest";

import { Template, TemplateHandle } from "@/templates/index.js";
import { InvalidSyntaxError } from "@/lib/errors.js";
import { unwrap } from "@/lib/result.js";

function handle(content: string): TemplateHandle {
  return unwrap(TemplateHandle.parse(content));
}

describe("TemplateHandle", () => {
  describe("construction", () => {
    it("wraps a template with no dependencies", () => {
      const template = unwrap(Template.parse("@[x]@"));
      const wrapped = new TemplateHandle(template);
      expect(wrapped.template).toBe(template);
      expect(wrapped.dependencies).toEqual([]);
    });

    it("propagates strict syntax errors from parse", () => {
      const result = TemplateHandle.parse("oops @[", { strict: true });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidSyntaxError);
      }
    });
  });

  describe("withDependency", () => {
    it("appends in call order and returns the same handle", () => {
      const h = handle("@[x]@");
      const returned = h.withDependency('serde = "1"').withDependency('regex = "1"');
      expect(returned).toBe(h);
      expect(h.dependencies).toEqual(['serde = "1"', 'regex = "1"']);
    });
  });

  describe("set / render", () => {
    it("delegates to the wrapped template", () => {
      const h = handle("Hello @[name]@");
      expect(h.set("name", "you").success).toBe(true);
      expect(unwrap(h.render())).toBe("Hello you");
      expect(h.declares("name")).toBe(true);
      expect(h.declares("other")).toBe(false);
    });
  });

  describe("setRef", () => {
    it("flattens a child's render into the parent", () => {
      const fn = handle("fn @[name]@() {\n @[body]@\n}");
      const print = handle('println("@[message]@");');

      print.set("message", "hi");
      fn.set("name", "greet");
      expect(fn.setRef("body", print).success).toBe(true);

      const rendered = unwrap(fn.render());
      expect(rendered).toBe('fn greet() {\n println("hi");\n}');
      expect(rendered).not.toMatch(/@\[[^\]]+\]@/);
    });

    it("composes nested templates", () => {
      const outer = handle("mod test {\n    @[function]@\n}");
      const inner = handle("fn helper() {\n    @[body]@\n}");
      const print = handle('println("@[message]@");');

      print.set("message", "Nested template");
      inner.setRef("body", print);
      outer.setRef("function", inner);

      expect(unwrap(outer.render())).toBe(
        'mod test {\n    fn helper() {\n    println("Nested template");\n}\n}'
      );
    });

    it("appends the child's dependencies after its own", () => {
      const a = handle("@[slot]@").withDependency("d2");
      const b = handle("b").withDependency("d1");

      a.setRef("slot", b);

      expect(a.dependencies).toEqual(["d2", "d1"]);
      expect(b.dependencies).toEqual(["d1"]);
    });

    it("fails with the child's error when the child is incomplete", () => {
      const parent = handle("@[body]@").withDependency("p");
      const child = handle("@[message]@").withDependency("c");

      const result = parent.setRef("body", child);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.placeholder).toBe("message");
        expect(result.error.reason).toBe("unbound");
      }
      expect(parent.template.valueOf("body")).toBe("");
      expect(parent.dependencies).toEqual(["p"]);
    });

    it("fails without merging dependencies when the placeholder is undeclared", () => {
      const parent = handle("@[body]@");
      const child = handle("done").withDependency("c");

      const result = parent.setRef("bodi", child);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.placeholder).toBe("bodi");
        expect(result.error.reason).toBe("undeclared");
      }
      expect(parent.dependencies).toEqual([]);
    });

    it("is not affected by later changes to the child", () => {
      const parent = handle("[@[body]@]");
      const child = handle("@[word]@");
      child.set("word", "hi");

      parent.setRef("body", child);
      child.set("word", "bye");
      child.withDependency("late");

      expect(unwrap(parent.render())).toBe("[hi]");
      expect(parent.dependencies).toEqual([]);
    });
  });

  describe("clone", () => {
    it("copies bindings and dependencies independently", () => {
      const original = handle("@[x]@").withDependency("d");
      original.set("x", "1");

      const copy = original.clone();
      copy.set("x", "2");
      copy.withDependency("e");

      expect(unwrap(original.render())).toBe("1");
      expect(original.dependencies).toEqual(["d"]);
      expect(unwrap(copy.render())).toBe("2");
      expect(copy.dependencies).toEqual(["d", "e"]);
    });
  });
});
