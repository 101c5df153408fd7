import { describe, it, expect } from "vitest";

import {
  SplicerError,
  ValidationError,
  ConfigError,
  TemplateLoadError,
  InvalidSyntaxError,
  MissingPlaceholderError,
  CompositionError,
  ExecutionError,
} from "../../src/lib/errors.js";

describe("Error Classes", () => {
  describe("SplicerError", () => {
    it("should create a basic error", () => {
      const error = new SplicerError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("SplicerError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
    });

    it("should serialize to JSON", () => {
      const error = new SplicerError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "SplicerError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("MissingPlaceholderError", () => {
    it("describes an undeclared placeholder", () => {
      const error = new MissingPlaceholderError("nmae", "undeclared");
      expect(error.message).toBe("Missing placeholder: nmae is not declared by the template");
      expect(error.code).toBe("MISSING_PLACEHOLDER");
      expect(error.placeholder).toBe("nmae");
      expect(error.reason).toBe("undeclared");
      expect(error.context).toEqual({ placeholder: "nmae", reason: "undeclared" });
      expect(error).toBeInstanceOf(SplicerError);
    });

    it("describes an unbound placeholder", () => {
      const error = new MissingPlaceholderError("body", "unbound");
      expect(error.message).toBe("Missing placeholder: body is not bound");
      expect(error.name).toBe("MissingPlaceholderError");
    });
  });

  describe("InvalidSyntaxError", () => {
    it("carries the offset in its context", () => {
      const error = new InvalidSyntaxError("Invalid template syntax: bad", 12, { sourcePath: "a.tpl" });
      expect(error.offset).toBe(12);
      expect(error.code).toBe("INVALID_SYNTAX");
      expect(error.context).toEqual({ sourcePath: "a.tpl", offset: 12 });
    });
  });

  describe("TemplateLoadError", () => {
    it("carries the file path in its context", () => {
      const error = new TemplateLoadError("Failed", "/tmp/x.tpl", { cause: "ENOENT" });
      expect(error.filePath).toBe("/tmp/x.tpl");
      expect(error.code).toBe("TEMPLATE_LOAD_ERROR");
      expect(error.context).toEqual({ cause: "ENOENT", filePath: "/tmp/x.tpl" });
    });
  });

  describe("codes", () => {
    it.each([
      [new ValidationError("v"), "VALIDATION_ERROR", "ValidationError"],
      [new ConfigError("c"), "CONFIG_ERROR", "ConfigError"],
      [new CompositionError("m"), "COMPOSITION_ERROR", "CompositionError"],
      [new ExecutionError("e"), "EXECUTION_ERROR", "ExecutionError"],
    ])("%s has code %s", (error, code, name) => {
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
      expect(error).toBeInstanceOf(SplicerError);
    });
  });
});
