import { describe, it, expect } from "vitest";
import { SchemaValidator } from "../src/core/SchemaValidator.js";

describe("SchemaValidator", () => {
  const validator = new SchemaValidator();

  const schema = {
    type: "object",
    properties: {
      name: { type: "string" },
      age: { type: "number", default: 25 },
      email: { type: "string", format: "email" },
      plan: { type: "string", enum: ["free", "pro"] },
    },
    required: ["name"],
    additionalProperties: false,
  };

  describe("validate", () => {
    it("should validate correct data", () => {
      const result = validator.validate(schema, { name: "Alice", age: 30 });
      expect(result).toEqual({ valid: true, data: { name: "Alice", age: 30 } });
    });

    it("should apply defaults on a copy", () => {
      const input = { name: "Bob" };
      const result = validator.validate(schema, input);
      expect(result).toEqual({ valid: true, data: { name: "Bob", age: 25 } });
      expect(input).toEqual({ name: "Bob" });
    });

    it("should coerce types", () => {
      const result = validator.validate(schema, { name: "Charlie", age: "30" });
      expect(result).toEqual({ valid: true, data: { name: "Charlie", age: 30 } });
    });

    it("should reject missing required fields", () => {
      const result = validator.validate(schema, { age: 30 });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.message).toBe("/ must have required property 'name'");
      }
    });

    it("should reject invalid format", () => {
      const result = validator.validate(schema, { name: "Dave", email: "not-an-email" });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.message).toBe('/email must match format "email"');
      }
    });

    it("should list the allowed values of an enum", () => {
      const result = validator.validate(schema, { name: "Erin", plan: "gold" });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.message).toBe("/plan must be one of free, pro");
      }
    });
  });

  describe("compile", () => {
    it("should throw for an invalid schema", () => {
      expect(() => validator.compile({ type: "object", properties: { a: { type: 5 } } })).toThrow();
    });
  });
});
