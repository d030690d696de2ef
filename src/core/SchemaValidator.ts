import AjvModule, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";

// Both packages are CommonJS with a `default` export that points at themselves.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Schema validation result.
 */
export type ValidationResult =
  | { valid: true; data: unknown }
  | { valid: false; errors: ErrorObject[]; message: string };

/**
 * AJV-based JSON Schema validator for tool arguments.
 * Coerces scalar types and applies schema defaults on a copy of the input.
 */
export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly cache = new WeakMap<object, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      coerceTypes: true,
      useDefaults: true,
      strict: false,
    });
    addFormats(this.ajv);
  }

  /**
   * Compile a schema up front. Throws if the schema itself is invalid.
   */
  compile(schema: object): void {
    this.getOrCompile(schema);
  }

  /**
   * Validate data against a JSON Schema.
   */
  validate(schema: object, data: unknown): ValidationResult {
    const validate = this.getOrCompile(schema);
    const cloned = structuredClone(data);
    if (validate(cloned)) {
      return { valid: true, data: cloned };
    }
    const errors = validate.errors ?? [];
    return { valid: false, errors, message: formatErrors(errors) };
  }

  private getOrCompile(schema: object): ValidateFunction {
    let cached = this.cache.get(schema);
    if (!cached) {
      cached = this.ajv.compile(schema);
      this.cache.set(schema, cached);
    }
    return cached;
  }
}

export function formatErrors(errors: ErrorObject[]): string {
  return errors
    .map((e) => {
      const path = e.instancePath || "/";
      if (e.keyword === "enum" && Array.isArray(e.params.allowedValues)) {
        return `${path} must be one of ${e.params.allowedValues.join(", ")}`;
      }
      return `${path} ${e.message ?? "is invalid"}`;
    })
    .join("; ");
}
