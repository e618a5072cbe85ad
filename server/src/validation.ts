import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import type { JsonSchema, ValidationIssue, ValidationResult } from "./types.js";

export type PayloadValidator = (schema: JsonSchema, payload: unknown) => ValidationResult;

const toIssue = (error: ErrorObject): ValidationIssue => ({
  path: error.instancePath,
  message: error.message ?? error.keyword,
});

/**
 * Builds a JSON Schema validator on ajv. Compiled schemas are cached by their
 * serialized form since endpoints keep re-using the same one.
 */
export const createAjvValidator = (cacheSize = 256): PayloadValidator => {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const cache = new Map<string, ValidateFunction>();

  const compile = (schema: JsonSchema): ValidateFunction => {
    const key = JSON.stringify(schema);
    const cached = cache.get(key);
    if (cached) return cached;

    const validate = ajv.compile(schema);
    if (cache.size >= cacheSize) {
      const oldest = cache.keys().next();
      if (!oldest.done) cache.delete(oldest.value);
    }
    cache.set(key, validate);
    return validate;
  };

  return (schema, payload) => {
    let validate: ValidateFunction;
    try {
      validate = compile(schema);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { valid: false, errors: [{ path: "", message: `schema could not be compiled: ${message}` }] };
    }
    if (payload === undefined) {
      return { valid: false, errors: [{ path: "", message: "body is not valid JSON" }] };
    }
    if (validate(payload)) {
      return { valid: true };
    }
    return { valid: false, errors: (validate.errors ?? []).map(toIssue) };
  };
};

/** Returns why a schema cannot be compiled, or undefined when it can. */
export const schemaProblem = (schema: JsonSchema): string | undefined => {
  try {
    new Ajv({ strict: false }).compile(schema);
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};
