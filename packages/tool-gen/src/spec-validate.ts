/**
 * Structural validation of a loaded API description, for `apitools validate`.
 * Compilation does not depend on it: lenient compilation accepts documents
 * that fail validation.
 */

import SwaggerParser from "@apidevtools/swagger-parser";
import { errorMessage, type Schema } from "@apitools/core";
import { Result } from "better-result";

interface SwaggerParserAdapter {
  validate(spec: unknown): Promise<unknown>;
}

function createSwaggerParserAdapter(parserModule: unknown): SwaggerParserAdapter {
  if ((typeof parserModule !== "object" || parserModule === null) && typeof parserModule !== "function") {
    throw new Error("SwaggerParser module is missing a validate method");
  }

  const validate = Reflect.get(parserModule, "validate");
  if (typeof validate !== "function") {
    throw new Error("SwaggerParser module is missing a validate method");
  }

  return {
    validate: (spec) => Reflect.apply(validate, parserModule, [spec]),
  };
}

export interface SpecValidation {
  readonly valid: boolean;
  /** Validator message when invalid. */
  readonly message?: string | undefined;
}

/**
 * Validate against the OpenAPI / Swagger schemas. The validator dereferences
 * in place, so it works on a copy.
 */
export async function validateSpec(document: Schema): Promise<SpecValidation> {
  const parser = createSwaggerParserAdapter(SwaggerParser);
  const result = await Result.tryPromise(() => parser.validate(structuredClone(document)));
  if (result.isErr()) {
    return { valid: false, message: errorMessage(result.error.cause) };
  }
  return { valid: true };
}
