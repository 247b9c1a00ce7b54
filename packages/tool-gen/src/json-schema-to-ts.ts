/**
 * Convert JSON Schema to TypeScript type strings and Zod schemas.
 *
 * Type strings are shown to humans (`apitools tools`); Zod schemas become
 * the input shapes of MCP tools. Both accept raw, untrusted schema values
 * straight out of an API description.
 */

import { z } from "zod";
import { asArray, asRecord, asString, isRecord } from "./object.js";
import type { SchemaResolver } from "./schema-resolver.js";

export interface SchemaRenderOptions {
  /** Follows `$ref` pointers. Without one, references render as unknown. */
  readonly resolver?: SchemaResolver | undefined;
  readonly maxDepth?: number | undefined;
}

const DEFAULT_MAX_DEPTH = 8;

interface Walk {
  readonly options: SchemaRenderOptions;
  readonly depth: number;
  readonly seenRefs: ReadonlySet<string>;
}

/**
 * Follow a `$ref` one step. Returns `undefined` when it cannot be followed
 * (no resolver, a cycle, or an empty target).
 */
function follow(schema: Record<string, unknown>, walk: Walk): { schema: Record<string, unknown>; walk: Walk } | undefined {
  const ref = asString(schema["$ref"]);
  if (ref === undefined) return { schema, walk };
  if (!walk.options.resolver || walk.seenRefs.has(ref)) return undefined;

  const resolved = walk.options.resolver.resolve(ref);
  if (Object.keys(resolved).length === 0) return undefined;
  return { schema: resolved, walk: { ...walk, seenRefs: new Set([...walk.seenRefs, ref]) } };
}

function deeper(walk: Walk): Walk {
  return { ...walk, depth: walk.depth + 1 };
}

function primaryType(schema: Record<string, unknown>): string | undefined {
  const type = schema["type"];
  if (Array.isArray(type)) return asString(type.find((entry) => entry !== "null")) ?? asString(type[0]);
  return asString(type);
}

function formatPropertyKey(key: string): string {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(key) ? key : JSON.stringify(key);
}

// ---------------------------------------------------------------------------
// JSON Schema → TypeScript string
// ---------------------------------------------------------------------------

export function jsonSchemaToTypeString(schema: unknown, options: SchemaRenderOptions = {}): string {
  return toTypeString(schema, { options, depth: 0, seenRefs: new Set() });
}

function toTypeString(value: unknown, walk: Walk): string {
  if (!isRecord(value)) return "unknown";
  if (walk.depth > (walk.options.maxDepth ?? DEFAULT_MAX_DEPTH)) return "unknown";

  const followed = follow(value, walk);
  if (!followed) return "unknown";
  const { schema } = followed;
  const next = deeper(followed.walk);

  const enumValues = asArray(schema["enum"]);
  if (enumValues.length > 0) {
    return enumValues.map((entry) => JSON.stringify(entry)).join(" | ");
  }

  if (schema["const"] !== undefined) {
    return JSON.stringify(schema["const"]);
  }

  const variants = asArray(schema["oneOf"]).length > 0 ? asArray(schema["oneOf"]) : asArray(schema["anyOf"]);
  if (variants.length > 0) {
    return [...new Set(variants.map((entry) => toTypeString(entry, next)))].join(" | ");
  }

  const parts = asArray(schema["allOf"]);
  if (parts.length > 0) {
    return parts.map((entry) => toTypeString(entry, next)).join(" & ");
  }

  const type = primaryType(schema);
  if (!type && isRecord(schema["properties"])) {
    // Implicit object type
    return objectToTypeString(schema, next);
  }

  switch (type) {
    case "string":
      return "string";
    case "number":
    case "integer":
      return "number";
    case "boolean":
      return "boolean";
    case "null":
      return "null";
    case "array":
      return schema["items"] === undefined ? "Array<unknown>" : `Array<${toTypeString(schema["items"], next)}>`;
    case "object":
      return objectToTypeString(schema, next);
    default:
      return "unknown";
  }
}

function objectToTypeString(schema: Record<string, unknown>, walk: Walk): string {
  const props = asRecord(schema["properties"]);
  if (Object.keys(props).length === 0) {
    const additional = schema["additionalProperties"];
    const valueType = isRecord(additional) ? toTypeString(additional, walk) : "unknown";
    return `Record<string, ${valueType}>`;
  }

  const required = new Set(asArray(schema["required"]).filter((entry) => typeof entry === "string"));
  const entries = Object.entries(props).map(([key, propSchema]) => {
    const opt = required.has(key) ? "" : "?";
    return `${formatPropertyKey(key)}${opt}: ${toTypeString(propSchema, walk)}`;
  });
  return `{ ${entries.join("; ")} }`;
}

// ---------------------------------------------------------------------------
// JSON Schema → Zod schema
// ---------------------------------------------------------------------------

export function jsonSchemaToZod(schema: unknown, options: SchemaRenderOptions = {}): z.ZodTypeAny {
  return toZod(schema, { options, depth: 0, seenRefs: new Set() });
}

function toZod(value: unknown, walk: Walk): z.ZodTypeAny {
  if (!isRecord(value)) return z.any();
  if (walk.depth > (walk.options.maxDepth ?? DEFAULT_MAX_DEPTH)) return z.any();

  const followed = follow(value, walk);
  if (!followed) return z.any();
  const { schema } = followed;

  let result = baseZod(schema, deeper(followed.walk));
  if (schema["nullable"] === true) result = result.nullable();

  const description = asString(schema["description"]);
  return description ? result.describe(description) : result;
}

function unionOf(schemas: z.ZodTypeAny[]): z.ZodTypeAny {
  const [first, second, ...rest] = schemas;
  if (!first) return z.any();
  if (!second) return first;
  return z.union([first, second, ...rest]);
}

function baseZod(schema: Record<string, unknown>, walk: Walk): z.ZodTypeAny {
  const enumValues = asArray(schema["enum"]);
  if (enumValues.length > 0) {
    const strings = enumValues.filter((entry): entry is string => typeof entry === "string");
    const [first, ...rest] = strings;
    if (first !== undefined && strings.length === enumValues.length) {
      return z.enum([first, ...rest]);
    }
    return z.any();
  }

  const constant = schema["const"];
  if (typeof constant === "string" || typeof constant === "number" || typeof constant === "boolean") {
    return z.literal(constant);
  }

  const variants = asArray(schema["oneOf"]).length > 0 ? asArray(schema["oneOf"]) : asArray(schema["anyOf"]);
  if (variants.length > 0) {
    return unionOf(variants.map((entry) => toZod(entry, walk)));
  }

  const type = primaryType(schema);
  if (!type && isRecord(schema["properties"])) {
    return objectToZod(schema, walk);
  }

  switch (type) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "integer":
      return z.number().int();
    case "boolean":
      return z.boolean();
    case "null":
      return z.null();
    case "array":
      return z.array(schema["items"] === undefined ? z.unknown() : toZod(schema["items"], walk));
    case "object":
      return objectToZod(schema, walk);
    default:
      return z.any();
  }
}

function objectToZod(schema: Record<string, unknown>, walk: Walk): z.ZodTypeAny {
  const props = asRecord(schema["properties"]);
  if (Object.keys(props).length === 0) {
    return z.record(z.string(), z.unknown());
  }

  const required = new Set(asArray(schema["required"]).filter((entry) => typeof entry === "string"));
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [key, propSchema] of Object.entries(props)) {
    const zodType = toZod(propSchema, walk);
    shape[key] = required.has(key) ? zodType : zodType.optional();
  }

  return z.object(shape);
}
