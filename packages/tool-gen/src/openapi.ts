/**
 * OpenAPI tool compiler: walks an API description and produces one
 * ToolDefinition per retained operation.
 *
 * Accepts OpenAPI 3.x and Swagger 2.0 documents that are already parsed
 * into plain objects (see spec-loader.ts). Compilation is a synchronous,
 * pure pass: compiling the same document twice yields identical lists.
 */

import {
  HTTP_METHODS,
  defineTool,
  pathPlaceholders,
  type BodyPropertySpec,
  type HttpMethod,
  type ParameterLocation,
  type ParameterSpec,
  type RequestBodySpec,
  type Schema,
  type ToolDefinition,
} from "@apitools/core";
import { NameRegistry, rawNameFromRoute, sanitizeToolName, simplifyToolName } from "./naming.js";
import { asArray, asRecord, asString, isRecord } from "./object.js";
import { createSchemaResolver, type SchemaResolver } from "./schema-resolver.js";

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface CompileOptions {
  /** Keep every operation. When false only `includeEndpoints` are kept. Defaults to true. */
  readonly includeAll?: boolean | undefined;
  /** Operation ids or raw paths to keep when `includeAll` is false. */
  readonly includeEndpoints?: readonly string[] | undefined;
  /** Operation ids or raw paths to drop. Always wins over inclusion. */
  readonly excludeEndpoints?: readonly string[] | undefined;
  readonly snakeCaseNames?: boolean | undefined;
  readonly simplifiedNames?: boolean | undefined;
  /** Prepended after simplification. */
  readonly toolPrefix?: string | undefined;
  /** Throw on unresolvable `$ref` instead of treating it as an empty schema. */
  readonly strictRefs?: boolean | undefined;
  /** Names already used in the target namespace, e.g. by other sources. */
  readonly reservedNames?: Iterable<string> | undefined;
}

export interface ApiInfo {
  readonly title: string;
  readonly version: string;
  readonly description: string;
  /** First server URL, or `undefined` when the document declares none. */
  readonly baseUrl: string | undefined;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SUCCESS_STATUSES = ["200", "201", "204"] as const;

const PARAMETER_LOCATIONS = new Set<string>(["path", "query", "header"]);

function isParameterLocation(value: string): value is ParameterLocation {
  return PARAMETER_LOCATIONS.has(value);
}

function typeHintOf(schema: Schema): string {
  const type = schema["type"];
  if (Array.isArray(type)) return asString(type[0]) ?? "string";
  return asString(type) ?? "string";
}

function enumOf(schema: Schema): readonly unknown[] | undefined {
  const values = schema["enum"];
  return Array.isArray(values) && values.length > 0 ? values : undefined;
}

/**
 * Pick the JSON-flavored media type of a `content` map:
 * `application/json`, then any `*json*`, then `*\/*`.
 */
export function preferredMediaType(content: Record<string, unknown>): [string, Record<string, unknown>] | undefined {
  const keys = Object.keys(content);
  const key =
    keys.find((entry) => entry.toLowerCase().split(";")[0]?.trim() === "application/json") ??
    keys.find((entry) => entry.toLowerCase().includes("json")) ??
    keys.find((entry) => entry === "*/*");
  if (key === undefined) return undefined;
  return [key, asRecord(content[key])];
}

/** Parameter schema: `schema` for OpenAPI 3, top-level `type`/`enum`/`items` for Swagger 2. */
function parameterSchema(entry: Record<string, unknown>): Schema {
  if (isRecord(entry["schema"])) return entry["schema"];

  const type = asString(entry["type"]);
  if (!type) return {};

  const fallback: Schema = { type };
  if (Array.isArray(entry["enum"]) && entry["enum"].length > 0) fallback["enum"] = entry["enum"];
  if (isRecord(entry["items"])) fallback["items"] = entry["items"];
  if (entry["default"] !== undefined) fallback["default"] = entry["default"];
  return fallback;
}

export function describeOperation(operation: Record<string, unknown>): string {
  const summary = asString(operation["summary"]) ?? "";
  const description = asString(operation["description"]) ?? "";
  return description ? `${summary}\n\n${description}`.trim() : summary;
}

// ---------------------------------------------------------------------------
// API info
// ---------------------------------------------------------------------------

export function describeApi(document: Schema): ApiInfo {
  const info = asRecord(document["info"]);

  let baseUrl: string | undefined;
  const firstServer = asRecord(asArray(document["servers"])[0]);
  const serverUrl = asString(firstServer["url"]);
  if (serverUrl) {
    baseUrl = serverUrl;
  } else {
    const host = asString(document["host"]);
    if (host) {
      const scheme = asString(asArray(document["schemes"])[0]) ?? "https";
      baseUrl = `${scheme}://${host}${asString(document["basePath"]) ?? ""}`;
    }
  }

  return {
    title: asString(info["title"]) ?? "API",
    version: asString(info["version"]) ?? "1.0.0",
    description: asString(info["description"]) ?? "",
    baseUrl,
  };
}

// ---------------------------------------------------------------------------
// Operation parts
// ---------------------------------------------------------------------------

interface RawParameter {
  readonly name: string;
  readonly in: string;
  readonly entry: Record<string, unknown>;
}

function collectParameters(
  resolver: SchemaResolver,
  pathItem: Record<string, unknown>,
  operation: Record<string, unknown>,
): RawParameter[] {
  const merged = new Map<string, RawParameter>();
  for (const list of [pathItem["parameters"], operation["parameters"]]) {
    for (const value of asArray(list)) {
      const entry = resolver.deref(value);
      const name = asString(entry["name"]);
      const location = asString(entry["in"]);
      if (!name || !location) continue;
      merged.set(`${location}:${name}`, { name, in: location, entry });
    }
  }
  return [...merged.values()];
}

function toParameterSpecs(pathTemplate: string, raw: readonly RawParameter[]): ParameterSpec[] {
  const specs: ParameterSpec[] = [];

  for (const { name, in: location, entry } of raw) {
    if (!isParameterLocation(location)) continue;
    const schema = parameterSchema(entry);
    specs.push({
      name,
      location,
      required: location === "path" || entry["required"] === true,
      description: asString(entry["description"]) ?? asString(schema["description"]) ?? "",
      typeHint: typeHintOf(schema),
      default: schema["default"],
      enum: enumOf(schema),
      schema,
    });
  }

  for (const placeholder of pathPlaceholders(pathTemplate)) {
    if (specs.some((spec) => spec.location === "path" && spec.name === placeholder)) continue;
    specs.push({
      name: placeholder,
      location: "path",
      required: true,
      description: "",
      typeHint: "string",
      schema: { type: "string" },
    });
  }

  return specs;
}

function toBodyProperties(resolver: SchemaResolver, schema: Schema, required: boolean, description: string): Pick<RequestBodySpec, "mode" | "properties"> {
  const properties = asRecord(schema["properties"]);
  if (Object.keys(properties).length === 0) {
    return {
      mode: "raw",
      properties: [{ name: "body", required, description, typeHint: typeHintOf({ type: schema["type"] ?? "object" }) }],
    };
  }

  const requiredNames = new Set(asArray(schema["required"]));
  const specs: BodyPropertySpec[] = Object.entries(properties).map(([name, value]) => {
    const property = resolver.deref(value);
    return {
      name,
      required: requiredNames.has(name),
      description: asString(property["description"]) ?? asString(asRecord(value)["description"]) ?? "",
      typeHint: typeHintOf(property),
      default: property["default"],
      enum: enumOf(property),
    };
  });
  return { mode: "properties", properties: specs };
}

function extractRequestBody(
  resolver: SchemaResolver,
  document: Schema,
  operation: Record<string, unknown>,
  rawParameters: readonly RawParameter[],
): RequestBodySpec | undefined {
  // OpenAPI 3.x
  if (operation["requestBody"] !== undefined) {
    const requestBody = resolver.deref(operation["requestBody"]);
    const media = preferredMediaType(asRecord(requestBody["content"]));
    if (!media) return undefined;

    const [contentType, mediaObject] = media;
    const schema = resolver.deref(mediaObject["schema"]);
    const required = requestBody["required"] === true;
    const description = asString(requestBody["description"]) ?? "";
    return { required, description, contentType, schema, ...toBodyProperties(resolver, schema, required, description) };
  }

  // Swagger 2.0 `in: body`
  const bodyParameter = rawParameters.find((parameter) => parameter.in === "body");
  if (!bodyParameter) return undefined;

  const consumes = asArray(operation["consumes"]).length > 0 ? asArray(operation["consumes"]) : asArray(document["consumes"]);
  const schema = resolver.deref(bodyParameter.entry["schema"]);
  const required = bodyParameter.entry["required"] === true;
  const description = asString(bodyParameter.entry["description"]) ?? "";
  return {
    required,
    description,
    contentType: asString(consumes.find((entry) => typeof entry === "string" && entry.includes("json"))) ?? "application/json",
    schema,
    ...toBodyProperties(resolver, schema, required, description),
  };
}

function extractResponseSchema(resolver: SchemaResolver, operation: Record<string, unknown>): Schema | undefined {
  const responses = asRecord(operation["responses"]);

  for (const status of SUCCESS_STATUSES) {
    if (responses[status] === undefined) continue;
    const response = resolver.deref(responses[status]);

    const media = preferredMediaType(asRecord(response["content"]));
    if (media && media[1]["schema"] !== undefined) {
      return resolver.deref(media[1]["schema"]);
    }
    // Swagger 2.0
    if (response["schema"] !== undefined) {
      return resolver.deref(response["schema"]);
    }
  }

  return undefined;
}

// ---------------------------------------------------------------------------
// Compiler
// ---------------------------------------------------------------------------

function isRetained(options: CompileOptions, operationId: string | undefined, path: string): boolean {
  const matches = (list: readonly string[] | undefined) =>
    (list ?? []).some((entry) => entry === path || (operationId !== undefined && entry === operationId));

  if (matches(options.excludeEndpoints)) return false;
  if (options.includeAll === false) return matches(options.includeEndpoints);
  return true;
}

/**
 * Compile every retained `(path, method)` pair of `document` into a tool.
 * Methods are visited in the order get, post, put, patch, delete.
 */
export function compileTools(document: Schema, options: CompileOptions = {}): ToolDefinition[] {
  const resolver = createSchemaResolver(document, { strict: options.strictRefs });
  const registry = new NameRegistry(options.reservedNames);
  const tools: ToolDefinition[] = [];

  for (const [path, pathValue] of Object.entries(asRecord(document["paths"]))) {
    const pathItem = resolver.deref(pathValue);

    for (const httpMethod of HTTP_METHODS) {
      const method = httpMethod.toLowerCase();
      if (!isRecord(pathItem[method])) continue;
      const operation = asRecord(pathItem[method]);

      const operationId = asString(operation["operationId"]) || undefined;
      if (!isRetained(options, operationId, path)) continue;

      tools.push(compileOperation(resolver, document, registry, options, {
        path,
        httpMethod,
        pathItem,
        operation,
        operationId,
      }));
    }
  }

  return tools;
}

interface OperationInput {
  readonly path: string;
  readonly httpMethod: HttpMethod;
  readonly pathItem: Record<string, unknown>;
  readonly operation: Record<string, unknown>;
  readonly operationId: string | undefined;
}

function compileOperation(
  resolver: SchemaResolver,
  document: Schema,
  registry: NameRegistry,
  options: CompileOptions,
  input: OperationInput,
): ToolDefinition {
  const { path, httpMethod, pathItem, operation, operationId } = input;

  const rawName = operationId ?? rawNameFromRoute(httpMethod, path);
  const simplified = simplifyToolName(sanitizeToolName(rawName), {
    snakeCase: options.snakeCaseNames,
    simplify: options.simplifiedNames,
  });
  const name = registry.claim(`${options.toolPrefix ?? ""}${simplified}`);

  const rawParameters = collectParameters(resolver, pathItem, operation);

  return defineTool({
    name,
    rawName,
    operationId,
    httpMethod,
    pathTemplate: path,
    parameters: toParameterSpecs(path, rawParameters),
    requestBody: extractRequestBody(resolver, document, operation, rawParameters),
    responseSchema: extractResponseSchema(resolver, operation),
    tags: asArray(operation["tags"]).filter((tag): tag is string => typeof tag === "string"),
    description: describeOperation(operation),
  });
}
