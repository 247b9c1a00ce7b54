/**
 * Tool definition model.
 *
 * A tool is one HTTP operation of an API description, compiled into a
 * plain data record. Dispatch is driven entirely by these records; no
 * per-operation code is generated.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "PATCH", "DELETE"];

/**
 * Where a declared parameter lives in the request. Header parameters are
 * recorded but never forwarded by the dispatcher.
 */
export type ParameterLocation = "path" | "query" | "header";

/** Raw JSON-schema-like record as found in the API description. */
export type Schema = Record<string, unknown>;

export interface ParameterSpec {
  readonly name: string;
  readonly location: ParameterLocation;
  readonly required: boolean;
  readonly description: string;
  /** JSON schema `type` of the parameter, `"string"` when undeclared. */
  readonly typeHint: string;
  readonly default?: unknown;
  readonly enum?: readonly unknown[] | undefined;
  /** The parameter's schema as declared, references left unresolved. */
  readonly schema: Schema;
}

export interface BodyPropertySpec {
  readonly name: string;
  readonly required: boolean;
  readonly description: string;
  readonly typeHint: string;
  readonly default?: unknown;
  readonly enum?: readonly unknown[] | undefined;
}

/**
 * Request body, flattened one level deep. Nested object properties are
 * not expanded.
 *
 * In `raw` mode the body schema has no top-level properties (an array or a
 * scalar), and the single `body` property carries the whole payload.
 */
export interface RequestBodySpec {
  readonly required: boolean;
  readonly description: string;
  readonly contentType: string;
  readonly schema: Schema;
  readonly mode: "properties" | "raw";
  readonly properties: readonly BodyPropertySpec[];
}

export interface ToolDefinition {
  readonly _tag: "ToolDefinition";
  /** Catalog-unique, simplified name. */
  readonly name: string;
  /** Name before simplification and disambiguation. */
  readonly rawName: string;
  readonly operationId?: string | undefined;
  readonly httpMethod: HttpMethod;
  readonly pathTemplate: string;
  readonly parameters: readonly ParameterSpec[];
  readonly requestBody?: RequestBodySpec | undefined;
  readonly responseSchema?: Schema | undefined;
  readonly tags: readonly string[];
  readonly description: string;
}

// ---------------------------------------------------------------------------
// Invocation results
// ---------------------------------------------------------------------------

export interface InvocationSuccess {
  readonly success: true;
  readonly statusCode: number;
  /** Parsed JSON body, or the raw text when the body is not JSON. */
  readonly data: unknown;
  readonly format: "json" | "text";
}

export type InvocationFailureKind = "unreachable" | "http" | "timeout" | "aborted" | "unexpected";

export interface InvocationFailure {
  readonly success: false;
  readonly kind: InvocationFailureKind;
  readonly error: string;
  readonly statusCode?: number | undefined;
  readonly detail?: unknown;
}

export type InvocationResult = InvocationSuccess | InvocationFailure;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export type DefineToolInput = Omit<ToolDefinition, "_tag" | "rawName"> & {
  readonly rawName?: string | undefined;
};

/**
 * Create a frozen tool definition.
 *
 * @example
 * ```ts
 * const getOrder = defineTool({
 *   name: "get_order",
 *   httpMethod: "GET",
 *   pathTemplate: "/orders/{order_id}",
 *   parameters: [{ name: "order_id", location: "path", required: true, description: "", typeHint: "string", schema: {} }],
 *   tags: ["orders"],
 *   description: "Fetch one order",
 * });
 * ```
 */
export function defineTool(input: DefineToolInput): ToolDefinition {
  return Object.freeze({
    _tag: "ToolDefinition" as const,
    name: input.name,
    rawName: input.rawName ?? input.name,
    operationId: input.operationId,
    httpMethod: input.httpMethod,
    pathTemplate: input.pathTemplate,
    parameters: Object.freeze([...input.parameters]),
    requestBody: input.requestBody,
    responseSchema: input.responseSchema,
    tags: Object.freeze([...input.tags]),
    description: input.description,
  });
}

/** `{name}` placeholders of a path template, in order of appearance. */
export function pathPlaceholders(pathTemplate: string): string[] {
  return [...pathTemplate.matchAll(/\{([^{}]+)\}/g)].flatMap((match) => (match[1] ? [match[1]] : []));
}
