/**
 * Invocation dispatcher: turns one named tool call into one HTTP request.
 *
 * Arguments are partitioned by each declared parameter's location:
 * path values fill `{name}` placeholders, query values become the query
 * string, and the remaining arguments that match request-body properties
 * become the JSON body. Header-located parameters are recognized in the
 * tool definition but are not forwarded; callers that pass them have them
 * ignored. Only statically configured headers (`headers`, `auth`) are sent.
 *
 * There are no retries here. Pre-flight problems (unknown tool, missing
 * required argument) come back as Result errors before any network call;
 * everything after that is folded into an InvocationResult.
 */

import { Result } from "better-result";
import { z } from "zod";
import {
  MissingRequiredParameterError,
  ToolNameCollisionError,
  ToolNotFoundError,
  errorMessage,
  type DispatchError,
} from "./errors.js";
import type {
  HttpMethod,
  InvocationFailure,
  InvocationFailureKind,
  InvocationResult,
  ToolDefinition,
} from "./tools.js";

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export const DEFAULT_TIMEOUT_MS = 30_000;

export type HttpAuth =
  | { readonly type: "basic"; readonly username: string; readonly password: string }
  | { readonly type: "bearer"; readonly token: string }
  | { readonly type: "apiKey"; readonly header: string; readonly value: string };

export interface DispatcherOptions {
  readonly tools: readonly ToolDefinition[];
  /** Backend root, e.g. `http://localhost:8000` or `https://api.example.com/v1`. */
  readonly baseUrl: string;
  readonly timeoutMs?: number | undefined;
  /** Opaque headers sent with every request. */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly auth?: HttpAuth | undefined;
  readonly fetch?: typeof fetch | undefined;
}

export interface InvokeOptions {
  /** Aborting this signal cancels the in-flight request. */
  readonly signal?: AbortSignal | undefined;
}

export interface Dispatcher {
  readonly baseUrl: string;
  readonly tools: readonly ToolDefinition[];
  has(toolName: string): boolean;
  get(toolName: string): ToolDefinition | undefined;
  invoke(
    toolName: string,
    args?: Readonly<Record<string, unknown>>,
    options?: InvokeOptions,
  ): Promise<Result<InvocationResult, DispatchError>>;
}

export interface PreparedRequest {
  readonly method: HttpMethod;
  /** Path with placeholders substituted, without the query string. */
  readonly path: string;
  readonly url: string;
  /** JSON body, `undefined` when nothing is sent. */
  readonly body: unknown;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BODY_METHODS = new Set<HttpMethod>(["POST", "PUT", "PATCH"]);

const UNREACHABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const errorCodeSchema = z.object({ code: z.string() });

export function buildAuthHeaders(auth: HttpAuth | undefined): Record<string, string> {
  if (!auth) return {};
  switch (auth.type) {
    case "basic":
      return { Authorization: `Basic ${btoa(`${auth.username}:${auth.password}`)}` };
    case "bearer":
      return { Authorization: `Bearer ${auth.token}` };
    case "apiKey":
      return { [auth.header]: auth.value };
  }
}

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

function queryValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

function missing(
  tool: ToolDefinition,
  parameter: string,
  location: MissingRequiredParameterError["location"],
): Result<never, MissingRequiredParameterError> {
  return Result.err(new MissingRequiredParameterError({
    toolName: tool.name,
    parameter,
    location,
    message: `Missing required ${location} parameter '${parameter}' for tool '${tool.name}'`,
  }));
}

function isUnreachableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  for (const candidate of [error.cause, error]) {
    const parsed = errorCodeSchema.safeParse(candidate);
    if (parsed.success && UNREACHABLE_CODES.has(parsed.data.code)) return true;
  }
  return /(ECONNREFUSED|ENOTFOUND|EHOSTUNREACH|ENETUNREACH)/.test(errorMessage(error.cause ?? error));
}

function failure(kind: InvocationFailureKind, error: string): InvocationFailure {
  return { success: false, kind, error };
}

// ---------------------------------------------------------------------------
// Request building
// ---------------------------------------------------------------------------

/**
 * Partition `args` onto the tool's path, query and body positions.
 */
export function buildRequest(
  tool: ToolDefinition,
  args: Readonly<Record<string, unknown>>,
  baseUrl: string,
): Result<PreparedRequest, MissingRequiredParameterError> {
  let path = tool.pathTemplate;
  const query = new URLSearchParams();

  for (const parameter of tool.parameters) {
    const value = args[parameter.name];

    if (parameter.location === "path") {
      if (isAbsent(value) || value === "") {
        if (parameter.required) return missing(tool, parameter.name, "path");
        continue;
      }
      path = path.replaceAll(`{${parameter.name}}`, encodeURIComponent(queryValue(value)));
      continue;
    }

    if (parameter.location === "query") {
      if (isAbsent(value)) continue;
      if (Array.isArray(value)) {
        for (const item of value) {
          if (!isAbsent(item)) query.append(parameter.name, queryValue(item));
        }
      } else {
        query.append(parameter.name, queryValue(value));
      }
    }
    // location === "header": not forwarded.
  }

  let body: unknown;
  const requestBody = tool.requestBody;
  if (requestBody?.mode === "raw") {
    const value = args["body"];
    if (isAbsent(value)) {
      if (requestBody.required) return missing(tool, "body", "body");
    } else {
      body = value;
    }
  } else if (requestBody) {
    const fields: Record<string, unknown> = {};
    for (const property of requestBody.properties) {
      const value = args[property.name];
      if (isAbsent(value)) {
        if (property.required) return missing(tool, property.name, "body");
        continue;
      }
      fields[property.name] = value;
    }
    if (Object.keys(fields).length > 0) body = fields;
  }

  const queryString = query.toString();
  return Result.ok({
    method: tool.httpMethod,
    path,
    url: `${baseUrl.replace(/\/+$/, "")}${path}${queryString ? `?${queryString}` : ""}`,
    body: BODY_METHODS.has(tool.httpMethod) ? body : undefined,
  });
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const host = new URL(options.baseUrl).host;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const staticHeaders = new Headers({ ...(options.headers ?? {}), ...buildAuthHeaders(options.auth) });

  const byName = new Map<string, ToolDefinition>();
  for (const tool of options.tools) {
    if (byName.has(tool.name)) {
      throw new ToolNameCollisionError({
        toolName: tool.name,
        message: `Duplicate tool name '${tool.name}' in dispatcher for ${options.baseUrl}`,
      });
    }
    byName.set(tool.name, tool);
  }

  // Header names are case-insensitive; configured values win over the defaults.
  function requestHeaders(hasPayload: boolean): Headers {
    const headers = new Headers(staticHeaders);
    if (!headers.has("accept")) headers.set("accept", "application/json, text/plain;q=0.9, */*;q=0.8");
    if (hasPayload && !headers.has("content-type")) headers.set("content-type", "application/json");
    return headers;
  }

  async function send(request: PreparedRequest, signal: AbortSignal | undefined): Promise<InvocationResult> {
    const label = `${request.method} ${request.path}`;

    let payload: string | undefined;
    if (request.body !== undefined) {
      const encoded = Result.try(() => JSON.stringify(request.body));
      if (encoded.isErr()) {
        return failure("unexpected", `Failed to encode request body for ${label}: ${errorMessage(encoded.error.cause)}`);
      }
      payload = encoded.value;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    const fetchImpl = options.fetch ?? globalThis.fetch;

    try {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: requestHeaders(payload !== undefined),
        body: payload,
        signal: controller.signal,
      });

      const text = await response.text();
      const parsed = Result.try((): unknown => JSON.parse(text));

      if (!response.ok) {
        return {
          success: false,
          kind: "http",
          error: `${label} failed (HTTP ${response.status})`,
          statusCode: response.status,
          detail: parsed.isOk() ? parsed.value : text,
        };
      }

      return parsed.isOk()
        ? { success: true, statusCode: response.status, data: parsed.value, format: "json" }
        : { success: true, statusCode: response.status, data: text, format: "text" };
    } catch (error) {
      if (timedOut) return failure("timeout", `${label} timed out after ${timeoutMs}ms`);
      if (signal?.aborted) return failure("aborted", `${label} was aborted`);
      if (isUnreachableError(error)) return failure("unreachable", `${host} unreachable`);
      return failure("unexpected", errorMessage(error));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  return {
    baseUrl: options.baseUrl,
    tools: options.tools,
    has: (toolName) => byName.has(toolName),
    get: (toolName) => byName.get(toolName),
    async invoke(toolName, args = {}, invokeOptions) {
      const tool = byName.get(toolName);
      if (!tool) {
        return Result.err(new ToolNotFoundError({
          toolName,
          message: `Unknown tool '${toolName}'`,
        }));
      }

      let request: Result<PreparedRequest, MissingRequiredParameterError>;
      try {
        request = buildRequest(tool, args, options.baseUrl);
      } catch (error) {
        return Result.ok(failure(
          "unexpected",
          `Failed to encode arguments for ${tool.httpMethod} ${tool.pathTemplate}: ${errorMessage(error)}`,
        ));
      }
      if (request.isErr()) return Result.err(request.error);

      return Result.ok(await send(request.value, invokeOptions?.signal));
    },
  };
}

// ---------------------------------------------------------------------------
// Consumer envelope
// ---------------------------------------------------------------------------

/**
 * Consumer-facing JSON value for a result. A JSON success body passes
 * through unchanged; a text body is wrapped as `{ success: true, data }`.
 */
export function toEnvelope(result: InvocationResult): unknown {
  if (result.success) {
    return result.format === "json" ? result.data : { success: true, data: result.data };
  }

  return {
    success: false,
    error: result.error,
    ...(result.statusCode !== undefined ? { statusCode: result.statusCode } : {}),
    ...(result.detail !== undefined ? { detail: result.detail } : {}),
  };
}
