/**
 * Tool sources: turns the configured API descriptions into one catalog.
 *
 * Sources are compiled in config order into a single namespace: names
 * claimed by an earlier source are reserved for the later ones, which get
 * a numeric suffix on collision.
 */

import {
  ConfigError,
  createDispatcher,
  createToolCatalog,
  type Dispatcher,
  type Schema,
  type ToolCatalog,
  type ToolDefinition,
} from "@apitools/core";
import {
  compileTools,
  createSchemaResolver,
  describeApi,
  loadSpec,
  type ApiInfo,
  type SchemaResolver,
  type SpecSource,
} from "@apitools/tool-gen";
import { Result } from "better-result";
import type { ApitoolsConfig, SourceConfig } from "./config.js";

export interface LoadToolSourcesOptions {
  /** Used for loading documents and for dispatch. Defaults to global fetch. */
  readonly fetch?: typeof fetch | undefined;
}

export interface PreparedSource {
  readonly name: string;
  readonly document: Schema;
  readonly api: ApiInfo;
  readonly baseUrl: string;
  readonly tools: readonly ToolDefinition[];
  /** Lenient resolver over `document`, for rendering the tools' schemas. */
  readonly resolver: SchemaResolver;
}

export interface LoadedSource {
  readonly name: string;
  readonly api: ApiInfo;
  readonly baseUrl: string;
  readonly toolCount: number;
}

export interface LoadedToolSources {
  readonly catalog: ToolCatalog;
  readonly sources: readonly LoadedSource[];
  /** Tool name → resolver of the document the tool was compiled from. */
  readonly resolvers: ReadonlyMap<string, SchemaResolver>;
}

export function specSourceOf(source: SourceConfig): SpecSource {
  const { url, file } = source.openapi;
  if (url !== undefined) return { url };
  if (file !== undefined) return { file };
  throw new ConfigError({ path: source.name, message: `Source '${source.name}' has neither a url nor a file` });
}

/**
 * Configured `baseUrl`, else the document's first server. A relative server
 * URL (`/v1`) is taken relative to the URL the document came from.
 */
export function resolveBaseUrl(source: SourceConfig, api: ApiInfo): string {
  const candidate = source.openapi.baseUrl ?? api.baseUrl;
  if (candidate === undefined) {
    throw new ConfigError({
      path: source.name,
      message: `Source '${source.name}' has no baseUrl and its API description declares no server`,
    });
  }

  const resolved = Result.try(() => new URL(candidate, source.openapi.url).href);
  if (resolved.isErr()) {
    throw new ConfigError({
      path: source.name,
      message: `Source '${source.name}' has an invalid base URL '${candidate}'`,
    });
  }
  return resolved.value.replace(/\/+$/, "");
}

/** Load and compile one source. `reservedNames` gains the new tool names. */
export async function prepareSource(
  source: SourceConfig,
  reservedNames: Set<string>,
  options: LoadToolSourcesOptions = {},
): Promise<PreparedSource> {
  const document = await loadSpec(specSourceOf(source), {
    timeoutMs: source.openapi.timeoutMs,
    headers: source.openapi.headers,
    fetch: options.fetch,
  });

  const api = describeApi(document);
  const baseUrl = resolveBaseUrl(source, api);
  const tools = compileTools(document, { ...source.toolGeneration, reservedNames });
  for (const tool of tools) reservedNames.add(tool.name);

  return { name: source.name, document, api, baseUrl, tools, resolver: createSchemaResolver(document) };
}

export function enabledSources(config: ApitoolsConfig): SourceConfig[] {
  return config.sources.filter((source) => {
    if (!source.enabled) console.warn(`[apitools] source '${source.name}' is disabled, skipping`);
    return source.enabled;
  });
}

export async function loadToolSources(
  config: ApitoolsConfig,
  options: LoadToolSourcesOptions = {},
): Promise<LoadedToolSources> {
  const reservedNames = new Set<string>();
  const dispatchers: Dispatcher[] = [];
  const sources: LoadedSource[] = [];
  const resolvers = new Map<string, SchemaResolver>();

  for (const source of enabledSources(config)) {
    const prepared = await prepareSource(source, reservedNames, options);
    dispatchers.push(createDispatcher({
      tools: prepared.tools,
      baseUrl: prepared.baseUrl,
      timeoutMs: source.openapi.timeoutMs,
      headers: source.openapi.headers,
      auth: source.openapi.auth,
      fetch: options.fetch,
    }));
    for (const tool of prepared.tools) resolvers.set(tool.name, prepared.resolver);
    sources.push({
      name: prepared.name,
      api: prepared.api,
      baseUrl: prepared.baseUrl,
      toolCount: prepared.tools.length,
    });
  }

  return { catalog: createToolCatalog(dispatchers), sources, resolvers };
}
