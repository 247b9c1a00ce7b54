/**
 * Spec loader: obtains a parsed API description from a file, a document
 * URL, a documentation page URL, or an inline object.
 *
 * Every failure is a SpecLoadError: a catalog is never built from a
 * partially loaded document.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { SpecLoadError, errorMessage, type Schema } from "@apitools/core";
import { Result } from "better-result";
import { parse as parseYaml } from "yaml";
import { isRecord } from "./object.js";
import {
  COMMON_SPEC_ENDPOINTS,
  findConfigScripts,
  findSpecUrl,
  looksLikeHtml,
} from "./spec-discovery.js";

export const SPEC_FETCH_TIMEOUT_MS = 30_000;

export type SpecSource =
  | { readonly file: string }
  | { readonly url: string }
  | { readonly document: Schema };

export interface LoadSpecOptions {
  readonly timeoutMs?: number | undefined;
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly fetch?: typeof fetch | undefined;
}

export interface FetchedText {
  readonly url: string;
  readonly status: number;
  readonly contentType: string;
  readonly body: string;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const parseJsonText = (text: string): unknown => JSON.parse(text);
const parseYamlText = (text: string): unknown => parseYaml(text);

/**
 * Parse JSON or YAML text into an object. `preferYaml` only changes which
 * format is tried first.
 */
export function parseSpecText(text: string, preferYaml = false): Result<Schema, string> {
  const parsers = preferYaml ? [parseYamlText, parseJsonText] : [parseJsonText, parseYamlText];
  for (const parser of parsers) {
    const parsed = Result.try(() => parser(text));
    if (parsed.isOk() && isRecord(parsed.value)) return Result.ok(parsed.value);
  }
  return Result.err("content is neither a JSON nor a YAML object");
}

export function isApiDescription(value: Schema): boolean {
  return typeof value["openapi"] === "string" || typeof value["swagger"] === "string";
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

function createTextFetcher(options: LoadSpecOptions): (url: string) => Promise<FetchedText> {
  const timeoutMs = options.timeoutMs ?? SPEC_FETCH_TIMEOUT_MS;

  return async (url) => {
    const fetchImpl = options.fetch ?? globalThis.fetch;
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      const response = await fetchImpl(url, {
        headers: { accept: "application/json, application/yaml;q=0.9, text/html;q=0.8, */*;q=0.5", ...options.headers },
        redirect: "follow",
        signal: controller.signal,
      });
      return {
        url: response.url || url,
        status: response.status,
        contentType: response.headers.get("content-type") ?? "",
        body: await response.text(),
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new SpecLoadError({ source: url, message: `Timed out after ${timeoutMs}ms loading ${url}` });
      }
      const host = Result.try(() => new URL(url).host).unwrapOr(url);
      throw new SpecLoadError({ source: url, message: `${host} unreachable while loading ${url}: ${errorMessage(error)}` });
    } finally {
      clearTimeout(timeout);
    }
  };
}

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

async function loadFromFile(file: string): Promise<Schema> {
  const text = await readFile(file, "utf8").catch((error: unknown) => {
    throw new SpecLoadError({ source: file, message: `Cannot read ${file}: ${errorMessage(error)}` });
  });

  const extension = extname(file).toLowerCase();
  const parsed = parseSpecText(text, extension === ".yaml" || extension === ".yml");
  if (parsed.isErr()) {
    throw new SpecLoadError({ source: file, message: `Cannot parse ${file}: ${parsed.error}` });
  }
  return parsed.value;
}

function documentFrom(response: FetchedText, source: string): Schema {
  if (response.status < 200 || response.status >= 300) {
    throw new SpecLoadError({ source, message: `HTTP ${response.status} loading ${response.url}` });
  }
  const parsed = parseSpecText(response.body, /ya?ml/i.test(response.contentType));
  if (parsed.isErr()) {
    throw new SpecLoadError({ source, message: `Cannot parse ${response.url}: ${parsed.error}` });
  }
  return parsed.value;
}

async function loadFromUrl(url: string, options: LoadSpecOptions): Promise<Schema> {
  const fetchText = createTextFetcher(options);
  const page = await fetchText(url);

  if (looksLikeHtml(page.contentType) && page.status >= 200 && page.status < 300) {
    return discoverFromPage(page, fetchText);
  }
  return documentFrom(page, url);
}

/**
 * Inline page patterns first, then each linked config script once, then
 * the well-known endpoints once each.
 */
function resolveUrl(reference: string, base: string): string | undefined {
  const resolved = Result.try(() => new URL(reference, base).href);
  return resolved.isOk() ? resolved.value : undefined;
}

function unresolvable(reference: string, pageUrl: string): SpecLoadError {
  return new SpecLoadError({ source: pageUrl, message: `Invalid API description URL '${reference}' on ${pageUrl}` });
}

async function discoverFromPage(
  page: FetchedText,
  fetchText: (url: string) => Promise<FetchedText>,
): Promise<Schema> {
  const pageUrl = page.url;

  const inline = findSpecUrl(page.body);
  if (inline) {
    const specUrl = resolveUrl(inline, pageUrl);
    if (specUrl === undefined) throw unresolvable(inline, pageUrl);
    console.warn(`[apitools] found API description URL ${specUrl} on ${pageUrl}`);
    return documentFrom(await fetchText(specUrl), pageUrl);
  }

  for (const script of findConfigScripts(page.body)) {
    const scriptUrl = resolveUrl(script, pageUrl);
    if (scriptUrl === undefined) {
      console.warn(`[apitools] skipping script with invalid URL '${script}' on ${pageUrl}`);
      continue;
    }
    const fetched = await Result.tryPromise(() => fetchText(scriptUrl));
    if (fetched.isErr()) {
      console.warn(`[apitools] skipping script ${scriptUrl}: ${errorMessage(fetched.error.cause)}`);
      continue;
    }
    if (fetched.value.status !== 200) continue;

    const found = findSpecUrl(fetched.value.body);
    if (found) {
      const specUrl = resolveUrl(found, pageUrl);
      if (specUrl === undefined) throw unresolvable(found, pageUrl);
      console.warn(`[apitools] found API description URL ${specUrl} in ${scriptUrl}`);
      return documentFrom(await fetchText(specUrl), pageUrl);
    }
  }

  console.warn(`[apitools] no API description URL on ${pageUrl}, probing well-known endpoints`);
  for (const endpoint of COMMON_SPEC_ENDPOINTS) {
    const probeUrl = resolveUrl(endpoint, pageUrl);
    if (probeUrl === undefined) continue;
    const fetched = await Result.tryPromise(() => fetchText(probeUrl));
    if (fetched.isErr() || fetched.value.status !== 200) continue;

    const parsed = parseSpecText(fetched.value.body);
    if (parsed.isOk() && isApiDescription(parsed.value)) {
      console.warn(`[apitools] found API description at ${probeUrl}`);
      return parsed.value;
    }
  }

  throw new SpecLoadError({
    source: pageUrl,
    message: `Could not find an API description linked from ${pageUrl}; point the source at the JSON or YAML document instead`,
  });
}

export async function loadSpec(source: SpecSource, options: LoadSpecOptions = {}): Promise<Schema> {
  if ("document" in source) return source.document;
  if ("file" in source) return loadFromFile(source.file);
  return loadFromUrl(source.url, options);
}
