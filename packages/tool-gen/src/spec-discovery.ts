/**
 * Heuristics for finding the API description behind a documentation page.
 *
 * Swagger UI pages embed the document URL in their init script
 * (`SwaggerUIBundle({ url: "/openapi.json" })`), ReDoc pages in a
 * `spec-url` attribute, and some portals in a separate config script.
 * These helpers only inspect text; fetching is done by the loader.
 */

const URL_PATTERNS = [
  /url:\s*["']([^"']+)["']/gi,
  /"url"\s*:\s*"([^"]+)"/gi,
  /'url'\s*:\s*'([^']+)'/gi,
  /\{\s*url:\s*["']([^"']+)["']/gi,
  /spec-url\s*=\s*["']([^"']+)["']/gi,
];

const SCRIPT_PATTERN = /<script[^>]+src\s*=\s*["']([^"']+)["'][^>]*>/gi;

const STATIC_ASSET_EXTENSIONS = [".css", ".js", ".png", ".jpg", ".ico", ".svg", ".woff", ".ttf"];

const NON_SPEC_MARKERS = ["fonts.googleapis", "swagger-ui", "favicon"];

const SPEC_KEYWORDS = ["openapi", "swagger", "api-docs", "apidoc", "/api/", "/v1/", "/v2/", "/v3/"];

const LIBRARY_SCRIPTS = ["swagger-ui-bundle", "swagger-ui-standalone", "jquery", "bootstrap"];

/** Well-known document locations, probed relative to the page's origin. */
export const COMMON_SPEC_ENDPOINTS = [
  "/openapi.json",
  "/swagger.json",
  "/api/openapi.json",
  "/api/swagger.json",
  "/apidoc/v1",
  "/v1/openapi.json",
  "/v2/openapi.json",
  "/v3/openapi.json",
  "/api-docs",
  "/api-docs.json",
  "/docs/openapi.json",
] as const;

export function isLikelySpecUrl(url: string): boolean {
  const lower = url.toLowerCase();
  if (STATIC_ASSET_EXTENSIONS.some((extension) => lower.endsWith(extension))) return false;
  if (NON_SPEC_MARKERS.some((marker) => lower.includes(marker))) return false;
  if (SPEC_KEYWORDS.some((keyword) => lower.includes(keyword))) return true;
  return url.startsWith("/");
}

/**
 * First likely document URL mentioned in `content`. Patterns are tried in
 * a fixed order; within a pattern, matches in document order.
 */
export function findSpecUrl(content: string): string | undefined {
  for (const pattern of URL_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const candidate = match[1];
      if (candidate && isLikelySpecUrl(candidate)) return candidate;
    }
  }
  return undefined;
}

/** `<script src>` values of a page, without well-known UI libraries. */
export function findConfigScripts(html: string): string[] {
  const sources: string[] = [];
  for (const match of html.matchAll(SCRIPT_PATTERN)) {
    const src = match[1];
    if (!src) continue;
    const lower = src.toLowerCase();
    if (LIBRARY_SCRIPTS.some((library) => lower.includes(library))) continue;
    if (!sources.includes(src)) sources.push(src);
  }
  return sources;
}

export function looksLikeHtml(contentType: string): boolean {
  return contentType.toLowerCase().includes("text/html");
}
