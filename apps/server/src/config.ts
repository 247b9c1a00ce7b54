/**
 * apitools configuration: a YAML file listing the API descriptions to
 * expose as tools.
 *
 * ```yaml
 * name: Procurement Assistant
 * sources:
 *   - name: procurement
 *     openapi:
 *       url: http://localhost:8000/docs
 *       baseUrl: http://localhost:8000
 *     toolGeneration:
 *       toolPrefix: ""
 * ```
 *
 * The older single-source layout (`api:` plus a top-level
 * `toolGeneration:`) is still read and becomes one source named after the
 * config. Strings of the exact form `${VAR}` are replaced by the
 * environment variable, or by an empty string when it is unset.
 */

import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { ConfigError, errorMessage } from "@apitools/core";
import { Result } from "better-result";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "apitools.yaml";
export const CONFIG_ENV_VAR = "APITOOLS_CONFIG";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const authSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("basic"), username: z.string(), password: z.string() }),
  z.object({ type: z.literal("bearer"), token: z.string() }),
  z.object({ type: z.literal("apiKey"), header: z.string().min(1), value: z.string() }),
]);

const openApiSettingsSchema = z
  .object({
    url: z.string().url().optional(),
    file: z.string().min(1).optional(),
    baseUrl: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    headers: z.record(z.string()).default({}),
    auth: authSchema.optional(),
  })
  .refine((settings) => (settings.url === undefined) !== (settings.file === undefined), {
    message: "Set exactly one of 'url' or 'file'",
  });

const toolGenerationSchema = z.object({
  includeAll: z.boolean().default(true),
  includeEndpoints: z.array(z.string()).default([]),
  excludeEndpoints: z.array(z.string()).default([]),
  snakeCaseNames: z.boolean().default(true),
  simplifiedNames: z.boolean().default(true),
  toolPrefix: z.string().default(""),
  strictRefs: z.boolean().default(false),
});

const sourceSchema = z.object({
  name: z.string().min(1),
  type: z.literal("openapi").default("openapi"),
  enabled: z.boolean().default(true),
  openapi: openApiSettingsSchema,
  toolGeneration: toolGenerationSchema.default({}),
});

const configSchema = z.object({
  name: z.string().min(1).default("apitools"),
  sources: z.array(sourceSchema).min(1),
});

export type AuthSettings = z.infer<typeof authSchema>;
export type OpenApiSettings = z.infer<typeof openApiSettingsSchema>;
export type ToolGenerationSettings = z.infer<typeof toolGenerationSchema>;
export type SourceConfig = z.infer<typeof sourceSchema>;
export type ApitoolsConfig = z.infer<typeof configSchema>;

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const ENV_REFERENCE = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

export function expandEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    const variable = ENV_REFERENCE.exec(value)?.[1];
    return variable === undefined ? value : (env[variable] ?? "");
  }
  if (Array.isArray(value)) return value.map((entry) => expandEnv(entry, env));
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, expandEnv(entry, env)]));
  }
  return value;
}

/** `{ name, api, toolGeneration }` → `{ name, sources: [...] }`. */
function normalizeLegacyLayout(raw: unknown): unknown {
  if (!isRecord(raw) || raw["sources"] !== undefined || raw["api"] === undefined) return raw;

  const { api, toolGeneration, ...rest } = raw;
  const name = typeof rest["name"] === "string" && rest["name"].length > 0 ? rest["name"] : "api";
  return {
    ...rest,
    sources: [{ name, openapi: api, ...(toolGeneration === undefined ? {} : { toolGeneration }) }],
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function parseConfig(text: string, path: string, env: NodeJS.ProcessEnv = process.env): ApitoolsConfig {
  const parsed = Result.try((): unknown => parseYaml(text));
  if (parsed.isErr()) {
    throw new ConfigError({ path, message: `Invalid YAML in ${path}: ${errorMessage(parsed.error.cause)}` });
  }

  const validated = configSchema.safeParse(normalizeLegacyLayout(expandEnv(parsed.value, env)));
  if (!validated.success) {
    throw new ConfigError({ path, message: `Invalid config ${path}: ${formatIssues(validated.error)}` });
  }

  const names = new Set<string>();
  for (const source of validated.data.sources) {
    if (names.has(source.name)) {
      throw new ConfigError({ path, message: `Invalid config ${path}: duplicate source name '${source.name}'` });
    }
    names.add(source.name);
  }
  return validated.data;
}

/** Relative `file:` entries are taken from the config file's directory. */
function resolveSourceFiles(config: ApitoolsConfig, configPath: string): ApitoolsConfig {
  const base = dirname(configPath);
  return {
    ...config,
    sources: config.sources.map((source) => {
      const file = source.openapi.file;
      if (file === undefined || isAbsolute(file)) return source;
      return { ...source, openapi: { ...source.openapi, file: resolve(base, file) } };
    }),
  };
}

export async function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<ApitoolsConfig> {
  const text = await readFile(path, "utf8").catch((error: unknown) => {
    throw new ConfigError({ path, message: `Cannot read config ${path}: ${errorMessage(error)}` });
  });
  return resolveSourceFiles(parseConfig(text, path, env), path);
}

/** `--config <path>`, then `$APITOOLS_CONFIG`, then `./apitools.yaml`. */
export function resolveConfigPath(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const flagIndex = args.indexOf("--config");
  if (flagIndex !== -1) {
    const value = args[flagIndex + 1];
    if (!value || value.startsWith("--")) {
      throw new ConfigError({ path: "", message: "Missing value for --config" });
    }
    return resolve(cwd, value);
  }

  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) return resolve(cwd, fromEnv);
  return resolve(cwd, DEFAULT_CONFIG_FILE);
}
