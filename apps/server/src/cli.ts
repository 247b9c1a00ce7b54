import { describeTool, errorMessage, groupByTag } from "@apitools/core";
import { jsonSchemaToTypeString, validateSpec } from "@apitools/tool-gen";
import { loadConfig, resolveConfigPath, type ApitoolsConfig } from "./config.js";
import { serveStdio } from "./mcp-server.js";
import { enabledSources, loadToolSources, prepareSource, type LoadToolSourcesOptions } from "./tool-sources.js";

export const VERSION = "0.1.0";

export interface CliOptions extends LoadToolSourcesOptions {
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly cwd?: string | undefined;
}

export function printHelp(): void {
  console.log(`apitools ${VERSION}

Usage:
  apitools <command> [--config <path>]

Commands:
  serve         Start the MCP server on stdio
  validate      Load and validate every configured API description
  tools         List every tool with its arguments
  summary       Print the catalog summary, grouped by tag
  help          Show this message

The config file defaults to ./apitools.yaml, or $APITOOLS_CONFIG when set.
`);
}

async function readConfig(args: readonly string[], options: CliOptions): Promise<ApitoolsConfig> {
  return loadConfig(resolveConfigPath(args, options.env, options.cwd), options.env);
}

async function runServe(args: readonly string[], options: CliOptions): Promise<number> {
  const config = await readConfig(args, options);
  const { catalog, sources, resolvers } = await loadToolSources(config, options);
  for (const source of sources) {
    console.error(`[apitools] ${source.name}: ${source.toolCount} tools from ${source.api.title} at ${source.baseUrl}`);
  }
  await serveStdio(catalog, { name: config.name, version: VERSION }, resolvers);
  return 0;
}

async function runValidate(args: readonly string[], options: CliOptions): Promise<number> {
  const config = await readConfig(args, options);
  const reservedNames = new Set<string>();
  let failures = 0;

  for (const source of enabledSources(config)) {
    try {
      const prepared = await prepareSource(source, reservedNames, options);
      const validation = await validateSpec(prepared.document);
      const status = validation.valid ? "ok" : "invalid";
      console.log(`${source.name}: ${prepared.api.title} ${prepared.api.version} (${status})`);
      console.log(`  base URL: ${prepared.baseUrl}`);
      console.log(`  tools: ${prepared.tools.length}`);
      if (!validation.valid) {
        console.log(`  ${validation.message ?? "validation failed"}`);
        failures += 1;
      }
    } catch (error) {
      console.log(`${source.name}: failed`);
      console.log(`  ${errorMessage(error)}`);
      failures += 1;
    }
  }

  return failures === 0 ? 0 : 1;
}

async function runTools(args: readonly string[], options: CliOptions): Promise<number> {
  const config = await readConfig(args, options);
  const { catalog, resolvers } = await loadToolSources(config, options);

  const sections: string[] = [];
  for (const [tag, tools] of groupByTag(catalog.list())) {
    const entries = tools.map((tool) => {
      const detail = describeTool(tool);
      if (tool.responseSchema === undefined) return detail;
      return `${detail}\n  returns: ${jsonSchemaToTypeString(tool.responseSchema, { resolver: resolvers.get(tool.name) })}`;
    });
    sections.push([`### ${tag}`, ...entries].join("\n"));
  }

  console.log(sections.join("\n\n"));
  return 0;
}

async function runSummary(args: readonly string[], options: CliOptions): Promise<number> {
  const config = await readConfig(args, options);
  const { catalog } = await loadToolSources(config, options);
  console.log(catalog.summarize());
  return 0;
}

/** Resolves with the process exit code. Throws on unknown commands. */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const [command, ...rest] = argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  if (command === "serve") return runServe(rest, options);
  if (command === "validate") return runValidate(rest, options);
  if (command === "tools") return runTools(rest, options);
  if (command === "summary") return runSummary(rest, options);

  throw new Error(`Unknown command: ${command}`);
}
