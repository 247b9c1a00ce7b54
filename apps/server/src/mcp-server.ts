import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { firstLine, type ToolCatalog, type ToolDefinition } from "@apitools/core";
import { jsonSchemaToZod, type SchemaResolver } from "@apitools/tool-gen";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function textContent(text: string): { type: "text"; text: string } {
  return { type: "text", text };
}

function isFailureEnvelope(value: unknown): boolean {
  return typeof value === "object" && value !== null && "success" in value && value.success === false;
}

function withDescription(schema: z.ZodTypeAny, description: string): z.ZodTypeAny {
  const headline = firstLine(description);
  return headline ? schema.describe(headline) : schema;
}

// ---------------------------------------------------------------------------
// Input shape
// ---------------------------------------------------------------------------

/**
 * Zod shape of a tool's arguments: path and query parameters from their
 * declared schemas, body properties from their type hints. Header
 * parameters are left out since the dispatcher does not send them.
 * Without a `resolver`, `$ref` parameter schemas accept any value.
 */
export function inputShapeFor(tool: ToolDefinition, resolver?: SchemaResolver): Record<string, z.ZodTypeAny> {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const parameter of tool.parameters) {
    if (parameter.location === "header" || parameter.name in shape) continue;
    const schema = withDescription(jsonSchemaToZod(parameter.schema, { resolver }), parameter.description);
    shape[parameter.name] = parameter.required ? schema : schema.optional();
  }

  for (const property of tool.requestBody?.properties ?? []) {
    if (property.name in shape) continue;
    const declared = jsonSchemaToZod({ type: property.typeHint, ...(property.enum ? { enum: property.enum } : {}) });
    const schema = withDescription(declared, property.description);
    shape[property.name] = property.required ? schema : schema.optional().nullable();
  }

  return shape;
}

// ---------------------------------------------------------------------------
// MCP server factory
// ---------------------------------------------------------------------------

export interface McpServerInfo {
  readonly name: string;
  readonly version: string;
}

export function createMcpServer(
  catalog: ToolCatalog,
  info: McpServerInfo,
  resolvers: ReadonlyMap<string, SchemaResolver> = new Map(),
): McpServer {
  const mcp = new McpServer(
    { name: info.name, version: info.version },
    { capabilities: { tools: {} } },
  );

  for (const tool of catalog.list()) {
    mcp.registerTool(
      tool.name,
      {
        title: `${tool.httpMethod} ${tool.pathTemplate}`,
        description: tool.description || `${tool.httpMethod} ${tool.pathTemplate}`,
        inputSchema: inputShapeFor(tool, resolvers.get(tool.name)),
      },
      async (args) => {
        const envelope = await catalog.invoke(tool.name, args);
        return {
          content: [textContent(JSON.stringify(envelope, null, 2))],
          ...(isFailureEnvelope(envelope) ? { isError: true } : {}),
        };
      },
    );
  }

  return mcp;
}

export async function serveStdio(
  catalog: ToolCatalog,
  info: McpServerInfo,
  resolvers: ReadonlyMap<string, SchemaResolver> = new Map(),
): Promise<McpServer> {
  const mcp = createMcpServer(catalog, info, resolvers);
  await mcp.connect(new StdioServerTransport());
  console.error(`[apitools] serving ${catalog.list().length} tools over stdio`);
  return mcp;
}
