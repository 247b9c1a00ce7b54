/**
 * Human-readable catalog renderings.
 *
 *  - `summarizeCatalog`: one line per tool, grouped by tag. Cheap in tokens,
 *    meant to be handed to a consumer once per session.
 *  - `describeTool`: a single tool with its arguments and their types.
 */

import type { ToolDefinition } from "./tools.js";

const UNTAGGED = "misc";

export function firstLine(text: string): string {
  return (text.trim().split("\n")[0] ?? "").trim();
}

/**
 * TypeScript-style label for a declared type hint. Enumerations render as
 * a union of their literal values.
 */
export function typeLabel(typeHint: string, enumValues?: readonly unknown[]): string {
  if (enumValues && enumValues.length > 0) {
    return enumValues.map((value) => JSON.stringify(value)).join(" | ");
  }
  switch (typeHint) {
    case "string":
    case "boolean":
    case "null":
      return typeHint;
    case "integer":
    case "number":
      return "number";
    case "array":
      return "unknown[]";
    case "object":
      return "Record<string, unknown>";
    default:
      return "unknown";
  }
}

/**
 * Group tools by tag, tags in first-seen order. A tool with several tags
 * appears under each of them.
 */
export function groupByTag(tools: readonly ToolDefinition[]): Map<string, ToolDefinition[]> {
  const groups = new Map<string, ToolDefinition[]>();
  for (const tool of tools) {
    const tags = tool.tags.length > 0 ? tool.tags : [UNTAGGED];
    for (const tag of tags) {
      const group = groups.get(tag);
      if (group) {
        group.push(tool);
      } else {
        groups.set(tag, [tool]);
      }
    }
  }
  return groups;
}

export function summarizeCatalog(tools: readonly ToolDefinition[]): string {
  const sections: string[] = [];

  for (const [tag, members] of groupByTag(tools)) {
    const lines = [`### ${tag}`];
    for (const tool of members) {
      const headline = firstLine(tool.description);
      const entry = `- \`${tool.name}\` (${tool.httpMethod})`;
      lines.push(headline ? `${entry}: ${headline}` : entry);
    }
    sections.push(lines.join("\n"));
  }

  return sections.join("\n\n");
}

export function describeTool(tool: ToolDefinition): string {
  const lines = [`\`${tool.name}\` ${tool.httpMethod} ${tool.pathTemplate}`];
  const headline = firstLine(tool.description);
  if (headline) lines.push(`  ${headline}`);

  const args: string[] = [];
  for (const parameter of tool.parameters) {
    args.push(formatArgument(
      parameter.name,
      parameter.location,
      parameter.required,
      typeLabel(parameter.typeHint, parameter.enum),
      parameter.description,
    ));
  }
  for (const property of tool.requestBody?.properties ?? []) {
    args.push(formatArgument(
      property.name,
      "body",
      property.required,
      typeLabel(property.typeHint, property.enum),
      property.description,
    ));
  }

  if (args.length === 0) {
    lines.push("  (no arguments)");
  } else {
    lines.push(...args);
  }
  return lines.join("\n");
}

function formatArgument(
  name: string,
  location: string,
  required: boolean,
  type: string,
  description: string,
): string {
  const note = firstLine(description);
  const base = `  - \`${name}\` (${location}, ${required ? "required" : "optional"}): ${type}`;
  return note ? `${base}. ${note}` : base;
}
