/**
 * Tool catalog: the consumer-facing view over one or more dispatchers.
 *
 * `invoke` always resolves with an envelope. Pre-flight errors from the
 * dispatcher become `{ success: false, error }`, so a single bad call never
 * ends a consumer session.
 */

import type { Dispatcher, InvokeOptions } from "./dispatcher.js";
import { toEnvelope } from "./dispatcher.js";
import { ToolNameCollisionError } from "./errors.js";
import { summarizeCatalog } from "./summary.js";
import type { ToolDefinition } from "./tools.js";

export interface ToolCatalog {
  list(): readonly ToolDefinition[];
  get(toolName: string): ToolDefinition | undefined;
  invoke(
    toolName: string,
    args?: Readonly<Record<string, unknown>>,
    options?: InvokeOptions,
  ): Promise<unknown>;
  summarize(): string;
}

export function createToolCatalog(dispatchers: readonly Dispatcher[]): ToolCatalog {
  const owners = new Map<string, Dispatcher>();
  const tools: ToolDefinition[] = [];

  for (const dispatcher of dispatchers) {
    for (const tool of dispatcher.tools) {
      if (owners.has(tool.name)) {
        throw new ToolNameCollisionError({
          toolName: tool.name,
          message: `Tool name '${tool.name}' is exposed by more than one source`,
        });
      }
      owners.set(tool.name, dispatcher);
      tools.push(tool);
    }
  }

  let summary: string | undefined;

  return {
    list: () => tools,
    get: (toolName) => owners.get(toolName)?.get(toolName),
    async invoke(toolName, args = {}, options) {
      const dispatcher = owners.get(toolName);
      if (!dispatcher) {
        return { success: false, error: `Unknown tool '${toolName}'` };
      }

      const result = await dispatcher.invoke(toolName, args, options);
      if (result.isErr()) {
        return { success: false, error: result.error.message };
      }
      return toEnvelope(result.value);
    },
    summarize() {
      summary ??= summarizeCatalog(tools);
      return summary;
    },
  };
}
