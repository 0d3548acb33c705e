// =============================================================================
// @dailysync/server — Content tools: generate, read, list, delete
// =============================================================================
// Registers MCP tools over the content store and the generation jobs:
// - generate_content: start a background run for a date
// - get_content: the stored aggregate for a date
// - list_dates: stored dates, newest first
// - get_content_range: aggregates between two dates (inclusive)
// - delete_content: remove the aggregate for a date
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  DateParamsInput,
  DateRangeInput,
  errorMessage,
  logToolCall,
} from "@dailysync/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";

interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function jsonResponse(value: unknown): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorResponse(text: string): ToolResponse {
  return {
    content: [{ type: "text" as const, text: `Error: ${text}` }],
    isError: true,
  };
}

/** Times the call, logs it, and turns a thrown error into an isError result. */
async function runTool(
  deps: AppDependencies,
  name: string,
  input: Record<string, unknown>,
  fn: () => Promise<ToolResponse>,
): Promise<ToolResponse> {
  const start = performance.now();
  try {
    const result = await fn();
    logToolCall(deps.logger, name, input, performance.now() - start);
    return result;
  } catch (err) {
    const errorMsg = errorMessage(err);
    logToolCall(deps.logger, name, input, performance.now() - start, errorMsg);
    return errorResponse(errorMsg);
  }
}

export const registerContentTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { store, jobs } = deps;

  // -------------------------------------------------------------------------
  // generate_content — start generation in the background
  // -------------------------------------------------------------------------
  server.tool(
    "generate_content",
    "Start generating study content for a date. Returns immediately; poll get_content for the result.",
    DateParamsInput.shape,
    async (input) =>
      runTool(deps, "generate_content", input, async () =>
        jsonResponse(jobs.startGeneration(input.date)),
      ),
  );

  // -------------------------------------------------------------------------
  // get_content — stored aggregate for one date
  // -------------------------------------------------------------------------
  server.tool(
    "get_content",
    "Get the sections, cards, mind maps and questions stored for a date.",
    DateParamsInput.shape,
    async (input) =>
      runTool(deps, "get_content", input, async () => {
        const content = await store.get(input.date);
        return content
          ? jsonResponse(content)
          : errorResponse(`No content found for ${input.date}`);
      }),
  );

  // -------------------------------------------------------------------------
  // list_dates — stored dates, newest first
  // -------------------------------------------------------------------------
  server.tool(
    "list_dates",
    "List every date that has stored content, newest first.",
    {},
    async () =>
      runTool(deps, "list_dates", {}, async () =>
        jsonResponse({ dates: await store.listDates() }),
      ),
  );

  // -------------------------------------------------------------------------
  // get_content_range — aggregates between two dates
  // -------------------------------------------------------------------------
  server.tool(
    "get_content_range",
    "Get stored content for every date from `from` to `to` inclusive, newest first.",
    DateRangeInput.shape,
    async (input) =>
      runTool(deps, "get_content_range", input, async () =>
        jsonResponse({ items: await store.listRange(input.from, input.to) }),
      ),
  );

  // -------------------------------------------------------------------------
  // delete_content — remove the aggregate for a date
  // -------------------------------------------------------------------------
  server.tool(
    "delete_content",
    "Delete the stored content for a date.",
    DateParamsInput.shape,
    async (input) =>
      runTool(deps, "delete_content", input, async () => {
        const deleted = await store.delete(input.date);
        return deleted
          ? jsonResponse({ deleted: true, date: input.date })
          : errorResponse(`No content found for ${input.date}`);
      }),
  );
};
