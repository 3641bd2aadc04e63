import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode as McpErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult
} from "@modelcontextprotocol/sdk/types.js";
import { AppError, errorMessage } from "../runtime/errors.js";
import { createLogger } from "../runtime/logger.js";
import { allToolDefinitions } from "./index.js";
import { describeTool, errorResult, toCallToolResult, type RegisteredTool, type ToolServices } from "./toolDefinition.js";

const log = createLogger("tools");

export const SERVER_NAME = "pocketdock";
export const SERVER_VERSION = "0.1.0";

/**
 * Runs one tool call. Unknown tools and malformed arguments are protocol
 * errors; failures raised by the core come back as `isError` results so the
 * caller can read them.
 */
export async function callTool(
  tools: ReadonlyMap<string, RegisteredTool>,
  services: ToolServices,
  name: string,
  args: unknown
): Promise<CallToolResult> {
  const tool = tools.get(name);
  if (!tool) throw new McpError(McpErrorCode.MethodNotFound, `unknown tool: ${name}`);
  const started = Date.now();
  try {
    const output = await tool.invoke(args, services);
    log.info({ tool: name, ms: Date.now() - started }, "tool call finished");
    return toCallToolResult(output);
  } catch (err) {
    if (err instanceof McpError) throw err;
    if (err instanceof AppError) {
      log.warn({ tool: name, err: err.toJSON(), ms: Date.now() - started }, "tool call failed");
      return errorResult(`[${err.code}] ${err.message}`);
    }
    log.error({ tool: name, err }, "tool call crashed");
    return errorResult(`[INTERNAL] ${errorMessage(err)}`);
  }
}

export function createServer(services: ToolServices, tools: readonly RegisteredTool[] = allToolDefinitions): Server {
  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });
  const byName = new Map(tools.map((t) => [t.name, t]));

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: tools.map(describeTool) }));
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(byName, services, request.params.name, request.params.arguments)
  );
  server.onerror = (err) => log.error({ err }, "protocol error");
  return server;
}
