import { ErrorCode as McpErrorCode, McpError, type CallToolResult, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { DockingPipeline } from "../docking/pipeline.js";
import type { RenderSessionManager } from "../render/manager.js";
import type { RenderController } from "../render/view.js";
import type { StructureStore } from "../store/structureStore.js";

/** What the tools run against; built once per process by `createServices`. */
export interface ToolServices {
  readonly store: StructureStore;
  readonly pipeline: DockingPipeline;
  readonly sessions: RenderSessionManager;
  readonly viewer: RenderController;
  readonly pocketParallelism?: number;
}

export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/** A tool's answer: serialized as one JSON text block, followed by one image block per PNG. */
export interface ToolOutput {
  data: unknown;
  images?: readonly Buffer[];
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  title: string;
  description: string;
  inputSchema: S;
  annotations?: ToolAnnotations;
  logic: (input: z.infer<S>, services: ToolServices) => Promise<ToolOutput>;
}

/** A definition with its input type erased, ready for the registry. */
export interface RegisteredTool {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: z.ZodTypeAny;
  readonly annotations: ToolAnnotations;
  /** Validates `args` (InvalidParams on failure), then runs the tool. */
  invoke(args: unknown, services: ToolServices): Promise<ToolOutput>;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    title: definition.title,
    description: definition.description,
    inputSchema: definition.inputSchema,
    annotations: definition.annotations ?? {},
    async invoke(args, services) {
      const parsed = definition.inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new McpError(McpErrorCode.InvalidParams, `invalid arguments for ${definition.name}: ${formatIssues(parsed.error)}`);
      }
      return definition.logic(parsed.data, services);
    }
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON Schema for the tools/list answer; always an object schema. */
export function toInputSchema(schema: z.ZodTypeAny): Tool["inputSchema"] {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: "none", target: "jsonSchema7" });
  const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
  const required = isRecord(json) && Array.isArray(json.required) ? json.required.filter((r): r is string => typeof r === "string") : [];
  return required.length > 0 ? { type: "object", properties, required } : { type: "object", properties };
}

export function describeTool(tool: RegisteredTool): Tool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: toInputSchema(tool.inputSchema),
    annotations: { title: tool.title, ...tool.annotations }
  };
}

export function toCallToolResult(output: ToolOutput): CallToolResult {
  const content: CallToolResult["content"] = [{ type: "text", text: JSON.stringify(output.data, null, 2) }];
  for (const image of output.images ?? []) {
    content.push({ type: "image", data: image.toString("base64"), mimeType: "image/png" });
  }
  return { content };
}

export function errorResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }], isError: true };
}
