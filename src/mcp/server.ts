import { Router, Request, Response } from "express";
import { z } from "zod";
import type { ChatbotClientLike, VerifierClientLike } from "../clients/types";
import { AskNormativaArgsSchema, IdentifyPersonArgsSchema, formatIssues } from "../parsers/request-schema";
import type { ServiceId, ServiceResult } from "../types";
import { describeError } from "../utils";

const JSONRPC_VERSION = "2.0";

export const RPC_ERRORS = {
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603
} as const;

const RpcRequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION).optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string(),
  params: z.record(z.unknown()).optional()
});

const ToolCallParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).default({})
});

type RpcId = string | number | null;

export type RpcResponse =
  | { jsonrpc: typeof JSONRPC_VERSION; id: RpcId; result: unknown }
  | { jsonrpc: typeof JSONRPC_VERSION; id: RpcId; error: { code: number; message: string; data?: unknown } };

class InvalidToolArguments extends Error {
  constructor(readonly issues: string[]) {
    super("Invalid tool arguments");
  }
}

export const TOOL_DEFINITIONS = [
  {
    name: "identify_person",
    description: "Identify a person with the facial verification service",
    inputSchema: {
      type: "object",
      properties: {
        image_base64: { type: "string", description: "Base64 encoded .jpg, .jpeg or .png image" },
        filename: { type: "string", description: "File name, defaults to image.jpg" }
      },
      required: ["image_base64"]
    }
  },
  {
    name: "ask_normativa",
    description: "Ask the normative chatbot a question about university regulations",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Question about the regulations" },
        provider: { type: "string", enum: ["deepseek", "chatgpt"], description: "LLM provider" },
        k: { type: "integer", description: "Top K passages to retrieve" }
      },
      required: ["query"]
    }
  }
] as const;

export interface McpServerDeps {
  verifier: VerifierClientLike;
  chatbot: ChatbotClientLike;
  timeouts: Readonly<Record<ServiceId, number>>;
}

type ToolHandler = (args: Record<string, unknown>) => Promise<Record<string, unknown>>;

/** JSON-RPC tool endpoint exposing each external service on its own. */
export class McpServer {
  private readonly tools: Record<string, ToolHandler>;

  constructor(private readonly deps: McpServerDeps) {
    this.tools = {
      identify_person: (args) => this.identifyPerson(args),
      ask_normativa: (args) => this.askNormativa(args)
    };
  }

  async handle(body: unknown): Promise<RpcResponse> {
    const request = RpcRequestSchema.safeParse(body);
    if (!request.success) {
      return rpcError(null, RPC_ERRORS.invalidRequest, "Invalid JSON-RPC request", formatIssues(request.error));
    }

    const id = request.data.id ?? null;
    const { method, params = {} } = request.data;

    if (method === "tools/list") {
      return { jsonrpc: JSONRPC_VERSION, id, result: { tools: TOOL_DEFINITIONS } };
    }

    if (method !== "tools/call") {
      return rpcError(id, RPC_ERRORS.methodNotFound, `Method '${method}' not found`);
    }

    const call = ToolCallParamsSchema.safeParse(params);
    if (!call.success) {
      return rpcError(id, RPC_ERRORS.invalidParams, "Invalid tools/call params", formatIssues(call.error));
    }

    const tool = Object.prototype.hasOwnProperty.call(this.tools, call.data.name) ? this.tools[call.data.name] : undefined;
    if (!tool) {
      return rpcError(id, RPC_ERRORS.methodNotFound, `Tool '${call.data.name}' not found`);
    }

    try {
      const result = await tool(call.data.arguments);
      return {
        jsonrpc: JSONRPC_VERSION,
        id,
        result: { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] }
      };
    } catch (error) {
      if (error instanceof InvalidToolArguments) {
        return rpcError(id, RPC_ERRORS.invalidParams, error.message, error.issues);
      }
      console.error(`MCP tool ${call.data.name} failed`, error);
      return rpcError(id, RPC_ERRORS.internalError, `Internal error: ${describeError(error)}`);
    }
  }

  private async identifyPerson(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const parsed = IdentifyPersonArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new InvalidToolArguments(formatIssues(parsed.error));
    }

    const result = await this.deps.verifier.call(
      { image: parsed.data.image_base64, filename: parsed.data.filename },
      { timeoutMs: this.deps.timeouts.verifier }
    );
    logToolCall("identify_person", result);

    if (result.status !== "success") {
      return { success: false, status: result.status, error: result.error.message };
    }
    return {
      success: true,
      status: result.status,
      verified: result.payload.verified,
      confidence: result.payload.score,
      person_id: result.payload.personId
    };
  }

  private async askNormativa(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const parsed = AskNormativaArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new InvalidToolArguments(formatIssues(parsed.error));
    }

    const result = await this.deps.chatbot.call(
      { message: parsed.data.query, provider: parsed.data.provider, k: parsed.data.k },
      { timeoutMs: this.deps.timeouts.chatbot }
    );
    logToolCall("ask_normativa", result);

    if (result.status !== "success") {
      return { success: false, status: result.status, error: result.error.message };
    }
    return { success: true, status: result.status, answer: result.payload.answer, provider: result.payload.provider };
  }
}

function logToolCall(tool: string, result: ServiceResult<unknown>): void {
  const detail = result.status === "success" ? "" : `: ${result.error.message}`;
  console.log(`MCP ${tool} -> ${result.status} in ${result.latencyMs}ms${detail}`);
}

function rpcError(id: RpcId, code: number, message: string, data?: unknown): RpcResponse {
  return { jsonrpc: JSONRPC_VERSION, id, error: data === undefined ? { code, message } : { code, message, data } };
}

export function createMcpRouter(server: McpServer): Router {
  const router = Router();

  router.post("/mcp", async (req: Request, res: Response) => {
    const response = await server.handle(req.body);
    res.json(response);
  });

  return router;
}
