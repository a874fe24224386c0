/**
 * Wire protocol: request frames, response frames and their codec.
 *
 * A frame is one JSON object on one line. Requests are tagged by `method`;
 * responses are untagged and told apart by which of `result` / `error` is
 * present.
 */

import * as z from "zod/v4";

import { type Result, err, ok, tryCatch } from "./result.js";

export const PROTOCOL_VERSION = "2024-11-05";

/**
 * Correlation identifier. Always a string in this server; echoed unchanged.
 */
export type RequestId = string;

// ============================================================================
// Requests
// ============================================================================

const RequestIdSchema = z.string();

export const ClientInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export const InitializeParamsSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.string(), z.unknown()),
  clientInfo: ClientInfoSchema,
});

/**
 * Anything but a plain JSON object reads as an empty argument bag.
 */
function toArgumentBag(value: unknown): ToolArguments {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

export const CallToolParamsSchema = z.object({
  name: z.string(),
  arguments: z.unknown().transform(toArgumentBag),
});

export const RequestSchema = z.discriminatedUnion("method", [
  z.object({
    method: z.literal("initialize"),
    id: RequestIdSchema,
    params: InitializeParamsSchema,
  }),
  z.object({
    method: z.literal("tools/list"),
    id: RequestIdSchema,
  }),
  z.object({
    method: z.literal("tools/call"),
    id: RequestIdSchema,
    params: CallToolParamsSchema,
  }),
  z.object({
    method: z.literal("ping"),
    id: RequestIdSchema,
  }),
]);

export type InitializeParams = z.infer<typeof InitializeParamsSchema>;
export type CallToolParams = z.infer<typeof CallToolParamsSchema>;
export type Request = z.infer<typeof RequestSchema>;

/**
 * Untyped argument bag of a tools/call request.
 */
export type ToolArguments = Record<string, unknown>;

// ============================================================================
// Responses
// ============================================================================

export interface TextContent {
  type: "text";
  text: string;
}

export interface ImageContent {
  type: "image";
  data: string;
  mimeType: string;
}

export type ToolContent = TextContent | ImageContent;

/**
 * Discovery entry for one tool.
 */
export interface ToolDescriptor {
  name: string;
  title?: string;
  description: string;
  /** JSON Schema of the argument object */
  inputSchema: Record<string, unknown>;
}

export interface ServerInfo {
  name: string;
  version: string;
}

export interface ServerCapabilities {
  tools?: { listChanged: boolean };
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: ServerInfo;
}

export interface ListToolsResult {
  tools: ToolDescriptor[];
}

export interface CallToolResult {
  content: ToolContent[];
}

export interface ErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * In-process response. `kind` never reaches the wire; see {@link toWire}.
 */
export type Response =
  | { kind: "initialize"; id: RequestId; result: InitializeResult }
  | { kind: "tools"; id: RequestId; result: ListToolsResult }
  | { kind: "call"; id: RequestId; result: CallToolResult }
  | { kind: "pong"; id: RequestId }
  | { kind: "error"; id: RequestId; error: ErrorObject };

export type WireResponse =
  | { id: RequestId; result: InitializeResult | ListToolsResult | CallToolResult }
  | { id: RequestId; error: ErrorObject }
  | { id: RequestId };

// ============================================================================
// Codec
// ============================================================================

export interface DecodeError {
  reason: "invalid_json" | "invalid_frame";
  message: string;
}

/**
 * Decode one line into a request.
 * Unknown keys (such as `jsonrpc`) are dropped; unknown methods are rejected.
 */
export function decodeRequest(line: string): Result<Request, DecodeError> {
  const json = tryCatch((): unknown => JSON.parse(line));
  if (!json.ok) {
    return err({ reason: "invalid_json", message: json.error.message });
  }

  const parsed = RequestSchema.safeParse(json.value);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    return err({ reason: "invalid_frame", message });
  }

  return ok(parsed.data);
}

export function encodeRequest(request: Request): string {
  return JSON.stringify(request);
}

/**
 * Strip the in-process tag, leaving the untagged wire shape.
 */
export function toWire(response: Response): WireResponse {
  switch (response.kind) {
    case "initialize":
    case "tools":
    case "call":
      return { id: response.id, result: response.result };
    case "error":
      return { id: response.id, error: response.error };
    case "pong":
      return { id: response.id };
  }
}

export function encodeResponse(response: Response): string {
  return JSON.stringify(toWire(response));
}
