/**
 * Response helpers.
 * Every code path in the dispatcher builds its reply through these.
 */

import type {
  CallToolResult,
  ErrorObject,
  RequestId,
  Response,
  TextContent,
} from "./protocol.js";

/**
 * Error codes carried in `error.code`.
 */
export const ErrorCode = {
  /** Unknown tool, or arguments rejected under the strict policy */
  InvalidParams: -32602,
  /** Unexpected exception while handling a request */
  InternalError: -32603,
  /** The backend could not run the command or the command failed */
  ExecutionFailed: -32000,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * A single text content block.
 */
export function textContent(text: string): TextContent {
  return { type: "text", text };
}

/**
 * Tool result holding one text block.
 */
export function textResult(text: string): CallToolResult {
  return { content: [textContent(text)] };
}

export function toolResponse(id: RequestId, text: string): Response {
  return { kind: "call", id, result: textResult(text) };
}

export function errorResponse(
  id: RequestId,
  code: ErrorCode,
  message: string,
  data?: unknown
): Response {
  const error: ErrorObject = data === undefined ? { code, message } : { code, message, data };
  return { kind: "error", id, error };
}

/**
 * Error response for a name missing from the registry.
 */
export function unknownToolResponse(id: RequestId, name: string): Response {
  return errorResponse(id, ErrorCode.InvalidParams, `Unknown tool: ${name}`);
}

export function internalErrorResponse(id: RequestId, error: Error): Response {
  return errorResponse(id, ErrorCode.InternalError, `Internal error: ${error.message}`);
}
