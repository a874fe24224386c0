export {
  type Result,
  ok,
  err,
  // Utility functions
  toError,
  tryCatch,
  tryCatchAsync,
} from "./result.js";

export {
  // Wire types
  type RequestId,
  type Request,
  type InitializeParams,
  type CallToolParams,
  type ToolArguments,
  type TextContent,
  type ImageContent,
  type ToolContent,
  type ToolDescriptor,
  type ServerInfo,
  type ServerCapabilities,
  type InitializeResult,
  type ListToolsResult,
  type CallToolResult,
  type ErrorObject,
  type Response,
  type WireResponse,
  type DecodeError,
  // Codec
  PROTOCOL_VERSION,
  RequestSchema,
  decodeRequest,
  encodeRequest,
  encodeResponse,
  toWire,
} from "./protocol.js";

export {
  ErrorCode,
  textContent,
  textResult,
  toolResponse,
  errorResponse,
  unknownToolResponse,
  internalErrorResponse,
} from "./mcp.js";

export {
  type ArgumentPolicy,
  type ValidationFailure,
  ArgumentReader,
} from "./arguments.js";

export {
  type ArgumentShape,
  type ToolMetadata,
  type ToolDecoder,
  type RegisteredTool,
  ToolRegistry,
  toInputSchema,
} from "./registry.js";

export {
  type ExecutionFailure,
  type ExecutionBackend,
  type RequestHandler,
  type DispatcherOptions,
  Dispatcher,
} from "./dispatcher.js";

export { MessageQueue } from "./queue.js";

export { type StdioPumpOptions, type PumpStats, StdioPump } from "./stdio.js";

export { type LogLevel, type Logger, type LoggerOptions, createLogger, silentLogger } from "./logger.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
} from "./server.js";
