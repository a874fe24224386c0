/**
 * Message dispatcher.
 *
 * Routes one decoded request to the registry or the execution backend and
 * always produces exactly one response with the request's id. Holds no state
 * between requests beyond what it was constructed with, so requests are
 * accepted in any order (no initialize precondition).
 */

import { type ArgumentPolicy, ArgumentReader } from "./arguments.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import {
  ErrorCode,
  errorResponse,
  internalErrorResponse,
  toolResponse,
  unknownToolResponse,
} from "./mcp.js";
import {
  type CallToolParams,
  type InitializeParams,
  PROTOCOL_VERSION,
  type Request,
  type RequestId,
  type Response,
  type ServerInfo,
} from "./protocol.js";
import type { ToolRegistry } from "./registry.js";
import { type Result, tryCatchAsync } from "./result.js";

/**
 * Failure reported by a backend. `message` becomes the error message on the
 * wire and the whole object its `data`.
 */
export interface ExecutionFailure {
  readonly kind: string;
  readonly message: string;
}

/**
 * Strategy that runs a decoded command and returns its text output.
 */
export interface ExecutionBackend<C, E extends ExecutionFailure = ExecutionFailure> {
  /** Short label for logs */
  readonly name: string;
  execute(command: C): Promise<Result<string, E>>;
}

export interface RequestHandler {
  dispatch(request: Request): Promise<Response>;
}

export interface DispatcherOptions<C> {
  serverInfo: ServerInfo;
  registry: ToolRegistry<C>;
  backend: ExecutionBackend<C>;
  argumentPolicy?: ArgumentPolicy;
  logger?: Logger;
}

export class Dispatcher<C> implements RequestHandler {
  private readonly serverInfo: ServerInfo;
  private readonly registry: ToolRegistry<C>;
  private readonly backend: ExecutionBackend<C>;
  private readonly argumentPolicy: ArgumentPolicy;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions<C>) {
    this.serverInfo = options.serverInfo;
    this.registry = options.registry;
    this.backend = options.backend;
    this.argumentPolicy = options.argumentPolicy ?? "lenient";
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Handle one request. Never rejects: anything thrown on the way becomes an
   * internal error response.
   */
  async dispatch(request: Request): Promise<Response> {
    this.logger.debug(`Handling ${request.method} (id ${request.id})`);

    const handled = await tryCatchAsync(() => this.route(request));
    if (handled.ok) {
      return handled.value;
    }

    this.logger.error(`Error handling ${request.method} (id ${request.id}): ${handled.error.message}`);
    return internalErrorResponse(request.id, handled.error);
  }

  private async route(request: Request): Promise<Response> {
    switch (request.method) {
      case "initialize":
        return this.initialize(request.id, request.params);
      case "tools/list":
        return { kind: "tools", id: request.id, result: { tools: this.registry.list() } };
      case "tools/call":
        return this.callTool(request.id, request.params);
      case "ping":
        return { kind: "pong", id: request.id };
    }
  }

  private initialize(id: RequestId, params: InitializeParams): Response {
    const { clientInfo } = params;
    this.logger.info(
      `Initialize from ${clientInfo.name} ${clientInfo.version} (requested protocol ${params.protocolVersion})`
    );

    return {
      kind: "initialize",
      id,
      result: {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: this.serverInfo.name, version: this.serverInfo.version },
      },
    };
  }

  private async callTool(id: RequestId, params: CallToolParams): Promise<Response> {
    const tool = this.registry.get(params.name);
    if (!tool) {
      this.logger.warn(`Unknown tool requested: ${params.name}`);
      return unknownToolResponse(id, params.name);
    }

    const decoded = tool.decode(new ArgumentReader(params.arguments, this.argumentPolicy));
    if (!decoded.ok) {
      const { issues } = decoded.error;
      return errorResponse(
        id,
        ErrorCode.InvalidParams,
        `Invalid arguments for ${params.name}: ${issues.join("; ")}`,
        { issues }
      );
    }

    const executed = await this.backend.execute(decoded.value);
    if (!executed.ok) {
      const failure = executed.error;
      this.logger.warn(`${params.name} failed (${failure.kind}): ${failure.message}`);
      return errorResponse(id, ErrorCode.ExecutionFailed, failure.message, failure);
    }

    return toolResponse(id, executed.value);
  }
}
