/**
 * Server bootstrap utilities.
 * Assembles registry, backend and dispatcher, then pumps stdio until input ends.
 */

import type { Readable, Writable } from "node:stream";

import type { ArgumentPolicy } from "./arguments.js";
import { Dispatcher, type ExecutionBackend } from "./dispatcher.js";
import { type Logger, silentLogger } from "./logger.js";
import { ToolRegistry } from "./registry.js";
import { type PumpStats, StdioPump } from "./stdio.js";

/**
 * Server name and version, reported in the initialize result.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Options for bootstrapping a server over a command type `C`.
 */
export interface ServerBootstrapOptions<C> {
  config: ServerConfig;

  /** Builds the one backend bound for the lifetime of the server */
  createBackend: () => ExecutionBackend<C> | Promise<ExecutionBackend<C>>;

  /** Registers every tool; the registry is frozen afterwards */
  registerTools: (registry: ToolRegistry<C>) => void;

  /** Default: lenient */
  argumentPolicy?: ArgumentPolicy;

  logger?: Logger;

  /** Default: process.stdin */
  input?: Readable;

  /** Default: process.stdout */
  output?: Writable;

  /** Called after the backend is built, before the first line is read */
  onStartup?: (backend: ExecutionBackend<C>) => Promise<void> | void;

  /** Called once, on end of input or on SIGINT/SIGTERM */
  onShutdown?: () => Promise<void> | void;
}

/**
 * Bootstrap a server and run it until its input ends.
 *
 * Handles:
 * - Backend creation and tool registration
 * - Signal handlers (SIGTERM, SIGINT)
 * - Startup and shutdown hooks
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "p4-mcp", version: "0.1.0" },
 *   createBackend: () => new MockBackend(),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<C>(options: ServerBootstrapOptions<C>): Promise<PumpStats> {
  const { config, createBackend, registerTools, onStartup, onShutdown } = options;
  const logger = options.logger ?? silentLogger;

  const registry = new ToolRegistry<C>();
  registerTools(registry);
  registry.freeze();

  const backend = await createBackend();
  const dispatcher = new Dispatcher<C>({
    serverInfo: { name: config.name, version: config.version },
    registry,
    backend,
    argumentPolicy: options.argumentPolicy,
    logger,
  });

  let shutDown = false;
  const runShutdown = async (): Promise<void> => {
    if (shutDown) return;
    shutDown = true;
    await onShutdown?.();
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    runShutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      }
    );
  };

  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  try {
    await onStartup?.(backend);
    logger.info(`${config.name} ${config.version} ready (${registry.size} tools, backend: ${backend.name})`);

    const pump = new StdioPump({
      handler: dispatcher,
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      logger,
    });
    const stats = await pump.run();

    logger.info(
      `Input closed after ${stats.received} message(s): ${stats.answered} answered, ${stats.dropped} dropped`
    );
    await runShutdown();
    return stats;
  } finally {
    process.off("SIGTERM", onSignal);
    process.off("SIGINT", onSignal);
  }
}

/**
 * Run bootstrapServer with standard error handling.
 * This is the preferred entry point for servers.
 */
export function runServer<C>(options: ServerBootstrapOptions<C>): void {
  bootstrapServer(options).then(
    () => process.exit(0),
    (error: unknown) => {
      console.error("Fatal error:", error);
      process.exit(1);
    }
  );
}
