/**
 * Shared fixtures: a tiny command model, its registry and scripted backends.
 */

import { PassThrough } from "node:stream";
import * as z from "zod/v4";
import type { ExecutionBackend, ExecutionFailure } from "../src/dispatcher.js";
import { ToolRegistry } from "../src/registry.js";
import { type Result, err, ok } from "../src/result.js";

export type EchoCommand =
  | { kind: "echo"; text: string; times: number }
  | { kind: "fail"; reason: string }
  | { kind: "crash" };

export function registerEchoTools(registry: ToolRegistry<EchoCommand>): void {
  registry.registerTool(
    "echo",
    {
      description: "Echo text back",
      inputSchema: {
        text: z.string().describe("Text to echo"),
        times: z.number().int().min(1).default(1).describe("Repeat count"),
      },
    },
    (args) =>
      args.finish({ kind: "echo", text: args.requiredString("text"), times: args.optionalInteger("times", 1) ?? 1 })
  );
  registry.registerTool(
    "fail",
    { description: "Always fails", inputSchema: { reason: z.string().optional() } },
    (args) => args.finish({ kind: "fail", reason: args.optionalString("reason") ?? "scripted failure" })
  );
  registry.registerTool("crash", { description: "Throws", inputSchema: {} }, (args) =>
    args.finish({ kind: "crash" })
  );
}

export function createEchoRegistry(): ToolRegistry<EchoCommand> {
  const registry = new ToolRegistry<EchoCommand>();
  registerEchoTools(registry);
  return registry.freeze();
}

/**
 * Backend that records what it ran.
 */
export class EchoBackend implements ExecutionBackend<EchoCommand> {
  readonly name = "echo";
  readonly executed: EchoCommand[] = [];

  async execute(command: EchoCommand): Promise<Result<string, ExecutionFailure>> {
    this.executed.push(command);
    switch (command.kind) {
      case "echo":
        return ok(Array.from({ length: command.times }, () => command.text).join(" "));
      case "fail":
        return err({ kind: "scripted", message: command.reason });
      case "crash":
        throw new Error("backend exploded");
    }
  }
}

/**
 * Collect everything written to an output stream.
 */
export function collectOutput(output: PassThrough): () => string {
  const chunks: string[] = [];
  output.setEncoding("utf8");
  output.on("data", (chunk: string) => chunks.push(chunk));
  return () => chunks.join("");
}

/**
 * Loose view of a response frame for assertions.
 */
export interface Frame {
  id: string;
  result?: {
    protocolVersion?: string;
    capabilities?: { tools?: { listChanged: boolean } };
    serverInfo?: { name: string; version: string };
    tools?: Array<{ name: string; description: string; inputSchema: Record<string, unknown> }>;
    content?: Array<{ type: string; text?: string }>;
  };
  error?: { code: number; message: string; data?: unknown };
}

export function parseFrames(text: string): Frame[] {
  return text
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): Frame => JSON.parse(line));
}

export function textOf(frame: Frame): string {
  const block = frame.result?.content?.[0];
  if (!block || block.type !== "text" || block.text === undefined) {
    throw new Error(`frame ${frame.id} has no text content: ${JSON.stringify(frame)}`);
  }
  return block.text;
}

export function callLine(id: string, name: string, args: Record<string, unknown> = {}): string {
  return JSON.stringify({ method: "tools/call", id, params: { name, arguments: args } });
}
