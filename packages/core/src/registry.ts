/**
 * Tool registry: the single source of truth for which tools exist.
 *
 * Each tool declares its arguments as a zod shape. The JSON Schema sent to
 * clients is generated from that shape, and a decoder turns an argument bag
 * into the command type `C`.
 */

import * as z from "zod/v4";

import type { ArgumentReader, ValidationFailure } from "./arguments.js";
import type { ToolDescriptor } from "./protocol.js";
import type { Result } from "./result.js";

export type ArgumentShape = Record<string, z.ZodType>;

export interface ToolMetadata {
  title?: string;
  description: string;
  inputSchema: ArgumentShape;
}

export type ToolDecoder<C> = (args: ArgumentReader) => Result<C, ValidationFailure>;

export interface RegisteredTool<C> {
  descriptor: ToolDescriptor;
  decode: ToolDecoder<C>;
}

/**
 * JSON Schema for an argument shape, as seen by a client sending input.
 */
export function toInputSchema(shape: ArgumentShape): Record<string, unknown> {
  return z.toJSONSchema(z.object(shape), { io: "input" });
}

export class ToolRegistry<C> {
  private readonly tools = new Map<string, RegisteredTool<C>>();
  private frozen = false;

  registerTool(name: string, metadata: ToolMetadata, decode: ToolDecoder<C>): void {
    if (this.frozen) {
      throw new Error(`Tool registry is frozen; cannot register ${name}`);
    }
    if (this.tools.has(name)) {
      throw new Error(`Tool already registered: ${name}`);
    }

    const descriptor: ToolDescriptor = {
      name,
      ...(metadata.title !== undefined ? { title: metadata.title } : {}),
      description: metadata.description,
      inputSchema: toInputSchema(metadata.inputSchema),
    };
    this.tools.set(name, { descriptor, decode });
  }

  /**
   * Seal the registry. Lookups keep working; registration throws.
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.tools.size;
  }

  contains(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): RegisteredTool<C> | undefined {
    return this.tools.get(name);
  }

  /** Descriptors in registration order. */
  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => tool.descriptor);
  }
}
