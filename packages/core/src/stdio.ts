/**
 * Stdio pump: newline-delimited JSON in, newline-delimited JSON out.
 *
 * A producer reads lines and decodes them into requests; a consumer takes
 * them off a FIFO queue one at a time, awaits the handler and writes the
 * response before taking the next. Responses therefore leave in the order
 * requests arrived.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import type { RequestHandler } from "./dispatcher.js";
import { type Logger, silentLogger } from "./logger.js";
import { internalErrorResponse } from "./mcp.js";
import { type Request, type Response, decodeRequest, encodeResponse } from "./protocol.js";
import { MessageQueue } from "./queue.js";
import { toError, tryCatchAsync } from "./result.js";

export interface StdioPumpOptions {
  handler: RequestHandler;
  input: Readable;
  output: Writable;
  logger?: Logger;
}

export interface PumpStats {
  /** Non-blank lines read */
  received: number;
  /** Lines that failed to decode */
  dropped: number;
  /** Responses written */
  answered: number;
}

interface ProducerStats {
  received: number;
  dropped: number;
}

export class StdioPump {
  private readonly handler: RequestHandler;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly logger: Logger;

  constructor(options: StdioPumpOptions) {
    this.handler = options.handler;
    this.input = options.input;
    this.output = options.output;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run until the input ends and every queued request has been answered.
   */
  async run(): Promise<PumpStats> {
    const queue = new MessageQueue<Request>();

    // A failed write (EPIPE on stdout) rejects through its callback; the
    // stream's own 'error' event must not go unhandled.
    const onOutputError = (error: Error): void => {
      this.logger.error(`Error writing output: ${error.message}`);
    };
    this.output.on("error", onOutputError);

    try {
      const [produced, answered] = await Promise.all([this.produce(queue), this.consume(queue)]);
      return { ...produced, answered };
    } finally {
      // An errored stream may still emit 'error' after we return
      if (this.output.errored === null) {
        this.output.off("error", onOutputError);
      }
    }
  }

  private async produce(queue: MessageQueue<Request>): Promise<ProducerStats> {
    const stats: ProducerStats = { received: 0, dropped: 0 };
    const lines = createInterface({ input: this.input, crlfDelay: Infinity });

    // readline does not surface input errors on every Node release; end the
    // iteration ourselves so the queue still closes.
    let failed = false;
    const onError = (error: Error): void => {
      if (!failed) {
        failed = true;
        this.logger.error(`Error reading input: ${error.message}`);
      }
      lines.close();
    };
    this.input.on("error", onError);
    // A destroyed input never emits 'end'
    const onClose = (): void => lines.close();
    this.input.on("close", onClose);

    try {
      for await (const line of lines) {
        if (!line.trim()) continue;
        stats.received++;

        const decoded = decodeRequest(line);
        if (!decoded.ok) {
          stats.dropped++;
          this.logger.warn(`Failed to parse message (${decoded.error.message}): ${line}`);
          continue;
        }

        if (!queue.push(decoded.value)) break;
      }
    } catch (error) {
      onError(toError(error));
    } finally {
      this.input.off("error", onError);
      this.input.off("close", onClose);
      queue.close();
    }

    return stats;
  }

  private async consume(queue: MessageQueue<Request>): Promise<number> {
    let answered = 0;
    try {
      for await (const request of queue) {
        const response = await this.handle(request);
        await this.write(`${encodeResponse(response)}\n`);
        answered++;
      }
    } catch (error) {
      // Nowhere left to answer; stop the producer too
      queue.close();
      this.input.destroy();
      throw error;
    }
    return answered;
  }

  private async handle(request: Request): Promise<Response> {
    const handled = await tryCatchAsync(() => this.handler.dispatch(request));
    if (handled.ok) {
      return handled.value;
    }
    this.logger.error(`Handler failed for ${request.method} (id ${request.id}): ${handled.error.message}`);
    return internalErrorResponse(request.id, handled.error);
  }

  private write(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(frame, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
