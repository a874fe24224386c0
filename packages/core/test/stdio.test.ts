import { PassThrough, Writable } from "node:stream";
import { describe, it, expect } from "vitest";
import { Dispatcher, type RequestHandler } from "../src/dispatcher.js";
import { createLogger } from "../src/logger.js";
import type { Request, Response } from "../src/protocol.js";
import { StdioPump } from "../src/stdio.js";
import { EchoBackend, callLine, collectOutput, createEchoRegistry, parseFrames, textOf } from "./helpers.js";

function echoHandler(): RequestHandler {
  return new Dispatcher({
    serverInfo: { name: "echo-server", version: "0.0.1" },
    registry: createEchoRegistry(),
    backend: new EchoBackend(),
  });
}

async function pump(lines: string[], handler: RequestHandler = echoHandler(), logLines: string[] = []) {
  const input = new PassThrough();
  const output = new PassThrough();
  const read = collectOutput(output);

  const running = new StdioPump({
    handler,
    input,
    output,
    logger: createLogger("pump", { sink: (line) => logLines.push(line) }),
  }).run();

  input.end(lines.map((line) => `${line}\n`).join(""));
  const stats = await running;
  return { stats, frames: parseFrames(read()) };
}

describe("StdioPump", () => {
  it("answers each request with one newline-terminated frame", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const read = collectOutput(output);
    const running = new StdioPump({ handler: echoHandler(), input, output }).run();

    input.end('{"method":"ping","id":"a"}\n');
    await running;

    expect(read()).toBe('{"id":"a"}\n');
  });

  it("keeps responses in request order", async () => {
    const lines = Array.from({ length: 100 }, (_, i) => callLine(String(i), "echo", { text: `n${i}` }));
    const { stats, frames } = await pump(lines);

    expect(frames.map((frame) => frame.id)).toEqual(Array.from({ length: 100 }, (_, i) => String(i)));
    expect(frames.map(textOf)).toEqual(Array.from({ length: 100 }, (_, i) => `n${i}`));
    expect(stats).toEqual({ received: 100, dropped: 0, answered: 100 });
  });

  it("orders responses by arrival even when earlier requests finish later", async () => {
    const delays: Record<string, number> = { slow: 30, fast: 0 };
    const handler: RequestHandler = {
      async dispatch(request: Request): Promise<Response> {
        await new Promise((resolve) => setTimeout(resolve, delays[request.id] ?? 0));
        return { kind: "pong", id: request.id };
      },
    };

    const { frames } = await pump(['{"method":"ping","id":"slow"}', '{"method":"ping","id":"fast"}'], handler);
    expect(frames).toEqual([{ id: "slow" }, { id: "fast" }]);
  });

  it("drops malformed lines and keeps going", async () => {
    const logLines: string[] = [];
    const { stats, frames } = await pump(
      ["not json", '{"method":"ping","id":1}', '{"method":"ping","id":"ok"}'],
      echoHandler(),
      logLines
    );

    expect(frames).toEqual([{ id: "ok" }]);
    expect(stats).toEqual({ received: 3, dropped: 2, answered: 1 });
    expect(logLines).toHaveLength(2);
    expect(logLines[0]).toMatch(/^\[pump\] WARN Failed to parse message \(.*\): not json$/);
  });

  it("skips blank lines without counting them", async () => {
    const { stats, frames } = await pump(["", "   ", '{"method":"ping","id":"x"}']);
    expect(frames).toEqual([{ id: "x" }]);
    expect(stats).toEqual({ received: 1, dropped: 0, answered: 1 });
  });

  it("accepts CRLF line endings", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const read = collectOutput(output);
    const running = new StdioPump({ handler: echoHandler(), input, output }).run();

    input.end('{"method":"ping","id":"crlf"}\r\n');
    await running;

    expect(parseFrames(read())).toEqual([{ id: "crlf" }]);
  });

  it("continues after a failing tool call", async () => {
    const { frames } = await pump([
      callLine("1", "crash"),
      callLine("2", "fail"),
      callLine("3", "echo", { text: "still here" }),
    ]);

    expect(frames.map((frame) => frame.error?.code)).toEqual([-32603, -32000, undefined]);
    expect(textOf(frames[2])).toBe("still here");
  });

  it("turns a rejecting handler into an internal error", async () => {
    const handler: RequestHandler = {
      dispatch: () => Promise.reject(new Error("handler down")),
    };

    const { frames } = await pump(['{"method":"ping","id":"z"}'], handler);
    expect(frames).toEqual([{ id: "z", error: { code: -32603, message: "Internal error: handler down" } }]);
  });

  it("logs a failing output and stops instead of crashing", async () => {
    const logLines: string[] = [];
    const input = new PassThrough();
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("EPIPE"));
      },
    });

    const running = new StdioPump({
      handler: echoHandler(),
      input,
      output,
      logger: createLogger("pump", { sink: (line) => logLines.push(line) }),
    }).run();
    input.write('{"method":"ping","id":"a"}\n');

    await expect(running).rejects.toThrow("EPIPE");
    await new Promise((resolve) => setImmediate(resolve));

    expect(logLines).toEqual(["[pump] ERROR Error writing output: EPIPE"]);
    expect(input.destroyed).toBe(true);
  });

  it("returns once the input ends with nothing queued", async () => {
    const { stats, frames } = await pump([]);
    expect(frames).toEqual([]);
    expect(stats).toEqual({ received: 0, dropped: 0, answered: 0 });
  });
});
