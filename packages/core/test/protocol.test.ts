import { describe, it, expect } from "vitest";
import {
  decodeRequest,
  encodeRequest,
  encodeResponse,
  toWire,
  type Request,
  type Response,
} from "../src/protocol.js";

const INITIALIZE_LINE =
  '{"method":"initialize","id":"1","params":{"protocolVersion":"2024-11-05","capabilities":{},"clientInfo":{"name":"x","version":"1"}}}';

function decodeOk(line: string): Request {
  const result = decodeRequest(line);
  if (!result.ok) {
    throw new Error(`expected ${line} to decode: ${result.error.message}`);
  }
  return result.value;
}

describe("decodeRequest", () => {
  it("decodes initialize with its params", () => {
    const request = decodeOk(INITIALIZE_LINE);
    expect(request).toEqual({
      method: "initialize",
      id: "1",
      params: {
        protocolVersion: "2024-11-05",
        capabilities: {},
        clientInfo: { name: "x", version: "1" },
      },
    });
  });

  it("decodes tools/list and ping without params", () => {
    expect(decodeOk('{"method":"tools/list","id":"2"}')).toEqual({ method: "tools/list", id: "2" });
    expect(decodeOk('{"method":"ping","id":"ping-1"}')).toEqual({ method: "ping", id: "ping-1" });
  });

  it("decodes tools/call with an argument bag", () => {
    const request = decodeOk(
      '{"method":"tools/call","id":"3","params":{"name":"p4_status","arguments":{"path":"//depot/main/..."}}}'
    );
    expect(request).toEqual({
      method: "tools/call",
      id: "3",
      params: { name: "p4_status", arguments: { path: "//depot/main/..." } },
    });
  });

  it("treats missing tools/call arguments as an empty bag", () => {
    const request = decodeOk('{"method":"tools/call","id":"4","params":{"name":"p4_info"}}');
    expect(request).toEqual({ method: "tools/call", id: "4", params: { name: "p4_info", arguments: {} } });
  });

  it("ignores a jsonrpc envelope field", () => {
    const request = decodeOk('{"jsonrpc":"2.0","method":"ping","id":"5"}');
    expect(request).toEqual({ method: "ping", id: "5" });
  });

  it("rejects invalid JSON", () => {
    const result = decodeRequest("{not json");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("invalid_json");
  });

  it("rejects an unknown method", () => {
    const result = decodeRequest('{"method":"resources/list","id":"6"}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("invalid_frame");
  });

  it("rejects a numeric id", () => {
    const result = decodeRequest('{"method":"ping","id":7}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("invalid_frame");
    expect(result.error.message).toContain("id");
  });

  it("rejects initialize without params", () => {
    expect(decodeRequest('{"method":"initialize","id":"8"}').ok).toBe(false);
  });

  it("reads non-object tools/call arguments as an empty bag", () => {
    for (const args of ["null", '["a"]', '"a.txt"', "3"]) {
      const request = decodeOk(`{"method":"tools/call","id":"9","params":{"name":"p4_edit","arguments":${args}}}`);
      expect(request).toEqual({ method: "tools/call", id: "9", params: { name: "p4_edit", arguments: {} } });
    }
  });

  it("rejects tools/call without a tool name", () => {
    expect(decodeRequest('{"method":"tools/call","id":"9","params":{"arguments":{}}}').ok).toBe(false);
  });
});

describe("encodeRequest", () => {
  it("round-trips every request kind", () => {
    const lines = [
      INITIALIZE_LINE,
      '{"method":"tools/list","id":"2"}',
      '{"method":"tools/call","id":"3","params":{"name":"p4_sync","arguments":{"path":"//depot/...","force":true}}}',
      '{"method":"ping","id":"4"}',
    ];

    for (const line of lines) {
      const request = decodeOk(line);
      expect(decodeOk(encodeRequest(request))).toEqual(request);
    }
  });
});

describe("encodeResponse", () => {
  it("writes an initialize result without the in-process tag", () => {
    const response: Response = {
      kind: "initialize",
      id: "1",
      result: {
        protocolVersion: "2024-11-05",
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: "p4-mcp", version: "0.1.0" },
      },
    };
    expect(encodeResponse(response)).toBe(
      '{"id":"1","result":{"protocolVersion":"2024-11-05","capabilities":{"tools":{"listChanged":false}},"serverInfo":{"name":"p4-mcp","version":"0.1.0"}}}'
    );
  });

  it("writes a pong as the bare id", () => {
    expect(encodeResponse({ kind: "pong", id: "ping-1" })).toBe('{"id":"ping-1"}');
  });

  it("writes an error object", () => {
    const response: Response = {
      kind: "error",
      id: "9",
      error: { code: -32602, message: "Unknown tool: nope" },
    };
    expect(encodeResponse(response)).toBe('{"id":"9","error":{"code":-32602,"message":"Unknown tool: nope"}}');
  });

  it("writes text and image content blocks", () => {
    const response: Response = {
      kind: "call",
      id: "10",
      result: {
        content: [
          { type: "text", text: "hello" },
          { type: "image", data: "aGk=", mimeType: "image/png" },
        ],
      },
    };
    expect(toWire(response)).toEqual({
      id: "10",
      result: {
        content: [
          { type: "text", text: "hello" },
          { type: "image", data: "aGk=", mimeType: "image/png" },
        ],
      },
    });
  });
});
