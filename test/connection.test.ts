import { describe, expect, it } from "vitest";
import { BackendConnection } from "../src/backend/connection.js";
import type { BackendTransport, SendOptions, TransportCloseHandler } from "../src/backend/transport.js";
import { TransportError } from "../src/errors.js";
import type { DiscoveredCapabilities } from "../src/gateway/registry.js";
import type { BackendDefinition, JsonRpcResponse, OutboundRequest } from "../src/types.js";

type Responder = (request: OutboundRequest) => JsonRpcResponse | Promise<JsonRpcResponse>;

class FakeTransport implements BackendTransport {
  readonly kind = "stdio" as const;
  readonly sent: Array<{ request: OutboundRequest; options: SendOptions }> = [];
  readonly notifications: string[] = [];
  closeCalls = 0;
  onClose?: TransportCloseHandler;

  constructor(private readonly respond: Responder) {}

  async start(): Promise<void> {}

  async send(request: OutboundRequest, options: SendOptions): Promise<JsonRpcResponse> {
    this.sent.push({ request, options });
    return this.respond(request);
  }

  async notify(method: string): Promise<void> {
    this.notifications.push(method);
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

const definition: BackendDefinition = { name: "files", kind: "stdio", command: "files-server", args: [], env: {} };

function result(value: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id: 1, result: value };
}

function standardBackend(request: OutboundRequest): JsonRpcResponse {
  switch (request.method) {
    case "initialize":
      return result({ protocolVersion: "2025-06-18", capabilities: { tools: {}, prompts: {} }, serverInfo: { name: "files", version: "1.0.0" } });
    case "tools/list":
      return !Array.isArray(request.params) && request.params?.cursor === "page-2"
        ? result({ tools: [{ name: "write" }] })
        : result({ tools: [{ name: "read" }], nextCursor: "page-2" });
    case "prompts/list":
      return result({ prompts: [{ name: "summarize" }] });
    default:
      return { jsonrpc: "2.0", id: 1, error: { code: -32601, message: `Method not found: ${request.method}` } };
  }
}

function connectionFor(transport: FakeTransport, startupTimeoutMs = 1000) {
  const discovered: DiscoveredCapabilities[] = [];
  const connection = new BackendConnection(definition, () => transport, {
    startupTimeoutMs,
    toolTimeoutMs: 500,
    onReady: (_connection, capabilities) => discovered.push(capabilities)
  });

  return { connection, discovered };
}

describe("backend connection", () => {
  it("completes the handshake and follows list cursors", async () => {
    const transport = new FakeTransport(standardBackend);
    const { connection, discovered } = connectionFor(transport);
    expect(connection.timeline).toEqual({ startedAt: undefined, readyAt: undefined });

    await expect(connection.connect()).resolves.toBe("ready");
    expect(connection.isReady).toBe(true);
    const { startedAt, readyAt } = connection.timeline;
    expect(startedAt).toBeInstanceOf(Date);
    expect(readyAt).toBeInstanceOf(Date);
    expect((readyAt?.getTime() ?? 0) >= (startedAt?.getTime() ?? Infinity)).toBe(true);
    expect(connection.serverInfo).toEqual({ name: "files", version: "1.0.0" });
    expect(transport.notifications).toEqual(["notifications/initialized"]);
    expect(transport.sent.map((entry) => entry.request.method)).toEqual(["initialize", "tools/list", "tools/list", "prompts/list"]);
    expect(transport.sent[0]?.options.sessionId).toMatch(/^gateway-init-files-/);
    expect(discovered).toEqual([{ tools: [{ name: "read" }, { name: "write" }], resources: [], prompts: [{ name: "summarize" }] }]);
  });

  it("fails when the backend rejects initialize", async () => {
    const transport = new FakeTransport(() => ({ jsonrpc: "2.0", id: 1, error: { code: -32603, message: "boom" } }));
    const { connection, discovered } = connectionFor(transport);

    await expect(connection.connect()).resolves.toBe("failed");
    expect(connection.error).toBe("initialize rejected: boom");
    expect(connection.timeline.startedAt).toBeInstanceOf(Date);
    expect(connection.timeline.readyAt).toBeUndefined();
    expect(transport.closeCalls).toBe(1);
    expect(discovered).toEqual([]);
  });

  it("fails a backend that does not finish the handshake in time", async () => {
    const transport = new FakeTransport(() => new Promise<JsonRpcResponse>(() => {}));
    const { connection } = connectionFor(transport, 50);

    await expect(connection.connect()).resolves.toBe("failed");
    expect(connection.error).toBe("Request 'startup' to backend 'files' timed out after 50ms");
  });

  it("keeps the backend when a list request errors", async () => {
    const transport = new FakeTransport((request) =>
      request.method === "tools/list"
        ? { jsonrpc: "2.0", id: 1, error: { code: -32603, message: "listing broke" } }
        : standardBackend(request)
    );
    const { connection, discovered } = connectionFor(transport);

    await expect(connection.connect()).resolves.toBe("ready");
    expect(discovered[0]?.tools).toEqual([]);
    expect(discovered[0]?.prompts).toEqual([{ name: "summarize" }]);
  });

  it("refuses traffic until ready and moves to failed when the transport dies", async () => {
    const transport = new FakeTransport(standardBackend);
    const { connection } = connectionFor(transport);

    await expect(connection.send({ method: "tools/call" })).rejects.toThrow(TransportError);
    await connection.connect();

    transport.onClose?.(new Error("process exited unexpectedly"));
    expect(connection.state).toBe("failed");
    expect(connection.error).toBe("process exited unexpectedly");
    await expect(connection.send({ method: "tools/call" })).rejects.toThrow("Backend 'files' is not available (failed)");
  });

  it("never connects twice", async () => {
    const { connection } = connectionFor(new FakeTransport(standardBackend));
    await connection.connect();
    await expect(connection.connect()).rejects.toThrow("Illegal state transition for backend 'files': ready -> connecting");
  });

  it("reports whether close terminated a live transport", async () => {
    const transport = new FakeTransport(standardBackend);
    const { connection } = connectionFor(transport);
    await connection.connect();

    await expect(connection.close()).resolves.toBe(true);
    await expect(connection.close()).resolves.toBe(false);
    expect(transport.closeCalls).toBe(1);
    expect(connection.isReady).toBe(false);
  });

  it("counts nothing when closing a backend that already failed", async () => {
    const transport = new FakeTransport(() => ({ jsonrpc: "2.0", id: 1, error: { code: -32603, message: "boom" } }));
    const { connection } = connectionFor(transport);
    await connection.connect();

    await expect(connection.close()).resolves.toBe(false);
  });
});
