import type http from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { HttpBackendTransport } from "../src/backend/http-transport.js";
import { TimeoutError, TransportError, UpstreamError } from "../src/errors.js";
import type { HttpBackendDefinition, JsonRpcMessage } from "../src/types.js";
import { closeServer, readJsonBody, sseEvent, startServer, toEnvelope } from "./helpers.js";

interface SeenRequest {
  method: string;
  session?: string;
  protocolVersion?: string;
  authorization?: string;
  rpcMethod?: string;
}

function header(request: http.IncomingMessage, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === "string" ? value : undefined;
}

describe("HTTP backend transport", () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    while (cleanups.length > 0) {
      await cleanups.pop()?.();
    }
  });

  async function upstream(
    reply: (envelope: ReturnType<typeof toEnvelope>, response: http.ServerResponse) => void
  ): Promise<{ definition: HttpBackendDefinition; seen: SeenRequest[] }> {
    const seen: SeenRequest[] = [];
    const started = await startServer(async (request, response) => {
      const entry: SeenRequest = {
        method: request.method ?? "",
        session: header(request, "mcp-session-id"),
        protocolVersion: header(request, "mcp-protocol-version"),
        authorization: header(request, "authorization")
      };
      seen.push(entry);

      if (request.method === "DELETE") {
        response.writeHead(200).end();
        return;
      }

      const envelope = toEnvelope(await readJsonBody(request));
      entry.rpcMethod = envelope.method;
      reply(envelope, response);
    });
    cleanups.push(() => closeServer(started.server));

    return {
      definition: {
        name: "remote",
        kind: "http",
        url: `http://127.0.0.1:${started.port}/mcp`,
        headers: { Authorization: "Bearer test-token" }
      },
      seen
    };
  }

  function track(transport: HttpBackendTransport): HttpBackendTransport {
    cleanups.push(() => transport.close());
    return transport;
  }

  it("adopts the backend session id and protocol version after initialize", async () => {
    const { definition, seen } = await upstream((envelope, response) => {
      if (envelope.id === null) {
        response.writeHead(202).end();
        return;
      }

      const result = envelope.method === "initialize" ? { protocolVersion: "2025-06-18", capabilities: {} } : { tools: [] };
      response
        .writeHead(200, { "content-type": "application/json", "mcp-session-id": "backend-session-1" })
        .end(JSON.stringify({ jsonrpc: "2.0", id: envelope.id, result }));
    });
    const transport = track(new HttpBackendTransport(definition));
    await transport.start();

    const initialized = await transport.send(
      { method: "initialize", params: {} },
      { timeoutMs: 2000, sessionId: "gateway-init-remote-0011223344556677" }
    );
    expect(initialized.result).toEqual({ protocolVersion: "2025-06-18", capabilities: {} });
    await transport.notify("notifications/initialized");
    await transport.send({ method: "tools/list" }, { timeoutMs: 2000 });

    expect(transport.currentSessionId).toBe("backend-session-1");
    expect(seen.map((entry) => [entry.rpcMethod, entry.session, entry.protocolVersion])).toEqual([
      ["initialize", "gateway-init-remote-0011223344556677", undefined],
      ["notifications/initialized", "backend-session-1", "2025-06-18"],
      ["tools/list", "backend-session-1", "2025-06-18"]
    ]);
    expect(seen[0]?.authorization).toBe("Bearer test-token");
  });

  it("keeps the synthetic session when the backend issues none and skips DELETE on close", async () => {
    const { definition, seen } = await upstream((envelope, response) => {
      response
        .writeHead(200, { "content-type": "application/json" })
        .end(JSON.stringify({ jsonrpc: "2.0", id: envelope.id, result: {} }));
    });
    const transport = new HttpBackendTransport(definition);

    await transport.send({ method: "initialize" }, { timeoutMs: 2000, sessionId: "gateway-init-remote-aa" });
    await transport.send({ method: "ping" }, { timeoutMs: 2000 });
    await transport.close();

    expect(seen.map((entry) => entry.session)).toEqual(["gateway-init-remote-aa", "gateway-init-remote-aa"]);
  });

  it("terminates a backend-issued session on close", async () => {
    const { definition, seen } = await upstream((envelope, response) => {
      response
        .writeHead(200, { "content-type": "application/json", "mcp-session-id": "backend-session-2" })
        .end(JSON.stringify({ jsonrpc: "2.0", id: envelope.id, result: {} }));
    });
    const transport = new HttpBackendTransport(definition);

    await transport.send({ method: "initialize" }, { timeoutMs: 2000 });
    await transport.close();

    expect(seen.at(-1)).toMatchObject({ method: "DELETE", session: "backend-session-2" });
    await expect(transport.send({ method: "ping" }, { timeoutMs: 2000 })).rejects.toThrow("backend 'remote' was shut down");
  });

  it("reads the matching response from an event stream and relays earlier messages", async () => {
    const { definition } = await upstream((envelope, response) => {
      response.writeHead(200, { "content-type": "text/event-stream" });
      response.write(sseEvent({ jsonrpc: "2.0", method: "notifications/progress", params: { progress: 1 } }));
      response.write(": keep-alive\n\n");
      response.write("event: message\ndata: not json\n\n");
      response.end(sseEvent({ jsonrpc: "2.0", id: envelope.id, result: { content: [] } }));
    });
    const transport = track(new HttpBackendTransport(definition));
    const relayed: JsonRpcMessage[] = [];

    const response = await transport.send(
      { method: "tools/call", params: { name: "search" } },
      { timeoutMs: 2000, onMessage: (message) => relayed.push(message) }
    );

    expect(response).toEqual({ jsonrpc: "2.0", id: 1, result: { content: [] } });
    expect(relayed).toEqual([{ jsonrpc: "2.0", method: "notifications/progress", params: { progress: 1 } }]);
  });

  it("picks its response out of a JSON batch", async () => {
    const { definition } = await upstream((envelope, response) => {
      response.writeHead(200, { "content-type": "application/json" }).end(JSON.stringify([
        { jsonrpc: "2.0", method: "notifications/message", params: {} },
        { jsonrpc: "2.0", id: envelope.id, result: { ok: true } }
      ]));
    });
    const transport = track(new HttpBackendTransport(definition));

    await expect(transport.send({ method: "ping" }, { timeoutMs: 2000 })).resolves.toEqual({ jsonrpc: "2.0", id: 1, result: { ok: true } });
  });

  it("surfaces HTTP failures as upstream errors with the status and body", async () => {
    const { definition } = await upstream((_envelope, response) => {
      response.writeHead(401, { "content-type": "text/plain" }).end("bad token");
    });
    const transport = track(new HttpBackendTransport(definition));

    const error = await transport.send({ method: "initialize" }, { timeoutMs: 2000 }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(UpstreamError);
    if (error instanceof UpstreamError) {
      expect(error.status).toBe(401);
      expect(error.body).toBe("bad token");
    }
  });

  it("times out a backend that never answers", async () => {
    const { definition } = await upstream(() => {
      // Holds the request open.
    });
    const transport = track(new HttpBackendTransport(definition));

    const error = await transport.send({ method: "tools/call" }, { timeoutMs: 100 }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof Error ? error.message : "").toBe("Request 'tools/call' to backend 'remote' timed out after 100ms");
  });

  it("aborts when the caller cancels", async () => {
    const { definition } = await upstream(() => {
      // Holds the request open.
    });
    const transport = track(new HttpBackendTransport(definition));
    const controller = new AbortController();

    const pending = transport.send({ method: "tools/call" }, { timeoutMs: 5000, signal: controller.signal });
    setTimeout(() => controller.abort(), 50);

    await expect(pending).rejects.toThrow("request 'tools/call' was cancelled by the client");
  });

  it("reports unreachable backends as transport errors", async () => {
    const { server, port } = await startServer(() => {});
    await closeServer(server);

    const transport = track(new HttpBackendTransport({ name: "remote", kind: "http", url: `http://127.0.0.1:${port}/mcp`, headers: {} }));
    await expect(transport.send({ method: "ping" }, { timeoutMs: 2000 })).rejects.toThrow(TransportError);
  });
});
