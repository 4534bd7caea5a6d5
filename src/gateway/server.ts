import http from "node:http";
import crypto from "node:crypto";
import { URL } from "node:url";
import type { BackendConnection } from "../backend/connection.js";
import type { BackendManager } from "../backend/manager.js";
import { getLogger } from "../core/logger.js";
import { ErrorCodes, classifyMessage, makeError } from "../core/jsonrpc.js";
import { errorMessage } from "../errors.js";
import type { ClassifiedMessage, JsonRpcResponse } from "../types.js";
import { APP_VERSION } from "../version.js";
import { checkAuthorization } from "./auth.js";
import type { CapabilityRegistry } from "./registry.js";
import type { Router } from "./router.js";
import { ResponseSink, acceptsEventStream } from "./streaming.js";

const MAX_BODY_BYTES = 2_000_000;
const SESSION_HEADER = "mcp-session-id";

export interface GatewayServerOptions {
  port: number;
  host?: string;
  apiKey?: string;
  manager: BackendManager;
  registry: CapabilityRegistry;
  router: Router;
  /** Called once, after the first /close has terminated the backends. */
  onClose?: (serversTerminated: number) => void;
}

export type BackendHealth = "running" | "starting" | "error" | "stopped";

export interface BackendHealthEntry {
  status: BackendHealth;
  type: string;
  tools: number;
  startedAt?: string;
  readyAt?: string;
  error?: string;
}

export interface HealthReport {
  status: "healthy" | "unhealthy";
  gatewayVersion: string;
  servers: Record<string, BackendHealthEntry>;
}

const clientLog = getLogger("client");
const authLog = getLogger("auth");
const shutdownLog = getLogger("shutdown");

class PayloadTooLargeError extends Error {}

function sendJson(response: http.ServerResponse, status: number, body: unknown): void {
  response.statusCode = status;
  response.setHeader("content-type", "application/json");
  response.end(JSON.stringify(body));
}

function backendHealth(connection: BackendConnection): BackendHealth {
  if (connection.isClosed) {
    return "stopped";
  }

  switch (connection.state) {
    case "ready":
      return "running";
    case "failed":
      return "error";
    default:
      return "starting";
  }
}

function buildHealthReport(manager: BackendManager, registry: CapabilityRegistry): HealthReport {
  const servers: HealthReport["servers"] = {};
  for (const connection of manager.list()) {
    const status = backendHealth(connection);
    const { startedAt, readyAt } = connection.timeline;
    const entry: BackendHealthEntry = {
      status,
      type: connection.definition.kind,
      tools: registry.toolCount(connection.name)
    };
    if (startedAt) {
      entry.startedAt = startedAt.toISOString();
    }
    if (readyAt) {
      entry.readyAt = readyAt.toISOString();
    }
    if (connection.error) {
      entry.error = connection.error;
    }
    servers[connection.name] = entry;
  }

  const unhealthy = Object.values(servers).some((server) => server.status === "error");
  return {
    status: unhealthy ? "unhealthy" : "healthy",
    gatewayVersion: APP_VERSION,
    servers
  };
}

async function readBody(request: http.IncomingMessage): Promise<string> {
  let body = "";
  request.setEncoding("utf8");
  for await (const chunk of request) {
    body += String(chunk);
    if (Buffer.byteLength(body) > MAX_BODY_BYTES) {
      throw new PayloadTooLargeError("Payload Too Large");
    }
  }

  return body;
}

function idOf(value: unknown): string | number | null {
  if (typeof value === "object" && value !== null && "id" in value) {
    const id = value.id;
    if (typeof id === "string" || typeof id === "number") {
      return id;
    }
  }

  return null;
}

/** Splits `/mcp` and `/mcp/<name>`; anything else under /mcp is not an endpoint. */
function parseMcpPath(pathname: string): { matched: boolean; backend?: string } {
  if (pathname === "/mcp" || pathname === "/mcp/") {
    return { matched: true };
  }

  const rest = pathname.slice("/mcp/".length);
  if (!pathname.startsWith("/mcp/") || rest.includes("/") || rest.startsWith(".well-known")) {
    return { matched: false };
  }

  try {
    return { matched: true, backend: decodeURIComponent(rest) };
  } catch {
    return { matched: false };
  }
}

export function createGatewayServer(options: GatewayServerOptions): http.Server {
  const { manager, registry, router } = options;
  let closed = false;

  const authorize = (request: http.IncomingMessage, response: http.ServerResponse, requestUrl: URL): boolean => {
    const decision = checkAuthorization(request.headers.authorization, requestUrl, options.apiKey);
    if (decision.ok) {
      return true;
    }

    authLog.warn(`Rejected ${request.method ?? "?"} ${requestUrl.pathname} from ${request.socket.remoteAddress ?? "unknown"}: ${decision.error.reason}`);
    sendJson(response, decision.status, makeError(null, ErrorCodes.unauthorized, decision.error.message));
    return false;
  };

  const handleClose = async (response: http.ServerResponse): Promise<void> => {
    let serversTerminated = 0;
    if (!closed) {
      closed = true;
      shutdownLog.info("Shutdown requested via /close");
      serversTerminated = await manager.closeAll();
      shutdownLog.info(`Terminated ${serversTerminated} backend(s)`);
      options.onClose?.(serversTerminated);
    }

    sendJson(response, 200, {
      status: "closed",
      message: "Gateway shutdown initiated",
      serversTerminated
    });
  };

  const handleRpc = async (
    request: http.IncomingMessage,
    response: http.ServerResponse,
    backend: string | undefined
  ): Promise<void> => {
    let body: string;
    try {
      body = await readBody(request);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        response.statusCode = 413;
        response.end("Payload Too Large");
        return;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      sendJson(response, 400, makeError(null, ErrorCodes.parseError, "Parse error"));
      return;
    }

    const batch = Array.isArray(parsed);
    const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
    if (items.length === 0) {
      sendJson(response, 400, makeError(null, ErrorCodes.invalidRequest, "Invalid Request: empty batch"));
      return;
    }

    const sink = new ResponseSink(response, acceptsEventStream(request));
    const abort = new AbortController();
    response.on("close", () => {
      if (!response.writableFinished) {
        abort.abort();
      }
    });

    const messages = items.map((item): ClassifiedMessage | JsonRpcResponse => classifyMessage(item)
      ?? makeError(idOf(item), ErrorCodes.invalidRequest, "Invalid Request"));
    if (messages.some((message) => "kind" in message && message.kind === "request" && message.message.method === "initialize")) {
      sink.setHeader(SESSION_HEADER, crypto.randomUUID());
    }

    const responses: JsonRpcResponse[] = [];
    for (const message of messages) {
      if (!("kind" in message)) {
        responses.push(message);
        continue;
      }

      if (message.kind === "request") {
        clientLog.debug(`${backend ?? "unified"} <- ${message.message.method} id=${String(message.message.id)}`);
      }

      const reply = await router.dispatch(message, {
        backend,
        signal: abort.signal,
        relay: (relayed) => sink.relay(relayed)
      });
      if (reply) {
        responses.push(reply);
      }
    }

    sink.finish(responses, batch);
  };

  const server = http.createServer(async (request, response) => {
    try {
      const requestUrl = new URL(request.url ?? "/", `http://${request.headers.host ?? "127.0.0.1"}`);
      const pathname = requestUrl.pathname;

      if (pathname === "/health") {
        if (request.method !== "GET") {
          sendJson(response, 405, { error: "method_not_allowed" });
          return;
        }
        sendJson(response, 200, buildHealthReport(manager, registry));
        return;
      }

      if (pathname === "/close") {
        if (request.method !== "POST") {
          sendJson(response, 405, { error: "method_not_allowed" });
          return;
        }
        if (!authorize(request, response, requestUrl)) {
          return;
        }
        await handleClose(response);
        return;
      }

      const route = parseMcpPath(pathname);
      if (!route.matched) {
        sendJson(response, 404, { error: "not_found" });
        return;
      }

      if (!authorize(request, response, requestUrl)) {
        return;
      }

      if (router.mode === "routed" ? !route.backend : route.backend !== undefined) {
        sendJson(response, 404, {
          error: "not_found",
          message: router.mode === "routed" ? "Routed mode serves /mcp/<backend>" : "Unified mode serves /mcp"
        });
        return;
      }

      if (route.backend !== undefined && !router.knowsBackend(route.backend)) {
        sendJson(response, 404, makeError(null, ErrorCodes.methodNotFound, `Unknown backend: ${route.backend}`));
        return;
      }

      if (request.method !== "POST") {
        response.statusCode = 405;
        response.setHeader("allow", "POST");
        response.end("Method Not Allowed");
        return;
      }

      await handleRpc(request, response, route.backend);
    } catch (error) {
      clientLog.error(`Request failed: ${errorMessage(error)}`);
      if (!response.headersSent) {
        sendJson(response, 500, makeError(null, ErrorCodes.internalError, errorMessage(error)));
      } else {
        response.end();
      }
    }
  });

  server.listen(options.port, options.host ?? "127.0.0.1");
  return server;
}
