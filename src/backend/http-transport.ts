import { getLogger } from "../core/logger.js";
import { logRpcMessage } from "../core/rpc-log.js";
import { maskRecord } from "../core/sanitize.js";
import { JSON_RPC_VERSION, classifyMessage } from "../core/jsonrpc.js";
import { GatewayError, TimeoutError, TransportError, UpstreamError, errorMessage } from "../errors.js";
import type {
  HttpBackendDefinition,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  OutboundRequest
} from "../types.js";
import { parseSseStream, readSseResponse } from "./sse.js";
import type { BackendTransport, SendOptions, TransportCloseHandler } from "./transport.js";

const SESSION_HEADER = "mcp-session-id";
const PROTOCOL_VERSION_HEADER = "mcp-protocol-version";
const SESSION_DELETE_TIMEOUT_MS = 2_000;

const log = getLogger("backend");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeFetchFailure(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message} (${error.cause.message})`;
  }

  return message;
}

function findResponse(payload: unknown, expectedId: JsonRpcId): JsonRpcResponse | null {
  const candidates = Array.isArray(payload) ? payload : [payload];
  for (const candidate of candidates) {
    const classified = classifyMessage(candidate);
    if (classified?.kind === "response" && classified.message.id === expectedId) {
      return classified.message;
    }
  }

  return null;
}

/**
 * Streamable HTTP backend: one POST per message. Calls run independently, so there is
 * no pending table here; each fetch owns its own deadline and abort controller.
 */
export class HttpBackendTransport implements BackendTransport {
  readonly kind = "http";
  onClose?: TransportCloseHandler;

  private readonly inflight = new Set<AbortController>();
  private sessionId?: string;
  private sessionIssuedByBackend = false;
  private protocolVersion?: string;
  private nextId = 1;
  private closed = false;

  constructor(private readonly definition: HttpBackendDefinition) {}

  get currentSessionId(): string | undefined {
    return this.sessionId;
  }

  async start(): Promise<void> {
    try {
      new URL(this.definition.url);
    } catch (error) {
      throw new TransportError(this.definition.name, `invalid backend URL '${this.definition.url}'`, { cause: error });
    }

    log.info(`Connecting ${this.definition.name} to ${this.definition.url}`);
    if (Object.keys(this.definition.headers).length > 0) {
      log.debug(`Headers for ${this.definition.name}: ${JSON.stringify(maskRecord(this.definition.headers))}`);
    }
  }

  async send(request: OutboundRequest, options: SendOptions): Promise<JsonRpcResponse> {
    const name = this.definition.name;
    const message: JsonRpcRequest = {
      jsonrpc: JSON_RPC_VERSION,
      id: this.nextId++,
      method: request.method,
      params: request.params
    };
    const id = message.id;
    const relay = options.onMessage;
    const onMessage = (relayed: JsonRpcMessage) => {
      logRpcMessage("IN", name, relayed);
      relay?.(relayed);
    };

    return this.exchange(message, options, async (response) => {
      const contentType = response.headers.get("content-type") ?? "";
      let payload: JsonRpcResponse | null;
      if (contentType.includes("text/event-stream")) {
        if (!response.body) {
          throw new TransportError(name, `backend '${name}' sent an empty event stream`);
        }
        payload = await readSseResponse(parseSseStream(response.body), id, onMessage);
      } else {
        const text = await response.text();
        payload = findResponse(this.parseBody(text), id);
      }

      if (!payload) {
        throw new TransportError(name, `backend '${name}' did not answer '${request.method}' with a JSON-RPC response`);
      }
      logRpcMessage("IN", name, payload);

      if (request.method === "initialize" && isRecord(payload.result) && typeof payload.result.protocolVersion === "string") {
        this.protocolVersion = payload.result.protocolVersion;
      }

      return payload;
    });
  }

  async notify(method: string, params?: JsonRpcParams): Promise<void> {
    const message: JsonRpcNotification = { jsonrpc: JSON_RPC_VERSION, method, params };
    await this.exchange(message, { timeoutMs: 10_000 }, async (response) => {
      await response.body?.cancel();
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const controller of this.inflight) {
      controller.abort(new TransportError(this.definition.name, `backend '${this.definition.name}' was shut down`));
    }
    this.inflight.clear();

    if (this.sessionId && this.sessionIssuedByBackend) {
      try {
        const response = await fetch(this.definition.url, {
          method: "DELETE",
          headers: { ...this.definition.headers, [SESSION_HEADER]: this.sessionId },
          signal: AbortSignal.timeout(SESSION_DELETE_TIMEOUT_MS)
        });
        await response.body?.cancel();
      } catch (error) {
        log.debug(`Session termination for ${this.definition.name} failed: ${errorMessage(error)}`);
      }
    }
  }

  private parseBody(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TransportError(this.definition.name, `backend '${this.definition.name}' returned invalid JSON`, { cause: error });
    }
  }

  private buildHeaders(sessionOverride?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      accept: "application/json, text/event-stream"
    };

    for (const [key, value] of Object.entries(this.definition.headers)) {
      headers[key] = value;
    }

    const sessionId = sessionOverride ?? this.sessionId;
    if (sessionId) {
      headers[SESSION_HEADER] = sessionId;
    }

    if (this.protocolVersion) {
      headers[PROTOCOL_VERSION_HEADER] = this.protocolVersion;
    }

    return headers;
  }

  private captureSession(response: Response, presented?: string): void {
    const issued = response.headers.get(SESSION_HEADER);
    if (issued) {
      if (issued !== this.sessionId) {
        log.debug(`Backend ${this.definition.name} issued session ${issued}`);
      }
      this.sessionId = issued;
      this.sessionIssuedByBackend = true;
    } else if (presented && !this.sessionId) {
      this.sessionId = presented;
    }
  }

  private async exchange<T>(
    message: JsonRpcRequest | JsonRpcNotification,
    options: SendOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const name = this.definition.name;
    const method = message.method;
    if (this.closed) {
      throw new TransportError(name, `backend '${name}' was shut down`);
    }

    const controller = new AbortController();
    this.inflight.add(controller);
    const timer = setTimeout(() => controller.abort(new TimeoutError(name, method, options.timeoutMs)), options.timeoutMs);
    const onAbort = () => controller.abort(new TransportError(name, `request '${method}' was cancelled by the client`));
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      logRpcMessage("OUT", name, message);
      const response = await fetch(this.definition.url, {
        method: "POST",
        headers: this.buildHeaders(options.sessionId),
        body: JSON.stringify(message),
        signal: controller.signal
      });
      this.captureSession(response, options.sessionId);

      if (!response.ok) {
        const text = await response.text();
        throw new UpstreamError(name, { status: response.status, body: text });
      }

      return await read(response);
    } catch (error) {
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && reason instanceof GatewayError) {
        throw reason;
      }

      if (error instanceof GatewayError) {
        throw error;
      }

      throw new TransportError(name, `request '${method}' to '${name}' failed: ${describeFetchFailure(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      this.inflight.delete(controller);
    }
  }
}
