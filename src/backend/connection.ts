import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { getLogger } from "../core/logger.js";
import { BackendConnectError, GatewayError, TimeoutError, TransportError, UpstreamError, errorMessage } from "../errors.js";
import type { DiscoveredCapabilities } from "../gateway/registry.js";
import type { BackendDefinition, JsonRpcMessage, JsonRpcParams, JsonRpcResponse, OutboundRequest } from "../types.js";
import { APP_NAME, APP_VERSION } from "../version.js";
import { createInitSessionId } from "./session.js";
import type { BackendTransport } from "./transport.js";
import { withTimeout } from "../util/timeout.js";

export type BackendState = "disconnected" | "connecting" | "initializing" | "ready" | "failed";

const TRANSITIONS: Record<BackendState, readonly BackendState[]> = {
  disconnected: ["connecting"],
  connecting: ["initializing", "failed"],
  initializing: ["ready", "failed"],
  ready: ["failed"],
  failed: []
};

const MAX_LIST_PAGES = 50;

export type TransportFactory = (definition: BackendDefinition) => BackendTransport;

export interface ConnectionOptions {
  startupTimeoutMs: number;
  toolTimeoutMs: number;
  onReady?: (connection: BackendConnection, capabilities: DiscoveredCapabilities) => void;
}

export interface ForwardOptions {
  signal?: AbortSignal;
  onMessage?: (message: JsonRpcMessage) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const log = getLogger("backend");

export class BackendConnection {
  private currentState: BackendState = "disconnected";
  private transport?: BackendTransport;
  private closed = false;
  private failure?: string;
  private serverCapabilities: Record<string, unknown> = {};
  private startedAt?: Date;
  private readyAt?: Date;
  serverInfo?: Record<string, unknown>;

  constructor(
    readonly definition: BackendDefinition,
    private readonly createTransport: TransportFactory,
    private readonly options: ConnectionOptions
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get state(): BackendState {
    return this.currentState;
  }

  get error(): string | undefined {
    return this.failure;
  }

  /** When the startup attempt began and when the backend became ready, if it did. */
  get timeline(): { startedAt?: Date; readyAt?: Date } {
    return { startedAt: this.startedAt, readyAt: this.readyAt };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isReady(): boolean {
    return this.currentState === "ready" && !this.closed;
  }

  /** Runs the single startup attempt. Never rejects; the outcome is the resulting state. */
  async connect(): Promise<BackendState> {
    this.startedAt = new Date();
    this.transition("connecting");

    const label = this.definition.kind === "http" ? "HTTP" : "stdio";
    try {
      await withTimeout(
        this.handshake(),
        this.options.startupTimeoutMs,
        () => new TimeoutError(this.name, "startup", this.options.startupTimeoutMs)
      );
    } catch (error) {
      const failure = new BackendConnectError(this.name, describeHandshakeFailure(error), { cause: error });
      this.markFailed(failure.message);
      log.error(`FAILED to create ${label} connection for '${this.name}': ${failure.message}`);
      await this.shutdownTransport();
    }

    return this.currentState;
  }

  async send(request: OutboundRequest, options: ForwardOptions = {}): Promise<JsonRpcResponse> {
    const transport = this.requireReadyTransport();
    return transport.send(request, {
      timeoutMs: this.options.toolTimeoutMs,
      signal: options.signal,
      onMessage: options.onMessage
    });
  }

  async notify(method: string, params?: JsonRpcParams): Promise<void> {
    await this.requireReadyTransport().notify(method, params);
  }

  advertises(capability: string): boolean {
    return capability in this.serverCapabilities;
  }

  /** Returns true when this call terminated a live transport. */
  async close(): Promise<boolean> {
    if (this.closed) {
      return false;
    }

    this.closed = true;
    const hadTransport = this.transport !== undefined;
    await this.shutdownTransport();
    return hadTransport;
  }

  private requireReadyTransport(): BackendTransport {
    if (this.currentState !== "ready" || this.closed || !this.transport) {
      throw new TransportError(this.name, `Backend '${this.name}' is not available (${this.closed ? "closed" : this.currentState})`);
    }

    return this.transport;
  }

  private transition(next: BackendState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Illegal state transition for backend '${this.name}': ${this.currentState} -> ${next}`);
    }

    log.debug(`Backend ${this.name}: ${this.currentState} -> ${next}`);
    this.currentState = next;
  }

  private markFailed(reason: string): void {
    if (this.currentState === "failed") {
      return;
    }

    this.failure = reason;
    this.transition("failed");
  }

  private async handshake(): Promise<void> {
    const transport = this.createTransport(this.definition);
    this.transport = transport;
    transport.onClose = (error) => this.handleTransportLoss(error);
    await transport.start();

    this.transition("initializing");
    const timeoutMs = this.options.startupTimeoutMs;
    const initialize = await transport.send(
      {
        method: "initialize",
        params: {
          protocolVersion: LATEST_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: { name: APP_NAME, version: APP_VERSION }
        }
      },
      { timeoutMs, sessionId: createInitSessionId(this.name) }
    );

    if (initialize.error) {
      throw new UpstreamError(this.name, { rpcError: initialize.error });
    }

    const result = isRecord(initialize.result) ? initialize.result : {};
    this.serverCapabilities = isRecord(result.capabilities) ? result.capabilities : {};
    this.serverInfo = isRecord(result.serverInfo) ? result.serverInfo : undefined;

    await transport.notify("notifications/initialized");

    const capabilities: DiscoveredCapabilities = {
      tools: await this.listAll(transport, "tools/list", "tools", true),
      resources: await this.listAll(transport, "resources/list", "resources", this.advertises("resources")),
      prompts: await this.listAll(transport, "prompts/list", "prompts", this.advertises("prompts"))
    };

    if (this.closed) {
      throw new TransportError(this.name, "closed during startup");
    }

    this.transition("ready");
    this.readyAt = new Date();
    this.options.onReady?.(this, capabilities);
  }

  // A list a backend refuses to serve leaves that capability kind empty instead of failing the backend.
  private async listAll(transport: BackendTransport, method: string, key: string, enabled: boolean): Promise<unknown[]> {
    if (!enabled) {
      return [];
    }

    const items: unknown[] = [];
    let cursor: string | undefined;
    for (let page = 0; page < MAX_LIST_PAGES; page += 1) {
      const response = await transport.send(
        { method, params: cursor ? { cursor } : {} },
        { timeoutMs: this.options.startupTimeoutMs }
      );
      if (response.error) {
        log.warn(`${method} on ${this.name} failed (${response.error.code}): ${response.error.message}`);
        return items;
      }

      const result = isRecord(response.result) ? response.result : {};
      const pageItems = result[key];
      if (Array.isArray(pageItems)) {
        items.push(...pageItems);
      }

      if (typeof result.nextCursor !== "string" || result.nextCursor.length === 0) {
        return items;
      }
      cursor = result.nextCursor;
    }

    log.warn(`${method} on ${this.name} exceeded ${MAX_LIST_PAGES} pages, keeping the first ${items.length} entries`);
    return items;
  }

  private handleTransportLoss(error: Error): void {
    if (this.closed || this.currentState === "failed") {
      return;
    }

    if (this.currentState === "ready") {
      log.error(`Backend ${this.name} failed after startup: ${error.message}`);
      this.markFailed(error.message);
    }
  }

  private async shutdownTransport(): Promise<void> {
    const transport = this.transport;
    if (!transport) {
      return;
    }

    this.transport = undefined;
    transport.onClose = undefined;
    try {
      await transport.close();
    } catch (error) {
      log.warn(`Error while closing backend ${this.name}: ${errorMessage(error)}`);
    }
  }
}

function describeHandshakeFailure(error: unknown): string {
  if (error instanceof UpstreamError) {
    if (error.status === 401 || error.status === 403) {
      return `authentication rejected by backend (HTTP ${error.status}); check the configured headers or API key`;
    }

    if (error.rpcError) {
      return `initialize rejected: ${error.rpcError.message}`;
    }

    return `HTTP ${error.status ?? "error"} during handshake`;
  }

  if (error instanceof GatewayError) {
    return error.message;
  }

  return errorMessage(error);
}
