import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import type { BackendConnection } from "../backend/connection.js";
import type { BackendManager } from "../backend/manager.js";
import { getLogger } from "../core/logger.js";
import { ErrorCodes, makeError, makeResult, withClientId } from "../core/jsonrpc.js";
import { RoutingError, TimeoutError, TransportError, UpstreamError, errorMessage } from "../errors.js";
import type {
  ClassifiedMessage,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  RoutingMode
} from "../types.js";
import { APP_NAME, APP_VERSION } from "../version.js";
import {
  listEntries,
  splitNamespacedKey,
  type CapabilityKind,
  type CapabilityRegistry,
  type RegistrySnapshot
} from "./registry.js";

export interface DispatchContext {
  /** Target backend in routed mode. */
  backend?: string;
  signal?: AbortSignal;
  relay?: (message: JsonRpcMessage) => void;
}

const LIST_METHODS: Record<string, keyof RegistrySnapshot> = {
  "tools/list": "tools",
  "resources/list": "resources",
  "prompts/list": "prompts"
};

const INVOCATION_METHODS: Record<string, { kind: CapabilityKind; param: "name" | "uri" }> = {
  "tools/call": { kind: "tool", param: "name" },
  "prompts/get": { kind: "prompt", param: "name" },
  "resources/read": { kind: "resource", param: "uri" }
};

const LOCAL_NOTIFICATIONS = new Set(["notifications/initialized", "notifications/cancelled"]);

const log = getLogger("rpc");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toErrorResponse(id: JsonRpcId | null, error: unknown): JsonRpcResponse {
  if (error instanceof RoutingError) {
    return makeError(id, ErrorCodes.methodNotFound, error.message);
  }

  if (error instanceof UpstreamError) {
    if (error.rpcError) {
      return { jsonrpc: "2.0", id, error: error.rpcError };
    }

    return makeError(id, ErrorCodes.upstreamError, error.message, {
      status: error.status,
      body: error.body
    });
  }

  if (error instanceof TimeoutError || error instanceof TransportError) {
    return makeError(id, ErrorCodes.internalError, error.message);
  }

  log.error(`Unexpected error while routing request: ${errorMessage(error)}`);
  return makeError(id, ErrorCodes.internalError, `Internal error: ${errorMessage(error)}`);
}

export class Router {
  constructor(
    private readonly manager: BackendManager,
    private readonly registry: CapabilityRegistry,
    readonly mode: RoutingMode
  ) {}

  knowsBackend(name: string): boolean {
    return this.manager.get(name) !== undefined;
  }

  async dispatch(classified: ClassifiedMessage, context: DispatchContext = {}): Promise<JsonRpcResponse | null> {
    if (classified.kind === "response") {
      log.debug(`Ignoring client response for id ${String(classified.message.id)}`);
      return null;
    }

    if (classified.kind === "notification") {
      await this.handleNotification(classified.message, context);
      return null;
    }

    const request = classified.message;
    try {
      return await this.handleRequest(request, context);
    } catch (error) {
      return toErrorResponse(request.id, error);
    }
  }

  private async handleRequest(request: JsonRpcRequest, context: DispatchContext): Promise<JsonRpcResponse> {
    if (request.method === "initialize") {
      return this.initializeResult(request, context.backend);
    }

    if (request.method === "ping") {
      return makeResult(request.id, {});
    }

    if (this.mode === "routed") {
      if (!context.backend) {
        throw new RoutingError("unknown_backend", "Routed mode requires a backend name in the path");
      }
      return this.handleRouted(request, context.backend, context);
    }

    return this.handleUnified(request, context);
  }

  private initializeResult(request: JsonRpcRequest, backend: string | undefined): JsonRpcResponse {
    const requested = isRecord(request.params) ? request.params.protocolVersion : undefined;
    const protocolVersion = typeof requested === "string" && requested.length > 0 ? requested : LATEST_PROTOCOL_VERSION;

    return makeResult(request.id, {
      protocolVersion,
      capabilities: {
        tools: {},
        resources: {},
        prompts: {}
      },
      serverInfo: {
        name: backend ? `${APP_NAME}-${backend}` : APP_NAME,
        version: APP_VERSION
      }
    });
  }

  private async handleRouted(request: JsonRpcRequest, backend: string, context: DispatchContext): Promise<JsonRpcResponse> {
    const connection = this.requireConnection(backend);

    const listKey = LIST_METHODS[request.method];
    const snapshot = this.registry.forBackend(backend);
    if (listKey && snapshot) {
      return makeResult(request.id, { [listKey]: listEntries(snapshot[listKey], "routed") });
    }

    return this.forward(connection, request, request.params, context);
  }

  private async handleUnified(request: JsonRpcRequest, context: DispatchContext): Promise<JsonRpcResponse> {
    const listKey = LIST_METHODS[request.method];
    if (listKey) {
      return makeResult(request.id, { [listKey]: listEntries(this.registry.snapshot()[listKey], "unified") });
    }

    const invocation = INVOCATION_METHODS[request.method];
    if (!invocation) {
      throw new RoutingError("unknown_method", `Method not found: ${request.method}`);
    }

    const params = isRecord(request.params) ? request.params : {};
    const target = params[invocation.param];
    if (typeof target !== "string" || target.length === 0) {
      return makeError(request.id, ErrorCodes.invalidParams, `Missing '${invocation.param}' in params for ${request.method}`);
    }

    const descriptor = this.registry.resolve(invocation.kind, target);
    if (!descriptor) {
      const split = splitNamespacedKey(target);
      if (split && !this.knowsBackend(split.backend)) {
        throw new RoutingError("unknown_backend", `Unknown backend '${split.backend}' in ${invocation.kind} '${target}'`);
      }
      throw new RoutingError("unknown_capability", `Unknown ${invocation.kind}: ${target}`);
    }

    const connection = this.requireConnection(descriptor.backend);
    return this.forward(connection, request, { ...params, [invocation.param]: descriptor.key }, context);
  }

  private requireConnection(backend: string): BackendConnection {
    const connection = this.manager.get(backend);
    if (!connection) {
      throw new RoutingError("unknown_backend", `Unknown backend: ${backend}`);
    }

    if (!connection.isReady) {
      throw new TransportError(backend, `Backend '${backend}' is not available`);
    }

    return connection;
  }

  private async forward(
    connection: BackendConnection,
    request: JsonRpcRequest,
    params: JsonRpcParams | undefined,
    context: DispatchContext
  ): Promise<JsonRpcResponse> {
    const relay = context.relay;
    const response = await connection.send(
      { method: request.method, params },
      {
        signal: context.signal,
        onMessage: relay
          ? (message) => {
            if (!("id" in message)) {
              relay(message);
            }
          }
          : undefined
      }
    );

    return withClientId(response, request.id);
  }

  private async handleNotification(notification: JsonRpcNotification, context: DispatchContext): Promise<void> {
    if (LOCAL_NOTIFICATIONS.has(notification.method)) {
      log.debug(`Accepted ${notification.method}`);
      return;
    }

    if (this.mode !== "routed" || !context.backend) {
      log.debug(`Dropping ${notification.method} in unified mode`);
      return;
    }

    const connection = this.manager.get(context.backend);
    if (!connection?.isReady) {
      log.debug(`Dropping ${notification.method} for unavailable backend ${context.backend}`);
      return;
    }

    try {
      await connection.notify(notification.method, notification.params);
    } catch (error) {
      log.warn(`Could not forward ${notification.method} to ${context.backend}: ${errorMessage(error)}`);
    }
  }
}
