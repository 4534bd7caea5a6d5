import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { getLogger } from "../core/logger.js";
import { logRpcMessage } from "../core/rpc-log.js";
import { describeCommand, maskRecord } from "../core/sanitize.js";
import { ErrorCodes, JSON_RPC_VERSION, classifyMessage, makeError, makeResult } from "../core/jsonrpc.js";
import { TransportError, errorMessage } from "../errors.js";
import type {
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  OutboundRequest,
  StdioBackendDefinition
} from "../types.js";
import { PendingRequests, type BackendTransport, type SendOptions, type TransportCloseHandler } from "./transport.js";

const log = getLogger("backend");

export function buildChildEnvironment(extra: Record<string, string>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === "string") {
      env[key] = value;
    }
  }

  return { ...env, ...extra };
}

/**
 * Owns one backend subprocess. Messages are written one at a time through a promise
 * chain; the SDK transport splits stdout into lines and every line that is not a
 * JSON-RPC message is dropped.
 */
export class StdioBackendTransport implements BackendTransport {
  readonly kind = "stdio";
  onClose?: TransportCloseHandler;

  private readonly transport: StdioClientTransport;
  private readonly pending: PendingRequests;
  private writeChain: Promise<void> = Promise.resolve();
  private nextId = 1;
  private closing = false;
  private exited = false;

  constructor(private readonly definition: StdioBackendDefinition) {
    this.pending = new PendingRequests(definition.name);
    this.transport = new StdioClientTransport({
      command: definition.command,
      args: definition.args,
      env: buildChildEnvironment(definition.env),
      cwd: definition.cwd,
      stderr: "pipe"
    });
  }

  async start(): Promise<void> {
    const name = this.definition.name;
    this.transport.onmessage = (message) => this.handleMessage(message);
    this.transport.onerror = (error) => {
      log.debug(`Ignoring non-protocol output from ${name}: ${error.message}`);
    };
    this.transport.onclose = () => this.handleExit();

    const stderr = this.transport.stderr;
    if (stderr) {
      stderr.on("data", (chunk: Buffer | string) => {
        for (const line of chunk.toString().split(/\r?\n/)) {
          if (line.trim().length > 0) {
            log.debug(`[${name} stderr] ${line}`);
          }
        }
      });
    }

    log.info(`Launching ${name}: ${describeCommand(this.definition.command, this.definition.args)}`);
    if (Object.keys(this.definition.env).length > 0) {
      log.debug(`Environment for ${name}: ${JSON.stringify(maskRecord(this.definition.env))}`);
    }
    try {
      await this.transport.start();
    } catch (error) {
      this.exited = true;
      throw new TransportError(name, `failed to launch '${this.definition.command}': ${errorMessage(error)}`, { cause: error });
    }
  }

  async send(request: OutboundRequest, options: SendOptions): Promise<JsonRpcResponse> {
    const name = this.definition.name;
    if (this.closing || this.exited) {
      throw new TransportError(name, `backend '${name}' process is not running`);
    }

    // The SDK's stdio framing validates params as an object.
    if (Array.isArray(request.params)) {
      throw new TransportError(name, `backend '${name}' takes named params only; '${request.method}' was sent positional params`);
    }

    const id = this.nextId++;
    const message: JsonRpcRequest = {
      jsonrpc: JSON_RPC_VERSION,
      id,
      method: request.method,
      params: request.params
    };

    const response = this.pending.register(id, request.method, options.timeoutMs, (expiredId) => {
      void this.cancel(expiredId, "timeout");
    });

    const signal = options.signal;
    const onAbort = () => {
      if (this.pending.fail(id, new TransportError(name, `request '${request.method}' was cancelled by the client`))) {
        void this.cancel(id, "client disconnected");
      }
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    this.write(message).catch((error: unknown) => {
      this.pending.fail(id, new TransportError(name, `failed to write to '${name}': ${errorMessage(error)}`, { cause: error }));
    });

    try {
      return await response;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  async notify(method: string, params?: JsonRpcParams): Promise<void> {
    if (this.closing || this.exited) {
      throw new TransportError(this.definition.name, `backend '${this.definition.name}' process is not running`);
    }

    await this.write({ jsonrpc: JSON_RPC_VERSION, method, params });
  }

  async close(): Promise<void> {
    if (this.closing) {
      return;
    }

    this.closing = true;
    this.pending.failAll(new TransportError(this.definition.name, `backend '${this.definition.name}' was shut down`));
    await this.transport.close();
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private write(message: JsonRpcMessage): Promise<void> {
    const next = this.writeChain.then(async () => {
      const parsed = JSONRPCMessageSchema.parse(message);
      logRpcMessage("OUT", this.definition.name, message);
      await this.transport.send(parsed);
    });
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  // Best effort: the subprocess may finish the work anyway.
  private async cancel(requestId: JsonRpcId, reason: string): Promise<void> {
    if (this.closing || this.exited) {
      return;
    }

    try {
      await this.write({
        jsonrpc: JSON_RPC_VERSION,
        method: "notifications/cancelled",
        params: { requestId, reason }
      });
    } catch (error) {
      log.debug(`Could not send cancellation to ${this.definition.name}: ${errorMessage(error)}`);
    }
  }

  private handleMessage(raw: unknown): void {
    const classified = classifyMessage(raw);
    if (!classified) {
      log.debug(`Discarding malformed message from ${this.definition.name}`);
      return;
    }

    logRpcMessage("IN", this.definition.name, classified.message);

    if (classified.kind === "response") {
      if (!this.pending.settle(classified.message)) {
        log.debug(`Discarding response for unknown id ${String(classified.message.id)} from ${this.definition.name}`);
      }
      return;
    }

    if (classified.kind === "request") {
      this.answerServerRequest(classified.message);
      return;
    }

    log.debug(`Notification ${classified.message.method} from ${this.definition.name}`);
  }

  // The gateway offers no client capabilities, so backend-initiated requests other than ping are refused.
  private answerServerRequest(request: JsonRpcRequest): void {
    const reply = request.method === "ping"
      ? makeResult(request.id, {})
      : makeError(request.id, ErrorCodes.methodNotFound, `Method not supported by gateway: ${request.method}`);

    this.write(reply).catch((error: unknown) => {
      log.debug(`Could not answer ${request.method} from ${this.definition.name}: ${errorMessage(error)}`);
    });
  }

  private handleExit(): void {
    if (this.exited) {
      return;
    }

    this.exited = true;
    if (this.closing) {
      return;
    }

    const error = new TransportError(this.definition.name, `backend '${this.definition.name}' process exited unexpectedly`);
    const failed = this.pending.failAll(error);
    log.error(`${error.message}; failed ${failed} pending request(s)`);
    this.onClose?.(error);
  }
}
