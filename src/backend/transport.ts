import { TimeoutError } from "../errors.js";
import type { JsonRpcId, JsonRpcMessage, JsonRpcParams, JsonRpcResponse, OutboundRequest, TransportKind } from "../types.js";

export interface SendOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Session id to present instead of the stored one (handshake only). */
  sessionId?: string;
  /** Receives backend messages that arrive before the matching response. */
  onMessage?: (message: JsonRpcMessage) => void;
}

export type TransportCloseHandler = (error: Error) => void;

/**
 * One request/response contract over a stdio subprocess or an HTTP endpoint. The
 * transport assigns its own request ids; responses come back carrying them and the
 * caller restores whatever id its own client used.
 */
export interface BackendTransport {
  readonly kind: TransportKind;
  start(): Promise<void>;
  send(request: OutboundRequest, options: SendOptions): Promise<JsonRpcResponse>;
  notify(method: string, params?: JsonRpcParams): Promise<void>;
  close(): Promise<void>;
  /** Invoked once when the transport dies on its own, never after close(). */
  onClose?: TransportCloseHandler;
}

interface PendingEntry {
  method: string;
  timer: NodeJS.Timeout;
  resolve: (response: JsonRpcResponse) => void;
  reject: (error: Error) => void;
}

export class PendingRequests {
  private readonly entries = new Map<JsonRpcId, PendingEntry>();

  constructor(private readonly backend: string) {}

  get size(): number {
    return this.entries.size;
  }

  register(id: JsonRpcId, method: string, timeoutMs: number, onTimeout?: (id: JsonRpcId) => void): Promise<JsonRpcResponse> {
    if (this.entries.has(id)) {
      throw new Error(`Request id ${String(id)} is already pending for backend '${this.backend}'`);
    }

    return new Promise<JsonRpcResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.entries.delete(id)) {
          reject(new TimeoutError(this.backend, method, timeoutMs));
          onTimeout?.(id);
        }
      }, timeoutMs);

      this.entries.set(id, {
        method,
        timer,
        resolve,
        reject
      });
    });
  }

  settle(response: JsonRpcResponse): boolean {
    if (response.id === null) {
      return false;
    }

    const entry = this.entries.get(response.id);
    if (!entry) {
      return false;
    }

    this.entries.delete(response.id);
    clearTimeout(entry.timer);
    entry.resolve(response);
    return true;
  }

  fail(id: JsonRpcId, error: Error): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }

    this.entries.delete(id);
    clearTimeout(entry.timer);
    entry.reject(error);
    return true;
  }

  failAll(error: Error): number {
    const entries = [...this.entries.values()];
    this.entries.clear();
    for (const entry of entries) {
      clearTimeout(entry.timer);
      entry.reject(error);
    }

    return entries.length;
  }
}
