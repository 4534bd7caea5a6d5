import type http from "node:http";
import { encodeSseMessage } from "../backend/sse.js";
import type { JsonRpcMessage, JsonRpcResponse } from "../types.js";

export function acceptsEventStream(request: http.IncomingMessage): boolean {
  return (request.headers.accept ?? "").includes("text/event-stream");
}

/**
 * Writes the gateway's answer to one inbound POST. In event-stream mode the stream is
 * opened on the first relayed message, so backend notifications reach the client
 * before the final response; otherwise responses are collected into one JSON body.
 */
export class ResponseSink {
  private streamOpen = false;
  private finished = false;

  constructor(
    private readonly response: http.ServerResponse,
    private readonly streaming: boolean,
    private readonly headers: Record<string, string> = {}
  ) {}

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  relay(message: JsonRpcMessage): void {
    if (!this.streaming || this.finished || this.response.destroyed) {
      return;
    }

    this.openStream();
    this.response.write(encodeSseMessage(message));
  }

  finish(responses: JsonRpcResponse[], batch: boolean): void {
    if (this.finished) {
      return;
    }
    this.finished = true;

    if (this.response.destroyed) {
      return;
    }

    if (this.streaming && (this.streamOpen || responses.length > 0)) {
      this.openStream();
      for (const payload of responses) {
        this.response.write(encodeSseMessage(payload));
      }
      this.response.end();
      return;
    }

    this.applyHeaders();
    if (responses.length === 0) {
      this.response.statusCode = 202;
      this.response.end();
      return;
    }

    this.response.statusCode = 200;
    this.response.setHeader("content-type", "application/json");
    this.response.end(JSON.stringify(batch ? responses : responses[0]));
  }

  private openStream(): void {
    if (this.streamOpen) {
      return;
    }

    this.streamOpen = true;
    this.applyHeaders();
    this.response.statusCode = 200;
    this.response.setHeader("content-type", "text/event-stream");
    this.response.setHeader("cache-control", "no-cache");
    this.response.setHeader("connection", "keep-alive");
    this.response.flushHeaders();
  }

  private applyHeaders(): void {
    for (const [name, value] of Object.entries(this.headers)) {
      this.response.setHeader(name, value);
    }
  }
}
