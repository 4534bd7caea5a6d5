import type { JsonRpcMessage } from "../types.js";
import { getLogger, writeRpcRecord } from "./logger.js";
import { sanitizeText, sanitizeValue } from "./sanitize.js";

export type RpcDirection = "IN" | "OUT";

export type RpcMessageType = "REQUEST" | "RESPONSE" | "NOTIFICATION";

export interface RpcRecord {
  timestamp: string;
  direction: RpcDirection;
  type: RpcMessageType;
  server_id: string;
  method?: string;
  error?: string;
  payload: unknown;
}

export const MAX_PREVIEW_BYTES = 10 * 1024;

const log = getLogger("rpc");

function messageType(message: JsonRpcMessage): RpcMessageType {
  if (!("method" in message)) {
    return "RESPONSE";
  }

  return "id" in message ? "REQUEST" : "NOTIFICATION";
}

function truncate(text: string): string {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.length <= MAX_PREVIEW_BYTES) {
    return text;
  }

  return `${bytes.subarray(0, MAX_PREVIEW_BYTES).toString("utf8")}... [truncated]`;
}

/**
 * Records one message exchanged with a backend: a debug line in the main log and a
 * record in the RPC message file. Payloads are sanitized before either is written.
 */
export function logRpcMessage(direction: RpcDirection, backend: string, message: JsonRpcMessage): void {
  const type = messageType(message);
  const method = "method" in message ? message.method : undefined;
  const rawError = "error" in message ? message.error?.message : undefined;
  const error = rawError === undefined ? undefined : sanitizeText(rawError);
  const payload = sanitizeValue(message);
  const size = Buffer.byteLength(JSON.stringify(message), "utf8");

  const arrow = direction === "OUT" ? "→" : "←";
  const errorPart = error ? ` [err: ${error}]` : "";
  log.debug(`${backend}${arrow}${method ?? "resp"} ${size}b${errorPart} ${truncate(JSON.stringify(payload))}`);

  const record: RpcRecord = {
    timestamp: new Date().toISOString(),
    direction,
    type,
    server_id: backend,
    payload
  };
  if (method) {
    record.method = method;
  }
  if (error) {
    record.error = error;
  }
  writeRpcRecord(record);
}
