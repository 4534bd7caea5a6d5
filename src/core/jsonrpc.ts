import { z } from "zod";
import type {
  ClassifiedMessage,
  JsonRpcErrorObject,
  JsonRpcId,
  JsonRpcResponse
} from "../types.js";

export const JSON_RPC_VERSION = "2.0";

export const ErrorCodes = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
  upstreamError: -32000,
  unauthorized: -32001
} as const;

const idSchema = z.union([z.string(), z.number()]);
const paramsSchema = z.union([z.record(z.string(), z.unknown()), z.array(z.unknown())]);

const requestSchema = z.object({
  jsonrpc: z.literal(JSON_RPC_VERSION),
  id: idSchema,
  method: z.string().min(1),
  params: paramsSchema.optional()
});

const notificationSchema = z.object({
  jsonrpc: z.literal(JSON_RPC_VERSION),
  method: z.string().min(1),
  params: paramsSchema.optional()
});

const errorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional()
});

const responseSchema = z.object({
  jsonrpc: z.literal(JSON_RPC_VERSION),
  id: idSchema.nullable(),
  result: z.unknown().optional(),
  error: errorObjectSchema.optional()
});

function hasKey(value: unknown, key: string): boolean {
  return typeof value === "object" && value !== null && key in value;
}

export function classifyMessage(value: unknown): ClassifiedMessage | null {
  const request = requestSchema.safeParse(value);
  if (request.success) {
    return { kind: "request", message: request.data };
  }

  if (!hasKey(value, "id")) {
    const notification = notificationSchema.safeParse(value);
    return notification.success ? { kind: "notification", message: notification.data } : null;
  }

  const response = responseSchema.safeParse(value);
  if (response.success && (hasKey(value, "result") || response.data.error)) {
    return { kind: "response", message: response.data };
  }

  return null;
}

export function parseJsonRpcText(text: string): ClassifiedMessage | null {
  try {
    return classifyMessage(JSON.parse(text));
  } catch {
    return null;
  }
}

export function makeError(id: JsonRpcId | null, code: number, message: string, data?: unknown): JsonRpcResponse {
  const error: JsonRpcErrorObject = { code, message };
  if (data !== undefined) {
    error.data = data;
  }

  return {
    jsonrpc: JSON_RPC_VERSION,
    id,
    error
  };
}

export function makeResult(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: JSON_RPC_VERSION,
    id,
    result
  };
}

export function withClientId(response: JsonRpcResponse, id: JsonRpcId | null): JsonRpcResponse {
  return { ...response, id };
}
