import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { StdioBackendDefinition } from "../src/types.js";

export interface StartedServer {
  server: http.Server;
  port: number;
}

export interface TempDirContext {
  root: string;
  restore: () => void;
}

export const MOCK_STDIO_SERVER = fileURLToPath(new URL("./fixtures/mock-stdio-server.mjs", import.meta.url));

export function setupTempDir(prefix: string): TempDirContext {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    root,
    restore: () => fs.rmSync(root, { recursive: true, force: true })
  };
}

export function stdioBackend(name: string, env: Record<string, string> = {}): StdioBackendDefinition {
  return {
    name,
    kind: "stdio",
    command: process.execPath,
    args: [MOCK_STDIO_SERVER],
    env: { MOCK_SERVER_NAME: name, ...env }
  };
}

export async function startServer(handler: http.RequestListener): Promise<StartedServer> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(handler);
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Failed to resolve bound port."));
        return;
      }

      resolve({ server, port: address.port });
    });
  });
}

export async function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

export async function readJsonBody(request: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(Buffer.from(chunk));
  }

  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
}

export interface RpcEnvelope {
  jsonrpc: string;
  id: string | number | null;
  method?: string;
  params?: Record<string, unknown>;
  result?: Record<string, unknown>;
  error?: { code: number; message: string; data?: unknown };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Loosely reads a JSON-RPC envelope from a parsed body for assertions. */
export function toEnvelope(value: unknown): RpcEnvelope {
  if (!isRecord(value)) {
    throw new Error(`Expected a JSON-RPC object, got ${JSON.stringify(value)}`);
  }

  const id = value.id;
  return {
    jsonrpc: String(value.jsonrpc),
    id: typeof id === "string" || typeof id === "number" ? id : null,
    method: typeof value.method === "string" ? value.method : undefined,
    params: isRecord(value.params) ? value.params : undefined,
    result: isRecord(value.result) ? value.result : undefined,
    error: isRecord(value.error) && typeof value.error.code === "number" && typeof value.error.message === "string"
      ? { code: value.error.code, message: value.error.message, data: value.error.data }
      : undefined
  };
}

export function sseEvent(payload: unknown): string {
  return `event: message\ndata: ${JSON.stringify(payload)}\n\n`;
}
