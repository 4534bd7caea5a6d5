export type RoutingMode = "routed" | "unified";

export type TransportKind = "stdio" | "http";

export interface StdioBackendDefinition {
  name: string;
  kind: "stdio";
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
}

export interface HttpBackendDefinition {
  name: string;
  kind: "http";
  url: string;
  headers: Record<string, string>;
}

export type BackendDefinition = StdioBackendDefinition | HttpBackendDefinition;

export interface GatewaySettings {
  port: number;
  domain?: string;
  apiKey?: string;
  startupTimeoutMs: number;
  toolTimeoutMs: number;
}

export interface GatewayConfig {
  backends: BackendDefinition[];
  gateway: GatewaySettings;
}

export type JsonRpcId = string | number;

/** By-name or by-position parameters. */
export type JsonRpcParams = Record<string, unknown> | unknown[];

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: JsonRpcParams;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: JsonRpcParams;
}

export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export type ClassifiedMessage =
  | { kind: "request"; message: JsonRpcRequest }
  | { kind: "notification"; message: JsonRpcNotification }
  | { kind: "response"; message: JsonRpcResponse };

export interface OutboundRequest {
  method: string;
  params?: JsonRpcParams;
}
