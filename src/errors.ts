import type { JsonRpcErrorObject } from "./types.js";

export class GatewayError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends GatewayError {
  readonly path?: string;
  readonly suggestion?: string;

  constructor(message: string, path?: string, suggestion?: string) {
    super("configuration_error", path ? `${path}: ${message}` : message);
    this.path = path;
    this.suggestion = suggestion;
  }
}

export class BackendConnectError extends GatewayError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super("backend_connect_error", message, options);
    this.backend = backend;
  }
}

export type AuthenticationFailure = "missing" | "invalid" | "query_token";

export class AuthenticationError extends GatewayError {
  readonly reason: AuthenticationFailure;

  constructor(reason: AuthenticationFailure) {
    super("authentication_error", authenticationMessage(reason));
    this.reason = reason;
  }
}

function authenticationMessage(reason: AuthenticationFailure): string {
  switch (reason) {
    case "missing":
      return "Unauthorized: missing Authorization header";
    case "invalid":
      return "Unauthorized: invalid API key";
    case "query_token":
      return "Credentials must be sent in the Authorization header, not the query string";
  }
}

export type RoutingFailure = "unknown_backend" | "unknown_capability" | "unknown_method";

export class RoutingError extends GatewayError {
  readonly reason: RoutingFailure;

  constructor(reason: RoutingFailure, message: string) {
    super("routing_error", message);
    this.reason = reason;
  }
}

export interface UpstreamFailure {
  status?: number;
  body?: string;
  rpcError?: JsonRpcErrorObject;
}

export class UpstreamError extends GatewayError {
  readonly backend: string;
  readonly status?: number;
  readonly body?: string;
  readonly rpcError?: JsonRpcErrorObject;

  constructor(backend: string, failure: UpstreamFailure) {
    super("upstream_error", describeUpstreamFailure(backend, failure));
    this.backend = backend;
    this.status = failure.status;
    this.body = failure.body;
    this.rpcError = failure.rpcError;
  }
}

function describeUpstreamFailure(backend: string, failure: UpstreamFailure): string {
  if (failure.rpcError) {
    return `Backend '${backend}' returned error ${failure.rpcError.code}: ${failure.rpcError.message}`;
  }

  const body = failure.body ? `: ${failure.body.slice(0, 400)}` : "";
  return `Backend '${backend}' returned HTTP ${failure.status ?? "error"}${body}`;
}

export class TransportError extends GatewayError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super("transport_error", message, options);
    this.backend = backend;
  }
}

export class TimeoutError extends GatewayError {
  readonly backend: string;
  readonly timeoutMs: number;

  constructor(backend: string, method: string, timeoutMs: number) {
    super("timeout", `Request '${method}' to backend '${backend}' timed out after ${timeoutMs}ms`);
    this.backend = backend;
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
