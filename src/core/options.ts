import { ConfigurationError } from "../errors.js";
import type { RoutingMode } from "../types.js";

export interface ListenAddress {
  host: string;
  port: number;
}

export function parseListenAddress(value: string, fallbackPort: number): ListenAddress {
  const trimmed = value.trim();
  const bracketed = /^\[([^\]]+)\](?::(\d*))?$/.exec(trimmed);
  let host: string;
  let portText: string | undefined;
  if (bracketed) {
    host = bracketed[1] ?? "";
    portText = bracketed[2];
  } else {
    const split = trimmed.lastIndexOf(":");
    host = split < 0 ? trimmed : trimmed.slice(0, split);
    portText = split < 0 ? undefined : trimmed.slice(split + 1);
  }

  const port = portText === undefined || portText === "" ? fallbackPort : Number(portText);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`invalid port in listen address '${value}'`, "--listen");
  }

  return { host: host || "127.0.0.1", port };
}

export function resolveMode(flags: { routed?: boolean; unified?: boolean }): RoutingMode {
  if (flags.routed && flags.unified) {
    throw new ConfigurationError("--routed and --unified are mutually exclusive", "--routed");
  }

  return flags.routed ? "routed" : "unified";
}
