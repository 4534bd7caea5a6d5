import type { RoutingMode } from "../types.js";

export interface SelfDescribedBackend {
  type: "http";
  url: string;
  headers?: { Authorization: string };
}

export interface SelfDescription {
  mcpServers: Record<string, SelfDescribedBackend>;
}

export interface SelfDescriptionOptions {
  mode: RoutingMode;
  host: string;
  port: number;
  domain?: string;
  apiKey?: string;
  backends: string[];
}

const WILDCARD_HOSTS = new Set(["0.0.0.0", "::", "[::]", ""]);

export function advertisedHost(host: string, domain?: string): string {
  if (domain) {
    return domain;
  }

  if (WILDCARD_HOSTS.has(host)) {
    return "localhost";
  }

  return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
}

/**
 * Describes this gateway as a set of HTTP backends, one per configured name, so a
 * supervisor can chain it like any other server. The Authorization value is the raw
 * API key; there is no scheme prefix.
 */
export function buildSelfDescription(options: SelfDescriptionOptions): SelfDescription {
  const base = `http://${advertisedHost(options.host, options.domain)}:${options.port}/mcp`;
  const mcpServers: Record<string, SelfDescribedBackend> = {};
  for (const name of options.backends) {
    const entry: SelfDescribedBackend = {
      type: "http",
      url: options.mode === "routed" ? `${base}/${encodeURIComponent(name)}` : base
    };
    if (options.apiKey) {
      entry.headers = { Authorization: options.apiKey };
    }
    mcpServers[name] = entry;
  }

  return { mcpServers };
}

export function emitSelfDescription(description: SelfDescription, stream: NodeJS.WritableStream = process.stdout): void {
  stream.write(`${JSON.stringify(description, null, 2)}\n`);
}
