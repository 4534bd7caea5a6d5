import { getLogger } from "../core/logger.js";
import type { CapabilityRegistry } from "../gateway/registry.js";
import type { BackendDefinition, GatewaySettings } from "../types.js";
import { BackendConnection, type BackendState, type TransportFactory } from "./connection.js";
import { HttpBackendTransport } from "./http-transport.js";
import { StdioBackendTransport } from "./stdio-transport.js";
import type { BackendTransport } from "./transport.js";

const log = getLogger("backend");

export function createTransport(definition: BackendDefinition): BackendTransport {
  return definition.kind === "http"
    ? new HttpBackendTransport(definition)
    : new StdioBackendTransport(definition);
}

export interface StartupSummary {
  ready: string[];
  failed: string[];
}

export class BackendManager {
  private readonly connections = new Map<string, BackendConnection>();

  constructor(
    definitions: BackendDefinition[],
    settings: Pick<GatewaySettings, "startupTimeoutMs" | "toolTimeoutMs">,
    registry: CapabilityRegistry,
    transportFactory: TransportFactory = createTransport
  ) {
    for (const definition of definitions) {
      const connection = new BackendConnection(definition, transportFactory, {
        startupTimeoutMs: settings.startupTimeoutMs,
        toolTimeoutMs: settings.toolTimeoutMs,
        onReady: (ready, capabilities) => {
          registry.register(ready.name, capabilities);
        }
      });
      this.connections.set(definition.name, connection);
    }
  }

  get names(): string[] {
    return [...this.connections.keys()];
  }

  get(name: string): BackendConnection | undefined {
    return this.connections.get(name);
  }

  list(): BackendConnection[] {
    return [...this.connections.values()];
  }

  /** Starts every backend concurrently; resolves once each has reached ready or failed. */
  async startAll(): Promise<StartupSummary> {
    const outcomes = await Promise.all(
      this.list().map(async (connection): Promise<[string, BackendState]> => [connection.name, await connection.connect()])
    );

    const summary: StartupSummary = { ready: [], failed: [] };
    for (const [name, state] of outcomes) {
      if (state === "ready") {
        summary.ready.push(name);
      } else {
        summary.failed.push(name);
      }
    }

    log.info(`Startup complete: ${summary.ready.length} ready, ${summary.failed.length} failed`);
    return summary;
  }

  /** Terminates every backend transport; returns how many were still live. */
  async closeAll(): Promise<number> {
    const results = await Promise.all(this.list().map((connection) => connection.close()));
    return results.filter(Boolean).length;
  }
}
