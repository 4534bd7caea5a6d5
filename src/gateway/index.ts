import type http from "node:http";
import { once } from "node:events";
import type { TransportFactory } from "../backend/connection.js";
import { BackendManager, createTransport, type StartupSummary } from "../backend/manager.js";
import { getLogger } from "../core/logger.js";
import { maskSecret } from "../core/sanitize.js";
import type { GatewayConfig, RoutingMode } from "../types.js";
import { APP_NAME, APP_VERSION } from "../version.js";
import { buildSelfDescription, emitSelfDescription } from "./config-emitter.js";
import { CapabilityRegistry } from "./registry.js";
import { Router } from "./router.js";
import { createGatewayServer } from "./server.js";

export interface StartGatewayOptions {
  config: GatewayConfig;
  mode: RoutingMode;
  host: string;
  port: number;
  /** Receives the self-description document; defaults to stdout. */
  output?: NodeJS.WritableStream;
  transportFactory?: TransportFactory;
  onClose?: (serversTerminated: number) => void;
}

export interface RunningGateway {
  server: http.Server;
  manager: BackendManager;
  registry: CapabilityRegistry;
  port: number;
  startup: StartupSummary;
  stop(): Promise<void>;
}

const log = getLogger("startup");

export async function startGateway(options: StartGatewayOptions): Promise<RunningGateway> {
  const { config, mode } = options;
  log.info(`Starting ${APP_NAME} ${APP_VERSION}`);
  log.info(`Mode: ${mode}, backends: ${config.backends.map((backend) => backend.name).join(", ")}, API key: ${maskSecret(config.gateway.apiKey)}`);

  const registry = new CapabilityRegistry();
  const manager = new BackendManager(config.backends, config.gateway, registry, options.transportFactory ?? createTransport);
  const router = new Router(manager, registry, mode);

  const startup = await manager.startAll();

  const server = createGatewayServer({
    port: options.port,
    host: options.host,
    apiKey: config.gateway.apiKey,
    manager,
    registry,
    router,
    onClose: options.onClose
  });
  await once(server, "listening");

  const address = server.address();
  const port = address && typeof address !== "string" ? address.port : options.port;
  log.info(`Listening on http://${options.host}:${port} (${mode} mode)`);

  emitSelfDescription(
    buildSelfDescription({
      mode,
      host: options.host,
      port,
      domain: config.gateway.domain,
      apiKey: config.gateway.apiKey,
      backends: manager.names
    }),
    options.output
  );

  return {
    server,
    manager,
    registry,
    port,
    startup,
    async stop() {
      await manager.closeAll();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
    }
  };
}

export { buildSelfDescription, emitSelfDescription } from "./config-emitter.js";
export { CapabilityRegistry, NAMESPACE_SEPARATOR } from "./registry.js";
export { createGatewayServer } from "./server.js";
