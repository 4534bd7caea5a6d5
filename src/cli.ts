#!/usr/bin/env node
import { Command } from "commander";
import { loadConfigFile, loadConfigFromStream } from "./core/config.js";
import { closeLogger, getLogger, initLogger, resolveLogDir } from "./core/logger.js";
import { parseListenAddress, resolveMode } from "./core/options.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { startGateway, type RunningGateway } from "./gateway/index.js";
import type { GatewayConfig } from "./types.js";
import { APP_NAME, APP_VERSION } from "./version.js";

interface CliOptions {
  config?: string;
  configStdin?: boolean;
  listen?: string;
  routed?: boolean;
  unified?: boolean;
  logDir?: string;
}

const EXIT_DELAY_MS = 100;

const log = getLogger("shutdown");

async function readConfig(options: CliOptions): Promise<GatewayConfig> {
  if (options.config && options.configStdin) {
    throw new ConfigurationError("use either --config or --config-stdin, not both", "--config");
  }

  if (options.config) {
    return loadConfigFile(options.config);
  }

  if (options.configStdin) {
    return loadConfigFromStream(process.stdin);
  }

  throw new ConfigurationError("no configuration given", "--config", "Pass --config <path> or --config-stdin.");
}

function exitAfter(work: Promise<void>): void {
  void work.then(
    () => closeLogger().then(() => process.exit(0)),
    (error: unknown) => {
      log.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  );
}

function installSignalHandlers(gateway: RunningGateway): void {
  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info(`Received ${signal}, shutting down`);
    exitAfter(gateway.stop());
  };

  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

async function runGateway(options: CliOptions): Promise<void> {
  const setup = initLogger({ logDir: resolveLogDir(options.logDir) });
  const mode = resolveMode(options);
  const config = await readConfig(options);
  const listen = parseListenAddress(options.listen ?? `127.0.0.1:${config.gateway.port}`, config.gateway.port);
  if (setup.logFile) {
    getLogger("startup").info(`Logging to ${setup.logFile}`);
  }

  const gateway: RunningGateway = await startGateway({
    config,
    mode,
    host: listen.host,
    port: listen.port,
    onClose: () => {
      setTimeout(() => exitAfter(gateway.stop()), EXIT_DELAY_MS);
    }
  });
  installSignalHandlers(gateway);
}

async function runCli(): Promise<void> {
  const program = new Command();

  program
    .name(APP_NAME)
    .description("Expose stdio and HTTP MCP servers behind one authenticated HTTP endpoint")
    .version(APP_VERSION)
    .option("-c, --config <path>", "configuration file (.toml or .json)")
    .option("--config-stdin", "read JSON configuration from stdin")
    .option("-l, --listen <address>", "listen address as host:port (default 127.0.0.1:<gateway.port>)")
    .option("--routed", "expose each backend at /mcp/<name>")
    .option("--unified", "expose all backends at /mcp with <backend>___<name> names (default)")
    .option("--log-dir <dir>", "directory for mcp-gateway.log (env MCP_GATEWAY_LOG_DIR)")
    .action(async (options: CliOptions) => {
      await runGateway(options);
    });

  await program.parseAsync(process.argv);
}

void runCli().catch((error: unknown) => {
  const message = errorMessage(error);
  const suggestion = error instanceof ConfigurationError && error.suggestion ? `\n${error.suggestion}` : "";
  const prefix = error instanceof ConfigurationError ? "Configuration error: " : "";
  process.stderr.write(`${prefix}${message}${suggestion}\n`);
  process.exit(1);
});
