import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import { sanitizeText } from "./sanitize.js";

export type LogCategory = "startup" | "config" | "backend" | "client" | "auth" | "rpc" | "shutdown";

export const LOG_FILE_NAME = "mcp-gateway.log";
export const RPC_LOG_FILE_NAME = "rpc-messages.jsonl";
export const LOG_DIR_ENV = "MCP_GATEWAY_LOG_DIR";
export const DEFAULT_LOG_DIR = "/tmp/mcp-gateway/logs";

const ALL_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

type LogTransport = winston.Logger["transports"][number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  logDir?: string;
  level?: string;
  stderr?: boolean;
}

export interface LoggerSetup {
  logFile: string | null;
  fallbackReason?: string;
}

const redact = winston.format((info) => {
  if (typeof info.message === "string") {
    info.message = sanitizeText(info.message);
  }
  return info;
});

const lineFormat = winston.format.printf((info) => {
  const category = typeof info.category === "string" ? info.category : "gateway";
  return `[${String(info.timestamp)}] [${info.level.toUpperCase()}] [${category}] ${String(info.message)}`;
});

function createRootLogger(transports: LogTransport[], level: string): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(redact(), winston.format.timestamp(), lineFormat),
    transports
  });
}

function stderrTransport(): LogTransport {
  return new winston.transports.Console({ stderrLevels: ALL_LEVELS });
}

function defaultLevel(): string {
  return process.env.MCP_GATEWAY_LOG_LEVEL ?? "info";
}

let root = createRootLogger([stderrTransport()], defaultLevel());
let rpcRecords: winston.Logger | null = null;

export function resolveLogDir(flagValue?: string): string {
  const fromFlag = flagValue?.trim();
  if (fromFlag) {
    return fromFlag;
  }

  return process.env[LOG_DIR_ENV]?.trim() || DEFAULT_LOG_DIR;
}

// The file is created up front so its mode is 0644 regardless of the process umask.
function prepareLogFile(logDir: string, fileName: string): string {
  fs.mkdirSync(logDir, { recursive: true });
  const logFile = path.join(logDir, fileName);
  fs.closeSync(fs.openSync(logFile, "a", 0o644));
  fs.chmodSync(logFile, 0o644);
  return logFile;
}

function fileTransport(filename: string): LogTransport {
  return new winston.transports.File({
    filename,
    options: { flags: "a", mode: 0o644 }
  });
}

// One pre-serialized JSON document per line; the message is written as is.
function createRecordLogger(filename: string): winston.Logger {
  return winston.createLogger({
    level: "info",
    format: winston.format.printf((info) => String(info.message)),
    transports: [fileTransport(filename)]
  });
}

export function initLogger(options: LoggerOptions = {}): LoggerSetup {
  const transports: LogTransport[] = [];
  if (options.stderr !== false) {
    transports.push(stderrTransport());
  }

  let logFile: string | null = null;
  let rpcFile: string | null = null;
  let fallbackReason: string | undefined;
  if (options.logDir) {
    try {
      logFile = prepareLogFile(options.logDir, LOG_FILE_NAME);
      rpcFile = prepareLogFile(options.logDir, RPC_LOG_FILE_NAME);
      transports.push(fileTransport(logFile));
    } catch (error) {
      fallbackReason = error instanceof Error ? error.message : String(error);
      logFile = null;
      rpcFile = null;
      if (options.stderr === false) {
        transports.push(stderrTransport());
      }
    }
  }

  const previous = root;
  root = createRootLogger(transports, options.level ?? defaultLevel());
  previous.close();
  rpcRecords?.close();
  rpcRecords = rpcFile ? createRecordLogger(rpcFile) : null;

  if (fallbackReason) {
    getLogger("startup").warn(`Unable to open log file in ${options.logDir ?? ""}, logging to stderr only: ${fallbackReason}`);
  }

  return { logFile, fallbackReason };
}

function drain(logger: winston.Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.on("finish", () => resolve());
    logger.end();
  });
}

export async function closeLogger(): Promise<void> {
  const current = root;
  const records = rpcRecords;
  root = createRootLogger([stderrTransport()], defaultLevel());
  rpcRecords = null;
  await Promise.all([drain(current), records ? drain(records) : Promise.resolve()]);
}

/** Appends one JSON document to the RPC message file. A no-op without a log directory. */
export function writeRpcRecord(record: object): void {
  rpcRecords?.info(JSON.stringify(record));
}

export function getLogger(category: LogCategory): Logger {
  return {
    debug: (message) => root.debug(message, { category }),
    info: (message) => root.info(message, { category }),
    warn: (message) => root.warn(message, { category }),
    error: (message) => root.error(message, { category })
  };
}
