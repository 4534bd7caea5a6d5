import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_LOG_DIR,
  LOG_DIR_ENV,
  LOG_FILE_NAME,
  closeLogger,
  getLogger,
  RPC_LOG_FILE_NAME,
  initLogger,
  resolveLogDir
} from "../src/core/logger.js";
import { setupTempDir } from "./helpers.js";

function readLog(file: string): string {
  return fs.existsSync(file) ? fs.readFileSync(file, "utf8") : "";
}

describe("logger", () => {
  const cleanups: Array<() => void | Promise<void>> = [];

  afterEach(async () => {
    while (cleanups.length > 0) {
      await cleanups.pop()?.();
    }
  });

  function tempLogDir(): string {
    const dir = setupTempDir("gateway-logs-");
    cleanups.push(dir.restore);
    cleanups.push(() => closeLogger());
    return path.join(dir.root, "nested", "logs");
  }

  it("creates a world-readable log file and writes categorized lines", async () => {
    const logDir = tempLogDir();
    const setup = initLogger({ logDir, stderr: false });
    const logFile = path.join(logDir, LOG_FILE_NAME);

    expect(setup).toEqual({ logFile, fallbackReason: undefined });
    expect(fs.statSync(logFile).mode & 0o777).toBe(0o644);

    getLogger("startup").info("Starting gateway for tests");
    getLogger("auth").warn("Rejected POST /mcp");
    await closeLogger();

    await vi.waitFor(() => {
      const lines = readLog(logFile).trim().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[startup\] Starting gateway for tests$/);
      expect(lines[1]).toMatch(/\[WARN\] \[auth\] Rejected POST \/mcp$/);
    });
  });

  it("appends to an existing log file", async () => {
    const logDir = tempLogDir();
    const logFile = path.join(logDir, LOG_FILE_NAME);

    initLogger({ logDir, stderr: false });
    getLogger("startup").info("first run");
    await closeLogger();
    await vi.waitFor(() => expect(readLog(logFile)).toContain("first run"));
    const firstSize = fs.statSync(logFile).size;

    initLogger({ logDir, stderr: false });
    getLogger("startup").info("second run");
    await closeLogger();

    await vi.waitFor(() => {
      const contents = readLog(logFile);
      expect(contents).toContain("first run");
      expect(contents).toContain("second run");
    });
    expect(fs.statSync(logFile).size).toBeGreaterThan(firstSize);
  });

  it("falls back to stderr when the directory cannot be created", () => {
    const dir = setupTempDir("gateway-logs-");
    cleanups.push(dir.restore);
    cleanups.push(() => closeLogger());
    const blocker = path.join(dir.root, "occupied");
    fs.writeFileSync(blocker, "not a directory");

    const setup = initLogger({ logDir: path.join(blocker, "logs"), stderr: false });
    expect(setup.logFile).toBeNull();
    expect(setup.fallbackReason).toMatch(/EEXIST|ENOTDIR/);
  });

  it("prefers the flag, then the environment, then the default directory", () => {
    const previous = process.env[LOG_DIR_ENV];
    cleanups.push(() => {
      if (previous === undefined) {
        delete process.env[LOG_DIR_ENV];
      } else {
        process.env[LOG_DIR_ENV] = previous;
      }
    });

    process.env[LOG_DIR_ENV] = "/var/log/gateway";
    expect(resolveLogDir("/srv/logs")).toBe("/srv/logs");
    expect(resolveLogDir()).toBe("/var/log/gateway");

    delete process.env[LOG_DIR_ENV];
    expect(resolveLogDir("  ")).toBe(DEFAULT_LOG_DIR);
  });

  it("redacts secret-looking text in every line", async () => {
    const logDir = tempLogDir();
    const logFile = path.join(logDir, LOG_FILE_NAME);
    initLogger({ logDir, stderr: false });

    getLogger("backend").warn("Backend answered 401 for Authorization: Bearer test-token-value");
    getLogger("config").info("Loaded password=test-password-value");
    await closeLogger();

    await vi.waitFor(() => {
      const lines = readLog(logFile).trim().split("\n");
      expect(lines[0]).toMatch(/\[WARN\] \[backend\] Backend answered 401 for Authorization: Bearer \[REDACTED\]$/);
      expect(lines[1]).toMatch(/\[INFO\] \[config\] Loaded password=\[REDACTED\]$/);
    });
  });

  it("creates the RPC message file beside the main log", async () => {
    const logDir = tempLogDir();
    initLogger({ logDir, stderr: false });
    await closeLogger();

    const rpcFile = path.join(logDir, RPC_LOG_FILE_NAME);
    expect(fs.statSync(rpcFile).mode & 0o777).toBe(0o644);
    expect(readLog(rpcFile)).toBe("");
  });
});
