import fs from "node:fs";
import path from "node:path";
import { parse as parseToml } from "@iarna/toml";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { BackendDefinition, GatewayConfig, GatewaySettings } from "../types.js";
import { NAMESPACE_SEPARATOR } from "../gateway/registry.js";

export type ConfigFormat = "json" | "toml";

const BACKEND_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,62}$/;
const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const MOUNT_PATTERN = /^[^:]+:[^:]+:(ro|rw)$/;
const CONTAINER_BASE_ENV = ["NO_COLOR=1", "TERM=dumb", "PYTHONUNBUFFERED=1"];

const DEFAULT_PORT = 3000;
const DEFAULT_STARTUP_TIMEOUT_SECONDS = 30;
const DEFAULT_TOOL_TIMEOUT_SECONDS = 30;

const stringMap = z.record(z.string(), z.string());

const backendSchema = z.object({
  type: z.enum(["stdio", "local", "http"]).default("stdio"),
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default([]),
  env: stringMap.default({}),
  cwd: z.string().min(1).optional(),
  container: z.string().min(1).optional(),
  entrypoint: z.string().min(1).optional(),
  entrypointArgs: z.array(z.string()).default([]),
  mounts: z.array(z.string()).default([]),
  url: z.string().optional(),
  headers: stringMap.default({})
});

const gatewaySchema = z.object({
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  domain: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  startupTimeout: z.number().positive().default(DEFAULT_STARTUP_TIMEOUT_SECONDS),
  toolTimeout: z.number().positive().default(DEFAULT_TOOL_TIMEOUT_SECONDS)
});

const configFileSchema = z.object({
  mcpServers: z.record(z.string(), backendSchema).optional(),
  servers: z.record(z.string(), backendSchema).optional(),
  gateway: gatewaySchema.optional()
});

type RawBackend = z.infer<typeof backendSchema>;
type Environment = Record<string, string | undefined>;

const SNAKE_CASE_KEYS: Record<string, string> = {
  api_key: "apiKey",
  startup_timeout: "startupTimeout",
  tool_timeout: "toolTimeout",
  entrypoint_args: "entrypointArgs"
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function camelizeSection(section: unknown): unknown {
  if (!isRecord(section)) {
    return section;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(section)) {
    result[SNAKE_CASE_KEYS[key] ?? key] = value;
  }

  return result;
}

// TOML files use snake_case keys for the gateway section and backend entries.
function normalizeTomlDocument(document: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = { ...document };
  if ("gateway" in document) {
    normalized.gateway = camelizeSection(document.gateway);
  }

  for (const key of ["servers", "mcpServers"]) {
    const section = document[key];
    if (!isRecord(section)) {
      continue;
    }

    const servers: Record<string, unknown> = {};
    for (const [name, entry] of Object.entries(section)) {
      servers[name] = camelizeSection(entry);
    }
    normalized[key] = servers;
  }

  return normalized;
}

export function expandVariables(value: string, jsonPath: string, env: Environment = process.env): string {
  return value.replace(VARIABLE_PATTERN, (_match, name: string) => {
    const resolved = env[name];
    if (resolved === undefined) {
      throw new ConfigurationError(
        `environment variable \${${name}} is not defined`,
        jsonPath,
        `Export ${name} before starting the gateway.`
      );
    }

    return resolved;
  });
}

function expandMap(values: Record<string, string>, jsonPath: string, env: Environment): Record<string, string> {
  const expanded: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    expanded[key] = expandVariables(value, `${jsonPath}.${key}`, env);
  }

  return expanded;
}

function validateBackendName(name: string, jsonPath = `mcpServers.${name}`): void {
  if (name.includes(NAMESPACE_SEPARATOR)) {
    throw new ConfigurationError(
      `backend name must not contain '${NAMESPACE_SEPARATOR}'`,
      jsonPath,
      "Rename the backend; the separator is reserved for unified tool names."
    );
  }

  if (!BACKEND_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(
      "backend name must start with a letter or digit and use only letters, digits, '.', '_' or '-' (max 63 chars)",
      jsonPath
    );
  }
}

function buildContainerArgs(backend: RawBackend, image: string, env: Record<string, string>, jsonPath: string): string[] {
  const args = ["run", "--rm", "-i"];
  for (const entry of CONTAINER_BASE_ENV) {
    args.push("-e", entry);
  }

  if (backend.entrypoint) {
    args.push("--entrypoint", backend.entrypoint);
  }

  backend.mounts.forEach((mount, index) => {
    if (!MOUNT_PATTERN.test(mount)) {
      throw new ConfigurationError(
        `invalid mount '${mount}'`,
        `${jsonPath}.mounts[${index}]`,
        "Use source:destination:ro or source:destination:rw."
      );
    }
    args.push("-v", mount);
  });

  for (const [key, value] of Object.entries(env)) {
    args.push("-e", value === "" ? key : `${key}=${value}`);
  }

  args.push(image, ...backend.entrypointArgs);
  return args;
}

function toBackendDefinition(name: string, backend: RawBackend, jsonPath: string, env: Environment): BackendDefinition {
  validateBackendName(name, jsonPath);

  if (backend.type === "http") {
    if (!backend.url) {
      throw new ConfigurationError("http backends require a url", `${jsonPath}.url`);
    }

    const url = expandVariables(backend.url, `${jsonPath}.url`, env);
    if (!isHttpUrl(url)) {
      throw new ConfigurationError(`invalid URL '${url}'`, `${jsonPath}.url`, "Use an http:// or https:// URL.");
    }

    return {
      name,
      kind: "http",
      url,
      headers: expandMap(backend.headers, `${jsonPath}.headers`, env)
    };
  }

  const backendEnv = expandMap(backend.env, `${jsonPath}.env`, env);
  if (backend.container && backend.command) {
    throw new ConfigurationError("set either command or container, not both", jsonPath);
  }

  if (backend.container) {
    return {
      name,
      kind: "stdio",
      command: "docker",
      args: buildContainerArgs(backend, backend.container, backendEnv, jsonPath),
      env: {}
    };
  }

  if (!backend.command) {
    throw new ConfigurationError(
      "stdio backends require a command",
      `${jsonPath}.command`,
      "Set command (and args) or container."
    );
  }

  return {
    name,
    kind: "stdio",
    command: backend.command,
    args: backend.args,
    env: backendEnv,
    cwd: backend.cwd
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

function toGatewaySettings(gateway: z.infer<typeof gatewaySchema>, env: Environment): GatewaySettings {
  return {
    port: gateway.port,
    domain: gateway.domain,
    apiKey: gateway.apiKey ? expandVariables(gateway.apiKey, "gateway.apiKey", env) : undefined,
    startupTimeoutMs: Math.round(gateway.startupTimeout * 1000),
    toolTimeoutMs: Math.round(gateway.toolTimeout * 1000)
  };
}

export function normalizeConfig(raw: unknown, env: Environment = process.env): GatewayConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const jsonPath = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : undefined;
    throw new ConfigurationError(issue?.message ?? "invalid configuration", jsonPath);
  }

  const sections: Array<[string, Record<string, RawBackend>]> = [];
  if (parsed.data.mcpServers) {
    sections.push(["mcpServers", parsed.data.mcpServers]);
  }
  if (parsed.data.servers) {
    sections.push(["servers", parsed.data.servers]);
  }

  const backends: BackendDefinition[] = [];
  const seen = new Set<string>();
  for (const [sectionName, section] of sections) {
    for (const [name, backend] of Object.entries(section)) {
      const jsonPath = `${sectionName}.${name}`;
      if (seen.has(name)) {
        throw new ConfigurationError(`backend '${name}' is declared more than once`, jsonPath);
      }
      seen.add(name);
      backends.push(toBackendDefinition(name, backend, jsonPath, env));
    }
  }

  if (backends.length === 0) {
    throw new ConfigurationError(
      "no backends configured",
      "mcpServers",
      "Declare at least one backend under mcpServers (JSON) or [servers.<name>] (TOML)."
    );
  }

  return {
    backends,
    gateway: toGatewaySettings(parsed.data.gateway ?? gatewaySchema.parse({}), env)
  };
}

export function parseConfigText(text: string, format: ConfigFormat, env: Environment = process.env): GatewayConfig {
  let document: unknown;
  try {
    document = format === "toml" ? normalizeTomlDocument(parseToml(text)) : JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`unable to parse ${format.toUpperCase()} configuration: ${reason}`);
  }

  return normalizeConfig(document, env);
}

export function formatForPath(configPath: string): ConfigFormat {
  return path.extname(configPath).toLowerCase() === ".toml" ? "toml" : "json";
}

export function loadConfigFile(configPath: string, env: Environment = process.env): GatewayConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`unable to read configuration file ${configPath}: ${reason}`);
  }

  return parseConfigText(text, formatForPath(configPath), env);
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }

  return Buffer.concat(chunks).toString("utf8");
}

export async function loadConfigFromStream(stream: NodeJS.ReadableStream, env: Environment = process.env): Promise<GatewayConfig> {
  const text = await readStream(stream);
  if (text.trim().length === 0) {
    throw new ConfigurationError("no configuration received on stdin");
  }

  return parseConfigText(text, "json", env);
}
