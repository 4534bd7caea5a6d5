import { getLogger } from "../core/logger.js";

export const NAMESPACE_SEPARATOR = "___";

const DEFAULT_INPUT_SCHEMA = Object.freeze({ type: "object", properties: Object.freeze({}) });

export type CapabilityKind = "tool" | "resource" | "prompt";

export interface CapabilityDescriptor {
  kind: CapabilityKind;
  backend: string;
  /** Bare name (tools, prompts) or URI (resources) as the backend declared it. */
  key: string;
  /** `<backend>___<key>`, the name unified-mode callers use. */
  namespacedKey: string;
  description?: string;
  inputSchema?: unknown;
  /** Descriptor as the backend returned it, served in routed mode. */
  routed: Readonly<Record<string, unknown>>;
  /** Descriptor with the namespaced key, served in unified mode. */
  unified: Readonly<Record<string, unknown>>;
}

export interface RegistrySnapshot {
  readonly tools: ReadonlyMap<string, CapabilityDescriptor>;
  readonly resources: ReadonlyMap<string, CapabilityDescriptor>;
  readonly prompts: ReadonlyMap<string, CapabilityDescriptor>;
}

export interface DiscoveredCapabilities {
  tools: unknown[];
  resources: unknown[];
  prompts: unknown[];
}

const log = getLogger("backend");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function namespaceKey(backend: string, key: string): string {
  return `${backend}${NAMESPACE_SEPARATOR}${key}`;
}

export function splitNamespacedKey(value: string): { backend: string; key: string } | null {
  const split = value.indexOf(NAMESPACE_SEPARATOR);
  if (split <= 0 || split + NAMESPACE_SEPARATOR.length >= value.length) {
    return null;
  }

  return {
    backend: value.slice(0, split),
    key: value.slice(split + NAMESPACE_SEPARATOR.length)
  };
}

function emptySnapshot(): RegistrySnapshot {
  return Object.freeze({
    tools: new Map<string, CapabilityDescriptor>(),
    resources: new Map<string, CapabilityDescriptor>(),
    prompts: new Map<string, CapabilityDescriptor>()
  });
}

function describeTool(backend: string, raw: unknown, index: number): CapabilityDescriptor | null {
  if (!isRecord(raw) || typeof raw.name !== "string" || raw.name.length === 0) {
    log.warn(`Skipping tool #${index} from ${backend}: descriptor has no name`);
    return null;
  }

  const name = raw.name;
  let inputSchema: unknown = raw.inputSchema;
  if (inputSchema === undefined) {
    log.warn(`Tool ${name} from ${backend} has no inputSchema, using an empty object schema`);
    inputSchema = DEFAULT_INPUT_SCHEMA;
  } else if (!isRecord(inputSchema) && typeof inputSchema !== "boolean") {
    log.warn(`Skipping tool ${name} from ${backend}: inputSchema is not a JSON Schema object`);
    return null;
  }

  const description = typeof raw.description === "string" ? raw.description : undefined;
  const namespacedKey = namespaceKey(backend, name);
  return {
    kind: "tool",
    backend,
    key: name,
    namespacedKey,
    description,
    inputSchema,
    routed: Object.freeze({ ...raw, inputSchema }),
    unified: Object.freeze({
      ...raw,
      name: namespacedKey,
      description: description ? `[${backend}] ${description}` : `[${backend}]`,
      inputSchema
    })
  };
}

function describeResource(backend: string, raw: unknown, index: number): CapabilityDescriptor | null {
  if (!isRecord(raw) || typeof raw.uri !== "string" || raw.uri.length === 0) {
    log.warn(`Skipping resource #${index} from ${backend}: descriptor has no uri`);
    return null;
  }

  const namespacedKey = namespaceKey(backend, raw.uri);
  return {
    kind: "resource",
    backend,
    key: raw.uri,
    namespacedKey,
    description: typeof raw.description === "string" ? raw.description : undefined,
    routed: Object.freeze({ ...raw }),
    unified: Object.freeze({ ...raw, uri: namespacedKey })
  };
}

function describePrompt(backend: string, raw: unknown, index: number): CapabilityDescriptor | null {
  if (!isRecord(raw) || typeof raw.name !== "string" || raw.name.length === 0) {
    log.warn(`Skipping prompt #${index} from ${backend}: descriptor has no name`);
    return null;
  }

  const namespacedKey = namespaceKey(backend, raw.name);
  return {
    kind: "prompt",
    backend,
    key: raw.name,
    namespacedKey,
    description: typeof raw.description === "string" ? raw.description : undefined,
    routed: Object.freeze({ ...raw }),
    unified: Object.freeze({ ...raw, name: namespacedKey })
  };
}

function collect(
  backend: string,
  items: unknown[],
  describe: (backend: string, raw: unknown, index: number) => CapabilityDescriptor | null
): Map<string, CapabilityDescriptor> {
  const entries = new Map<string, CapabilityDescriptor>();
  items.forEach((raw, index) => {
    let descriptor: CapabilityDescriptor | null;
    try {
      descriptor = describe(backend, raw, index);
    } catch (error) {
      log.warn(`Skipping capability #${index} from ${backend}: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    if (!descriptor) {
      return;
    }

    if (entries.has(descriptor.key)) {
      log.warn(`Duplicate ${descriptor.kind} '${descriptor.key}' from ${backend}, keeping the first declaration`);
      return;
    }

    entries.set(descriptor.key, descriptor);
  });

  return entries;
}

function mergeInto(target: Map<string, CapabilityDescriptor>, source: ReadonlyMap<string, CapabilityDescriptor>): void {
  for (const descriptor of source.values()) {
    target.set(descriptor.namespacedKey, descriptor);
  }
}

/**
 * Per-backend and merged capability views. Each backend is registered once, at its
 * ready transition; every registration publishes a new frozen merged snapshot so
 * readers holding an older snapshot are never affected.
 */
export class CapabilityRegistry {
  private readonly perBackend = new Map<string, RegistrySnapshot>();
  private merged: RegistrySnapshot = emptySnapshot();

  register(backend: string, discovered: DiscoveredCapabilities): RegistrySnapshot {
    if (this.perBackend.has(backend)) {
      throw new Error(`Capabilities for backend '${backend}' are already registered`);
    }

    const snapshot: RegistrySnapshot = Object.freeze({
      tools: collect(backend, discovered.tools, describeTool),
      resources: collect(backend, discovered.resources, describeResource),
      prompts: collect(backend, discovered.prompts, describePrompt)
    });
    this.perBackend.set(backend, snapshot);
    this.publish();

    log.info(`Registered ${snapshot.tools.size} tools from ${backend}`);
    return snapshot;
  }

  forBackend(backend: string): RegistrySnapshot | undefined {
    return this.perBackend.get(backend);
  }

  snapshot(): RegistrySnapshot {
    return this.merged;
  }

  resolve(kind: CapabilityKind, namespacedKey: string): CapabilityDescriptor | undefined {
    const snapshot = this.merged;
    switch (kind) {
      case "tool":
        return snapshot.tools.get(namespacedKey);
      case "resource":
        return snapshot.resources.get(namespacedKey);
      case "prompt":
        return snapshot.prompts.get(namespacedKey);
    }
  }

  toolCount(backend: string): number {
    return this.perBackend.get(backend)?.tools.size ?? 0;
  }

  private publish(): void {
    const tools = new Map<string, CapabilityDescriptor>();
    const resources = new Map<string, CapabilityDescriptor>();
    const prompts = new Map<string, CapabilityDescriptor>();
    for (const snapshot of this.perBackend.values()) {
      mergeInto(tools, snapshot.tools);
      mergeInto(resources, snapshot.resources);
      mergeInto(prompts, snapshot.prompts);
    }

    this.merged = Object.freeze({ tools, resources, prompts });
  }
}

export function listEntries(entries: ReadonlyMap<string, CapabilityDescriptor>, view: "routed" | "unified"): Array<Readonly<Record<string, unknown>>> {
  return [...entries.values()].map((descriptor) => descriptor[view]);
}
