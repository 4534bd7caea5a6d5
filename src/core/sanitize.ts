export const REDACTED = "[REDACTED]";

interface SecretPattern {
  pattern: RegExp;
  replacement: string;
}

// Order matters: the bearer rule runs before the authorization rule swallows the scheme.
const SECRET_PATTERNS: readonly SecretPattern[] = [
  { pattern: /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, replacement: REDACTED },
  { pattern: /gh[pousr]_[A-Za-z0-9]{36,}/g, replacement: REDACTED },
  { pattern: /(bearer\s+)[A-Za-z0-9._~+/=-]{8,}/gi, replacement: `$1${REDACTED}` },
  { pattern: /(authorization:\s*)(?!bearer\s)\S{8,}/gi, replacement: `$1${REDACTED}` },
  {
    pattern: /"(token|access_token|refresh_token|password|secret|client_secret|api_?key|authorization)"\s*:\s*"[^"]+"/gi,
    replacement: `"$1":"${REDACTED}"`
  },
  { pattern: /(token|key|secret|password|auth)([=:])\s*[^\s"]{8,}/gi, replacement: `$1$2${REDACTED}` },
  { pattern: /\b[a-f0-9]{32,}\b/gi, replacement: REDACTED }
];

const SECRET_FIELD_NAMES = [
  "password",
  "passwd",
  "pwd",
  "token",
  "apikey",
  "api_key",
  "api-key",
  "secret",
  "authorization",
  "auth",
  "key",
  "credential"
];

const ENV_FLAGS = new Set(["-e", "--env"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSecretField(name: string): boolean {
  const lower = name.toLowerCase();
  return SECRET_FIELD_NAMES.some((field) => lower.includes(field));
}

export function sanitizeText(text: string): string {
  let sanitized = text;
  for (const { pattern, replacement } of SECRET_PATTERNS) {
    sanitized = sanitized.replace(pattern, replacement);
  }

  return sanitized;
}

/** Copies a decoded JSON value with secret-looking fields and string contents redacted. */
export function sanitizeValue(value: unknown): unknown {
  if (typeof value === "string") {
    return sanitizeText(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item));
  }

  if (!isRecord(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    copy[key] = typeof item === "string" && item !== "" && isSecretField(key) ? REDACTED : sanitizeValue(item);
  }

  return copy;
}

export function maskSecret(value: string | undefined): string {
  if (!value) {
    return "(none)";
  }

  if (value.length <= 4) {
    return "****";
  }

  return `${value.slice(0, 4)}...`;
}

export function maskRecord(values: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    masked[key] = maskSecret(value);
  }

  return masked;
}

function maskAssignment(assignment: string): string {
  const equals = assignment.indexOf("=");
  return equals < 0 ? assignment : `${assignment.slice(0, equals + 1)}${maskSecret(assignment.slice(equals + 1))}`;
}

/**
 * Renders a command line for logging with the value of every `-e KEY=VALUE`,
 * `--env KEY=VALUE` and `--env=KEY=VALUE` argument masked.
 */
export function describeCommand(command: string, args: readonly string[]): string {
  const rendered: string[] = [command];
  let maskNext = false;
  for (const arg of args) {
    if (maskNext) {
      rendered.push(maskAssignment(arg));
      maskNext = false;
    } else if (ENV_FLAGS.has(arg)) {
      rendered.push(arg);
      maskNext = true;
    } else if (arg.startsWith("--env=")) {
      rendered.push(`--env=${maskAssignment(arg.slice("--env=".length))}`);
    } else {
      rendered.push(arg);
    }
  }

  return rendered.join(" ");
}
