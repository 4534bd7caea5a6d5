import crypto from "node:crypto";

const INIT_SESSION_PREFIX = "gateway-init-";

/**
 * Synthetic session id sent to backends that correlate requests by session during
 * the handshake. Unrelated to the API key callers present to the gateway.
 */
export function createInitSessionId(backend: string): string {
  return `${INIT_SESSION_PREFIX}${backend}-${crypto.randomBytes(8).toString("hex")}`;
}
