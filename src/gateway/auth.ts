import crypto from "node:crypto";
import { AuthenticationError } from "../errors.js";

const QUERY_TOKEN_PARAMS = ["token", "access_token", "apiKey", "api_key"];

export type AuthDecision =
  | { ok: true }
  | { ok: false; status: 400 | 401; error: AuthenticationError };

function digest(value: string): Buffer {
  return crypto.createHash("sha256").update(value).digest();
}

export function credentialMatches(presented: string, apiKey: string): boolean {
  return crypto.timingSafeEqual(digest(presented), digest(apiKey));
}

/**
 * The Authorization header must equal the configured API key exactly. There is no
 * scheme: a "Bearer " prefix is part of the compared value. Without an API key the
 * gate is open.
 */
export function checkAuthorization(authorization: string | undefined, requestUrl: URL, apiKey: string | undefined): AuthDecision {
  if (QUERY_TOKEN_PARAMS.some((param) => requestUrl.searchParams.has(param))) {
    return { ok: false, status: 400, error: new AuthenticationError("query_token") };
  }

  if (!apiKey) {
    return { ok: true };
  }

  if (authorization === undefined || authorization.length === 0) {
    return { ok: false, status: 401, error: new AuthenticationError("missing") };
  }

  if (!credentialMatches(authorization, apiKey)) {
    return { ok: false, status: 401, error: new AuthenticationError("invalid") };
  }

  return { ok: true };
}
