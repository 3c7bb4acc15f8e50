import type { IncomingMessage } from "node:http";

import type { StatusHttpResponse } from "./types.js";

const DEFAULT_ALLOWED_METHODS = "GET,POST,OPTIONS";
const DEFAULT_ALLOWED_HEADERS = "Content-Type, Authorization";
const PREFLIGHT_MAX_AGE_SECONDS = "1800";

/**
 * Parses `APP_ALLOWED_ORIGINS`, a comma or whitespace separated list. A `*`
 * anywhere collapses the list to `["*"]`; duplicates keep their first
 * position. Unset or blank input allows no cross-origin caller.
 */
export function parseAllowedOrigins(raw: string | undefined): readonly string[] {
  const tokens = (raw ?? "").split(/[\s,]+/).filter((token) => token.length > 0);
  if (tokens.includes("*")) {
    return Object.freeze(["*"]);
  }
  return Object.freeze([...new Set(tokens)]);
}

/**
 * Adds the CORS headers for the request's `Origin` when it is allowed and
 * returns whether it was. Explicit origins are echoed with credentials so the
 * session cookie travels; the wildcard never carries credentials.
 */
export function applyCorsHeaders(
  req: IncomingMessage,
  res: StatusHttpResponse,
  allowedOrigins: readonly string[],
): boolean {
  if (allowedOrigins.length === 0) {
    return false;
  }
  const origin = typeof req.headers.origin === "string" ? req.headers.origin : undefined;
  if (allowedOrigins.includes("*")) {
    res.setHeader("Access-Control-Allow-Origin", "*");
  } else if (origin && allowedOrigins.includes(origin)) {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Access-Control-Allow-Credentials", "true");
    res.setHeader("Vary", "Origin");
  } else {
    return false;
  }

  const requestedMethod = req.headers["access-control-request-method"];
  res.setHeader(
    "Access-Control-Allow-Methods",
    typeof requestedMethod === "string" && requestedMethod ? requestedMethod : DEFAULT_ALLOWED_METHODS,
  );
  const requestedHeaders = req.headers["access-control-request-headers"];
  res.setHeader(
    "Access-Control-Allow-Headers",
    typeof requestedHeaders === "string" && requestedHeaders ? requestedHeaders : DEFAULT_ALLOWED_HEADERS,
  );
  res.setHeader("Access-Control-Max-Age", PREFLIGHT_MAX_AGE_SECONDS);
  return true;
}
