import { randomUUID } from "node:crypto";
import type { IncomingMessage } from "node:http";

import type { StatusHttpResponse } from "./types.js";

/** Security headers applied to every response served by the status API. */
export function applySecurityHeaders(res: StatusHttpResponse): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
}

/**
 * Guarantees that the request/response pair carries a correlation id.
 * Identifiers set by a reverse proxy are kept so log lines line up across hops.
 */
export function ensureRequestId(req: IncomingMessage, res: StatusHttpResponse): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}
