import { Buffer } from "node:buffer";
import type { IncomingMessage } from "node:http";

import { BadRequestError, PayloadTooLargeError, describeError } from "../errors.js";

/** Upper bound for request bodies; only the login route reads one. */
export const DEFAULT_MAX_BODY_BYTES = 16 * 1024;

/**
 * Reads the request stream and parses it as JSON. An empty body yields `{}` so
 * the caller's schema reports the missing fields. Throws
 * {@link PayloadTooLargeError} as soon as the limit is crossed.
 */
export async function readJsonBody(req: IncomingMessage, maxBytes = DEFAULT_MAX_BODY_BYTES): Promise<unknown> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += buffer.length;
    if (totalBytes > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8").trim();
  if (raw.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new BadRequestError("request body is not valid JSON", { bytes: totalBytes, reason: describeError(error) });
  }
}
