import { Buffer } from "node:buffer";
import { createHmac, timingSafeEqual } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

import { runtimeTimers } from "../runtime/timers.js";

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;
const SESSION_PATTERN = /^(\d{1,12})\.([A-Za-z0-9_-]{43})$/;

/** Lifetime of the session cookie issued by the login route (about ten years). */
export const SESSION_LIFETIME_SECONDS = 3650 * 24 * 60 * 60;

/** Shared-token settings protecting the mutating endpoints. */
export interface AuthSettings {
  readonly disabled: boolean;
  readonly token: string | null;
  readonly cookieName: string;
  /** HMAC key of session cookies; rotating it logs every browser out. */
  readonly sessionSecret: string | null;
  /** `Secure; SameSite=None; Partitioned` cookies for cross-site embedding. */
  readonly secureCookies: boolean;
}

export type SessionCheck = "valid" | "missing" | "invalid";

/**
 * Constant-time comparison between the presented token and the configured
 * secret. Missing credentials, an empty secret and length mismatches all
 * return `false`.
 */
export function checkToken(reqToken: string | undefined, expected: string): boolean {
  if (!reqToken || expected.length === 0) {
    return false;
  }
  const provided = Buffer.from(reqToken);
  const reference = Buffer.from(expected);
  if (provided.length !== reference.length) {
    return false;
  }
  return timingSafeEqual(provided, reference);
}

/** Extracts the token of the first `Authorization: Bearer …` header. */
export function resolveBearerToken(headers: IncomingHttpHeaders): string | undefined {
  const value = headers.authorization;
  if (typeof value !== "string") {
    return undefined;
  }
  return BEARER_PATTERN.exec(value.trim())?.[1];
}

/** Reads {@link name} from the `Cookie` header, percent-decoding the value. */
export function resolveCookieToken(headers: IncomingHttpHeaders, name: string): string | undefined {
  const raw = headers.cookie;
  if (typeof raw !== "string") {
    return undefined;
  }
  for (const pair of raw.split(";")) {
    const separator = pair.indexOf("=");
    if (separator < 0 || pair.slice(0, separator).trim() !== name) {
      continue;
    }
    let value = pair.slice(separator + 1).trim();
    if (value.startsWith("\"") && value.endsWith("\"") && value.length >= 2) {
      value = value.slice(1, -1);
    }
    try {
      return decodeURIComponent(value) || undefined;
    } catch {
      // Malformed escapes are compared verbatim.
      return value || undefined;
    }
  }
  return undefined;
}

function signSession(issuedAt: number, secret: string): string {
  return createHmac("sha256", secret).update(`status-session:${issuedAt}`).digest("base64url");
}

/** Session value `<issued-at seconds>.<signature>` stored in the auth cookie. */
export function createSessionValue(secret: string, nowMs: number = runtimeTimers.now()): string {
  const issuedAt = Math.floor(nowMs / 1_000);
  return `${issuedAt}.${signSession(issuedAt, secret)}`;
}

/** Verifies the signature and age of a session value. */
export function verifySessionValue(value: string, secret: string, nowMs: number = runtimeTimers.now()): boolean {
  const match = SESSION_PATTERN.exec(value);
  if (!match || secret.length === 0) {
    return false;
  }
  const issuedAt = Number(match[1]);
  const age = Math.floor(nowMs / 1_000) - issuedAt;
  if (age < 0 || age > SESSION_LIFETIME_SECONDS) {
    return false;
  }
  return checkToken(match[2], signSession(issuedAt, secret));
}

/** `Set-Cookie` value carrying a fresh session. */
export function buildSessionCookie(settings: AuthSettings, nowMs: number = runtimeTimers.now()): string {
  const secret = settings.sessionSecret ?? "";
  const attributes = [
    `${settings.cookieName}=${createSessionValue(secret, nowMs)}`,
    `Max-Age=${SESSION_LIFETIME_SECONDS}`,
    "Path=/",
    "HttpOnly",
  ];
  attributes.push(...(settings.secureCookies ? ["Secure", "SameSite=None", "Partitioned"] : ["SameSite=Lax"]));
  return attributes.join("; ");
}

/** Classifies the session cookie of a request. */
export function checkSessionCookie(
  headers: IncomingHttpHeaders,
  settings: AuthSettings,
  nowMs: number = runtimeTimers.now(),
): SessionCheck {
  const value = resolveCookieToken(headers, settings.cookieName);
  if (!value) {
    return "missing";
  }
  return settings.sessionSecret !== null && verifySessionValue(value, settings.sessionSecret, nowMs)
    ? "valid"
    : "invalid";
}

/**
 * True when the request carries the shared token as a bearer token, or a
 * session cookie issued by the login route. Always true when authentication
 * is disabled.
 */
export function isAuthorised(
  headers: IncomingHttpHeaders,
  settings: AuthSettings,
  nowMs: number = runtimeTimers.now(),
): boolean {
  if (settings.disabled) {
    return true;
  }
  if (settings.token === null) {
    return false;
  }
  return (
    checkToken(resolveBearerToken(headers), settings.token) ||
    checkSessionCookie(headers, settings, nowMs) === "valid"
  );
}
