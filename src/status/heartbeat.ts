import { ConfigurationError } from "../errors.js";

/** Heartbeat cadence resolved once at startup and shared read-only. */
export interface HeartbeatConfig {
  readonly intervalMs: number;
}

/**
 * Builds the frozen heartbeat configuration from a number of seconds. Zero,
 * negative and non-finite values are rejected; "no heartbeat" is expressed by
 * not passing an interval to `Subscription.next`, never by a zero here.
 */
export function createHeartbeatConfig(seconds: number): HeartbeatConfig {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError("heartbeat interval must be a positive number of seconds", { seconds });
  }
  return Object.freeze({ intervalMs: Math.max(1, Math.round(seconds * 1_000)) });
}
