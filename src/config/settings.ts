import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import { parseAllowedOrigins } from "../http/cors.js";
import { SERVICE_ACCOUNT_TOKEN_PATH } from "../orchestration/kubernetes.js";
import { DEFAULT_RESTART_TIMEOUT_MS } from "../orchestration/coordinator.js";
import type { AuthSettings } from "../http/auth.js";
import { createHeartbeatConfig, type HeartbeatConfig } from "../status/heartbeat.js";
import {
  readBool,
  readEnum,
  readOptionalNumber,
  readOptionalString,
  readString,
  type EnvSource,
} from "./env.js";
import { formatIssues } from "./tabs.js";

export const APP_ENVIRONMENTS = ["development", "production", "testing"] as const;
export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

/** Heartbeat cadence when `APP_SSE_HEARTBEAT_SECONDS` is unset. */
export const DEFAULT_HEARTBEAT_SECONDS: Readonly<Record<AppEnvironment, number>> = Object.freeze({
  development: 5,
  production: 30,
  testing: 30,
});

export const DEFAULT_HTTP_HOST = "0.0.0.0";
export const DEFAULT_HTTP_PORT = 5000;
export const DEFAULT_AUTH_COOKIE_NAME = "status_auth";
const IN_CLUSTER_API_URL = "https://kubernetes.default.svc";

/** RFC 7230 token characters, the only ones allowed in a cookie name. */
const COOKIE_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
/** `*`, or a scheme and authority without a path. */
const ORIGIN_PATTERN = /^(\*|https?:\/\/[^\s/]+)$/;

const positiveSeconds = z.number().finite().positive("must be a positive number of seconds");

const rawSettingsSchema = z
  .object({
    environment: z.enum(APP_ENVIRONMENTS),
    tabsConfigPath: z.string({ required_error: "APP_TABS_CONFIG must point at the tabs YAML file" }),
    heartbeatSeconds: positiveSeconds,
    restartTimeoutSeconds: positiveSeconds,
    http: z.object({
      host: z.string().min(1),
      port: z.number().int("must be an integer").min(0).max(65_535),
    }),
    auth: z.object({
      disabled: z.boolean(),
      token: z.string().nullable(),
      cookieName: z.string().regex(COOKIE_NAME_PATTERN, "must be a valid cookie name"),
      sessionSecret: z.string().min(16, "must be at least 16 characters").nullable(),
      secureCookies: z.boolean(),
    }),
    cors: z.object({
      allowedOrigins: z.array(z.string().regex(ORIGIN_PATTERN, "must be an origin such as https://host")),
    }),
    logFile: z.string().nullable(),
    logRedact: z.boolean(),
    kubernetes: z.object({
      apiUrl: z.string().url(),
      tokenFile: z.string().min(1),
    }),
  })
  .superRefine((value, ctx) => {
    if (!value.auth.disabled && value.auth.token === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["auth", "token"],
        message: "APP_AUTH_TOKEN is required unless APP_AUTH_DISABLED is set",
      });
    }
  });

export interface AppSettings {
  readonly environment: AppEnvironment;
  readonly tabsConfigPath: string;
  readonly heartbeat: HeartbeatConfig;
  readonly restartTimeoutMs: number;
  readonly http: { readonly host: string; readonly port: number };
  readonly auth: AuthSettings;
  readonly cors: { readonly allowedOrigins: readonly string[] };
  readonly logFile: string | null;
  /** `APP_LOG_REDACT`: scrub credentials and the shared token from log payloads. */
  readonly logRedact: boolean;
  readonly kubernetes: { readonly apiUrl: string; readonly tokenFile: string };
}

/** Values supplied on the command line; they take precedence over the environment. */
export interface SettingsOverrides {
  tabsConfigPath?: string;
  host?: string;
  port?: number;
}

/**
 * Resolves the service settings once at startup. Every invalid value is
 * reported together in a single {@link ConfigurationError}; nothing falls back
 * to a default once the operator set a variable.
 */
export function loadSettings(env: EnvSource, overrides: SettingsOverrides = {}): AppSettings {
  const environment = readEnum(env, "APP_ENV", APP_ENVIRONMENTS, "production");
  const token = readOptionalString(env, "APP_AUTH_TOKEN") ?? null;
  const raw = {
    environment,
    tabsConfigPath: overrides.tabsConfigPath ?? readOptionalString(env, "APP_TABS_CONFIG"),
    heartbeatSeconds: readOptionalNumber(env, "APP_SSE_HEARTBEAT_SECONDS") ?? DEFAULT_HEARTBEAT_SECONDS[environment],
    restartTimeoutSeconds:
      readOptionalNumber(env, "APP_RESTART_TIMEOUT_SECONDS") ?? DEFAULT_RESTART_TIMEOUT_MS / 1_000,
    http: {
      host: overrides.host ?? readString(env, "APP_HTTP_HOST", DEFAULT_HTTP_HOST),
      port: overrides.port ?? readOptionalNumber(env, "APP_HTTP_PORT") ?? DEFAULT_HTTP_PORT,
    },
    auth: {
      disabled: readBool(env, "APP_AUTH_DISABLED", false),
      token,
      cookieName: readString(env, "APP_AUTH_COOKIE_NAME", DEFAULT_AUTH_COOKIE_NAME),
      sessionSecret: readOptionalString(env, "APP_AUTH_SESSION_SECRET") ?? null,
      secureCookies: readBool(env, "APP_AUTH_SECURE_COOKIES", false),
    },
    cors: { allowedOrigins: [...parseAllowedOrigins(readOptionalString(env, "APP_ALLOWED_ORIGINS"))] },
    logFile: readOptionalString(env, "APP_LOG_FILE") ?? null,
    logRedact: readBool(env, "APP_LOG_REDACT", false),
    kubernetes: {
      apiUrl: readOptionalString(env, "KUBERNETES_API_URL") ?? inClusterApiUrl(env),
      tokenFile: readString(env, "KUBERNETES_TOKEN_FILE", SERVICE_ACCOUNT_TOKEN_PATH),
    },
  };

  const parsed = rawSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid settings: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }

  const { heartbeatSeconds, restartTimeoutSeconds, auth, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    // Sessions are signed with the shared token unless a dedicated secret is set.
    auth: { ...auth, sessionSecret: auth.sessionSecret ?? auth.token },
    heartbeat: createHeartbeatConfig(heartbeatSeconds),
    restartTimeoutMs: Math.round(restartTimeoutSeconds * 1_000),
  });
}

/** API server address advertised to pods through the service environment. */
function inClusterApiUrl(env: EnvSource): string {
  const host = readOptionalString(env, "KUBERNETES_SERVICE_HOST");
  if (!host) {
    return IN_CLUSTER_API_URL;
  }
  const port = readString(env, "KUBERNETES_SERVICE_PORT", "443");
  const authority = host.includes(":") ? `[${host}]` : host;
  return `https://${authority}:${port}`;
}
