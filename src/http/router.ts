import { Buffer } from "node:buffer";
import type { IncomingMessage } from "node:http";
import { URL } from "node:url";

import { z } from "zod";

import {
  AuthenticationError,
  BadRequestError,
  CredentialsRejectedError,
  NotConfiguredError,
  NotRestartableError,
  PayloadTooLargeError,
  RestartInProgressError,
  StatusServiceError,
  describeError,
} from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { DeploymentRef } from "../orchestration/client.js";
import type { RestartCoordinator } from "../orchestration/coordinator.js";
import type { Subscription } from "../status/channel.js";
import type { HeartbeatConfig } from "../status/heartbeat.js";
import type { ChannelRegistry } from "../status/registry.js";
import { formatResourceKey } from "../status/resourceKey.js";
import type { TabCatalog } from "../tabs/catalog.js";
import { buildSessionCookie, checkSessionCookie, checkToken, isAuthorised, type AuthSettings } from "./auth.js";
import { readJsonBody } from "./body.js";
import { applyCorsHeaders } from "./cors.js";
import { applySecurityHeaders, ensureRequestId } from "./headers.js";
import { runWithRequestContext } from "./requestContext.js";
import { pipeStatusStream } from "./statusStream.js";
import type { StatusHttpResponse } from "./types.js";

const RESTART_ROUTE = /^\/api\/restart\/(\d+)$/;
const STATUS_STREAM_ROUTE = /^\/api\/status\/(\d+)\/stream$/;

const loginRequestSchema = z.object({ token: z.string() });

export interface StatusRouterOptions {
  catalog: TabCatalog;
  registry: ChannelRegistry;
  coordinator: Pick<RestartCoordinator<DeploymentRef>, "requestRestart">;
  heartbeat: HeartbeatConfig;
  auth: AuthSettings;
  /** Origins granted CORS access; `["*"]` allows any. Defaults to none. */
  allowedOrigins?: readonly string[];
  logger: StructuredLogger;
  /** Reconnection delay advertised to stream clients. */
  retryMs?: number;
}

export interface StatusRouter {
  handleRequest(req: IncomingMessage, res: StatusHttpResponse): Promise<void>;
  /** Number of status streams currently attached. */
  readonly openStreams: number;
  /** Ends every open status stream. */
  close(): void;
}

/**
 * Builds the request handler of the status API. Handlers are plain functions
 * over `IncomingMessage` and a response double so tests can drive them
 * without a listening socket.
 */
export function createStatusRouter(options: StatusRouterOptions): StatusRouter {
  const { catalog, registry, coordinator, logger } = options;
  const streams = new Set<Subscription>();

  const dispatch = async (req: IncomingMessage, res: StatusHttpResponse, pathname: string): Promise<void> => {
    const method = req.method ?? "GET";

    if (pathname === "/api/health") {
      if (method !== "GET") {
        writeMethodNotAllowed(res, "GET");
        return;
      }
      writeJson(res, 200, { status: "ok" });
      return;
    }

    if (pathname === "/api/config") {
      if (method !== "GET") {
        writeMethodNotAllowed(res, "GET");
        return;
      }
      writeJson(res, 200, catalog.toResponse());
      return;
    }

    if (pathname === "/api/auth/login") {
      if (method !== "POST") {
        writeMethodNotAllowed(res, "POST");
        return;
      }
      if (options.auth.disabled) {
        writeJson(res, 200, { authenticated: true, disabled: true });
        return;
      }
      const body = loginRequestSchema.safeParse(await readJsonBody(req));
      if (!body.success) {
        throw new BadRequestError("login body must be {\"token\": string}", { issues: body.error.issues });
      }
      if (options.auth.token === null || !checkToken(body.data.token, options.auth.token)) {
        throw new CredentialsRejectedError("invalid authentication token");
      }
      res.setHeader("Set-Cookie", buildSessionCookie(options.auth));
      logger.info("auth_login_succeeded");
      writeJson(res, 200, { authenticated: true, disabled: false });
      return;
    }

    if (pathname === "/api/auth/check") {
      if (method !== "GET") {
        writeMethodNotAllowed(res, "GET");
        return;
      }
      if (options.auth.disabled) {
        writeJson(res, 200, { authenticated: true, disabled: true });
        return;
      }
      const session = checkSessionCookie(req.headers, options.auth);
      if (session !== "valid") {
        throw new CredentialsRejectedError(`${session} authentication cookie`);
      }
      writeJson(res, 200, { authenticated: true, disabled: false });
      return;
    }

    const restartMatch = RESTART_ROUTE.exec(pathname);
    if (restartMatch) {
      if (method !== "POST") {
        writeMethodNotAllowed(res, "POST");
        return;
      }
      if (!isAuthorised(req.headers, options.auth)) {
        throw new AuthenticationError();
      }
      const target = catalog.assertRestartable(Number(restartMatch[1]));
      const outcome = coordinator.requestRestart(target.key, target.deployment);
      if (outcome.status === "rejected") {
        throw new RestartInProgressError(target.key.namespace, target.key.name);
      }
      writeJson(res, 200, { status: "restarting", message: null });
      return;
    }

    const streamMatch = STATUS_STREAM_ROUTE.exec(pathname);
    if (streamMatch) {
      if (method !== "GET") {
        writeMethodNotAllowed(res, "GET");
        return;
      }
      const key = catalog.resourceKeyFor(Number(streamMatch[1]));
      const subscription = registry.getOrCreate(key).subscribe();
      streams.add(subscription);
      logger.info("status_stream_opened", { resource: formatResourceKey(key), subscription: subscription.id });
      try {
        await pipeStatusStream(res, subscription, {
          heartbeat: options.heartbeat,
          retryMs: options.retryMs,
          logger,
        });
      } finally {
        streams.delete(subscription);
      }
      return;
    }

    writeJson(res, 404, { error: "NOT_FOUND" });
  };

  const handleRequest = async (req: IncomingMessage, res: StatusHttpResponse): Promise<void> => {
    const requestId = ensureRequestId(req, res);
    applySecurityHeaders(res);
    const pathname = new URL(req.url ?? "/", "http://status.local").pathname;
    const corsAllowed = applyCorsHeaders(req, res, options.allowedOrigins ?? []);
    if (req.method === "OPTIONS" && corsAllowed) {
      res.writeHead(204);
      res.end();
      return;
    }

    await runWithRequestContext({ requestId, method: req.method ?? "GET", path: pathname }, async () => {
      try {
        await dispatch(req, res, pathname);
      } catch (error) {
        writeError(res, error, logger);
      }
    });
  };

  return {
    handleRequest,
    get openStreams() {
      return streams.size;
    },
    close() {
      for (const subscription of streams) {
        subscription.close();
      }
    },
  };
}

/** HTTP status of the errors the handlers raise on purpose. */
export function httpStatusFor(error: StatusServiceError): number {
  if (error instanceof AuthenticationError) {
    return 401;
  }
  if (error instanceof CredentialsRejectedError) {
    return 403;
  }
  if (error instanceof BadRequestError) {
    return 400;
  }
  if (error instanceof PayloadTooLargeError) {
    return 413;
  }
  if (error instanceof NotConfiguredError) {
    return 404;
  }
  if (error instanceof NotRestartableError) {
    return 400;
  }
  if (error instanceof RestartInProgressError) {
    return 409;
  }
  return 500;
}

function writeError(
  res: StatusHttpResponse,
  error: unknown,
  logger: Pick<StructuredLogger, "warn" | "error">,
): void {
  if (error instanceof StatusServiceError) {
    const status = httpStatusFor(error);
    if (status >= 500) {
      logger.error("http_request_failed", { code: error.code, message: error.message });
    } else {
      logger.warn("http_request_rejected", { status, code: error.code, message: error.message });
    }
    if (!res.headersSent) {
      writeJson(res, status, { error: error.message, code: error.code });
    } else {
      res.end();
    }
    return;
  }

  logger.error("http_request_failed", { message: describeError(error) });
  if (!res.headersSent) {
    writeJson(res, 500, { error: "INTERNAL_ERROR" });
  } else {
    res.end();
  }
}

function writeMethodNotAllowed(res: StatusHttpResponse, allowed: string): void {
  res.setHeader("Allow", allowed);
  writeJson(res, 405, { error: "METHOD_NOT_ALLOWED" });
}

/** Serialises a response as JSON with the appropriate headers. */
function writeJson(res: StatusHttpResponse, status: number, payload: unknown): void {
  const json = JSON.stringify(payload);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(json),
    "Cache-Control": "no-store",
  });
  res.end(json);
}
