#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadSettings, type AppSettings } from "./config/settings.js";
import { loadTabsConfig, type TabsConfig } from "./config/tabs.js";
import { describeError, StatusServiceError } from "./errors.js";
import { createStatusRouter, type StatusRouter } from "./http/router.js";
import { startStatusServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import type { DeploymentRef, OrchestrationClient } from "./orchestration/client.js";
import { RestartCoordinator } from "./orchestration/coordinator.js";
import { KubernetesDeploymentClient, fileTokenProvider } from "./orchestration/kubernetes.js";
import { parseServerOptions } from "./serverOptions.js";
import { ChannelRegistry } from "./status/registry.js";
import { TabCatalog } from "./tabs/catalog.js";

export interface StatusService {
  readonly catalog: TabCatalog;
  readonly registry: ChannelRegistry;
  readonly coordinator: RestartCoordinator<DeploymentRef>;
  readonly router: StatusRouter;
}

export interface StatusServiceDependencies {
  settings: AppSettings;
  tabs: TabsConfig;
  logger: StructuredLogger;
  /** Defaults to the Kubernetes REST client built from {@link AppSettings.kubernetes}. */
  client?: OrchestrationClient<DeploymentRef>;
}

/** Wires the catalogue, channels, coordinator and router from resolved settings. */
export function createStatusService(deps: StatusServiceDependencies): StatusService {
  const { settings, logger } = deps;
  const catalog = new TabCatalog(deps.tabs);
  const registry = new ChannelRegistry({ logger });
  const client =
    deps.client ??
    new KubernetesDeploymentClient({
      apiUrl: settings.kubernetes.apiUrl,
      token: fileTokenProvider(settings.kubernetes.tokenFile),
    });
  const coordinator = new RestartCoordinator<DeploymentRef>({
    client,
    registry,
    logger,
    timeoutMs: settings.restartTimeoutMs,
  });
  const router = createStatusRouter({
    catalog,
    registry,
    coordinator,
    heartbeat: settings.heartbeat,
    auth: settings.auth,
    allowedOrigins: settings.cors.allowedOrigins,
    logger,
  });
  return { catalog, registry, coordinator, router };
}

/**
 * Boots the service when the module is executed directly: resolves settings
 * and tabs, starts the HTTP listener and closes it on SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
  let logger = new StructuredLogger();
  let settings: AppSettings;
  let tabs: TabsConfig;
  try {
    settings = loadSettings(process.env, parseServerOptions(process.argv.slice(2)));
    logger = new StructuredLogger({
      logFile: settings.logFile,
      redaction: { enabled: settings.logRedact, secrets: settings.auth.token ? [settings.auth.token] : [] },
    });
    tabs = await loadTabsConfig(settings.tabsConfigPath);
  } catch (error) {
    logger.error("startup_failed", {
      message: describeError(error),
      ...(error instanceof StatusServiceError ? { code: error.code, hint: error.hint } : {}),
    });
    await logger.flush();
    process.exit(1);
  }

  const service = createStatusService({ settings, tabs, logger });
  const handle = await startStatusServer({
    host: settings.http.host,
    port: settings.http.port,
    router: service.router,
    logger,
  });
  logger.info("runtime_started", {
    environment: settings.environment,
    tabs: service.catalog.size,
    heartbeat_ms: settings.heartbeat.intervalMs,
    restart_timeout_ms: settings.restartTimeoutMs,
    auth_disabled: settings.auth.disabled,
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_signal", { signal, active_restarts: service.coordinator.activeJobs().length });
    try {
      await handle.close();
    } catch (error) {
      logger.error("http_close_failed", { message: describeError(error) });
    }
    await logger.flush();
    process.exit(0);
  };
  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
}

/** Resolves symlinks so the entry point is also detected behind an npm `bin` link. */
const isMain = process.argv[1] ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    new StructuredLogger().error("startup_failed", { message: describeError(error) });
    process.exit(1);
  });
}
