import { readFileSync } from "node:fs";

import { describe, it } from "mocha";
import { expect } from "chai";

import { loadSettings } from "../src/config/settings.js";
import { parseTabsConfig } from "../src/config/tabs.js";
import type { DeploymentRef } from "../src/orchestration/client.js";
import { createStatusService } from "../src/server.js";
import { resourceKey } from "../src/status/resourceKey.js";
import { FakeOrchestrationClient } from "./helpers/fakeOrchestration.js";
import { MemoryHttpResponse, createHttpRequest } from "./helpers/http.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const TABS = parseTabsConfig(readFileSync(new URL("./fixtures/tabs.yaml", import.meta.url), "utf8"));

describe("status service wiring", () => {
  it("threads the resolved settings into the coordinator and the router", async () => {
    const settings = loadSettings({
      APP_TABS_CONFIG: "tabs.yaml",
      APP_AUTH_TOKEN: "test-secret",
      APP_RESTART_TIMEOUT_SECONDS: "45",
    });
    const client = new FakeOrchestrationClient<DeploymentRef>((ref) => ref.deployment);
    const logger = new RecordingLogger();
    const service = createStatusService({ settings, tabs: TABS, logger, client });

    expect(service.catalog.size).to.equal(2);

    const denied = new MemoryHttpResponse();
    await service.router.handleRequest(createHttpRequest("POST", "/api/restart/1"), denied);
    expect(denied.statusCode).to.equal(401);

    const accepted = new MemoryHttpResponse();
    await service.router.handleRequest(
      createHttpRequest("POST", "/api/restart/1", { authorization: "Bearer test-secret" }),
      accepted,
    );
    expect(accepted.statusCode).to.equal(200);

    const key = resourceKey("default", "code-server");
    expect(service.coordinator.activeJobs().map((job) => job.key)).to.deep.equal([key]);
    client.feed("code-server").push({ type: "ready" });
    expect(await service.coordinator.whenSettled(key)).to.deep.equal({ tag: "running" });
    expect(client.watches[0].timeoutMs).to.equal(45_000);
    expect(service.registry.peek(key)?.current).to.deep.equal({ tag: "running" });
  });

  it("builds the Kubernetes client when none is injected", () => {
    const settings = loadSettings({ APP_TABS_CONFIG: "tabs.yaml", APP_AUTH_DISABLED: "true" });
    const service = createStatusService({ settings, tabs: TABS, logger: new RecordingLogger() });

    expect(service.coordinator.activeJobs()).to.deep.equal([]);
    expect(service.router.openStreams).to.equal(0);
  });
});
