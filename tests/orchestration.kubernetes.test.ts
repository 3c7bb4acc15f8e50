import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { OrchestrationFailureError } from "../src/errors.js";
import type { RolloutSignal } from "../src/orchestration/client.js";
import { KubernetesDeploymentClient, RESTARTED_AT_ANNOTATION } from "../src/orchestration/kubernetes.js";

interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: string | null;
}

/** `fetch` double answering queued responses in order and recording each request. */
function scriptedFetch(responses: Array<Response | Error>): { fetch: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : null,
    });
    const next = responses.shift();
    if (next === undefined) {
      throw new Error(`unexpected request to ${String(input)}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { fetch: impl, calls };
}

function json(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), { status, headers: { "Content-Type": "application/json" } });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

async function collect(signals: AsyncIterable<RolloutSignal>): Promise<RolloutSignal[]> {
  const received: RolloutSignal[] = [];
  for await (const signal of signals) {
    received.push(signal);
  }
  return received;
}

const REF = { namespace: "default", deployment: "web" };
const config = { apiUrl: "https://k8s.test/", token: async () => "test-secret" };

describe("kubernetes deployment client: trigger", () => {
  let clock: sinon.SinonFakeTimers | null = null;

  afterEach(() => {
    clock?.restore();
    clock = null;
  });

  it("patches the restart annotation and returns the new generation", async () => {
    clock = sinon.useFakeTimers({ now: Date.parse("2024-05-01T12:00:00.000Z"), toFake: ["Date"] });
    const { fetch, calls } = scriptedFetch([
      json(200, { metadata: { name: "web", generation: 4 } }),
      json(200, { metadata: { name: "web", generation: 4 }, status: { observedGeneration: 3 } }),
    ]);
    const client = new KubernetesDeploymentClient(config, fetch);

    expect(await client.triggerRestart(REF)).to.deep.equal({ generation: 4 });

    expect(calls).to.have.length(2);
    expect(calls[0].url).to.equal("https://k8s.test/apis/apps/v1/namespaces/default/deployments/web");
    expect(calls[0].method).to.equal("PATCH");
    expect(calls[0].headers.get("content-type")).to.equal("application/strategic-merge-patch+json");
    expect(calls[0].headers.get("authorization")).to.equal("Bearer test-secret");
    expect(JSON.parse(calls[0].body ?? "")).to.deep.equal({
      spec: { template: { metadata: { annotations: { [RESTARTED_AT_ANNOTATION]: "2024-05-01T12:00:00.000Z" } } } },
    });
    expect(calls[1].url).to.equal("https://k8s.test/apis/apps/v1/namespaces/default/deployments/web/status");
    expect(calls[1].method).to.equal("GET");
  });

  it("reports the API reason of a rejected patch", async () => {
    const { fetch } = scriptedFetch([
      json(403, { kind: "Status", reason: "Forbidden", message: "deployments.apps is forbidden" }),
    ]);
    const client = new KubernetesDeploymentClient(config, fetch);

    const error = await captureError(client.triggerRestart(REF));

    expect(error).to.be.instanceOf(OrchestrationFailureError);
    expect(error).to.have.property("message", "Kubernetes API error: Forbidden");
    expect(error).to.have.property("details").that.deep.equals({ status: 403 });
  });

  it("falls back to the status line for non-JSON error bodies", async () => {
    const { fetch } = scriptedFetch([new Response("upstream down", { status: 502, statusText: "Bad Gateway" })]);
    const client = new KubernetesDeploymentClient(config, fetch);

    const error = await captureError(client.triggerRestart(REF));

    expect(error).to.have.property("message", "Kubernetes API error: Bad Gateway");
  });

  it("fails when the deployment reports no generation", async () => {
    const { fetch } = scriptedFetch([json(200, {}), json(200, { metadata: { name: "web" } })]);
    const client = new KubernetesDeploymentClient(config, fetch);

    const error = await captureError(client.triggerRestart(REF));

    expect(error).to.have.property("message", "unable to determine deployment generation");
  });

  it("wraps transport failures", async () => {
    const { fetch } = scriptedFetch([new TypeError("fetch failed")]);
    const client = new KubernetesDeploymentClient(config, fetch);

    const error = await captureError(client.triggerRestart(REF));

    expect(error).to.be.instanceOf(OrchestrationFailureError);
    expect(error).to.have.property("message", "unexpected error triggering restart: fetch failed");
  });
});

describe("kubernetes deployment client: watch", () => {
  const notReady = { metadata: { generation: 2 }, spec: { replicas: 1 }, status: { observedGeneration: 1 } };
  const ready = {
    metadata: { generation: 2 },
    spec: { replicas: 1 },
    status: {
      observedGeneration: 2,
      readyReplicas: 1,
      availableReplicas: 1,
      updatedReplicas: 1,
      conditions: [{ type: "Available", status: "True" }],
    },
  };

  function ndjson(...events: unknown[]): Response {
    return new Response(events.map((event) => `${JSON.stringify(event)}\n`).join(""), { status: 200 });
  }

  it("classifies each watch event and skips bookmarks", async () => {
    const { fetch, calls } = scriptedFetch([
      ndjson(
        { type: "ADDED", object: notReady },
        { type: "BOOKMARK", object: { metadata: { resourceVersion: "12" } } },
        { type: "MODIFIED", object: ready },
      ),
    ]);
    const client = new KubernetesDeploymentClient(config, fetch);

    const signals = await collect(client.watchRollout(REF, { generation: 2 }, { timeoutMs: 180_000 }));

    expect(signals).to.deep.equal([{ type: "not-ready" }, { type: "ready" }]);
    expect(calls[0].url).to.equal(
      "https://k8s.test/apis/apps/v1/namespaces/default/deployments?watch=1&fieldSelector=metadata.name%3Dweb&timeoutSeconds=180",
    );
  });

  it("handles a final event without a trailing newline", async () => {
    const { fetch } = scriptedFetch([
      new Response(JSON.stringify({ type: "MODIFIED", object: ready }), { status: 200 }),
    ]);
    const client = new KubernetesDeploymentClient(config, fetch);

    expect(await collect(client.watchRollout(REF, { generation: 2 }, { timeoutMs: 1_000 }))).to.deep.equal([
      { type: "ready" },
    ]);
  });

  it("turns deletions and watch errors into error signals", async () => {
    const { fetch } = scriptedFetch([
      ndjson({ type: "ERROR", object: { kind: "Status", reason: "Expired", message: "too old resource version" } }),
      ndjson({ type: "DELETED", object: notReady }),
    ]);
    const client = new KubernetesDeploymentClient(config, fetch);

    expect(await collect(client.watchRollout(REF, { generation: 2 }, { timeoutMs: 1_000 }))).to.deep.equal([
      { type: "error", message: "rollout watch failed: too old resource version" },
    ]);
    expect(await collect(client.watchRollout(REF, { generation: 2 }, { timeoutMs: 1_000 }))).to.deep.equal([
      { type: "error", message: "deployment was deleted during the rollout" },
    ]);
  });

  it("rejects malformed lines", async () => {
    const { fetch } = scriptedFetch([new Response("not json\n", { status: 200 })]);
    const client = new KubernetesDeploymentClient(config, fetch);

    const error = await captureError(collect(client.watchRollout(REF, { generation: 2 }, { timeoutMs: 1_000 })));

    expect(error).to.be.instanceOf(OrchestrationFailureError);
    expect(error).to.have.property("message", "malformed watch event");
  });

  it("reports a rejected watch request", async () => {
    const { fetch } = scriptedFetch([json(404, { kind: "Status", reason: "NotFound" })]);
    const client = new KubernetesDeploymentClient(config, fetch);

    const error = await captureError(collect(client.watchRollout(REF, { generation: 2 }, { timeoutMs: 1_000 })));

    expect(error).to.have.property("message", "failed to watch deployment: NotFound");
  });
});
