import { readFile } from "node:fs/promises";
import { TextDecoder } from "node:util";
import { z } from "zod";

import { OrchestrationFailureError, describeError } from "../errors.js";
import { runtimeTimers } from "../runtime/timers.js";
import type {
  DeploymentRef,
  OrchestrationClient,
  RolloutSignal,
  RolloutTarget,
  TriggerRestartOptions,
  WatchRolloutOptions,
} from "./client.js";
import { classifyDeployment, deploymentSchema, extractGeneration } from "./rollout.js";

/** Annotation bumped by `kubectl rollout restart`; changing it rolls the pods. */
export const RESTARTED_AT_ANNOTATION = "kubectl.kubernetes.io/restartedAt";

/** Default location of the projected service-account token inside a pod. */
export const SERVICE_ACCOUNT_TOKEN_PATH = "/var/run/secrets/kubernetes.io/serviceaccount/token";

/** `Status` object returned by the API server alongside error responses. */
const apiStatusSchema = z
  .object({
    reason: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

const watchEventSchema = z.object({
  type: z.enum(["ADDED", "MODIFIED", "DELETED", "ERROR", "BOOKMARK"]),
  object: z.unknown(),
});

export interface KubernetesClientConfig {
  /** Base URL of the API server, e.g. `https://kubernetes.default.svc`. */
  readonly apiUrl: string;
  /** Supplies the bearer token; re-read on every call so rotated tokens apply. */
  readonly token: () => Promise<string>;
}

/** Reads the bearer token from a file, trimming the trailing newline. */
export function fileTokenProvider(path: string = SERVICE_ACCOUNT_TOKEN_PATH): () => Promise<string> {
  return async () => (await readFile(path, "utf8")).trim();
}

/**
 * {@link OrchestrationClient} talking to the Kubernetes REST API. A restart
 * patches the pod template annotation, reads back the generation the rollout
 * must reach, and then follows a field-selected watch on the deployment.
 */
export class KubernetesDeploymentClient implements OrchestrationClient<DeploymentRef> {
  private readonly apiUrl: string;
  private readonly token: () => Promise<string>;
  private readonly fetchImpl: typeof fetch;

  constructor(config: KubernetesClientConfig, fetchImpl: typeof fetch = fetch) {
    this.apiUrl = config.apiUrl.replace(/\/+$/, "");
    this.token = config.token;
    this.fetchImpl = fetchImpl;
  }

  async triggerRestart(ref: DeploymentRef, options: TriggerRestartOptions = {}): Promise<RolloutTarget> {
    const timestamp = new Date(runtimeTimers.now()).toISOString();
    const body = {
      spec: { template: { metadata: { annotations: { [RESTARTED_AT_ANNOTATION]: timestamp } } } },
    };

    const patched = await this.send(
      this.deploymentUrl(ref),
      {
        method: "PATCH",
        headers: { "Content-Type": "application/strategic-merge-patch+json" },
        body: JSON.stringify(body),
        signal: options.signal,
      },
      "unexpected error triggering restart",
    );
    if (!patched.ok) {
      throw new OrchestrationFailureError(`Kubernetes API error: ${await describeFailure(patched)}`, {
        status: patched.status,
      });
    }

    const statusResponse = await this.send(
      `${this.deploymentUrl(ref)}/status`,
      { method: "GET", signal: options.signal },
      "unexpected error reading deployment status",
    );
    if (!statusResponse.ok) {
      throw new OrchestrationFailureError(
        `failed to read deployment status: ${await describeFailure(statusResponse)}`,
        { status: statusResponse.status },
      );
    }

    const parsed = deploymentSchema.safeParse(await statusResponse.json());
    const generation = parsed.success ? extractGeneration(parsed.data) : null;
    if (generation === null) {
      throw new OrchestrationFailureError("unable to determine deployment generation");
    }
    return { generation };
  }

  async *watchRollout(
    ref: DeploymentRef,
    target: RolloutTarget,
    options: WatchRolloutOptions,
  ): AsyncGenerator<RolloutSignal, void, void> {
    const query = new URLSearchParams({
      watch: "1",
      fieldSelector: `metadata.name=${ref.deployment}`,
      timeoutSeconds: String(Math.max(1, Math.ceil(options.timeoutMs / 1_000))),
    });
    const url = `${this.apiUrl}/apis/apps/v1/namespaces/${encodeURIComponent(ref.namespace)}/deployments?${query}`;

    const response = await this.send(url, { method: "GET", signal: options.signal }, "unexpected error watching rollout");
    if (!response.ok) {
      throw new OrchestrationFailureError(`failed to watch deployment: ${await describeFailure(response)}`, {
        status: response.status,
      });
    }
    if (!response.body) {
      throw new OrchestrationFailureError("watch response carried no body");
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffered = "";
    try {
      while (true) {
        const chunk = await reader.read().catch((error: unknown) => {
          throw new OrchestrationFailureError(`rollout watch interrupted: ${describeError(error)}`, { cause: error });
        });
        if (chunk.done) {
          const tail = (buffered + decoder.decode()).trim();
          const signal = tail.length > 0 ? interpretWatchLine(tail, target.generation) : null;
          if (signal) {
            yield signal;
          }
          return;
        }
        buffered += decoder.decode(chunk.value, { stream: true });
        let newline = buffered.indexOf("\n");
        while (newline >= 0) {
          const line = buffered.slice(0, newline).trim();
          buffered = buffered.slice(newline + 1);
          newline = buffered.indexOf("\n");
          if (line.length === 0) {
            continue;
          }
          const signal = interpretWatchLine(line, target.generation);
          if (signal) {
            yield signal;
          }
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private deploymentUrl(ref: DeploymentRef): string {
    return `${this.apiUrl}/apis/apps/v1/namespaces/${encodeURIComponent(ref.namespace)}/deployments/${encodeURIComponent(ref.deployment)}`;
  }

  /** Issues an authenticated request; transport failures become orchestration failures. */
  private async send(url: string, init: RequestInit, failurePrefix: string): Promise<Response> {
    try {
      const token = await this.token();
      const headers = new Headers(init.headers);
      headers.set("Authorization", `Bearer ${token}`);
      headers.set("Accept", "application/json");
      return await this.fetchImpl(url, { ...init, headers });
    } catch (error) {
      throw new OrchestrationFailureError(`${failurePrefix}: ${describeError(error)}`, { cause: error });
    }
  }
}

/** Parses one newline-delimited watch event; bookmarks yield nothing. */
function interpretWatchLine(line: string, targetGeneration: number): RolloutSignal | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new OrchestrationFailureError("malformed watch event", { cause: error });
  }
  const event = watchEventSchema.safeParse(raw);
  if (!event.success) {
    throw new OrchestrationFailureError("malformed watch event", { cause: event.error });
  }

  switch (event.data.type) {
    case "BOOKMARK":
      return null;
    case "ERROR": {
      const status = apiStatusSchema.safeParse(event.data.object);
      const detail = status.success ? status.data.message ?? status.data.reason : undefined;
      return { type: "error", message: `rollout watch failed: ${detail ?? "unknown error"}` };
    }
    case "DELETED":
      return { type: "error", message: "deployment was deleted during the rollout" };
    case "ADDED":
    case "MODIFIED": {
      const deployment = deploymentSchema.safeParse(event.data.object);
      if (!deployment.success) {
        return { type: "not-ready" };
      }
      return classifyDeployment(deployment.data, targetGeneration);
    }
  }
}

/** Extracts the API `reason` from an error response, falling back to the status line. */
async function describeFailure(response: Response): Promise<string> {
  try {
    const status = apiStatusSchema.safeParse(await response.json());
    if (status.success && status.data.reason) {
      return status.data.reason;
    }
  } catch {
    // Non-JSON error bodies fall through to the status line.
  }
  return response.statusText || String(response.status);
}
