import {
  OrchestrationFailureError,
  RestartTimeoutError,
  describeError,
} from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { runtimeTimers } from "../runtime/timers.js";
import type { BroadcastChannel } from "../status/channel.js";
import type { ChannelRegistry } from "../status/registry.js";
import { formatResourceKey, resourceKeyId, type ResourceKey } from "../status/resourceKey.js";
import { errorState, restarting, running, type ResourceState } from "../status/state.js";
import type { OrchestrationClient, RolloutTarget } from "./client.js";

/** Ceiling applied to one restart, from trigger to terminal signal. */
export const DEFAULT_RESTART_TIMEOUT_MS = 180_000;

/** Diagnostic published when the ceiling elapses. */
export const TIMEOUT_DIAGNOSTIC = "timeout";

export type RestartOutcome =
  | { readonly status: "accepted"; readonly key: ResourceKey; readonly startedAt: number }
  | { readonly status: "rejected"; readonly reason: "in-progress"; readonly key: ResourceKey };

/** Snapshot of one in-flight restart. */
export interface RestartJobSnapshot {
  readonly key: ResourceKey;
  readonly startedAt: number;
}

interface RestartJob extends RestartJobSnapshot {
  /** Resolves with the terminal state once the watcher published it. */
  readonly settled: Promise<ResourceState>;
}

export interface RestartCoordinatorOptions<Handle> {
  client: OrchestrationClient<Handle>;
  registry: ChannelRegistry;
  logger: Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;
  timeoutMs?: number;
}

const TIMED_OUT = Symbol("timed-out");

/**
 * Accepts at most one restart per resource key and supervises it to a
 * terminal state. The in-flight map is checked and updated in one synchronous
 * step and `restarting` is published before {@link requestRestart} returns,
 * so subscribers always observe `restarting` ahead of the outcome. Watchers
 * never reject: every failure ends as a published `error` state.
 */
export class RestartCoordinator<Handle> {
  private readonly jobs = new Map<string, RestartJob>();
  private readonly client: OrchestrationClient<Handle>;
  private readonly registry: ChannelRegistry;
  private readonly logger: RestartCoordinatorOptions<Handle>["logger"];
  private readonly timeoutMs: number;

  constructor(options: RestartCoordinatorOptions<Handle>) {
    this.client = options.client;
    this.registry = options.registry;
    this.logger = options.logger;
    const timeoutMs = options.timeoutMs ?? DEFAULT_RESTART_TIMEOUT_MS;
    this.timeoutMs = timeoutMs > 0 ? timeoutMs : DEFAULT_RESTART_TIMEOUT_MS;
  }

  requestRestart(key: ResourceKey, handle: Handle): RestartOutcome {
    const id = resourceKeyId(key);
    if (this.jobs.has(id)) {
      this.logger.info("restart_rejected_in_progress", { resource: formatResourceKey(key) });
      return { status: "rejected", reason: "in-progress", key };
    }

    const channel = this.registry.getOrCreate(key);
    const startedAt = runtimeTimers.now();
    let settle: (state: ResourceState) => void = () => undefined;
    const settled = new Promise<ResourceState>((resolve) => {
      settle = resolve;
    });
    this.jobs.set(id, { key, startedAt, settled });
    channel.publish(restarting());
    this.logger.info("restart_accepted", { resource: formatResourceKey(key), timeout_ms: this.timeoutMs });

    void this.runWatcher(id, key, handle, channel, startedAt, settle);
    return { status: "accepted", key, startedAt };
  }

  isInFlight(key: ResourceKey): boolean {
    return this.jobs.has(resourceKeyId(key));
  }

  activeJobs(): RestartJobSnapshot[] {
    return Array.from(this.jobs.values(), (job) => ({ key: job.key, startedAt: job.startedAt }));
  }

  /** Terminal state of the in-flight job for {@link key}, or `null` when idle. */
  whenSettled(key: ResourceKey): Promise<ResourceState> | null {
    return this.jobs.get(resourceKeyId(key))?.settled ?? null;
  }

  private async runWatcher(
    id: string,
    key: ResourceKey,
    handle: Handle,
    channel: BroadcastChannel,
    startedAt: number,
    settle: (state: ResourceState) => void,
  ): Promise<void> {
    const resource = formatResourceKey(key);
    const controller = new AbortController();
    let expire: () => void = () => undefined;
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      expire = () => resolve(TIMED_OUT);
    });
    const timer = runtimeTimers.setTimeout(() => expire(), this.timeoutMs);

    let outcome: ResourceState;
    try {
      this.logger.debug("restart_trigger_started", { resource });
      const target = await Promise.race([
        this.client.triggerRestart(handle, { signal: controller.signal }),
        deadline,
      ]);
      if (target === TIMED_OUT) {
        throw new RestartTimeoutError(key.namespace, key.name, this.timeoutMs);
      }
      await this.awaitRollout(key, handle, target, controller.signal, deadline);
      outcome = running();
      this.logger.info("restart_completed", { resource, elapsed_ms: runtimeTimers.now() - startedAt });
    } catch (error) {
      outcome = this.failureState(error, resource);
    } finally {
      runtimeTimers.clearTimeout(timer);
      controller.abort();
    }

    channel.publish(outcome);
    this.jobs.delete(id);
    settle(outcome);
  }

  /** Consumes rollout signals until one is terminal or the deadline wins. */
  private async awaitRollout(
    key: ResourceKey,
    handle: Handle,
    target: RolloutTarget,
    signal: AbortSignal,
    deadline: Promise<typeof TIMED_OUT>,
  ): Promise<void> {
    const iterator = this.client
      .watchRollout(handle, target, { signal, timeoutMs: this.timeoutMs })
      [Symbol.asyncIterator]();
    let readPending = false;
    try {
      while (true) {
        const step = await Promise.race([iterator.next(), deadline]);
        if (step === TIMED_OUT) {
          readPending = true;
          throw new RestartTimeoutError(key.namespace, key.name, this.timeoutMs);
        }
        if (step.done) {
          throw new RestartTimeoutError(key.namespace, key.name, this.timeoutMs);
        }
        switch (step.value.type) {
          case "ready":
            return;
          case "error":
            throw new OrchestrationFailureError(step.value.message);
          case "not-ready":
            this.logger.debug("restart_rollout_progress", { resource: formatResourceKey(key) });
            break;
        }
      }
    } finally {
      // A read still racing the deadline is unblocked by the abort signal
      // instead; `return()` would queue behind it.
      if (!readPending && iterator.return) {
        await iterator.return();
      }
    }
  }

  private failureState(error: unknown, resource: string): ResourceState {
    if (error instanceof RestartTimeoutError) {
      this.logger.error("restart_timed_out", { resource, timeout_ms: error.timeoutMs, message: error.message });
      return errorState(TIMEOUT_DIAGNOSTIC);
    }
    if (error instanceof OrchestrationFailureError) {
      this.logger.error("restart_failed", { resource, code: error.code, message: error.diagnostic });
      return errorState(error.diagnostic);
    }
    const diagnostic = `restart failed: ${describeError(error)}`;
    this.logger.error("restart_failed", { resource, message: diagnostic });
    return errorState(diagnostic);
  }
}
