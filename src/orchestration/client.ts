/** Progress report produced while a rollout is being watched. */
export type RolloutSignal =
  | { readonly type: "ready" }
  | { readonly type: "not-ready" }
  | { readonly type: "error"; readonly message: string };

/** What the watcher waits for after the restart was triggered. */
export interface RolloutTarget {
  /** Generation the workload must reach before it counts as rolled out. */
  readonly generation: number;
}

export interface TriggerRestartOptions {
  readonly signal?: AbortSignal;
}

export interface WatchRolloutOptions {
  readonly signal?: AbortSignal;
  /** Upper bound the backend may use to close the watch on its side. */
  readonly timeoutMs: number;
}

/**
 * Backend able to restart a workload and report rollout progress. `Handle`
 * is whatever the backend needs to address the workload.
 */
export interface OrchestrationClient<Handle> {
  triggerRestart(handle: Handle, options?: TriggerRestartOptions): Promise<RolloutTarget>;
  watchRollout(handle: Handle, target: RolloutTarget, options: WatchRolloutOptions): AsyncIterable<RolloutSignal>;
}

/** Address of a Kubernetes deployment. */
export interface DeploymentRef {
  readonly namespace: string;
  readonly deployment: string;
}
