import { z } from "zod";

import type { RolloutSignal } from "./client.js";

const conditionSchema = z
  .object({
    type: z.string(),
    status: z.string().optional(),
    reason: z.string().nullish(),
    message: z.string().nullish(),
    observedGeneration: z.number().int().optional(),
  })
  .passthrough();

/**
 * Subset of an `apps/v1` Deployment read by the rollout rules. Unknown fields
 * pass through untouched; every field the rules read is optional because the
 * API omits zero-valued counters.
 */
export const deploymentSchema = z
  .object({
    metadata: z
      .object({
        name: z.string().optional(),
        generation: z.number().int().optional(),
      })
      .passthrough()
      .default({}),
    spec: z
      .object({
        replicas: z.number().int().optional(),
      })
      .passthrough()
      .default({}),
    status: z
      .object({
        observedGeneration: z.number().int().optional(),
        replicas: z.number().int().optional(),
        readyReplicas: z.number().int().optional(),
        availableReplicas: z.number().int().optional(),
        updatedReplicas: z.number().int().optional(),
        conditions: z.array(conditionSchema).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type DeploymentObject = z.infer<typeof deploymentSchema>;

export function extractGeneration(deployment: DeploymentObject): number | null {
  return deployment.metadata.generation ?? null;
}

/**
 * Returns the failure diagnostic when the controller gave up on the rollout
 * of {@link targetGeneration}, i.e. `Progressing` turned `False`. Conditions
 * attached to an older generation are ignored.
 */
export function detectRolloutFailure(deployment: DeploymentObject, targetGeneration: number): string | null {
  const status = deployment.status;
  if (!status) {
    return null;
  }

  for (const condition of status.conditions) {
    if (condition.type !== "Progressing" && condition.type !== "Available") {
      continue;
    }
    if (condition.observedGeneration !== undefined && condition.observedGeneration < targetGeneration) {
      continue;
    }
    if (condition.type === "Progressing" && (condition.status ?? "").toLowerCase() === "false") {
      const reason =
        condition.reason === "ProgressDeadlineExceeded"
          ? "progress deadline exceeded"
          : condition.reason ?? "rollout halted";
      return `deployment rollout failed: ${condition.message ?? reason}`;
    }
  }
  return null;
}

/**
 * A deployment is ready once the controller observed the target generation,
 * every replica counter reached the desired count and `Available` is true.
 */
export function deploymentReady(deployment: DeploymentObject, targetGeneration: number): boolean {
  const status = deployment.status;
  if (!status) {
    return false;
  }

  const observed = status.observedGeneration;
  if (observed === undefined || observed < targetGeneration) {
    return false;
  }

  const desired = deployment.spec.replicas ?? status.replicas;
  const ready = status.readyReplicas;
  const available = status.availableReplicas;
  const updated = status.updatedReplicas;

  if (desired === undefined) {
    if (ready === undefined && available === undefined) {
      return false;
    }
  } else {
    for (const count of [ready, available, updated]) {
      if (count === undefined || count < desired) {
        return false;
      }
    }
  }

  const generation = deployment.metadata.generation;
  if (generation !== undefined && generation > observed) {
    return false;
  }

  for (const condition of status.conditions) {
    if (condition.type !== "Available") {
      continue;
    }
    if ((condition.status ?? "").toLowerCase() !== "true") {
      return false;
    }
    if (condition.observedGeneration === undefined || condition.observedGeneration >= targetGeneration) {
      return true;
    }
  }
  return (ready ?? 0) > 0 || (available ?? 0) > 0;
}

/** Maps one observed deployment snapshot to a rollout signal. */
export function classifyDeployment(deployment: DeploymentObject, targetGeneration: number): RolloutSignal {
  const failure = detectRolloutFailure(deployment, targetGeneration);
  if (failure) {
    return { type: "error", message: failure };
  }
  return deploymentReady(deployment, targetGeneration) ? { type: "ready" } : { type: "not-ready" };
}
