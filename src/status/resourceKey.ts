/** Identifies a managed workload. Two keys are equal when both fields match. */
export interface ResourceKey {
  readonly namespace: string;
  readonly name: string;
}

/** Namespace used for tabs that carry no orchestration metadata. */
export const STATIC_NAMESPACE = "static";

export function resourceKey(namespace: string, name: string): ResourceKey {
  return Object.freeze({ namespace, name });
}

/**
 * Canonical map key for {@link ResourceKey}. JSON encoding keeps the pair
 * unambiguous even when a component contains the separator of a naive join.
 */
export function resourceKeyId(key: ResourceKey): string {
  return JSON.stringify([key.namespace, key.name]);
}

export function formatResourceKey(key: ResourceKey): string {
  return `${key.namespace}/${key.name}`;
}
