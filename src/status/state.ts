/**
 * Operational state of one managed resource. The union is closed: adding a tag
 * forces every exhaustive `switch` (encoder, transition logging) to be
 * revisited at compile time.
 */
export type ResourceState =
  | { readonly tag: "running" }
  | { readonly tag: "restarting" }
  | { readonly tag: "error"; readonly message: string };

export type ResourceStateTag = ResourceState["tag"];

const RUNNING: ResourceState = Object.freeze({ tag: "running" });
const RESTARTING: ResourceState = Object.freeze({ tag: "restarting" });

export function running(): ResourceState {
  return RUNNING;
}

export function restarting(): ResourceState {
  return RESTARTING;
}

export function errorState(message: string): ResourceState {
  return Object.freeze({ tag: "error", message });
}

/** JSON body carried by `status` frames and by the restart endpoint. */
export interface StatusPayload {
  state: ResourceStateTag;
  message: string | null;
}

export function toStatusPayload(state: ResourceState): StatusPayload {
  switch (state.tag) {
    case "running":
    case "restarting":
      return { state: state.tag, message: null };
    case "error":
      return { state: state.tag, message: state.message };
    default: {
      const exhaustive: never = state;
      return exhaustive;
    }
  }
}

export function statesEqual(left: ResourceState, right: ResourceState): boolean {
  if (left.tag !== right.tag) {
    return false;
  }
  if (left.tag === "error" && right.tag === "error") {
    return left.message === right.message;
  }
  return true;
}
