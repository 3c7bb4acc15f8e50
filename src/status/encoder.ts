import { DEFAULT_RETRY_MS, renderSseFrame, serialiseForSse } from "../events/sse.js";
import type { ChannelEvent, Subscription } from "./channel.js";
import type { HeartbeatConfig } from "./heartbeat.js";
import { toStatusPayload } from "./state.js";

/** Event names written on the status stream. */
export type StatusStreamEventName = "status" | "heartbeat";

/** Headers sent before the first frame of a status stream. */
export const STATUS_STREAM_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "Content-Type": "text/event-stream; charset=utf-8",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
});

/**
 * Renders one channel event as an SSE frame. `closed` has no frame: it ends
 * the stream, so the function returns `null`.
 */
export function encodeChannelEvent(event: ChannelEvent, retryMs = DEFAULT_RETRY_MS): string | null {
  switch (event.type) {
    case "state":
      return renderSseFrame<StatusStreamEventName>({
        event: "status",
        data: serialiseForSse(toStatusPayload(event.state)),
        retryMs,
      });
    case "heartbeat":
      return renderSseFrame<StatusStreamEventName>({ event: "heartbeat", data: "{}", retryMs });
    case "closed":
      return null;
    default: {
      const exhaustive: never = event;
      return exhaustive;
    }
  }
}

/**
 * Yields the frames of one subscription until it closes. The subscription is
 * released on every exit path: natural close, a consumer that stops iterating
 * (`return()`), or an error thrown into the generator.
 */
export async function* streamFrames(
  subscription: Subscription,
  heartbeat: HeartbeatConfig,
  retryMs = DEFAULT_RETRY_MS,
): AsyncGenerator<string, void, void> {
  try {
    while (true) {
      const event = await subscription.next(heartbeat.intervalMs);
      const frame = encodeChannelEvent(event, retryMs);
      if (frame === null) {
        return;
      }
      yield frame;
    }
  } finally {
    subscription.close();
  }
}
