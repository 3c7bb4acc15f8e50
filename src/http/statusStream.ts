import { DEFAULT_RETRY_MS } from "../events/sse.js";
import type { StructuredLogger } from "../logger.js";
import type { Subscription } from "../status/channel.js";
import { STATUS_STREAM_HEADERS, streamFrames } from "../status/encoder.js";
import type { HeartbeatConfig } from "../status/heartbeat.js";
import type { StatusHttpResponse } from "./types.js";

export interface StatusStreamOptions {
  heartbeat: HeartbeatConfig;
  retryMs?: number;
  logger: Pick<StructuredLogger, "debug" | "warn">;
}

/**
 * Writes the frames of {@link subscription} to {@link res} until either side
 * goes away. A peer disconnect closes the subscription, which wakes the pending
 * read; a closed subscription ends the response. When the socket buffer is
 * full the loop waits for `drain`, leaving the channel's bounded queue to drop
 * stale states for that subscriber.
 */
export async function pipeStatusStream(
  res: StatusHttpResponse,
  subscription: Subscription,
  options: StatusStreamOptions,
): Promise<void> {
  let peerGone = false;
  const release = () => {
    if (peerGone) {
      return;
    }
    peerGone = true;
    subscription.close();
  };
  res.on("close", release);
  res.on("error", release);

  res.writeHead(200, { ...STATUS_STREAM_HEADERS });
  let frames = 0;
  try {
    for await (const frame of streamFrames(subscription, options.heartbeat, options.retryMs ?? DEFAULT_RETRY_MS)) {
      if (peerGone) {
        break;
      }
      frames += 1;
      if (!res.write(frame)) {
        await waitForDrain(res);
      }
    }
  } finally {
    res.off("close", release);
    res.off("error", release);
    options.logger.debug("status_stream_closed", { subscription: subscription.id, frames, peer_gone: peerGone });
    if (!peerGone) {
      res.end();
    }
  }
}

function waitForDrain(res: StatusHttpResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}
