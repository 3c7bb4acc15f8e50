/** Reconnection delay advertised on every frame, in milliseconds. */
export const DEFAULT_RETRY_MS = 3_000;

/**
 * Serialises a payload so it fits on a single `data:` line of a Server-Sent
 * Events stream. `JSON.stringify` leaves U+2028/U+2029 untouched, and those
 * would split the record, so they are escaped along with CR and LF. Consumers
 * still recover the original value with `JSON.parse`.
 */
export function serialiseForSse(payload: unknown): string {
  return JSON.stringify(payload)
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

/** Minimal descriptor for a single SSE frame. */
export interface SseFrame<EventName extends string = string> {
  event: EventName;
  /** Already serialised single-line payload. */
  data: string;
  retryMs?: number;
}

/** Renders one frame, terminated by the blank line that closes an SSE record. */
export function renderSseFrame<EventName extends string>(frame: SseFrame<EventName>): string {
  const retry = frame.retryMs ?? DEFAULT_RETRY_MS;
  return `retry: ${retry}\nevent: ${frame.event}\ndata: ${frame.data}\n\n`;
}
