/**
 * Subset of `ServerResponse` used by the router. Tests drive the handlers with
 * in-memory doubles implementing the same surface.
 */
export interface StatusHttpResponse {
  readonly headersSent: boolean;
  writeHead(status: number, headers?: Record<string, string | number>): unknown;
  setHeader(name: string, value: string | number | readonly string[]): unknown;
  write(chunk: string): boolean;
  end(chunk?: string): unknown;
  on(event: "close" | "error" | "drain", listener: (...args: unknown[]) => void): unknown;
  off(event: "close" | "error" | "drain", listener: (...args: unknown[]) => void): unknown;
}
