import { createServer } from "node:http";

import type { StructuredLogger } from "./logger.js";
import type { StatusRouter } from "./http/router.js";

export interface StatusServerOptions {
  host: string;
  port: number;
  router: StatusRouter;
  logger: Pick<StructuredLogger, "info" | "error">;
}

export interface StatusServerHandle {
  readonly host: string;
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Binds the status router to a `node:http` server. Closing the handle ends
 * every open status stream first so the listener can drain.
 */
export async function startStatusServer(options: StatusServerOptions): Promise<StatusServerHandle> {
  const { host, router, logger } = options;
  const server = createServer((req, res) => {
    router.handleRequest(req, res).catch((error: unknown) => {
      logger.error("http_handler_crashed", { message: error instanceof Error ? error.message : String(error) });
      if (!res.headersSent) {
        res.writeHead(500);
      }
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : options.port;
  logger.info("http_listening", { host, port });

  return {
    host,
    port,
    async close() {
      router.close();
      await new Promise<void>((resolve, reject) => {
        server.close((closeError) => {
          if (closeError) {
            reject(closeError);
          } else {
            resolve();
          }
        });
        server.closeIdleConnections();
      });
    },
  };
}
