import type { Logger } from "./logger.js";

/** The part of a Node HTTP/1 or HTTP/2 server that shutdown needs */
export interface ClosableServer {
  close(callback?: (error?: Error) => void): unknown;
  closeIdleConnections?: () => void;
}

/**
 * Stop accepting connections and exit once the server has closed.
 *
 * Idle keep-alive sockets are dropped straight away where the server
 * supports it, otherwise close() would wait for them to time out.
 */
export function shutdown(
  server: ClosableServer,
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  server.close((error) => {
    if (error) {
      logger.error("Failed to close server", error);
      exit(1);
      return;
    }
    exit(0);
  });
  server.closeIdleConnections?.();
}
