import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "@/lib/logger";

export function createRequestLoggingMiddleware(logger: Pick<Logger, "info">): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now();
    const incomingRequestId = c.req.header("x-request-id");
    const requestId = incomingRequestId?.trim() ? incomingRequestId : randomUUID();

    try {
      await next();
    } finally {
      c.header("x-request-id", requestId);
      logger.info(
        {
          requestId,
          method: c.req.method,
          path: c.req.path,
          status: c.res.status,
          durationMs: Math.round(performance.now() - start),
        },
        "request.completed",
      );
    }
  };
}
