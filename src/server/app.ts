import { Hono } from "hono";
import { cors } from "hono/cors";
import type { AppContext } from "@/lib/app-context";
import { AppError } from "@/lib/errors";
import { createRequestLoggingMiddleware } from "@/server/middleware/request-logging";
import { createYouTubeRoutes } from "@/server/routes/youtube";
import { problem, statusForCode } from "@/server/http";

export type ServerAppDeps = Pick<AppContext, "config" | "logger" | "store" | "captionSource" | "insight">;

export function createServerApp(deps: ServerAppDeps) {
  const logger = deps.logger.child({ module: "http" });
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Last-Event-ID"],
    }),
  );
  app.use("*", createRequestLoggingMiddleware(logger));

  app.get("/api/health", (c) => c.json({ ok: true, sessions: deps.store.size() }));

  app.route(
    "/api",
    createYouTubeRoutes({
      insight: deps.insight,
      captionSource: deps.captionSource,
      chunking: deps.config.chunking,
      logger,
    }),
  );

  app.notFound((c) => problem(c, 404, "Not Found", `No route for ${c.req.method} ${c.req.path}`));

  app.onError((error, c) => {
    logger.error({ err: error, path: c.req.path }, "unhandled exception");

    if (error instanceof AppError) {
      const status = statusForCode(error.code);
      return problem(c, status, status < 500 ? "Client error" : "Server error", error.message);
    }

    return problem(c, 500, "Server error", error.message);
  });

  return app;
}
