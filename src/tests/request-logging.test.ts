import { Hono } from "hono";
import { describe, expect, it, vi } from "vitest";
import { createRequestLoggingMiddleware } from "@/server/middleware/request-logging";

function createTestApp(logger: { info: ReturnType<typeof vi.fn> }) {
  const app = new Hono();
  app.use("*", createRequestLoggingMiddleware(logger));
  app.get("/api/health", (c) => c.json({ ok: true }));
  return app;
}

describe("request logging", () => {
  it("adds a request id when missing and logs the outcome", async () => {
    const logger = { info: vi.fn() };
    const app = createTestApp(logger);

    const response = await app.request("/api/health");

    expect(response.status).toBe(200);
    expect(response.headers.get("x-request-id")).toBeTruthy();
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ method: "GET", path: "/api/health", status: 200 }),
      "request.completed",
    );
  });

  it("echoes incoming request ids", async () => {
    const logger = { info: vi.fn() };
    const app = createTestApp(logger);

    const response = await app.request("/api/health", { headers: { "x-request-id": "req-test-1" } });

    expect(response.headers.get("x-request-id")).toBe("req-test-1");
    expect(logger.info).toHaveBeenCalledWith(expect.objectContaining({ requestId: "req-test-1" }), "request.completed");
  });
});
