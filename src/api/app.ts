import { Hono } from "hono";
import { logger as honoLogger } from "hono/logger";
import { requestId } from "hono/request-id";
import { env, logger } from "@/config";
import { currencyRoutes } from "@/currency";
import { amountRoutes } from "./routes/amounts";
import { apiSecurityHeaders } from "./middleware";

export function createApp() {
  const app = new Hono();

  // Global Middleware
  app.use("*", requestId());
  app.use("*", apiSecurityHeaders);

  // Development logging
  if (env.NODE_ENV === "development") {
    app.use("*", honoLogger());
  }

  app.get("/health", (c) => c.json({ status: "ok" }));

  // REST API routes
  const api = new Hono();
  api.route("/currencies", currencyRoutes);
  api.route("/amounts", amountRoutes);

  app.route("/api/v1", api);

  // 404 handler
  app.notFound((c) => c.json({ error: { code: "NOT_FOUND", message: "Not found" } }, 404));

  // Error handler
  app.onError((err, c) => {
    logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    return c.json(
      { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
      500
    );
  });

  return app;
}
