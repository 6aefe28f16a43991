// Security Headers Middleware
// src/api/middleware/security-headers.ts

import type { MiddlewareHandler } from "hono";

// JSON-only API: no HTML is served, so no CSP or frame policy beyond DENY
export const apiSecurityHeaders: MiddlewareHandler = async (c, next) => {
  await next();

  c.header("X-Content-Type-Options", "nosniff");
  c.header("X-Frame-Options", "DENY");
  c.header("Referrer-Policy", "no-referrer");
  c.header("Cross-Origin-Resource-Policy", "same-origin");

  // Parsed amounts are per-request results
  if (!c.res.headers.has("Cache-Control")) {
    c.header("Cache-Control", "no-store");
  }
};
