import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

// "true" / "false" only; z.coerce.boolean() would read "false" as true
const flag = (fallback: "true" | "false") =>
  z.enum(["true", "false"]).default(fallback).transform((v) => v === "true");

export const env = createEnv({
  server: {
    // Mode
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3000),

    // Default parse options for the HTTP API; request bodies may override them
    PARSER_ALLOW_CURRENCY_SYMBOL: flag("false"),
    PARSER_STRICT_GROUPING: flag("false"),
    PARSER_ACCEPT_SIGNS: flag("true"),

    // Logging
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
