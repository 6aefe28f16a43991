import pino from "pino";
import { env } from "./env.js";

export const logger = pino({
  name: "amount-parser",
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  base: { env: env.NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
