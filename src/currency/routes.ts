// Currency REST Routes
import { Hono } from "hono";
import { listCurrencies, safeResolveCurrency } from "./currency-resolver.js";
import { ParseErrorCode } from "../parser/errors.js";

export const currencyRoutes = new Hono();

currencyRoutes.get("/", (c) => {
  return c.json({ currencies: listCurrencies() });
});

currencyRoutes.get("/:query", (c) => {
  const result = safeResolveCurrency(c.req.param("query"));
  if (!result.success) {
    const { code, message } = result.error;
    const status = code === ParseErrorCode.InvalidCurrencyQuery ? 400 : 404;
    return c.json({ error: { code, message } }, status);
  }
  return c.json(result.data);
});
