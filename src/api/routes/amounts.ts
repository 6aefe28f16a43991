import { Hono } from "hono";
import { z } from "zod";
import { env, logger } from "@/config";
import { resolveCurrency } from "@/currency";
import {
  AmountParseError,
  CurrencyLookupError,
  ParseErrorCode,
  ParseOptionsSchema,
  createAmountParser,
  createParseOptions,
  formatMinorUnits,
} from "@/parser";

const router = new Hono();

// Input validation
const parseSchema = z.object({
  amount: z.string().max(256),
  currency: z.string().max(16),
  options: ParseOptionsSchema.optional(),
});

const serverDefaults = createParseOptions({
  allowCurrencySymbol: env.PARSER_ALLOW_CURRENCY_SYMBOL,
  strictGrouping: env.PARSER_STRICT_GROUPING,
  acceptSigns: env.PARSER_ACCEPT_SIGNS,
});

// Parse a formatted amount into minor units
router.post("/parse", async (c) => {
  const body: unknown = await c.req.json().catch(() => null);

  const parsed = parseSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({
      error: { code: "VALIDATION_ERROR", message: "Invalid input", details: parsed.error.flatten() },
    }, 400);
  }

  const { amount, currency, options } = parsed.data;
  const parser = createAmountParser(createParseOptions(options, serverDefaults));
  const result = parser.safeParse(amount, currency);
  const log = logger.child({ requestId: c.get("requestId") });

  if (!result.success) {
    const { error } = result;
    log.debug({ code: error.code, currency }, "Amount rejected");

    if (error instanceof CurrencyLookupError) {
      const status = error.code === ParseErrorCode.InvalidCurrencyQuery ? 400 : 404;
      return c.json({ error: { code: error.code, message: error.message, query: error.query } }, status);
    }
    if (error instanceof AmountParseError) {
      return c.json({
        error: {
          code: error.code,
          message: error.message,
          input: error.input,
          char: error.char,
          expectedSymbol: error.expectedSymbol,
        },
      }, 422);
    }
    return c.json({ error: { code: error.code, message: error.message } }, 422);
  }

  const meta = resolveCurrency(currency);
  log.debug({ currency: meta.code }, "Amount parsed");

  return c.json({
    data: {
      minorUnits: result.data.toString(),
      currency: meta.code,
      fractionDigits: meta.fractionDigits,
      formatted: formatMinorUnits(result.data, meta),
    },
  });
});

export { router as amountRoutes };
