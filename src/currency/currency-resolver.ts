// Currency Resolver
// src/currency/currency-resolver.ts

import { z } from "zod";
import rawCurrencies from "./currencies.json";
import { CurrencyLookupError, ParseErrorCode } from "../parser/errors.js";
import type { CurrencyMeta, CurrencyQueryKind, ResolveResult } from "./types.js";

const currencySchema = z.object({
  code: z.string().regex(/^[A-Z]{3}$/),
  numericCode: z.string().regex(/^[0-9]{3}$/).optional(),
  grapheme: z.string(),
  decimalSeparator: z.string().refine((s) => [...s].length === 1, "must be a single character").default("."),
  thousandSeparator: z.string().default(","),
  fractionDigits: z.number().int().min(0).max(9),
});

const currencyTableSchema = z.array(currencySchema).min(1);

// Built once at module load; entries are frozen and never handed out directly
const table = currencyTableSchema.parse(rawCurrencies).map((c) => Object.freeze(c));

const byCode = new Map<string, Readonly<CurrencyMeta>>();
const byNumericCode = new Map<string, Readonly<CurrencyMeta>>();
for (const c of table) {
  byCode.set(c.code, c);
  if (c.numericCode) byNumericCode.set(c.numericCode, c);
}

function isAlpha3(s: string): boolean {
  return /^[A-Za-z]{3}$/.test(s);
}

function isNumeric(s: string): boolean {
  return /^[0-9]+$/.test(s);
}

/**
 * Classify a trimmed query as an alpha-3 or numeric currency code.
 * Returns null for anything else.
 */
export function classifyQuery(query: string): CurrencyQueryKind | null {
  if (isAlpha3(query)) return "alpha";
  if (isNumeric(query)) return "numeric";
  return null;
}

/**
 * Resolve an ISO 4217 alpha-3 code ("eur", "EUR") or numeric code ("978")
 * to the currency's metadata. The returned object is a copy.
 *
 * @throws {CurrencyLookupError}
 */
export function resolveCurrency(query: string): CurrencyMeta {
  const q = query.trim();
  if (q === "") {
    throw new CurrencyLookupError(ParseErrorCode.InvalidISOCode, q, "empty currency identifier");
  }

  switch (classifyQuery(q)) {
    case "alpha": {
      const found = byCode.get(q.toUpperCase());
      if (!found) {
        throw new CurrencyLookupError(ParseErrorCode.InvalidISOCode, q, `invalid ISO currency: ${q}`);
      }
      return { ...found };
    }
    case "numeric": {
      const found = byNumericCode.get(q);
      if (!found) {
        throw new CurrencyLookupError(ParseErrorCode.InvalidNumericCode, q, `invalid numeric code: ${q}`);
      }
      return { ...found };
    }
    default:
      throw new CurrencyLookupError(ParseErrorCode.InvalidCurrencyQuery, q, `invalid currency query: "${q}"`);
  }
}

export function safeResolveCurrency(query: string): ResolveResult {
  try {
    return { success: true, data: resolveCurrency(query) };
  } catch (error) {
    if (error instanceof CurrencyLookupError) return { success: false, error };
    throw error;
  }
}

export function listCurrencies(): CurrencyMeta[] {
  return table
    .map((c) => ({ ...c }))
    .sort((a, b) => a.code.localeCompare(b.code));
}
