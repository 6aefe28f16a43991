// Parse Options
// src/parser/options.ts

import { z } from "zod";
import type { ParseOptions } from "./types.js";

export const DEFAULT_PARSE_OPTIONS: Readonly<ParseOptions> = Object.freeze({
  allowCurrencySymbol: false,
  strictGrouping: false,
  acceptSigns: true,
});

// Partial options as received from untrusted callers (HTTP bodies)
export const ParseOptionsSchema = z
  .object({
    allowCurrencySymbol: z.boolean(),
    strictGrouping: z.boolean(),
    acceptSigns: z.boolean(),
  })
  .partial()
  .strict();

/**
 * Merge named switches over the defaults:
 * allowCurrencySymbol=false, strictGrouping=false, acceptSigns=true.
 */
export function createParseOptions(
  overrides: Partial<ParseOptions> = {},
  base: Readonly<ParseOptions> = DEFAULT_PARSE_OPTIONS,
): Readonly<ParseOptions> {
  return Object.freeze({
    allowCurrencySymbol: overrides.allowCurrencySymbol ?? base.allowCurrencySymbol,
    strictGrouping: overrides.strictGrouping ?? base.strictGrouping,
    acceptSigns: overrides.acceptSigns ?? base.acceptSigns,
  });
}
