// Parser Types
// src/parser/types.ts

import type { MoneyParseError } from "./errors.js";

export interface ParseOptions {
  allowCurrencySymbol: boolean; // Input may carry the currency's symbol, which must then match
  strictGrouping: boolean;      // All grouping separators before the decimal point must be the same
  acceptSigns: boolean;         // Leading +, - or U+2212 accepted
}

/** Amount in the currency's smallest unit, within the signed 64-bit range */
export type MinorUnits = bigint;

export type ParseResult =
  | { success: true; data: MinorUnits }
  | { success: false; error: MoneyParseError };

export interface AmountParserConfig {
  /** Extra plain-text symbol tokens detected on top of the built-in list */
  symbolTokens?: readonly string[];
}

export interface AmountParser {
  readonly options: Readonly<ParseOptions>;
  parse(input: string, currency: string): MinorUnits;
  safeParse(input: string, currency: string): ParseResult;
}
