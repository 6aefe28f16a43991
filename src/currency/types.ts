// Currency Types
// src/currency/types.ts

import type { CurrencyLookupError } from "../parser/errors.js";

export interface CurrencyMeta {
  code: string;              // ISO 4217 alpha-3 code (EUR, USD, CLF)
  numericCode?: string;      // ISO 4217 numeric code ("978")
  grapheme: string;          // Display symbol, may be empty or several characters
  decimalSeparator: string;  // Single character
  thousandSeparator: string;
  fractionDigits: number;    // 0-9
}

export type CurrencyQueryKind = "alpha" | "numeric";

export type ResolveResult =
  | { success: true; data: CurrencyMeta }
  | { success: false; error: CurrencyLookupError };
