// Minor Unit Formatting
// src/parser/format.ts

import type { CurrencyMeta } from "../currency/types.js";
import type { MinorUnits } from "./types.js";

/**
 * Render minor units as plain digits with the currency's decimal separator
 * and no grouping, e.g. -145500n in EUR -> "-1455.00". The output parses
 * back to the same amount under the default options.
 */
export function formatMinorUnits(amount: MinorUnits, meta: Pick<CurrencyMeta, "decimalSeparator" | "fractionDigits">): string {
  const negative = amount < 0n;
  const digits = (negative ? -amount : amount).toString();
  const sign = negative ? "-" : "";

  if (meta.fractionDigits === 0) return sign + digits;

  const padded = digits.padStart(meta.fractionDigits + 1, "0");
  const intPart = padded.slice(0, padded.length - meta.fractionDigits);
  const fracPart = padded.slice(padded.length - meta.fractionDigits);
  return `${sign}${intPart}${meta.decimalSeparator}${fracPart}`;
}
