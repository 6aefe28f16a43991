// Currency Symbol Detection
// src/parser/symbols.ts

import { z } from "zod";
import rawTokens from "./symbol-tokens.json";

// Currency symbols that are plain letters or punctuation, invisible to \p{Sc}
export const DEFAULT_SYMBOL_TOKENS: readonly string[] = Object.freeze(
  z.array(z.string().min(1)).parse(rawTokens),
);

const CURRENCY_SYMBOL_CATEGORY = /\p{Sc}/u;

export type SymbolDetector = (text: string) => boolean;

/**
 * Build a detector over the built-in token list plus `extraTokens`.
 * Token matching is case-insensitive substring containment.
 */
export function createSymbolDetector(extraTokens: readonly string[] = []): SymbolDetector {
  const tokens = [...DEFAULT_SYMBOL_TOKENS];
  for (const t of extraTokens) {
    const lower = t.toLowerCase();
    if (lower !== "" && !tokens.includes(lower)) tokens.push(lower);
  }

  return (text) => {
    if (CURRENCY_SYMBOL_CATEGORY.test(text)) return true;
    const lc = text.toLowerCase();
    return tokens.some((t) => lc.includes(t));
  };
}

const defaultDetector = createSymbolDetector();

export function containsCurrencySymbol(text: string): boolean {
  return defaultDetector(text);
}
