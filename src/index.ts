// Package entry: currency resolution and exact amount parsing.
// The HTTP server lives in ./server.ts and is not pulled in from here.

export { resolveCurrency, safeResolveCurrency, listCurrencies, classifyQuery } from "./currency/currency-resolver.js";
export type { CurrencyMeta, CurrencyQueryKind, ResolveResult } from "./currency/types.js";
export * from "./parser/index.js";
