// Currency Module
// src/currency/index.ts

export { resolveCurrency, safeResolveCurrency, listCurrencies, classifyQuery } from "./currency-resolver.js";
export { currencyRoutes } from "./routes.js";
export type { CurrencyMeta, CurrencyQueryKind, ResolveResult } from "./types.js";
