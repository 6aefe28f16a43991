// Amount Parser Module
// src/parser/index.ts

export { parseMinorUnits, parseAmount, safeParseAmount, createAmountParser, pow10 } from "./amount-parser.js";
export { DEFAULT_PARSE_OPTIONS, ParseOptionsSchema, createParseOptions } from "./options.js";
export { DEFAULT_SYMBOL_TOKENS, containsCurrencySymbol, createSymbolDetector } from "./symbols.js";
export type { SymbolDetector } from "./symbols.js";
export { formatMinorUnits } from "./format.js";
export {
  ParseErrorCode,
  MoneyParseError,
  CurrencyLookupError,
  AmountParseError,
  isMoneyParseError,
} from "./errors.js";
export type { AmountParseErrorCode, CurrencyLookupErrorCode, AmountParseErrorDetails } from "./errors.js";
export type { ParseOptions, MinorUnits, ParseResult, AmountParser, AmountParserConfig } from "./types.js";
