// Parse Errors
// src/parser/errors.ts

export const ParseErrorCode = {
  EmptyInput: "EMPTY_INPUT",
  InvalidCurrencyQuery: "INVALID_CURRENCY_QUERY",
  InvalidISOCode: "INVALID_ISO_CODE",
  InvalidNumericCode: "INVALID_NUMERIC_CODE",
  SignsNotAllowed: "SIGNS_NOT_ALLOWED",
  CurrencySymbolNotAllowed: "CURRENCY_SYMBOL_NOT_ALLOWED",
  InvalidCurrencySymbol: "INVALID_CURRENCY_SYMBOL",
  MixedGrouping: "MIXED_GROUPING",
  TooManyDecimals: "TOO_MANY_DECIMALS",
  NoDigits: "NO_DIGITS",
  BadChar: "BAD_CHAR",
  AmountOutOfRange: "AMOUNT_OUT_OF_RANGE",
} as const;

export type ParseErrorCode = (typeof ParseErrorCode)[keyof typeof ParseErrorCode];

export type CurrencyLookupErrorCode =
  | typeof ParseErrorCode.InvalidCurrencyQuery
  | typeof ParseErrorCode.InvalidISOCode
  | typeof ParseErrorCode.InvalidNumericCode;

export type AmountParseErrorCode = Exclude<ParseErrorCode, CurrencyLookupErrorCode>;

/**
 * Base class for every rejection raised while resolving a currency or
 * parsing an amount. `code` is stable and meant for programmatic checks;
 * `message` is English only.
 */
export class MoneyParseError extends Error {
  constructor(
    public readonly code: ParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MoneyParseError";
  }
}

export class CurrencyLookupError extends MoneyParseError {
  constructor(
    code: CurrencyLookupErrorCode,
    public readonly query: string,
    message: string,
  ) {
    super(code, message);
    this.name = "CurrencyLookupError";
  }
}

export interface AmountParseErrorDetails {
  /** The offending character, for BAD_CHAR and MIXED_GROUPING */
  char?: string;
  /** The symbol the resolved currency expects, for INVALID_CURRENCY_SYMBOL */
  expectedSymbol?: string;
}

export class AmountParseError extends MoneyParseError {
  public readonly char?: string;
  public readonly expectedSymbol?: string;

  constructor(
    code: AmountParseErrorCode,
    public readonly input: string,
    message: string,
    details: AmountParseErrorDetails = {},
  ) {
    super(code, message);
    this.name = "AmountParseError";
    this.char = details.char;
    this.expectedSymbol = details.expectedSymbol;
  }
}

export function isMoneyParseError(value: unknown): value is MoneyParseError {
  return value instanceof MoneyParseError;
}
