// Amount Parser
// src/parser/amount-parser.ts

import { resolveCurrency } from "../currency/currency-resolver.js";
import type { CurrencyMeta } from "../currency/types.js";
import { AmountParseError, MoneyParseError, ParseErrorCode } from "./errors.js";
import { createParseOptions, DEFAULT_PARSE_OPTIONS } from "./options.js";
import { containsCurrencySymbol, createSymbolDetector, type SymbolDetector } from "./symbols.js";
import type { AmountParser, AmountParserConfig, MinorUnits, ParseOptions, ParseResult } from "./types.js";

const NBSP = /\u00A0/g;
const MINUS_SIGN = "\u2212";

// Unicode White_Space plus U+0085; U+FEFF is not whitespace and stays in the input
const EDGE_SPACE =
  /^[\t\n\v\f\r \u0085\u00A0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]+|[\t\n\v\f\r \u0085\u00A0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]+$/g;

const INT64_MAX = 9223372036854775807n;
const INT64_MIN = -9223372036854775808n;

const POW10: readonly bigint[] = [
  1n, 10n, 100n, 1000n, 10000n, 100000n, 1000000n, 10000000n, 100000000n, 1000000000n,
];

export function pow10(n: number): bigint {
  const p = POW10[n];
  if (p === undefined) {
    throw new RangeError(`fraction digits out of range: ${n}`);
  }
  return p;
}

function isSign(ch: string | undefined): boolean {
  return ch === "+" || ch === "-" || ch === MINUS_SIGN;
}

function isGroupingChar(ch: string): boolean {
  return ch === " " || ch === "," || ch === ".";
}

function trimSpace(s: string): string {
  return s.replace(EDGE_SPACE, "");
}

function digitsToBigInt(digits: string): bigint {
  return digits === "" ? 0n : BigInt(digits);
}

/**
 * Parse a locale-formatted amount into the currency's minor units.
 * Pure and synchronous; every input rejection is an {@link AmountParseError}.
 */
export function parseMinorUnits(
  raw: string,
  meta: CurrencyMeta,
  options: Readonly<ParseOptions> = DEFAULT_PARSE_OPTIONS,
  hasCurrencySymbol: SymbolDetector = containsCurrencySymbol,
): MinorUnits {
  let s = trimSpace(raw).replace(NBSP, " ");
  if (s === "") {
    throw new AmountParseError(ParseErrorCode.EmptyInput, raw, "empty input");
  }

  const input = s;

  if (!options.allowCurrencySymbol && hasCurrencySymbol(input)) {
    throw new AmountParseError(
      ParseErrorCode.CurrencySymbolNotAllowed,
      input,
      `input "${input}": currency symbol not allowed`,
    );
  }

  if (!options.acceptSigns && isSign(input[0])) {
    throw new AmountParseError(ParseErrorCode.SignsNotAllowed, input, `input "${input}": signs not allowed`);
  }

  if (options.allowCurrencySymbol && meta.grapheme !== "") {
    const idx = s.indexOf(meta.grapheme);
    if (idx === -1) {
      throw new AmountParseError(
        ParseErrorCode.InvalidCurrencySymbol,
        input,
        `input "${input}": invalid currency symbol, expected "${meta.grapheme}" for ${meta.code}`,
        { expectedSymbol: meta.grapheme },
      );
    }
    s = trimSpace(s.slice(0, idx) + s.slice(idx + meta.grapheme.length));
  }

  let sign = 1n;
  if (options.acceptSigns && isSign(s[0])) {
    if (s[0] !== "+") sign = -1n;
    s = trimSpace(s.slice(1));
  }

  if (s === "") {
    throw new AmountParseError(ParseErrorCode.NoDigits, input, "no digits");
  }

  const decimal = [...meta.decimalSeparator][0] ?? ".";
  const fractionDigits = meta.fractionDigits;

  let intDigits = "";
  let fracDigits = "";
  let hasDecimal = false;
  let lastGrouping: string | null = null;

  for (const ch of s) {
    if (ch >= "0" && ch <= "9") {
      if (hasDecimal) fracDigits += ch;
      else intDigits += ch;
    } else if (ch === decimal && !hasDecimal && fractionDigits > 0) {
      hasDecimal = true;
    } else if (isGroupingChar(ch)) {
      // A repeated decimal separator lands here and counts as grouping
      if (options.strictGrouping) {
        const previous = lastGrouping;
        lastGrouping = ch;
        if (!hasDecimal && previous !== null && previous !== ch) {
          throw new AmountParseError(
            ParseErrorCode.MixedGrouping,
            input,
            `input "${s}": mixed grouping: "${ch}"`,
            { char: ch },
          );
        }
      }
    } else {
      throw new AmountParseError(ParseErrorCode.BadChar, input, `invalid character: "${ch}"`, { char: ch });
    }
  }

  if (intDigits === "" && fracDigits === "") {
    throw new AmountParseError(ParseErrorCode.NoDigits, input, "no digits");
  }

  if (fracDigits.length > fractionDigits) {
    throw new AmountParseError(
      ParseErrorCode.TooManyDecimals,
      input,
      `too many fractional digits: ${meta.code} takes ${fractionDigits}`,
    );
  }
  fracDigits = fracDigits.padEnd(fractionDigits, "0");

  const minor = digitsToBigInt(intDigits) * pow10(fractionDigits) + digitsToBigInt(fracDigits);
  const result = sign * minor;

  if (result > INT64_MAX || result < INT64_MIN) {
    throw new AmountParseError(
      ParseErrorCode.AmountOutOfRange,
      input,
      "amount out of range for a signed 64-bit minor-unit value",
    );
  }

  return result;
}

/**
 * Resolve `currencyQuery` and parse `input` against it.
 *
 * @example
 * parseAmount("1,455.00", "EUR"); // 145500n
 * parseAmount("€1,455.00", "EUR", { allowCurrencySymbol: true }); // 145500n
 */
export function parseAmount(
  input: string,
  currencyQuery: string,
  options: Partial<ParseOptions> = {},
): MinorUnits {
  return createAmountParser(options).parse(input, currencyQuery);
}

export function safeParseAmount(
  input: string,
  currencyQuery: string,
  options: Partial<ParseOptions> = {},
): ParseResult {
  return createAmountParser(options).safeParse(input, currencyQuery);
}

export function createAmountParser(
  options: Partial<ParseOptions> = {},
  config: AmountParserConfig = {},
): AmountParser {
  const opts = createParseOptions(options);
  const detector = config.symbolTokens ? createSymbolDetector(config.symbolTokens) : containsCurrencySymbol;

  const parse = (input: string, currency: string): MinorUnits => {
    if (trimSpace(input) === "") {
      throw new AmountParseError(ParseErrorCode.EmptyInput, input, "empty input");
    }
    const meta = resolveCurrency(currency);
    return parseMinorUnits(input, meta, opts, detector);
  };

  return {
    options: opts,
    parse,
    safeParse(input, currency) {
      try {
        return { success: true, data: parse(input, currency) };
      } catch (error) {
        if (error instanceof MoneyParseError) return { success: false, error };
        throw error;
      }
    },
  };
}
