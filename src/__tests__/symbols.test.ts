import { describe, it, expect } from "vitest";
import { DEFAULT_SYMBOL_TOKENS, containsCurrencySymbol, createSymbolDetector } from "../parser/symbols.js";

describe("containsCurrencySymbol", () => {
  it.each(["$5", "5 €", "£1", "¥100", "₹10", "100¤"])("should detect the currency sign in %s", (text) => {
    expect(containsCurrencySymbol(text)).toBe(true);
  });

  it.each(["100 kr", "CHF 10", "10 zł", "5元", "Bs. 10", "10 лв"])("should detect the plain-text symbol in %s", (text) => {
    expect(containsCurrencySymbol(text)).toBe(true);
  });

  it("should match tokens regardless of case", () => {
    expect(containsCurrencySymbol("100 KR")).toBe(true);
    expect(containsCurrencySymbol("10 Zł")).toBe(true);
  });

  it.each(["1,234.56", "-1 000", "+5", "0.00"])("should find nothing in %s", (text) => {
    expect(containsCurrencySymbol(text)).toBe(false);
  });
});

describe("createSymbolDetector", () => {
  it("should include the built-in tokens", () => {
    const detect = createSymbolDetector();
    expect(detect("100 kr")).toBe(true);
    expect(detect("5 xyz")).toBe(false);
  });

  it("should add extra tokens case-insensitively", () => {
    const detect = createSymbolDetector(["XYZ", ""]);
    expect(detect("5 xyz")).toBe(true);
    expect(detect("5 XyZ")).toBe(true);
    expect(detect("5")).toBe(false);
  });

  it("should not change the built-in list", () => {
    const before = DEFAULT_SYMBOL_TOKENS.length;
    createSymbolDetector(["abc"]);
    expect(DEFAULT_SYMBOL_TOKENS.length).toBe(before);
    expect(DEFAULT_SYMBOL_TOKENS).toContain("kr");
  });
});
