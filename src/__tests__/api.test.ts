// HTTP API Tests (in-process, no server)
import { describe, it, expect } from "vitest";
import { createApp } from "../api/app.js";
import { listCurrencies } from "../currency/currency-resolver.js";

const app = createApp();

function postParse(body: unknown) {
  return app.request("/api/v1/amounts/parse", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("GET /health", () => {
  it("should report ok with security headers", async () => {
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
    expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
    expect(res.headers.get("Cache-Control")).toBe("no-store");
    expect(res.headers.get("X-Request-Id")).toBeTruthy();
  });
});

describe("currency routes", () => {
  it("should list currencies", async () => {
    const res = await app.request("/api/v1/currencies");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ currencies: listCurrencies() });
  });

  it("should resolve a numeric code", async () => {
    const res = await app.request("/api/v1/currencies/978");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      code: "EUR",
      numericCode: "978",
      grapheme: "€",
      decimalSeparator: ".",
      thousandSeparator: ",",
      fractionDigits: 2,
    });
  });

  it("should return 404 for an unknown code", async () => {
    const res = await app.request("/api/v1/currencies/ZZZ");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_ISO_CODE", message: "invalid ISO currency: ZZZ" },
    });
  });

  it("should return 400 for a malformed query", async () => {
    const res = await app.request("/api/v1/currencies/EURO");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_CURRENCY_QUERY", message: 'invalid currency query: "EURO"' },
    });
  });
});

describe("POST /api/v1/amounts/parse", () => {
  it("should parse with the default options", async () => {
    const res = await postParse({ amount: "1,455.00", currency: "EUR" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { minorUnits: "145500", currency: "EUR", fractionDigits: 2, formatted: "1455.00" },
    });
  });

  it("should serialize negative amounts and pad fraction digits", async () => {
    const res = await postParse({ amount: "-2,28", currency: "clf" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { minorUnits: "-22800", currency: "CLF", fractionDigits: 4, formatted: "-2,2800" },
    });
  });

  it("should honour request options", async () => {
    const res = await postParse({ amount: "€1,455.00", currency: "EUR", options: { allowCurrencySymbol: true } });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { minorUnits: "145500" } });
  });

  it("should return 422 for a symbol of another currency", async () => {
    const res = await postParse({ amount: "€1,455.00", currency: "USD", options: { allowCurrencySymbol: true } });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: {
        code: "INVALID_CURRENCY_SYMBOL",
        message: 'input "€1,455.00": invalid currency symbol, expected "$" for USD',
        input: "€1,455.00",
        expectedSymbol: "$",
      },
    });
  });

  it("should return 422 with the offending character", async () => {
    const res = await postParse({ amount: "12a3", currency: "EUR" });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: { code: "BAD_CHAR", message: 'invalid character: "a"', input: "12a3", char: "a" },
    });
  });

  it("should return 422 for mixed grouping in strict mode", async () => {
    const res = await postParse({ amount: "10 000,000.00", currency: "USD", options: { strictGrouping: true } });
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: { code: "MIXED_GROUPING", char: "," } });
  });

  it("should return 404 for an unknown currency", async () => {
    const res = await postParse({ amount: "1", currency: "ZZZ" });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_ISO_CODE", message: "invalid ISO currency: ZZZ", query: "ZZZ" },
    });
  });

  it("should return 400 for a malformed currency query", async () => {
    const res = await postParse({ amount: "1", currency: "99x" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "INVALID_CURRENCY_QUERY" } });
  });

  it.each([
    ["a numeric amount", { amount: 5, currency: "EUR" }],
    ["a missing currency", { amount: "5" }],
    ["an unknown option", { amount: "5", currency: "EUR", options: { strict: true } }],
    ["a body that is not JSON", "not json"],
  ])("should return 400 for %s", async (_name, body) => {
    const res = await postParse(body);
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR", message: "Invalid input" } });
  });
});

describe("unknown routes", () => {
  it("should return 404", async () => {
    const res = await app.request("/api/v1/nothing");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "Not found" } });
  });
});
