import { describe, it, expect } from "vitest";
import { normalizeSymbol, parseHistoricalRequest } from "../request.js";
import { expectHistoryError } from "./fake-provider.js";

const validBody = {
  symbol: " aapl ",
  start_date: "2024-01-02",
  end_date: "2024-03-28",
};

describe("parseHistoricalRequest", () => {
  it("normalizes a valid body", () => {
    expect(parseHistoricalRequest(validBody)).toEqual({
      symbol: "AAPL",
      range: { start: "2024-01-02", end: "2024-03-28", interval: "daily" },
      includeBars: true,
    });
  });

  it("passes interval and include_bars through", () => {
    const query = parseHistoricalRequest({ ...validBody, interval: "1wk", include_bars: false });
    expect(query.range.interval).toBe("weekly");
    expect(query.includeBars).toBe(false);
  });

  it.each([null, [], "AAPL", 42])("rejects a %j body", async (body) => {
    const err = await expectHistoryError(() => parseHistoricalRequest(body), "InvalidRequest");
    expect(err.message).toBe("JSON body must be an object");
  });

  it("rejects an undefined body", async () => {
    const err = await expectHistoryError(() => parseHistoricalRequest(undefined), "InvalidRequest");
    expect(err.message).toBe("JSON body must be an object");
  });

  it("requires symbol", async () => {
    const err = await expectHistoryError(
      () => parseHistoricalRequest({ start_date: "2024-01-02", end_date: "2024-01-03" }),
      "InvalidRequest",
    );
    expect(err.message).toBe("'symbol' field is required");
  });

  it("requires symbol to be a string", async () => {
    const err = await expectHistoryError(() => parseHistoricalRequest({ ...validBody, symbol: 42 }), "InvalidRequest");
    expect(err.message).toBe("'symbol' must be a string");
  });

  it("requires start_date", async () => {
    const err = await expectHistoryError(
      () => parseHistoricalRequest({ symbol: "AAPL", end_date: "2024-01-03" }),
      "InvalidRequest",
    );
    expect(err.message).toBe("'start_date' field is required");
  });

  it("requires end_date", async () => {
    const err = await expectHistoryError(
      () => parseHistoricalRequest({ symbol: "AAPL", start_date: "2024-01-03" }),
      "InvalidRequest",
    );
    expect(err.message).toBe("'end_date' field is required");
  });

  it("rejects a non-boolean include_bars", async () => {
    const err = await expectHistoryError(
      () => parseHistoricalRequest({ ...validBody, include_bars: "yes" }),
      "InvalidRequest",
    );
    expect(err.message).toBe("'include_bars' must be a boolean if provided");
  });

  it("reports a non-string date as InvalidDateFormat", async () => {
    await expectHistoryError(() => parseHistoricalRequest({ ...validBody, start_date: 20240102 }), "InvalidDateFormat");
  });

  it("reports a reversed range as InvalidDateRange", async () => {
    await expectHistoryError(
      () => parseHistoricalRequest({ symbol: "AAPL", start_date: "2023-02-01", end_date: "2023-01-01" }),
      "InvalidDateRange",
    );
  });

  it("reports a bad interval as InvalidInterval", async () => {
    await expectHistoryError(() => parseHistoricalRequest({ ...validBody, interval: "2h" }), "InvalidInterval");
  });
});

describe("normalizeSymbol", () => {
  it("accepts BRK.B", () => {
    expect(normalizeSymbol("brk.b")).toBe("BRK.B");
  });

  it("accepts ^GSPC", () => {
    expect(normalizeSymbol("^GSPC")).toBe("^GSPC");
  });

  it("rejects empty string", async () => {
    const err = await expectHistoryError(() => normalizeSymbol("   "), "InvalidSymbol");
    expect(err.message).toBe("'symbol' cannot be empty");
  });

  it("rejects path traversal attempts", async () => {
    await expectHistoryError(() => normalizeSymbol("../etc/passwd"), "InvalidSymbol");
  });

  it("rejects symbols over 20 characters", async () => {
    await expectHistoryError(() => normalizeSymbol("A".repeat(21)), "InvalidSymbol");
  });
});
