import { describe, expect, it, vi } from "vitest";
import { ProviderError } from "../errors";
import { fetchDay, historyUrl, parseHistoryResponse } from "./exchangerateApi";

const jsonResponse = (body: unknown, status = 200, statusText = "OK"): Response =>
  new Response(JSON.stringify(body), { status, statusText });

const options = { apiKey: "test-key", base: "USD" };

describe("parseHistoryResponse", () => {
  it("returns conversion_rates on success", () => {
    expect(parseHistoryResponse({ result: "success", conversion_rates: { EUR: 0.9 } })).toEqual({ EUR: 0.9 });
  });

  it("raises the API error type", () => {
    expect(() => parseHistoryResponse({ result: "error", "error-type": "invalid-key" })).toThrow(
      "exchangerate-api: API returned error: invalid-key",
    );
  });

  it("rejects envelopes without a result field", () => {
    expect(() => parseHistoryResponse({ rates: {} })).toThrow(/malformed payload: result: Required/);
  });
});

describe("historyUrl", () => {
  it("splits the date into path segments", () => {
    expect(historyUrl("test-key", "USD", "2024-01-05")).toBe(
      "https://v6.exchangerate-api.com/v6/test-key/history/USD/2024/01/05",
    );
  });
});

describe("fetchDay", () => {
  it("normalizes the requested currencies", async () => {
    const fetchMock = vi.fn(async (_url: string) =>
      jsonResponse({ result: "success", conversion_rates: { EUR: 0.9, JPY: 145.5, GBP: 0.79 } }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchDay(options, "2024-01-05", ["EUR", "JPY"]);

    expect(fetchMock.mock.calls[0][0]).toBe("https://v6.exchangerate-api.com/v6/test-key/history/USD/2024/01/05");
    expect(result.records.map((r) => [r.quote_currency, r.rate, r.source])).toEqual([
      ["EUR", "0.900000000", "exchangerate-api"],
      ["JPY", "145.500000000", "exchangerate-api"],
    ]);
    expect(result.warnings).toEqual([]);
  });

  it("logs the request URL without the key", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ result: "success", conversion_rates: {} })));
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    await fetchDay(options, "2024-01-05", ["EUR"]);

    expect(JSON.parse(String(info.mock.calls[0][0]))).toEqual({
      domain: "fetch",
      action: "request",
      provider: "exchangerate-api",
      url: "https://v6.exchangerate-api.com/v6/***/history/USD/2024/01/05",
    });
  });

  it("raises ProviderError on HTTP 500", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({}, 500, "Internal Server Error")));

    const error = await fetchDay(options, "2024-01-05", ["EUR"]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: "exchangerate-api: API error: 500 Internal Server Error",
      provider: "exchangerate-api",
      status: 500,
    });
  });

  it("reads the error type from a 403 body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ result: "error", "error-type": "inactive-account" }, 403, "Forbidden")),
    );

    await expect(fetchDay(options, "2024-01-05", ["EUR"])).rejects.toThrow(
      "exchangerate-api: API returned error: inactive-account",
    );
  });

  it("wraps network failures", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(new Error("getaddrinfo ENOTFOUND"))));

    await expect(fetchDay(options, "2024-01-05", ["EUR"])).rejects.toThrow(
      "exchangerate-api: request failed: getaddrinfo ENOTFOUND",
    );
  });

  it("rejects a body that is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>", { status: 200 })));

    await expect(fetchDay(options, "2024-01-05", ["EUR"])).rejects.toThrow(/exchangerate-api: response is not JSON/);
  });
});
