import { describe, expect, it, vi } from "vitest";
import { fetchDay } from "./pairFeed";

const options = { url: "https://feed.example.test/rates", apiKey: "test-feed-key", base: "USD" };

describe("fetchDay", () => {
  it("sends the date and bearer key and keeps the requested currencies", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(JSON.stringify({ USD_EUR: 0.92, USD_GBP: 0.79, date: "2024-01-01" }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchDay(options, "2024-01-01", ["EUR"]);

    expect(fetchMock).toHaveBeenCalledWith("https://feed.example.test/rates?date=2024-01-01", {
      headers: { Authorization: "Bearer test-feed-key" },
    });
    expect(result.records).toEqual([
      { date: "2024-01-01", base_currency: "USD", quote_currency: "EUR", rate: "0.920000000", source: "pair-feed" },
    ]);
  });

  it("drops pairs quoted against another base", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        new Response(JSON.stringify({ EUR_USD: 1.09, USD_EUR: 0.92, date: "2024-01-01" }), { status: 200 }),
      ),
    );

    const result = await fetchDay(options, "2024-01-01", ["EUR", "USD"]);

    expect(result.records.map((r) => `${r.base_currency}_${r.quote_currency}`)).toEqual(["USD_EUR"]);
  });

  it("rejects a body that is not an object", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("[]", { status: 200 })));

    await expect(fetchDay(options, "2024-01-01", ["EUR"])).rejects.toThrow(
      "pair-feed: malformed payload: expected a JSON object",
    );
  });

  it("raises on an unauthorized response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("{}", { status: 401, statusText: "Unauthorized" })));

    await expect(fetchDay(options, "2024-01-01", ["EUR"])).rejects.toMatchObject({
      name: "ProviderError",
      status: 401,
    });
  });
});
