import { describe, expect, it } from "vitest";
import type { RateRecord } from "../types";
import { inverseRate, toCsv } from "./csv";

const eur: RateRecord = {
  date: "2024-01-01",
  base_currency: "USD",
  quote_currency: "EUR",
  rate: "0.800000000",
  source: "yahoo",
};

describe("inverseRate", () => {
  it("formats 1 / rate with nine decimals", () => {
    expect(inverseRate("0.800000000")).toBe("1.250000000");
    expect(inverseRate("0.920000000")).toBe("1.086956522");
  });
});

describe("toCsv", () => {
  it("writes a header and one line per record", () => {
    expect(toCsv([eur])).toBe(
      "date,base_currency,quote_currency,rate,inverse_rate,source\n" +
      "2024-01-01,USD,EUR,0.800000000,1.250000000,yahoo\n",
    );
  });

  it("quotes fields containing separators", () => {
    const line = toCsv([{ ...eur, source: 'feed,"v2"' }]).split("\n")[1];
    expect(line).toBe('2024-01-01,USD,EUR,0.800000000,1.250000000,"feed,""v2"""');
  });

  it("writes only the header for no records", () => {
    expect(toCsv([])).toBe("date,base_currency,quote_currency,rate,inverse_rate,source\n");
  });
});
