/**
 * Provider registry: builds a RateProvider from configuration.
 *
 * Every provider takes a date range and a currency list and returns
 * normalized records. Per-date APIs are called once per day of the range.
 */

import { requireSetting, type AppConfig } from "../config";
import { eachDay } from "../dateUtils";
import { log } from "../logger";
import { mergeResults } from "../normalize";
import type { DateRange, NormalizeResult, ProviderId } from "../types";
import * as exchangerateApi from "./exchangerateApi";
import * as pairFeed from "./pairFeed";
import * as tradermade from "./tradermade";
import * as yahoo from "./yahoo";

export interface RateProvider {
  id: ProviderId;
  fetchRange(range: DateRange, currencies: string[]): Promise<NormalizeResult>;
}

type FetchDay = (date: string, currencies: string[]) => Promise<NormalizeResult>;

function perDay(id: ProviderId, fetchDay: FetchDay): RateProvider {
  return {
    id,
    async fetchRange(range, currencies) {
      const results: NormalizeResult[] = [];
      for (const date of eachDay(range.start, range.end)) {
        const result = await fetchDay(date, currencies);
        log({
          domain: "fetch",
          action: "response",
          provider: id,
          records: result.records.length,
          warnings: result.warnings.length,
        });
        results.push(result);
      }
      return mergeResults(results);
    },
  };
}

export function createProvider(id: ProviderId, config: AppConfig): RateProvider {
  const base = config.baseCurrency;
  switch (id) {
    case "exchangerate-api": {
      const options = { apiKey: requireSetting(config.exchangeRateApiKey, "EXCHANGE_RATE_API_KEY"), base };
      return perDay(id, (date, currencies) => exchangerateApi.fetchDay(options, date, currencies));
    }
    case "tradermade": {
      const options = { apiKey: requireSetting(config.tradermadeApiKey, "TRADERMADE_API_KEY"), base };
      return perDay(id, (date, currencies) => tradermade.fetchDay(options, date, currencies));
    }
    case "pair-feed": {
      const options = {
        url: requireSetting(config.pairFeed.url, "PAIR_FEED_URL"),
        apiKey: requireSetting(config.pairFeed.apiKey, "PAIR_FEED_API_KEY"),
        base,
      };
      return perDay(id, (date, currencies) => pairFeed.fetchDay(options, date, currencies));
    }
    case "yahoo": {
      const client = yahoo.createYahooClient({ base, requestDelayMs: config.yahooRequestDelayMs });
      return {
        id,
        async fetchRange(range, currencies) {
          const result = await yahoo.fetchRange(client, range, currencies);
          log({
            domain: "fetch",
            action: "response",
            provider: id,
            records: result.records.length,
            warnings: result.warnings.length,
          });
          return result;
        },
      };
    }
  }
}
