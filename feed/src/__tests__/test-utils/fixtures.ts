import {
  FetchError,
  JsonObject,
  JsonValue,
  RawTimeSeriesResponse,
  Result,
  StockRow,
  WriteError,
  ok,
} from '@stockfeed/shared';
import { FetchOptions } from '../../services/alphavantage-client';
import { StockStore, TimeSeriesFetcher } from '../../services/stock-pipeline';

export function dailyEntry(open: string, high: string, low: string, close: string, volume: string): JsonObject {
  return {
    '1. open': open,
    '2. high': high,
    '3. low': low,
    '4. close': close,
    '5. volume': volume,
  };
}

export function dailySeries(symbol: string, entries: Record<string, JsonValue>): JsonObject {
  return {
    'Meta Data': {
      '1. Information': 'Daily Prices (open, high, low, close) and Volumes',
      '2. Symbol': symbol,
      '3. Last Refreshed': '2024-01-16',
      '4. Output Size': 'Compact',
      '5. Time Zone': 'US/Eastern',
    },
    'Time Series (Daily)': entries,
  };
}

/**
 * `count` consecutive January 2024 trading-day entries starting on the 2nd
 */
export function validEntries(count: number, basePrice = 180): Record<string, JsonObject> {
  const entries: Record<string, JsonObject> = {};
  for (let i = 0; i < count; i++) {
    const day = String(2 + i).padStart(2, '0');
    const price = basePrice + i;
    entries[`2024-01-${day}`] = dailyEntry(
      `${price}.0000`,
      `${price + 2}.5000`,
      `${price - 1}.2500`,
      `${price + 1}.0000`,
      String(1000000 + i)
    );
  }
  return entries;
}

export const RATE_LIMIT_NOTE =
  'Thank you for using Alpha Vantage! Our standard API call frequency is 5 calls per minute and 500 calls per day.';

/**
 * In-memory store keyed like the unique constraint, for pipeline tests
 */
export class MemoryStockStore implements StockStore {
  readonly rows = new Map<string, StockRow>();
  readonly batches: StockRow[][] = [];
  latest: Date | null = null;

  async upsert(rows: StockRow[]): Promise<Result<number, WriteError>> {
    this.batches.push(rows);
    for (const row of rows) {
      this.rows.set(`${row.symbol}|${row.ts.toISOString()}`, row);
    }
    return ok(rows.length);
  }

  async latestTimestamp(): Promise<Result<Date | null, WriteError>> {
    return ok(this.latest);
  }
}

type FetchResponse = Result<RawTimeSeriesResponse, FetchError> | ((options?: FetchOptions) => Promise<Result<RawTimeSeriesResponse, FetchError>>);

/**
 * Fetcher that answers from a fixed table of per-symbol results and records every call
 */
export class FakeFetcher implements TimeSeriesFetcher {
  readonly calls: Array<{ symbol: string; options?: FetchOptions }> = [];

  constructor(private responses: Record<string, FetchResponse>) {}

  async fetchDailyTimeSeries(symbol: string, options?: FetchOptions): Promise<Result<RawTimeSeriesResponse, FetchError>> {
    this.calls.push({ symbol, options });
    const response = this.responses[symbol];
    if (response === undefined) {
      throw new Error(`No fake response for ${symbol}`);
    }
    return typeof response === 'function' ? response(options) : response;
  }
}
