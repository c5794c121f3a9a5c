import {
  DecimalString,
  JsonObject,
  JsonValue,
  ParseError,
  RawTimeSeriesResponse,
  Result,
  SkippedEntry,
  StockRow,
  err,
  isJsonObject,
  ok,
  parseTradingDate,
} from '@stockfeed/shared';
import {
  ALPHA_VANTAGE_ERROR_KEY,
  ALPHA_VANTAGE_INFORMATION_KEY,
  ALPHA_VANTAGE_NOTE_KEY,
  ALPHA_VANTAGE_SERIES_PREFIX,
} from '../types/alphavantage';

export type ParsedEntry = { kind: 'row'; row: StockRow } | ({ kind: 'skipped' } & SkippedEntry);

export interface ParsedTimeSeries {
  symbol: string;
  seriesKey: string;
  entryCount: number;
  /** Fresh lazy pass over the series on every call */
  entries(): Generator<ParsedEntry>;
}

// NUMERIC holds up to 131072 integer digits; an exponent of at most four digits keeps the cast in range
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d{1,4})?$/;
const MAX_DECIMAL_LENGTH = 64;
const INTEGER_PATTERN = /^\+?\d+(\.0*)?$/;
const FIELD_PREFIX = /^\d+\.\s*/;

type PriceField = 'open' | 'high' | 'low' | 'close';

/**
 * Index an entry's fields by their bare name: "1. open" and "open" both become "open"
 */
function normalizeFields(entry: JsonObject): Map<string, JsonValue> {
  const fields = new Map<string, JsonValue>();
  for (const [key, value] of Object.entries(entry)) {
    const name = key.replace(FIELD_PREFIX, '').trim().toLowerCase();
    if (!fields.has(name)) {
      fields.set(name, value);
    }
  }
  return fields;
}

export function toDecimal(value: JsonValue | undefined): DecimalString | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length <= MAX_DECIMAL_LENGTH && DECIMAL_PATTERN.test(trimmed) ? trimmed : null;
  }
  return null;
}

export function toVolume(value: JsonValue | undefined): number | null {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    parsed = Number(value.trim());
  } else {
    return null;
  }
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : null;
}

function describeShape(payload: JsonObject): string {
  const keys = Object.keys(payload).slice(0, 5);
  return keys.length > 0 ? `keys: ${keys.join(', ')}` : 'empty object';
}

/**
 * Validate the overall payload shape and hand back a lazy view over its date entries.
 * A bad entry never fails the call; only a payload that is not a series does.
 */
export function parseTimeSeries(symbol: string, raw: RawTimeSeriesResponse): Result<ParsedTimeSeries, ParseError> {
  const fail = (message: string) => err<ParsedTimeSeries, ParseError>({ kind: 'UnexpectedResponseShape', symbol, message });

  if (!isJsonObject(raw)) {
    return fail(`Expected a JSON object for ${symbol}, got ${Array.isArray(raw) ? 'array' : typeof raw}`);
  }

  const providerError = raw[ALPHA_VANTAGE_ERROR_KEY];
  if (typeof providerError === 'string') {
    return fail(`Provider error for ${symbol}: ${providerError}`);
  }

  const seriesKey = Object.keys(raw).find(key => key.startsWith(ALPHA_VANTAGE_SERIES_PREFIX));
  if (seriesKey === undefined) {
    const message = raw[ALPHA_VANTAGE_NOTE_KEY] ?? raw[ALPHA_VANTAGE_INFORMATION_KEY];
    if (typeof message === 'string') {
      return fail(`No time series for ${symbol}: ${message}`);
    }
    return fail(`No time series for ${symbol} (${describeShape(raw)})`);
  }

  const series = raw[seriesKey];
  if (!isJsonObject(series)) {
    return fail(`"${seriesKey}" for ${symbol} is not an object`);
  }

  const requested = symbol.trim().toUpperCase();

  return ok({
    symbol: requested,
    seriesKey,
    entryCount: Object.keys(series).length,
    *entries(): Generator<ParsedEntry> {
      for (const [dateKey, value] of Object.entries(series)) {
        const ts = parseTradingDate(dateKey);
        if (ts === null) {
          yield { kind: 'skipped', dateKey, reason: 'unparsable date key' };
          continue;
        }
        if (!isJsonObject(value)) {
          yield { kind: 'skipped', dateKey, reason: `entry is ${Array.isArray(value) ? 'an array' : String(value)}` };
          continue;
        }

        const fields = normalizeFields(value);
        const price = (field: PriceField) => toDecimal(fields.get(field));

        yield {
          kind: 'row',
          row: {
            symbol: requested,
            ts,
            open: price('open'),
            high: price('high'),
            low: price('low'),
            close: price('close'),
            volume: toVolume(fields.get('volume')),
            raw: value,
          },
        };
      }
    },
  });
}

/**
 * Drain one pass of a parsed series
 */
export function collectRows(parsed: ParsedTimeSeries): { rows: StockRow[]; skipped: SkippedEntry[] } {
  const rows: StockRow[] = [];
  const skipped: SkippedEntry[] = [];
  for (const entry of parsed.entries()) {
    if (entry.kind === 'row') {
      rows.push(entry.row);
    } else {
      skipped.push({ dateKey: entry.dateKey, reason: entry.reason });
    }
  }
  return { rows, skipped };
}
