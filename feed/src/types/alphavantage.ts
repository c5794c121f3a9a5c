// Alpha Vantage API types

import { OutputSize } from '@stockfeed/shared';

export interface AlphaVantageQueryParams {
  function: string;
  symbol: string;
  outputsize: OutputSize;
  datatype: 'json';
}

// Top-level keys the provider uses for in-band messages instead of data
export const ALPHA_VANTAGE_NOTE_KEY = 'Note';
export const ALPHA_VANTAGE_INFORMATION_KEY = 'Information';
export const ALPHA_VANTAGE_ERROR_KEY = 'Error Message';
export const ALPHA_VANTAGE_SERIES_PREFIX = 'Time Series';
