// ============================================================================
// SHARED TYPES - Stock time-series ingestion
// ============================================================================

// ============================================================================
// JSON
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

// ============================================================================
// PROVIDER PAYLOADS
// ============================================================================

/**
 * Raw provider payload for one symbol. Shape is checked by the parser,
 * so nothing beyond "some JSON" is assumed here.
 */
export type RawTimeSeriesResponse = JsonValue;

export type OutputSize = 'compact' | 'full';

// ============================================================================
// DATABASE TYPES
// ============================================================================

/**
 * Exact decimal literal such as "185.0000". Kept as text so NUMERIC
 * columns receive the provider's digits unchanged.
 */
export type DecimalString = string;

export interface StockRow {
  symbol: string;
  ts: Date;
  open: DecimalString | null;
  high: DecimalString | null;
  low: DecimalString | null;
  close: DecimalString | null;
  volume: number | null;
  raw: JsonObject;
}

// ============================================================================
// ERROR TAXONOMY
// ============================================================================

export type StockFeedErrorKind =
  | 'TransientNetworkError'
  | 'RateLimited'
  | 'ProviderRejected'
  | 'MalformedEntry'
  | 'UnexpectedResponseShape'
  | 'TransientStoreError'
  | 'FatalStoreError'
  | 'Cancelled'
  | 'Unexpected';

export interface FetchError {
  kind: 'TransientNetworkError' | 'RateLimited' | 'ProviderRejected' | 'Cancelled';
  symbol: string;
  message: string;
  attempts: number;
  status?: number;
  cause?: unknown;
}

export interface ParseError {
  kind: 'UnexpectedResponseShape';
  symbol: string;
  message: string;
}

export interface WriteError {
  kind: 'FatalStoreError';
  message: string;
  attempts: number;
  /** Last cause was a transient error that outlasted the retries */
  transient: boolean;
  code?: string;
  cause?: unknown;
}

export interface SkippedEntry {
  dateKey: string;
  reason: string;
}

// ============================================================================
// PIPELINE RESULTS
// ============================================================================

export type PipelineStage = 'fetching' | 'parsing' | 'writing';

export type RunStatus = 'Succeeded' | 'PartiallyFailed' | 'Failed';

export interface SymbolOutcome {
  symbol: string;
  rowsWritten: number;
  rowsSkipped: number;
  durationMs: number;
  error?: {
    stage: PipelineStage;
    kind: StockFeedErrorKind;
    message: string;
  };
}

export interface RunResult {
  succeeded: boolean;
  rowsWritten: number;
  warnings: string[];
  status: RunStatus;
  cancelled: boolean;
  outcomes: SymbolOutcome[];
  startedAt: Date;
  finishedAt: Date;
}
