import pLimit from 'p-limit';
import {
  FetchError,
  OutputSize,
  ParseError,
  PipelineStage,
  RawTimeSeriesResponse,
  Result,
  RunResult,
  RunStatus,
  StockFeedErrorKind,
  StockRow,
  SymbolOutcome,
  WriteError,
  describeError,
} from '@stockfeed/shared';
import { OutputSizeSetting } from '../config';
import { Clock, systemClock } from '../utils/clock';
import { Logger, createLogger } from '../utils/logger';
import { FetchOptions } from './alphavantage-client';
import { collectRows, parseTimeSeries } from './time-series-parser';

export interface TimeSeriesFetcher {
  fetchDailyTimeSeries(symbol: string, options?: FetchOptions): Promise<Result<RawTimeSeriesResponse, FetchError>>;
}

export interface StockStore {
  upsert(rows: StockRow[]): Promise<Result<number, WriteError>>;
  latestTimestamp(symbol: string): Promise<Result<Date | null, WriteError>>;
}

export interface StockPipelineOptions {
  symbols: string[];
  outputSize: OutputSizeSetting;
  concurrency: number;
}

export interface StockPipelineDeps {
  fetcher: TimeSeriesFetcher;
  store: StockStore;
  clock?: Clock;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export type PipelinePhase = 'Idle' | 'PerSymbol' | 'Aggregating' | RunStatus;

class StageError extends Error {
  constructor(
    readonly stage: PipelineStage,
    readonly kind: StockFeedErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'StageError';
  }
}

/**
 * Fetch → parse → upsert for every configured symbol. One symbol's failure
 * never stops the others; the run fails only when nothing was written at all.
 */
export class StockPipeline {
  private options: StockPipelineOptions;
  private fetcher: TimeSeriesFetcher;
  private store: StockStore;
  private clock: Clock;
  private logger: Logger;
  private phase: PipelinePhase = 'Idle';

  constructor(options: StockPipelineOptions, deps: StockPipelineDeps) {
    this.options = options;
    this.fetcher = deps.fetcher;
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('pipeline');
  }

  getPhase(): PipelinePhase {
    return this.phase;
  }

  private transition(next: PipelinePhase, data?: Record<string, unknown>): void {
    this.logger.debug('Pipeline phase change', { from: this.phase, to: next, ...data });
    this.phase = next;
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    if (this.phase === 'PerSymbol' || this.phase === 'Aggregating') {
      throw new Error('A pipeline run is already in progress');
    }

    const { signal } = options;
    const symbols = this.options.symbols;
    const startedAt = new Date(this.clock.now());
    const limit = pLimit(Math.max(1, this.options.concurrency));

    this.logger.info('Starting ingestion run', { symbols, concurrency: this.options.concurrency });
    this.transition('PerSymbol');

    const results = await Promise.all(
      symbols.map((symbol, index) =>
        limit(async (): Promise<SymbolOutcome | null> => {
          // Cancellation only takes effect between symbols
          if (signal?.aborted) {
            return null;
          }
          this.logger.info(`Processing symbol ${symbol} (${index + 1}/${symbols.length})`);
          return this.processSymbol(symbol, signal);
        })
      )
    );

    this.transition('Aggregating');

    const outcomes = results.filter((outcome): outcome is SymbolOutcome => outcome !== null);
    const notStarted = symbols.filter((_, index) => results[index] === null);
    const cancelled = notStarted.length > 0 || outcomes.some(outcome => outcome.error?.kind === 'Cancelled');
    const rowsWritten = outcomes.reduce((sum, outcome) => sum + outcome.rowsWritten, 0);
    const warnings = this.collectWarnings(outcomes, notStarted);

    let status: RunStatus;
    if (rowsWritten === 0) {
      status = 'Failed';
    } else if (cancelled || outcomes.some(outcome => outcome.error !== undefined)) {
      status = 'PartiallyFailed';
    } else {
      status = 'Succeeded';
    }

    const result: RunResult = {
      succeeded: status !== 'Failed',
      rowsWritten,
      warnings,
      status,
      cancelled,
      outcomes,
      startedAt,
      finishedAt: new Date(this.clock.now()),
    };

    this.transition(status, { rowsWritten });

    const summary = {
      status,
      rowsWritten,
      symbols: symbols.length,
      failedSymbols: outcomes.filter(outcome => outcome.error !== undefined).map(outcome => outcome.symbol),
      warnings: warnings.length,
      durationMs: result.finishedAt.getTime() - startedAt.getTime(),
    };
    if (status === 'Failed') {
      this.logger.error('Ingestion run failed: no rows written for any symbol', summary);
    } else if (status === 'PartiallyFailed') {
      this.logger.warn('Ingestion run completed with failures', summary);
    } else {
      this.logger.info('Ingestion run completed', summary);
    }

    return result;
  }

  private collectWarnings(outcomes: SymbolOutcome[], notStarted: string[]): string[] {
    const warnings: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.error) {
        warnings.push(`${outcome.symbol}: ${outcome.error.stage} failed (${outcome.error.kind}): ${outcome.error.message}`);
      } else if (outcome.rowsWritten === 0) {
        warnings.push(`${outcome.symbol}: no rows in provider response`);
      }
      if (outcome.rowsSkipped > 0) {
        warnings.push(`${outcome.symbol}: skipped ${outcome.rowsSkipped} malformed entries`);
      }
    }
    if (notStarted.length > 0) {
      warnings.push(`Run cancelled; ${notStarted.length} symbol(s) not processed: ${notStarted.join(', ')}`);
    }
    return warnings;
  }

  private async processSymbol(symbol: string, signal?: AbortSignal): Promise<SymbolOutcome> {
    const startedAt = this.clock.now();
    let stage: PipelineStage = 'fetching';
    let rowsSkipped = 0;

    try {
      const outputSize = await this.resolveOutputSize(symbol);
      const fetched = await this.fetcher.fetchDailyTimeSeries(symbol, { outputSize, signal });
      if (fetched.isErr()) {
        throw new StageError('fetching', fetched.error.kind, fetched.error.message);
      }

      stage = 'parsing';
      const parsed = parseTimeSeries(symbol, fetched.value);
      if (parsed.isErr()) {
        throw this.parseFailure(parsed.error);
      }
      const { rows, skipped } = collectRows(parsed.value);
      rowsSkipped = skipped.length;
      for (const entry of skipped) {
        this.logger.entrySkipped(symbol, entry.dateKey, entry.reason);
      }
      this.logger.debug('Parsed time series', { symbol, rows: rows.length, skipped: rowsSkipped });

      stage = 'writing';
      const written = await this.store.upsert(rows);
      if (written.isErr()) {
        throw new StageError('writing', written.error.kind, written.error.message);
      }

      const durationMs = this.clock.now() - startedAt;
      this.logger.symbolCompleted(symbol, written.value, rowsSkipped, durationMs);
      return { symbol, rowsWritten: written.value, rowsSkipped, durationMs };
    } catch (error) {
      const failure =
        error instanceof StageError ? error : new StageError(stage, 'Unexpected', describeError(error));
      this.logger.warn(`Symbol ${symbol} failed while ${failure.stage}`, {
        symbol,
        stage: failure.stage,
        kind: failure.kind,
        cause: failure.message,
      });
      return {
        symbol,
        rowsWritten: 0,
        rowsSkipped,
        durationMs: this.clock.now() - startedAt,
        error: { stage: failure.stage, kind: failure.kind, message: failure.message },
      };
    }
  }

  private parseFailure(error: ParseError): StageError {
    return new StageError('parsing', error.kind, error.message);
  }

  private async resolveOutputSize(symbol: string): Promise<OutputSize> {
    if (this.options.outputSize !== 'auto') {
      return this.options.outputSize;
    }

    const latest = await this.store.latestTimestamp(symbol);
    if (latest.isErr()) {
      this.logger.warn('Could not check stored history, requesting compact series', { symbol, cause: latest.error.message });
      return 'compact';
    }
    return latest.value === null ? 'full' : 'compact';
  }
}
