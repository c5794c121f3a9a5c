import { PoolClient } from 'pg';
import { Result, StockRow, WriteError, describeError, err, ok } from '@stockfeed/shared';
import { PipelineConfig } from '../config';
import { PostgresConnection } from '../db/connection';
import { Clock, systemClock } from '../utils/clock';
import { Logger, createLogger } from '../utils/logger';

export type StockWriterOptions = Pick<PipelineConfig['database'], 'batchSize' | 'maxRetries' | 'retryDelayMs'>;

export interface StockWriterDeps {
  clock?: Clock;
  logger?: Logger;
}

export const STOCK_TABLE = 'stock_data';

const COLUMNS = ['symbol', 'ts', 'open', 'high', 'low', 'close', 'volume', 'raw'] as const;
const CASTS: Record<(typeof COLUMNS)[number], string> = {
  symbol: 'text',
  ts: 'timestamptz',
  open: 'numeric',
  high: 'numeric',
  low: 'numeric',
  close: 'numeric',
  volume: 'bigint',
  raw: 'jsonb',
};

// SQLSTATEs worth retrying: connection exceptions (class 08) are matched by prefix
const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '53300', '57P01', '57P02', '57P03']);
const TRANSIENT_MESSAGE = /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EPIPE|Connection terminated|connection timeout|timeout exceeded when trying to connect/i;

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isTransientStoreError(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined) {
    if (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code)) {
      return true;
    }
    if (code === 'ECONNRESET' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT' || code === 'EPIPE') {
      return true;
    }
  }
  return error instanceof Error && TRANSIENT_MESSAGE.test(error.message);
}

/**
 * Keep the last row per (symbol, ts). One INSERT ... ON CONFLICT statement may not touch the same key twice.
 */
export function dedupeRows(rows: StockRow[]): StockRow[] {
  const byKey = new Map<string, StockRow>();
  for (const row of rows) {
    const key = `${row.symbol}|${row.ts.getTime()}`;
    byKey.delete(key);
    byKey.set(key, row);
  }
  return [...byKey.values()];
}

export function buildUpsertStatement(rows: StockRow[]): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const tuples = rows.map(row => {
    const placeholders = COLUMNS.map(column => {
      values.push(column === 'ts' ? row.ts.toISOString() : column === 'raw' ? JSON.stringify(row.raw) : row[column]);
      return `$${values.length}::${CASTS[column]}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  const text = `INSERT INTO ${STOCK_TABLE} (${COLUMNS.join(', ')})
VALUES ${tuples.join(',\n       ')}
ON CONFLICT (symbol, ts) DO UPDATE
  SET open = EXCLUDED.open,
      high = EXCLUDED.high,
      low = EXCLUDED.low,
      close = EXCLUDED.close,
      volume = EXCLUDED.volume,
      raw = EXCLUDED.raw`;

  return { text, values };
}

export class StockWriter {
  private db: PostgresConnection;
  private options: StockWriterOptions;
  private clock: Clock;
  private logger: Logger;

  constructor(db: PostgresConnection, options: StockWriterOptions, deps: StockWriterDeps = {}) {
    this.db = db;
    this.options = options;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('writer');
  }

  /**
   * Upsert a batch in one transaction, chunked into multi-row statements.
   * Transient failures retry the whole transaction; nothing is left half-written.
   */
  async upsert(rows: StockRow[]): Promise<Result<number, WriteError>> {
    if (rows.length === 0) {
      return ok(0);
    }

    const batch = dedupeRows(rows);
    const batchSize = Math.max(1, this.options.batchSize);
    const maxAttempts = Math.max(1, this.options.maxRetries);
    const chunkCount = Math.ceil(batch.length / batchSize);

    if (batch.length < rows.length) {
      this.logger.warn('Dropped duplicate rows from batch', { received: rows.length, kept: batch.length });
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const startedAt = this.clock.now();
      try {
        const affected = await this.db.withTransaction(client => this.writeChunks(client, batch, batchSize));
        this.logger.databaseOperation(
          'upsert',
          { rows: batch.length, affected, chunks: chunkCount, attempt },
          this.clock.now() - startedAt
        );
        return ok(batch.length);
      } catch (error) {
        const transient = isTransientStoreError(error);
        const cause = describeError(error);

        if (transient && attempt < maxAttempts) {
          this.logger.warn('Transient store error, retrying batch', {
            attempt,
            maxAttempts,
            delayMs: this.options.retryDelayMs,
            rows: batch.length,
            code: errorCode(error),
            cause,
          });
          await this.clock.sleep(this.options.retryDelayMs);
          continue;
        }

        this.logger.databaseOperation(
          'upsert',
          { rows: batch.length, attempt, code: errorCode(error) },
          this.clock.now() - startedAt,
          error instanceof Error ? error : new Error(cause)
        );
        return err({
          kind: 'FatalStoreError',
          message: transient ? `Upsert failed after ${attempt} attempts: ${cause}` : `Upsert failed: ${cause}`,
          attempts: attempt,
          transient,
          code: errorCode(error),
          cause: error,
        });
      }
    }

    // maxAttempts >= 1, the loop always returns
    return err({ kind: 'FatalStoreError', message: 'Upsert was not attempted', attempts: 0, transient: false });
  }

  private async writeChunks(client: PoolClient, batch: StockRow[], batchSize: number): Promise<number> {
    let affected = 0;
    for (let i = 0; i < batch.length; i += batchSize) {
      const { text, values } = buildUpsertStatement(batch.slice(i, i + batchSize));
      const result = await client.query(text, values);
      affected += result.rowCount ?? 0;
    }
    return affected;
  }

  /**
   * Newest stored timestamp for a symbol, or null when it has no rows yet
   */
  async latestTimestamp(symbol: string): Promise<Result<Date | null, WriteError>> {
    try {
      const result = await this.db.query<{ latest: Date | string | null }>(
        `SELECT MAX(ts) AS latest FROM ${STOCK_TABLE} WHERE symbol = $1`,
        [symbol]
      );
      const latest = result.rows[0]?.latest ?? null;
      return ok(latest === null ? null : new Date(latest));
    } catch (error) {
      return err({
        kind: 'FatalStoreError',
        message: `Could not read latest timestamp for ${symbol}: ${describeError(error)}`,
        attempts: 1,
        transient: isTransientStoreError(error),
        code: errorCode(error),
        cause: error,
      });
    }
  }
}
