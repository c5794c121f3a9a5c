import { RunResult } from '@stockfeed/shared';
import { PipelineConfig } from '../config';
import { PoolFactory, PostgresConnection } from '../db/connection';
import { Clock, systemClock } from '../utils/clock';
import { Logger, createLogger, toLogLevel } from '../utils/logger';
import { createProviderRateLimiter } from '../utils/rate-limiter';
import { AlphaVantageClient } from './alphavantage-client';
import { RunOptions, StockPipeline, TimeSeriesFetcher } from './stock-pipeline';
import { StockWriter } from './stock-writer';

export interface StockJobDeps {
  clock?: Clock;
  logger?: Logger;
  poolFactory?: PoolFactory;
  fetcher?: TimeSeriesFetcher;
}

/**
 * Everything one run needs, built once from the config and torn down with close()
 */
export class StockJob {
  readonly database: PostgresConnection;
  readonly writer: StockWriter;
  readonly pipeline: StockPipeline;
  private schemaReady = false;
  private logger: Logger;

  constructor(config: PipelineConfig, deps: StockJobDeps = {}) {
    const clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('stock-job', toLogLevel(config.app.logLevel));

    this.database = new PostgresConnection(
      {
        connectionString: config.dbConnection,
        statementTimeoutMs: config.database.statementTimeoutMs,
        connectionTimeoutMs: config.database.connectionTimeoutMs,
        poolSize: config.database.poolSize,
      },
      { poolFactory: deps.poolFactory, clock, logger: this.logger.child('database') }
    );

    this.writer = new StockWriter(this.database, config.database, { clock, logger: this.logger.child('writer') });

    const fetcher =
      deps.fetcher ??
      new AlphaVantageClient(
        { apiKey: config.apiKey, ...config.alphaVantage },
        {
          rateLimiter: createProviderRateLimiter(config.politeDelaySeconds, clock),
          clock,
          logger: this.logger.child('alphavantage'),
        }
      );

    this.pipeline = new StockPipeline(
      {
        symbols: config.symbols,
        outputSize: config.alphaVantage.outputSize,
        concurrency: config.app.concurrency,
      },
      { fetcher, store: this.writer, clock, logger: this.logger.child('pipeline') }
    );
  }

  /**
   * Connect and create the table if needed. Safe to call repeatedly.
   */
  async prepare(): Promise<void> {
    await this.database.connect();
    if (!this.schemaReady) {
      await this.database.executeSchema();
      this.schemaReady = true;
    }
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    await this.prepare();
    return this.pipeline.run(options);
  }

  async close(): Promise<void> {
    this.logger.info('Database health at shutdown', { ...this.database.getHealthStatus() });
    await this.database.disconnect();
  }
}

export function createStockJob(config: PipelineConfig, deps: StockJobDeps = {}): StockJob {
  return new StockJob(config, deps);
}
