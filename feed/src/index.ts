#!/usr/bin/env tsx

import chalk from 'chalk';

export * from './config';
export { PostgresConnection, createPgPool } from './db/connection';
export { AlphaVantageClient, detectRateLimit } from './services/alphavantage-client';
export { parseTimeSeries, collectRows } from './services/time-series-parser';
export { StockWriter, buildUpsertStatement, dedupeRows, isTransientStoreError } from './services/stock-writer';
export { StockPipeline } from './services/stock-pipeline';
export type { StockStore, TimeSeriesFetcher, RunOptions } from './services/stock-pipeline';
export { StockJob, createStockJob } from './services/stock-job';
export { RateLimiter, createProviderRateLimiter } from './utils/rate-limiter';
export { systemClock } from './utils/clock';
export type { Clock } from './utils/clock';

function printUsage(): void {
  console.log(chalk.blue('StockFeed - Daily Time-Series Ingestion'));
  console.log(chalk.yellow('Use npm scripts to run specific operations:'));
  console.log(chalk.gray('  npm run ingest     - Run one ingestion (exit code 1 when nothing was written)'));
  console.log(chalk.gray('  npm run schedule   - Run ingestion on SCHEDULE_CRON (UTC)'));
  console.log(chalk.gray('  npm run init-db    - Create the stock_data table'));
}

if (require.main === module) {
  printUsage();
}
