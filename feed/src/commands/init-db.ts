#!/usr/bin/env tsx

import chalk from 'chalk';
import { loadConfigFromEnv } from '../config';
import { createStockJob } from '../services/stock-job';

async function main() {
  const job = createStockJob(loadConfigFromEnv());

  try {
    await job.prepare();
    console.log(chalk.green('stock_data table is ready'));
  } catch (error) {
    console.error(chalk.red('Failed to initialize database:'), error);
    process.exitCode = 1;
  } finally {
    await job.close();
  }
}

main().catch(error => {
  console.error(chalk.red('Unhandled error:'), error);
  process.exit(1);
});
