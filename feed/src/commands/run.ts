#!/usr/bin/env tsx

import chalk from 'chalk';
import { loadConfigFromEnv } from '../config';
import { createStockJob } from '../services/stock-job';
import { formatRunSummary } from '../utils/run-summary';

// One ingestion run for the scheduler: exit code 0 when any rows were written, 1 otherwise
async function main() {
  const config = loadConfigFromEnv();
  const job = createStockJob(config);
  const controller = new AbortController();

  const stop = (signal: string) => {
    console.log(chalk.yellow(`\nReceived ${signal}, stopping after the current symbol...`));
    controller.abort();
  };
  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  console.log(chalk.blue(`Ingesting ${config.symbols.length} symbol(s): ${config.symbols.join(', ')}`));

  try {
    const result = await job.run({ signal: controller.signal });
    const [headline, ...details] = formatRunSummary(result);
    console.log(result.succeeded ? chalk.green(headline) : chalk.red(headline));
    details.forEach(line => console.log(chalk.gray(line)));
    process.exitCode = result.succeeded ? 0 : 1;
  } catch (error) {
    console.error(chalk.red('Ingestion run failed:'), error);
    process.exitCode = 1;
  } finally {
    await job.close();
  }
}

main().catch(error => {
  console.error(chalk.red('Unhandled error:'), error);
  process.exit(1);
});
