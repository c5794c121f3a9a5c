#!/usr/bin/env tsx

import chalk from 'chalk';
import cron from 'node-cron';
import { loadConfigFromEnv } from '../config';
import { createStockJob } from '../services/stock-job';
import { formatRunSummary } from '../utils/run-summary';

async function main() {
  const config = loadConfigFromEnv();

  if (!cron.validate(config.scheduleCron)) {
    console.error(chalk.red(`Invalid SCHEDULE_CRON: ${config.scheduleCron}`));
    process.exit(1);
  }

  const job = createStockJob(config);
  let controller: AbortController | null = null;
  let running: Promise<void> | null = null;

  const runOnce = async (signal: AbortSignal) => {
    try {
      const result = await job.run({ signal });
      const [headline, ...details] = formatRunSummary(result);
      console.log(result.succeeded ? chalk.green(headline) : chalk.red(headline));
      details.forEach(line => console.log(chalk.gray(line)));
    } catch (error) {
      console.error(chalk.red('Scheduled run failed:'), error);
    }
  };

  const tick = () => {
    if (running) {
      console.log(chalk.yellow('Previous run still in progress, skipping this tick'));
      return;
    }
    const current = new AbortController();
    controller = current;
    running = runOnce(current.signal).finally(() => {
      controller = null;
      running = null;
    });
  };

  const task = cron.schedule(config.scheduleCron, tick, { timezone: 'UTC' });

  const shutdown = async (signal: string) => {
    console.log(chalk.yellow(`\nReceived ${signal}, shutting down gracefully...`));
    task.stop();
    controller?.abort();
    // Let the current symbol finish before the pool goes away
    await running;
    await job.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  console.log(chalk.green(`Scheduled ingestion for ${config.symbols.join(', ')} at "${config.scheduleCron}" (UTC)`));
}

main().catch(error => {
  console.error(chalk.red('Unhandled error:'), error);
  process.exit(1);
});
