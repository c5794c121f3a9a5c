import dotenv from 'dotenv';
import { OutputSize } from '@stockfeed/shared';

export type OutputSizeSetting = OutputSize | 'auto';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

export interface PipelineConfig {
  apiKey: string;
  symbols: string[];
  scheduleCron: string;
  politeDelaySeconds: number;
  dbConnection: string;
  alphaVantage: {
    baseUrl: string;
    function: string;
    outputSize: OutputSizeSetting;
    logRequests: boolean;
    timeoutMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    jitter: boolean;
  };
  database: {
    batchSize: number;
    maxRetries: number;
    retryDelayMs: number;
    statementTimeoutMs: number;
    connectionTimeoutMs: number;
    poolSize: number;
  };
  app: {
    logLevel: LogLevelName;
    concurrency: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

// Eight bind parameters per row, PostgreSQL allows 65535 per statement
const MAX_BATCH_SIZE = 8000;

const CRON_FIELD = /^[\d*/,\-A-Za-z?LW#]+$/;
const SYMBOL_PATTERN = /^[A-Z0-9.\-^=]{1,20}$/;

export function parseSymbols(value: string | undefined): string[] {
  const seen = new Set<string>();
  const symbols: string[] = [];
  for (const part of (value ?? '').split(',')) {
    const symbol = part.trim().toUpperCase();
    if (symbol && !seen.has(symbol)) {
      seen.add(symbol);
      symbols.push(symbol);
    }
  }
  return symbols;
}

function buildDatabaseUrl(env: Env): string {
  if (env.DATABASE_URL) {
    return env.DATABASE_URL;
  }
  const user = encodeURIComponent(env.POSTGRES_USER || 'stock_user');
  const password = encodeURIComponent(env.POSTGRES_PASSWORD || 'stock_pass');
  const host = env.POSTGRES_HOST || 'postgres';
  const port = env.POSTGRES_PORT || '5432';
  const db = env.POSTGRES_DB || 'stock_db';
  return `postgresql://${user}:${password}@${host}:${port}/${db}`;
}

/**
 * Build and validate the pipeline configuration from environment variables.
 * Every problem is collected before throwing so a bad deployment shows them all at once.
 */
export function loadConfig(env: Env = process.env): PipelineConfig {
  const problems: string[] = [];

  const number = (key: string, fallback: number, { min, integer = true }: { min: number; integer?: boolean }): number => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < min) {
      problems.push(`${key} must be ${integer ? 'an integer' : 'a number'} >= ${min}, got: ${raw}`);
      return fallback;
    }
    return value;
  };

  const flag = (key: string, fallback: boolean): boolean => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
    problems.push(`${key} must be true or false, got: ${raw}`);
    return fallback;
  };

  const apiKey = (env.ALPHA_VANTAGE_API_KEY ?? env.API_KEY ?? '').trim();
  if (!apiKey) {
    problems.push('Missing required environment variable: ALPHA_VANTAGE_API_KEY');
  }

  const symbols = parseSymbols(env.STOCK_SYMBOLS ?? 'AAPL');
  if (symbols.length === 0) {
    problems.push('STOCK_SYMBOLS must name at least one symbol');
  }
  const invalidSymbols = symbols.filter(symbol => !SYMBOL_PATTERN.test(symbol));
  if (invalidSymbols.length > 0) {
    problems.push(`STOCK_SYMBOLS contains invalid symbols: ${invalidSymbols.join(', ')}`);
  }

  const scheduleCron = (env.SCHEDULE_CRON ?? '0 6 * * *').trim();
  const cronFields = scheduleCron.split(/\s+/);
  if (cronFields.length < 5 || cronFields.length > 6 || !cronFields.every(field => CRON_FIELD.test(field))) {
    problems.push(`SCHEDULE_CRON is not a cron expression: ${scheduleCron}`);
  }

  const outputSizeRaw = (env.ALPHA_VANTAGE_OUTPUT_SIZE ?? 'compact').trim().toLowerCase();
  let outputSize: OutputSizeSetting = 'compact';
  if (outputSizeRaw === 'compact' || outputSizeRaw === 'full' || outputSizeRaw === 'auto') {
    outputSize = outputSizeRaw;
  } else {
    problems.push(`ALPHA_VANTAGE_OUTPUT_SIZE must be compact, full or auto, got: ${outputSizeRaw}`);
  }

  const logLevelRaw = (env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  let logLevel: LogLevelName = 'info';
  if (logLevelRaw === 'error' || logLevelRaw === 'warn' || logLevelRaw === 'info' || logLevelRaw === 'debug') {
    logLevel = logLevelRaw;
  } else {
    problems.push(`LOG_LEVEL must be one of error, warn, info, debug, got: ${logLevelRaw}`);
  }

  const backoffBaseMs = number('FETCH_BACKOFF_BASE_MS', 1000, { min: 0 });
  const backoffMaxMs = number('FETCH_BACKOFF_MAX_MS', 60000, { min: 0 });
  if (backoffMaxMs < backoffBaseMs) {
    problems.push(`FETCH_BACKOFF_MAX_MS (${backoffMaxMs}) must not be below FETCH_BACKOFF_BASE_MS (${backoffBaseMs})`);
  }

  const batchSize = number('DB_BATCH_SIZE', 500, { min: 1 });
  if (batchSize > MAX_BATCH_SIZE) {
    problems.push(`DB_BATCH_SIZE must be at most ${MAX_BATCH_SIZE}, got: ${batchSize}`);
  }

  const config: PipelineConfig = {
    apiKey,
    symbols,
    scheduleCron,
    politeDelaySeconds: number('API_POLITE_DELAY_SEC', 12, { min: 0, integer: false }),
    dbConnection: buildDatabaseUrl(env),
    alphaVantage: {
      baseUrl: env.ALPHA_VANTAGE_BASE_URL || 'https://www.alphavantage.co',
      function: env.ALPHA_VANTAGE_FUNCTION || 'TIME_SERIES_DAILY',
      outputSize,
      logRequests: flag('ALPHA_VANTAGE_LOG_REQUESTS', false),
      timeoutMs: number('FETCH_TIMEOUT_MS', 15000, { min: 1 }),
      maxAttempts: number('FETCH_MAX_RETRIES', 5, { min: 1 }),
      backoffBaseMs,
      backoffMaxMs,
      jitter: flag('FETCH_JITTER', true),
    },
    database: {
      batchSize,
      maxRetries: number('DB_MAX_RETRIES', 3, { min: 1 }),
      retryDelayMs: number('DB_RETRY_DELAY_MS', 1000, { min: 0 }),
      statementTimeoutMs: number('DB_STATEMENT_TIMEOUT_MS', 30000, { min: 1 }),
      connectionTimeoutMs: number('DB_CONNECTION_TIMEOUT_MS', 10000, { min: 1 }),
      poolSize: number('DB_POOL_SIZE', 5, { min: 1 }),
    },
    app: {
      logLevel,
      concurrency: number('PIPELINE_CONCURRENCY', 1, { min: 1 }),
    },
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}

/**
 * Load `.env` into process.env (existing variables win) and build the config
 */
export function loadConfigFromEnv(): PipelineConfig {
  dotenv.config();
  return loadConfig(process.env);
}
