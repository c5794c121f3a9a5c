import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { describeError } from '@stockfeed/shared';
import { PipelineConfig } from '../config';
import { Clock, systemClock } from '../utils/clock';
import { Logger, createLogger } from '../utils/logger';

interface ConnectionHealth {
  isConnected: boolean;
  lastSuccessfulQuery: Date | null;
  totalQueries: number;
  totalErrors: number;
  connectionAttempts: number;
  uptime: number;
}

export type ConnectionOptions = Pick<PipelineConfig['database'], 'statementTimeoutMs' | 'connectionTimeoutMs' | 'poolSize'> & {
  connectionString: string;
};

// The slice of pg.Pool the connection uses; pools from other pg-compatible drivers fit too
export type PgPool = Pick<Pool, 'query' | 'connect' | 'end'>;

export type PoolFactory = (options: ConnectionOptions) => PgPool;

export interface ConnectionDeps {
  poolFactory?: PoolFactory;
  clock?: Clock;
  logger?: Logger;
}

const CONNECT_ATTEMPTS = 5;

export const createPgPool: PoolFactory = options => {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.poolSize,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: options.connectionTimeoutMs,
    statement_timeout: options.statementTimeoutMs,
    query_timeout: options.statementTimeoutMs + 5000,
  });
  pool.on('error', error => {
    console.error('Unexpected idle pool client error:', error.message);
  });
  return pool;
};

export class PostgresConnection {
  private pool: PgPool | null = null;
  private options: ConnectionOptions;
  private poolFactory: PoolFactory;
  private clock: Clock;
  private logger: Logger;
  private isConnected = false;
  private lastSuccessfulQuery: Date | null = null;
  private totalQueries = 0;
  private totalErrors = 0;
  private connectionAttempts = 0;
  private startTime = Date.now();

  constructor(options: ConnectionOptions, deps: ConnectionDeps = {}) {
    this.options = options;
    this.poolFactory = deps.poolFactory ?? createPgPool;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('database');
  }

  private getPool(): PgPool {
    if (!this.pool) {
      this.pool = this.poolFactory(this.options);
    }
    return this.pool;
  }

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    for (let attempt = 1; attempt <= CONNECT_ATTEMPTS; attempt++) {
      this.connectionAttempts++;
      try {
        this.logger.info(`Attempting to connect to PostgreSQL (attempt ${attempt}/${CONNECT_ATTEMPTS})`);
        await this.getPool().query('SELECT 1');
        this.isConnected = true;
        this.lastSuccessfulQuery = new Date();
        this.logger.info('Connected to PostgreSQL');
        return;
      } catch (error) {
        this.totalErrors++;

        if (attempt >= CONNECT_ATTEMPTS) {
          this.logger.error(
            'Failed to connect to PostgreSQL after all retry attempts',
            { attempts: attempt },
            error instanceof Error ? error : undefined
          );
          throw error;
        }

        // Exponential backoff, max 10s
        const delay = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
        this.logger.warn(`Failed to connect to PostgreSQL, retrying in ${delay}ms`, {
          attempt,
          maxAttempts: CONNECT_ATTEMPTS,
          cause: describeError(error),
        });
        await this.clock.sleep(delay);
      }
    }
  }

  async disconnect(): Promise<void> {
    this.isConnected = false;
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
    }
    this.logger.info('Disconnected from PostgreSQL');
  }

  public getHealthStatus(): ConnectionHealth {
    return {
      isConnected: this.isConnected,
      lastSuccessfulQuery: this.lastSuccessfulQuery,
      totalQueries: this.totalQueries,
      totalErrors: this.totalErrors,
      connectionAttempts: this.connectionAttempts,
      uptime: Date.now() - this.startTime,
    };
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>> {
    if (!this.isConnected) {
      throw new Error('Database not connected');
    }

    this.totalQueries++;
    try {
      const result = await this.getPool().query<R>(text, params);
      this.lastSuccessfulQuery = new Date();
      return result;
    } catch (error) {
      this.totalErrors++;
      throw error;
    }
  }

  /**
   * Run fn inside BEGIN/COMMIT on one pooled client. Any error rolls the
   * transaction back and is rethrown; the client is discarded if rollback fails.
   */
  async withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    if (!this.isConnected) {
      throw new Error('Database not connected');
    }

    const client = await this.getPool().connect();
    let releaseError: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      this.totalQueries++;
      this.lastSuccessfulQuery = new Date();
      return result;
    } catch (error) {
      this.totalErrors++;
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(describeError(rollbackError));
        this.logger.warn('Rollback failed, discarding client', { cause: releaseError.message });
      }
      throw error;
    } finally {
      client.release(releaseError);
    }
  }

  async executeSchema(): Promise<void> {
    const fs = await import('fs/promises');
    const path = await import('path');

    try {
      const schemaPath = path.join(__dirname, 'schema.sql');
      const schema = await fs.readFile(schemaPath, 'utf-8');

      // Split by semicolon and execute each statement
      const statements = schema.split(';').filter(stmt => stmt.trim());

      for (const statement of statements) {
        await this.query(statement);
      }

      this.logger.info('Database schema initialized');
    } catch (error) {
      this.logger.error('Error executing schema', {}, error instanceof Error ? error : undefined);
      throw error;
    }
  }
}
