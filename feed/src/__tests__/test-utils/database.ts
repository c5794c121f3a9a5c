import { newDb } from 'pg-mem';
import { PgPool, PoolFactory } from '../../db/connection';

/**
 * In-process PostgreSQL stand-in. Each call gets its own empty database.
 */
export function createMemoryPoolFactory(): { poolFactory: PoolFactory; pools: PgPool[] } {
  const db = newDb();
  const { Pool } = db.adapters.createPg();
  const pools: PgPool[] = [];

  const poolFactory: PoolFactory = () => {
    const pool: PgPool = new Pool();
    pools.push(pool);
    return pool;
  };

  return { poolFactory, pools };
}
