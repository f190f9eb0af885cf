/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./database.schema.ts next to the migrations.
 *
 * HOW TO USE:
 * - di.ts calls createDb(config.databaseUrl) once per process.
 * - Tests build the same Kysely instance over an in-process pool (createDbFromPool).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import type { PostgresPool } from 'kysely';

import type { DB } from './database.schema';

// int8 (bigserial ids, category ids) as JS numbers instead of strings.
const INT8_OID = 20;
pg.types.setTypeParser(INT8_OID, (value: string) => Number.parseInt(value, 10));

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for the main DB and for transactions (including RLS-scoped ones).
 */
export type DbExecutor = Kysely<DB>;

export function createDbFromPool(pool: PostgresPool): Db {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return createDbFromPool(pool);
}
