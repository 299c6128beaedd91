import { Pool, type PoolConfig } from "pg";

import type { PostgresConfig } from "../config/schema.js";
import { appLogger, normalizeError } from "../observability/logger.js";

/**
 * The single query shape the store and audit sink rely on. A pg `Pool`
 * satisfies it through `asQueryable`; tests supply an in-process fake.
 */
export type Queryable = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
};

export function asQueryable(pool: Pool): Queryable {
  return {
    query: (text, values) => pool.query(text, values),
  };
}

export function createPostgresPool(config: PostgresConfig): Pool {
  if (!config.url) {
    throw new Error("POSTGRES_URL must be configured for the postgres store backend");
  }
  const poolConfig: PoolConfig = {
    connectionString: config.url,
    max: config.maxConnections,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  };
  if (config.statementTimeoutMs > 0) {
    poolConfig.statement_timeout = config.statementTimeoutMs;
    poolConfig.query_timeout = config.statementTimeoutMs;
  }
  const pool = new Pool(poolConfig);
  pool.on("error", (error: Error) => {
    appLogger.error(
      { err: normalizeError(error), event: "postgres.pool.error" },
      "Postgres connection pool emitted an error",
    );
  });
  return pool;
}

export async function closePostgresPool(pool: Pool): Promise<void> {
  await pool.end().catch((error: unknown) => {
    appLogger.warn(
      { err: normalizeError(error), event: "postgres.pool.close_failed" },
      "Failed to close Postgres connection pool",
    );
  });
}
