import { Pool } from "pg";
import { createComponentLogger } from "../../utils/logger.js";

const log = createComponentLogger("postgres");

export interface PostgresPoolOptions {
  /** Applied to connection setup, each query round-trip and server-side statements. */
  timeoutMs: number;
}

export function createPostgresPool(connectionString: string, options: PostgresPoolOptions): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: options.timeoutMs,
    query_timeout: options.timeoutMs,
    statement_timeout: options.timeoutMs,
  });

  // Idle clients can error when the server drops them; pg rethrows otherwise.
  pool.on("error", (error) => {
    log.error({ err: error }, "Idle PostgreSQL client error");
  });

  return pool;
}
