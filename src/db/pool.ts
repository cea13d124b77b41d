import { Pool } from "pg";

export interface PoolOptions {
  connectionString: string;
  connectionTimeoutMs: number;
  /** TLS without certificate verification, for hosted databases with self-signed certs. */
  ssl: boolean;
}

export function createPool(options: PoolOptions): Pool {
  const pool = new Pool({
    connectionString: options.connectionString,
    connectionTimeoutMillis: options.connectionTimeoutMs,
    ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
  });

  // Idle clients can drop when the server restarts; without a listener the
  // error would crash the process.
  pool.on("error", (err) => {
    console.error("[MealLedger] Idle database client error:", err.message);
  });

  return pool;
}
