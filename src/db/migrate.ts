import "dotenv/config";
import { PgMealLedgerStore } from "./mealLedger";
import { parseEnvironment } from "../middleware/validateEnv";
import { createPool } from "./pool";

async function migrate() {
  const env = parseEnvironment(process.env);
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL missing, nothing to migrate");
  }

  console.log("Starting database migration...\n");
  const pool = createPool({
    connectionString: env.DATABASE_URL,
    connectionTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
    ssl: env.DB_SSL,
  });

  try {
    await new PgMealLedgerStore(pool).initializeSchema();
    console.log("✅ meal_log table ready");
  } finally {
    await pool.end();
  }
}

migrate().catch((err: unknown) => {
  console.error("❌ Migration failed:", err);
  process.exit(1);
});
