import "dotenv/config";
import { Pool } from "pg";
import { createApp } from "./app";
import { PgMealLedgerStore } from "./db/mealLedger";
import { MealLedgerStore } from "./db/mealLedgerStore";
import { createPool } from "./db/pool";
import { validateEnvironment } from "./middleware/validateEnv";
import { AppleCalendar } from "./services/integrations/appleCalendar";
import { AppleReminders } from "./services/integrations/appleReminders";
import { createAppleScriptRunner } from "./services/integrations/appleScript";
import { MelaRecipeStore } from "./services/integrations/melaRecipeStore";
import { InMemoryMealLedgerStore } from "./services/inMemoryStore";
import { MealHistoryService } from "./services/mealHistory";
import { MealPlanner } from "./services/mealPlanner";
import { MealSuggestionService } from "./services/mealSuggestions";

async function main(): Promise<void> {
  const env = validateEnvironment();

  let pool: Pool | null = null;
  let ledger: MealLedgerStore;
  if (env.DATABASE_URL) {
    pool = createPool({
      connectionString: env.DATABASE_URL,
      connectionTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
      ssl: env.DB_SSL,
    });
    const pgLedger = new PgMealLedgerStore(pool);
    await pgLedger.initializeSchema();
    ledger = pgLedger;
  } else {
    ledger = new InMemoryMealLedgerStore();
  }

  const runScript = createAppleScriptRunner(env.OSASCRIPT_TIMEOUT_MS);
  const recipes = new MelaRecipeStore(env.MELA_DB_PATH);
  const calendar = new AppleCalendar(env.MEAL_CALENDAR_NAME, runScript);
  const reminders = new AppleReminders(env.GROCERY_LIST_NAME, runScript);

  const history = new MealHistoryService(ledger);
  const app = createApp(
    {
      planner: new MealPlanner({ ledger, recipes, calendar }),
      history,
      suggestions: new MealSuggestionService(history),
      recipes,
      calendar,
      reminders,
    },
    {
      allowedOrigins: env.ALLOWED_ORIGINS,
      logRequests: env.NODE_ENV !== "test",
    }
  );

  const server = app.listen(env.PORT, () => {
    console.log(`Meal ledger backend listening on port ${env.PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      if (!pool) return;
      pool.end().catch((err: unknown) => {
        console.error("[MealLedger] Error closing database pool:", err);
      });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("❌ Failed to start server:", err);
  process.exit(1);
});
