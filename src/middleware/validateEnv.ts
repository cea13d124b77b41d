// src/middleware/validateEnv.ts
import os from "os";
import path from "path";
import { z } from "zod";

export const DEFAULT_MELA_DB_PATH = path.join(
  os.homedir(),
  "Library/Group Containers/66JC38RDUD.recipes.mela/Data/Curcuma.sqlite"
);

/**
 * Environment variable validation schema.
 * Validates all configuration at startup.
 */
const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Meal ledger (optional - in-memory ledger when missing)
  DATABASE_URL: z.string().min(1).optional(),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DB_SSL: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),

  // Recipe database
  MELA_DB_PATH: z.string().min(1).default(DEFAULT_MELA_DB_PATH),

  // Calendar / Reminders
  MEAL_CALENDAR_NAME: z.string().min(1).default("Family"),
  GROCERY_LIST_NAME: z.string().min(1).default("Grocery"),
  OSASCRIPT_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // CORS
  ALLOWED_ORIGINS: z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean)
        : []
    ),
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

/**
 * Parse a set of environment variables without touching the cached config.
 * Throws with one line per invalid variable.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `  - ${e.path.join(".")}: ${e.message}`);
    throw new Error(`Invalid environment configuration:\n${problems.join("\n")}`);
  }
  return result.data;
}

/**
 * Validates environment variables at startup.
 * Logs warnings for optional but recommended variables.
 */
export function validateEnvironment(): Env {
  if (validatedEnv) return validatedEnv;

  validatedEnv = parseEnvironment(process.env);

  const warnings: string[] = [];

  if (!validatedEnv.DATABASE_URL) {
    warnings.push("DATABASE_URL is not set - meal history is kept in memory and lost on restart");
  }

  if (process.platform !== "darwin") {
    warnings.push("Not running on macOS - Calendar and Reminders integration will not work");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return validatedEnv;
}
