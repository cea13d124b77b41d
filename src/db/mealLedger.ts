// src/db/mealLedger.ts
// PostgreSQL meal ledger: one append/update table keyed by a serial id

import { Pool, QueryResult } from "pg";
import { NotFoundError, StorageUnavailableError } from "../domain/errors";
import { isMealStatus, MealFilter, MealRecord, MealRecordPatch, NewMealRecord } from "../domain/types";
import { Clock, systemClock } from "../utils/date";
import {
  decodeTags,
  encodeTags,
  isEmptyPatch,
  isSerialId,
  MealLedgerStore,
  tagTokens,
  validateNewMeal,
  validatePatch,
} from "./mealLedgerStore";

// ============================================================================
// SQL MIGRATIONS
// ============================================================================

export const MEAL_LEDGER_MIGRATIONS = `
CREATE TABLE IF NOT EXISTS meal_log (
  id SERIAL PRIMARY KEY,
  date TEXT NOT NULL,                  -- YYYY-MM-DD, compared as text
  title TEXT NOT NULL,
  recipe_id INTEGER,                   -- NULL = ad-hoc meal
  tags TEXT,                           -- comma-joined, NULL = untagged
  status TEXT NOT NULL DEFAULT 'cooked'
    CHECK (status IN ('planned', 'cooked', 'skipped')),
  portions INTEGER CHECK (portions IS NULL OR portions > 0),
  notes TEXT,
  created_at TIMESTAMPTZ NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_meal_log_date ON meal_log(date);
CREATE INDEX IF NOT EXISTS idx_meal_log_status ON meal_log(status);
`;

export type MealLogRow = {
  id: number;
  date: string;
  title: string;
  recipe_id: number | null;
  tags: string | null;
  status: string;
  portions: number | null;
  notes: string | null;
  created_at: Date | string;
  updated_at: Date | string;
};

const CONNECTIVITY_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "08000", // connection_exception
  "08001", // sqlclient_unable_to_establish_sqlconnection
  "08003", // connection_does_not_exist
  "08006", // connection_failure
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
]);

export function isConnectivityError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string" && CONNECTIVITY_CODES.has(code)) return true;
  return /timeout exceeded when trying to connect|Connection terminated/i.test(err.message);
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function escapeLike(token: string): string {
  return token.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export function rowToMealRecord(row: MealLogRow): MealRecord {
  if (!isMealStatus(row.status)) {
    throw new Error(`meal_log row ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: Number(row.id),
    date: row.date,
    title: row.title,
    recipeId: row.recipe_id === null ? null : Number(row.recipe_id),
    tags: decodeTags(row.tags),
    status: row.status,
    portions: row.portions === null ? null : Number(row.portions),
    notes: row.notes,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

export class PgMealLedgerStore implements MealLedgerStore {
  constructor(
    private pool: Pool,
    private clock: Clock = systemClock
  ) {}

  // --------------------------------------------------------------------------
  // Initialize schema
  // --------------------------------------------------------------------------
  async initializeSchema(): Promise<void> {
    await this.run(MEAL_LEDGER_MIGRATIONS);
    console.log("[MealLedger] Schema initialized");
  }

  async create(input: NewMealRecord): Promise<MealRecord> {
    const meal = validateNewMeal(input);
    const now = this.clock.now().toISOString();

    const result = await this.run(
      `INSERT INTO meal_log (date, title, recipe_id, tags, status, portions, notes, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING *`,
      [
        meal.date,
        meal.title,
        meal.recipeId,
        encodeTags(meal.tags),
        meal.status,
        meal.portions,
        meal.notes,
        now,
        now,
      ]
    );
    return rowToMealRecord(result.rows[0]);
  }

  async update(id: number, patch: MealRecordPatch): Promise<MealRecord> {
    const applied = validatePatch(patch);
    if (!isSerialId(id)) {
      throw new NotFoundError(`No meal with id ${id}`);
    }
    if (isEmptyPatch(applied)) {
      return this.get(id);
    }

    const sets: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    const set = (column: string, value: unknown) => {
      sets.push(`${column} = $${paramIndex}`);
      params.push(value);
      paramIndex++;
    };

    if (applied.date !== undefined) set("date", applied.date);
    if (applied.title !== undefined) set("title", applied.title);
    if (applied.recipeId !== undefined) set("recipe_id", applied.recipeId);
    if (applied.tags !== undefined) set("tags", encodeTags(applied.tags));
    if (applied.status !== undefined) set("status", applied.status);
    if (applied.portions !== undefined) set("portions", applied.portions);
    if (applied.notes !== undefined) set("notes", applied.notes);

    // updated_at never moves backwards, even if the clock does
    sets.push(`updated_at = GREATEST(updated_at, $${paramIndex}::timestamptz)`);
    params.push(this.clock.now().toISOString());
    paramIndex++;

    params.push(id);
    const result = await this.run(
      `UPDATE meal_log SET ${sets.join(", ")} WHERE id = $${paramIndex} RETURNING *`,
      params
    );
    if (result.rows.length === 0) {
      throw new NotFoundError(`No meal with id ${id}`);
    }
    return rowToMealRecord(result.rows[0]);
  }

  async get(id: number): Promise<MealRecord> {
    // out-of-range ids would fail the INTEGER cast (22003) rather than miss
    if (!isSerialId(id)) {
      throw new NotFoundError(`No meal with id ${id}`);
    }
    const result = await this.run("SELECT * FROM meal_log WHERE id = $1", [id]);
    if (result.rows.length === 0) {
      throw new NotFoundError(`No meal with id ${id}`);
    }
    return rowToMealRecord(result.rows[0]);
  }

  async find(filter: MealFilter = {}): Promise<MealRecord[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.startDate) {
      conditions.push(`date >= $${paramIndex}`);
      params.push(filter.startDate);
      paramIndex++;
    }

    if (filter.endDate) {
      conditions.push(`date <= $${paramIndex}`);
      params.push(filter.endDate);
      paramIndex++;
    }

    if (filter.status) {
      conditions.push(`status = $${paramIndex}`);
      params.push(filter.status);
      paramIndex++;
    }

    // Each token narrows the result: AND of substrings
    for (const token of tagTokens(filter.tags)) {
      conditions.push(`tags ILIKE $${paramIndex}`);
      params.push(`%${escapeLike(token)}%`);
      paramIndex++;
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.run(
      `SELECT * FROM meal_log ${where} ORDER BY date DESC, id ASC`,
      params
    );
    return result.rows.map(rowToMealRecord);
  }

  private async run(text: string, params: unknown[] = []): Promise<QueryResult<MealLogRow>> {
    try {
      return await this.pool.query<MealLogRow>(text, params);
    } catch (err) {
      if (isConnectivityError(err)) {
        const message = err instanceof Error ? err.message : String(err);
        throw new StorageUnavailableError(`Meal ledger database unavailable: ${message}`, {
          cause: err,
        });
      }
      throw err;
    }
  }
}
