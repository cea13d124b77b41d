// src/db/mealLedgerStore.ts
// Storage contract for the meal ledger, plus the rules every backend shares:
// input validation, tag encoding and filter semantics.

import { ValidationError } from "../domain/errors";
import {
  isMealStatus,
  MealFilter,
  MealRecord,
  MealRecordPatch,
  MealStatus,
  NewMealRecord,
} from "../domain/types";
import { isDateOnly } from "../utils/date";

/** Upper bound of the SERIAL / INTEGER id columns. */
export const MAX_SERIAL_ID = 2147483647;

export interface MealLedgerStore {
  create(input: NewMealRecord): Promise<MealRecord>;
  update(id: number, patch: MealRecordPatch): Promise<MealRecord>;
  get(id: number): Promise<MealRecord>;
  /** Ordered by date descending, then id ascending. */
  find(filter?: MealFilter): Promise<MealRecord[]>;
}

export interface ValidatedNewMeal {
  date: string;
  title: string;
  recipeId: number | null;
  tags: string[];
  status: MealStatus;
  portions: number | null;
  notes: string | null;
}

/** Fields of a patch that will actually be written. */
export type AppliedPatch = Partial<Omit<ValidatedNewMeal, "recipeId">> & { recipeId?: number };

// ---------------------------------------------------------------------------
// Tags
// ---------------------------------------------------------------------------

/** Ordered set: split on commas, trim, drop empties, keep first occurrence. */
export function normalizeTags(tags: readonly string[] | null | undefined): string[] {
  const out: string[] = [];
  for (const raw of tags ?? []) {
    for (const piece of raw.split(",")) {
      const tag = piece.trim();
      if (tag && !out.includes(tag)) out.push(tag);
    }
  }
  return out;
}

export function encodeTags(tags: readonly string[]): string | null {
  return tags.length > 0 ? tags.join(",") : null;
}

export function decodeTags(encoded: string | null | undefined): string[] {
  return encoded ? normalizeTags([encoded]) : [];
}

/** Tag filter tokens; blank tokens are dropped. */
export function tagTokens(tags: readonly string[] | undefined): string[] {
  return (tags ?? []).map((t) => t.trim()).filter((t) => t.length > 0);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function requireDate(date: unknown): string {
  if (typeof date !== "string" || !isDateOnly(date)) {
    throw new ValidationError(`date must be a YYYY-MM-DD calendar date, got ${JSON.stringify(date)}`);
  }
  return date;
}

function requireTitle(title: unknown): string {
  if (typeof title !== "string" || title.trim().length === 0) {
    throw new ValidationError("title is required");
  }
  return title.trim();
}

function requireStatus(status: unknown): MealStatus {
  if (!isMealStatus(status)) {
    throw new ValidationError(
      `status must be one of planned, cooked, skipped, got ${JSON.stringify(status)}`
    );
  }
  return status;
}

function requirePortions(portions: unknown): number {
  if (typeof portions !== "number" || !Number.isInteger(portions) || portions < 1) {
    throw new ValidationError("portions must be a positive integer");
  }
  return portions;
}

/** Whether the value fits an id column (positive 32-bit integer). */
export function isSerialId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= MAX_SERIAL_ID;
}

function requireRecipeId(recipeId: unknown): number {
  if (!isSerialId(recipeId)) {
    throw new ValidationError(`recipeId must be an integer between 1 and ${MAX_SERIAL_ID}`);
  }
  return recipeId;
}

export function validateNewMeal(input: NewMealRecord): ValidatedNewMeal {
  return {
    date: requireDate(input.date),
    title: requireTitle(input.title),
    recipeId: input.recipeId == null ? null : requireRecipeId(input.recipeId),
    tags: normalizeTags(input.tags),
    status: input.status === undefined ? "cooked" : requireStatus(input.status),
    portions: input.portions == null ? null : requirePortions(input.portions),
    notes: input.notes ?? null,
  };
}

/**
 * Reduce a patch to the fields that will be written. Absent and null fields
 * are skipped; an empty result means the update is a no-op.
 */
export function validatePatch(patch: MealRecordPatch): AppliedPatch {
  const applied: AppliedPatch = {};
  if (patch.date != null) applied.date = requireDate(patch.date);
  if (patch.title != null) applied.title = requireTitle(patch.title);
  if (patch.recipeId != null) applied.recipeId = requireRecipeId(patch.recipeId);
  if (patch.tags != null) applied.tags = normalizeTags(patch.tags);
  if (patch.status != null) applied.status = requireStatus(patch.status);
  if (patch.portions != null) applied.portions = requirePortions(patch.portions);
  if (patch.notes != null) applied.notes = patch.notes;
  return applied;
}

export function isEmptyPatch(applied: AppliedPatch): boolean {
  return Object.keys(applied).length === 0;
}

// ---------------------------------------------------------------------------
// Filtering (the in-process reference for what the SQL backend does)
// ---------------------------------------------------------------------------

export function matchesFilter(record: MealRecord, filter: MealFilter): boolean {
  if (filter.startDate && record.date < filter.startDate) return false;
  if (filter.endDate && record.date > filter.endDate) return false;
  if (filter.status && record.status !== filter.status) return false;

  const tokens = tagTokens(filter.tags);
  if (tokens.length > 0) {
    const encoded = encodeTags(record.tags);
    if (encoded === null) return false;
    const haystack = encoded.toLowerCase();
    return tokens.every((token) => haystack.includes(token.toLowerCase()));
  }
  return true;
}

export function compareByDateDesc(a: MealRecord, b: MealRecord): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  return a.id - b.id;
}
