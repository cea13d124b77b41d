export const MEAL_STATUSES = ["planned", "cooked", "skipped"] as const;

export type MealStatus = (typeof MEAL_STATUSES)[number];

export interface MealRecord {
  id: number;
  date: string; // YYYY-MM-DD
  title: string;
  recipeId: number | null; // null = ad-hoc meal
  tags: string[];
  status: MealStatus;
  portions: number | null;
  notes: string | null;
  createdAt: string; // ISO
  updatedAt: string; // ISO
}

export interface NewMealRecord {
  date: string;
  title: string;
  recipeId?: number | null;
  tags?: string[] | null;
  status?: MealStatus;
  portions?: number | null;
  notes?: string | null;
}

/**
 * Partial update. A field is applied only when present and not null,
 * so a patch can never clear a value.
 */
export interface MealRecordPatch {
  date?: string | null;
  title?: string | null;
  recipeId?: number | null;
  tags?: string[] | null;
  status?: MealStatus | null;
  portions?: number | null;
  notes?: string | null;
}

export interface MealFilter {
  startDate?: string;
  endDate?: string;
  status?: MealStatus;
  /** Substring tokens, all of which must occur in the record's tags. */
  tags?: string[];
}

export interface StaleMeal {
  title: string;
  recipeId: number | null;
  lastDate: string;
  timesCooked: number;
}

export type TagFrequency = Record<string, number>;

export interface AdhocMealCount {
  title: string;
  count: number;
}

export interface MealSuggestions {
  asOf: string;
  daysBack: number;
  noveltyCandidates: StaleMeal[];
  tagFrequency: TagFrequency;
  overRepresentedTags: TagFrequency;
  underRepresentedTags: TagFrequency;
  frequentAdhocMeals: AdhocMealCount[];
}

export function isMealStatus(value: unknown): value is MealStatus {
  return typeof value === "string" && (MEAL_STATUSES as readonly string[]).includes(value);
}
