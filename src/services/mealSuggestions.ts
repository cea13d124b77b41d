// src/services/mealSuggestions.ts
// Turns meal history into planning suggestions: novelty candidates, tag
// balance and frequently repeated ad-hoc meals.

import { AdhocMealCount, MealRecord, MealSuggestions, TagFrequency } from "../domain/types";
import { daysAgo } from "../utils/date";
import { MealHistoryService } from "./mealHistory";

export const DEFAULT_DAYS_BACK = 90;
export const NOVELTY_MIN_GAP_DAYS = 30;
export const ADHOC_MIN_COUNT = 3;
export const OVER_REPRESENTED_FACTOR = 1.5;
export const UNDER_REPRESENTED_FACTOR = 0.5;

export interface SuggestionOptions {
  daysBack?: number;
  minGap?: number;
}

export function countFrequentAdhocMeals(
  meals: readonly MealRecord[],
  minCount: number = ADHOC_MIN_COUNT
): AdhocMealCount[] {
  const counts = new Map<string, number>();
  for (const meal of meals) {
    if (meal.status === "cooked" && meal.recipeId === null) {
      counts.set(meal.title, (counts.get(meal.title) ?? 0) + 1);
    }
  }

  // Array#sort is stable: equal counts keep first-seen order
  return [...counts.entries()]
    .map(([title, count]) => ({ title, count }))
    .sort((a, b) => b.count - a.count)
    .filter((m) => m.count >= minCount);
}

export function tagBalance(freq: TagFrequency): {
  average: number;
  over: TagFrequency;
  under: TagFrequency;
} {
  const entries = Object.entries(freq);
  const average =
    entries.length > 0 ? entries.reduce((sum, [, count]) => sum + count, 0) / entries.length : 0;

  if (average === 0) {
    return { average, over: {}, under: {} };
  }
  return {
    average,
    over: Object.fromEntries(entries.filter(([, count]) => count > average * OVER_REPRESENTED_FACTOR)),
    under: Object.fromEntries(entries.filter(([, count]) => count < average * UNDER_REPRESENTED_FACTOR)),
  };
}

export class MealSuggestionService {
  constructor(private readonly history: MealHistoryService) {}

  async suggest(options: SuggestionOptions = {}): Promise<MealSuggestions> {
    const daysBack = options.daysBack ?? DEFAULT_DAYS_BACK;
    const minGap = options.minGap ?? NOVELTY_MIN_GAP_DAYS;
    const asOf = this.history.today();

    const tagFrequency = await this.history.tagFrequency(daysBack, { asOf });
    const noveltyCandidates = await this.history.staleMeals(daysBack, minGap, { asOf });
    const recent = await this.history.find({ startDate: daysAgo(asOf, daysBack) });
    const { over, under } = tagBalance(tagFrequency);

    return {
      asOf,
      daysBack,
      noveltyCandidates,
      tagFrequency,
      overRepresentedTags: over,
      underRepresentedTags: under,
      frequentAdhocMeals: countFrequentAdhocMeals(recent),
    };
  }
}
