// src/services/mealHistory.ts
// Filtered reads and analytics over the meal ledger

import { MealLedgerStore } from "../db/mealLedgerStore";
import { MealFilter, MealRecord, MealStatus, StaleMeal, TagFrequency } from "../domain/types";
import { Clock, daysAgo, systemClock, todayDateOnly } from "../utils/date";

export const DEFAULT_HISTORY_DAYS = 30;
export const DEFAULT_REVIEW_DAYS = 7;

/** Statuses that count as "this dish appeared" for staleness. */
const APPEARED: ReadonlySet<MealStatus> = new Set<MealStatus>(["cooked", "planned"]);

/**
 * Every analytic takes an optional `asOf` date so that composite operations
 * can read the clock once and reuse it.
 */
export interface AsOf {
  asOf?: string;
}

export interface HistoryOptions extends AsOf {
  status?: MealStatus;
  tags?: string[];
}

/** Grouping key: recipe id when linked, title otherwise. */
export function identityKey(meal: Pick<MealRecord, "recipeId" | "title">): string {
  return meal.recipeId !== null ? `recipe:${meal.recipeId}` : `title:${meal.title}`;
}

export class MealHistoryService {
  constructor(
    private readonly store: MealLedgerStore,
    private readonly clock: Clock = systemClock
  ) {}

  today(): string {
    return todayDateOnly(this.clock);
  }

  get(id: number): Promise<MealRecord> {
    return this.store.get(id);
  }

  find(filter: MealFilter = {}): Promise<MealRecord[]> {
    return this.store.find(filter);
  }

  /** Meals in `[today - days, today]`, newest first. */
  history(days: number = DEFAULT_HISTORY_DAYS, options: HistoryOptions = {}): Promise<MealRecord[]> {
    const today = options.asOf ?? this.today();
    return this.store.find({
      startDate: daysAgo(today, days),
      endDate: today,
      status: options.status,
      tags: options.tags,
    });
  }

  /** Planned meals in `[today - days, today]` still awaiting cooked/skipped, oldest first. */
  async unreconciled(days: number = DEFAULT_REVIEW_DAYS, { asOf }: AsOf = {}): Promise<MealRecord[]> {
    const today = asOf ?? this.today();
    const planned = await this.store.find({
      status: "planned",
      startDate: daysAgo(today, days),
      endDate: today,
    });
    return planned.sort((a, b) => (a.date !== b.date ? (a.date < b.date ? -1 : 1) : a.id - b.id));
  }

  async tagFrequency(days: number, { asOf }: AsOf = {}): Promise<TagFrequency> {
    const today = asOf ?? this.today();
    const meals = await this.store.find({ startDate: daysAgo(today, days) });

    // free-text keys: a plain object would read through Object.prototype
    const counts = new Map<string, number>();
    for (const meal of meals) {
      // tags are an ordered set, so each tag counts once per meal
      for (const tag of meal.tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }
    return Object.fromEntries(counts);
  }

  /**
   * Dishes that appeared within the window but not within the last `minGap`
   * days, least recently seen first.
   */
  async staleMeals(days: number, minGap: number, { asOf }: AsOf = {}): Promise<StaleMeal[]> {
    const today = asOf ?? this.today();
    const staleCutoff = daysAgo(today, minGap);
    const meals = await this.store.find({ startDate: daysAgo(today, days) });

    // find() returns newest first, so the first record seen per key is the latest
    const groups = new Map<string, StaleMeal>();
    for (const meal of meals) {
      if (!APPEARED.has(meal.status)) continue;
      const key = identityKey(meal);
      const group = groups.get(key);
      if (group) {
        group.timesCooked++;
      } else {
        groups.set(key, {
          title: meal.title,
          recipeId: meal.recipeId,
          lastDate: meal.date,
          timesCooked: 1,
        });
      }
    }

    return [...groups.values()]
      .filter((g) => g.lastDate < staleCutoff)
      .sort((a, b) =>
        a.lastDate !== b.lastDate ? (a.lastDate < b.lastDate ? -1 : 1) : a.title.localeCompare(b.title)
      );
  }
}
