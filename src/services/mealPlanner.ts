// src/services/mealPlanner.ts
// Scheduling and logging meals: the only path that writes to the ledger

import { MealLedgerStore } from "../db/mealLedgerStore";
import { errorMessage, ValidationError } from "../domain/errors";
import { MealRecord, MealRecordPatch } from "../domain/types";
import { Clock, isDateOnly, isTimeOfDay, systemClock, todayDateOnly } from "../utils/date";
import { CalendarGateway, RecipeCatalog, RecipeSummary, ScheduledEvent } from "./integrations/types";

export const DEFAULT_MEAL_TIME = "18:00";

export interface ScheduleMealInput {
  recipeName: string;
  date: string;
  time?: string;
}

/** How the scheduled name was linked to the recipe database. */
export type RecipeMatch = "matched" | "unmatched" | "unavailable";

export type ScheduleMealOutcome =
  | { success: true; event: ScheduledEvent; meal: MealRecord; recipeMatch: RecipeMatch }
  | { success: false; error: string; recipeMatch: RecipeMatch };

export interface LogMealInput {
  title: string;
  date?: string;
  tags?: string[];
  recipeId?: number | null;
  portions?: number | null;
  notes?: string | null;
}

export interface MealPlannerDeps {
  ledger: MealLedgerStore;
  recipes: Pick<RecipeCatalog, "search">;
  calendar: Pick<CalendarGateway, "scheduleEvent">;
  clock?: Clock;
}

/** First search result whose title equals the name, ignoring case. */
export function findExactRecipe(name: string, candidates: readonly RecipeSummary[]): RecipeSummary | undefined {
  const wanted = name.toLowerCase();
  return candidates.find((r) => r.title.toLowerCase() === wanted);
}

export class MealPlanner {
  private readonly ledger: MealLedgerStore;
  private readonly recipes: Pick<RecipeCatalog, "search">;
  private readonly calendar: Pick<CalendarGateway, "scheduleEvent">;
  private readonly clock: Clock;

  constructor(deps: MealPlannerDeps) {
    this.ledger = deps.ledger;
    this.recipes = deps.recipes;
    this.calendar = deps.calendar;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Put a meal on the calendar and, only once the calendar accepted it,
   * record it in the ledger as planned.
   */
  async schedule(input: ScheduleMealInput): Promise<ScheduleMealOutcome> {
    const recipeName = input.recipeName.trim();
    const time = input.time ?? DEFAULT_MEAL_TIME;
    if (!recipeName) {
      throw new ValidationError("recipeName is required");
    }
    if (!isDateOnly(input.date)) {
      throw new ValidationError(`date must be YYYY-MM-DD, got ${JSON.stringify(input.date)}`);
    }
    if (!isTimeOfDay(time)) {
      throw new ValidationError(`time must be HH:MM (24h), got ${JSON.stringify(time)}`);
    }

    const { recipeId, recipeMatch } = await this.resolveRecipe(recipeName);

    const event = await this.calendar.scheduleEvent(recipeName, input.date, time);
    if (!event.success) {
      console.warn(`[MealPlanner] Calendar rejected "${recipeName}" on ${input.date}: ${event.error}`);
      return { success: false, error: event.error, recipeMatch };
    }

    const meal = await this.ledger.create({
      date: input.date,
      title: recipeName,
      recipeId,
      status: "planned",
    });
    console.log(`[MealPlanner] Planned meal #${meal.id} "${meal.title}" for ${meal.date} ${time}`);

    return {
      success: true,
      event: { title: event.title, date: event.date, time: event.time, calendar: event.calendar },
      meal,
      recipeMatch,
    };
  }

  /** Record a meal that was cooked; date defaults to today. */
  async log(input: LogMealInput): Promise<MealRecord> {
    const meal = await this.ledger.create({
      date: input.date ?? todayDateOnly(this.clock),
      title: input.title,
      recipeId: input.recipeId ?? null,
      tags: input.tags,
      status: "cooked",
      portions: input.portions ?? null,
      notes: input.notes ?? null,
    });
    console.log(`[MealPlanner] Logged meal #${meal.id} "${meal.title}" on ${meal.date}`);
    return meal;
  }

  /** Partial update, typically marking a planned meal cooked or skipped. */
  reconcile(id: number, patch: MealRecordPatch): Promise<MealRecord> {
    return this.ledger.update(id, patch);
  }

  private async resolveRecipe(
    recipeName: string
  ): Promise<{ recipeId: number | null; recipeMatch: RecipeMatch }> {
    try {
      const match = findExactRecipe(recipeName, await this.recipes.search(recipeName));
      return match
        ? { recipeId: match.id, recipeMatch: "matched" }
        : { recipeId: null, recipeMatch: "unmatched" };
    } catch (err) {
      console.warn(`[MealPlanner] Recipe lookup failed for "${recipeName}": ${errorMessage(err)}`);
      return { recipeId: null, recipeMatch: "unavailable" };
    }
  }
}
