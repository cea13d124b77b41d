import { NotFoundError } from "../domain/errors";
import { MealFilter, MealRecord, MealRecordPatch, NewMealRecord } from "../domain/types";
import {
  compareByDateDesc,
  isEmptyPatch,
  matchesFilter,
  MealLedgerStore,
  validateNewMeal,
  validatePatch,
} from "../db/mealLedgerStore";
import { Clock, systemClock } from "../utils/date";

function copy(record: MealRecord): MealRecord {
  return { ...record, tags: [...record.tags] };
}

/**
 * Process-local ledger. Used when no database is configured and by tests;
 * contents are lost on restart.
 */
export class InMemoryMealLedgerStore implements MealLedgerStore {
  private meals: MealRecord[] = [];
  private nextId = 1;

  constructor(private readonly clock: Clock = systemClock) {}

  async create(input: NewMealRecord): Promise<MealRecord> {
    const meal = validateNewMeal(input);
    const now = this.clock.now().toISOString();
    const record: MealRecord = { id: this.nextId++, ...meal, createdAt: now, updatedAt: now };
    this.meals.push(record);
    return copy(record);
  }

  async update(id: number, patch: MealRecordPatch): Promise<MealRecord> {
    const applied = validatePatch(patch);
    const existing = this.lookup(id);
    if (isEmptyPatch(applied)) {
      return copy(existing);
    }

    const now = this.clock.now().toISOString();
    Object.assign(existing, applied);
    existing.updatedAt = now > existing.updatedAt ? now : existing.updatedAt;
    return copy(existing);
  }

  async get(id: number): Promise<MealRecord> {
    return copy(this.lookup(id));
  }

  async find(filter: MealFilter = {}): Promise<MealRecord[]> {
    return this.meals
      .filter((m) => matchesFilter(m, filter))
      .sort(compareByDateDesc)
      .map(copy);
  }

  private lookup(id: number): MealRecord {
    const meal = this.meals.find((m) => m.id === id);
    if (!meal) {
      throw new NotFoundError(`No meal with id ${id}`);
    }
    return meal;
  }
}
