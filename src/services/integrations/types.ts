// src/services/integrations/types.ts
// Contracts for the external applications the planner talks to

/**
 * Result of a call into an external application. Failures are values, not
 * exceptions, so callers branch on `success`.
 */
export type CollaboratorOutcome<T extends object> =
  | ({ success: true } & T)
  | { success: false; error: string };

// ---------------------------------------------------------------------------
// Recipes
// ---------------------------------------------------------------------------

export interface RecipeSummary {
  id: number;
  title: string;
  prepTime: string | null;
  cookTime: string | null;
  totalTime: string | null;
}

export interface RecipeDetails extends RecipeSummary {
  ingredients: string | null;
  instructions: string | null;
  notes: string | null;
  nutrition: string | null;
  yield: string | null;
  favorite: boolean;
  wantToCook: boolean;
  link: string | null;
}

export interface RecipeListItem {
  id: number;
  title: string;
  favorite: boolean;
  wantToCook: boolean;
}

export type RecipeListFilter = "all" | "favorites" | "wantToCook";

export interface RecipeCatalog {
  /** Case-insensitive substring match over title and ingredients, ordered by title. */
  search(query: string): Promise<RecipeSummary[]>;
  get(id: number): Promise<RecipeDetails | null>;
  list(filter?: RecipeListFilter): Promise<RecipeListItem[]>;
}

// ---------------------------------------------------------------------------
// Calendar
// ---------------------------------------------------------------------------

export interface CalendarEvent {
  title: string;
  date: string; // YYYY-MM-DD
  time: string; // HH:MM
}

export interface ScheduledEvent extends CalendarEvent {
  calendar: string;
}

export interface EventWindow {
  /** Days ahead of today. */
  days: number;
  /** Days before today. */
  pastDays: number;
}

export interface CalendarGateway {
  scheduleEvent(title: string, date: string, time: string): Promise<CollaboratorOutcome<ScheduledEvent>>;
  listEvents(window: EventWindow): Promise<CollaboratorOutcome<{ events: CalendarEvent[] }>>;
}

// ---------------------------------------------------------------------------
// Reminders
// ---------------------------------------------------------------------------

export interface RemindersGateway {
  add(items: string[], listName?: string): Promise<CollaboratorOutcome<{ count: number; list: string }>>;
  clear(listName?: string): Promise<CollaboratorOutcome<{ removed: number; list: string }>>;
  list(listName?: string): Promise<CollaboratorOutcome<{ items: string[]; list: string }>>;
}
