import { Router } from "express";
import { z } from "zod";
import { MAX_SERIAL_ID } from "../db/mealLedgerStore";
import { MEAL_STATUSES } from "../domain/types";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendError, sendSuccess } from "../middleware/responseHelper";
import { validateNumericId } from "../middleware/validation";
import { DEFAULT_HISTORY_DAYS, DEFAULT_REVIEW_DAYS, MealHistoryService } from "../services/mealHistory";
import { MealPlanner } from "../services/mealPlanner";
import { DEFAULT_DAYS_BACK, MealSuggestionService } from "../services/mealSuggestions";
import { isDateOnly, MAX_LOOKBACK_DAYS } from "../utils/date";

export interface MealLogRouterDeps {
  planner: MealPlanner;
  history: MealHistoryService;
  suggestions: MealSuggestionService;
}

const dateSchema = z
  .string()
  .refine(isDateOnly, { message: "Date must be a YYYY-MM-DD calendar date" });

// Accepts ["a", "b"] or the comma-separated form "a,b"
const tagsSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (typeof value === "string" ? value.split(",") : value));

const recipeIdSchema = z.number().int().positive().max(MAX_SERIAL_ID);

const daysSchema = (fallback: number) =>
  z.coerce.number().int().nonnegative().max(MAX_LOOKBACK_DAYS).default(fallback);

export const logMealSchema = z.object({
  title: z.string().trim().min(1),
  date: dateSchema.optional(),
  tags: tagsSchema.optional(),
  recipeId: recipeIdSchema.nullable().optional(),
  portions: z.number().int().positive().nullable().optional(),
  notes: z.string().nullable().optional(),
});

export const scheduleMealSchema = z.object({
  recipeName: z.string().trim().min(1),
  date: dateSchema,
  time: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Time must be HH:MM (24h)")
    .optional(),
});

export const updateMealSchema = z.object({
  date: dateSchema.nullable().optional(),
  title: z.string().trim().min(1).nullable().optional(),
  recipeId: recipeIdSchema.nullable().optional(),
  tags: tagsSchema.nullable().optional(),
  status: z.enum(MEAL_STATUSES).nullable().optional(),
  portions: z.number().int().positive().nullable().optional(),
  notes: z.string().nullable().optional(),
});

export const historyQuerySchema = z.object({
  days: daysSchema(DEFAULT_HISTORY_DAYS),
  tags: z.string().optional(),
  status: z.enum(MEAL_STATUSES).optional(),
});

export function createMealLogRouter({ planner, history, suggestions }: MealLogRouterDeps): Router {
  const router = Router();

  // POST /api/v1/meal-log - log a cooked meal
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const parsed = logMealSchema.parse(req.body);
      const meal = await planner.log(parsed);
      sendSuccess(res, meal, 201);
    })
  );

  // POST /api/v1/meal-log/schedule - calendar event + planned ledger entry
  router.post(
    "/schedule",
    asyncHandler(async (req, res) => {
      const parsed = scheduleMealSchema.parse(req.body);
      const outcome = await planner.schedule(parsed);
      if (!outcome.success) {
        sendError(res, outcome.error, 502, { recipeMatch: outcome.recipeMatch });
        return;
      }
      sendSuccess(res, outcome, 201);
    })
  );

  // GET /api/v1/meal-log?days=30&tags=quick,vegetarian&status=cooked
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const query = historyQuerySchema.parse(req.query);
      const meals = await history.history(query.days, {
        status: query.status,
        tags: query.tags ? query.tags.split(",") : undefined,
      });
      sendSuccess(res, meals);
    })
  );

  // GET /api/v1/meal-log/review?days=7 - planned meals not yet marked cooked/skipped
  router.get(
    "/review",
    asyncHandler(async (req, res) => {
      const { days } = z.object({ days: daysSchema(DEFAULT_REVIEW_DAYS) }).parse(req.query);
      sendSuccess(res, await history.unreconciled(days));
    })
  );

  // GET /api/v1/meal-log/suggestions?daysBack=90
  router.get(
    "/suggestions",
    asyncHandler(async (req, res) => {
      const { daysBack } = z.object({ daysBack: daysSchema(DEFAULT_DAYS_BACK) }).parse(req.query);
      sendSuccess(res, await suggestions.suggest({ daysBack }));
    })
  );

  // GET /api/v1/meal-log/:id
  router.get(
    "/:id",
    validateNumericId,
    asyncHandler(async (req, res) => {
      const meal = await history.get(Number(req.params.id));
      sendSuccess(res, meal);
    })
  );

  // PATCH /api/v1/meal-log/:id - reconcile status, notes, tags...
  router.patch(
    "/:id",
    validateNumericId,
    asyncHandler(async (req, res) => {
      const patch = updateMealSchema.parse(req.body);
      const meal = await planner.reconcile(Number(req.params.id), patch);
      sendSuccess(res, meal);
    })
  );

  return router;
}
