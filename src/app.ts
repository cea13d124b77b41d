import express, { Express, Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createCalendarRouter } from "./routes/calendar";
import { createGroceryListRouter } from "./routes/groceryList";
import { createMealLogRouter } from "./routes/mealLog";
import { createRecipesRouter } from "./routes/recipes";
import { CalendarGateway, RecipeCatalog, RemindersGateway } from "./services/integrations/types";
import { MealHistoryService } from "./services/mealHistory";
import { MealPlanner } from "./services/mealPlanner";
import { MealSuggestionService } from "./services/mealSuggestions";

export interface AppServices {
  planner: MealPlanner;
  history: MealHistoryService;
  suggestions: MealSuggestionService;
  recipes: RecipeCatalog;
  calendar: CalendarGateway;
  reminders: RemindersGateway;
}

export interface AppOptions {
  allowedOrigins: string[];
  logRequests: boolean;
}

export function createApp(services: AppServices, options: AppOptions): Express {
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const allowlist = new Set<string>([
    "http://localhost:3000",
    "http://127.0.0.1:3000",
    ...options.allowedOrigins,
  ]);

  app.use(
    cors({
      origin: (origin, cb) => {
        // Allow server-to-server/no-origin requests
        if (!origin) return cb(null, true);
        if (allowlist.has(origin)) return cb(null, true);
        return cb(new Error(`CORS blocked: ${origin}`));
      },
      methods: ["GET", "POST", "OPTIONS", "DELETE", "PATCH"],
      allowedHeaders: ["Content-Type", "Accept"],
    })
  );

  if (options.logRequests) {
    app.use(morgan("dev"));
  }

  app.use(express.json({ limit: "1mb" }));

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({ ok: true, service: "meal-ledger-backend" });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  app.use(
    "/api/v1/meal-log",
    createMealLogRouter({
      planner: services.planner,
      history: services.history,
      suggestions: services.suggestions,
    })
  );
  app.use("/api/v1/recipes", createRecipesRouter(services.recipes));
  app.use("/api/v1/calendar", createCalendarRouter(services.calendar));
  app.use("/api/v1/grocery-list", createGroceryListRouter(services.reminders));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
