import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendNotFound, sendSuccess } from "../middleware/responseHelper";
import { validateNumericId } from "../middleware/validation";
import { RecipeCatalog } from "../services/integrations/types";

const searchQuerySchema = z.object({
  q: z.string().trim().min(1, "Search term is required"),
});

const listQuerySchema = z.object({
  filter: z.enum(["all", "favorites", "wantToCook"]).default("all"),
});

export function createRecipesRouter(recipes: RecipeCatalog): Router {
  const router = Router();

  // GET /api/v1/recipes?q=chicken - title or ingredient match
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const { q } = searchQuerySchema.parse(req.query);
      sendSuccess(res, await recipes.search(q));
    })
  );

  // GET /api/v1/recipes/list?filter=favorites
  router.get(
    "/list",
    asyncHandler(async (req, res) => {
      const { filter } = listQuerySchema.parse(req.query);
      sendSuccess(res, await recipes.list(filter));
    })
  );

  // GET /api/v1/recipes/:id
  router.get(
    "/:id",
    validateNumericId,
    asyncHandler(async (req, res) => {
      const recipe = await recipes.get(Number(req.params.id));
      if (!recipe) {
        sendNotFound(res, "Recipe not found");
        return;
      }
      sendSuccess(res, recipe);
    })
  );

  return router;
}
