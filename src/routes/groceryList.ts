import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendError, sendSuccess } from "../middleware/responseHelper";
import { RemindersGateway } from "../services/integrations/types";

const listQuerySchema = z.object({
  list: z.string().trim().min(1).optional(),
});

const addItemsSchema = z.object({
  items: z.array(z.string().trim().min(1)).min(1),
  list: z.string().trim().min(1).optional(),
});

export function createGroceryListRouter(reminders: RemindersGateway): Router {
  const router = Router();

  // GET /api/v1/grocery-list?list=Grocery
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const { list } = listQuerySchema.parse(req.query);
      const outcome = await reminders.list(list);
      if (!outcome.success) {
        sendError(res, outcome.error, 502);
        return;
      }
      sendSuccess(res, { list: outcome.list, items: outcome.items });
    })
  );

  // POST /api/v1/grocery-list
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const { items, list } = addItemsSchema.parse(req.body);
      const outcome = await reminders.add(items, list);
      if (!outcome.success) {
        sendError(res, outcome.error, 502);
        return;
      }
      sendSuccess(res, { list: outcome.list, count: outcome.count }, 201);
    })
  );

  // DELETE /api/v1/grocery-list?list=Grocery - removes incomplete items
  router.delete(
    "/",
    asyncHandler(async (req, res) => {
      const { list } = listQuerySchema.parse(req.query);
      const outcome = await reminders.clear(list);
      if (!outcome.success) {
        sendError(res, outcome.error, 502);
        return;
      }
      sendSuccess(res, { list: outcome.list, removed: outcome.removed });
    })
  );

  return router;
}
