import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendError, sendSuccess } from "../middleware/responseHelper";
import { CalendarGateway } from "../services/integrations/types";
import { MAX_LOOKBACK_DAYS } from "../utils/date";

const windowQuerySchema = z.object({
  days: z.coerce.number().int().nonnegative().max(MAX_LOOKBACK_DAYS).default(7),
  pastDays: z.coerce.number().int().nonnegative().max(MAX_LOOKBACK_DAYS).default(0),
});

export function createCalendarRouter(calendar: CalendarGateway): Router {
  const router = Router();

  // GET /api/v1/calendar/meals?days=7&pastDays=30
  router.get(
    "/meals",
    asyncHandler(async (req, res) => {
      const window = windowQuerySchema.parse(req.query);
      const outcome = await calendar.listEvents(window);
      if (!outcome.success) {
        sendError(res, outcome.error, 502);
        return;
      }
      sendSuccess(res, outcome.events);
    })
  );

  return router;
}
