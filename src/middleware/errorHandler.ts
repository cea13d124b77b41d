import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { MealLedgerError } from "../domain/errors";
import { sendError, sendNotFound, sendServerError, sendValidationError } from "./responseHelper";

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    sendValidationError(
      res,
      err.errors.map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
    );
    return;
  }

  if (err instanceof MealLedgerError) {
    if (err.statusCode >= 500) {
      console.error(`❌ ${err.name}:`, err.message);
    }
    if (err.statusCode === 400) {
      sendValidationError(res, err.message);
    } else {
      sendError(res, err.message, err.statusCode);
    }
    return;
  }

  console.error("❌ SERVER ERROR:", err);
  sendServerError(res, err instanceof Error ? err.message : "Server error");
}

/** Clean JSON 404 for unknown routes. */
export function notFoundHandler(req: Request, res: Response): void {
  sendNotFound(res, `Not Found: ${req.method} ${req.originalUrl}`);
}
