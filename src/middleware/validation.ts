// src/middleware/validation.ts
// Path parameter validation using express-validator; bodies and queries are
// validated with zod in the routers.

import { param, validationResult } from "express-validator";
import { Request, Response, NextFunction } from "express";
import { MAX_SERIAL_ID } from "../db/mealLedgerStore";

/**
 * Validation error handler middleware
 * Returns 400 Bad Request with validation errors
 */
export function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({
      ok: false,
      error: "Validation failed",
      details: errors.array(),
    });
    return;
  }
  next();
}

/**
 * Numeric ID validation
 */
export const validateNumericId = [
  param("id")
    .isInt({ min: 1, max: MAX_SERIAL_ID })
    .withMessage("Valid numeric ID required"),

  handleValidationErrors,
];
