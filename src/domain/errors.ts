// src/domain/errors.ts
// Error taxonomy shared by the ledger, the planner and the HTTP layer

export class MealLedgerError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = "MealLedgerError";
  }
}

export class NotFoundError extends MealLedgerError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends MealLedgerError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ValidationError";
  }
}

/**
 * An external application (recipe database, Calendar, Reminders) failed.
 * Adapters convert this into a `{ success: false }` outcome at their boundary.
 */
export class CollaboratorError extends MealLedgerError {
  constructor(
    message: string,
    public readonly collaborator: string
  ) {
    super(message, 502);
    this.name = "CollaboratorError";
  }
}

export class StorageUnavailableError extends MealLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503);
    this.name = "StorageUnavailableError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : typeof err === "string" ? err : "Unknown error";
}
