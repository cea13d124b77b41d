import type { NextFunction, Request, Response } from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  CollaboratorError,
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from "../src/domain/errors";
import { errorHandler, notFoundHandler } from "../src/middleware/errorHandler";

function mockResponse() {
  const res = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
  };
  return { res, asResponse: res as unknown as Response };
}

const req = { method: "GET", originalUrl: "/api/v1/nope" } as Request;
const next: NextFunction = vi.fn();

describe("errorHandler", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats zod failures as a validation error", () => {
    const parsed = z.object({ title: z.string() }).safeParse({});
    if (parsed.success) throw new Error("expected a parse failure");
    const { res, asResponse } = mockResponse();

    errorHandler(parsed.error, req, asResponse, next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      ok: false,
      error: "title: Required",
      meta: { type: "validation" },
    });
  });

  it("maps ValidationError to 400 with validation meta", () => {
    const { res, asResponse } = mockResponse();

    errorHandler(new ValidationError("portions must be a positive integer"), req, asResponse, next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      ok: false,
      error: "portions must be a positive integer",
      meta: { type: "validation" },
    });
  });

  it("maps NotFoundError to 404 without logging", () => {
    const { res, asResponse } = mockResponse();

    errorHandler(new NotFoundError("No meal with id 3"), req, asResponse, next);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ ok: false, error: "No meal with id 3" });
    expect(console.error).not.toHaveBeenCalled();
  });

  it("logs and forwards server-side failures with their status", () => {
    const { res, asResponse } = mockResponse();

    errorHandler(new StorageUnavailableError("Meal ledger database unavailable: down"), req, asResponse, next);
    expect(res.status).toHaveBeenCalledWith(503);

    errorHandler(new CollaboratorError("Mela database not found at /tmp/x", "recipes"), req, asResponse, next);
    expect(res.status).toHaveBeenLastCalledWith(502);
    expect(console.error).toHaveBeenCalledTimes(2);
  });

  it("falls back to 500 for anything else", () => {
    const { res, asResponse } = mockResponse();

    errorHandler(new Error("boom"), req, asResponse, next);
    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ ok: false, error: "boom" });

    errorHandler("not an error", req, asResponse, next);
    expect(res.json).toHaveBeenLastCalledWith({ ok: false, error: "Server error" });
  });
});

describe("notFoundHandler", () => {
  it("names the method and path", () => {
    const { res, asResponse } = mockResponse();

    notFoundHandler(req, asResponse);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ ok: false, error: "Not Found: GET /api/v1/nope" });
  });
});
