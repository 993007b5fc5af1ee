/**
 * Ballot Ledger API — Error Handling Middleware
 *
 * Centralized error handling for the Express API.  Registry and ballot
 * store rejections are translated from their error code to an HTTP
 * status; request-shape problems are raised as `ApiError`.
 *
 * @module api/middleware/error-handler
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction } from "express";
import { ElectionError } from "../../core/errors";

/**
 * Custom API error class.
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public errorCode: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/**
 * HTTP status for a registry / ballot store rejection.
 */
export function statusForElectionError(err: ElectionError): number {
  switch (err.code) {
    case "ELECTION_NOT_FOUND":
      return 404;
    case "ENFORCED_PAUSE":
    case "ELECTION_FACTORY_NOT_SET":
      return 503;
    case "INVALID_NONCE":
      return 409;
  }

  switch (err.category) {
    case "authorization":
      return 403;
    case "validation":
      return 400;
    case "authentication":
      return 401;
    case "state":
    case "availability":
      return 409;
  }
}

/**
 * 404 handler — catches unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: "NOT_FOUND",
    message: `Route ${req.method} ${req.originalUrl} not found.`,
  });
}

/**
 * Global error handler — catches thrown errors.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: err.errorCode,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  if (err instanceof ElectionError) {
    res.status(statusForElectionError(err)).json({
      error: err.code,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  // Body-parser rejects malformed JSON with a 400 of its own
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({
      error: "INVALID_JSON",
      message: "Request body is not valid JSON.",
    });
    return;
  }

  // Log unexpected errors
  console.error("[Ballot Ledger API] Unexpected error:", err);

  res.status(500).json({
    error: "INTERNAL_ERROR",
    message: "An unexpected error occurred.",
  });
}
