/**
 * Error Handler Middleware
 *
 * Centralized error handling and sanitization
 */

import { Request, Response, NextFunction } from "express";
import { logger } from "../../shared/logger";
import { MarketError, MarketErrorCode } from "../../market/types";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public errorCode: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = "AppError";
  }
}

interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
  stack?: string[];
}

const MARKET_ERROR_STATUS: Partial<Record<MarketErrorCode, number>> = {
  NOT_FOUND: 404,
  UNAUTHORIZED: 403,
  SELF_TRADE: 403,
};

export function marketErrorStatus(code: MarketErrorCode): number {
  return MARKET_ERROR_STATUS[code] ?? 400;
}

/**
 * Main error handler middleware
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const isProduction = process.env.NODE_ENV === "production";

  // Precondition violations: the call was dropped, nothing changed
  if (err instanceof MarketError) {
    logger.warn("Market call rejected", { code: err.code, message: err.message, path: req.path });
    res.status(marketErrorStatus(err.code)).json({
      error: err.code.toLowerCase(),
      message: err.message,
    });
    return;
  }

  // Log full error server-side
  logger.error("API Error", {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
    ip: req.ip,
    userAgent: req.get("user-agent"),
  });

  if (err instanceof AppError) {
    const body: ErrorBody = {
      error: err.errorCode,
      message: err.message,
    };
    if (err.details !== undefined) {
      body.details = err.details;
    }
    res.status(err.statusCode).json(body);
    return;
  }

  // body-parser rejects malformed JSON with a 400 of its own
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "invalid_json", message: "Request body is not valid JSON" });
    return;
  }

  const body: ErrorBody = {
    error: "internal_error",
    message: "Internal server error",
  };

  // In development, include more details (but still sanitized)
  if (!isProduction) {
    body.details = err.message;
    if (err.stack) {
      body.stack = err.stack.split("\n").slice(0, 5).map((line) => line.trim());
    }
  }

  res.status(500).json(body);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  res.status(404).json({
    error: "not_found",
    message: "Endpoint not found",
    path: req.path,
  });
}

/**
 * Async error wrapper (for route handlers)
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
