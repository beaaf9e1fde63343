/**
 * Middleware exports
 */

export {
  requireApiKey,
  rateLimit,
  logRequest,
  callContext,
} from "./auth";

export {
  validate,
  validateNumericString,
  commonRules,
} from "./validation";

export type { RateLimitOptions, RateLimitStore } from "./auth";

export type { ValidationRule } from "./validation";

export {
  errorHandler,
  notFoundHandler,
  asyncHandler,
  marketErrorStatus,
  AppError,
} from "./errorHandler";
