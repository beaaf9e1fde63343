/**
 * API Authentication & Rate Limiting Middleware
 *
 * Provides:
 * - API key authentication
 * - Rate limiting per client IP and per calling account
 * - Caller identity for marketplace calls
 */

import { Request, Response, NextFunction } from "express";
import { logger } from "../../shared/logger";
import { RateLimitSettings } from "../../shared/config";
import { redisClient, isRedisConnected } from "../../shared/redis";
import { CallContext } from "../../market/call";
import { isAccountId, KEY_DELIMITER } from "../../market/keys";
import { AppError } from "./errorHandler";

function header(req: Request, name: string): string | null {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() !== "" ? first.trim() : null;
}

/**
 * Extract API key from request
 */
function getApiKey(req: Request): string | null {
  const headerKey = header(req, "x-api-key");
  if (headerKey) return headerKey;

  // Query param is convenient for testing
  const queryKey = req.query.apiKey;
  return typeof queryKey === "string" && queryKey !== "" ? queryKey : null;
}

/**
 * Get client IP address
 */
function getClientIp(req: Request): string {
  return (
    header(req, "x-forwarded-for")?.split(",")[0] ||
    header(req, "x-real-ip") ||
    req.socket.remoteAddress ||
    "unknown"
  );
}

/**
 * API key authentication. With no keys configured every request passes;
 * in production an unknown key is rejected.
 */
export function requireApiKey(validKeys: readonly string[], production: boolean) {
  const keys = new Set(validKeys);
  return (req: Request, res: Response, next: NextFunction): void => {
    if (keys.size === 0 && !production) {
      next();
      return;
    }

    const apiKey = getApiKey(req);
    if (!apiKey) {
      res.status(401).json({
        error: "unauthorized",
        message: "API key required. Provide X-API-Key header or apiKey query param.",
      });
      return;
    }

    if (!keys.has(apiKey)) {
      res.status(401).json({
        error: "unauthorized",
        message: "Invalid API key",
      });
      return;
    }

    res.locals.apiKey = apiKey;
    next();
  };
}

/** The slice of the Redis client the limiter counts with */
export interface RateLimitStore {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<unknown>;
  ttl(key: string): Promise<number>;
}

export interface RateLimitOptions {
  settings: RateLimitSettings;
  /** Current store, or undefined to let requests through uncounted */
  store?: () => RateLimitStore | undefined;
  clock?: () => number;
}

interface WindowState {
  scope: "ip" | "account";
  limit: number;
  count: number;
  resetAt: number;
}

function connectedRedis(): RateLimitStore | undefined {
  return redisClient && isRedisConnected() ? redisClient : undefined;
}

async function countRequest(
  store: RateLimitStore,
  scope: WindowState["scope"],
  id: string,
  limit: number,
  settings: RateLimitSettings,
  now: number
): Promise<WindowState> {
  const key = `market:rate:${scope}:${id}`;
  const count = await store.incr(key);
  if (count === 1) {
    await store.expire(key, settings.windowSeconds);
  }
  const ttl = await store.ttl(key);
  const seconds = ttl > 0 ? ttl : settings.windowSeconds;
  return { scope, limit, count, resetAt: now + seconds * 1000 };
}

/**
 * Fixed-window limits: every request counts against the client IP, and
 * requests carrying X-Account-Id also count against that account. The
 * headers describe the tighter window. A store error lets the request
 * through.
 */
export function rateLimit(options: RateLimitOptions) {
  const { settings } = options;
  const store = options.store ?? connectedRedis;
  const clock = options.clock ?? Date.now;

  const check = async (req: Request): Promise<WindowState[]> => {
    const backend = store();
    if (!backend) {
      return [];
    }
    const now = clock();
    const windows = [await countRequest(backend, "ip", getClientIp(req), settings.perIp, settings, now)];
    const account = header(req, "x-account-id");
    if (account) {
      windows.push(await countRequest(backend, "account", account, settings.perAccount, settings, now));
    }
    return windows;
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    check(req)
      .catch((error: unknown): WindowState[] => {
        logger.error("Rate limit check failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        return [];
      })
      .then((windows) => {
        if (windows.length === 0) {
          next();
          return;
        }
        const exceeded = windows.find((window) => window.count > window.limit);
        const tightest = exceeded ?? windows.reduce((a, b) => (b.limit - b.count < a.limit - a.count ? b : a));

        res.setHeader("X-RateLimit-Limit", tightest.limit);
        res.setHeader("X-RateLimit-Remaining", Math.max(0, tightest.limit - tightest.count));
        res.setHeader("X-RateLimit-Reset", tightest.resetAt);

        if (exceeded) {
          logger.warn("Rate limit exceeded", { scope: exceeded.scope, path: req.path });
          res.status(429).json({
            error: "rate_limit_exceeded",
            message: `Too many requests for this ${exceeded.scope}`,
            resetAt: exceeded.resetAt,
          });
          return;
        }
        next();
      })
      .catch(next);
  };
}

/**
 * Request logging middleware (for abuse detection)
 */
export function logRequest(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const ip = getClientIp(req);
  const caller = header(req, "x-account-id");
  const startTime = Date.now();

  logger.debug("API request", {
    method: req.method,
    path: req.path,
    ip,
    caller,
  });

  res.on("finish", () => {
    logger.info("API response", {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: Date.now() - startTime,
      caller,
    });
  });

  next();
}

/**
 * Build the call context for a marketplace call: caller from X-Account-Id,
 * relaying signer from X-Signer-Id, deposit from the body.
 */
export function callContext(req: Request): CallContext {
  const caller = header(req, "x-account-id");
  if (!caller) {
    throw new AppError(401, "missing_account", "X-Account-Id header is required");
  }

  const body: unknown = req.body;
  const deposit =
    typeof body === "object" && body !== null && "deposit" in body ? body.deposit : undefined;
  if (deposit !== undefined && (typeof deposit !== "string" || !/^\d+$/.test(deposit))) {
    throw new AppError(400, "invalid_deposit", "deposit must be a decimal string");
  }

  const signer = header(req, "x-signer-id") ?? undefined;
  for (const account of [caller, signer]) {
    if (account !== undefined && !isAccountId(account)) {
      throw new AppError(400, "invalid_account", `Account ids must not contain "${KEY_DELIMITER}"`);
    }
  }

  return {
    caller,
    signer,
    deposit: deposit === undefined ? 0n : BigInt(deposit),
  };
}
