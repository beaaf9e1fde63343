import dotenv from "dotenv";

export class ConfigError extends Error {
  constructor(public readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

export interface RateLimitSettings {
  windowSeconds: number;
  perIp: number;
  perAccount: number;
}

export interface ServiceConfig {
  port: number;
  production: boolean;
  /** Account that holds escrow on the native ledger */
  marketAccount: string;
  owner: string;
  treasury: string;
  transactionFeeBps: number;
  approvedRegistries: string[];
  /** e.g. http://registry.local/{registry} */
  registryUrlTemplate?: string;
  databaseUrl?: string;
  redisUrl?: string;
  apiKeys: string[];
  /** null when RATE_LIMIT_ENABLED=false */
  rateLimit: RateLimitSettings | null;
}

type Env = Record<string, string | undefined>;

function list(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function integer(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  const value = Number(raw.trim());
  if (value < min || value > max) {
    throw new ConfigError(name, `must be between ${min} and ${max}`);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw && raw.trim() !== "" ? raw.trim() : undefined;
}

/**
 * Read service configuration from the environment. `.env` is loaded first
 * when reading from process.env.
 */
export function loadConfig(env: Env = process.env): ServiceConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const owner = optional(env, "MARKET_OWNER") || "market-owner";
  const registryUrlTemplate = optional(env, "REGISTRY_URL_TEMPLATE");
  if (registryUrlTemplate && !registryUrlTemplate.includes("{registry}")) {
    throw new ConfigError("REGISTRY_URL_TEMPLATE", "must contain a {registry} placeholder");
  }

  return {
    port: integer(env, "PORT", 4000, 1, 65535),
    production: env.NODE_ENV === "production",
    marketAccount: optional(env, "MARKET_ACCOUNT") || "market",
    owner,
    treasury: optional(env, "MARKET_TREASURY") || owner,
    // fee must stay below 100%
    transactionFeeBps: integer(env, "TRANSACTION_FEE_BPS", 200, 0, 9999),
    approvedRegistries: list(env.APPROVED_REGISTRIES),
    registryUrlTemplate,
    databaseUrl: optional(env, "DATABASE_URL") || optional(env, "PG_CONNECTION_STRING"),
    redisUrl: optional(env, "REDIS_URL"),
    apiKeys: list(env.API_KEYS),
    rateLimit:
      env.RATE_LIMIT_ENABLED === "false"
        ? null
        : {
            windowSeconds: integer(env, "RATE_LIMIT_WINDOW_SECONDS", 60, 1, 86400),
            perIp: integer(env, "RATE_LIMIT_PER_IP", 100, 1, 1_000_000),
            perAccount: integer(env, "RATE_LIMIT_PER_ACCOUNT", 300, 1, 1_000_000),
          },
  };
}
