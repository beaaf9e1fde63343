import express, { Express, Request, Response } from "express";
import bodyParser from "body-parser";
import { marketRoutes } from "./marketRoutes";
import { initRedis, isRedisConnected } from "../shared/redis";
import { closeDatabase, initDatabase, isDatabaseConnected, query } from "../shared/db";
import { ConfigError, loadConfig, ServiceConfig } from "../shared/config";
import { logger } from "../shared/logger";
import { Marketplace } from "../market/marketplace";
import { MemoryLedger } from "../market/ledger";
import { HttpRegistryGateway } from "../market/httpRegistry";
import { EventJournal } from "../market/journal";
import {
  AppError,
  commonRules,
  errorHandler,
  logRequest,
  notFoundHandler,
  rateLimit,
  RateLimitOptions,
  requireApiKey,
  validate,
} from "./middleware";

export interface AppOptions {
  production?: boolean;
  apiKeys?: string[];
  /** Off when omitted */
  rateLimit?: RateLimitOptions;
  /** Exposes the funding route outside production */
  ledger?: MemoryLedger;
}

export function createApp(market: Marketplace, options: AppOptions = {}): Express {
  const production = options.production ?? false;
  const app = express();
  app.use(bodyParser.json());
  app.use(logRequest);

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      database: isDatabaseConnected() ? "connected" : "disconnected",
      redis: isRedisConnected() ? "connected" : "disconnected",
    });
  });

  app.use("/api", requireApiKey(options.apiKeys ?? [], production));
  if (options.rateLimit) {
    app.use("/api", rateLimit(options.rateLimit));
  }

  app.use("/api/market", marketRoutes(market));

  const { ledger } = options;
  if (ledger && !production) {
    app.post(
      "/api/ledger/credit",
      validate([commonRules.account("account"), commonRules.amount("amount")]),
      (req: Request, res: Response) => {
        const { account, amount } = req.body;
        if (typeof account !== "string" || typeof amount !== "string") {
          throw new AppError(400, "validation_failed", "account and amount are required");
        }
        ledger.credit(account, BigInt(amount));
        res.json({ account, balance: ledger.balanceOf(account).toString() });
      }
    );
    app.get("/api/ledger/:account", (req: Request, res: Response) => {
      res.json({ account: req.params.account, balance: ledger.balanceOf(req.params.account).toString() });
    });
  }

  // Error handling (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

async function startServer(overrides?: ServiceConfig): Promise<void> {
  try {
    const config = overrides ?? loadConfig();
    if (!config.registryUrlTemplate) {
      throw new ConfigError("REGISTRY_URL_TEMPLATE", "required to reach asset registries");
    }

    const ledger = new MemoryLedger();
    const market = new Marketplace({
      ledger,
      gateway: new HttpRegistryGateway(config.registryUrlTemplate),
      owner: config.owner,
      treasury: config.treasury,
      marketAccount: config.marketAccount,
      transactionFeeBps: config.transactionFeeBps,
      approvedRegistries: config.approvedRegistries,
    });

    // Event journal is optional; a configured but unreachable database is fatal
    let journal: EventJournal | undefined;
    if (await initDatabase(config.databaseUrl)) {
      journal = new EventJournal({ query });
      await journal.createTables();
      journal.attach(market.events);
    }

    // Initialize Redis (optional in dev, required in prod)
    await initRedis(config.redisUrl, config.production);

    const app = createApp(market, {
      production: config.production,
      apiKeys: config.apiKeys,
      rateLimit: config.rateLimit ? { settings: config.rateLimit } : undefined,
      ledger,
    });
    const server = app.listen(config.port, () => {
      logger.info(`[API] Server listening on http://localhost:${config.port}`);
      logger.info(`[API] Environment: ${config.production ? "production" : "development"}`);
      logger.info(`[API] Database: ${isDatabaseConnected() ? "connected" : "disconnected"}`);
      logger.info(`[API] Redis: ${isRedisConnected() ? "connected" : "disconnected"}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`[API] ${signal} received, shutting down`);
      server.close();
      market
        .drain()
        .then(() => journal?.flush())
        .then(() => closeDatabase())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("[API] Shutdown failed", { error });
          process.exit(1);
        });
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  } catch (error) {
    logger.error("[API] Failed to start server", { error });
    process.exit(1);
  }
}

// Start server if this file is run directly
if (require.main === module) {
  void startServer();
}

export { startServer };
