/**
 * Marketplace administration
 *
 * Sends owner-only configuration calls to a running marketplace API. Every
 * call attaches the required one-unit deposit.
 *
 * Usage:
 *   npx tsx offchain/src/scripts/marketAdmin.ts set-fee 250 --account market-owner
 *   npx tsx offchain/src/scripts/marketAdmin.ts approve-registry assets.test art.test
 */

import "dotenv/config";
import fetch from "node-fetch";
import { FetchLike } from "../market/httpRegistry";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { logger } from "../shared/logger";
import { MARKET_LIMITS } from "../market/types";

export type AdminCommand =
  | { name: "set-fee"; feeBps: number }
  | { name: "set-treasury"; treasury: string }
  | { name: "transfer-ownership"; owner: string }
  | { name: "approve-registry"; registries: string[] }
  | { name: "revoke-registry"; registries: string[] };

export interface AdminRequest {
  method: "PUT" | "POST" | "DELETE";
  path: string;
  body: Record<string, unknown>;
}

export interface AdminTarget {
  api: string;
  account: string;
  apiKey?: string;
}

const deposit = MARKET_LIMITS.oneUnit.toString();

export function buildAdminRequest(command: AdminCommand): AdminRequest {
  switch (command.name) {
    case "set-fee":
      return { method: "PUT", path: "/api/market/config/fee", body: { deposit, feeBps: command.feeBps } };
    case "set-treasury":
      return { method: "PUT", path: "/api/market/config/treasury", body: { deposit, treasury: command.treasury } };
    case "transfer-ownership":
      return { method: "PUT", path: "/api/market/config/owner", body: { deposit, owner: command.owner } };
    case "approve-registry":
      return { method: "POST", path: "/api/market/config/registries", body: { deposit, registries: command.registries } };
    case "revoke-registry":
      return { method: "DELETE", path: "/api/market/config/registries", body: { deposit, registries: command.registries } };
  }
}

export async function sendAdminRequest(
  target: AdminTarget,
  request: AdminRequest,
  fetchImpl: FetchLike = fetch
): Promise<unknown> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "X-Account-Id": target.account,
  };
  if (target.apiKey) {
    headers["X-API-Key"] = target.apiKey;
  }

  const response = await fetchImpl(`${target.api.replace(/\/+$/, "")}${request.path}`, {
    method: request.method,
    headers,
    body: JSON.stringify(request.body),
  });
  const payload: unknown = await response.json();
  if (!response.ok) {
    throw new Error(`${request.method} ${request.path} failed (${response.status}): ${JSON.stringify(payload)}`);
  }
  return payload;
}

async function run(target: AdminTarget, command: AdminCommand): Promise<void> {
  const result = await sendAdminRequest(target, buildAdminRequest(command));
  console.log(JSON.stringify(result, null, 2));
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("marketAdmin")
    .option("api", {
      type: "string",
      default: process.env.MARKET_API_URL || "http://localhost:4000",
      description: "Marketplace API base URL",
    })
    .option("account", {
      type: "string",
      default: process.env.MARKET_OWNER || "market-owner",
      description: "Calling account (must be the marketplace owner)",
    })
    .option("api-key", {
      type: "string",
      default: process.env.MARKET_API_KEY,
      description: "API key, when the server requires one",
    })
    .command(
      "set-fee <bps>",
      "Set the transaction fee in basis points",
      (y) => y.positional("bps", { type: "number", demandOption: true }),
      (argv) => run({ api: argv.api, account: argv.account, apiKey: argv["api-key"] }, { name: "set-fee", feeBps: argv.bps })
    )
    .command(
      "set-treasury <treasury>",
      "Set the account receiving fees",
      (y) => y.positional("treasury", { type: "string", demandOption: true }),
      (argv) =>
        run({ api: argv.api, account: argv.account, apiKey: argv["api-key"] }, { name: "set-treasury", treasury: argv.treasury })
    )
    .command(
      "transfer-ownership <owner>",
      "Hand the marketplace to a new owner",
      (y) => y.positional("owner", { type: "string", demandOption: true }),
      (argv) =>
        run({ api: argv.api, account: argv.account, apiKey: argv["api-key"] }, { name: "transfer-ownership", owner: argv.owner })
    )
    .command(
      "approve-registry <registries..>",
      "Approve asset registries",
      (y) => y.positional("registries", { type: "string", array: true, demandOption: true }),
      (argv) =>
        run(
          { api: argv.api, account: argv.account, apiKey: argv["api-key"] },
          { name: "approve-registry", registries: argv.registries }
        )
    )
    .command(
      "revoke-registry <registries..>",
      "Remove asset registries from the approved list",
      (y) => y.positional("registries", { type: "string", array: true, demandOption: true }),
      (argv) =>
        run(
          { api: argv.api, account: argv.account, apiKey: argv["api-key"] },
          { name: "revoke-registry", registries: argv.registries }
        )
    )
    .demandCommand(1)
    .strict()
    .parseAsync();
}

if (require.main === module) {
  main().catch((error) => {
    logger.error("[ADMIN] Command failed", { error: error instanceof Error ? error.message : String(error) });
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
