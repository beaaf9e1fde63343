/**
 * Payout descriptions returned by an asset registry after a transfer.
 *
 * Two wire shapes are accepted, tried in order:
 *   {"alice": "950", "bob": "50"}
 *   {"payout": {"alice": "950", "bob": "50"}}
 * Amounts are decimal strings. A payout is trusted only when its amounts
 * add up to no more than the price and no less than price - tolerance.
 */

import { AccountId } from "../shared/types";
import { MARKET_LIMITS } from "./types";

export type PayoutMap = Map<AccountId, bigint>;

export interface PayoutLimits {
  tolerance: bigint;
  maxRecipients: number;
}

const DEFAULT_LIMITS: PayoutLimits = {
  tolerance: MARKET_LIMITS.payoutTolerance,
  maxRecipients: MARKET_LIMITS.maxPayoutRecipients,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeJson(payload: Uint8Array | string): unknown {
  const text = typeof payload === "string" ? payload : Buffer.from(payload).toString("utf-8");
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * recipient → amount, or null when the value is not a payout mapping.
 */
function toPayoutMap(value: unknown): PayoutMap | null {
  if (!isRecord(value)) {
    return null;
  }
  const payout: PayoutMap = new Map();
  for (const [recipient, amount] of Object.entries(value)) {
    if (typeof amount !== "string" || !/^\d+$/.test(amount)) {
      return null;
    }
    payout.set(recipient, BigInt(amount));
  }
  return payout;
}

export function payoutTotal(payout: PayoutMap): bigint {
  let total = 0n;
  for (const amount of payout.values()) {
    total += amount;
  }
  return total;
}

export function isWithinTolerance(payout: PayoutMap, price: bigint, tolerance: bigint): boolean {
  const total = payoutTotal(payout);
  return total <= price && price - total <= tolerance;
}

/**
 * Parse and check a registry payout. Returns null for anything that should
 * fall back to paying the seller directly.
 */
export function parsePayout(
  payload: Uint8Array | string | undefined,
  price: bigint,
  limits: PayoutLimits = DEFAULT_LIMITS,
): PayoutMap | null {
  if (payload === undefined) {
    return null;
  }
  const decoded = decodeJson(payload);

  const candidates: unknown[] = [decoded];
  if (isRecord(decoded) && Object.keys(decoded).length === 1 && "payout" in decoded) {
    candidates.push(decoded.payout);
  }

  for (const candidate of candidates) {
    const payout = toPayoutMap(candidate);
    if (!payout || payout.size === 0 || payout.size > limits.maxRecipients) {
      continue;
    }
    if (isWithinTolerance(payout, price, limits.tolerance)) {
      return payout;
    }
  }
  return null;
}
