/**
 * ======================================================================
 * MARKETPLACE - Type Definitions
 * ======================================================================
 *
 * Listings, bids, offers and the settlement records that flow between
 * the stores and the settlement protocol. Amounts are bigint minimal units,
 * times are unix milliseconds.
 */

import { AccountId, SettlementSource } from "../shared/types";

export const NATIVE_CURRENCY = "native";

export const MARKET_LIMITS = {
  /** Prices must be strictly below this */
  maxPrice: 1_000_000_000n * 10n ** 24n,
  /** Per reservation (listing or offer) */
  storageUnitCost: 8_590_000_000_000_000_000_000n,
  payoutTolerance: 100n,
  maxPayoutRecipients: 10,
  defaultFeeBps: 200,
  feeDenominator: 10_000,
  /** Exact deposit required by guarded calls */
  oneUnit: 1n,
} as const;

export interface Bid {
  readonly bidder: AccountId;
  readonly price: bigint;
}

export interface Listing {
  readonly owner: AccountId;
  /** Credential issued by the registry for this exact transfer */
  readonly approvalId: number;
  readonly registry: AccountId;
  readonly assetId: string;
  readonly currency: string;
  /** Starting price when on auction */
  readonly price: bigint;
  readonly bids?: readonly Bid[];
  readonly startedAt?: number;
  readonly endedAt?: number;
  readonly isAuction?: boolean;
}

export interface Offer {
  readonly buyer: AccountId;
  readonly registry: AccountId;
  readonly assetId: string;
  readonly currency: string;
  /** Fully escrowed */
  readonly price: bigint;
}

export interface CreateListingInput {
  owner: AccountId;
  approvalId: number;
  registry: AccountId;
  assetId: string;
  currency: string;
  price: bigint;
  startedAt?: number;
  endedAt?: number;
  isAuction?: boolean;
}

export interface BuyInput {
  registry: AccountId;
  assetId: string;
  currency?: string;
  price?: bigint;
}

export interface PlaceBidInput {
  registry: AccountId;
  assetId: string;
  currency: string;
  amount: bigint;
}

export interface MakeOfferInput {
  registry: AccountId;
  assetId: string;
  currency: string;
  price: bigint;
}

export interface AcceptOfferInput {
  seller: AccountId;
  registry: AccountId;
  buyer: AccountId;
  assetId: string;
  approvalId: number;
  price: bigint;
}

/**
 * Immutable capture of a removed listing or offer, threaded from schedule
 * to resolve. Resolution never looks the record up again.
 */
export interface SettlementSnapshot {
  readonly id: string;
  readonly source: SettlementSource;
  readonly seller: AccountId;
  readonly buyer: AccountId;
  readonly registry: AccountId;
  readonly assetId: string;
  readonly approvalId: number;
  readonly currency: string;
  readonly price: bigint;
  readonly listing?: Listing;
  readonly offer?: Offer;
  readonly scheduledAt: number;
}

export type SettlementStatus = "scheduled" | "paid" | "refunded";

export interface PayoutTransfer {
  readonly to: AccountId;
  readonly amount: bigint;
  readonly reason: "seller" | "royalty" | "fee" | "refund";
}

export interface SettlementRecord {
  readonly snapshot: SettlementSnapshot;
  readonly status: SettlementStatus;
  readonly royalties?: boolean;
  readonly transfers: readonly PayoutTransfer[];
  readonly failureReason?: string;
  readonly resolvedAt?: number;
}

export interface SettlementTicket {
  readonly settlementId: string;
  readonly buyer: AccountId;
  readonly price: bigint;
}

export type MarketErrorCode =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_DEPOSIT"
  | "INVALID_PRICE"
  | "INVALID_WINDOW"
  | "AUCTION_NOT_STARTED"
  | "AUCTION_ENDED"
  | "NOT_AUCTION"
  | "ON_AUCTION"
  | "BID_TOO_LOW"
  | "NO_BIDS"
  | "UNSUPPORTED_CURRENCY"
  | "UNAPPROVED_REGISTRY"
  | "INSUFFICIENT_STORAGE"
  | "INSUFFICIENT_BALANCE"
  | "SELF_TRADE"
  | "PRICE_MISMATCH"
  | "INVALID_FEE"
  | "INVALID_MESSAGE";

/**
 * Precondition violation. Thrown before any state change, so the whole
 * call is dropped.
 */
export class MarketError extends Error {
  constructor(
    public readonly code: MarketErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MarketError";
  }
}

export function fail(code: MarketErrorCode, message: string): never {
  throw new MarketError(code, message);
}
