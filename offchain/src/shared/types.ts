export type AccountId = string;

export type SettlementSource = "listing" | "offer";

export type EventName =
  | "listing_created"
  | "listing_updated"
  | "listing_deleted"
  | "bid_added"
  | "bid_cancelled"
  | "offer_added"
  | "offer_deleted"
  | "purchase_resolved"
  | "purchase_failed"
  | "config_updated";

// Amounts are carried as decimal strings so events stay JSON-safe
export interface EventPayloads {
  listing_created: {
    owner: AccountId;
    registry: AccountId;
    assetId: string;
    approvalId: number;
    currency: string;
    price: string;
    startedAt: number | null;
    endedAt: number | null;
    isAuction: boolean | null;
  };
  listing_updated: {
    owner: AccountId;
    registry: AccountId;
    assetId: string;
    currency: string;
    price: string;
  };
  listing_deleted: {
    owner: AccountId;
    registry: AccountId;
    assetId: string;
  };
  bid_added: {
    bidder: AccountId;
    registry: AccountId;
    assetId: string;
    currency: string;
    amount: string;
  };
  bid_cancelled: {
    bidder: AccountId;
    registry: AccountId;
    assetId: string;
  };
  offer_added: {
    buyer: AccountId;
    registry: AccountId;
    assetId: string;
    currency: string;
    price: string;
  };
  offer_deleted: {
    buyer: AccountId;
    registry: AccountId;
    assetId: string;
  };
  purchase_resolved: {
    settlementId: string;
    source: SettlementSource;
    seller: AccountId;
    buyer: AccountId;
    registry: AccountId;
    assetId: string;
    currency: string;
    price: string;
    royalties: boolean;
  };
  purchase_failed: {
    settlementId: string;
    source: SettlementSource;
    seller: AccountId;
    buyer: AccountId;
    registry: AccountId;
    assetId: string;
    currency: string;
    price: string;
    reason: string;
  };
  config_updated: {
    field: string;
    value: string;
  };
}

export interface TypedEvent<K extends EventName> {
  name: K;
  ts: string;
  data: EventPayloads[K];
}

export type MarketEvent = TypedEvent<EventName>;
