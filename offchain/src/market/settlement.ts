/**
 * ======================================================================
 * SETTLEMENT PROTOCOL
 * ======================================================================
 *
 * Scheduled -> Resolved-Paid | Resolved-Refunded
 *
 * 1. schedule: runs inside the call that already removed the listing or
 *    offer. Captures an immutable snapshot; after the call commits, one
 *    transferPayout request goes to the registry.
 * 2. resolve: runs as its own internal call when the registry answers.
 *    - registry failed         -> refund the buyer, no fee
 *    - payout missing/invalid  -> seller gets price - fee, treasury gets fee
 *    - payout valid            -> each recipient paid, fee taken from the
 *                                 seller's entry
 *
 * Nothing here can restore a listing or offer: by the time the registry
 * answers, the deleting call has long committed. Refund is the only
 * recovery path.
 */

import { v4 as uuidv4 } from "uuid";
import { logger } from "../shared/logger";
import { AccountId } from "../shared/types";
import { MarketSettings } from "./admin";
import { CallFrame, CallHost } from "./call";
import { parsePayout, PayoutLimits } from "./payout";
import { RegistryGateway, RegistryOutcome, TransferPayoutRequest } from "./registry";
import {
  Listing,
  MARKET_LIMITS,
  Offer,
  PayoutTransfer,
  SettlementRecord,
  SettlementSnapshot,
  SettlementTicket,
} from "./types";

export type SettlementSubject =
  | { source: "listing"; listing: Listing; buyer: AccountId; price: bigint }
  | { source: "offer"; offer: Offer; seller: AccountId; approvalId: number };

export class SettlementProtocol {
  private records = new Map<string, SettlementRecord>();
  private pending = new Map<string, Promise<SettlementRecord>>();

  constructor(
    private readonly host: CallHost,
    private readonly settings: MarketSettings,
    private readonly gateway: RegistryGateway,
    private readonly limits: PayoutLimits = {
      tolerance: MARKET_LIMITS.payoutTolerance,
      maxRecipients: MARKET_LIMITS.maxPayoutRecipients,
    },
  ) {}

  /**
   * Capture the removed record and queue the registry request for after
   * the current call commits.
   */
  schedule(frame: CallFrame, subject: SettlementSubject): SettlementTicket {
    const snapshot = this.snapshot(frame, subject);
    frame.afterCommit(() => this.dispatch(snapshot));

    logger.info("[SETTLEMENT] scheduled", {
      settlementId: snapshot.id,
      source: snapshot.source,
      registry: snapshot.registry,
      assetId: snapshot.assetId,
      price: snapshot.price.toString(),
    });
    return { settlementId: snapshot.id, buyer: snapshot.buyer, price: snapshot.price };
  }

  /**
   * Settle a snapshot against the registry's answer. Runs as an internal
   * call of its own.
   */
  resolve(snapshot: SettlementSnapshot, outcome: RegistryOutcome): SettlementRecord {
    const record = this.host.runInternal((frame) =>
      outcome.ok ? this.payOut(frame, snapshot, outcome.payload) : this.refund(frame, snapshot, outcome.reason),
    );
    this.records.set(snapshot.id, record);
    return record;
  }

  get(settlementId: string): SettlementRecord | undefined {
    return this.records.get(settlementId);
  }

  /** Resolves once the settlement leaves the scheduled state */
  async whenSettled(settlementId: string): Promise<SettlementRecord | undefined> {
    const pending = this.pending.get(settlementId);
    return pending ? pending : this.records.get(settlementId);
  }

  /** Wait for every in-flight settlement */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending.values()]);
    }
  }

  private snapshot(frame: CallFrame, subject: SettlementSubject): SettlementSnapshot {
    const id = uuidv4();
    if (subject.source === "listing") {
      const { listing } = subject;
      return Object.freeze({
        id,
        source: subject.source,
        seller: listing.owner,
        buyer: subject.buyer,
        registry: listing.registry,
        assetId: listing.assetId,
        approvalId: listing.approvalId,
        currency: listing.currency,
        price: subject.price,
        listing: Object.freeze({ ...listing, bids: listing.bids ? Object.freeze([...listing.bids]) : undefined }),
        scheduledAt: frame.now,
      });
    }

    const { offer } = subject;
    return Object.freeze({
      id,
      source: subject.source,
      seller: subject.seller,
      buyer: offer.buyer,
      registry: offer.registry,
      assetId: offer.assetId,
      approvalId: subject.approvalId,
      currency: offer.currency,
      price: offer.price,
      offer: Object.freeze({ ...offer }),
      scheduledAt: frame.now,
    });
  }

  private dispatch(snapshot: SettlementSnapshot): void {
    this.records.set(snapshot.id, { snapshot, status: "scheduled", transfers: [] });

    const request: TransferPayoutRequest = {
      registry: snapshot.registry,
      receiver: snapshot.buyer,
      assetId: snapshot.assetId,
      approvalId: snapshot.approvalId,
      price: snapshot.price,
      maxPayoutRecipients: this.limits.maxRecipients,
    };

    let call: Promise<Uint8Array | string>;
    try {
      call = this.gateway.transferPayout(request);
    } catch (error) {
      call = Promise.reject(error);
    }

    const done = call
      .then(
        (payload): RegistryOutcome => ({ ok: true, payload }),
        (error: unknown): RegistryOutcome => ({
          ok: false,
          reason: error instanceof Error ? error.message : String(error),
        }),
      )
      .then((outcome) => this.resolveSafely(snapshot, outcome))
      .then((record) => {
        this.pending.delete(snapshot.id);
        return record;
      });

    this.pending.set(snapshot.id, done);
  }

  private resolveSafely(snapshot: SettlementSnapshot, outcome: RegistryOutcome): SettlementRecord {
    try {
      return this.resolve(snapshot, outcome);
    } catch (error) {
      // the resolution call was rolled back; leave it visible as stuck
      const reason = error instanceof Error ? error.message : String(error);
      logger.error("[SETTLEMENT] resolution failed", { settlementId: snapshot.id, error: reason });
      const record: SettlementRecord = { snapshot, status: "scheduled", transfers: [], failureReason: reason };
      this.records.set(snapshot.id, record);
      return record;
    }
  }

  private refund(frame: CallFrame, snapshot: SettlementSnapshot, reason: string): SettlementRecord {
    const transfers: PayoutTransfer[] = [{ to: snapshot.buyer, amount: snapshot.price, reason: "refund" }];
    this.apply(frame, transfers);

    frame.emit("purchase_failed", {
      ...this.eventParams(snapshot),
      reason,
    });
    logger.warn("[SETTLEMENT] registry transfer failed, buyer refunded", {
      settlementId: snapshot.id,
      reason,
    });
    return { snapshot, status: "refunded", transfers, failureReason: reason, resolvedAt: frame.now };
  }

  private payOut(frame: CallFrame, snapshot: SettlementSnapshot, payload: Uint8Array | string): SettlementRecord {
    const { price, seller } = snapshot;
    const fee = this.settings.feeFor(price);
    const treasury = this.settings.getTreasury();
    const payout = parsePayout(payload, price, this.limits);
    const sellerShare = payout?.get(seller);

    const transfers: PayoutTransfer[] = [];
    let royalties = false;

    if (payout && (sellerShare === undefined || sellerShare >= fee)) {
      royalties = true;
      for (const [to, amount] of payout) {
        if (to === seller) {
          transfers.push({ to, amount: amount - fee, reason: "seller" });
          transfers.push({ to: treasury, amount: fee, reason: "fee" });
        } else {
          transfers.push({ to, amount, reason: "royalty" });
        }
      }
    } else {
      if (payout) {
        logger.warn("[SETTLEMENT] seller share below fee, ignoring payout", {
          settlementId: snapshot.id,
        });
      }
      transfers.push({ to: seller, amount: price - fee, reason: "seller" });
      transfers.push({ to: treasury, amount: fee, reason: "fee" });
    }

    this.apply(frame, transfers);
    frame.emit("purchase_resolved", { ...this.eventParams(snapshot), royalties });

    return { snapshot, status: "paid", royalties, transfers: transfers.filter((t) => t.amount > 0n), resolvedAt: frame.now };
  }

  private apply(frame: CallFrame, transfers: PayoutTransfer[]): void {
    for (const transfer of transfers) {
      frame.pay(transfer.to, transfer.amount);
    }
  }

  private eventParams(snapshot: SettlementSnapshot) {
    return {
      settlementId: snapshot.id,
      source: snapshot.source,
      seller: snapshot.seller,
      buyer: snapshot.buyer,
      registry: snapshot.registry,
      assetId: snapshot.assetId,
      currency: snapshot.currency,
      price: snapshot.price.toString(),
    };
  }
}
