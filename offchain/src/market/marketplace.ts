/**
 * ======================================================================
 * MARKETPLACE
 * ======================================================================
 *
 * Entry point for every marketplace call. Each mutating method runs as one
 * all-or-nothing call on the CallHost; reads go straight to the stores.
 */

import { EventLog } from "../shared/events";
import { logger } from "../shared/logger";
import { AccountId } from "../shared/types";
import { MarketSettings } from "./admin";
import { ApprovalNotice, parseApprovalMessage } from "./approval";
import { AuctionEngine } from "./auction";
import { CallContext, CallFrame, CallHost } from "./call";
import { NativeLedger } from "./ledger";
import { ListingStore } from "./listings";
import { OfferStore } from "./offers";
import { RegistryGateway } from "./registry";
import { ReservationIndex } from "./reservations";
import { SettlementProtocol } from "./settlement";
import { StorageDeposits } from "./storage";
import {
  AcceptOfferInput,
  BuyInput,
  Listing,
  MakeOfferInput,
  MARKET_LIMITS,
  NATIVE_CURRENCY,
  Offer,
  PlaceBidInput,
  SettlementRecord,
  SettlementTicket,
  fail,
} from "./types";

export interface MarketplaceOptions {
  ledger: NativeLedger;
  gateway: RegistryGateway;
  owner: AccountId;
  /** Defaults to the owner */
  treasury?: AccountId;
  /** Account holding escrow and storage deposits */
  marketAccount?: AccountId;
  transactionFeeBps?: number;
  approvedRegistries?: AccountId[];
  approvedCurrencies?: string[];
  storageUnitCost?: bigint;
  clock?: () => number;
  events?: EventLog;
}

export type ApprovalResult =
  | { marketType: "sale"; listing: Listing }
  | { marketType: "accept_offer"; ticket: SettlementTicket };

export class Marketplace {
  readonly events: EventLog;
  readonly settings: MarketSettings;

  private readonly host: CallHost;
  private readonly reservations = new ReservationIndex();
  private readonly storage: StorageDeposits;
  private readonly listings: ListingStore;
  private readonly offers: OfferStore;
  private readonly auctions: AuctionEngine;
  private readonly settlements: SettlementProtocol;

  constructor(options: MarketplaceOptions) {
    const clock = options.clock ?? Date.now;
    this.events = options.events ?? new EventLog(clock);
    this.host = new CallHost(options.ledger, options.marketAccount ?? "market", this.events, clock);
    this.settings = new MarketSettings({
      owner: options.owner,
      treasury: options.treasury ?? options.owner,
      transactionFeeBps: options.transactionFeeBps,
      approvedRegistries: options.approvedRegistries,
      approvedCurrencies: options.approvedCurrencies,
    });
    this.storage = new StorageDeposits(this.reservations, options.storageUnitCost ?? MARKET_LIMITS.storageUnitCost);
    this.listings = new ListingStore(this.settings, this.reservations, this.storage);
    this.offers = new OfferStore(this.settings, this.reservations, this.storage);
    this.auctions = new AuctionEngine(this.settings, this.listings, this.reservations, this.storage);
    this.settlements = new SettlementProtocol(this.host, this.settings, options.gateway);
    this.host.track(this.settings, this.reservations, this.storage, this.listings, this.offers);
  }

  get marketAccount(): AccountId {
    return this.host.marketAccount;
  }

  // ==========================================================================
  // Purchases
  // ==========================================================================

  /** Fixed-price purchase; deposit above the price is returned */
  buy(ctx: CallContext, input: BuyInput): SettlementTicket {
    return this.host.run(ctx, (frame) => {
      const listing = this.listings.require(input.registry, input.assetId);
      if (listing.isAuction) {
        fail("ON_AUCTION", "Error: listing is on auction");
      }
      if (listing.owner === frame.caller) {
        fail("SELF_TRADE", "Error: Cannot buy your own sale");
      }
      if (input.currency !== undefined && input.currency !== listing.currency) {
        fail("UNSUPPORTED_CURRENCY", "Error: currency differs from listing");
      }
      if (input.price !== undefined && input.price !== listing.price) {
        fail("PRICE_MISMATCH", "Error: price differs from listing");
      }
      if (frame.deposit < listing.price) {
        fail("INVALID_DEPOSIT", "Error: Attached deposit is less than price");
      }

      frame.pay(frame.caller, frame.deposit - listing.price);
      return this.processPurchase(frame, input.registry, input.assetId, frame.caller, listing.price);
    });
  }

  placeBid(ctx: CallContext, input: PlaceBidInput): Listing {
    return this.host.run(ctx, (frame) => this.auctions.placeBid(frame, input));
  }

  acceptBid(ctx: CallContext, registry: AccountId, assetId: string): SettlementTicket {
    return this.host.run(ctx, (frame) =>
      this.auctions.acceptBid(frame, registry, assetId, (f, r, a, buyer, price) =>
        this.processPurchase(f, r, a, buyer, price),
      ),
    );
  }

  cancelBid(ctx: CallContext, registry: AccountId, assetId: string, account: AccountId): Listing {
    return this.host.run(ctx, (frame) => this.auctions.cancelBid(frame, registry, assetId, account));
  }

  // ==========================================================================
  // Offers
  // ==========================================================================

  makeOffer(ctx: CallContext, input: MakeOfferInput): Offer {
    return this.host.run(ctx, (frame) => this.offers.make(frame, input));
  }

  cancelOffer(ctx: CallContext, registry: AccountId, assetId: string): Offer {
    return this.host.run(ctx, (frame) => this.offers.cancel(frame, registry, assetId));
  }

  /**
   * Registry-relayed acceptance: the caller is the registry, the signer is
   * the seller.
   */
  acceptOffer(ctx: CallContext, input: AcceptOfferInput): SettlementTicket {
    return this.host.run(ctx, (frame) => {
      this.assertRelayedBy(frame, input.registry, input.seller);
      return this.settleOffer(frame, input);
    });
  }

  // ==========================================================================
  // Listings
  // ==========================================================================

  /** Called by a registry once an owner approves the marketplace */
  onApprove(ctx: CallContext, notice: ApprovalNotice): ApprovalResult {
    return this.host.run(ctx, (frame) => {
      const registry = frame.caller;
      this.assertRelayedBy(frame, registry, notice.owner);

      const message = parseApprovalMessage(notice.msg);
      if (message.marketType === "accept_offer") {
        const ticket = this.settleOffer(frame, {
          seller: notice.owner,
          registry,
          buyer: message.buyer,
          assetId: notice.assetId,
          approvalId: notice.approvalId,
          price: message.price,
        });
        return { marketType: "accept_offer", ticket };
      }

      const listing = this.listings.create(frame, {
        owner: notice.owner,
        approvalId: notice.approvalId,
        registry,
        assetId: notice.assetId,
        currency: message.currency ?? NATIVE_CURRENCY,
        price: message.price,
        startedAt: message.startedAt,
        endedAt: message.endedAt,
        isAuction: message.isAuction,
      });
      return { marketType: "sale", listing };
    });
  }

  updatePrice(ctx: CallContext, registry: AccountId, assetId: string, currency: string, price: bigint): Listing {
    return this.host.run(ctx, (frame) => this.listings.updatePrice(frame, registry, assetId, currency, price));
  }

  deleteListing(ctx: CallContext, registry: AccountId, assetId: string): Listing {
    return this.host.run(ctx, (frame) => this.listings.delete(frame, registry, assetId));
  }

  // ==========================================================================
  // Storage
  // ==========================================================================

  storageDeposit(ctx: CallContext, account?: AccountId): bigint {
    return this.host.run(ctx, (frame) => this.storage.deposit(frame, account));
  }

  storageWithdraw(ctx: CallContext): bigint {
    return this.host.run(ctx, (frame) => this.storage.withdraw(frame));
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  setTreasury(ctx: CallContext, treasury: AccountId): void {
    this.host.run(ctx, (frame) => this.settings.setTreasury(frame, treasury));
  }

  setTransactionFee(ctx: CallContext, feeBps: number): void {
    this.host.run(ctx, (frame) => this.settings.setTransactionFee(frame, feeBps));
  }

  transferOwnership(ctx: CallContext, owner: AccountId): void {
    this.host.run(ctx, (frame) => this.settings.transferOwnership(frame, owner));
  }

  addApprovedRegistries(ctx: CallContext, registries: AccountId[]): void {
    this.host.run(ctx, (frame) => this.settings.addApprovedRegistries(frame, registries));
  }

  removeApprovedRegistries(ctx: CallContext, registries: AccountId[]): void {
    this.host.run(ctx, (frame) => this.settings.removeApprovedRegistries(frame, registries));
  }

  addApprovedCurrencies(ctx: CallContext, currencies: string[]): void {
    this.host.run(ctx, (frame) => this.settings.addApprovedCurrencies(frame, currencies));
  }

  removeApprovedCurrencies(ctx: CallContext, currencies: string[]): void {
    this.host.run(ctx, (frame) => this.settings.removeApprovedCurrencies(frame, currencies));
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  getListing(registry: AccountId, assetId: string): Listing | undefined {
    return this.listings.get(registry, assetId);
  }

  listListings(from?: number, limit?: number): Listing[] {
    return this.listings.list(from, limit);
  }

  getOffer(registry: AccountId, buyer: AccountId, assetId: string): Offer | undefined {
    return this.offers.get(registry, buyer, assetId);
  }

  offersFor(registry: AccountId, assetId: string): Offer[] {
    return this.offers.forAsset(registry, assetId);
  }

  getTransactionFee(): number {
    return this.settings.getTransactionFee();
  }

  getOwner(): AccountId {
    return this.settings.getOwner();
  }

  getTreasury(): AccountId {
    return this.settings.getTreasury();
  }

  approvedRegistries(): AccountId[] {
    return this.settings.approvedRegistries();
  }

  approvedCurrencies(): string[] {
    return this.settings.approvedCurrencies();
  }

  reservationCount(account: AccountId): number {
    return this.reservations.count(account);
  }

  storageBalanceOf(account: AccountId): bigint {
    return this.storage.balanceOf(account);
  }

  storageMinimumBalance(): bigint {
    return this.storage.minimumBalance();
  }

  settlement(settlementId: string): SettlementRecord | undefined {
    return this.settlements.get(settlementId);
  }

  whenSettled(settlementId: string): Promise<SettlementRecord | undefined> {
    return this.settlements.whenSettled(settlementId);
  }

  /** Wait until no settlement is waiting on a registry */
  drain(): Promise<void> {
    return this.settlements.drain();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Remove the listing (refunding any bids still on it) and hand the sale
   * to settlement.
   */
  private processPurchase(
    frame: CallFrame,
    registry: AccountId,
    assetId: string,
    buyer: AccountId,
    price: bigint,
  ): SettlementTicket {
    const listing = this.listings.remove(frame, registry, assetId);
    if (!listing) {
      return fail("NOT_FOUND", "Listing disappeared before purchase");
    }
    logger.info("[MARKET] purchase", { registry, assetId, buyer, price: price.toString() });
    return this.settlements.schedule(frame, { source: "listing", listing, buyer, price });
  }

  private settleOffer(frame: CallFrame, input: AcceptOfferInput): SettlementTicket {
    const offer = this.offers.require(input.registry, input.buyer, input.assetId);
    if (offer.price !== input.price) {
      fail("PRICE_MISMATCH", "Error: offer price differs");
    }
    if (input.seller === offer.buyer) {
      fail("SELF_TRADE", "Error: Cannot accept your own offer");
    }

    // a direct listing for the asset cannot outlive the transfer
    this.listings.remove(frame, input.registry, input.assetId);
    this.offers.remove(input.registry, input.buyer, input.assetId);

    logger.info("[MARKET] offer accepted", {
      registry: input.registry,
      assetId: input.assetId,
      buyer: input.buyer,
      price: input.price.toString(),
    });
    return this.settlements.schedule(frame, {
      source: "offer",
      offer,
      seller: input.seller,
      approvalId: input.approvalId,
    });
  }

  private assertRelayedBy(frame: CallFrame, registry: AccountId, owner: AccountId): void {
    if (frame.caller !== registry) {
      fail("UNAUTHORIZED", "Error: must be called by the registry");
    }
    if (frame.signer === undefined || frame.signer === frame.caller) {
      fail("UNAUTHORIZED", "Error: cannot be called directly");
    }
    if (frame.signer !== owner) {
      fail("UNAUTHORIZED", "Error: signer is not the asset owner");
    }
    if (!this.settings.isApprovedRegistry(registry)) {
      fail("UNAPPROVED_REGISTRY", `Error: ${registry} is not an approved registry`);
    }
  }
}
