import { AccountId } from "../shared/types";
import { MarketSettings } from "./admin";
import { CallFrame } from "./call";
import { assertNativeCurrency, ListingStore } from "./listings";
import { ReservationIndex } from "./reservations";
import { StorageDeposits } from "./storage";
import { Bid, Listing, PlaceBidInput, fail } from "./types";

export type PurchaseHandler<T> = (
  frame: CallFrame,
  registry: AccountId,
  assetId: string,
  buyer: AccountId,
  price: bigint,
) => T;

/**
 * Ascending-price bidding on top of auction listings. The bid list is kept
 * strictly increasing; its last entry is always the highest bid.
 */
export class AuctionEngine {
  constructor(
    private readonly settings: MarketSettings,
    private readonly listings: ListingStore,
    private readonly reservations: ReservationIndex,
    private readonly storage: StorageDeposits,
  ) {}

  placeBid(frame: CallFrame, input: PlaceBidInput): Listing {
    const listing = this.listings.require(input.registry, input.assetId);
    const bidder = frame.caller;

    if (!listing.isAuction) {
      fail("NOT_AUCTION", "Error: listing is not an auction");
    }
    if (listing.startedAt !== undefined && frame.now < listing.startedAt) {
      fail("AUCTION_NOT_STARTED", "Error: Sale has not started yet");
    }
    if (listing.endedAt !== undefined && frame.now > listing.endedAt) {
      fail("AUCTION_ENDED", "Error: Sale has ended");
    }
    if (listing.owner === bidder) {
      fail("SELF_TRADE", "Error: Owner cannot bid their own token");
    }
    if (frame.deposit < input.amount) {
      fail("INVALID_DEPOSIT", "Error: attached deposit is less than amount");
    }
    assertNativeCurrency(input.currency);
    this.storage.assertCovers(bidder, this.reservations.count(bidder) + 1, "bid");

    const bids = listing.bids ?? [];
    const highest = bids[bids.length - 1];
    if (highest && input.amount <= highest.price) {
      fail("BID_TOO_LOW", `Error: Can't pay less than or equal to current bid price: ${highest.price}`);
    }
    if (input.amount < listing.price) {
      fail("BID_TOO_LOW", `Error: Can't pay less than starting price: ${listing.price}`);
    }

    // the bidder's previous entry goes back to them before the new one lands
    const kept = this.refundBidsOf(frame, bids, bidder);
    frame.pay(bidder, frame.deposit - input.amount);

    const updated = this.listings.replaceBids(input.registry, input.assetId, [
      ...kept,
      { bidder, price: input.amount },
    ]);

    frame.emit("bid_added", {
      bidder,
      registry: input.registry,
      assetId: input.assetId,
      currency: input.currency,
      amount: input.amount.toString(),
    });
    return updated;
  }

  /**
   * Seller takes the highest bid. Every other bid is refunded and the
   * winner goes through the same purchase path as a direct buy.
   */
  acceptBid<T>(frame: CallFrame, registry: AccountId, assetId: string, purchase: PurchaseHandler<T>): T {
    frame.requireOneUnit();
    const listing = this.listings.require(registry, assetId);
    if (listing.owner !== frame.caller) {
      fail("UNAUTHORIZED", "Error: Only seller can call accept_bid");
    }

    const bids = listing.bids ?? [];
    const winner = bids[bids.length - 1];
    if (!winner) {
      fail("NO_BIDS", "Error: Cannot accept bid with empty bid");
    }

    for (const bid of bids.slice(0, -1)) {
      frame.pay(bid.bidder, bid.price);
    }
    this.listings.replaceBids(registry, assetId, []);

    return purchase(frame, registry, assetId, winner.bidder, winner.price);
  }

  /** Bidder withdraws, or the marketplace owner removes them */
  cancelBid(frame: CallFrame, registry: AccountId, assetId: string, account: AccountId): Listing {
    frame.requireOneUnit();
    const listing = this.listings.require(registry, assetId);
    const bids = listing.bids ?? [];
    if (bids.length === 0) {
      fail("NO_BIDS", "Error: Bids data does not exist");
    }
    if (frame.caller !== account && frame.caller !== this.settings.getOwner()) {
      fail("UNAUTHORIZED", "Error: Bidder or owner only");
    }

    const kept = this.refundBidsOf(frame, bids, account);
    const updated = this.listings.replaceBids(registry, assetId, kept);

    frame.emit("bid_cancelled", { bidder: account, registry, assetId });
    return updated;
  }

  private refundBidsOf(frame: CallFrame, bids: readonly Bid[], account: AccountId): Bid[] {
    return bids.filter((bid) => {
      if (bid.bidder === account) {
        frame.pay(bid.bidder, bid.price);
        return false;
      }
      return true;
    });
  }
}
