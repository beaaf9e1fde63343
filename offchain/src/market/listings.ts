import { logger } from "../shared/logger";
import { AccountId } from "../shared/types";
import { MarketSettings } from "./admin";
import { CallFrame, CallState } from "./call";
import { ListingKey, listingKey } from "./keys";
import { ReservationIndex } from "./reservations";
import { StorageDeposits } from "./storage";
import { CreateListingInput, Listing, MARKET_LIMITS, NATIVE_CURRENCY, fail } from "./types";

export function assertPrice(price: bigint): void {
  if (price < 0n) {
    fail("INVALID_PRICE", "Price must not be negative");
  }
  if (price >= MARKET_LIMITS.maxPrice) {
    fail("INVALID_PRICE", `Error: price higher than ${MARKET_LIMITS.maxPrice}`);
  }
}

export function assertNativeCurrency(currency: string): void {
  if (currency !== NATIVE_CURRENCY) {
    fail("UNSUPPORTED_CURRENCY", `Only ${NATIVE_CURRENCY} is supported`);
  }
}

/**
 * Direct-sale and auction listings, one per (registry, asset).
 */
export class ListingStore implements CallState {
  private listings = new Map<ListingKey, Listing>();

  constructor(
    private readonly settings: MarketSettings,
    private readonly reservations: ReservationIndex,
    private readonly storage: StorageDeposits,
  ) {}

  get(registry: AccountId, assetId: string): Listing | undefined {
    return this.listings.get(listingKey(registry, assetId));
  }

  require(registry: AccountId, assetId: string): Listing {
    const listing = this.get(registry, assetId);
    if (!listing) {
      fail("NOT_FOUND", `Listing ${listingKey(registry, assetId)} does not exist`);
    }
    return listing;
  }

  list(from = 0, limit = 50): Listing[] {
    return [...this.listings.values()].slice(Math.max(0, from), Math.max(0, from) + Math.max(0, limit));
  }

  checkpoint(): () => void {
    const saved = new Map(this.listings);
    return () => {
      this.listings = saved;
    };
  }

  /**
   * Record a listing. Re-listing a key drops the old record first,
   * refunding any bids it carried.
   */
  create(frame: CallFrame, input: CreateListingInput): Listing {
    assertPrice(input.price);
    if (!this.settings.approvedCurrencies().includes(input.currency)) {
      fail("UNSUPPORTED_CURRENCY", `Currency ${input.currency} is not approved`);
    }
    assertNativeCurrency(input.currency);
    this.assertWindow(frame.now, input.startedAt, input.endedAt);

    const key = listingKey(input.registry, input.assetId);
    const held = this.reservations.hasListing(input.owner, key) ? 0 : 1;
    this.storage.assertCovers(input.owner, this.reservations.count(input.owner) + held, "sale");

    if (this.listings.has(key)) {
      this.remove(frame, input.registry, input.assetId);
    }

    const listing: Listing = {
      owner: input.owner,
      approvalId: input.approvalId,
      registry: input.registry,
      assetId: input.assetId,
      currency: input.currency,
      price: input.price,
      bids: input.isAuction ? [] : undefined,
      startedAt: input.startedAt,
      endedAt: input.endedAt,
      isAuction: input.isAuction,
    };
    this.listings.set(key, listing);
    this.reservations.addListing(listing.owner, key);

    frame.emit("listing_created", {
      owner: listing.owner,
      approvalId: listing.approvalId,
      registry: listing.registry,
      assetId: listing.assetId,
      currency: listing.currency,
      price: listing.price.toString(),
      startedAt: listing.startedAt ?? null,
      endedAt: listing.endedAt ?? null,
      isAuction: listing.isAuction ?? null,
    });
    return listing;
  }

  updatePrice(frame: CallFrame, registry: AccountId, assetId: string, currency: string, price: bigint): Listing {
    frame.requireOneUnit();
    const listing = this.require(registry, assetId);
    if (listing.owner !== frame.caller) {
      fail("UNAUTHORIZED", "Error: Seller only");
    }
    if (listing.currency !== currency) {
      fail("UNSUPPORTED_CURRENCY", "Error: currency differs");
    }
    assertPrice(price);

    const updated: Listing = { ...listing, price };
    this.listings.set(listingKey(registry, assetId), updated);
    frame.emit("listing_updated", {
      owner: updated.owner,
      registry,
      assetId,
      currency,
      price: price.toString(),
    });
    return updated;
  }

  /** Owner or marketplace administrator */
  delete(frame: CallFrame, registry: AccountId, assetId: string): Listing {
    frame.requireOneUnit();
    const listing = this.require(registry, assetId);
    if (frame.caller !== listing.owner && frame.caller !== this.settings.getOwner()) {
      fail("UNAUTHORIZED", "Error: Seller or owner only");
    }

    this.remove(frame, registry, assetId);
    frame.emit("listing_deleted", { owner: listing.owner, registry, assetId });
    return listing;
  }

  /** Replace a listing's bid list in place */
  replaceBids(registry: AccountId, assetId: string, bids: Listing["bids"]): Listing {
    const listing = this.require(registry, assetId);
    const updated: Listing = { ...listing, bids };
    this.listings.set(listingKey(registry, assetId), updated);
    return updated;
  }

  /**
   * Drop a listing from storage, refund its outstanding bids and release
   * the owner's reservation. Returns the removed record.
   */
  remove(frame: CallFrame, registry: AccountId, assetId: string): Listing | undefined {
    const key = listingKey(registry, assetId);
    const listing = this.listings.get(key);
    if (!listing) {
      return undefined;
    }

    this.listings.delete(key);
    for (const bid of listing.bids ?? []) {
      frame.pay(bid.bidder, bid.price);
    }
    this.reservations.removeListing(listing.owner, key);

    logger.debug("[LISTING] removed", {
      key,
      refundedBids: listing.bids?.length ?? 0,
    });
    return listing;
  }

  private assertWindow(now: number, startedAt?: number, endedAt?: number): void {
    if (startedAt !== undefined) {
      if (startedAt < now) {
        fail("INVALID_WINDOW", "Error: start time is in the past");
      }
      if (endedAt !== undefined && startedAt >= endedAt) {
        fail("INVALID_WINDOW", "Error: start time must precede end time");
      }
    }
    if (endedAt !== undefined && endedAt < now) {
      fail("INVALID_WINDOW", "Error: end time is in the past");
    }
  }
}
