import { AccountId } from "../shared/types";
import { MarketSettings } from "./admin";
import { CallFrame, CallState } from "./call";
import { OfferKey, offerKey } from "./keys";
import { assertNativeCurrency, assertPrice } from "./listings";
import { ReservationIndex } from "./reservations";
import { StorageDeposits } from "./storage";
import { MakeOfferInput, Offer, fail } from "./types";

/**
 * Standing, fully escrowed buy offers keyed by (registry, buyer, asset).
 */
export class OfferStore implements CallState {
  private offers = new Map<OfferKey, Offer>();

  constructor(
    private readonly settings: MarketSettings,
    private readonly reservations: ReservationIndex,
    private readonly storage: StorageDeposits,
  ) {}

  get(registry: AccountId, buyer: AccountId, assetId: string): Offer | undefined {
    return this.offers.get(offerKey(registry, buyer, assetId));
  }

  require(registry: AccountId, buyer: AccountId, assetId: string): Offer {
    const offer = this.get(registry, buyer, assetId);
    if (!offer) {
      fail("NOT_FOUND", "Error: Offer does not exist");
    }
    return offer;
  }

  /** Offers standing on one asset, any buyer */
  forAsset(registry: AccountId, assetId: string): Offer[] {
    return [...this.offers.values()].filter(
      (offer) => offer.registry === registry && offer.assetId === assetId,
    );
  }

  checkpoint(): () => void {
    const saved = new Map(this.offers);
    return () => {
      this.offers = saved;
    };
  }

  /**
   * Place an offer. A standing offer from the same buyer on the same asset
   * is refunded and replaced in the same call.
   */
  make(frame: CallFrame, input: MakeOfferInput): Offer {
    const buyer = frame.caller;
    if (!this.settings.isApprovedRegistry(input.registry)) {
      fail("UNAPPROVED_REGISTRY", `Error: offers are only accepted for approved registries`);
    }
    if (frame.deposit !== input.price) {
      fail("INVALID_DEPOSIT", "Error: Attached deposit != price");
    }
    assertNativeCurrency(input.currency);
    assertPrice(input.price);

    const key = offerKey(input.registry, buyer, input.assetId);
    const replacing = this.reservations.hasOffer(buyer, key) ? 1 : 0;
    this.storage.assertCovers(buyer, this.reservations.count(buyer) - replacing + 1, "offer");

    const previous = this.remove(input.registry, buyer, input.assetId);
    if (previous) {
      frame.pay(buyer, previous.price);
    }

    const offer: Offer = {
      buyer,
      registry: input.registry,
      assetId: input.assetId,
      currency: input.currency,
      price: input.price,
    };
    this.offers.set(key, offer);
    this.reservations.addOffer(buyer, key);

    frame.emit("offer_added", {
      buyer,
      registry: offer.registry,
      assetId: offer.assetId,
      currency: offer.currency,
      price: offer.price.toString(),
    });
    return offer;
  }

  cancel(frame: CallFrame, registry: AccountId, assetId: string): Offer {
    frame.requireOneUnit();
    const buyer = frame.caller;
    const offer = this.require(registry, buyer, assetId);
    if (offer.buyer !== buyer) {
      fail("UNAUTHORIZED", "Error: Caller not offer's buyer");
    }

    this.remove(registry, buyer, assetId);
    frame.pay(offer.buyer, offer.price);
    frame.emit("offer_deleted", { buyer, registry, assetId });
    return offer;
  }

  /**
   * Drop an offer and release the buyer's reservation. Escrow is left to
   * the caller: refunded on cancel, forwarded into settlement on accept.
   */
  remove(registry: AccountId, buyer: AccountId, assetId: string): Offer | undefined {
    const key = offerKey(registry, buyer, assetId);
    const offer = this.offers.get(key);
    if (!offer) {
      return undefined;
    }
    this.offers.delete(key);
    this.reservations.removeOffer(offer.buyer, key);
    return offer;
  }
}
