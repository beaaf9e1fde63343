import { AccountId } from "../shared/types";
import { CallState } from "./call";
import { ListingKey, OfferKey } from "./keys";

/**
 * Per-account reverse index of held listings and offers. The two key
 * namespaces live in separate maps and only meet in `count()`, which sizes
 * the storage requirement.
 */
export class ReservationIndex implements CallState {
  private listings = new Map<AccountId, Set<ListingKey>>();
  private offers = new Map<AccountId, Set<OfferKey>>();

  checkpoint(): () => void {
    const listings = copyIndex(this.listings);
    const offers = copyIndex(this.offers);
    return () => {
      this.listings = listings;
      this.offers = offers;
    };
  }

  addListing(account: AccountId, key: ListingKey): void {
    insert(this.listings, account, key);
  }

  removeListing(account: AccountId, key: ListingKey): void {
    remove(this.listings, account, key);
  }

  hasListing(account: AccountId, key: ListingKey): boolean {
    return this.listings.get(account)?.has(key) === true;
  }

  addOffer(account: AccountId, key: OfferKey): void {
    insert(this.offers, account, key);
  }

  removeOffer(account: AccountId, key: OfferKey): void {
    remove(this.offers, account, key);
  }

  hasOffer(account: AccountId, key: OfferKey): boolean {
    return this.offers.get(account)?.has(key) === true;
  }

  count(account: AccountId): number {
    return (this.listings.get(account)?.size ?? 0) + (this.offers.get(account)?.size ?? 0);
  }

  listingsOf(account: AccountId): ListingKey[] {
    return [...(this.listings.get(account) ?? [])];
  }

  offersOf(account: AccountId): OfferKey[] {
    return [...(this.offers.get(account) ?? [])];
  }

  /** Accounts with at least one reservation */
  accounts(): AccountId[] {
    return [...new Set([...this.listings.keys(), ...this.offers.keys()])];
  }
}

function copyIndex<K extends string>(index: Map<AccountId, Set<K>>): Map<AccountId, Set<K>> {
  return new Map([...index].map(([account, keys]) => [account, new Set(keys)]));
}

function insert<K extends string>(index: Map<AccountId, Set<K>>, account: AccountId, key: K): void {
  const keys = index.get(account);
  if (keys) {
    keys.add(key);
  } else {
    index.set(account, new Set([key]));
  }
}

function remove<K extends string>(index: Map<AccountId, Set<K>>, account: AccountId, key: K): void {
  const keys = index.get(account);
  if (!keys) {
    return;
  }
  keys.delete(key);
  // drop the entry once empty
  if (keys.size === 0) {
    index.delete(account);
  }
}
