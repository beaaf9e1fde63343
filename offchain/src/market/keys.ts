import { AccountId } from "../shared/types";

export const KEY_DELIMITER = "||";

/** registry||asset */
export type ListingKey = `${string}${typeof KEY_DELIMITER}${string}`;

/** registry||buyer||asset */
export type OfferKey = `${string}${typeof KEY_DELIMITER}${string}${typeof KEY_DELIMITER}${string}`;

/** Account ids are key components and may not contain the delimiter */
export function isAccountId(value: string): boolean {
  return value.length > 0 && !value.includes(KEY_DELIMITER);
}

export function listingKey(registry: AccountId, assetId: string): ListingKey {
  return `${registry}${KEY_DELIMITER}${assetId}`;
}

export function offerKey(registry: AccountId, buyer: AccountId, assetId: string): OfferKey {
  return `${registry}${KEY_DELIMITER}${buyer}${KEY_DELIMITER}${assetId}`;
}
