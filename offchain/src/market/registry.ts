import { AccountId } from "../shared/types";

export interface TransferPayoutRequest {
  registry: AccountId;
  /** New owner of the asset */
  receiver: AccountId;
  assetId: string;
  approvalId: number;
  price: bigint;
  maxPayoutRecipients: number;
}

/**
 * Client side of the asset registries. `transferPayout` moves the asset and
 * resolves with the raw payout payload; a rejection means the registry
 * refused the transfer.
 */
export interface RegistryGateway {
  transferPayout(request: TransferPayoutRequest): Promise<Uint8Array | string>;
}

export type RegistryOutcome =
  | { ok: true; payload: Uint8Array | string }
  | { ok: false; reason: string };
