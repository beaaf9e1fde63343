import fetch, { RequestInit, Response } from "node-fetch";
import { logger } from "../shared/logger";
import { AccountId } from "../shared/types";
import { RegistryGateway, TransferPayoutRequest } from "./registry";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Talks to registries over HTTP. `urlTemplate` carries a `{registry}`
 * placeholder, e.g. https://{registry}.assets.local
 */
export class HttpRegistryGateway implements RegistryGateway {
  constructor(
    private readonly urlTemplate: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  registryUrl(registry: AccountId): string {
    return this.urlTemplate.replace("{registry}", encodeURIComponent(registry)).replace(/\/+$/, "");
  }

  async transferPayout(request: TransferPayoutRequest): Promise<Uint8Array> {
    const url = `${this.registryUrl(request.registry)}/transfer-payout`;
    const response = await this.fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        receiver: request.receiver,
        assetId: request.assetId,
        approvalId: request.approvalId,
        price: request.price.toString(),
        maxPayoutRecipients: request.maxPayoutRecipients,
      }),
    });

    if (!response.ok) {
      logger.warn("[REGISTRY] transfer rejected", {
        registry: request.registry,
        assetId: request.assetId,
        status: response.status,
      });
      throw new Error(`Registry ${request.registry} rejected transfer: ${response.status} ${response.statusText}`);
    }
    return new Uint8Array(await response.arrayBuffer());
  }
}
