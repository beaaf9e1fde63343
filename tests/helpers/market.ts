import { expect } from "chai";
import { MarketError, MarketErrorCode } from "../../offchain/src/market/types";
import { MemoryLedger } from "../../offchain/src/market/ledger";
import { Marketplace, MarketplaceOptions } from "../../offchain/src/market/marketplace";
import { RegistryGateway, TransferPayoutRequest } from "../../offchain/src/market/registry";
import { CallContext } from "../../offchain/src/market/call";

export const OWNER = "owner.test";
export const TREASURY = "treasury.test";
export const REGISTRY = "assets.test";
export const MARKET = "market";
export const UNIT = 10_000n;
export const START = 1_700_000_000_000;

type Responder = () => Promise<Uint8Array | string>;

export interface Held {
  resolve(payload: string): void;
  reject(reason: string): void;
}

/**
 * In-process stand-in for an asset registry. Responses are queued per
 * request; with nothing queued the transfer succeeds without a payout.
 */
export class FakeRegistry implements RegistryGateway {
  readonly requests: TransferPayoutRequest[] = [];
  private queue: Responder[] = [];

  willPay(payout: Record<string, string>): this {
    return this.willReturn(JSON.stringify(payout));
  }

  willReturn(raw: string): this {
    this.queue.push(async () => raw);
    return this;
  }

  willFail(reason: string): this {
    this.queue.push(async () => {
      throw new Error(reason);
    });
    return this;
  }

  /** Leave the next request pending until the test settles it */
  willHold(): Held {
    let settle: Held = { resolve: () => undefined, reject: () => undefined };
    const pending = new Promise<string>((resolve, reject) => {
      settle = { resolve, reject: (reason) => reject(new Error(reason)) };
    });
    this.queue.push(() => pending);
    return {
      resolve: (payload) => settle.resolve(payload),
      reject: (reason) => settle.reject(reason),
    };
  }

  async transferPayout(request: TransferPayoutRequest): Promise<Uint8Array | string> {
    this.requests.push(request);
    const next = this.queue.shift();
    return next ? next() : "";
  }
}

export interface TestMarket {
  market: Marketplace;
  ledger: MemoryLedger;
  registry: FakeRegistry;
  clock: { now: number };
}

export function createTestMarket(overrides: Partial<MarketplaceOptions> = {}): TestMarket {
  const ledger = new MemoryLedger();
  const registry = new FakeRegistry();
  const clock = { now: START };

  const market = new Marketplace({
    ledger,
    gateway: registry,
    owner: OWNER,
    treasury: TREASURY,
    marketAccount: MARKET,
    approvedRegistries: [REGISTRY],
    storageUnitCost: UNIT,
    clock: () => clock.now,
    ...overrides,
  });

  for (const account of ["alice", "bob", "carol", "dave", OWNER]) {
    ledger.credit(account, 1_000_000n);
  }
  return { market, ledger, registry, clock };
}

export function by(caller: string, deposit = 0n, signer?: string): CallContext {
  return { caller, deposit, signer };
}

export function saleMessage(price: bigint, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ marketType: "sale", price: price.toString(), ...extra });
}

/** Pay storage for `units` reservations, then list through the registry callback */
export function list(
  t: TestMarket,
  owner: string,
  assetId: string,
  price: bigint,
  extra: Record<string, unknown> = {},
  approvalId = 1
) {
  if (t.market.storageBalanceOf(owner) < BigInt(t.market.reservationCount(owner) + 1) * UNIT) {
    t.market.storageDeposit(by(owner, UNIT));
  }
  return t.market.onApprove(by(REGISTRY, 0n, owner), {
    owner,
    assetId,
    approvalId,
    msg: saleMessage(price, extra),
  });
}

export function expectMarketError(fn: () => unknown, code: MarketErrorCode): MarketError {
  try {
    fn();
  } catch (error) {
    expect(error).to.be.instanceOf(MarketError);
    if (error instanceof MarketError) {
      expect(error.code).to.equal(code);
      return error;
    }
  }
  throw new Error(`Expected MarketError ${code}`);
}
