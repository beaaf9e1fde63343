import { AccountId } from "../shared/types";
import { CallFrame, CallState } from "./call";
import { MARKET_LIMITS, NATIVE_CURRENCY, fail } from "./types";

export interface SettingsInit {
  owner: AccountId;
  treasury: AccountId;
  transactionFeeBps?: number;
  approvedRegistries?: AccountId[];
  approvedCurrencies?: string[];
}

/**
 * Contract-wide configuration. Every mutation is owner-only and needs an
 * exact one-unit deposit.
 */
export class MarketSettings implements CallState {
  private owner: AccountId;
  private treasury: AccountId;
  private feeBps: number;
  private registries: Set<AccountId>;
  private currencies: Set<string>;

  constructor(init: SettingsInit) {
    const feeBps = init.transactionFeeBps ?? MARKET_LIMITS.defaultFeeBps;
    assertFee(feeBps);
    this.owner = init.owner;
    this.treasury = init.treasury;
    this.feeBps = feeBps;
    this.registries = new Set(init.approvedRegistries ?? []);
    this.currencies = new Set([NATIVE_CURRENCY, ...(init.approvedCurrencies ?? [])]);
  }

  checkpoint(): () => void {
    const { owner, treasury, feeBps } = this;
    const registries = new Set(this.registries);
    const currencies = new Set(this.currencies);
    return () => {
      this.owner = owner;
      this.treasury = treasury;
      this.feeBps = feeBps;
      this.registries = registries;
      this.currencies = currencies;
    };
  }

  getOwner(): AccountId {
    return this.owner;
  }

  getTreasury(): AccountId {
    return this.treasury;
  }

  getTransactionFee(): number {
    return this.feeBps;
  }

  approvedRegistries(): AccountId[] {
    return [...this.registries];
  }

  approvedCurrencies(): string[] {
    return [...this.currencies];
  }

  isApprovedRegistry(registry: AccountId): boolean {
    return this.registries.has(registry);
  }

  /** price × bps / 10000, integer division */
  feeFor(price: bigint): bigint {
    return (price * BigInt(this.feeBps)) / BigInt(MARKET_LIMITS.feeDenominator);
  }

  assertOwner(caller: AccountId): void {
    if (caller !== this.owner) {
      fail("UNAUTHORIZED", "Owner only");
    }
  }

  setTreasury(frame: CallFrame, treasury: AccountId): void {
    this.guard(frame);
    this.treasury = treasury;
    frame.emit("config_updated", { field: "treasury", value: treasury });
  }

  setTransactionFee(frame: CallFrame, nextFee: number): void {
    this.guard(frame);
    assertFee(nextFee);
    this.feeBps = nextFee;
    frame.emit("config_updated", { field: "transactionFee", value: String(nextFee) });
  }

  transferOwnership(frame: CallFrame, owner: AccountId): void {
    this.guard(frame);
    this.owner = owner;
    frame.emit("config_updated", { field: "owner", value: owner });
  }

  addApprovedRegistries(frame: CallFrame, registries: AccountId[]): void {
    this.guard(frame);
    registries.forEach((id) => this.registries.add(id));
    frame.emit("config_updated", { field: "approvedRegistries", value: this.approvedRegistries().join(",") });
  }

  removeApprovedRegistries(frame: CallFrame, registries: AccountId[]): void {
    this.guard(frame);
    registries.forEach((id) => this.registries.delete(id));
    frame.emit("config_updated", { field: "approvedRegistries", value: this.approvedRegistries().join(",") });
  }

  addApprovedCurrencies(frame: CallFrame, currencies: string[]): void {
    this.guard(frame);
    currencies.forEach((id) => this.currencies.add(id));
    frame.emit("config_updated", { field: "approvedCurrencies", value: this.approvedCurrencies().join(",") });
  }

  removeApprovedCurrencies(frame: CallFrame, currencies: string[]): void {
    this.guard(frame);
    currencies.forEach((id) => this.currencies.delete(id));
    frame.emit("config_updated", { field: "approvedCurrencies", value: this.approvedCurrencies().join(",") });
  }

  private guard(frame: CallFrame): void {
    frame.requireOneUnit();
    this.assertOwner(frame.caller);
  }
}

function assertFee(feeBps: number): void {
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps >= MARKET_LIMITS.feeDenominator) {
    fail("INVALID_FEE", `Fee must be an integer in [0, ${MARKET_LIMITS.feeDenominator})`);
  }
}
