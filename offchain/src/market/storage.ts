import { AccountId } from "../shared/types";
import { CallFrame, CallState } from "./call";
import { ReservationIndex } from "./reservations";
import { MARKET_LIMITS, fail } from "./types";

/**
 * Pre-paid storage per account. Gates how many listings and offers an
 * account may hold, and whether it may bid.
 */
export class StorageDeposits implements CallState {
  private deposits = new Map<AccountId, bigint>();

  constructor(
    private readonly reservations: ReservationIndex,
    private readonly unitCost: bigint = MARKET_LIMITS.storageUnitCost,
  ) {}

  checkpoint(): () => void {
    const saved = new Map(this.deposits);
    return () => {
      this.deposits = saved;
    };
  }

  minimumBalance(): bigint {
    return this.unitCost;
  }

  balanceOf(account: AccountId): bigint {
    return this.deposits.get(account) ?? 0n;
  }

  /**
   * Admission check: paid storage must cover `reservations` units.
   */
  assertCovers(account: AccountId, reservations: number, action: string): void {
    const paid = this.balanceOf(account);
    const required = BigInt(reservations) * this.unitCost;
    if (paid < required) {
      fail(
        "INSUFFICIENT_STORAGE",
        `Insufficient storage paid: ${paid}, for ${reservations} ${action} at ${this.unitCost} rate of per ${action}`,
      );
    }
  }

  deposit(frame: CallFrame, account?: AccountId): bigint {
    if (frame.deposit < this.unitCost) {
      fail("INVALID_DEPOSIT", `Requires minimum deposit of ${this.unitCost}`);
    }
    const target = account ?? frame.caller;
    const balance = this.balanceOf(target) + frame.deposit;
    this.deposits.set(target, balance);
    return balance;
  }

  /**
   * Pay back everything above what the caller's current reservations need.
   * A balance below the requirement is rejected rather than underflowing.
   */
  withdraw(frame: CallFrame): bigint {
    frame.requireOneUnit();
    const owner = frame.caller;
    const balance = this.balanceOf(owner);
    const required = BigInt(this.reservations.count(owner)) * this.unitCost;
    if (balance < required) {
      fail("INSUFFICIENT_STORAGE", `Storage balance ${balance} is below the required ${required}`);
    }

    const refund = balance - required;
    if (required > 0n) {
      this.deposits.set(owner, required);
    } else {
      this.deposits.delete(owner);
    }
    frame.pay(owner, refund);
    return refund;
  }
}
