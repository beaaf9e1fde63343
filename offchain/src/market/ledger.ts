import { AccountId } from "../shared/types";
import { MarketError } from "./types";

/**
 * Native currency balances owned by the host ledger.
 */
export interface NativeLedger {
  balanceOf(account: AccountId): bigint;
  transfer(from: AccountId, to: AccountId, amount: bigint): void;
}

/**
 * In-memory ledger used by the service process and the tests.
 */
export class MemoryLedger implements NativeLedger {
  private balances = new Map<AccountId, bigint>();

  credit(account: AccountId, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError("credit amount must not be negative");
    }
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? 0n;
  }

  transfer(from: AccountId, to: AccountId, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError("transfer amount must not be negative");
    }
    if (amount === 0n || from === to) {
      return;
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new MarketError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${available}, cannot transfer ${amount}`,
      );
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}
