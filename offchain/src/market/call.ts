import { EventLog } from "../shared/events";
import { logger } from "../shared/logger";
import { AccountId, EventName, EventPayloads } from "../shared/types";
import { NativeLedger } from "./ledger";
import { MARKET_LIMITS, fail } from "./types";

export interface CallContext {
  caller: AccountId;
  /** Original signer when the call arrives through another account */
  signer?: AccountId;
  /** Native currency attached to the call */
  deposit?: bigint;
}

/**
 * Store state a call may change. `checkpoint` captures it and returns the
 * function that puts it back.
 */
export interface CallState {
  checkpoint(): () => void;
}

interface QueuedTransfer {
  to: AccountId;
  amount: bigint;
}

/**
 * One run-to-completion call. Value movements and events are queued here
 * and only applied by the host once the body returns.
 */
export class CallFrame {
  private transfers: QueuedTransfer[] = [];
  private events: Array<() => void> = [];
  private followUps: Array<() => void> = [];

  constructor(
    readonly caller: AccountId,
    readonly signer: AccountId | undefined,
    readonly deposit: bigint,
    readonly now: number,
    private readonly log: EventLog,
  ) {}

  /** Pay out of the marketplace account */
  pay(to: AccountId, amount: bigint): void {
    if (amount > 0n) {
      this.transfers.push({ to, amount });
    }
  }

  emit<K extends EventName>(name: K, data: EventPayloads[K]): void {
    this.events.push(() => {
      this.log.publish(name, data);
    });
  }

  /** Runs after the call has committed */
  afterCommit(fn: () => void): void {
    this.followUps.push(fn);
  }

  requireOneUnit(): void {
    if (this.deposit !== MARKET_LIMITS.oneUnit) {
      fail("INVALID_DEPOSIT", "Requires attached deposit of exactly 1 minimal unit");
    }
  }

  queuedTransfers(): readonly QueuedTransfer[] {
    return this.transfers;
  }

  queuedEvents(): ReadonlyArray<() => void> {
    return this.events;
  }

  queuedFollowUps(): ReadonlyArray<() => void> {
    return this.followUps;
  }
}

export class CallHost {
  private states: CallState[] = [];

  constructor(
    private readonly ledger: NativeLedger,
    readonly marketAccount: AccountId,
    private readonly events: EventLog,
    private readonly clock: () => number = Date.now,
  ) {}

  now(): number {
    return this.clock();
  }

  /** Register stores that are restored when a call fails */
  track(...states: CallState[]): void {
    this.states.push(...states);
  }

  /**
   * Execute a caller's call. A thrown error restores every tracked store,
   * drops every queued effect and leaves the deposit with the caller.
   */
  run<T>(ctx: CallContext, body: (frame: CallFrame) => T): T {
    const deposit = ctx.deposit ?? 0n;
    if (deposit < 0n) {
      fail("INVALID_DEPOSIT", "Deposit must not be negative");
    }
    if (ctx.caller === this.marketAccount) {
      fail("UNAUTHORIZED", "The marketplace account cannot make calls");
    }
    const available = this.ledger.balanceOf(ctx.caller);
    if (available < deposit) {
      fail("INSUFFICIENT_BALANCE", `${ctx.caller} holds ${available}, cannot attach ${deposit}`);
    }

    return this.execute(this.open(ctx.caller, ctx.signer, deposit), body);
  }

  /** Execute a call issued by the marketplace itself (settlement resolution) */
  runInternal<T>(body: (frame: CallFrame) => T): T {
    return this.execute(this.open(this.marketAccount, undefined, 0n), body);
  }

  private open(caller: AccountId, signer: AccountId | undefined, deposit: bigint): CallFrame {
    return new CallFrame(caller, signer, deposit, this.clock(), this.events);
  }

  private execute<T>(frame: CallFrame, body: (frame: CallFrame) => T): T {
    const restores = this.states.map((state) => state.checkpoint());
    let result: T;
    try {
      result = body(frame);
      this.assertCovered(frame);
      this.settle(frame);
    } catch (error) {
      restores.reverse().forEach((restore) => restore());
      throw error;
    }

    for (const publish of frame.queuedEvents()) {
      publish();
    }
    for (const followUp of frame.queuedFollowUps()) {
      followUp();
    }
    return result;
  }

  /** The marketplace account plus the incoming deposit must cover every payout */
  private assertCovered(frame: CallFrame): void {
    const outgoing = frame.queuedTransfers().reduce((sum, { amount }) => sum + amount, 0n);
    const incoming = frame.caller === this.marketAccount ? 0n : frame.deposit;
    const available = this.ledger.balanceOf(this.marketAccount) + incoming;
    if (outgoing > available) {
      fail("INSUFFICIENT_BALANCE", `${this.marketAccount} holds ${available}, cannot pay out ${outgoing}`);
    }
  }

  private settle(frame: CallFrame): void {
    this.ledger.transfer(frame.caller, this.marketAccount, frame.deposit);
    for (const { to, amount } of frame.queuedTransfers()) {
      this.ledger.transfer(this.marketAccount, to, amount);
    }

    logger.debug("[CALL] committed", {
      caller: frame.caller,
      deposit: frame.deposit.toString(),
      transfers: frame.queuedTransfers().length,
    });
  }
}
