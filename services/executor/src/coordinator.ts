import {
  FlashPairError,
  decodeTradePath,
  invariant,
  newLoanRequest,
  newTraceId,
  normalizeAddress,
  requireOrigin,
  sameAddress,
} from "@flashpair/common";
import type {
  Address,
  ArbitrageOutcome,
  CallContext,
  ExecutionPhase,
  FlashLoanReceiver,
  LendingAddressesProvider,
  TokenRegistry,
  TraceId,
  VenuePair,
} from "@flashpair/common";

import { Ownable } from "./access/ownable.js";
import { ArbitrageEngine } from "./arbitrage/engine.js";
import type { AtomicHost, Clock } from "./host/atomic.js";
import { systemClock } from "./host/atomic.js";
import type { EventJournal } from "./host/journal.js";
import { SwapExecutor } from "./venues/swap-executor.js";

export type CoordinatorConfig = Readonly<{
  /** The coordinator's own account: borrows, trades and repays from here. */
  address: string;
  owner: string;
  addresses_provider: LendingAddressesProvider;
  venues: VenuePair;
  swap_deadline_sec?: number;
}>;

export type CoordinatorDeps = {
  host: AtomicHost;
  tokens: TokenRegistry;
  journal: EventJournal;
  clock?: Clock;
};

export type AttemptSummary = {
  trace_id: TraceId;
  reached: ExecutionPhase;
  terminal: "COMPLETED" | "ABORTED";
};

type Attempt = {
  trace_id: TraceId;
  outcome: ArbitrageOutcome | null;
};

const REFERRAL_CODE = 0;

/**
 * Owner-triggered flash loan arbitrage. `initiate` borrows from the pool the
 * provider resolves to; the pool calls back into `onFundsReceived`, which runs
 * both legs and authorizes repayment. The whole sequence runs as one atomic
 * unit on the host.
 */
export class LoanCoordinator implements FlashLoanReceiver {
  readonly address: Address;
  readonly addressesProvider: LendingAddressesProvider;
  readonly venues: VenuePair;

  private readonly access: Ownable;
  private readonly engine: ArbitrageEngine;
  private readonly host: AtomicHost;
  private readonly tokens: TokenRegistry;
  private readonly journal: EventJournal;
  private readonly clock: Clock;

  private phaseNow: ExecutionPhase = "IDLE";
  private current: Attempt | null = null;
  private last: AttemptSummary | null = null;

  constructor(config: CoordinatorConfig, deps: CoordinatorDeps) {
    this.address = normalizeAddress(config.address, "coordinator address");
    this.addressesProvider = config.addresses_provider;
    this.venues = config.venues;
    this.access = new Ownable(config.owner);
    this.host = deps.host;
    this.tokens = deps.tokens;
    this.journal = deps.journal;
    this.clock = deps.clock ?? systemClock;

    const swaps = new SwapExecutor({
      tokens: deps.tokens,
      self: this.address,
      clock: this.clock,
      deadline_sec: config.swap_deadline_sec,
    });
    this.engine = new ArbitrageEngine({
      tokens: deps.tokens,
      self: this.address,
      venues: config.venues,
      swaps,
    });
  }

  get phase(): ExecutionPhase {
    return this.phaseNow;
  }

  get lastAttempt(): AttemptSummary | null {
    return this.last;
  }

  owner(): Address {
    return this.access.owner();
  }

  initiate(ctx: CallContext, asset: string, amount: bigint, encodedPath: string): ArbitrageOutcome {
    this.access.requireOwner(ctx.sender);
    this.requireIdle("initiate");
    const loanAsset = normalizeAddress(asset, "asset", "LOAN_SHAPE_INVALID");
    invariant(amount > 0n, "AMOUNT_INVALID", "loan amount must be > 0");

    const attempt: Attempt = { trace_id: newTraceId(), outcome: null };
    this.current = attempt;
    this.phaseNow = "LOAN_REQUESTED";

    try {
      const outcome = this.host.atomic(() => {
        const request = newLoanRequest(loanAsset, amount);
        this.journal.emit({
          type: "LOAN_INITIATED",
          trace_id: attempt.trace_id,
          assets: request.assets,
          amounts: request.amounts,
          at: this.clock(),
        });

        this.addressesProvider.getPool().flashLoan(
          { sender: this.address },
          this,
          request.assets,
          request.amounts,
          request.modes,
          this.address,
          encodedPath,
          REFERRAL_CODE,
        );

        if (attempt.outcome == null) {
          throw new FlashPairError(
            "CALLBACK_REJECTED",
            "lending pool returned without completing the arbitrage",
          );
        }
        return attempt.outcome;
      });
      this.finish(attempt, "COMPLETED");
      return outcome;
    } catch (err: unknown) {
      this.finish(attempt, "ABORTED");
      throw err;
    }
  }

  onFundsReceived(
    ctx: CallContext,
    assets: readonly Address[],
    amounts: readonly bigint[],
    premiums: readonly bigint[],
    initiator: Address,
    params: string,
  ): boolean {
    const pool = this.addressesProvider.getPool();
    if (!sameAddress(ctx.sender, pool.address)) {
      throw new FlashPairError(
        "UNTRUSTED_CALLER",
        `${ctx.sender.toLowerCase()} is not the lending pool ${pool.address}`,
      );
    }

    const attempt = this.current;
    if (attempt == null || this.phaseNow !== "LOAN_REQUESTED") {
      throw new FlashPairError("REENTRANT_CALL", "no loan of ours is awaiting funds");
    }
    if (!sameAddress(initiator, this.address)) {
      throw new FlashPairError(
        "UNTRUSTED_CALLER",
        `loan was initiated by ${initiator.toLowerCase()}`,
      );
    }
    invariant(
      assets.length === 1 && amounts.length === 1 && premiums.length === 1,
      "LOAN_SHAPE_INVALID",
      "expected exactly one borrowed asset",
    );
    this.phaseNow = "FUNDS_RECEIVED";

    const asset = assets[0].toLowerCase();
    const amount = amounts[0];
    const premium = premiums[0];

    const trade = decodeTradePath(params);
    requireOrigin(trade, asset);

    const run = this.engine.run(asset, amount, trade, (phase) => {
      this.phaseNow = phase;
    });
    if (!run.success) {
      throw new FlashPairError(
        "UNPROFITABLE_ARBITRAGE",
        `round trip returned ${run.final_balance} for ${run.initial_balance}`,
      );
    }

    this.journal.emit({
      type: "ARBITRAGE_EXECUTED",
      trace_id: attempt.trace_id,
      asset,
      profit: run.profit,
      at: this.clock(),
    });

    this.tokens.token(asset).approve(this.address, pool.address, amount + premium);
    this.phaseNow = "REPAYMENT_AUTHORIZED";

    attempt.outcome = {
      trace_id: attempt.trace_id,
      asset,
      amount,
      premium,
      profit: run.profit,
      intermediate_amount: run.intermediate_amount,
      leg1_venue: run.leg1_venue,
      leg2_venue: run.leg2_venue,
    };
    return true;
  }

  /** Sends the whole held balance of `asset` to the owner. */
  withdraw(ctx: CallContext, asset: string): bigint {
    this.access.requireOwner(ctx.sender);
    this.requireIdle("withdraw");
    const token = this.tokens.token(normalizeAddress(asset, "asset"));

    return this.host.atomic(() => {
      const balance = token.balanceOf(this.address);
      if (balance === 0n) {
        throw new FlashPairError("NOTHING_TO_WITHDRAW", `no ${token.address} held`);
      }
      const to = this.access.owner();
      token.transfer(this.address, to, balance);
      this.journal.emit({
        type: "FUNDS_WITHDRAWN",
        trace_id: newTraceId(),
        asset: token.address,
        to,
        amount: balance,
        at: this.clock(),
      });
      return balance;
    });
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    this.access.requireOwner(ctx.sender);
    this.requireIdle("transferOwnership");
    this.host.atomic(() => {
      const previous_owner = this.access.transferOwnership(ctx.sender, newOwner);
      this.journal.emit({
        type: "OWNERSHIP_TRANSFERRED",
        trace_id: newTraceId(),
        previous_owner,
        new_owner: this.access.owner(),
        at: this.clock(),
      });
    });
  }

  private requireIdle(operation: string): void {
    if (this.phaseNow !== "IDLE") {
      throw new FlashPairError(
        "REENTRANT_CALL",
        `${operation} called while an arbitrage is ${this.phaseNow}`,
      );
    }
  }

  private finish(attempt: Attempt, terminal: "COMPLETED" | "ABORTED"): void {
    this.last = { trace_id: attempt.trace_id, reached: this.phaseNow, terminal };
    this.phaseNow = "IDLE";
    this.current = null;
  }
}
