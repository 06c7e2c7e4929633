import { requireOrigin } from "@flashpair/common";
import type { Address, ExecutionPhase, TokenRegistry, TradePath, VenuePair } from "@flashpair/common";

import { compareVenues } from "../venues/comparator.js";
import type { SwapExecutor } from "../venues/swap-executor.js";

export type ArbitrageRun = {
  success: boolean;
  profit: bigint;
  initial_balance: bigint;
  final_balance: bigint;
  intermediate_amount: bigint;
  leg1_venue: string;
  leg2_venue: string;
};

export type PhaseListener = (phase: ExecutionPhase) => void;

/**
 * Two-leg cycle: forward on the better-quoting venue, back on the other one.
 *
 * Profit is measured against the origin balance held before leg 1, which
 * already contains the borrowed principal. The loan premium is NOT taken
 * into account here; covering it is left to the repayment step.
 */
export class ArbitrageEngine {
  private readonly tokens: TokenRegistry;
  private readonly self: Address;
  private readonly venues: VenuePair;
  private readonly swaps: SwapExecutor;

  constructor(opts: { tokens: TokenRegistry; self: Address; venues: VenuePair; swaps: SwapExecutor }) {
    this.tokens = opts.tokens;
    this.self = opts.self;
    this.venues = opts.venues;
    this.swaps = opts.swaps;
  }

  run(originAsset: Address, amountIn: bigint, trade: TradePath, onPhase?: PhaseListener): ArbitrageRun {
    requireOrigin(trade, originAsset);
    const origin = this.tokens.token(originAsset);

    const initial_balance = origin.balanceOf(this.self);
    const { winner, other } = compareVenues(this.venues, amountIn, trade.path);

    const intermediate_amount = this.swaps.swap(winner, amountIn, trade.path, this.self);
    onPhase?.("LEG1_EXECUTED");

    this.swaps.swap(other, intermediate_amount, trade.reverse_path, this.self);
    onPhase?.("LEG2_EXECUTED");

    const final_balance = origin.balanceOf(this.self);
    const profit = final_balance > initial_balance ? final_balance - initial_balance : 0n;
    onPhase?.("PROFIT_EVALUATED");

    return {
      success: profit > 0n,
      profit,
      initial_balance,
      final_balance,
      intermediate_amount,
      leg1_venue: winner.name,
      leg2_venue: other.name,
    };
  }
}
