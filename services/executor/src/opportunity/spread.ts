import { bpsOf, invariant, isFlashPairError, newTraceId } from "@flashpair/common";
import type { Address, TraceId, TradePath, VenuePair } from "@flashpair/common";

import { compareVenues } from "../venues/comparator.js";
import { quoteVenue } from "../venues/quoter.js";

export const DEFAULT_MIN_SPREAD_BPS = 100;

export type SpreadCandidate = {
  trace_id: TraceId;
  origin: Address;
  intermediate: Address;
  winner: string;
  other: string;
  spread_bps: number;
  unit_quotes: readonly [bigint, bigint];
  probe_amount: bigint;
  expected_out: bigint;
  round_trip_out: bigint;
  premium: bigint;
  /** Round trip output minus principal and premium; may be negative. */
  rough_profit: bigint;
  created_at: string;
};

export type FindSpreadInput = {
  venues: VenuePair;
  trade: TradePath;
  unit_amount: bigint;
  probe_amount: bigint;
  premium_bps: number;
  min_spread_bps: number;
  now?: Date;
};

function spreadBps(quotes: readonly [bigint, bigint]): number | null {
  const [a, b] = quotes;
  const hi = a > b ? a : b;
  const lo = a > b ? b : a;
  if (lo === 0n) return null;
  return Number(((hi - lo) * 10_000n) / lo);
}

/**
 * Compares one unit of the origin asset across both venues and, when the
 * gap clears `min_spread_bps`, prices the full round trip for `probe_amount`.
 * A venue that cannot quote means no candidate.
 */
export function findSpread(input: FindSpreadInput): SpreadCandidate | null {
  invariant(input.unit_amount > 0n, "AMOUNT_INVALID", "unit_amount must be > 0");
  invariant(input.probe_amount > 0n, "AMOUNT_INVALID", "probe_amount must be > 0");
  invariant(
    Number.isInteger(input.min_spread_bps) && input.min_spread_bps >= 0,
    "ENV_INVALID",
    `invalid min_spread_bps: ${String(input.min_spread_bps)}`,
  );

  const { path, reverse_path } = input.trade;
  try {
    const unit = compareVenues(input.venues, input.unit_amount, path);
    const spread_bps = spreadBps(unit.quotes);
    if (spread_bps == null || spread_bps < input.min_spread_bps) return null;

    const probe = compareVenues(input.venues, input.probe_amount, path);
    const round_trip_out = quoteVenue(probe.other, probe.expected_out, reverse_path);
    const premium = bpsOf(input.probe_amount, input.premium_bps);
    const now = input.now ?? new Date();

    return {
      trace_id: newTraceId(),
      origin: path[0],
      intermediate: path[path.length - 1],
      winner: probe.winner.name,
      other: probe.other.name,
      spread_bps,
      unit_quotes: unit.quotes,
      probe_amount: input.probe_amount,
      expected_out: probe.expected_out,
      round_trip_out,
      premium,
      rough_profit: round_trip_out - input.probe_amount - premium,
      created_at: now.toISOString(),
    };
  } catch (err: unknown) {
    if (isFlashPairError(err, "QUOTE_FAILED")) return null;
    throw err;
  }
}

/** Whether the candidate is worth a loan at all. */
export function isWorthExecuting(candidate: SpreadCandidate): boolean {
  return candidate.rough_profit > 0n;
}
