import { asFlashPairError, encodeTradePath } from "@flashpair/common";
import type { ArbitrageOutcome, TraceId } from "@flashpair/common";

import type { ExecutorConfig } from "./config.js";
import { errorMeta, logLine } from "./log.js";
import { findSpread, isWorthExecuting } from "./opportunity/spread.js";
import type { World } from "./simulation/world.js";
import { insertAttempt, insertExecutorEvent } from "./storage/postgres.js";
import type { Queryable } from "./storage/postgres.js";

const SERVICE = "executor";

export type AttemptDeps = {
  cfg: ExecutorConfig;
  world: World;
  pg: Queryable;
  now?: () => Date;
};

export type AttemptResult = "NO_SPREAD" | "NOT_WORTH_IT" | "COMPLETED" | "ABORTED";

async function persistEvents(deps: AttemptDeps): Promise<void> {
  for (const event of deps.world.journal.drain()) {
    await insertExecutorEvent(deps.pg, event);
  }
}

/**
 * One detect-and-execute pass. Only the loan itself is caught: storage
 * failures propagate as PG_* errors so a committed trade is never recorded
 * as a failure.
 */
export async function runAttempt(deps: AttemptDeps, pollTrace: TraceId): Promise<AttemptResult> {
  const { cfg, world, pg } = deps;
  const now = deps.now ?? (() => new Date());

  const candidate = findSpread({
    venues: world.venues,
    trade: world.trade,
    unit_amount: 10n ** BigInt(cfg.origin_decimals),
    probe_amount: cfg.loan_amount_wei,
    premium_bps: cfg.premium_bps,
    min_spread_bps: cfg.min_spread_bps,
  });
  if (candidate == null) return "NO_SPREAD";

  logLine(SERVICE, "info", candidate.trace_id, "spread", {
    winner: candidate.winner,
    spread_bps: candidate.spread_bps,
    rough_profit: candidate.rough_profit,
  });
  if (!isWorthExecuting(candidate)) return "NOT_WORTH_IT";

  const created_at = now().toISOString();
  const previous = world.coordinator.lastAttempt;
  let outcome: ArbitrageOutcome;
  try {
    outcome = world.coordinator.initiate(
      { sender: cfg.owner_addr },
      cfg.origin_asset_addr,
      cfg.loan_amount_wei,
      encodeTradePath(world.trade),
    );
  } catch (err: unknown) {
    const e = asFlashPairError(err, "SWAP_FAILED", "arbitrage attempt failed");
    const last = world.coordinator.lastAttempt;
    const ours = last != null && last !== previous ? last : null;
    logLine(SERVICE, "warn", ours?.trace_id ?? pollTrace, e.message, {
      ...errorMeta(e),
      reached: ours?.reached,
    });
    if (ours != null) {
      await insertAttempt(pg, {
        trace_id: ours.trace_id,
        asset: cfg.origin_asset_addr,
        amount: cfg.loan_amount_wei,
        terminal: ours.terminal,
        reached: ours.reached,
        profit: null,
        premium: null,
        error_code: e.code,
        created_at,
      });
    }
    await persistEvents(deps);
    return "ABORTED";
  }

  logLine(SERVICE, "info", outcome.trace_id, "arbitrage completed", outcome);
  await insertAttempt(pg, {
    trace_id: outcome.trace_id,
    asset: outcome.asset,
    amount: outcome.amount,
    terminal: "COMPLETED",
    reached: world.coordinator.lastAttempt?.reached ?? "REPAYMENT_AUTHORIZED",
    profit: outcome.profit,
    premium: outcome.premium,
    error_code: null,
    created_at,
  });
  await persistEvents(deps);
  return "COMPLETED";
}
