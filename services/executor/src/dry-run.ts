import { asFlashPairError, encodeTradePath, newTraceId } from "@flashpair/common";

import { loadConfig, loadDotenv } from "./config.js";
import { errorMeta, logLine } from "./log.js";
import { findSpread, isWorthExecuting } from "./opportunity/spread.js";
import { buildWorld } from "./simulation/world.js";

const SERVICE = "executor";

function parseForce(argv: string[]): boolean {
  return argv.includes("--force");
}

async function main(): Promise<void> {
  loadDotenv();
  const cfg = loadConfig();
  const trace_id = newTraceId();
  const force = parseForce(process.argv);

  logLine(SERVICE, "info", trace_id, "dry-run starting", {
    force,
    venue_a_reserves: cfg.venue_a_reserves,
    venue_b_reserves: cfg.venue_b_reserves,
    loan_amount_wei: cfg.loan_amount_wei,
  });

  const world = buildWorld(cfg);
  const owner = { sender: cfg.owner_addr };

  const candidate = findSpread({
    venues: world.venues,
    trade: world.trade,
    unit_amount: 10n ** BigInt(cfg.origin_decimals),
    probe_amount: cfg.loan_amount_wei,
    premium_bps: cfg.premium_bps,
    min_spread_bps: cfg.min_spread_bps,
  });

  if (candidate == null) {
    logLine(SERVICE, "info", trace_id, "no spread", { min_spread_bps: cfg.min_spread_bps });
    if (!force) return;
  } else {
    logLine(SERVICE, "info", candidate.trace_id, "spread", candidate);
    if (!isWorthExecuting(candidate) && !force) return;
  }

  try {
    const outcome = world.coordinator.initiate(
      owner,
      cfg.origin_asset_addr,
      cfg.loan_amount_wei,
      encodeTradePath(world.trade),
    );
    logLine(SERVICE, "info", outcome.trace_id, "arbitrage completed", outcome);

    const withdrawn = world.coordinator.withdraw(owner, cfg.origin_asset_addr);
    logLine(SERVICE, "info", outcome.trace_id, "withdrawn", {
      to: world.coordinator.owner(),
      amount: withdrawn,
    });
  } catch (err: unknown) {
    const e = asFlashPairError(err, "SWAP_FAILED", "arbitrage attempt failed");
    logLine(SERVICE, "warn", world.coordinator.lastAttempt?.trace_id ?? trace_id, e.message, {
      ...errorMeta(e),
      reached: world.coordinator.lastAttempt?.reached,
    });
  }

  for (const event of world.journal.drain()) {
    logLine(SERVICE, "info", event.trace_id, "event", event);
  }
}

main().catch((err: unknown) => {
  const e = asFlashPairError(err, "ENV_INVALID", "dry-run failed");
  const trace_id = newTraceId();
  logLine(SERVICE, "error", trace_id, e.message, errorMeta(e));
  process.exitCode = 1;
});
