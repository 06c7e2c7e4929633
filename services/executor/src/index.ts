import { FlashPairError, asFlashPairError, newTraceId } from "@flashpair/common";
import { createClient } from "redis";

import { runAttempt } from "./attempt.js";
import { loadConfig, loadDotenv } from "./config.js";
import { errorMeta, logLine } from "./log.js";
import { buildWorld } from "./simulation/world.js";
import { createPgPool, ensurePgSchema } from "./storage/postgres.js";
import { ExecutionLock } from "./storage/redis-lock.js";
import type { LockClient } from "./storage/redis-lock.js";

const SERVICE = "executor";

async function main(): Promise<void> {
  loadDotenv();
  const cfg = loadConfig();
  const trace_id = newTraceId();

  logLine(SERVICE, "info", trace_id, "starting", {
    coordinator_addr: cfg.coordinator_addr,
    lending_provider_addr: cfg.lending_provider_addr,
    venues: [cfg.venue_a_name, cfg.venue_b_name],
    loan_amount_wei: cfg.loan_amount_wei,
    min_spread_bps: cfg.min_spread_bps,
    poll_interval_ms: cfg.poll_interval_ms,
    redis_url: cfg.redis_url,
    postgres_url: cfg.postgres_url,
  });

  const redis = createClient({ url: cfg.redis_url });
  await redis.connect().catch((err: unknown) => {
    throw new FlashPairError("REDIS_CONNECT_FAILED", "failed to connect redis", {
      cause: err,
    });
  });
  const lockClient: LockClient = {
    set: (key, value, options) => redis.set(key, value, options),
    eval: (script, options) => redis.eval(script, options),
  };
  const lock = new ExecutionLock(lockClient, { ttl_ms: cfg.lock_ttl_ms });

  const pg = createPgPool(cfg.postgres_url);
  await pg.query("select 1").catch((err: unknown) => {
    throw new FlashPairError(
      "PG_CONNECT_FAILED",
      "failed to connect postgres",
      { cause: err },
    );
  });
  await ensurePgSchema(pg);

  const world = buildWorld(cfg);

  let inFlight = false;
  const poll = async (): Promise<void> => {
    if (inFlight) return;
    inFlight = true;
    const pollTrace = newTraceId();

    try {
      const result = await lock.withLock(() => runAttempt({ cfg, world, pg }, pollTrace));
      if (!result.acquired) {
        logLine(SERVICE, "info", pollTrace, "execution lock held elsewhere");
      }
    } catch (err: unknown) {
      const e = asFlashPairError(err, "PG_INSERT_FAILED", "executor loop failed");
      logLine(SERVICE, "error", pollTrace, e.message, errorMeta(e));
    } finally {
      inFlight = false;
    }
  };

  const timer = setInterval(() => {
    void poll();
  }, cfg.poll_interval_ms);
  await poll();

  const shutdown = async (signal: string): Promise<void> => {
    const t = newTraceId();
    logLine(SERVICE, "info", t, "shutdown", { signal });
    clearInterval(timer);
    await Promise.allSettled([redis.quit(), pg.end()]);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  const e = asFlashPairError(err, "ENV_INVALID", "executor crashed");
  const trace_id = newTraceId();
  logLine(SERVICE, "error", trace_id, e.message, errorMeta(e));
  process.exitCode = 1;
});
