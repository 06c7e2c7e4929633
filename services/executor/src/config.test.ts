import { afterEach, describe, expect, it, vi } from "vitest";

import { thrown } from "./__fixtures__/thrown.js";
import { loadConfig } from "./config.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const cfg = loadConfig();

    expect(cfg.service).toBe("executor");
    expect(cfg.venue_a_name).toBe("uniswap");
    expect(cfg.venue_b_name).toBe("sushiswap");
    expect(cfg.venue_a_router_addr).toBe("0x3fc91a3afd70395cd496c647d5a6cc9d4b2b7fad");
    expect(cfg.loan_amount_wei).toBe(10_000_000_000n);
    expect(cfg.premium_bps).toBe(9);
    expect(cfg.venue_fee_bps).toBe(30);
    expect(cfg.swap_deadline_sec).toBe(3_600);
    expect(cfg.min_spread_bps).toBe(100);
  });

  it("reads overrides and lower-cases addresses", () => {
    vi.stubEnv("OWNER_ADDR", "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed");
    vi.stubEnv("LOAN_AMOUNT_WEI", " 5000 ");
    vi.stubEnv("MIN_SPREAD_BPS", "50");
    vi.stubEnv("VENUE_B_RESERVE_ORIGIN_WEI", "123");

    const cfg = loadConfig();

    expect(cfg.owner_addr).toBe("0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed");
    expect(cfg.loan_amount_wei).toBe(5_000n);
    expect(cfg.min_spread_bps).toBe(50);
    expect(cfg.venue_b_reserves.origin).toBe(123n);
  });

  it("rejects malformed values", () => {
    vi.stubEnv("LOAN_AMOUNT_WEI", "1.5");
    const err = thrown(() => loadConfig());

    expect(err.code).toBe("ENV_INVALID");
    expect(err.message).toBe("invalid LOAN_AMOUNT_WEI: 1.5");
  });

  it("rejects an invalid address", () => {
    vi.stubEnv("COORDINATOR_ADDR", "0xnope");

    expect(thrown(() => loadConfig()).code).toBe("ENV_INVALID");
  });

  it("rejects two venues on one router", () => {
    vi.stubEnv("VENUE_B_ROUTER_ADDR", "0x3fc91a3afd70395cd496c647d5a6cc9d4b2b7fad");

    expect(thrown(() => loadConfig()).message).toBe(
      "VENUE_A_ROUTER_ADDR and VENUE_B_ROUTER_ADDR must differ",
    );
  });

  it("rejects a poll interval under 100ms", () => {
    vi.stubEnv("POLL_INTERVAL_MS", "10");

    expect(thrown(() => loadConfig()).code).toBe("ENV_INVALID");
  });
});
