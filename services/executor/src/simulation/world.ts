import { roundTrip } from "@flashpair/common";
import type { Address, TradePath, VenuePair } from "@flashpair/common";
import { dataSlice, id } from "ethers";

import type { ExecutorConfig, ReservePair } from "../config.js";
import { LoanCoordinator } from "../coordinator.js";
import { AtomicHost } from "../host/atomic.js";
import type { Clock } from "../host/atomic.js";
import { EventJournal } from "../host/journal.js";
import { TokenLedger } from "../host/ledger.js";
import { SimulatedLendingPool } from "../lending/pool.js";
import { StaticAddressesProvider } from "../lending/provider.js";
import { ConstantProductRouter } from "../venues/constant-product-router.js";
import { makeVenue, makeVenuePair } from "../venues/venue.js";

/** Account that seeds pool and pair liquidity. */
export const SEED_ACCOUNT: Address = dataSlice(id("flashpair:seed"), 12).toLowerCase();

export type World = {
  ledger: TokenLedger;
  journal: EventJournal;
  host: AtomicHost;
  pool: SimulatedLendingPool;
  provider: StaticAddressesProvider;
  routers: readonly [ConstantProductRouter, ConstantProductRouter];
  venues: VenuePair;
  coordinator: LoanCoordinator;
  trade: TradePath;
};

/**
 * In-process stand-in for the chain: one lending pool, two constant-product
 * venues seeded from config, and the coordinator wired to them.
 */
export function buildWorld(cfg: ExecutorConfig, clock?: Clock): World {
  const ledger = new TokenLedger();
  const journal = new EventJournal();
  const host = new AtomicHost([ledger, journal]);

  const pool = new SimulatedLendingPool({
    address: cfg.lending_pool_addr,
    ledger,
    host,
    premium_bps: cfg.premium_bps,
  });
  const provider = new StaticAddressesProvider(cfg.lending_provider_addr, pool);
  ledger.mint(cfg.origin_asset_addr, SEED_ACCOUNT, cfg.pool_liquidity_wei);
  ledger.transfer(SEED_ACCOUNT, cfg.origin_asset_addr, pool.address, cfg.pool_liquidity_wei);

  const seed = (router: ConstantProductRouter, reserves: ReservePair): void => {
    ledger.mint(cfg.origin_asset_addr, SEED_ACCOUNT, reserves.origin);
    ledger.mint(cfg.intermediate_asset_addr, SEED_ACCOUNT, reserves.intermediate);
    router.addLiquidity(
      SEED_ACCOUNT,
      cfg.origin_asset_addr,
      cfg.intermediate_asset_addr,
      reserves.origin,
      reserves.intermediate,
    );
  };

  const routerA = new ConstantProductRouter({
    address: cfg.venue_a_router_addr,
    ledger,
    clock,
    fee_bps: cfg.venue_fee_bps,
  });
  const routerB = new ConstantProductRouter({
    address: cfg.venue_b_router_addr,
    ledger,
    clock,
    fee_bps: cfg.venue_fee_bps,
  });
  seed(routerA, cfg.venue_a_reserves);
  seed(routerB, cfg.venue_b_reserves);

  const venues = makeVenuePair(
    makeVenue(cfg.venue_a_name, routerA),
    makeVenue(cfg.venue_b_name, routerB),
  );

  const coordinator = new LoanCoordinator(
    {
      address: cfg.coordinator_addr,
      owner: cfg.owner_addr,
      addresses_provider: provider,
      venues,
      swap_deadline_sec: cfg.swap_deadline_sec,
    },
    { host, tokens: ledger, journal, clock },
  );

  return {
    ledger,
    journal,
    host,
    pool,
    provider,
    routers: [routerA, routerB],
    venues,
    coordinator,
    trade: roundTrip(cfg.origin_asset_addr, cfg.intermediate_asset_addr),
  };
}
