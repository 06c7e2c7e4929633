import { FlashPairError, normalizeAddress, roundTrip } from "@flashpair/common";
import type { Address, CallContext, ExchangeRouter, TradePath } from "@flashpair/common";

import { LoanCoordinator } from "../coordinator.js";
import { AtomicHost } from "../host/atomic.js";
import { EventJournal } from "../host/journal.js";
import { TokenLedger } from "../host/ledger.js";
import { SimulatedLendingPool } from "../lending/pool.js";
import { StaticAddressesProvider } from "../lending/provider.js";
import { makeVenue, makeVenuePair } from "../venues/venue.js";

export const OWNER = `0x${"11".repeat(20)}`;
export const STRANGER = `0x${"22".repeat(20)}`;
export const COORDINATOR = `0x${"33".repeat(20)}`;
export const POOL = `0x${"44".repeat(20)}`;
export const PROVIDER = `0x${"55".repeat(20)}`;
export const ROUTER_A = `0x${"66".repeat(20)}`;
export const ROUTER_B = `0x${"77".repeat(20)}`;
export const ROGUE_POOL = `0x${"88".repeat(20)}`;
export const ORIGIN = `0x${"aa".repeat(20)}`;
export const MID = `0x${"bb".repeat(20)}`;

export const NOW = 1_700_000_000;
export const clock = (): number => NOW;

/** Output for `amountIn` is `amountIn * num / den`, floored. */
export type Rate = { num: bigint; den: bigint };

/**
 * Router with fixed per-direction rates paid out of its own inventory. Lets
 * tests state exact leg outputs instead of deriving them from reserves.
 */
export class ScriptedRouter implements ExchangeRouter {
  readonly address: Address;
  deliver = true;
  failSwap = false;
  swaps = 0;
  /** Runs inside `swap` after the input is pulled, before output is paid. */
  onSwap: (() => void) | null = null;

  private readonly ledger: TokenLedger;
  private readonly rates = new Map<string, Rate>();

  constructor(address: string, ledger: TokenLedger) {
    this.address = normalizeAddress(address, "router address");
    this.ledger = ledger;
  }

  setRate(tokenIn: string, tokenOut: string, rate: Rate): this {
    this.rates.set(`${tokenIn.toLowerCase()}>${tokenOut.toLowerCase()}`, rate);
    return this;
  }

  quoteOut(amountIn: bigint, path: readonly Address[]): bigint[] {
    const amounts = [amountIn];
    for (let hop = 0; hop < path.length - 1; hop += 1) {
      const rate = this.rates.get(`${path[hop].toLowerCase()}>${path[hop + 1].toLowerCase()}`);
      if (rate == null) {
        throw new FlashPairError("PAIR_NOT_FOUND", `no rate for ${path[hop]}>${path[hop + 1]}`);
      }
      amounts.push((amounts[hop] * rate.num) / rate.den);
    }
    return amounts;
  }

  swap(
    ctx: CallContext,
    amountIn: bigint,
    _minOut: bigint,
    path: readonly Address[],
    to: Address,
    _deadline: number,
  ): bigint[] {
    if (this.failSwap) throw new Error(`router ${this.address} reverted`);
    const amounts = this.quoteOut(amountIn, path);
    this.ledger.transferFrom(this.address, path[0], ctx.sender, this.address, amountIn);
    this.onSwap?.();
    if (this.deliver) {
      this.ledger.transfer(this.address, path[path.length - 1], to, amounts[amounts.length - 1]);
    }
    this.swaps += 1;
    return amounts;
  }
}

export type WorldOptions = {
  premium_bps?: number;
  pool_liquidity?: bigint;
};

/**
 * Coordinator wired to a simulated pool and two scripted venues:
 * A quotes 1000 ORIGIN -> 2000 MID, B quotes 1000 -> 1950 and returns
 * 2000 MID -> 1010 ORIGIN.
 */
export function buildTestWorld(opts: WorldOptions = {}) {
  const ledger = new TokenLedger();
  const journal = new EventJournal();
  const host = new AtomicHost([ledger, journal]);

  const pool = new SimulatedLendingPool({
    address: POOL,
    ledger,
    host,
    premium_bps: opts.premium_bps ?? 0,
  });
  const provider = new StaticAddressesProvider(PROVIDER, pool);

  const routerA = new ScriptedRouter(ROUTER_A, ledger)
    .setRate(ORIGIN, MID, { num: 2n, den: 1n })
    .setRate(MID, ORIGIN, { num: 1n, den: 2n });
  const routerB = new ScriptedRouter(ROUTER_B, ledger)
    .setRate(ORIGIN, MID, { num: 195n, den: 100n })
    .setRate(MID, ORIGIN, { num: 101n, den: 200n });

  ledger.mint(ORIGIN, POOL, opts.pool_liquidity ?? 1_000_000n);
  for (const router of [routerA, routerB]) {
    ledger.mint(ORIGIN, router.address, 1_000_000n);
    ledger.mint(MID, router.address, 1_000_000n);
  }

  const venues = makeVenuePair(makeVenue("A", routerA), makeVenue("B", routerB));
  const coordinator = new LoanCoordinator(
    { address: COORDINATOR, owner: OWNER, addresses_provider: provider, venues },
    { host, tokens: ledger, journal, clock },
  );
  const trade: TradePath = roundTrip(ORIGIN, MID);

  return { ledger, journal, host, pool, provider, routerA, routerB, venues, coordinator, trade };
}
