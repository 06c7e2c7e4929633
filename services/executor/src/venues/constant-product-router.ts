import { FlashPairError, getAmountsOutV2, invariant, normalizeAddress } from "@flashpair/common";
import type { Address, CallContext, ExchangeRouter } from "@flashpair/common";
import { dataSlice, solidityPackedKeccak256 } from "ethers";

import type { Clock } from "../host/atomic.js";
import { systemClock } from "../host/atomic.js";
import type { TokenLedger } from "../host/ledger.js";

export const DEFAULT_VENUE_FEE_BPS = 30;

function sortTokens(tokenA: Address, tokenB: Address): [Address, Address] {
  return tokenA < tokenB ? [tokenA, tokenB] : [tokenB, tokenA];
}

/**
 * V2-style router over constant-product pairs. Each pair is an account on the
 * ledger; its balances of the two tokens are its reserves.
 */
export class ConstantProductRouter implements ExchangeRouter {
  readonly address: Address;
  readonly fee_bps: number;

  private readonly ledger: TokenLedger;
  private readonly clock: Clock;
  private readonly pairs = new Set<Address>();

  constructor(opts: { address: string; ledger: TokenLedger; clock?: Clock; fee_bps?: number }) {
    this.address = normalizeAddress(opts.address, "router address");
    this.ledger = opts.ledger;
    this.clock = opts.clock ?? systemClock;
    this.fee_bps = opts.fee_bps ?? DEFAULT_VENUE_FEE_BPS;
    invariant(
      Number.isInteger(this.fee_bps) && this.fee_bps >= 0 && this.fee_bps < 10_000,
      "ENV_INVALID",
      `invalid fee_bps: ${String(this.fee_bps)}`,
    );
  }

  pairFor(tokenA: string, tokenB: string): Address {
    const a = tokenA.toLowerCase();
    const b = tokenB.toLowerCase();
    invariant(a !== b, "PATH_INVALID", "pair needs two distinct tokens");
    const [token0, token1] = sortTokens(a, b);
    const hash = solidityPackedKeccak256(
      ["address", "address", "address"],
      [this.address, token0, token1],
    );
    return dataSlice(hash, 12).toLowerCase();
  }

  /** Moves both amounts from `provider` into the pair, creating it on first use. */
  addLiquidity(
    provider: string,
    tokenA: string,
    tokenB: string,
    amountA: bigint,
    amountB: bigint,
  ): Address {
    invariant(amountA > 0n && amountB > 0n, "AMOUNT_INVALID", "liquidity amounts must be > 0");
    const pair = this.pairFor(tokenA, tokenB);
    this.ledger.transfer(provider, tokenA, pair, amountA);
    this.ledger.transfer(provider, tokenB, pair, amountB);
    this.pairs.add(pair);
    return pair;
  }

  /** Reserves ordered as `[reserve of tokenIn, reserve of tokenOut]`. */
  getReserves(tokenIn: string, tokenOut: string): [bigint, bigint] {
    const pair = this.pairFor(tokenIn, tokenOut);
    if (!this.pairs.has(pair)) {
      throw new FlashPairError(
        "PAIR_NOT_FOUND",
        `no pair for ${tokenIn.toLowerCase()}/${tokenOut.toLowerCase()} on ${this.address}`,
      );
    }
    return [this.ledger.balanceOf(tokenIn, pair), this.ledger.balanceOf(tokenOut, pair)];
  }

  quoteOut(amountIn: bigint, path: readonly Address[]): bigint[] {
    invariant(path.length >= 2, "PATH_INVALID", "path needs at least 2 tokens");
    invariant(amountIn > 0n, "AMOUNT_INVALID", "amountIn must be > 0");
    return getAmountsOutV2({
      amountIn,
      hops: path.length - 1,
      feeBps: this.fee_bps,
      reservesFor: (hop) => this.getReserves(path[hop], path[hop + 1]),
    });
  }

  swap(
    ctx: CallContext,
    amountIn: bigint,
    minOut: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
  ): bigint[] {
    const now = this.clock();
    if (deadline < now) {
      throw new FlashPairError("DEADLINE_EXPIRED", `deadline ${deadline} is before ${now}`);
    }

    const amounts = this.quoteOut(amountIn, path);
    const out = amounts[amounts.length - 1];
    if (out < minOut) {
      throw new FlashPairError(
        "INSUFFICIENT_OUTPUT",
        `output ${out} is below minimum ${minOut}`,
      );
    }

    this.ledger.transferFrom(this.address, path[0], ctx.sender, this.pairFor(path[0], path[1]), amountIn);
    for (let hop = 0; hop < path.length - 1; hop += 1) {
      const pair = this.pairFor(path[hop], path[hop + 1]);
      const recipient = hop < path.length - 2 ? this.pairFor(path[hop + 1], path[hop + 2]) : to;
      this.ledger.transfer(pair, path[hop + 1], recipient, amounts[hop + 1]);
    }
    return amounts;
  }
}
