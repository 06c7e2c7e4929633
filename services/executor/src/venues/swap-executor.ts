import { FlashPairError, asFlashPairError, invariant } from "@flashpair/common";
import type { Address, TokenRegistry, Venue } from "@flashpair/common";

import type { Clock } from "../host/atomic.js";
import { systemClock } from "../host/atomic.js";

export const DEFAULT_SWAP_DEADLINE_SEC = 3_600;

/** Any nonzero output is accepted; profitability is judged after both legs. */
export const MIN_ACCEPTABLE_OUT = 1n;

/**
 * Executes one leg on a venue on behalf of `self` and reports what the
 * recipient actually received, not what the router claims.
 */
export class SwapExecutor {
  private readonly tokens: TokenRegistry;
  private readonly self: Address;
  private readonly clock: Clock;
  private readonly deadlineSec: number;

  constructor(opts: {
    tokens: TokenRegistry;
    self: Address;
    clock?: Clock;
    deadline_sec?: number;
  }) {
    this.tokens = opts.tokens;
    this.self = opts.self;
    this.clock = opts.clock ?? systemClock;
    this.deadlineSec = opts.deadline_sec ?? DEFAULT_SWAP_DEADLINE_SEC;
    invariant(
      Number.isInteger(this.deadlineSec) && this.deadlineSec > 0,
      "ENV_INVALID",
      `invalid deadline_sec: ${String(opts.deadline_sec)}`,
    );
  }

  swap(venue: Venue, amountIn: bigint, path: readonly Address[], recipient: Address): bigint {
    invariant(path.length >= 2, "PATH_INVALID", "path needs at least 2 tokens");
    invariant(amountIn > 0n, "AMOUNT_INVALID", "amountIn must be > 0");

    const tokenIn = this.tokens.token(path[0]);
    const tokenOut = this.tokens.token(path[path.length - 1]);

    tokenIn.approve(this.self, venue.router_address, amountIn);
    const before = tokenOut.balanceOf(recipient);

    try {
      venue.router.swap(
        { sender: this.self },
        amountIn,
        MIN_ACCEPTABLE_OUT,
        path,
        recipient,
        this.clock() + this.deadlineSec,
      );
    } catch (err: unknown) {
      throw asFlashPairError(err, "SWAP_FAILED", `swap on ${venue.name} failed`);
    }

    const received = tokenOut.balanceOf(recipient) - before;
    if (received <= 0n) {
      throw new FlashPairError(
        "SWAP_FAILED",
        `${venue.name} delivered nothing for ${path.join("->")}`,
      );
    }
    return received;
  }
}
