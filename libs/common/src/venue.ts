import type { Address } from "./ids.js";

/** The account a call is made from. */
export type CallContext = {
  sender: Address;
};

/**
 * V2-style exchange router as consumed by the executor. Amount arrays carry
 * one entry per path element, the first being `amountIn`.
 */
export interface ExchangeRouter {
  readonly address: Address;
  quoteOut(amountIn: bigint, path: readonly Address[]): bigint[];
  swap(
    ctx: CallContext,
    amountIn: bigint,
    minOut: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
  ): bigint[];
}

export type Venue = {
  name: string;
  router_address: Address;
  router: ExchangeRouter;
};

export type VenuePair = readonly [Venue, Venue];
