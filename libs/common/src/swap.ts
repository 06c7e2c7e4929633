import { FlashPairError, invariant } from "./errors.js";

const TEN_THOUSAND = 10_000n;

function toBigIntBps(value: number, field: string): bigint {
  if (!Number.isFinite(value) || !Number.isInteger(value) || value < 0 || value > 10_000) {
    throw new FlashPairError("ENV_INVALID", `invalid ${field}: ${String(value)}`);
  }
  return BigInt(value);
}

/** Share of `amount` at `bps`, rounded down. */
export function bpsOf(amount: bigint, bps: number): bigint {
  invariant(amount >= 0n, "AMOUNT_INVALID", "amount must be >= 0");
  return (amount * toBigIntBps(bps, "bps")) / TEN_THOUSAND;
}

/**
 * Exact-in output of a constant-product pair (x * y = k) with the fee taken
 * from the input, as the V2 router computes it.
 */
export function getAmountOutV2(opts: {
  amountIn: bigint;
  reserveIn: bigint;
  reserveOut: bigint;
  feeBps: number;
}): bigint {
  invariant(opts.amountIn > 0n, "AMOUNT_INVALID", "amountIn must be > 0");
  invariant(
    opts.reserveIn > 0n && opts.reserveOut > 0n,
    "INSUFFICIENT_LIQUIDITY",
    "reserves must be > 0",
  );

  const feeNumer = TEN_THOUSAND - toBigIntBps(opts.feeBps, "feeBps");
  const amountInWithFee = opts.amountIn * feeNumer;
  const numerator = amountInWithFee * opts.reserveOut;
  const denominator = opts.reserveIn * TEN_THOUSAND + amountInWithFee;
  return numerator / denominator;
}

/**
 * Chains `getAmountOutV2` across consecutive hops. `reservesFor(i)` returns
 * `[reserveIn, reserveOut]` for the hop from `path[i]` to `path[i + 1]`.
 * The result has one entry per path element, `amounts[0] === amountIn`.
 */
export function getAmountsOutV2(opts: {
  amountIn: bigint;
  hops: number;
  feeBps: number;
  reservesFor: (hop: number) => [bigint, bigint];
}): bigint[] {
  invariant(opts.hops >= 1, "PATH_INVALID", "path needs at least one hop");

  const amounts: bigint[] = [opts.amountIn];
  let current = opts.amountIn;
  for (let hop = 0; hop < opts.hops; hop += 1) {
    const [reserveIn, reserveOut] = opts.reservesFor(hop);
    current = getAmountOutV2({
      amountIn: current,
      reserveIn,
      reserveOut,
      feeBps: opts.feeBps,
    });
    invariant(current > 0n, "INSUFFICIENT_OUTPUT", `hop ${hop} yields zero output`);
    amounts.push(current);
  }
  return amounts;
}
