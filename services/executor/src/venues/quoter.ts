import { FlashPairError } from "@flashpair/common";
import type { Address, Venue } from "@flashpair/common";

/** Expected output of `path` on one venue for `amountIn`. */
export function quoteVenue(venue: Venue, amountIn: bigint, path: readonly Address[]): bigint {
  let amounts: bigint[];
  try {
    amounts = venue.router.quoteOut(amountIn, path);
  } catch (err: unknown) {
    throw new FlashPairError(
      "QUOTE_FAILED",
      `${venue.name} cannot quote ${path.join("->")}`,
      { cause: err },
    );
  }

  if (amounts.length !== path.length) {
    throw new FlashPairError(
      "QUOTE_FAILED",
      `${venue.name} returned ${amounts.length} amounts for a ${path.length}-token path`,
    );
  }
  return amounts[amounts.length - 1];
}
