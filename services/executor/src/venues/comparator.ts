import type { Address, Venue, VenuePair } from "@flashpair/common";

import { quoteVenue } from "./quoter.js";

export type VenueComparison = {
  winner: Venue;
  other: Venue;
  expected_out: bigint;
  quotes: readonly [bigint, bigint];
};

/**
 * Quotes both venues with the same input and picks the larger output. The
 * second venue has to be strictly better to win, so ties go to the first.
 */
export function compareVenues(
  venues: VenuePair,
  amountIn: bigint,
  path: readonly Address[],
): VenueComparison {
  const [first, second] = venues;
  const firstOut = quoteVenue(first, amountIn, path);
  const secondOut = quoteVenue(second, amountIn, path);

  if (secondOut > firstOut) {
    return { winner: second, other: first, expected_out: secondOut, quotes: [firstOut, secondOut] };
  }
  return { winner: first, other: second, expected_out: firstOut, quotes: [firstOut, secondOut] };
}
