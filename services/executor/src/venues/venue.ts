import { invariant } from "@flashpair/common";
import type { ExchangeRouter, Venue, VenuePair } from "@flashpair/common";

export function makeVenue(name: string, router: ExchangeRouter): Venue {
  invariant(name.trim().length > 0, "ENV_INVALID", "venue name must not be empty");
  return { name: name.trim(), router_address: router.address, router };
}

export function makeVenuePair(first: Venue, second: Venue): VenuePair {
  invariant(
    first.router_address !== second.router_address,
    "ENV_INVALID",
    "venues must use two different routers",
  );
  const pair: VenuePair = [first, second];
  return pair;
}
