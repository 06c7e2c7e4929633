import { FlashPairError, invariant, isZeroAddress, normalizeAddress, sameAddress } from "@flashpair/common";
import type { Address } from "@flashpair/common";

/**
 * Single-owner gate for privileged entry points. The owner can only be
 * replaced by the current owner.
 */
export class Ownable {
  private currentOwner: Address;

  constructor(owner: string) {
    this.currentOwner = Ownable.validOwner(owner);
  }

  owner(): Address {
    return this.currentOwner;
  }

  isOwner(caller: string): boolean {
    return sameAddress(caller, this.currentOwner);
  }

  requireOwner(caller: string): void {
    if (!this.isOwner(caller)) {
      throw new FlashPairError("UNAUTHORIZED", `${caller.toLowerCase()} is not the owner`);
    }
  }

  /** Returns the previous owner. */
  transferOwnership(caller: string, newOwner: string): Address {
    this.requireOwner(caller);
    const next = Ownable.validOwner(newOwner);
    const previous = this.currentOwner;
    this.currentOwner = next;
    return previous;
  }

  private static validOwner(value: string): Address {
    const owner = normalizeAddress(value, "owner", "OWNER_INVALID");
    invariant(!isZeroAddress(owner), "OWNER_INVALID", "owner must not be the zero address");
    return owner;
  }
}
