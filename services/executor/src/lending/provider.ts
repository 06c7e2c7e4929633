import { normalizeAddress } from "@flashpair/common";
import type { Address, LendingAddressesProvider, LendingPool } from "@flashpair/common";

export class StaticAddressesProvider implements LendingAddressesProvider {
  readonly address: Address;
  private pool: LendingPool;

  constructor(address: string, pool: LendingPool) {
    this.address = normalizeAddress(address, "addresses provider");
    this.pool = pool;
  }

  getPool(): LendingPool {
    return this.pool;
  }

  setPool(pool: LendingPool): void {
    this.pool = pool;
  }
}
