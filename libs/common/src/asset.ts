import type { Address } from "./ids.js";

/** ERC-20 style transfer surface of one asset. */
export interface AssetToken {
  readonly address: Address;
  balanceOf(holder: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(sender: Address, spender: Address, amount: bigint): void;
  transfer(sender: Address, to: Address, amount: bigint): void;
  transferFrom(sender: Address, from: Address, to: Address, amount: bigint): void;
}

export interface TokenRegistry {
  token(asset: Address): AssetToken;
}
