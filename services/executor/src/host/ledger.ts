import { FlashPairError, invariant } from "@flashpair/common";
import type { Address, AssetToken, TokenRegistry } from "@flashpair/common";

import type { Checkpointable } from "./atomic.js";

type Book = Map<Address, bigint>;

function key(address: string): Address {
  return address.toLowerCase();
}

function allowanceKey(owner: string, spender: string): string {
  return `${key(owner)}:${key(spender)}`;
}

/**
 * Balances and allowances of every asset in the host. Amounts are raw token
 * units.
 */
export class TokenLedger implements TokenRegistry, Checkpointable {
  private balances = new Map<Address, Book>();
  private allowances = new Map<Address, Map<string, bigint>>();

  balanceOf(asset: string, holder: string): bigint {
    return this.balances.get(key(asset))?.get(key(holder)) ?? 0n;
  }

  allowance(asset: string, owner: string, spender: string): bigint {
    return this.allowances.get(key(asset))?.get(allowanceKey(owner, spender)) ?? 0n;
  }

  mint(asset: string, to: string, amount: bigint): void {
    invariant(amount > 0n, "AMOUNT_INVALID", "mint amount must be > 0");
    this.credit(asset, to, amount);
  }

  approve(sender: string, asset: string, spender: string, amount: bigint): void {
    invariant(amount >= 0n, "AMOUNT_INVALID", "allowance must be >= 0");
    let book = this.allowances.get(key(asset));
    if (book == null) {
      book = new Map();
      this.allowances.set(key(asset), book);
    }
    book.set(allowanceKey(sender, spender), amount);
  }

  transfer(sender: string, asset: string, to: string, amount: bigint): void {
    this.move(asset, sender, to, amount);
  }

  transferFrom(sender: string, asset: string, from: string, to: string, amount: bigint): void {
    const allowed = this.allowance(asset, from, sender);
    if (allowed < amount) {
      throw new FlashPairError(
        "INSUFFICIENT_ALLOWANCE",
        `${key(sender)} may spend ${allowed} of ${key(asset)} from ${key(from)}, needs ${amount}`,
      );
    }
    this.move(asset, from, to, amount);
    this.approve(from, asset, sender, allowed - amount);
  }

  token(asset: string): AssetToken {
    const address = key(asset);
    return {
      address,
      balanceOf: (holder) => this.balanceOf(address, holder),
      allowance: (owner, spender) => this.allowance(address, owner, spender),
      approve: (sender, spender, amount) => this.approve(sender, address, spender, amount),
      transfer: (sender, to, amount) => this.transfer(sender, address, to, amount),
      transferFrom: (sender, from, to, amount) =>
        this.transferFrom(sender, address, from, to, amount),
    };
  }

  checkpoint(): () => void {
    const balances = new Map([...this.balances].map(([asset, book]) => [asset, new Map(book)]));
    const allowances = new Map(
      [...this.allowances].map(([asset, book]) => [asset, new Map(book)]),
    );
    return () => {
      this.balances = balances;
      this.allowances = allowances;
    };
  }

  private move(asset: string, from: string, to: string, amount: bigint): void {
    invariant(amount >= 0n, "AMOUNT_INVALID", "transfer amount must be >= 0");
    const held = this.balanceOf(asset, from);
    if (held < amount) {
      throw new FlashPairError(
        "INSUFFICIENT_BALANCE",
        `${key(from)} holds ${held} of ${key(asset)}, needs ${amount}`,
      );
    }
    this.debit(asset, from, amount);
    this.credit(asset, to, amount);
  }

  private credit(asset: string, holder: string, amount: bigint): void {
    let book = this.balances.get(key(asset));
    if (book == null) {
      book = new Map();
      this.balances.set(key(asset), book);
    }
    book.set(key(holder), (book.get(key(holder)) ?? 0n) + amount);
  }

  private debit(asset: string, holder: string, amount: bigint): void {
    const book = this.balances.get(key(asset));
    if (book == null) return;
    book.set(key(holder), (book.get(key(holder)) ?? 0n) - amount);
  }
}
