import { FlashPairError, NO_DEBT_MODE, bpsOf, invariant, normalizeAddress } from "@flashpair/common";
import type { Address, CallContext, FlashLoanReceiver, LendingPool } from "@flashpair/common";

import type { AtomicHost } from "../host/atomic.js";
import type { TokenLedger } from "../host/ledger.js";

export const DEFAULT_PREMIUM_BPS = 9;

/**
 * Flash lender over the host ledger: lends, hands control to the receiver,
 * then pulls principal plus premium back. Anything short of full repayment
 * undoes the whole loan.
 */
export class SimulatedLendingPool implements LendingPool {
  readonly address: Address;
  readonly premium_bps: number;

  private readonly ledger: TokenLedger;
  private readonly host: AtomicHost;

  constructor(opts: { address: string; ledger: TokenLedger; host: AtomicHost; premium_bps?: number }) {
    this.address = normalizeAddress(opts.address, "lending pool address");
    this.ledger = opts.ledger;
    this.host = opts.host;
    this.premium_bps = opts.premium_bps ?? DEFAULT_PREMIUM_BPS;
    invariant(
      Number.isInteger(this.premium_bps) && this.premium_bps >= 0 && this.premium_bps <= 10_000,
      "ENV_INVALID",
      `invalid premium_bps: ${String(this.premium_bps)}`,
    );
  }

  premiumFor(amount: bigint): bigint {
    return bpsOf(amount, this.premium_bps);
  }

  flashLoan(
    ctx: CallContext,
    receiver: FlashLoanReceiver,
    assets: readonly Address[],
    amounts: readonly bigint[],
    modes: readonly number[],
    _onBehalfOf: Address,
    params: string,
    _referralCode: number,
  ): void {
    invariant(
      assets.length > 0 && assets.length === amounts.length && assets.length === modes.length,
      "LOAN_SHAPE_INVALID",
      "assets, amounts and modes must be non-empty and of equal length",
    );
    if (modes.some((mode) => mode !== NO_DEBT_MODE)) {
      throw new FlashPairError("LOAN_MODE_UNSUPPORTED", "only debt mode 0 is supported");
    }

    this.host.atomic(() => {
      const premiums = amounts.map((amount) => this.premiumFor(amount));

      assets.forEach((asset, i) => {
        invariant(amounts[i] > 0n, "AMOUNT_INVALID", "loan amount must be > 0");
        const available = this.ledger.balanceOf(asset, this.address);
        if (available < amounts[i]) {
          throw new FlashPairError(
            "INSUFFICIENT_LIQUIDITY",
            `pool holds ${available} of ${asset.toLowerCase()}, ${amounts[i]} requested`,
          );
        }
        this.ledger.transfer(this.address, asset, receiver.address, amounts[i]);
      });

      const accepted = receiver.onFundsReceived(
        { sender: this.address },
        assets,
        amounts,
        premiums,
        ctx.sender,
        params,
      );
      if (!accepted) {
        throw new FlashPairError("CALLBACK_REJECTED", "receiver did not accept the loan");
      }

      assets.forEach((asset, i) => {
        const owed = amounts[i] + premiums[i];
        try {
          this.ledger.transferFrom(this.address, asset, receiver.address, this.address, owed);
        } catch (err: unknown) {
          throw new FlashPairError(
            "REPAYMENT_FAILED",
            `receiver could not repay ${owed} of ${asset.toLowerCase()}`,
            { cause: err },
          );
        }
      });
    });
  }
}
