import type { Address, TraceId } from "./ids.js";
import type { CallContext } from "./venue.js";

/** Debt mode 0: nothing stays open after the call, a pure flash loan. */
export const NO_DEBT_MODE = 0;

export type LoanRequest = {
  assets: Address[];
  amounts: bigint[];
  modes: number[];
};

export interface FlashLoanReceiver {
  readonly address: Address;
  onFundsReceived(
    ctx: CallContext,
    assets: readonly Address[],
    amounts: readonly bigint[],
    premiums: readonly bigint[],
    initiator: Address,
    params: string,
  ): boolean;
}

export interface LendingPool {
  readonly address: Address;
  flashLoan(
    ctx: CallContext,
    receiver: FlashLoanReceiver,
    assets: readonly Address[],
    amounts: readonly bigint[],
    modes: readonly number[],
    onBehalfOf: Address,
    params: string,
    referralCode: number,
  ): void;
}

/** Resolves the lending pool currently in charge; it may be re-pointed. */
export interface LendingAddressesProvider {
  readonly address: Address;
  getPool(): LendingPool;
}

export type ExecutionPhase =
  | "IDLE"
  | "LOAN_REQUESTED"
  | "FUNDS_RECEIVED"
  | "LEG1_EXECUTED"
  | "LEG2_EXECUTED"
  | "PROFIT_EVALUATED"
  | "REPAYMENT_AUTHORIZED"
  | "COMPLETED"
  | "ABORTED";

export type ArbitrageOutcome = {
  trace_id: TraceId;
  asset: Address;
  amount: bigint;
  premium: bigint;
  profit: bigint;
  intermediate_amount: bigint;
  leg1_venue: string;
  leg2_venue: string;
};

export function newLoanRequest(asset: Address, amount: bigint): LoanRequest {
  return { assets: [asset], amounts: [amount], modes: [NO_DEBT_MODE] };
}
