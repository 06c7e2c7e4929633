import type { Address, TraceId } from "./ids.js";

export type LoanInitiatedEvent = {
  type: "LOAN_INITIATED";
  trace_id: TraceId;
  assets: Address[];
  amounts: bigint[];
  at: number;
};

export type ArbitrageExecutedEvent = {
  type: "ARBITRAGE_EXECUTED";
  trace_id: TraceId;
  asset: Address;
  profit: bigint;
  at: number;
};

export type FundsWithdrawnEvent = {
  type: "FUNDS_WITHDRAWN";
  trace_id: TraceId;
  asset: Address;
  to: Address;
  amount: bigint;
  at: number;
};

export type OwnershipTransferredEvent = {
  type: "OWNERSHIP_TRANSFERRED";
  trace_id: TraceId;
  previous_owner: Address;
  new_owner: Address;
  at: number;
};

export type ExecutorEvent =
  | LoanInitiatedEvent
  | ArbitrageExecutedEvent
  | FundsWithdrawnEvent
  | OwnershipTransferredEvent;
