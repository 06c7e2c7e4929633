export type ErrorCode =
  | "ENV_MISSING"
  | "ENV_INVALID"
  | "UNAUTHORIZED"
  | "OWNER_INVALID"
  | "UNTRUSTED_CALLER"
  | "REENTRANT_CALL"
  | "PATH_INVALID"
  | "PATH_MISMATCH"
  | "AMOUNT_INVALID"
  | "UNPROFITABLE_ARBITRAGE"
  | "NOTHING_TO_WITHDRAW"
  | "LOAN_SHAPE_INVALID"
  | "LOAN_MODE_UNSUPPORTED"
  | "CALLBACK_REJECTED"
  | "REPAYMENT_FAILED"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INSUFFICIENT_LIQUIDITY"
  | "INSUFFICIENT_OUTPUT"
  | "PAIR_NOT_FOUND"
  | "DEADLINE_EXPIRED"
  | "QUOTE_FAILED"
  | "SWAP_FAILED"
  | "HOST_ASYNC_UNSUPPORTED"
  | "REDIS_CONNECT_FAILED"
  | "REDIS_LOCK_FAILED"
  | "PG_CONNECT_FAILED"
  | "PG_SCHEMA_FAILED"
  | "PG_INSERT_FAILED";

export class FlashPairError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "FlashPairError";
    this.code = code;
  }
}

export function isFlashPairError(err: unknown, code?: ErrorCode): err is FlashPairError {
  if (!(err instanceof FlashPairError)) return false;
  return code == null || err.code === code;
}

export function asFlashPairError(
  err: unknown,
  fallbackCode: ErrorCode,
  fallbackMessage: string,
): FlashPairError {
  if (err instanceof FlashPairError) return err;
  return new FlashPairError(fallbackCode, fallbackMessage, { cause: err });
}

export function invariant(
  condition: unknown,
  code: ErrorCode,
  message: string,
): asserts condition {
  if (!condition) throw new FlashPairError(code, message);
}
