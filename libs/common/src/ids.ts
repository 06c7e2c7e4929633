import crypto from "node:crypto";

import { getAddress, isAddress } from "ethers";

import { FlashPairError, invariant } from "./errors.js";
import type { ErrorCode } from "./errors.js";

export type TraceId = string;

/** Lower-cased, 0x-prefixed 20-byte hex. */
export type Address = string;

export const ZERO_ADDRESS: Address = `0x${"00".repeat(20)}`;

export function newTraceId(): TraceId {
  return crypto.randomUUID();
}

export function normalizeAddress(
  value: string,
  nameForError: string,
  code: ErrorCode = "ENV_INVALID",
): Address {
  invariant(value.length > 0, code === "ENV_INVALID" ? "ENV_MISSING" : code, `missing ${nameForError}`);
  if (!isAddress(value)) {
    throw new FlashPairError(code, `invalid ${nameForError}: ${value}`);
  }
  return getAddress(value).toLowerCase();
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(value: string): boolean {
  return sameAddress(value, ZERO_ADDRESS);
}
