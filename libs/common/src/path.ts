import { AbiCoder } from "ethers";

import { FlashPairError, invariant } from "./errors.js";
import { normalizeAddress, sameAddress } from "./ids.js";
import type { Address } from "./ids.js";

/**
 * Token route for the forward leg (origin -> intermediate) and its exact
 * mirror for the reverse leg.
 */
export type TradePath = {
  path: Address[];
  reverse_path: Address[];
};

const PARAM_TYPES = ["address[]", "address[]"] as const;

function normalizeRoute(route: readonly string[], name: string): Address[] {
  invariant(route.length >= 2, "PATH_INVALID", `${name} needs at least 2 tokens`);
  const normalized = route.map((token, i) =>
    normalizeAddress(token, `${name}[${i}]`, "PATH_INVALID"),
  );
  for (let i = 1; i < normalized.length; i += 1) {
    invariant(
      normalized[i] !== normalized[i - 1],
      "PATH_INVALID",
      `${name} repeats ${normalized[i]} at ${i}`,
    );
  }
  return normalized;
}

export function reverseRoute(route: readonly Address[]): Address[] {
  return [...route].reverse();
}

export function validateTradePath(input: {
  path: readonly string[];
  reverse_path: readonly string[];
}): TradePath {
  const path = normalizeRoute(input.path, "path");
  const reverse_path = normalizeRoute(input.reverse_path, "reverse_path");

  const mirrored = reverseRoute(path);
  const isMirror =
    mirrored.length === reverse_path.length &&
    mirrored.every((token, i) => token === reverse_path[i]);
  invariant(isMirror, "PATH_INVALID", "reverse_path must be path reversed");

  return { path, reverse_path };
}

/** Two-leg route through one intermediate asset. */
export function roundTrip(origin: string, intermediate: string): TradePath {
  return validateTradePath({
    path: [origin, intermediate],
    reverse_path: [intermediate, origin],
  });
}

export function requireOrigin(trade: TradePath, asset: string): void {
  if (!sameAddress(trade.path[0], asset)) {
    throw new FlashPairError(
      "PATH_MISMATCH",
      `path starts with ${trade.path[0]} but borrowed asset is ${asset.toLowerCase()}`,
    );
  }
}

export function encodeTradePath(trade: TradePath): string {
  const valid = validateTradePath(trade);
  return AbiCoder.defaultAbiCoder().encode(PARAM_TYPES, [valid.path, valid.reverse_path]);
}

function toStringArray(value: unknown, name: string): string[] {
  if (!Array.isArray(value)) {
    throw new FlashPairError("PATH_INVALID", `${name} is not an address array`);
  }
  return value.map((v: unknown) => String(v));
}

export function decodeTradePath(params: string): TradePath {
  let decoded: unknown[];
  try {
    decoded = [...AbiCoder.defaultAbiCoder().decode(PARAM_TYPES, params)];
  } catch (err: unknown) {
    throw new FlashPairError("PATH_INVALID", "params are not (address[], address[])", {
      cause: err,
    });
  }

  return validateTradePath({
    path: toStringArray(decoded[0], "path"),
    reverse_path: toStringArray(decoded[1], "reverse_path"),
  });
}
