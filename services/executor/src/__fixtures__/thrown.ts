import { FlashPairError } from "@flashpair/common";

export function thrown(fn: () => unknown): FlashPairError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof FlashPairError) return err;
    throw err;
  }
  throw new Error("expected call to throw");
}
