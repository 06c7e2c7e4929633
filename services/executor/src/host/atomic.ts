import { FlashPairError } from "@flashpair/common";

/** State that can be captured and put back as one unit. */
export interface Checkpointable {
  /** Captures current state; calling the result restores it. */
  checkpoint(): () => void;
}

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

function isThenable(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Runs work against every registered participant as one unit: either all of
 * its effects stay, or none do. Work must be synchronous so nothing else can
 * interleave with it.
 */
export class AtomicHost {
  private readonly participants: Checkpointable[];
  private depth = 0;

  constructor(participants: Checkpointable[]) {
    this.participants = [...participants];
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  atomic<T>(work: () => T): T {
    const restores = this.participants.map((p) => p.checkpoint());
    this.depth += 1;
    try {
      const result = work();
      if (isThenable(result)) {
        throw new FlashPairError(
          "HOST_ASYNC_UNSUPPORTED",
          "atomic work must not return a promise",
        );
      }
      return result;
    } catch (err: unknown) {
      for (let i = restores.length - 1; i >= 0; i -= 1) restores[i]();
      throw err;
    } finally {
      this.depth -= 1;
    }
  }
}
