import { FlashPairError, newTraceId } from "@flashpair/common";

import { errorMeta, logLine } from "../log.js";

export const EXECUTION_LOCK_KEY = "flashpair:executor:lock";

// Deletes the key only while it still holds our token.
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

/** Subset of the node-redis v4 client used for locking. */
export interface LockClient {
  set(key: string, value: string, options: { NX: true; PX: number }): Promise<unknown>;
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
}

export type LockResult<T> = { acquired: false } | { acquired: true; value: T };

/**
 * Cross-process guard so only one executor attempts a loan at a time. The
 * TTL bounds how long a crashed holder can block the others.
 */
export class ExecutionLock {
  private readonly client: LockClient;
  private readonly key: string;
  private readonly ttlMs: number;

  constructor(client: LockClient, opts: { ttl_ms: number; key?: string }) {
    this.client = client;
    this.ttlMs = opts.ttl_ms;
    this.key = opts.key ?? EXECUTION_LOCK_KEY;
  }

  /** Returns the holder token, or null when someone else holds the lock. */
  async acquire(): Promise<string | null> {
    const token = newTraceId();
    let reply: unknown;
    try {
      reply = await this.client.set(this.key, token, { NX: true, PX: this.ttlMs });
    } catch (err: unknown) {
      throw new FlashPairError("REDIS_LOCK_FAILED", `failed to acquire ${this.key}`, {
        cause: err,
      });
    }
    return reply === "OK" ? token : null;
  }

  /** False when the lock had already expired or changed hands. */
  async release(token: string): Promise<boolean> {
    let reply: unknown;
    try {
      reply = await this.client.eval(RELEASE_SCRIPT, { keys: [this.key], arguments: [token] });
    } catch (err: unknown) {
      throw new FlashPairError("REDIS_LOCK_FAILED", `failed to release ${this.key}`, {
        cause: err,
      });
    }
    return reply === 1;
  }

  async withLock<T>(work: () => Promise<T> | T): Promise<LockResult<T>> {
    const token = await this.acquire();
    if (token == null) return { acquired: false };
    let value: T;
    try {
      value = await work();
    } catch (err: unknown) {
      await this.release(token).catch((releaseErr: unknown) => {
        logLine("executor", "warn", token, "lock release failed after work error", errorMeta(releaseErr));
      });
      throw err;
    }
    await this.release(token);
    return { acquired: true, value };
  }
}
