import { FlashPairError, jsonStringify } from "@flashpair/common";
import type { Address, ExecutorEvent, TraceId } from "@flashpair/common";
import { Pool } from "pg";

/** The part of a pg `Pool` the journal needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

export type AttemptRecord = {
  trace_id: TraceId;
  asset: Address;
  amount: bigint;
  terminal: "COMPLETED" | "ABORTED";
  reached: string;
  profit: bigint | null;
  premium: bigint | null;
  error_code: string | null;
  created_at: string;
};

export function createPgPool(postgresUrl: string): Pool {
  return new Pool({ connectionString: postgresUrl });
}

export async function ensurePgSchema(pg: Queryable): Promise<void> {
  try {
    await pg.query(`
      create table if not exists executor_events (
        id bigserial primary key,
        trace_id uuid not null,
        event_type text not null,
        at bigint not null,
        data jsonb not null,
        created_at timestamptz not null default now()
      );
    `);

    await pg.query(`
      create table if not exists arbitrage_attempts (
        trace_id uuid primary key,
        asset text not null,
        amount numeric not null,
        terminal text not null,
        reached text not null,
        profit numeric,
        premium numeric,
        error_code text,
        created_at timestamptz not null
      );
    `);
  } catch (err: unknown) {
    throw new FlashPairError(
      "PG_SCHEMA_FAILED",
      "failed to ensure postgres schema",
      { cause: err },
    );
  }
}

function toJsonNoBigInt(value: unknown): unknown {
  return JSON.parse(jsonStringify(value));
}

export async function insertExecutorEvent(pg: Queryable, event: ExecutorEvent): Promise<void> {
  try {
    await pg.query(
      `
      insert into executor_events (trace_id, event_type, at, data)
      values ($1::uuid, $2, $3::bigint, $4::jsonb);
      `,
      [event.trace_id, event.type, String(event.at), toJsonNoBigInt(event)],
    );
  } catch (err: unknown) {
    throw new FlashPairError("PG_INSERT_FAILED", "failed to insert executor_event", {
      cause: err,
    });
  }
}

export async function insertAttempt(pg: Queryable, attempt: AttemptRecord): Promise<void> {
  try {
    await pg.query(
      `
      insert into arbitrage_attempts (
        trace_id,
        asset,
        amount,
        terminal,
        reached,
        profit,
        premium,
        error_code,
        created_at
      ) values ($1::uuid, $2, $3::numeric, $4, $5, $6::numeric, $7::numeric, $8, $9::timestamptz)
      on conflict (trace_id) do nothing;
      `,
      [
        attempt.trace_id,
        attempt.asset,
        attempt.amount.toString(),
        attempt.terminal,
        attempt.reached,
        attempt.profit?.toString() ?? null,
        attempt.premium?.toString() ?? null,
        attempt.error_code,
        attempt.created_at,
      ],
    );
  } catch (err: unknown) {
    throw new FlashPairError("PG_INSERT_FAILED", "failed to insert arbitrage_attempt", {
      cause: err,
    });
  }
}
