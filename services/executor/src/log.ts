import { isFlashPairError, jsonStringify } from "@flashpair/common";
import type { TraceId } from "@flashpair/common";

type Level = "info" | "warn" | "error";

export function logLine(
  service: string,
  level: Level,
  trace_id: TraceId,
  message: string,
  meta?: Record<string, unknown>,
): void {
  const base = `[${service}][${level}][trace=${trace_id}] ${message}`;
  const suffix = meta ? ` ${jsonStringify(meta)}` : "";

  if (level === "error") console.error(`${base}${suffix}`);
  else if (level === "warn") console.warn(`${base}${suffix}`);
  else console.log(`${base}${suffix}`);
}

/** Code plus the first cause's message, for log meta. */
export function errorMeta(err: unknown): Record<string, unknown> {
  if (!isFlashPairError(err)) {
    return { error: err instanceof Error ? err.message : String(err) };
  }
  const meta: Record<string, unknown> = { code: err.code };
  if (err.cause instanceof Error) meta.cause = err.cause.message;
  return meta;
}
