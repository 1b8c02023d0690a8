import { resetEnvCacheForTest, traceEnabled, traceStdoutEnabled } from "./env.js";
import type { KindName } from "./kinds.js";

export type SaturatingOp =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "mod"
  | "neg"
  | "inc"
  | "dec"
  | "convert"
  | "clamp";

export type SaturationReason =
  | "overflow"
  | "underflow"
  | "divide-by-zero"
  | "min-by-neg-one"
  | "ceiling"
  | "floor"
  | "narrowing";

export interface SaturationEvent {
  op: SaturatingOp;
  kind: KindName;
  /** Decimal operands, left to right. */
  operands: string[];
  reason: SaturationReason;
  result: string;
}

/** Oldest events are dropped past this many; drain with `takeSaturationEvents`. */
export const TRACE_EVENT_LIMIT = 10_000;

const events: SaturationEvent[] = [];

export function recordSaturation(
  op: SaturatingOp,
  kind: KindName,
  operands: readonly bigint[],
  reason: SaturationReason,
  result: bigint,
): void {
  if (!traceEnabled()) return;
  const event: SaturationEvent = {
    op,
    kind,
    operands: operands.map((v) => v.toString()),
    reason,
    result: result.toString(),
  };
  if (traceStdoutEnabled()) {
    process.stdout.write(JSON.stringify(event) + "\n");
  }
  events.push(event);
  if (events.length > TRACE_EVENT_LIMIT) {
    events.splice(0, events.length - TRACE_EVENT_LIMIT);
  }
}

export function takeSaturationEvents(): SaturationEvent[] {
  return events.splice(0, events.length);
}

export function resetSaturationTraceForTest(): void {
  resetEnvCacheForTest();
  events.length = 0;
}
