import { SatIntError, SatIntErrorCode } from "./errors.js";
import type { IntKind } from "./kinds.js";

export type RawInteger = number | bigint;

export function toBigIntStrict(input: unknown, label = "value"): bigint {
  if (typeof input === "bigint") return input;
  if (typeof input !== "number") {
    throw new SatIntError(SatIntErrorCode.NOT_INTEGER, `${label} must be a number or bigint`);
  }
  if (!Number.isInteger(input)) {
    throw new SatIntError(SatIntErrorCode.NOT_INTEGER, `${label} must be an integer, got ${input}`);
  }
  return BigInt(input);
}

export function clampBigInt(kind: IntKind, value: bigint): bigint {
  if (value > kind.max) return kind.max;
  if (value < kind.min) return kind.min;
  return value;
}
