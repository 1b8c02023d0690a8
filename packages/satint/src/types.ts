import type { RawInteger } from "./coerce.js";
import {
  INT16,
  INT32,
  INT64,
  INT8,
  UINT16,
  UINT32,
  UINT64,
  UINT8,
  type IntKind,
  type KindName,
} from "./kinds.js";
import { SaturatingInt, isSaturatingInt } from "./saturating.js";

/** Factory bound to one kind, so call sites read `U32.of(n)` rather than repeating the descriptor. */
export interface IntegerType<K extends KindName> {
  readonly kind: IntKind<K>;
  of(value?: RawInteger): SaturatingInt<K>;
  clamp(value: RawInteger): SaturatingInt<K>;
  from(other: SaturatingInt): SaturatingInt<K>;
  min(): SaturatingInt<K>;
  max(): SaturatingInt<K>;
  is(value: unknown): value is SaturatingInt<K>;
}

export function integerType<K extends KindName>(kind: IntKind<K>): IntegerType<K> {
  return Object.freeze({
    kind,
    of: (value: RawInteger = 0n) => new SaturatingInt(kind, value),
    clamp: (value: RawInteger) => SaturatingInt.clamp(kind, value),
    from: (other: SaturatingInt) => SaturatingInt.from(kind, other),
    min: () => SaturatingInt.min(kind),
    max: () => SaturatingInt.max(kind),
    is: (value: unknown): value is SaturatingInt<K> => isSaturatingInt(value, kind),
  });
}

export const I8 = integerType(INT8);
export const I16 = integerType(INT16);
export const I32 = integerType(INT32);
export const I64 = integerType(INT64);
export const U8 = integerType(UINT8);
export const U16 = integerType(UINT16);
export const U32 = integerType(UINT32);
export const U64 = integerType(UINT64);
