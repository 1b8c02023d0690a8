import { SatIntError, SatIntErrorCode } from "./errors.js";

export type SignedKindName = "i8" | "i16" | "i32" | "i64";
export type UnsignedKindName = "u8" | "u16" | "u32" | "u64";
export type KindName = SignedKindName | UnsignedKindName;

export interface IntKind<K extends KindName = KindName> {
  readonly name: K;
  readonly bits: 8 | 16 | 32 | 64;
  readonly bytes: 1 | 2 | 4 | 8;
  readonly signed: boolean;
  readonly min: bigint;
  readonly max: bigint;
}

const BYTES = { 8: 1, 16: 2, 32: 4, 64: 8 } as const;

const defineKind = <K extends KindName>(
  name: K,
  bits: IntKind["bits"],
  signed: boolean,
): IntKind<K> => {
  const width = BigInt(bits);
  const kind: IntKind<K> = {
    name,
    bits,
    bytes: BYTES[bits],
    signed,
    min: signed ? -(1n << (width - 1n)) : 0n,
    max: signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n,
  };
  return Object.freeze(kind);
};

export const INT8 = defineKind("i8", 8, true);
export const INT16 = defineKind("i16", 16, true);
export const INT32 = defineKind("i32", 32, true);
export const INT64 = defineKind("i64", 64, true);
export const UINT8 = defineKind("u8", 8, false);
export const UINT16 = defineKind("u16", 16, false);
export const UINT32 = defineKind("u32", 32, false);
export const UINT64 = defineKind("u64", 64, false);

const KINDS: { readonly [K in KindName]: IntKind<K> } = {
  i8: INT8,
  i16: INT16,
  i32: INT32,
  i64: INT64,
  u8: UINT8,
  u16: UINT16,
  u32: UINT32,
  u64: UINT64,
};

export const KIND_NAMES: readonly KindName[] = Object.freeze(
  Object.keys(KINDS).filter(isKindName),
);

export function isKindName(name: unknown): name is KindName {
  return typeof name === "string" && Object.prototype.hasOwnProperty.call(KINDS, name);
}

export function intKind<K extends KindName>(name: K): IntKind<K>;
export function intKind(name: string): IntKind;
export function intKind(name: string): IntKind {
  if (!isKindName(name)) {
    throw new SatIntError(SatIntErrorCode.UNKNOWN_KIND, `unknown integer kind '${name}'`);
  }
  return KINDS[name];
}

export function inRange(kind: IntKind, value: bigint): boolean {
  return value >= kind.min && value <= kind.max;
}
