import { toBigIntStrict, type RawInteger } from "./coerce.js";
import { SatIntError, SatIntErrorCode } from "./errors.js";
import type { KindName } from "./kinds.js";
import { SaturatingInt } from "./saturating.js";
import type { IntegerType } from "./types.js";

/** An offset, size or length as it comes out of a header: raw, or already saturating. */
export type Extent = RawInteger | SaturatingInt;

export interface ReadOptions {
  littleEndian?: boolean;
}

type FieldReader = (view: DataView, at: number, littleEndian: boolean) => bigint;

const READERS: { readonly [K in KindName]: FieldReader } = {
  i8: (view, at) => BigInt(view.getInt8(at)),
  u8: (view, at) => BigInt(view.getUint8(at)),
  i16: (view, at, le) => BigInt(view.getInt16(at, le)),
  u16: (view, at, le) => BigInt(view.getUint16(at, le)),
  i32: (view, at, le) => BigInt(view.getInt32(at, le)),
  u32: (view, at, le) => BigInt(view.getUint32(at, le)),
  i64: (view, at, le) => view.getBigInt64(at, le),
  u64: (view, at, le) => view.getBigUint64(at, le),
};

const extentValue = (extent: Extent, label: string): bigint =>
  extent instanceof SaturatingInt ? extent.value : toBigIntStrict(extent, label);

/**
 * True when `[offset, offset + size)` fits inside `length`. The end is summed
 * exactly in bigint, so an attacker-sized `size` can neither wrap back into
 * range nor hide behind a bound.
 */
export function spanWithin(offset: Extent, size: Extent, length: Extent): boolean {
  const start = extentValue(offset, "offset");
  const span = extentValue(size, "size");
  const limit = extentValue(length, "length");
  if (start < 0n || span < 0n || limit < 0n) return false;
  return start + span <= limit;
}

/** Read one field of `type`'s width at `offset`. */
export function readInteger<K extends KindName>(
  type: IntegerType<K>,
  bytes: Uint8Array,
  offset: Extent,
  options: ReadOptions = {},
): SaturatingInt<K> {
  const { kind } = type;
  if (!spanWithin(offset, kind.bytes, bytes.byteLength)) {
    throw new SatIntError(
      SatIntErrorCode.OUT_OF_BOUNDS,
      `${kind.name} field at offset ${String(offset)} exceeds buffer of ${bytes.byteLength} bytes`,
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const at = Number(extentValue(offset, "offset"));
  return type.of(READERS[kind.name](view, at, options.littleEndian ?? false));
}
