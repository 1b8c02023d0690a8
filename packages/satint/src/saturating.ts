import { clampBigInt, toBigIntStrict, type RawInteger } from "./coerce.js";
import { SatIntError, SatIntErrorCode } from "./errors.js";
import { inRange, type IntKind, type KindName } from "./kinds.js";
import {
  recordSaturation,
  type SaturatingOp,
  type SaturationReason,
} from "./trace.js";

/** A same-kind instance, or a raw integer already inside the kind's range. */
export type Operand<K extends KindName> = SaturatingInt<K> | RawInteger;

export interface SaturatingIntJSON {
  kind: KindName;
  value: string;
}

function rangeError(kind: IntKind, value: bigint): SatIntError {
  return new SatIntError(
    SatIntErrorCode.RANGE,
    `${value} is outside ${kind.name} [${kind.min}, ${kind.max}]`,
  );
}

/**
 * Fixed-width integer whose arithmetic clamps to the kind's range instead of
 * wrapping. Every operator is total: overflow goes to `max`, underflow to
 * `min`, and division or remainder by zero yields `max`.
 *
 * Compound forms (`addAssign`, `inc`, ...) mutate the receiver and return it;
 * the plain forms leave both operands untouched.
 */
export class SaturatingInt<K extends KindName = KindName> {
  readonly kind: IntKind<K>;
  private raw: bigint;

  /** @throws SatIntError when `value` is not an integer inside `kind`. */
  constructor(kind: IntKind<K>, value: RawInteger = 0n) {
    const v = toBigIntStrict(value);
    if (!inRange(kind, v)) throw rangeError(kind, v);
    this.kind = kind;
    this.raw = v;
  }

  static min<K extends KindName>(kind: IntKind<K>): SaturatingInt<K> {
    return new SaturatingInt(kind, kind.min);
  }

  static max<K extends KindName>(kind: IntKind<K>): SaturatingInt<K> {
    return new SaturatingInt(kind, kind.max);
  }

  /** Saturate an arbitrary integer into `kind`. */
  static clamp<K extends KindName>(kind: IntKind<K>, value: RawInteger): SaturatingInt<K> {
    const v = toBigIntStrict(value);
    const clamped = clampBigInt(kind, v);
    if (clamped !== v) {
      recordSaturation("clamp", kind.name, [v], v > kind.max ? "overflow" : "underflow", clamped);
    }
    return new SaturatingInt(kind, clamped);
  }

  /**
   * Convert across width or signedness. The bound check happens on the full
   * bigint value, so only the clamped result is ever narrowed into `kind`.
   */
  static from<K extends KindName>(kind: IntKind<K>, other: SaturatingInt): SaturatingInt<K> {
    const v = other.raw;
    const clamped = clampBigInt(kind, v);
    if (clamped !== v) {
      recordSaturation("convert", kind.name, [v], "narrowing", clamped);
    }
    return new SaturatingInt(kind, clamped);
  }

  get value(): bigint {
    return this.raw;
  }

  to<T extends KindName>(kind: IntKind<T>): SaturatingInt<T> {
    return SaturatingInt.from(kind, this);
  }

  clone(): SaturatingInt<K> {
    return new SaturatingInt(this.kind, this.raw);
  }

  assign(other: Operand<K>): this {
    this.raw = this.operand(other);
    return this;
  }

  // --- compound operators ---------------------------------------------------

  addAssign(other: Operand<K>): this {
    const a = this.raw;
    const b = this.operand(other);
    const { min, max } = this.kind;
    if (b > 0n && a > max - b) return this.saturate("add", [a, b], max, "overflow");
    if (b < 0n && a < min - b) return this.saturate("add", [a, b], min, "underflow");
    this.raw = a + b;
    return this;
  }

  subAssign(other: Operand<K>): this {
    const a = this.raw;
    const b = this.operand(other);
    const { min, max } = this.kind;
    if (b > 0n && a < min + b) return this.saturate("sub", [a, b], min, "underflow");
    if (b < 0n && a > max + b) return this.saturate("sub", [a, b], max, "overflow");
    this.raw = a - b;
    return this;
  }

  mulAssign(other: Operand<K>): this {
    const a = this.raw;
    const b = this.operand(other);
    const { min, max } = this.kind;
    if (a === 0n || b === 0n) {
      this.raw = 0n;
      return this;
    }
    // bound / b truncates toward zero, so comparing a against it is exact
    if (a > 0n && b > 0n && a > max / b) return this.saturate("mul", [a, b], max, "overflow");
    if (a > 0n && b < 0n && a > min / b) return this.saturate("mul", [a, b], min, "underflow");
    if (a < 0n && b > 0n && a < min / b) return this.saturate("mul", [a, b], min, "underflow");
    if (a < 0n && b < 0n && a < max / b) return this.saturate("mul", [a, b], max, "overflow");
    this.raw = a * b;
    return this;
  }

  divAssign(other: Operand<K>): this {
    const a = this.raw;
    const b = this.operand(other);
    const { min, max } = this.kind;
    if (b === 0n) return this.saturate("div", [a, b], max, "divide-by-zero");
    if (a === min && b === -1n) return this.saturate("div", [a, b], max, "min-by-neg-one");
    this.raw = a / b;
    return this;
  }

  modAssign(other: Operand<K>): this {
    const a = this.raw;
    const b = this.operand(other);
    if (b === 0n) return this.saturate("mod", [a, b], this.kind.max, "divide-by-zero");
    if (a === this.kind.min && b === -1n) {
      this.raw = 0n;
      return this;
    }
    this.raw = a % b;
    return this;
  }

  // --- pure operators -------------------------------------------------------

  add(other: Operand<K>): SaturatingInt<K> {
    return this.clone().addAssign(other);
  }

  sub(other: Operand<K>): SaturatingInt<K> {
    return this.clone().subAssign(other);
  }

  mul(other: Operand<K>): SaturatingInt<K> {
    return this.clone().mulAssign(other);
  }

  div(other: Operand<K>): SaturatingInt<K> {
    return this.clone().divAssign(other);
  }

  mod(other: Operand<K>): SaturatingInt<K> {
    return this.clone().modAssign(other);
  }

  /** `-value`; the minimum of a signed kind has no positive counterpart and stays put. */
  neg(): SaturatingInt<K> {
    const a = this.raw;
    const { min } = this.kind;
    if (a === min) {
      if (this.kind.signed) recordSaturation("neg", this.kind.name, [a], "min-by-neg-one", min);
      return new SaturatingInt(this.kind, min);
    }
    const negated = -a;
    if (negated < min) {
      recordSaturation("neg", this.kind.name, [a], "underflow", min);
      return new SaturatingInt(this.kind, min);
    }
    return new SaturatingInt(this.kind, negated);
  }

  // --- increment / decrement ------------------------------------------------

  /** Pre-increment. No-op at `max`. */
  inc(): this {
    if (this.raw < this.kind.max) {
      this.raw += 1n;
    } else {
      recordSaturation("inc", this.kind.name, [this.raw], "ceiling", this.raw);
    }
    return this;
  }

  /** Post-increment: returns the value held before the increment. */
  postInc(): SaturatingInt<K> {
    const prior = this.clone();
    this.inc();
    return prior;
  }

  /** Pre-decrement. No-op at `min`. */
  dec(): this {
    if (this.raw > this.kind.min) {
      this.raw -= 1n;
    } else {
      recordSaturation("dec", this.kind.name, [this.raw], "floor", this.raw);
    }
    return this;
  }

  postDec(): SaturatingInt<K> {
    const prior = this.clone();
    this.dec();
    return prior;
  }

  // --- comparisons ----------------------------------------------------------

  compare(other: Operand<K>): -1 | 0 | 1 {
    const b = this.operand(other);
    if (this.raw < b) return -1;
    if (this.raw > b) return 1;
    return 0;
  }

  eq(other: Operand<K>): boolean {
    return this.raw === this.operand(other);
  }

  ne(other: Operand<K>): boolean {
    return this.raw !== this.operand(other);
  }

  lt(other: Operand<K>): boolean {
    return this.raw < this.operand(other);
  }

  gt(other: Operand<K>): boolean {
    return this.raw > this.operand(other);
  }

  le(other: Operand<K>): boolean {
    return this.raw <= this.operand(other);
  }

  ge(other: Operand<K>): boolean {
    return this.raw >= this.operand(other);
  }

  isMin(): boolean {
    return this.raw === this.kind.min;
  }

  isMax(): boolean {
    return this.raw === this.kind.max;
  }

  // --- conversions out ------------------------------------------------------

  toBigInt(): bigint {
    return this.raw;
  }

  /** Exact up to 32 bits; 64-bit values past 2^53 round like `Number()`. */
  toNumber(): number {
    return Number(this.raw);
  }

  toString(): string {
    return this.raw.toString();
  }

  toJSON(): SaturatingIntJSON {
    return { kind: this.kind.name, value: this.raw.toString() };
  }

  private operand(input: Operand<K>): bigint {
    if (input instanceof SaturatingInt) {
      if (input.kind.name !== this.kind.name) {
        throw new SatIntError(
          SatIntErrorCode.KIND_MISMATCH,
          `cannot combine ${this.kind.name} with ${input.kind.name}; convert one side first`,
        );
      }
      return input.raw;
    }
    const v = toBigIntStrict(input, "operand");
    if (!inRange(this.kind, v)) throw rangeError(this.kind, v);
    return v;
  }

  private saturate(
    op: SaturatingOp,
    operands: readonly bigint[],
    bound: bigint,
    reason: SaturationReason,
  ): this {
    this.raw = bound;
    recordSaturation(op, this.kind.name, operands, reason, bound);
    return this;
  }
}

export function isSaturatingInt(value: unknown): value is SaturatingInt;
export function isSaturatingInt<K extends KindName>(
  value: unknown,
  kind: IntKind<K>,
): value is SaturatingInt<K>;
export function isSaturatingInt(value: unknown, kind?: IntKind): value is SaturatingInt {
  return value instanceof SaturatingInt && (kind === undefined || value.kind.name === kind.name);
}
