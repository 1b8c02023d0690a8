import { describe, expect, it } from "vitest";
import fc from "fast-check";

import { KIND_NAMES, SaturatingInt, intKind, type IntKind } from "../src/index.js";

const KINDS: IntKind[] = KIND_NAMES.map((name) => intKind(name));

const clamp = (kind: IntKind, v: bigint): bigint =>
  v < kind.min ? kind.min : v > kind.max ? kind.max : v;

const valueArb = (kind: IntKind): fc.Arbitrary<bigint> =>
  fc.oneof(
    fc.constantFrom(kind.min, kind.max, 0n, 1n, kind.signed ? -1n : 2n),
    fc.bigInt({ min: kind.min, max: kind.max }),
  );

// exact bigint arithmetic, then clamped into range
const reference = {
  add: (kind: IntKind, a: bigint, b: bigint) => clamp(kind, a + b),
  sub: (kind: IntKind, a: bigint, b: bigint) => clamp(kind, a - b),
  mul: (kind: IntKind, a: bigint, b: bigint) => clamp(kind, a * b),
  div: (kind: IntKind, a: bigint, b: bigint) => (b === 0n ? kind.max : clamp(kind, a / b)),
  mod: (kind: IntKind, a: bigint, b: bigint) => (b === 0n ? kind.max : a % b),
} as const;

const BINARY_OPS = ["add", "sub", "mul", "div", "mod"] as const;

describe.each(KINDS)("$name", (kind) => {
  const arb = valueArb(kind);
  const make = (v: bigint) => new SaturatingInt(kind, v);

  it.each([...BINARY_OPS])("%s matches clamped exact arithmetic", (op) => {
    fc.assert(
      fc.property(arb, arb, (a, b) => {
        const result = make(a)[op](make(b));
        expect(result.value).toBe(reference[op](kind, a, b));
        expect(result.value >= kind.min && result.value <= kind.max).toBe(true);
      }),
    );
  });

  it("compound forms agree with the pure forms", () => {
    fc.assert(
      fc.property(arb, arb, fc.constantFrom(...BINARY_OPS), (a, b, op) => {
        const target = make(a);
        const assign = `${op}Assign` as const;
        const returned = target[assign](b);
        expect(returned).toBe(target);
        expect(target.value).toBe(make(a)[op](b).value);
      }),
    );
  });

  it("negation clamps except at min", () => {
    fc.assert(
      fc.property(arb, (a) => {
        const expected = a === kind.min ? kind.min : clamp(kind, -a);
        expect(make(a).neg().value).toBe(expected);
      }),
    );
  });

  it("increment and decrement clamp at the bounds", () => {
    fc.assert(
      fc.property(arb, (a) => {
        const up = make(a);
        const prior = up.postInc();
        expect(prior.value).toBe(a);
        expect(up.value).toBe(clamp(kind, a + 1n));
        const down = make(a);
        expect(down.dec().value).toBe(clamp(kind, a - 1n));
      }),
    );
  });

  it("converts from every other kind by clamping", () => {
    const sourced = fc
      .constantFrom(...KINDS)
      .chain((source) => valueArb(source).map((v) => ({ source, v })));
    fc.assert(
      fc.property(sourced, ({ source, v }) => {
        const converted = SaturatingInt.from(kind, new SaturatingInt(source, v));
        expect(converted.kind).toBe(kind);
        expect(converted.value).toBe(clamp(kind, v));
      }),
    );
  });

  it("orders values totally", () => {
    fc.assert(
      fc.property(arb, arb, arb, (x, y, z) => {
        const [a, b, c] = [make(x), make(y), make(z)];
        expect(a.compare(b) + b.compare(a)).toBe(0);
        expect(a.eq(b)).toBe(x === y);
        expect(a.lt(b)).toBe(x < y);
        expect(a.le(b) && b.le(a)).toBe(a.eq(b));
        if (a.le(b) && b.le(c)) expect(a.le(c)).toBe(true);
      }),
    );
  });

  it("stays at a bound once saturated", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 1n, max: kind.max }), (b) => {
        const high = SaturatingInt.max(kind).add(b);
        expect(high.add(b).isMax()).toBe(true);
        const low = SaturatingInt.min(kind).sub(b);
        expect(low.sub(b).isMin()).toBe(true);
        expect(SaturatingInt.max(kind).inc().inc().isMax()).toBe(true);
        expect(SaturatingInt.min(kind).dec().dec().isMin()).toBe(true);
      }),
    );
  });
});
