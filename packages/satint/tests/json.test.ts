import { describe, expect, it } from "vitest";

import {
  I8,
  I64,
  U64,
  UINT64,
  fromJSON,
  fromJSONAs,
  parseSaturatingInt,
  validateSaturatingInt,
} from "../src/index.js";

describe("JSON encoding", () => {
  it("round-trips 64-bit extremes through text", () => {
    const text = JSON.stringify(U64.max());
    expect(text).toBe('{"kind":"u64","value":"18446744073709551615"}');
    const decoded = parseSaturatingInt(text);
    expect(decoded.kind.name).toBe("u64");
    expect(decoded.value).toBe(18446744073709551615n);
  });

  it("decodes negative values", () => {
    const decoded = fromJSON({ kind: "i64", value: "-9223372036854775808" });
    expect(decoded.kind.name).toBe("i64");
    expect(decoded.eq(I64.min())).toBe(true);
  });

  it("validates the shape with the schema", () => {
    expect(validateSaturatingInt({ kind: "i8", value: "1" })).toBe(true);
    expect(validateSaturatingInt({ kind: "i8", value: 1 })).toBe(false);
    expect(validateSaturatingInt({ kind: "i128", value: "1" })).toBe(false);
    expect(validateSaturatingInt({ kind: "i8", value: "01" })).toBe(false);
    expect(validateSaturatingInt({ kind: "i8", value: "1", extra: true })).toBe(false);
  });

  it("rejects malformed input with E_SATINT_JSON", () => {
    expect(() => fromJSON({ kind: "i8" })).toThrowError(
      "E_SATINT_JSON: data must have required property 'value'",
    );
    expect(() => fromJSON(null)).toThrowError("E_SATINT_JSON");
    expect(() => parseSaturatingInt("{")).toThrowError("E_SATINT_JSON: invalid JSON");
  });

  it("rejects values outside the encoded kind", () => {
    expect(() => fromJSON({ kind: "i8", value: "128" })).toThrowError(
      "E_SATINT_JSON: 128 is outside i8",
    );
  });

  it("checks the expected kind", () => {
    expect(fromJSONAs(UINT64, { kind: "u64", value: "7" }).value).toBe(7n);
    expect(() => fromJSONAs(I8.kind, { kind: "u64", value: "7" })).toThrowError(
      "E_SATINT_JSON: expected kind i8, got u64",
    );
  });
});
