import { Ajv, type ValidateFunction } from "ajv";

import { SatIntError, SatIntErrorCode } from "./errors.js";
import { inRange, intKind, type IntKind, type KindName } from "./kinds.js";
import { SaturatingInt, type SaturatingIntJSON } from "./saturating.js";
import { saturatingIntSchema } from "./schemas.js";

const ajv = new Ajv({ allErrors: true, strict: false });

export const validateSaturatingInt: ValidateFunction<SaturatingIntJSON> =
  ajv.compile<SaturatingIntJSON>(saturatingIntSchema);

export function fromJSON(input: unknown): SaturatingInt {
  if (!validateSaturatingInt(input)) {
    throw new SatIntError(SatIntErrorCode.JSON, ajv.errorsText(validateSaturatingInt.errors));
  }
  const kind = intKind(input.kind);
  const value = BigInt(input.value);
  if (!inRange(kind, value)) {
    throw new SatIntError(SatIntErrorCode.JSON, `${value} is outside ${kind.name}`);
  }
  return new SaturatingInt(kind, value);
}

/** Like `fromJSON`, but also requires the encoded kind to be `kind`. */
export function fromJSONAs<K extends KindName>(kind: IntKind<K>, input: unknown): SaturatingInt<K> {
  const decoded = fromJSON(input);
  if (decoded.kind.name !== kind.name) {
    throw new SatIntError(
      SatIntErrorCode.JSON,
      `expected kind ${kind.name}, got ${decoded.kind.name}`,
    );
  }
  return new SaturatingInt(kind, decoded.value);
}

export function parseSaturatingInt(text: string): SaturatingInt {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SatIntError(SatIntErrorCode.JSON, `invalid JSON: ${reason}`);
  }
  return fromJSON(parsed);
}
