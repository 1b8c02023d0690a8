export { SatIntError, SatIntErrorCode, isSatIntError } from "./errors.js";
export type { SatIntErrorCodeValue } from "./errors.js";
export {
  INT8,
  INT16,
  INT32,
  INT64,
  UINT8,
  UINT16,
  UINT32,
  UINT64,
  KIND_NAMES,
  inRange,
  intKind,
  isKindName,
} from "./kinds.js";
export type { IntKind, KindName, SignedKindName, UnsignedKindName } from "./kinds.js";
export type { RawInteger } from "./coerce.js";
export { SaturatingInt, isSaturatingInt } from "./saturating.js";
export type { Operand, SaturatingIntJSON } from "./saturating.js";
export { I8, I16, I32, I64, U8, U16, U32, U64, integerType } from "./types.js";
export type { IntegerType } from "./types.js";
export { fromJSON, fromJSONAs, parseSaturatingInt, validateSaturatingInt } from "./json.js";
export { saturatingIntSchema } from "./schemas.js";
export { readInteger, spanWithin } from "./bytes.js";
export type { Extent, ReadOptions } from "./bytes.js";
export { TRACE_EVENT_LIMIT, takeSaturationEvents, resetSaturationTraceForTest } from "./trace.js";
export type { SaturatingOp, SaturationEvent, SaturationReason } from "./trace.js";
