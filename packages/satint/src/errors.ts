export const SatIntErrorCode = {
  NOT_INTEGER: "E_SATINT_NOT_INTEGER",
  RANGE: "E_SATINT_RANGE",
  KIND_MISMATCH: "E_SATINT_KIND_MISMATCH",
  UNKNOWN_KIND: "E_SATINT_UNKNOWN_KIND",
  JSON: "E_SATINT_JSON",
  OUT_OF_BOUNDS: "E_SATINT_OUT_OF_BOUNDS",
} as const;

export type SatIntErrorCodeValue = (typeof SatIntErrorCode)[keyof typeof SatIntErrorCode];

/**
 * Raised for misuse at the API boundary (a fractional operand, mixing kinds).
 * Arithmetic itself never throws.
 */
export class SatIntError extends Error {
  readonly code: SatIntErrorCodeValue;

  constructor(code: SatIntErrorCodeValue, detail: string) {
    super(`${code}: ${detail}`);
    this.name = "SatIntError";
    this.code = code;
  }
}

export const isSatIntError = (err: unknown): err is SatIntError => err instanceof SatIntError;
