// Cached environment flags; read once per process unless reset.
let _trace: boolean | undefined;
let _traceStdout: boolean | undefined;

const truthy = (raw: string | undefined): boolean => {
  const v = (raw || "").toLowerCase();
  return v === "1" || v === "true";
};

export function traceEnabled(): boolean {
  if (_trace === undefined) {
    _trace = truthy(process.env.SATINT_TRACE);
  }
  return _trace;
}

export function traceStdoutEnabled(): boolean {
  if (_traceStdout === undefined) {
    _traceStdout = truthy(process.env.SATINT_TRACE_STDOUT);
  }
  return _traceStdout;
}

export function resetEnvCacheForTest(): void {
  _trace = undefined;
  _traceStdout = undefined;
}
