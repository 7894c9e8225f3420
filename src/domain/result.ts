/**
 * Outcome of an operation that must not throw (one orchestrator pair, one
 * boundary check).
 */
export type Result<TData, TError = string> =
  | { ok: true; data: TData }
  | { ok: false; error: TError };

export function ok<TData>(data: TData): { ok: true; data: TData } {
  return { ok: true, data };
}

export function fail<TError>(error: TError): { ok: false; error: TError } {
  return { ok: false, error };
}
