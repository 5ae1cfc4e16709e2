/**
 * Outcome of a call whose failure the caller is expected to recover from.
 * Failures travel as values so they never escape as rejected promises.
 */
export type Result<T, E extends Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E extends Error>(error: E): { ok: false; error: E } => ({
  ok: false,
  error,
});

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
