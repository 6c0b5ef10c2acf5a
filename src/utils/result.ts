/**
 * Outcome of an operation that can fail in an expected way.
 * Used instead of throwing where the caller is required to handle the failure.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
