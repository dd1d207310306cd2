/**
 * Result type for returning failures as values.
 *
 * @example
 * ```typescript
 * const result = await service.classifySync(file)
 * if (!result.ok) {
 *   return res.status(422).json({ error: result.error })
 * }
 * ```
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});
