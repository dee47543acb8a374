/**
 * Checked weighted combination of values.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import type { Arithmetic } from "./Arithmetic.js"
import { LengthMismatchError } from "./Errors.js"
import { weightedSum } from "./internal/pure.js"

/**
 * Compute `Σ coefficients[i] * values[i]` with the value type's own `scale`
 * and `add`. The accumulator starts from the first term, so a single term
 * yields exactly `coefficients[0] * values[0]`.
 *
 * Fails with `LengthMismatchError` when the sequences differ in length or are
 * both empty.
 *
 * @example
 * ```ts
 * const total = yield* combine(Arithmetic.vector, [[1, 0], [0, 1]], [2, 3])
 * // [2, 3]
 * ```
 *
 * @since 0.1.0
 */
export const combine = <V>(
  space: Arithmetic<V>,
  values: ReadonlyArray<V>,
  coefficients: ReadonlyArray<number>,
): Effect.Effect<V, LengthMismatchError> =>
  values.length === coefficients.length && values.length > 0
    ? Effect.sync(() => weightedSum(space, values, coefficients))
    : Effect.fail(
        new LengthMismatchError({ values: values.length, coefficients: coefficients.length }),
      )
