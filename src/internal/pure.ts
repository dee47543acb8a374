/**
 * Pure Arithmetic Functions
 *
 * No Effect wrapping here: these run once per stage and stay plain loops.
 * Callers guarantee the shape preconditions (tables are validated on
 * construction).
 *
 * @since 0.1.0
 * @internal
 */

import type { Arithmetic } from "../Arithmetic.js"

/**
 * `Σ coefficients[i] * values[i]`, seeded with the first term so the value
 * type never needs a zero.
 *
 * @example
 * ```typescript
 * weightedSum(scalar, [1, 1.5], [0.5, 0.5])
 * // 1.25
 * ```
 *
 * @internal
 */
export function weightedSum<V>(
  space: Arithmetic<V>,
  values: ReadonlyArray<V>,
  coefficients: ReadonlyArray<number>,
): V {
  const firstValue = values[0]
  const firstCoefficient = coefficients[0]
  if (firstValue === undefined || firstCoefficient === undefined) {
    throw new RangeError("weightedSum needs at least one term")
  }
  let result = space.scale(firstCoefficient, firstValue)
  for (let index = 1; index < coefficients.length; index += 1) {
    const value = values[index]
    const coefficient = coefficients[index]
    if (value === undefined || coefficient === undefined) {
      throw new RangeError(`weightedSum is missing term ${index}`)
    }
    result = space.add(result, space.scale(coefficient, value))
  }
  return result
}

/**
 * `base + dt * Σ coefficients[i] * rates[i]`. An empty coefficient row leaves
 * `base` untouched.
 *
 * @internal
 */
export function combineRates<V>(
  space: Arithmetic<V>,
  base: V,
  rates: ReadonlyArray<V>,
  coefficients: ReadonlyArray<number>,
  dt: number,
): V {
  if (coefficients.length === 0) {
    return base
  }
  return space.add(base, space.scale(dt, weightedSum(space, rates, coefficients)))
}

/**
 * Clamp `value` into `[min, max]`.
 *
 * @internal
 */
export const clampNumber = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max)
