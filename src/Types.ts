/**
 * Problem description shared by the steppers, the controller and the
 * trajectory driver.
 *
 * @since 0.1.0
 */

import type { Arithmetic, NormedArithmetic } from "./Arithmetic.js"

/**
 * Right-hand side of `y' = f(t, y)`. Must be synchronous and free of side
 * effects on the integration state; anything it throws is reported as a
 * `DerivativeEvaluationError`.
 *
 * @category Models
 * @since 0.1.0
 */
export type Derivative<V> = (time: number, value: V) => V

/**
 * Initial value problem over a value type `V`.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const growth: Problem<number> = {
 *   derivative: (_t, y) => y,
 *   space: Arithmetic.scalar,
 *   initialValue: 1,
 * }
 * ```
 */
export interface Problem<V, S extends Arithmetic<V> = NormedArithmetic<V>> {
  readonly derivative: Derivative<V>
  readonly space: S
  readonly initialValue: V
}

/**
 * A problem that can only be integrated with fixed steps, because its value
 * type has no magnitude.
 *
 * @category Models
 * @since 0.1.0
 */
export type FixedProblem<V> = Problem<V, Arithmetic<V>>

/**
 * One accepted output of a trajectory.
 *
 * @category Models
 * @since 0.1.0
 */
export interface TrajectoryPoint<V> {
  readonly time: number
  readonly value: V
}
