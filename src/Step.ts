/**
 * Single explicit Runge-Kutta steps.
 *
 * Both steppers share one stage loop: stage `i` is evaluated at
 * `t + c[i]·dt` on `y + dt·Σ a[i][j]·k[j]`, and the step result is
 * `y + dt·Σ b[j]·k[j]`. The embedded stepper combines the same stage
 * derivatives a second time with `b2`.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import type { Arithmetic } from "./Arithmetic.js"
import { ConfigurationError, DerivativeEvaluationError } from "./Errors.js"
import { combineRates } from "./internal/pure.js"
import type { ButcherTable } from "./Tableau.js"
import type { Derivative } from "./Types.js"

/**
 * High- and low-order estimates of `y(t + dt)` from one embedded step.
 *
 * @category Models
 * @since 0.1.0
 */
export interface EmbeddedEstimate<V> {
  readonly high: V
  readonly low: V
}

/**
 * Call the derivative, reporting anything it throws with the stage time.
 *
 * @internal
 */
export const evaluateDerivative = <V>(
  derivative: Derivative<V>,
  time: number,
  value: V,
): Effect.Effect<V, DerivativeEvaluationError> =>
  Effect.try({
    try: () => derivative(time, value),
    catch: (cause) => new DerivativeEvaluationError({ time, cause }),
  })

/**
 * Evaluate every stage derivative `k[0..stages-1]` of one step.
 *
 * @internal
 */
export const stageDerivatives = <V>(
  space: Arithmetic<V>,
  derivative: Derivative<V>,
  t: number,
  dt: number,
  y: V,
  table: ButcherTable,
): Effect.Effect<ReadonlyArray<V>, DerivativeEvaluationError> =>
  Effect.gen(function* () {
    const rates: Array<V> = []
    for (let stage = 0; stage < table.stages; stage += 1) {
      const row = table.a[stage] ?? []
      const offset = table.c[stage] ?? 0
      const input = combineRates(space, y, rates, row, dt)
      rates.push(yield* evaluateDerivative(derivative, t + offset * dt, input))
    }
    return rates
  })

/**
 * Advance `y` from `t` to `t + dt` with the method described by `table`.
 *
 * Failures of the derivative propagate as `DerivativeEvaluationError`; the
 * step never retries.
 *
 * @example
 * ```ts
 * const next = yield* explicit(Arithmetic.scalar, (_t, y) => y, 0, 0.25, 1, Methods.euler)
 * // 1.25
 * ```
 *
 * @category Steppers
 * @since 0.1.0
 */
export const explicit = <V>(
  space: Arithmetic<V>,
  derivative: Derivative<V>,
  t: number,
  dt: number,
  y: V,
  table: ButcherTable,
): Effect.Effect<V, DerivativeEvaluationError> =>
  stageDerivatives(space, derivative, t, dt, y, table).pipe(
    Effect.map((rates) => combineRates(space, y, rates, table.b, dt)),
  )

/**
 * Advance `y` by one step of an embedded method, returning the estimate from
 * `b` as `high` and the estimate from `b2` as `low`.
 *
 * Fails with `ConfigurationError` before evaluating anything when the table
 * has no `b2`.
 *
 * @category Steppers
 * @since 0.1.0
 */
export const embedded = <V>(
  space: Arithmetic<V>,
  derivative: Derivative<V>,
  t: number,
  dt: number,
  y: V,
  table: ButcherTable,
): Effect.Effect<EmbeddedEstimate<V>, DerivativeEvaluationError | ConfigurationError> => {
  const lowWeights = table.b2
  if (lowWeights === undefined) {
    return Effect.fail(
      new ConfigurationError({
        subject: table.name,
        reason: "an embedded step needs b2 weights",
      }),
    )
  }
  return stageDerivatives(space, derivative, t, dt, y, table).pipe(
    Effect.map((rates) => ({
      high: combineRates(space, y, rates, table.b, dt),
      low: combineRates(space, y, rates, lowWeights, dt),
    })),
  )
}
