/**
 * Error hierarchy for the Runge-Kutta integrators.
 *
 * Every failure is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Messages stay human-readable for logs while the fields
 * carry the structured data.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Unique symbol used to tag the integrator service within the context graph.
 *
 * @since 0.1.0
 */
export const IntegratorTypeId = Symbol.for("effect-runge-kutta/Integrator")

/**
 * Raised when a Butcher tableau, a method name or a set of adaptive options is
 * malformed. Never retried.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new ConfigurationError({ subject: "rk4", reason: "row 2 has 1 entries, expected 2" })
 * yield* Effect.fail(error)
 * ```
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly subject: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid configuration for ${this.subject}: ${this.reason}`
  }
}

/**
 * Raised by a weighted combination whose value and coefficient sequences do
 * not line up, or are both empty.
 *
 * @category Errors
 * @since 0.1.0
 */
export class LengthMismatchError extends Data.TaggedError("LengthMismatchError")<{
  readonly values: number
  readonly coefficients: number
}> {
  override get message(): string {
    if (this.values === 0 && this.coefficients === 0) {
      return "Weighted combination needs at least one term"
    }
    return `Weighted combination of ${this.values} values with ${this.coefficients} coefficients`
  }
}

/**
 * Wraps a failure thrown by the caller's derivative function. The original
 * failure is kept untouched in `cause`.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DerivativeEvaluationError extends Data.TaggedError("DerivativeEvaluationError")<{
  readonly time: number
  readonly cause: unknown
}> {
  override get message(): string {
    const detail = this.cause instanceof Error ? this.cause.message : String(this.cause)
    return `Derivative evaluation failed at t=${this.time}: ${detail}`
  }
}

/**
 * Raised when the adaptive controller cannot bring the local error under the
 * tolerance within its step-size and retry bounds. `attempts` counts every
 * step attempt, accepted or rejected, made in the output interval where the
 * run stopped.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new NonConvergenceError({ time: 0.5, stepSize: 1e-12, errorRatio: 3, attempts: 50 })
 * yield* Effect.fail(error)
 * ```
 */
export class NonConvergenceError extends Data.TaggedError("NonConvergenceError")<{
  readonly time: number
  readonly stepSize: number
  readonly errorRatio: number
  readonly attempts: number
}> {
  override get message(): string {
    return `Integrator failed to converge at t=${this.time} after ${this.attempts} attempts: step=${this.stepSize}, error=${this.errorRatio}`
  }
}

/**
 * Raised by the trajectory driver when the requested output times are empty,
 * not finite or not strictly increasing.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidTimeSequenceError extends Data.TaggedError("InvalidTimeSequenceError")<{
  readonly index: number
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid output times at index ${this.index}: ${this.reason}`
  }
}

/**
 * Failures a single step can raise.
 *
 * @category Errors
 * @since 0.1.0
 */
export type StepError = DerivativeEvaluationError | ConfigurationError

/**
 * Union of every failure a trajectory run can raise.
 *
 * @category Errors
 * @since 0.1.0
 */
export type IntegrationError =
  | ConfigurationError
  | DerivativeEvaluationError
  | NonConvergenceError
  | InvalidTimeSequenceError
