/**
 * Adaptive step-size controller.
 *
 * Drives embedded steps across one output interval `[time, target]`,
 * rejecting and shrinking steps whose relative error exceeds the tolerance
 * and growing them again (against half the tolerance) after acceptance. The
 * last sub-step of an interval always lands exactly on `target`.
 *
 * The retry loop is bounded by a minimum step size, a maximum number of
 * consecutive rejections and a maximum number of sub-steps per interval.
 *
 * @since 0.1.0
 */

import { Effect, ParseResult, Schema } from "effect"
import { subtract, type NormedArithmetic } from "./Arithmetic.js"
import { ConfigurationError, NonConvergenceError, type StepError } from "./Errors.js"
import { clampNumber } from "./internal/pure.js"
import { embedded, type EmbeddedEstimate } from "./Step.js"
import type { ButcherTable } from "./Tableau.js"
import type { Derivative } from "./Types.js"

const MIN_FACTOR = 0.01
const MAX_FACTOR = 10

/**
 * Caller-facing adaptive options. Every field falls back to
 * {@link defaultAdaptiveOptions}; a missing `initialStep` means "the width of
 * the first output interval".
 *
 * @category Options
 * @since 0.1.0
 */
export interface AdaptiveOptions {
  readonly tolerance?: number
  readonly initialStep?: number
  readonly minStep?: number
  readonly maxStep?: number
  readonly maxAttemptsPerStep?: number
  readonly maxStepsPerInterval?: number
}

/**
 * @category Options
 * @since 0.1.0
 */
export interface ResolvedAdaptiveOptions {
  readonly tolerance: number
  readonly initialStep: number | undefined
  readonly minStep: number
  readonly maxStep: number
  readonly maxAttemptsPerStep: number
  readonly maxStepsPerInterval: number
}

/**
 * @category Options
 * @since 0.1.0
 */
export const defaultAdaptiveOptions: ResolvedAdaptiveOptions = {
  tolerance: 1e-6,
  initialStep: undefined,
  minStep: 1e-12,
  maxStep: Number.POSITIVE_INFINITY,
  maxAttemptsPerStep: 50,
  maxStepsPerInterval: 100_000,
}

const PositiveStep = Schema.Number.pipe(Schema.positive())

const AdaptiveOptionsSchema = Schema.Struct({
  tolerance: Schema.optional(Schema.Number.pipe(Schema.finite(), Schema.positive())),
  initialStep: Schema.optional(PositiveStep.pipe(Schema.finite())),
  minStep: Schema.optional(PositiveStep.pipe(Schema.finite())),
  maxStep: Schema.optional(PositiveStep),
  maxAttemptsPerStep: Schema.optional(Schema.Int.pipe(Schema.positive())),
  maxStepsPerInterval: Schema.optional(Schema.Int.pipe(Schema.positive())),
})

/**
 * Validate options and fill in defaults.
 *
 * @category Options
 * @since 0.1.0
 */
export const resolveAdaptiveOptions = (
  options: AdaptiveOptions = {},
): Effect.Effect<ResolvedAdaptiveOptions, ConfigurationError> =>
  Effect.gen(function* () {
    const decoded = yield* Schema.decodeUnknown(AdaptiveOptionsSchema)(options).pipe(
      Effect.mapError(
        (error) =>
          new ConfigurationError({
            subject: "adaptive options",
            reason: ParseResult.TreeFormatter.formatErrorSync(error),
          }),
      ),
    )
    const resolved: ResolvedAdaptiveOptions = {
      tolerance: decoded.tolerance ?? defaultAdaptiveOptions.tolerance,
      initialStep: decoded.initialStep,
      minStep: decoded.minStep ?? defaultAdaptiveOptions.minStep,
      maxStep: decoded.maxStep ?? defaultAdaptiveOptions.maxStep,
      maxAttemptsPerStep: decoded.maxAttemptsPerStep ?? defaultAdaptiveOptions.maxAttemptsPerStep,
      maxStepsPerInterval: decoded.maxStepsPerInterval ?? defaultAdaptiveOptions.maxStepsPerInterval,
    }
    if (resolved.minStep > resolved.maxStep) {
      return yield* Effect.fail(
        new ConfigurationError({
          subject: "adaptive options",
          reason: `minStep ${resolved.minStep} exceeds maxStep ${resolved.maxStep}`,
        }),
      )
    }
    return resolved
  })

/**
 * Latest accepted `(time, value)` pair and the step size to try next.
 *
 * @category Models
 * @since 0.1.0
 */
export interface IntegrationState<V> {
  readonly time: number
  readonly value: V
  readonly stepSize: number
}

/**
 * Record of one embedded step attempt.
 *
 * @category Models
 * @since 0.1.0
 */
export interface StepAttempt {
  readonly time: number
  readonly stepSize: number
  readonly errorRatio: number
  readonly accepted: boolean
  readonly terminal: boolean
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface IntervalResult<V> {
  readonly state: IntegrationState<V>
  readonly attempts: ReadonlyArray<StepAttempt>
}

/**
 * The derivative and the arithmetic of its values.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ControlledProblem<V> {
  readonly derivative: Derivative<V>
  readonly space: NormedArithmetic<V>
}

/**
 * Relative local error `|high - low| / |high|` in the max-norm. Returns 0
 * when both magnitudes are zero and `+Infinity` for any other non-finite
 * ratio.
 *
 * @since 0.1.0
 */
export const relativeError = <V>(space: NormedArithmetic<V>, estimate: EmbeddedEstimate<V>): number => {
  const absolute = space.magnitude(subtract(space, estimate.high, estimate.low))
  const reference = space.magnitude(estimate.high)
  if (absolute === 0 && reference === 0) {
    return 0
  }
  const ratio = absolute / reference
  return Number.isFinite(ratio) ? ratio : Number.POSITIVE_INFINITY
}

/**
 * `clamp(0.01, 10, (tolerance / errorRatio)^(1 / order))`.
 *
 * @since 0.1.0
 */
export const stepFactor = (tolerance: number, errorRatio: number, order: number): number =>
  clampNumber(Math.pow(tolerance / errorRatio, 1 / order), MIN_FACTOR, MAX_FACTOR)

const afterRejection = (dt: number, tolerance: number, errorRatio: number, order: number | undefined) =>
  order === undefined ? dt / 2 : dt * stepFactor(tolerance, errorRatio, order)

/**
 * Next candidate after an accepted sub-step, judged against half the
 * tolerance. Without an order the step doubles within that budget and is kept
 * otherwise; it never shrinks after an acceptance.
 */
const afterAcceptance = (dt: number, tolerance: number, errorRatio: number, order: number | undefined) => {
  const budget = tolerance / 2
  if (order === undefined) {
    return errorRatio <= budget ? dt * 2 : dt
  }
  return dt * stepFactor(budget, errorRatio, order)
}

/**
 * Integrate from `state.time` to `target` and return the state at `target`
 * together with every attempt made on the way.
 *
 * `target` must lie after `state.time`. The returned `stepSize` is the
 * candidate left over from the last sub-step; it is not shortened to fit the
 * interval, so it carries over to the next one.
 *
 * @category Controller
 * @since 0.1.0
 */
export const advance = <V>(
  problem: ControlledProblem<V>,
  table: ButcherTable,
  state: IntegrationState<V>,
  target: number,
  options: ResolvedAdaptiveOptions,
): Effect.Effect<IntervalResult<V>, StepError | NonConvergenceError> =>
  Effect.gen(function* () {
    const { derivative, space } = problem
    const attempts: Array<StepAttempt> = []
    let time = state.time
    let value = state.value
    let stepSize = state.stepSize
    let rejections = 0
    let subSteps = 0

    while (true) {
      const remaining = target - time
      const terminal = stepSize >= remaining || time + stepSize >= target
      const dt = terminal ? remaining : stepSize

      const estimate = yield* embedded(space, derivative, time, dt, value, table)
      const errorRatio = relativeError(space, estimate)

      if (errorRatio > options.tolerance) {
        attempts.push({ time, stepSize: dt, errorRatio, accepted: false, terminal })
        rejections += 1
        if (dt <= options.minStep || rejections >= options.maxAttemptsPerStep) {
          const failure = new NonConvergenceError({ time, stepSize: dt, errorRatio, attempts: attempts.length })
          yield* Effect.logWarning(failure.message)
          return yield* Effect.fail(failure)
        }
        stepSize = clampNumber(
          afterRejection(dt, options.tolerance, errorRatio, table.order),
          options.minStep,
          options.maxStep,
        )
        yield* Effect.logDebug("step rejected").pipe(
          Effect.annotateLogs({ time, stepSize: dt, errorRatio, retryWith: stepSize }),
        )
        continue
      }

      attempts.push({ time, stepSize: dt, errorRatio, accepted: true, terminal })
      rejections = 0

      if (terminal) {
        yield* Effect.logDebug("interval complete").pipe(
          Effect.annotateLogs({ time: target, attempts: attempts.length }),
        )
        return {
          state: { time: target, value: estimate.high, stepSize },
          attempts,
        }
      }

      time += dt
      value = estimate.high
      subSteps += 1
      if (subSteps >= options.maxStepsPerInterval) {
        const failure = new NonConvergenceError({ time, stepSize: dt, errorRatio, attempts: attempts.length })
        yield* Effect.logWarning(failure.message)
        return yield* Effect.fail(failure)
      }
      stepSize = clampNumber(
        afterAcceptance(dt, options.tolerance, errorRatio, table.order),
        options.minStep,
        options.maxStep,
      )
    }
  }).pipe(Effect.annotateLogs({ method: table.name }))
