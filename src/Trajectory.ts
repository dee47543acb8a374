/**
 * Trajectory driver.
 *
 * Walks a caller-supplied sequence of output times and fills every interval
 * either with one explicit step (fixed mode) or with one run of the adaptive
 * controller (adaptive mode). Only values at the requested times are
 * emitted; the initial condition comes first.
 *
 * Both modes are available as lazy streams and as eager effects that collect
 * the stream into a {@link Trajectory}.
 *
 * @since 0.1.0
 */

import { Array as Arr, Chunk, Effect, Option, Schema, Stream } from "effect"
import {
  advance,
  resolveAdaptiveOptions,
  type AdaptiveOptions,
  type IntegrationState,
  type ResolvedAdaptiveOptions,
} from "./Controller.js"
import {
  ConfigurationError,
  InvalidTimeSequenceError,
  type DerivativeEvaluationError,
  type IntegrationError,
} from "./Errors.js"
import { clampNumber } from "./internal/pure.js"
import { explicit } from "./Step.js"
import type { ButcherTable } from "./Tableau.js"
import type { FixedProblem, Problem, TrajectoryPoint } from "./Types.js"

/**
 * Step counters accumulated over a whole run.
 *
 * @category Models
 * @since 0.1.0
 */
export class IntegrationStatistics extends Schema.Class<IntegrationStatistics>("IntegrationStatistics")({
  acceptedSteps: Schema.NonNegativeInt,
  rejectedSteps: Schema.NonNegativeInt,
  derivativeEvaluations: Schema.NonNegativeInt,
}) {}

/**
 * Output of a run: one time and one value per requested output time.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Trajectory<V> {
  readonly times: ReadonlyArray<number>
  readonly values: ReadonlyArray<V>
  readonly statistics: IntegrationStatistics
}

interface Segment<V> {
  readonly point: TrajectoryPoint<V>
  readonly accepted: number
  readonly rejected: number
  readonly evaluations: number
}

interface FixedCursor<V> {
  readonly index: number
  readonly time: number
  readonly value: V
}

interface AdaptiveCursor<V> {
  readonly index: number
  readonly state: IntegrationState<V>
}

/**
 * Check that output times are non-empty, finite and strictly increasing.
 *
 * @since 0.1.0
 */
export const validateTimes = (
  times: ReadonlyArray<number>,
): Effect.Effect<Arr.NonEmptyReadonlyArray<number>, InvalidTimeSequenceError> =>
  Effect.gen(function* () {
    if (!Arr.isNonEmptyReadonlyArray(times)) {
      return yield* Effect.fail(
        new InvalidTimeSequenceError({ index: 0, reason: "at least one output time is required" }),
      )
    }
    for (let index = 0; index < times.length; index += 1) {
      const time = times[index] ?? Number.NaN
      if (!Number.isFinite(time)) {
        return yield* Effect.fail(new InvalidTimeSequenceError({ index, reason: `${time} is not finite` }))
      }
      const previous = index > 0 ? times[index - 1] : undefined
      if (previous !== undefined && time <= previous) {
        return yield* Effect.fail(
          new InvalidTimeSequenceError({ index, reason: `${time} does not come after ${previous}` }),
        )
      }
    }
    return times
  })

const initialSegment = <V>(time: number, value: V): Segment<V> => ({
  point: { time, value },
  accepted: 0,
  rejected: 0,
  evaluations: 0,
})

const fixedSegments = <V>(
  problem: FixedProblem<V>,
  times: Arr.NonEmptyReadonlyArray<number>,
  table: ButcherTable,
): Stream.Stream<Segment<V>, DerivativeEvaluationError> => {
  const start = Arr.headNonEmpty(times)
  const steps = Stream.unfoldEffect<FixedCursor<V>, Segment<V>, DerivativeEvaluationError, never>(
    { index: 1, time: start, value: problem.initialValue },
    (cursor) => {
      const next = times[cursor.index]
      if (next === undefined) {
        return Effect.succeed(Option.none())
      }
      return explicit(problem.space, problem.derivative, cursor.time, next - cursor.time, cursor.value, table).pipe(
        Effect.map((value): Option.Option<readonly [Segment<V>, FixedCursor<V>]> =>
          Option.some([
            { point: { time: next, value }, accepted: 1, rejected: 0, evaluations: table.stages },
            { index: cursor.index + 1, time: next, value },
          ]),
        ),
      )
    },
  )
  return Stream.prepend(steps, Chunk.of(initialSegment(start, problem.initialValue)))
}

const initialStepSize = (times: Arr.NonEmptyReadonlyArray<number>, options: ResolvedAdaptiveOptions): number => {
  const second = times[1]
  const requested = options.initialStep ?? (second === undefined ? options.minStep : second - times[0])
  return clampNumber(requested, options.minStep, options.maxStep)
}

const adaptiveSegments = <V>(
  problem: Problem<V>,
  times: Arr.NonEmptyReadonlyArray<number>,
  table: ButcherTable,
  options: ResolvedAdaptiveOptions,
): Stream.Stream<Segment<V>, Exclude<IntegrationError, InvalidTimeSequenceError>> => {
  const start = Arr.headNonEmpty(times)
  const steps = Stream.unfoldEffect<
    AdaptiveCursor<V>,
    Segment<V>,
    Exclude<IntegrationError, InvalidTimeSequenceError>,
    never
  >(
    {
      index: 1,
      state: { time: start, value: problem.initialValue, stepSize: initialStepSize(times, options) },
    },
    (cursor) => {
      const next = times[cursor.index]
      if (next === undefined) {
        return Effect.succeed(Option.none())
      }
      return advance(problem, table, cursor.state, next, options).pipe(
        Effect.map(({ state, attempts }): Option.Option<readonly [Segment<V>, AdaptiveCursor<V>]> => {
          const accepted = attempts.filter((attempt) => attempt.accepted).length
          return Option.some([
            {
              point: { time: state.time, value: state.value },
              accepted,
              rejected: attempts.length - accepted,
              evaluations: attempts.length * table.stages,
            },
            { index: cursor.index + 1, state },
          ])
        }),
      )
    },
  )
  return Stream.prepend(steps, Chunk.of(initialSegment(start, problem.initialValue)))
}

const ensureEmbedded = (table: ButcherTable): Effect.Effect<ButcherTable, ConfigurationError> =>
  table.isEmbedded
    ? Effect.succeed(table)
    : Effect.fail(
        new ConfigurationError({
          subject: table.name,
          reason: "adaptive integration needs a table with b2 weights",
        }),
      )

const toPoints = <V, E>(segments: Stream.Stream<Segment<V>, E>): Stream.Stream<TrajectoryPoint<V>, E> =>
  Stream.map(segments, (segment) => segment.point)

const collect = <V, E>(segments: Stream.Stream<Segment<V>, E>): Effect.Effect<Trajectory<V>, E> =>
  Stream.runCollect(segments).pipe(
    Effect.map((chunk) => {
      const collected = Chunk.toReadonlyArray(chunk)
      let acceptedSteps = 0
      let rejectedSteps = 0
      let derivativeEvaluations = 0
      for (const segment of collected) {
        acceptedSteps += segment.accepted
        rejectedSteps += segment.rejected
        derivativeEvaluations += segment.evaluations
      }
      return {
        times: collected.map((segment) => segment.point.time),
        values: collected.map((segment) => segment.point.value),
        statistics: new IntegrationStatistics({ acceptedSteps, rejectedSteps, derivativeEvaluations }),
      }
    }),
    Effect.tap(({ statistics }) =>
      Effect.logDebug("trajectory complete").pipe(
        Effect.annotateLogs({
          acceptedSteps: statistics.acceptedSteps,
          rejectedSteps: statistics.rejectedSteps,
          derivativeEvaluations: statistics.derivativeEvaluations,
        }),
      ),
    ),
  )

/**
 * Lazily integrate with one explicit step per output interval.
 *
 * @category Fixed
 * @since 0.1.0
 */
export const streamFixed = <V>(
  problem: FixedProblem<V>,
  times: ReadonlyArray<number>,
  table: ButcherTable,
): Stream.Stream<TrajectoryPoint<V>, InvalidTimeSequenceError | DerivativeEvaluationError> =>
  Stream.unwrap(
    validateTimes(times).pipe(Effect.map((validated) => toPoints(fixedSegments(problem, validated, table)))),
  )

/**
 * Integrate with one explicit step per output interval. The returned times
 * are the requested times.
 *
 * @example
 * ```ts
 * const trajectory = yield* Trajectory.fixed(
 *   { derivative: (_t, y) => -y, space: Arithmetic.scalar, initialValue: 1 },
 *   [0, 0.1, 0.2],
 *   Methods.rk4,
 * )
 * ```
 *
 * @category Fixed
 * @since 0.1.0
 */
export const fixed = <V>(
  problem: FixedProblem<V>,
  times: ReadonlyArray<number>,
  table: ButcherTable,
): Effect.Effect<Trajectory<V>, InvalidTimeSequenceError | DerivativeEvaluationError> =>
  validateTimes(times).pipe(
    Effect.flatMap((validated) => collect(fixedSegments(problem, validated, table))),
    Effect.annotateLogs({ method: table.name, mode: "fixed" }),
    Effect.withLogSpan("integrate"),
  )

/**
 * Lazily integrate with the adaptive controller, emitting one point per
 * output time.
 *
 * @category Adaptive
 * @since 0.1.0
 */
export const streamAdaptive = <V>(
  problem: Problem<V>,
  times: ReadonlyArray<number>,
  table: ButcherTable,
  options: AdaptiveOptions = {},
): Stream.Stream<TrajectoryPoint<V>, IntegrationError> =>
  Stream.unwrap(
    Effect.gen(function* () {
      const validated = yield* validateTimes(times)
      const embeddedTable = yield* ensureEmbedded(table)
      const resolved = yield* resolveAdaptiveOptions(options)
      return toPoints(adaptiveSegments(problem, validated, embeddedTable, resolved))
    }),
  )

/**
 * Integrate with the adaptive controller. Intermediate sub-steps are not
 * part of the result.
 *
 * @category Adaptive
 * @since 0.1.0
 */
export const adaptive = <V>(
  problem: Problem<V>,
  times: ReadonlyArray<number>,
  table: ButcherTable,
  options: AdaptiveOptions = {},
): Effect.Effect<Trajectory<V>, IntegrationError> =>
  Effect.gen(function* () {
    const validated = yield* validateTimes(times)
    const embeddedTable = yield* ensureEmbedded(table)
    const resolved = yield* resolveAdaptiveOptions(options)
    return yield* collect(adaptiveSegments(problem, validated, embeddedTable, resolved))
  }).pipe(
    Effect.annotateLogs({ method: table.name, mode: "adaptive" }),
    Effect.withLogSpan("integrate"),
  )
