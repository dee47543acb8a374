import { describe, it, expect } from "@effect/vitest"
import { Effect, HashMap, Logger, LogLevel } from "effect"
import {
  Arithmetic,
  ButcherTable,
  ConfigurationError,
  Controller,
  Methods,
  NonConvergenceError,
} from "../src/index.js"
import { exponentialGrowth } from "./fixtures.js"

const start = (stepSize: number): Controller.IntegrationState<number> => ({ time: 0, value: 1, stepSize })

describe("Controller.relativeError", () => {
  it("treats two zero magnitudes as an exact step", () => {
    expect(Controller.relativeError(Arithmetic.scalar, { high: 0, low: 0 })).toBe(0)
  })

  it("divides the error by the high-order magnitude", () => {
    expect(Controller.relativeError(Arithmetic.scalar, { high: 2, low: 1.5 })).toBe(0.25)
  })

  it("uses the max-norm for vectors", () => {
    expect(Controller.relativeError(Arithmetic.vector, { high: [4, -2], low: [3.5, -2] })).toBe(0.125)
  })

  it("reports broken estimates as infinite", () => {
    expect(Controller.relativeError(Arithmetic.scalar, { high: 0, low: 1 })).toBe(Number.POSITIVE_INFINITY)
    expect(Controller.relativeError(Arithmetic.scalar, { high: Number.NaN, low: 1 })).toBe(
      Number.POSITIVE_INFINITY,
    )
  })
})

describe("Controller.stepFactor", () => {
  it("scales by (tolerance / error)^(1 / order)", () => {
    expect(Controller.stepFactor(1, 16, 4)).toBeCloseTo(0.5, 15)
  })

  it("clamps into [0.01, 10]", () => {
    expect(Controller.stepFactor(1, 1e-12, 1)).toBe(10)
    expect(Controller.stepFactor(1e-12, 1, 1)).toBe(0.01)
    expect(Controller.stepFactor(1, 0, 4)).toBe(10)
    expect(Controller.stepFactor(1, Number.POSITIVE_INFINITY, 4)).toBe(0.01)
  })
})

describe("Controller.resolveAdaptiveOptions", () => {
  it.effect("fills in defaults", () =>
    Effect.gen(function* () {
      const resolved = yield* Controller.resolveAdaptiveOptions()
      expect(resolved).toEqual(Controller.defaultAdaptiveOptions)
    }),
  )

  it.effect("rejects a non-positive tolerance", () =>
    Effect.gen(function* () {
      const error = yield* Controller.resolveAdaptiveOptions({ tolerance: 0 }).pipe(Effect.flip)
      expect(error).toBeInstanceOf(ConfigurationError)
      expect(error.subject).toBe("adaptive options")
    }),
  )

  it.effect("rejects a minimum step above the maximum", () =>
    Effect.gen(function* () {
      const error = yield* Controller.resolveAdaptiveOptions({ minStep: 1, maxStep: 0.5 }).pipe(Effect.flip)
      expect(error.reason).toBe("minStep 1 exceeds maxStep 0.5")
    }),
  )
})

describe("Controller.advance", () => {
  it.effect("accepts the first attempt under a loose tolerance and lands on the target", () =>
    Effect.gen(function* () {
      const options = yield* Controller.resolveAdaptiveOptions({ tolerance: 1e-2 })
      const result = yield* Controller.advance(exponentialGrowth, Methods.dormandPrince, start(2), 0.5, options)

      expect(result.attempts).toHaveLength(1)
      expect(result.attempts[0]).toMatchObject({ time: 0, stepSize: 0.5, accepted: true, terminal: true })
      expect(result.state.time).toBe(0.5)
      expect(result.state.value).toBeCloseTo(Math.exp(0.5), 4)
      // the candidate is not shortened to the interval
      expect(result.state.stepSize).toBe(2)
    }),
  )

  it.effect("retries with a factor-bounded step under a tight tolerance", () =>
    Effect.gen(function* () {
      const tolerance = 1e-9
      const options = yield* Controller.resolveAdaptiveOptions({ tolerance })
      const result = yield* Controller.advance(exponentialGrowth, Methods.dormandPrince, start(0.5), 0.5, options)
      const { attempts } = result

      expect(attempts[0]?.accepted).toBe(false)
      expect(attempts.filter((attempt) => !attempt.accepted).length).toBeGreaterThanOrEqual(1)

      attempts.forEach((attempt, index) => {
        const next = attempts[index + 1]
        if (!attempt.accepted && next !== undefined) {
          const bound = attempt.stepSize * Controller.stepFactor(tolerance, attempt.errorRatio, 4)
          expect(next.time).toBe(attempt.time)
          expect(next.stepSize).toBeLessThanOrEqual(bound * (1 + 1e-12))
          expect(next.stepSize).toBeLessThan(attempt.stepSize)
        }
        expect(attempt.time).toBeLessThanOrEqual(0.5)
        if (next !== undefined) {
          expect(next.time).toBeGreaterThanOrEqual(attempt.time)
        }
      })

      expect(attempts.at(-1)).toMatchObject({ accepted: true, terminal: true })
      expect(result.state.time).toBe(0.5)
      expect(Math.abs(result.state.value - Math.exp(0.5)) / Math.exp(0.5)).toBeLessThan(1e-7)
    }),
  )

  it.effect("halves the step on rejection when the table has no order", () =>
    Effect.gen(function* () {
      const unordered = new ButcherTable({
        name: "unordered",
        a: Methods.heunEuler.a,
        b: Methods.heunEuler.b,
        b2: Methods.heunEuler.b2,
        c: Methods.heunEuler.c,
      })
      const options = yield* Controller.resolveAdaptiveOptions({ tolerance: 1e-3 })
      const result = yield* Controller.advance(exponentialGrowth, unordered, start(0.5), 0.5, options)

      expect(result.attempts.slice(0, 3).map((attempt) => [attempt.stepSize, attempt.accepted])).toEqual([
        [0.5, false],
        [0.25, false],
        [0.125, false],
      ])
      expect(result.state.time).toBe(0.5)
      expect(result.state.value).toBeCloseTo(Math.exp(0.5), 2)
    }),
  )

  it.effect("grows the step after an intermediate acceptance against half the tolerance", () =>
    Effect.gen(function* () {
      const tolerance = 1e-6
      const options = yield* Controller.resolveAdaptiveOptions({ tolerance })
      const result = yield* Controller.advance(exponentialGrowth, Methods.bogackiShampine, start(0.01), 1, options)
      const [first, second] = result.attempts

      expect(first).toMatchObject({ time: 0, stepSize: 0.01, accepted: true, terminal: false })
      expect(second?.time).toBe(0.01)
      expect(second?.stepSize).toBe(0.01 * Controller.stepFactor(tolerance / 2, first?.errorRatio ?? Number.NaN, 2))
      expect(second?.stepSize).toBeGreaterThan(0.01)
    }),
  )

  it.effect("doubles within half the tolerance and keeps the step otherwise when the table has no order", () =>
    Effect.gen(function* () {
      const unordered = new ButcherTable({
        name: "unordered",
        a: Methods.heunEuler.a,
        b: Methods.heunEuler.b,
        b2: Methods.heunEuler.b2,
        c: Methods.heunEuler.c,
      })
      const options = yield* Controller.resolveAdaptiveOptions({ tolerance: 1e-3 })
      const result = yield* Controller.advance(exponentialGrowth, unordered, start(0.01), 1, options)

      // relative error of a heunEuler step on y' = y is (h²/2) / (1 + h + h²/2)
      expect(result.attempts.slice(0, 4).map((attempt) => [attempt.stepSize, attempt.accepted])).toEqual([
        [0.01, true],
        [0.02, true],
        [0.04, true],
        [0.04, true],
      ])
    }),
  )

  it.effect("counts every attempt of the interval when retries run out", () =>
    Effect.gen(function* () {
      const options = yield* Controller.resolveAdaptiveOptions({
        tolerance: 1e-2,
        maxStep: 0.25,
        maxAttemptsPerStep: 2,
      })
      const brokenLater = {
        derivative: (time: number, value: number) => (time > 0.25 ? Number.NaN : value),
        space: Arithmetic.scalar,
      }
      const error = yield* Controller.advance(brokenLater, Methods.dormandPrince, start(0.25), 1, options).pipe(
        Effect.flip,
      )

      expect(error._tag).toBe("NonConvergenceError")
      if (error._tag === "NonConvergenceError") {
        expect(error.time).toBe(0.25)
        expect(error.attempts).toBe(3)
        expect(error.stepSize).toBe(0.0025)
      }
    }),
  )

  it.effect("fails once the retry budget is spent", () =>
    Effect.gen(function* () {
      const options = yield* Controller.resolveAdaptiveOptions({ maxAttemptsPerStep: 3 })
      const broken = { derivative: (): number => Number.NaN, space: Arithmetic.scalar }
      const error = yield* Controller.advance(broken, Methods.dormandPrince, start(1), 1, options).pipe(Effect.flip)

      expect(error).toBeInstanceOf(NonConvergenceError)
      if (error._tag === "NonConvergenceError") {
        expect(error.time).toBe(0)
        expect(error.attempts).toBe(3)
        expect(error.errorRatio).toBe(Number.POSITIVE_INFINITY)
        expect(error.stepSize).toBeCloseTo(1e-4, 12)
      }
    }),
  )

  it.effect("fails when a rejected step is already at the minimum size", () =>
    Effect.gen(function* () {
      const options = yield* Controller.resolveAdaptiveOptions({ tolerance: 1e-12, minStep: 0.5 })
      const error = yield* Controller.advance(exponentialGrowth, Methods.heunEuler, start(0.5), 1, options).pipe(
        Effect.flip,
      )

      expect(error._tag).toBe("NonConvergenceError")
      if (error._tag === "NonConvergenceError") {
        expect(error.stepSize).toBe(0.5)
        expect(error.attempts).toBe(1)
      }
    }),
  )

  it.effect("bounds the number of sub-steps per interval", () =>
    Effect.gen(function* () {
      const options = yield* Controller.resolveAdaptiveOptions({
        tolerance: 1,
        maxStep: 0.1,
        maxStepsPerInterval: 3,
      })
      const error = yield* Controller.advance(exponentialGrowth, Methods.dormandPrince, start(0.1), 1, options).pipe(
        Effect.flip,
      )

      expect(error._tag).toBe("NonConvergenceError")
      if (error._tag === "NonConvergenceError") {
        expect(error.attempts).toBe(3)
      }
    }),
  )

  it.effect("logs rejections at debug level", () => {
    const entries: Array<{ readonly message: string; readonly annotations: Record<string, unknown> }> = []
    const capture = Logger.make(({ message, annotations }) => {
      const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message]
      entries.push({
        message: parts.map(String).join(" "),
        annotations: Object.fromEntries(HashMap.toEntries(annotations)),
      })
    })

    return Effect.gen(function* () {
      const options = yield* Controller.resolveAdaptiveOptions({ tolerance: 1e-9 })
      yield* Controller.advance(exponentialGrowth, Methods.dormandPrince, start(0.5), 0.5, options)

      const rejection = entries.find((entry) => entry.message === "step rejected")
      expect(rejection?.annotations.method).toBe("dormandPrince")
      expect(rejection?.annotations.time).toBe(0)
      expect(rejection?.annotations.stepSize).toBe(0.5)
      expect(entries.at(-1)?.message).toBe("interval complete")
    }).pipe(Effect.provide(Logger.replace(Logger.defaultLogger, capture)), Logger.withMinimumLogLevel(LogLevel.Debug))
  })
})
