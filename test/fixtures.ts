import { Arithmetic, type Problem } from "../src/index.js"

/**
 * `y' = y`, `y(0) = 1`; exact solution `e^t`.
 */
export const exponentialGrowth: Problem<number> = {
  derivative: (_t, y) => y,
  space: Arithmetic.scalar,
  initialValue: 1,
}

/**
 * `y' = -y`, `y(0) = 1`; exact solution `e^-t`.
 */
export const exponentialDecay: Problem<number> = {
  derivative: (_t, y) => -y,
  space: Arithmetic.scalar,
  initialValue: 1,
}

/**
 * Harmonic oscillator `x' = v, v' = -x` starting at `(1, 0)`; `x² + v²` is
 * conserved.
 */
export const oscillator: Problem<ReadonlyArray<number>> = {
  derivative: (_t, y) => [y[1] ?? 0, -(y[0] ?? 0)],
  space: Arithmetic.vector,
  initialValue: [1, 0],
}

/**
 * Two independent decays keyed by name: `fast' = -2·fast`, `slow' = -slow`.
 */
export const keyedDecay: Problem<Readonly<Record<string, number>>> = {
  derivative: (_t, y) => ({ fast: -2 * (y.fast ?? 0), slow: -(y.slow ?? 0) }),
  space: Arithmetic.record,
  initialValue: { fast: 1, slow: 1 },
}

/**
 * Wrap a derivative so every call is recorded.
 */
export const recordingCalls = <V>(problem: Problem<V>) => {
  const calls: Array<{ readonly time: number; readonly value: V }> = []
  const recorded: Problem<V> = {
    ...problem,
    derivative: (time, value) => {
      calls.push({ time, value })
      return problem.derivative(time, value)
    },
  }
  return { calls, problem: recorded }
}
