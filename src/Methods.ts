/**
 * Registry of named explicit Runge-Kutta methods.
 *
 * Every method is a plain {@link ButcherTable}; there is one generic stepping
 * entry point and the name only selects the table.
 *
 * @since 0.1.0
 */

import { Effect, Record } from "effect"
import { ConfigurationError } from "./Errors.js"
import { ButcherTable } from "./Tableau.js"

/**
 * Forward Euler, first order.
 *
 * @category Tables
 * @since 0.1.0
 */
export const euler = new ButcherTable({
  name: "euler",
  a: [[]],
  b: [1],
  c: [0],
})

/**
 * Heun's method (explicit trapezoid), second order.
 *
 * @category Tables
 * @since 0.1.0
 */
export const heun = new ButcherTable({
  name: "heun",
  a: [[], [1]],
  b: [1 / 2, 1 / 2],
  c: [0, 1],
})

/**
 * Explicit midpoint, second order.
 *
 * @category Tables
 * @since 0.1.0
 */
export const midpoint = new ButcherTable({
  name: "midpoint",
  a: [[], [1 / 2]],
  b: [0, 1],
  c: [0, 1 / 2],
})

/**
 * Kutta's third-order method.
 *
 * @category Tables
 * @since 0.1.0
 */
export const rk3 = new ButcherTable({
  name: "rk3",
  a: [[], [1 / 2], [-1, 2]],
  b: [1 / 6, 2 / 3, 1 / 6],
  c: [0, 1 / 2, 1],
})

/**
 * The classic fourth-order Runge-Kutta method.
 *
 * @category Tables
 * @since 0.1.0
 */
export const rk4 = new ButcherTable({
  name: "rk4",
  a: [[], [1 / 2], [0, 1 / 2], [0, 0, 1]],
  b: [1 / 6, 1 / 3, 1 / 3, 1 / 6],
  c: [0, 1 / 2, 1 / 2, 1],
})

/**
 * Heun-Euler 2(1) embedded pair.
 *
 * @category Tables
 * @since 0.1.0
 */
export const heunEuler = new ButcherTable({
  name: "heunEuler",
  a: [[], [1]],
  b: [1 / 2, 1 / 2],
  b2: [1, 0],
  c: [0, 1],
  order: 1,
})

/**
 * Bogacki-Shampine 3(2) embedded pair.
 *
 * @category Tables
 * @since 0.1.0
 */
export const bogackiShampine = new ButcherTable({
  name: "bogackiShampine",
  a: [[], [1 / 2], [0, 3 / 4], [2 / 9, 1 / 3, 4 / 9]],
  b: [2 / 9, 1 / 3, 4 / 9, 0],
  b2: [7 / 24, 1 / 4, 1 / 3, 1 / 8],
  c: [0, 1 / 2, 3 / 4, 1],
  order: 2,
})

/**
 * Dormand-Prince 5(4) embedded pair. `b` holds the fifth-order weights and
 * `b2` the fourth-order ones.
 *
 * @category Tables
 * @since 0.1.0
 */
export const dormandPrince = new ButcherTable({
  name: "dormandPrince",
  a: [
    [],
    [1 / 5],
    [3 / 40, 9 / 40],
    [44 / 45, -56 / 15, 32 / 9],
    [19372 / 6561, -25360 / 2187, 64448 / 6561, -212 / 729],
    [9017 / 3168, -355 / 33, 46732 / 5247, 49 / 176, -5103 / 18656],
    [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84],
  ],
  b: [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84, 0],
  b2: [5179 / 57600, 0, 7571 / 16695, 393 / 640, -92097 / 339200, 187 / 2100, 1 / 40],
  c: [0, 1 / 5, 3 / 10, 4 / 5, 8 / 9, 1, 1],
  order: 4,
})

/**
 * All registered methods by name.
 *
 * @category Registry
 * @since 0.1.0
 */
export const methods = {
  euler,
  heun,
  midpoint,
  rk3,
  rk4,
  heunEuler,
  bogackiShampine,
  dormandPrince,
} as const

/**
 * @category Registry
 * @since 0.1.0
 */
export type MethodName = keyof typeof methods

/**
 * Names of every registered method, in registration order.
 *
 * @category Registry
 * @since 0.1.0
 */
export const methodNames = Record.keys(methods)

/**
 * @category Registry
 * @since 0.1.0
 */
export const isMethodName = (name: string): name is MethodName => Object.hasOwn(methods, name)

/**
 * @category Registry
 * @since 0.1.0
 */
export const get = (name: MethodName): ButcherTable => methods[name]

/**
 * Resolve a method from an untrusted name.
 *
 * @category Registry
 * @since 0.1.0
 */
export const lookup = (name: string): Effect.Effect<ButcherTable, ConfigurationError> =>
  isMethodName(name)
    ? Effect.succeed(methods[name])
    : Effect.fail(
        new ConfigurationError({
          subject: "method",
          reason: `unknown method "${name}", expected one of ${methodNames.join(", ")}`,
        }),
      )
