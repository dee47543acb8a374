/**
 * Integrator service.
 *
 * Provides a Context.Tag exposing one configured Runge-Kutta method. Fixed
 * layers take one explicit step per output interval; adaptive layers run the
 * step-size controller between output times.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, type Stream } from "effect"
import { adaptiveOptionsFromConfig, IntegratorConfig } from "./Config.js"
import { resolveAdaptiveOptions, type AdaptiveOptions } from "./Controller.js"
import { ConfigurationError, IntegratorTypeId, type IntegrationError } from "./Errors.js"
import { get, lookup, type MethodName } from "./Methods.js"
import type { ButcherTable } from "./Tableau.js"
import { adaptive, fixed, streamAdaptive, streamFixed, type Trajectory } from "./Trajectory.js"
import type { Problem, TrajectoryPoint } from "./Types.js"

const integratorIdentifier = Symbol.keyFor(IntegratorTypeId) ?? "effect-runge-kutta/Integrator"

/**
 * @category Services
 * @since 0.1.0
 */
export interface IntegratorService {
  readonly name: string
  readonly mode: "fixed" | "adaptive"
  readonly table: ButcherTable
  readonly integrate: <V>(
    problem: Problem<V>,
    times: ReadonlyArray<number>,
  ) => Effect.Effect<Trajectory<V>, IntegrationError>
  readonly stream: <V>(
    problem: Problem<V>,
    times: ReadonlyArray<number>,
  ) => Stream.Stream<TrajectoryPoint<V>, IntegrationError>
}

const makeFixed = (table: ButcherTable): IntegratorService => ({
  name: table.name,
  mode: "fixed",
  table,
  integrate: (problem, times) => fixed(problem, times, table),
  stream: (problem, times) => streamFixed(problem, times, table),
})

const makeAdaptive = (
  table: ButcherTable,
  options: AdaptiveOptions,
): Effect.Effect<IntegratorService, ConfigurationError> =>
  Effect.gen(function* () {
    if (!table.isEmbedded) {
      return yield* Effect.fail(
        new ConfigurationError({
          subject: table.name,
          reason: "adaptive integration needs a table with b2 weights",
        }),
      )
    }
    yield* resolveAdaptiveOptions(options)
    const service: IntegratorService = {
      name: table.name,
      mode: "adaptive",
      table,
      integrate: (problem, times) => adaptive(problem, times, table, options),
      stream: (problem, times) => streamAdaptive(problem, times, table, options),
    }
    return service
  })

/**
 * Context tag describing the integrator contract.
 *
 * @category Services
 * @since 0.1.0
 */
export class Integrator extends Context.Tag(integratorIdentifier)<Integrator, IntegratorService>() {
  /**
   * One explicit step of `method` per output interval.
   *
   * @example
   * ```ts
   * const trajectory = await Effect.runPromise(
   *   Effect.flatMap(Integrator, (integrator) => integrator.integrate(problem, [0, 0.5, 1])).pipe(
   *     Effect.provide(Integrator.Fixed("rk4")),
   *   ),
   * )
   * ```
   *
   * @category Layers
   * @since 0.1.0
   */
  static Fixed(method: MethodName) {
    return Layer.succeed(this, makeFixed(get(method)))
  }

  /**
   * @category Layers
   * @since 0.1.0
   */
  static readonly Euler = this.Fixed("euler")

  /**
   * @category Layers
   * @since 0.1.0
   */
  static readonly Heun = this.Fixed("heun")

  /**
   * @category Layers
   * @since 0.1.0
   */
  static readonly RK3 = this.Fixed("rk3")

  /**
   * @category Layers
   * @since 0.1.0
   */
  static readonly RK4 = this.Fixed("rk4")

  /**
   * Adaptive integration with an embedded method. Building the layer fails
   * with `ConfigurationError` for invalid options or a table without `b2`.
   *
   * @category Layers
   * @since 0.1.0
   */
  static Adaptive(options: AdaptiveOptions = {}, method: MethodName = "dormandPrince") {
    return Layer.effect(this, makeAdaptive(get(method), options))
  }

  /**
   * Built from {@link IntegratorConfig}: adaptive for embedded methods, fixed
   * otherwise. An unknown method name fails with `ConfigurationError`.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly layerConfig = Layer.effect(
    this,
    Effect.gen(function* () {
      const config = yield* IntegratorConfig
      const table = yield* lookup(config.method)
      yield* Effect.logDebug("integrator configured").pipe(
        Effect.annotateLogs({ method: table.name, tolerance: config.tolerance }),
      )
      return table.isEmbedded
        ? yield* makeAdaptive(table, adaptiveOptionsFromConfig(config))
        : makeFixed(table)
    }),
  )
}
