/**
 * Environment-driven integrator configuration.
 *
 * Values are read through Effect's `Config` under the `RUNGE_KUTTA` prefix,
 * e.g. `RUNGE_KUTTA_METHOD=rk4` or `RUNGE_KUTTA_TOLERANCE=1e-8`. The method
 * name is resolved against the registry when the integrator layer is built.
 *
 * @since 0.1.0
 */

import { Config, Option } from "effect"
import { defaultAdaptiveOptions, type AdaptiveOptions } from "./Controller.js"

/**
 * @category Config
 * @since 0.1.0
 */
export const IntegratorConfig = Config.all({
  method: Config.string("METHOD").pipe(Config.withDefault("dormandPrince")),
  tolerance: Config.number("TOLERANCE").pipe(Config.withDefault(defaultAdaptiveOptions.tolerance)),
  initialStep: Config.option(Config.number("INITIAL_STEP")),
  minStep: Config.number("MIN_STEP").pipe(Config.withDefault(defaultAdaptiveOptions.minStep)),
  maxStep: Config.number("MAX_STEP").pipe(Config.withDefault(defaultAdaptiveOptions.maxStep)),
  maxAttemptsPerStep: Config.integer("MAX_ATTEMPTS_PER_STEP").pipe(
    Config.withDefault(defaultAdaptiveOptions.maxAttemptsPerStep),
  ),
  maxStepsPerInterval: Config.integer("MAX_STEPS_PER_INTERVAL").pipe(
    Config.withDefault(defaultAdaptiveOptions.maxStepsPerInterval),
  ),
}).pipe(Config.nested("RUNGE_KUTTA"))

/**
 * @category Config
 * @since 0.1.0
 */
export type IntegratorConfig = Config.Config.Success<typeof IntegratorConfig>

/**
 * Adaptive options described by a loaded configuration.
 *
 * @category Config
 * @since 0.1.0
 */
export const adaptiveOptionsFromConfig = (config: IntegratorConfig): AdaptiveOptions => ({
  tolerance: config.tolerance,
  minStep: config.minStep,
  maxStep: config.maxStep,
  maxAttemptsPerStep: config.maxAttemptsPerStep,
  maxStepsPerInterval: config.maxStepsPerInterval,
  ...Option.match(config.initialStep, {
    onNone: () => ({}),
    onSome: (initialStep) => ({ initialStep }),
  }),
})
