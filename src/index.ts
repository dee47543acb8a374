/**
 * @since 0.1.0
 */
export * as Arithmetic from "./Arithmetic.js"
export * as Combination from "./Combination.js"
export * as Controller from "./Controller.js"
export * as Methods from "./Methods.js"
export * as Step from "./Step.js"
export * as Trajectory from "./Trajectory.js"
export * from "./Config.js"
export * from "./Errors.js"
export * from "./Integrator.js"
export * from "./Tableau.js"
export * from "./Types.js"
