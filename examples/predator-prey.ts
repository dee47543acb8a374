import { Effect } from "effect"
import { mkdirSync, writeFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { Arithmetic, Integrator, type Problem } from "../src/index.js"

type Populations = Readonly<Record<string, number>>

// Lotka-Volterra with hares as prey and lynx as predators
const predatorPrey: Problem<Populations> = {
  space: Arithmetic.record,
  initialValue: { hares: 40, lynx: 9 },
  derivative: (_t, { hares = 0, lynx = 0 }) => ({
    hares: 0.1 * hares - 0.02 * hares * lynx,
    lynx: 0.01 * hares * lynx - 0.1 * lynx,
  }),
}

const times = Array.from({ length: 101 }, (_, index) => index)

const program = Effect.gen(function* () {
  const integrator = yield* Integrator
  const trajectory = yield* integrator.integrate(predatorPrey, times)
  yield* Effect.log("predator-prey run complete").pipe(
    Effect.annotateLogs({
      acceptedSteps: trajectory.statistics.acceptedSteps,
      rejectedSteps: trajectory.statistics.rejectedSteps,
      derivativeEvaluations: trajectory.statistics.derivativeEvaluations,
    }),
  )
  return trajectory
}).pipe(Effect.provide(Integrator.Adaptive({ tolerance: 1e-8 })))

const outDir = fileURLToPath(new URL("./out/", import.meta.url))
const trajectoryPath = fileURLToPath(new URL("./out/predator-prey-trajectory.json", import.meta.url))

const writeOutputs = Effect.gen(function* () {
  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  const { times: outputTimes, values } = yield* program
  const rows = outputTimes.map((time, index) => ({ time, ...values[index] }))
  yield* Effect.sync(() => writeFileSync(trajectoryPath, JSON.stringify(rows, null, 2), "utf-8"))
})

Effect.runPromise(writeOutputs).catch((error) => {
  console.error("Failed to generate predator-prey example", error)
  process.exitCode = 1
})
