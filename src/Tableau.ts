/**
 * Butcher tableau schema.
 *
 * A tableau fully describes one explicit Runge-Kutta method: the lower
 * triangular stage matrix `a`, the final weights `b`, the stage time offsets
 * `c` and, for embedded methods, the alternative weights `b2` together with
 * the order of the lower estimate.
 *
 * Shape invariants are checked whenever a table is constructed or decoded,
 * never during a step.
 *
 * @since 0.1.0
 */

import { Effect, ParseResult, Schema } from "effect"
import { ConfigurationError } from "./Errors.js"

const Coefficient = Schema.Number.pipe(Schema.finite())

const CoefficientRow = Schema.Array(Coefficient)

const ButcherTableFields = Schema.Struct({
  name: Schema.NonEmptyTrimmedString,
  a: Schema.Array(CoefficientRow),
  b: CoefficientRow,
  c: CoefficientRow,
  b2: Schema.optional(CoefficientRow),
  order: Schema.optional(Schema.Number.pipe(Schema.finite(), Schema.positive())),
})

/**
 * Plain description of a tableau, as accepted by {@link decodeButcherTable}.
 *
 * @category Models
 * @since 0.1.0
 */
export type ButcherTableInput = typeof ButcherTableFields.Type

/**
 * Returns the first violated shape invariant, if any.
 *
 * @internal
 */
export const tableauProblem = (table: ButcherTableInput): string | undefined => {
  const stages = table.b.length
  if (stages === 0) {
    return "b must have at least one weight"
  }
  if (table.a.length !== stages) {
    return `a has ${table.a.length} rows, expected ${stages}`
  }
  if (table.c.length !== stages) {
    return `c has ${table.c.length} entries, expected ${stages}`
  }
  for (let index = 0; index < table.a.length; index += 1) {
    const row = table.a[index]
    if (row !== undefined && row.length !== index) {
      return `row ${index} has ${row.length} entries, expected ${index}`
    }
  }
  if (table.b2 !== undefined && table.b2.length !== stages) {
    return `b2 has ${table.b2.length} entries, expected ${stages}`
  }
  if (table.order !== undefined && table.b2 === undefined) {
    return "order is only meaningful together with b2"
  }
  return undefined
}

/**
 * Immutable Butcher tableau. Constructing one with mismatched row or vector
 * lengths throws a `ParseError`; use {@link decodeButcherTable} to get a
 * typed `ConfigurationError` instead.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const heun = new ButcherTable({
 *   name: "heun",
 *   a: [[], [1]],
 *   b: [1 / 2, 1 / 2],
 *   c: [0, 1],
 * })
 * ```
 */
export class ButcherTable extends Schema.Class<ButcherTable>("ButcherTable")(
  ButcherTableFields.pipe(Schema.filter((table) => tableauProblem(table))),
) {
  /**
   * Number of derivative evaluations per step.
   */
  get stages(): number {
    return this.b.length
  }

  /**
   * Whether the table carries embedded weights for error estimation.
   */
  get isEmbedded(): boolean {
    return this.b2 !== undefined
  }
}

/**
 * Validate an untrusted tableau description.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const decodeButcherTable = (input: unknown): Effect.Effect<ButcherTable, ConfigurationError> =>
  Effect.gen(function* () {
    const fields = yield* Schema.decodeUnknown(ButcherTableFields)(input).pipe(
      Effect.mapError(
        (error) =>
          new ConfigurationError({
            subject: "ButcherTable",
            reason: ParseResult.TreeFormatter.formatErrorSync(error),
          }),
      ),
    )
    const problem = tableauProblem(fields)
    if (problem !== undefined) {
      return yield* Effect.fail(new ConfigurationError({ subject: fields.name, reason: problem }))
    }
    return new ButcherTable(fields)
  })
