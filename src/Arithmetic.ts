/**
 * Value arithmetic for the integrators.
 *
 * The steppers never assume a numeric base type for `y`. Instead every call
 * receives an `Arithmetic` instance describing how to add two values and how
 * to scale one by a number. Adaptive integration additionally needs a
 * magnitude (max-norm) to estimate local error.
 *
 * Instances compose: `array(scalar)` is a vector, `array(array(scalar))` a
 * matrix, and `record` handles keyed state such as named populations.
 *
 * @since 0.1.0
 */

/**
 * Scalar multiplication and addition over a value type `V`.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Arithmetic<V> {
  readonly add: (x: V, y: V) => V
  readonly scale: (s: number, x: V) => V
}

/**
 * Arithmetic with a max-norm: the largest absolute value over all components.
 *
 * @category Models
 * @since 0.1.0
 */
export interface NormedArithmetic<V> extends Arithmetic<V> {
  readonly magnitude: (x: V) => number
}

/**
 * Plain numbers.
 *
 * @category Instances
 * @since 0.1.0
 */
export const scalar: NormedArithmetic<number> = {
  add: (x, y) => x + y,
  scale: (s, x) => s * x,
  magnitude: (x) => Math.abs(x),
}

const ensureSameLength = (x: ReadonlyArray<unknown>, y: ReadonlyArray<unknown>): void => {
  if (x.length !== y.length) {
    throw new RangeError(`Cannot add arrays of length ${x.length} and ${y.length}`)
  }
}

/**
 * Arrays of values of the inner arithmetic, added component-wise. Adding
 * arrays of different lengths is a defect and throws a `RangeError`.
 *
 * @example
 * ```ts
 * const vector = Arithmetic.array(Arithmetic.scalar)
 * vector.add([1, 2], [3, 4]) // [4, 6]
 * const matrix = Arithmetic.array(vector)
 * ```
 *
 * @category Instances
 * @since 0.1.0
 */
export const array = <V>(inner: NormedArithmetic<V>): NormedArithmetic<ReadonlyArray<V>> => ({
  add: (x, y) => {
    ensureSameLength(x, y)
    const result: Array<V> = []
    for (let index = 0; index < x.length; index += 1) {
      const left = x[index]
      const right = y[index]
      if (left === undefined || right === undefined) {
        throw new RangeError(`Missing component at index ${index}`)
      }
      result.push(inner.add(left, right))
    }
    return result
  },
  scale: (s, x) => x.map((component) => inner.scale(s, component)),
  magnitude: (x) => {
    let largest = 0
    for (const component of x) {
      const size = inner.magnitude(component)
      // NaN must win so callers can detect a broken estimate
      if (Number.isNaN(size)) {
        return Number.NaN
      }
      largest = Math.max(largest, size)
    }
    return largest
  },
})

/**
 * Numeric vectors.
 *
 * @category Instances
 * @since 0.1.0
 */
export const vector: NormedArithmetic<ReadonlyArray<number>> = array(scalar)

/**
 * String-keyed numeric records. A key missing on one side reads as zero.
 *
 * @category Instances
 * @since 0.1.0
 */
export const record: NormedArithmetic<Readonly<Record<string, number>>> = {
  add: (x, y) => {
    const result: Record<string, number> = Object.create(null)
    for (const [key, value] of Object.entries(x)) {
      result[key] = value + (y[key] ?? 0)
    }
    for (const [key, value] of Object.entries(y)) {
      if (!(key in result)) {
        result[key] = value
      }
    }
    return result
  },
  scale: (s, x) => {
    const result: Record<string, number> = Object.create(null)
    for (const [key, value] of Object.entries(x)) {
      result[key] = s * value
    }
    return result
  },
  magnitude: (x) => {
    let largest = 0
    for (const value of Object.values(x)) {
      if (Number.isNaN(value)) {
        return Number.NaN
      }
      largest = Math.max(largest, Math.abs(value))
    }
    return largest
  },
}

/**
 * `x - y` expressed through `add` and `scale`.
 *
 * @since 0.1.0
 */
export const subtract = <V>(space: Arithmetic<V>, x: V, y: V): V => space.add(x, space.scale(-1, y))
