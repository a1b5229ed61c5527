/**
 * Weight Algebra
 *
 * The numeric contract every node and arc weight type satisfies.
 * The storage layer never does arithmetic itself; the algebra travels
 * with the graph so callers (and helpers such as sub-path costs) can
 * rely on it.
 */

/**
 * Closed addition and multiplication with their identities.
 */
export interface WeightAlgebra<W> {
  /** Short name used in diagnostics */
  readonly name: string
  /** Additive identity */
  zero(): W
  /** Multiplicative identity */
  one(): W
  add(a: W, b: W): W
  mul(a: W, b: W): W
  equals(a: W, b: W): boolean
  isZero(value: W): boolean
  /** Text form used by exporters */
  format(value: W): string
}

/**
 * Algebras for the two weight types a graph carries.
 */
export interface GraphAlgebra<N, A> {
  node: WeightAlgebra<N>
  arc: WeightAlgebra<A>
}

export const numberAlgebra: WeightAlgebra<number> = {
  name: 'number',
  zero: () => 0,
  one: () => 1,
  add: (a, b) => a + b,
  mul: (a, b) => a * b,
  equals: (a, b) => a === b,
  isZero: (value) => value === 0,
  format: (value) => String(value),
}

export const bigintAlgebra: WeightAlgebra<bigint> = {
  name: 'bigint',
  zero: () => 0n,
  one: () => 1n,
  add: (a, b) => a + b,
  mul: (a, b) => a * b,
  equals: (a, b) => a === b,
  isZero: (value) => value === 0n,
  format: (value) => value.toString(),
}

/**
 * Both weight types as plain numbers.
 */
export const numericGraphAlgebra: GraphAlgebra<number, number> = {
  node: numberAlgebra,
  arc: numberAlgebra,
}

