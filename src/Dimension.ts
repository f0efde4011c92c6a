/**
 * Dimension vectors over an ordered basis of base dimensions.
 *
 * A dimension is one exact rational exponent per basis component: velocity in
 * the standard basis is `length^1 · time^-1`. Dimensions are immutable values;
 * products and powers of quantities are modelled by adding and scaling the
 * exponent vectors, which always yields a new dimension.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { ShapeMismatchError } from "./Errors.js"
import * as Rational from "./Rational.js"

/**
 * Ordered set of base dimension names.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Basis {
  readonly name: string
  readonly components: ReadonlyArray<string>
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface Dimension {
  readonly basis: Basis
  readonly exponents: ReadonlyArray<Rational.Rational>
}

const checkComponents = (name: string, components: ReadonlyArray<string>): string | undefined => {
  const seen = new Set<string>()
  for (const component of components) {
    if (component.trim().length === 0) {
      return `basis "${name}" has an empty component name`
    }
    if (seen.has(component)) {
      return `basis "${name}" repeats component "${component}"`
    }
    seen.add(component)
  }
  return undefined
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeBasis = (
  name: string,
  components: ReadonlyArray<string>,
): Effect.Effect<Basis, ShapeMismatchError> => {
  const problem = checkComponents(name, components)
  return problem === undefined
    ? Effect.succeed({ name, components: [...components] })
    : Effect.fail(new ShapeMismatchError({ operation: "makeBasis", reason: problem }))
}

/**
 * Synchronous variant of {@link makeBasis} for module-level constants; throws
 * the {@link ShapeMismatchError}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const unsafeMakeBasis = (name: string, components: ReadonlyArray<string>): Basis => {
  const problem = checkComponents(name, components)
  if (problem !== undefined) {
    throw new ShapeMismatchError({ operation: "makeBasis", reason: problem })
  }
  return { name, components: [...components] }
}

/**
 * The seven physical base dimensions.
 *
 * @category Constants
 * @since 0.1.0
 */
export const STANDARD: Basis = unsafeMakeBasis("standard", [
  "mass",
  "length",
  "time",
  "charge",
  "temperature",
  "amount",
  "luminous_intensity",
])

/**
 * @category Predicates
 * @since 0.1.0
 */
export const sameBasis = (left: Basis, right: Basis): boolean =>
  left === right ||
  (left.name === right.name &&
    left.components.length === right.components.length &&
    left.components.every((component, index) => right.components[index] === component))

/**
 * @category Predicates
 * @since 0.1.0
 */
export const indexOf = (basis: Basis, component: string): number => basis.components.indexOf(component)

const readExponents = <A>(operation: string, read: () => A): Effect.Effect<A, ShapeMismatchError> =>
  Effect.try({
    try: read,
    catch: (error) =>
      new ShapeMismatchError({ operation, reason: error instanceof Error ? error.message : String(error) }),
  })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const make = (
  basis: Basis,
  exponents: ReadonlyArray<Rational.RationalInput>,
): Effect.Effect<Dimension, ShapeMismatchError> =>
  exponents.length === basis.components.length
    ? Effect.map(readExponents("Dimension.make", () => exponents.map(Rational.from)), (values) => ({
        basis,
        exponents: values,
      }))
    : Effect.fail(
        new ShapeMismatchError({
          operation: "Dimension.make",
          reason: `basis "${basis.name}" has ${basis.components.length} components, got ${exponents.length} exponents`,
        }),
      )

/**
 * @category Constructors
 * @since 0.1.0
 */
export const zero = (basis: Basis): Dimension => ({
  basis,
  exponents: basis.components.map(() => Rational.zero),
})

/**
 * Builds a dimension from named exponents, e.g. `{ length: 1, time: -1 }`.
 * Components left out are zero.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromRecord = (
  basis: Basis,
  exponents: Readonly<Record<string, Rational.RationalInput>>,
): Effect.Effect<Dimension, ShapeMismatchError> => {
  const unknown = Object.keys(exponents).filter((component) => indexOf(basis, component) < 0)
  if (unknown.length > 0) {
    return Effect.fail(
      new ShapeMismatchError({
        operation: "Dimension.fromRecord",
        reason: `basis "${basis.name}" has no component ${unknown.map((name) => `"${name}"`).join(", ")}`,
      }),
    )
  }
  return Effect.map(
    readExponents("Dimension.fromRecord", () =>
      basis.components.map((component) => {
        const exponent = exponents[component]
        return exponent === undefined ? Rational.zero : Rational.from(exponent)
      }),
    ),
    (values) => ({ basis, exponents: values }),
  )
}

/**
 * Pure dimension of a single component: exponent one on its own axis.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const base = (basis: Basis, component: string): Effect.Effect<Dimension, ShapeMismatchError> =>
  fromRecord(basis, { [component]: 1 })

const sameShape = (
  operation: string,
  left: Dimension,
  right: Dimension,
): Effect.Effect<void, ShapeMismatchError> =>
  sameBasis(left.basis, right.basis)
    ? Effect.void
    : Effect.fail(
        new ShapeMismatchError({
          operation,
          reason: `cannot mix bases "${left.basis.name}" and "${right.basis.name}"`,
        }),
      )

const zipWith = (
  left: Dimension,
  right: Dimension,
  f: (a: Rational.Rational, b: Rational.Rational) => Rational.Rational,
): Dimension => ({
  basis: left.basis,
  exponents: left.exponents.map((exponent, index) => f(exponent, right.exponents[index] ?? Rational.zero)),
})

/**
 * Dimension of a product of quantities (exponent-wise addition).
 *
 * @category Operations
 * @since 0.1.0
 */
export const combine = (left: Dimension, right: Dimension): Effect.Effect<Dimension, ShapeMismatchError> =>
  Effect.as(sameShape("Dimension.combine", left, right), zipWith(left, right, Rational.add))

/**
 * Dimension of a quotient of quantities (exponent-wise subtraction).
 *
 * @category Operations
 * @since 0.1.0
 */
export const divide = (left: Dimension, right: Dimension): Effect.Effect<Dimension, ShapeMismatchError> =>
  Effect.as(sameShape("Dimension.divide", left, right), zipWith(left, right, Rational.subtract))

/**
 * Dimension of a quantity raised to a rational power.
 *
 * @category Operations
 * @since 0.1.0
 */
export const power = (
  dimension: Dimension,
  exponent: Rational.RationalInput,
): Effect.Effect<Dimension, ShapeMismatchError> =>
  Effect.map(readExponents("Dimension.power", () => Rational.from(exponent)), (factor) => ({
    basis: dimension.basis,
    exponents: dimension.exponents.map((value) => Rational.multiply(value, factor)),
  }))

/**
 * Exact equality: same basis and every exponent equal.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const equals = (left: Dimension, right: Dimension): boolean =>
  sameBasis(left.basis, right.basis) &&
  left.exponents.every((exponent, index) => {
    const other = right.exponents[index]
    return other !== undefined && Rational.equals(exponent, other)
  })

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isDimensionless = (dimension: Dimension): boolean =>
  dimension.exponents.every(Rational.isZero)

/**
 * The component a dimension is the pure base dimension of, if any.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const pureComponent = (dimension: Dimension): string | undefined => {
  const nonZero = dimension.exponents.flatMap((exponent, index) =>
    Rational.isZero(exponent) ? [] : [[index, exponent] as const],
  )
  const [first] = nonZero
  if (nonZero.length !== 1 || first === undefined || !Rational.equals(first[1], Rational.one)) {
    return undefined
  }
  return dimension.basis.components[first[0]]
}

/**
 * `"length·time^-1"`, or `"dimensionless"`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const format = (dimension: Dimension): string => {
  const parts = dimension.exponents.flatMap((exponent, index) => {
    if (Rational.isZero(exponent)) {
      return []
    }
    const component = dimension.basis.components[index] ?? `#${index}`
    return Rational.equals(exponent, Rational.one)
      ? [component]
      : [`${component}^${Rational.format(exponent)}`]
  })
  return parts.length === 0 ? "dimensionless" : parts.join("·")
}
