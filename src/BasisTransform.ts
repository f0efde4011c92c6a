/**
 * Basis transforms: rational matrices relating the base dimensions of one unit
 * system to those of another.
 *
 * The matrix has one row per destination component and one column per source
 * component, so a destination exponent vector is `M · source`. A fantasy
 * system whose base "mote" measures what the standard basis calls energy has a
 * column `(length: 2, mass: 1, time: -2)` for its mote component.
 *
 * Invertibility is decided once, at construction, from the exact determinant.
 * Inversion uses the adjugate so the inverse of an integer matrix is exact.
 *
 * @since 0.1.0
 */

import { Effect, Either, Option, ParseResult, Schema } from "effect"
import * as Dimension from "./Dimension.js"
import {
  LossyProjectionError,
  NonInvertibleTransformError,
  ShapeMismatchError,
} from "./Errors.js"
import * as Matrix from "./internal/matrix.js"
import * as Rational from "./Rational.js"
import type { UnitSystem } from "./Unit.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface BasisTransform {
  readonly source: UnitSystem
  readonly target: UnitSystem
  readonly sourceComponents: ReadonlyArray<string>
  readonly targetComponents: ReadonlyArray<string>
  /** One row per target component, one column per source component. */
  readonly matrix: Matrix.Matrix
  readonly isSquare: boolean
  /** `Option.none()` for non-square matrices. */
  readonly determinant: Option.Option<Rational.Rational>
  readonly isInvertible: boolean
}

/**
 * Matrix rows as decoded from a configuration collaborator: numbers, decimal
 * strings or `"p/q"` fractions.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const MatrixSpec = Schema.Array(Schema.Array(Rational.RationalFromInput))

/**
 * @category Models
 * @since 0.1.0
 */
export interface BasisTransformSpec {
  readonly source: UnitSystem
  readonly target: UnitSystem
  readonly sourceComponents: ReadonlyArray<string>
  readonly targetComponents: ReadonlyArray<string>
  readonly matrix: ReadonlyArray<ReadonlyArray<Rational.RationalInput>>
}

const decodeMatrix = Schema.decodeUnknown(MatrixSpec)

const encodeEntry = (entry: Rational.RationalInput): string | number =>
  typeof entry === "number" || typeof entry === "string"
    ? entry
    : Rational.format(Rational.from(entry))

const shapeError = (reason: string) =>
  new ShapeMismatchError({ operation: "makeBasisTransform", reason })

const checkComponents = (
  system: UnitSystem,
  components: ReadonlyArray<string>,
): Effect.Effect<void, ShapeMismatchError> => {
  const unknown = components.filter((component) => Dimension.indexOf(system.basis, component) < 0)
  if (unknown.length > 0) {
    return Effect.fail(shapeError(`basis "${system.basis.name}" has no component "${unknown.join('", "')}"`))
  }
  if (new Set(components).size !== components.length) {
    return Effect.fail(shapeError(`components of ${system.name} are repeated`))
  }
  return Effect.void
}

const build = (
  source: UnitSystem,
  target: UnitSystem,
  sourceComponents: ReadonlyArray<string>,
  targetComponents: ReadonlyArray<string>,
  matrix: Matrix.Matrix,
): BasisTransform => {
  const isSquare = sourceComponents.length === targetComponents.length
  const determinant = isSquare ? Option.some(Matrix.determinant(matrix)) : Option.none()
  return {
    source,
    target,
    sourceComponents,
    targetComponents,
    matrix,
    isSquare,
    determinant,
    isInvertible: Option.exists(determinant, (value) => !Rational.isZero(value)),
  }
}

/**
 * Validates the component lists against both systems' bases and the matrix
 * shape against the component lists.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeBasisTransform = (
  spec: BasisTransformSpec,
): Effect.Effect<BasisTransform, ShapeMismatchError> =>
  Effect.gen(function* () {
    yield* checkComponents(spec.source, spec.sourceComponents)
    yield* checkComponents(spec.target, spec.targetComponents)
    if (spec.matrix.length !== spec.targetComponents.length) {
      return yield* Effect.fail(
        shapeError(
          `expected ${spec.targetComponents.length} rows (one per target component), got ${spec.matrix.length}`,
        ),
      )
    }
    const badRow = spec.matrix.findIndex((row) => row.length !== spec.sourceComponents.length)
    if (badRow >= 0) {
      return yield* Effect.fail(
        shapeError(
          `row ${badRow} has ${spec.matrix[badRow]?.length ?? 0} columns, expected ${spec.sourceComponents.length} (one per source component)`,
        ),
      )
    }
    const matrix = yield* decodeMatrix(spec.matrix.map((row) => row.map(encodeEntry))).pipe(
      Effect.mapError((error) => shapeError(ParseResult.TreeFormatter.formatErrorSync(error))),
    )
    return build(spec.source, spec.target, spec.sourceComponents, spec.targetComponents, matrix)
  })

/**
 * Identity over every component of the source system's basis. The target
 * defaults to the source, and must share its basis components.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const identityTransform = (
  source: UnitSystem,
  target: UnitSystem = source,
): Effect.Effect<BasisTransform, ShapeMismatchError> => {
  const components = source.basis.components
  return makeBasisTransform({
    source,
    target,
    sourceComponents: components,
    targetComponents: components,
    matrix: components.map((_, row) => components.map((__, column) => (row === column ? 1 : 0))),
  })
}

/**
 * `"Fantasy -> SI"`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const format = (transform: BasisTransform): string =>
  `${transform.source.name} -> ${transform.target.name}`

/**
 * Exact inverse: systems and component lists swap, the matrix becomes
 * `adj(M) / det(M)`.
 *
 * @category Operations
 * @since 0.1.0
 */
export const invert = (
  transform: BasisTransform,
): Effect.Effect<BasisTransform, NonInvertibleTransformError> => {
  if (!transform.isSquare) {
    return Effect.fail(
      new NonInvertibleTransformError({
        transform: format(transform),
        reason: `matrix is ${transform.targetComponents.length}x${transform.sourceComponents.length}, not square`,
      }),
    )
  }
  return Option.match(Matrix.inverse(transform.matrix), {
    onNone: () =>
      Effect.fail(
        new NonInvertibleTransformError({ transform: format(transform), reason: "determinant is zero" }),
      ),
    onSome: (matrix) =>
      Effect.succeed(
        build(transform.target, transform.source, transform.targetComponents, transform.sourceComponents, matrix),
      ),
  })
}

/**
 * Pure form of {@link applyToDimension}.
 *
 * @category Operations
 * @since 0.1.0
 */
export const project = (
  transform: BasisTransform,
  dimension: Dimension.Dimension,
): Either.Either<Dimension.Dimension, ShapeMismatchError | LossyProjectionError> => {
  const sourceBasis = transform.source.basis
  if (!Dimension.sameBasis(dimension.basis, sourceBasis)) {
    return Either.left(
      new ShapeMismatchError({
        operation: "applyToDimension",
        reason: `dimension uses basis "${dimension.basis.name}", transform ${format(transform)} expects "${sourceBasis.name}"`,
      }),
    )
  }
  const dropped = sourceBasis.components.find(
    (component, index) =>
      !transform.sourceComponents.includes(component) &&
      !Rational.isZero(dimension.exponents[index] ?? Rational.zero),
  )
  if (dropped !== undefined) {
    return Either.left(new LossyProjectionError({ transform: format(transform), component: dropped }))
  }
  const output = Matrix.multiplyVector(transform.matrix, sourceExponents(transform, dimension))
  const targetBasis = transform.target.basis
  return Either.right({
    basis: targetBasis,
    exponents: targetBasis.components.map((component) => {
      const row = transform.targetComponents.indexOf(component)
      return row < 0 ? Rational.zero : (output[row] ?? Rational.zero)
    }),
  })
}

/**
 * Maps a dimension of the source basis to the target basis. Exponents on
 * source components the transform does not list must be zero; target
 * components it does not list come out as zero.
 *
 * @category Operations
 * @since 0.1.0
 */
export const applyToDimension = (
  transform: BasisTransform,
  dimension: Dimension.Dimension,
): Effect.Effect<Dimension.Dimension, ShapeMismatchError | LossyProjectionError> =>
  project(transform, dimension)

/**
 * Exponents of a source-basis dimension on the transform's source components,
 * in transform order.
 *
 * @category Operations
 * @since 0.1.0
 */
export const sourceExponents = (
  transform: BasisTransform,
  dimension: Dimension.Dimension,
): ReadonlyArray<Rational.Rational> =>
  transform.sourceComponents.map(
    (component) => dimension.exponents[Dimension.indexOf(transform.source.basis, component)] ?? Rational.zero,
  )

/**
 * Same systems, same components, same matrix.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const equals = (left: BasisTransform, right: BasisTransform): boolean =>
  left.source.name === right.source.name &&
  left.target.name === right.target.name &&
  sameList(left.sourceComponents, right.sourceComponents) &&
  sameList(left.targetComponents, right.targetComponents) &&
  Matrix.equals(left.matrix, right.matrix)

const sameList = (left: ReadonlyArray<string>, right: ReadonlyArray<string>): boolean =>
  left.length === right.length && left.every((value, index) => right[index] === value)
