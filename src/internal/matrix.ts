/**
 * Exact rational matrix helpers (cofactor determinant, adjugate inverse).
 *
 * Basis transforms are small (one row per base dimension), so cofactor
 * expansion is used throughout; it never divides, which keeps every
 * intermediate value exact.
 *
 * @internal
 */

import { Option } from "effect"
import * as Rational from "../Rational.js"

export type Matrix = ReadonlyArray<ReadonlyArray<Rational.Rational>>

const at = (matrix: Matrix, row: number, column: number): Rational.Rational =>
  matrix[row]?.[column] ?? Rational.zero

export const isSquare = (matrix: Matrix): boolean =>
  matrix.every((row) => row.length === matrix.length)

export const minor = (matrix: Matrix, skipRow: number, skipColumn: number): Matrix =>
  matrix
    .filter((_, row) => row !== skipRow)
    .map((row) => row.filter((_, column) => column !== skipColumn))

/**
 * Determinant of a square matrix; the empty matrix has determinant one.
 */
export const determinant = (matrix: Matrix): Rational.Rational => {
  const size = matrix.length
  if (size === 0) {
    return Rational.one
  }
  if (size === 1) {
    return at(matrix, 0, 0)
  }
  if (size === 2) {
    return Rational.subtract(
      Rational.multiply(at(matrix, 0, 0), at(matrix, 1, 1)),
      Rational.multiply(at(matrix, 0, 1), at(matrix, 1, 0)),
    )
  }
  let result = Rational.zero
  for (let column = 0; column < size; column++) {
    const entry = at(matrix, 0, column)
    if (Rational.isZero(entry)) {
      continue
    }
    const term = Rational.multiply(entry, determinant(minor(matrix, 0, column)))
    result = column % 2 === 0 ? Rational.add(result, term) : Rational.subtract(result, term)
  }
  return result
}

const cofactor = (matrix: Matrix, row: number, column: number): Rational.Rational => {
  const value = determinant(minor(matrix, row, column))
  return (row + column) % 2 === 0 ? value : Rational.negate(value)
}

/**
 * Transpose of the cofactor matrix.
 */
export const adjugate = (matrix: Matrix): Matrix => {
  if (matrix.length === 1) {
    return [[Rational.one]]
  }
  return matrix.map((_, row) => matrix.map((__, column) => cofactor(matrix, column, row)))
}

/**
 * `adj(M) / det(M)`, or `Option.none()` when the matrix is singular.
 */
export const inverse = (matrix: Matrix): Option.Option<Matrix> =>
  Option.map(Rational.reciprocal(determinant(matrix)), (scale) =>
    adjugate(matrix).map((row) => row.map((entry) => Rational.multiply(entry, scale))),
  )

export const multiplyVector = (
  matrix: Matrix,
  vector: ReadonlyArray<Rational.Rational>,
): ReadonlyArray<Rational.Rational> =>
  matrix.map((row) =>
    row.reduce(
      (sum, entry, column) => Rational.add(sum, Rational.multiply(entry, vector[column] ?? Rational.zero)),
      Rational.zero,
    ),
  )

export const equals = (left: Matrix, right: Matrix): boolean =>
  left.length === right.length &&
  left.every(
    (row, index) =>
      row.length === (right[index]?.length ?? -1) &&
      row.every((entry, column) => Rational.equals(entry, at(right, index, column))),
  )
