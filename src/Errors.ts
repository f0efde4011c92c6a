/**
 * Error hierarchy for dimensional analysis and unit conversion.
 *
 * Every failure is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Each error keeps the offending unit keys, dimensions or
 * transform as structured data and renders them into a readable message.
 * Nothing here is retried by the library.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a value cannot be read as an exact rational (`NaN`, infinity,
 * zero denominator, unparsable string).
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidRationalError extends Data.TaggedError("InvalidRationalError")<{
  readonly input: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid rational "${this.input}": ${this.reason}`
  }
}

/**
 * Raised when exponent vectors, bases or matrices do not have the expected
 * arity, or when values from different bases are mixed.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ShapeMismatchError extends Data.TaggedError("ShapeMismatchError")<{
  readonly operation: string
  readonly reason: string
}> {
  override get message(): string {
    return `Shape mismatch in ${this.operation}: ${this.reason}`
  }
}

/**
 * Raised when a unit system's base unit is not the pure, unscaled dimension of
 * the component it is assigned to.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * // a system claiming `second` as its base unit for length
 * new InvalidBaseUnitError({ system: "SI", component: "length", unit: "second", reason: "dimension is time" })
 * ```
 */
export class InvalidBaseUnitError extends Data.TaggedError("InvalidBaseUnitError")<{
  readonly system: string
  readonly component: string
  readonly unit: string
  readonly reason: string
}> {
  override get message(): string {
    return `Unit "${this.unit}" cannot be the ${this.component} base unit of ${this.system}: ${this.reason}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class InvalidUnitError extends Data.TaggedError("InvalidUnitError")<{
  readonly name: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid unit "${this.name}": ${this.reason}`
  }
}

/**
 * Raised when a unit name or alias is already taken within a system.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DuplicateUnitNameError extends Data.TaggedError("DuplicateUnitNameError")<{
  readonly system: string
  readonly name: string
}> {
  override get message(): string {
    return `Unit name or alias "${this.name}" is already defined in ${this.system}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly system: string
  readonly name: string
}> {
  override get message(): string {
    return `Unknown unit "${this.name}" in ${this.system}`
  }
}

/**
 * Raised when a direct edge would connect units of different dimensions.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IncompatibleDimensionsError extends Data.TaggedError("IncompatibleDimensionsError")<{
  readonly src: string
  readonly dst: string
  readonly srcDimension: string
  readonly dstDimension: string
}> {
  override get message(): string {
    return `Cannot link ${this.src} [${this.srcDimension}] to ${this.dst} [${this.dstDimension}]`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class NonInvertibleMapError extends Data.TaggedError("NonInvertibleMapError")<{
  readonly map: string
}> {
  override get message(): string {
    return `Map ${this.map} is not invertible`
  }
}

/**
 * Raised when a basis transform is not square or its determinant is zero.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonInvertibleTransformError extends Data.TaggedError("NonInvertibleTransformError")<{
  readonly transform: string
  readonly reason: string
}> {
  override get message(): string {
    return `Basis transform ${this.transform} is not invertible: ${this.reason}`
  }
}

/**
 * Raised when a dimension has a non-zero exponent on a component the
 * transform does not map.
 *
 * @category Errors
 * @since 0.1.0
 */
export class LossyProjectionError extends Data.TaggedError("LossyProjectionError")<{
  readonly transform: string
  readonly component: string
}> {
  override get message(): string {
    return `Basis transform ${this.transform} cannot represent component "${this.component}"`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class MissingCalibrationError extends Data.TaggedError("MissingCalibrationError")<{
  readonly transform: string
  readonly component: string
}> {
  override get message(): string {
    return `Basis transform ${this.transform} has no calibration edge for "${this.component}"`
  }
}

/**
 * Raised when an affine map would have to be raised to a power other than
 * `1` or `-1`.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonLinearCalibrationError extends Data.TaggedError("NonLinearCalibrationError")<{
  readonly map: string
  readonly exponent: string
}> {
  override get message(): string {
    return `Affine map ${this.map} cannot be raised to ${this.exponent}`
  }
}

/**
 * Raised when a fractional exponent of a scale has no exact rational value.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InexactScaleError extends Data.TaggedError("InexactScaleError")<{
  readonly scale: string
  readonly exponent: string
}> {
  override get message(): string {
    return `Scale ${this.scale} raised to ${this.exponent} is not rational`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class NoConversionPathError extends Data.TaggedError("NoConversionPathError")<{
  readonly src: string
  readonly dst: string
  readonly reason: string
}> {
  override get message(): string {
    return `No conversion from ${this.src} to ${this.dst}: ${this.reason}`
  }
}

/**
 * Raised when two units' dimensions are neither equal nor related by a known
 * basis transform.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly src: string
  readonly dst: string
  readonly srcDimension: string
  readonly dstDimension: string
}> {
  override get message(): string {
    return `Cannot convert ${this.src} [${this.srcDimension}] to ${this.dst} [${this.dstDimension}]: dimensions do not match`
  }
}

/**
 * Raised when an edge between two units is registered again with a different
 * map.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DuplicateEdgeError extends Data.TaggedError("DuplicateEdgeError")<{
  readonly src: string
  readonly dst: string
  readonly existing: string
  readonly attempted: string
}> {
  override get message(): string {
    return `Edge ${this.src} -> ${this.dst} already maps ${this.existing}, refusing ${this.attempted}`
  }
}

/**
 * Union of failures raised while registering edges.
 *
 * @category Errors
 * @since 0.1.0
 */
export type RegistrationError =
  | IncompatibleDimensionsError
  | NonInvertibleMapError
  | DuplicateEdgeError
  | DuplicateUnitNameError

/**
 * Union of failures raised while connecting two unit systems.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ConnectionError =
  | RegistrationError
  | NonInvertibleTransformError
  | MissingCalibrationError
  | NonLinearCalibrationError
  | InexactScaleError
  | LossyProjectionError
  | ShapeMismatchError

/**
 * Union of failures raised while resolving a conversion.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ConversionError = NoConversionPathError | DimensionMismatchError
