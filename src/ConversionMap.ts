/**
 * Exact linear and affine maps between the numeric values of two units.
 *
 * A map is `v ↦ scale · v + offset` with both coefficients held as rationals.
 * Linear maps (offset zero) cover most conversions; temperature-like units with
 * shifted zero points need the affine form. Maps are immutable: composition
 * and inversion always build a new map, and because the coefficients are exact
 * a long chain of compositions is exactly the product of its parts.
 *
 * @since 0.1.0
 */

import { Data, Effect, Option } from "effect"
import { InexactScaleError, NonInvertibleMapError, NonLinearCalibrationError } from "./Errors.js"
import * as Rational from "./Rational.js"

/**
 * @category Models
 * @since 0.1.0
 */
export class ConversionMap extends Data.Class<{
  readonly scale: Rational.Rational
  readonly offset: Rational.Rational
}> {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const affine = (scale: Rational.RationalInput, offset: Rational.RationalInput): ConversionMap =>
  new ConversionMap({ scale: Rational.from(scale), offset: Rational.from(offset) })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const linear = (scale: Rational.RationalInput): ConversionMap => affine(scale, Rational.zero)

/**
 * @category Constructors
 * @since 0.1.0
 */
export const identity: ConversionMap = linear(Rational.one)

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isLinear = (map: ConversionMap): boolean => Rational.isZero(map.offset)

/**
 * @category Predicates
 * @since 0.1.0
 */
export const equals = (left: ConversionMap, right: ConversionMap): boolean =>
  Rational.equals(left.scale, right.scale) && Rational.equals(left.offset, right.offset)

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isIdentity = (map: ConversionMap): boolean => equals(map, identity)

/**
 * Applies the map to a floating point value.
 *
 * @category Operations
 * @since 0.1.0
 */
export const apply = (map: ConversionMap, value: number): number =>
  Rational.toNumber(map.scale) * value + Rational.toNumber(map.offset)

/**
 * Applies the map without leaving exact arithmetic.
 *
 * @category Operations
 * @since 0.1.0
 */
export const applyExact = (map: ConversionMap, value: Rational.Rational): Rational.Rational =>
  Rational.add(Rational.multiply(map.scale, value), map.offset)

/**
 * `outer ∘ inner`: `inner` is applied first.
 *
 * @category Operations
 * @since 0.1.0
 */
export const compose = (outer: ConversionMap, inner: ConversionMap): ConversionMap =>
  new ConversionMap({
    scale: Rational.multiply(outer.scale, inner.scale),
    offset: Rational.add(Rational.multiply(outer.scale, inner.offset), outer.offset),
  })

/**
 * `(1/scale, -offset/scale)`; fails when the scale is zero.
 *
 * @category Operations
 * @since 0.1.0
 */
export const invert = (map: ConversionMap): Effect.Effect<ConversionMap, NonInvertibleMapError> =>
  Option.match(Rational.reciprocal(map.scale), {
    onNone: () => Effect.fail(new NonInvertibleMapError({ map: format(map) })),
    onSome: (inverse) =>
      Effect.succeed(
        new ConversionMap({
          scale: inverse,
          offset: Rational.negate(Rational.multiply(map.offset, inverse)),
        }),
      ),
  })

/**
 * Raises a map to a rational power, as needed when a calibration between base
 * units is applied to a composite unit (`metre → foot` squared for areas).
 * Affine maps only support `1` and `-1`.
 *
 * @category Operations
 * @since 0.1.0
 */
export const power = (
  map: ConversionMap,
  exponent: Rational.RationalInput,
): Effect.Effect<ConversionMap, NonLinearCalibrationError | InexactScaleError | NonInvertibleMapError> => {
  const n = Rational.from(exponent)
  if (!isLinear(map)) {
    if (Rational.equals(n, Rational.one)) {
      return Effect.succeed(map)
    }
    if (Rational.equals(n, Rational.negate(Rational.one))) {
      return invert(map)
    }
    return Effect.fail(new NonLinearCalibrationError({ map: format(map), exponent: Rational.format(n) }))
  }
  if (Rational.isZero(map.scale) && n.numerator < 0n) {
    return Effect.fail(new NonInvertibleMapError({ map: format(map) }))
  }
  return Option.match(Rational.powRational(map.scale, n), {
    onNone: () =>
      Effect.fail(
        new InexactScaleError({ scale: Rational.format(map.scale), exponent: Rational.format(n) }),
      ),
    onSome: (scale) => Effect.succeed(linear(scale)),
  })
}

/**
 * `"×42"`, `"×9/5 + 32"`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const format = (map: ConversionMap): string => {
  const scale = `×${Rational.format(map.scale)}`
  if (isLinear(map)) {
    return scale
  }
  const negative = map.offset.numerator < 0n
  const magnitude = negative ? Rational.negate(map.offset) : map.offset
  return `${scale} ${negative ? "-" : "+"} ${Rational.format(magnitude)}`
}
