/**
 * Exact rational arithmetic on arbitrary precision integers.
 *
 * Every conversion coefficient, dimension exponent and matrix entry in the
 * library is a `Rational`, so composing maps or inverting a basis transform
 * never accumulates floating point error. Values are always normalised: the
 * denominator is positive and shares no factor with the numerator, which makes
 * structural equality (`Equal.equals`) coincide with numeric equality.
 *
 * @since 0.1.0
 */

import { Data, Option, ParseResult, Schema } from "effect"
import { InvalidRationalError } from "./Errors.js"
import { abs, bitLength, exactRoot, gcd } from "./internal/bigint.js"

/**
 * @category Models
 * @since 0.1.0
 */
export class Rational extends Data.Class<{
  readonly numerator: bigint
  readonly denominator: bigint
}> {}

/**
 * Values accepted wherever an exact coefficient is expected.
 *
 * @category Models
 * @since 0.1.0
 */
export type RationalInput = Rational | bigint | number | string

const normalize = (numerator: bigint, denominator: bigint): Rational => {
  const sign = denominator < 0n ? -1n : 1n
  const divisor = gcd(numerator, denominator)
  return new Rational({
    numerator: (sign * numerator) / divisor,
    denominator: (sign * denominator) / divisor,
  })
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const make = (numerator: bigint, denominator: bigint = 1n): Rational => {
  if (denominator === 0n) {
    throw new InvalidRationalError({
      input: `${numerator}/${denominator}`,
      reason: "denominator must not be zero",
    })
  }
  return normalize(numerator, denominator)
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const zero: Rational = make(0n)

/**
 * @category Constructors
 * @since 0.1.0
 */
export const one: Rational = make(1n)

const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/
const FRACTION = /^([+-]?\d+)\s*\/\s*([+-]?\d+)$/
const MAX_DECIMAL_EXPONENT = 4096

const parseDecimal = (input: string): Rational | undefined => {
  const match = DECIMAL.exec(input)
  if (!match) {
    return undefined
  }
  const [, sign = "", whole = "", fraction = "", exponent = "0"] = match
  if (whole.length === 0 && fraction.length === 0) {
    return undefined
  }
  if (Math.abs(Number(exponent)) > MAX_DECIMAL_EXPONENT) {
    throw new InvalidRationalError({
      input,
      reason: `exponent must be between -${MAX_DECIMAL_EXPONENT} and ${MAX_DECIMAL_EXPONENT}`,
    })
  }
  const digits = BigInt(`${whole}${fraction}` || "0")
  const shift = Number(exponent) - fraction.length
  const signed = sign === "-" ? -digits : digits
  return shift >= 0
    ? normalize(signed * 10n ** BigInt(shift), 1n)
    : normalize(signed, 10n ** BigInt(-shift))
}

const parseString = (input: string): Rational | undefined => {
  const trimmed = input.trim()
  const fraction = FRACTION.exec(trimmed)
  if (fraction) {
    const [, numerator = "", denominator = ""] = fraction
    const den = BigInt(denominator)
    return den === 0n ? undefined : normalize(BigInt(numerator), den)
  }
  return parseDecimal(trimmed)
}

/**
 * Builds a rational from any {@link RationalInput}. Finite numbers are read
 * through their shortest decimal representation, so `from(0.3048)` is exactly
 * `381/1250`. Strings accept decimals, exponent notation and `p/q`.
 *
 * Throws {@link InvalidRationalError} on `NaN`, infinities, zero denominators
 * and unparsable strings; use {@link RationalFromInput} to decode untrusted
 * input instead.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const from = (input: RationalInput): Rational => {
  if (input instanceof Rational) {
    return input
  }
  if (typeof input === "bigint") {
    return make(input)
  }
  if (typeof input === "number" && !Number.isFinite(input)) {
    throw new InvalidRationalError({ input: String(input), reason: "value must be finite" })
  }
  const parsed = parseString(String(input))
  if (parsed === undefined) {
    throw new InvalidRationalError({ input: String(input), reason: "not a decimal or p/q fraction" })
  }
  return parsed
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isRational = (value: unknown): value is Rational => value instanceof Rational

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const add = (left: Rational, right: Rational): Rational =>
  normalize(
    left.numerator * right.denominator + right.numerator * left.denominator,
    left.denominator * right.denominator,
  )

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const negate = (value: Rational): Rational =>
  new Rational({ numerator: -value.numerator, denominator: value.denominator })

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const subtract = (left: Rational, right: Rational): Rational => add(left, negate(right))

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const multiply = (left: Rational, right: Rational): Rational =>
  normalize(left.numerator * right.numerator, left.denominator * right.denominator)

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const reciprocal = (value: Rational): Option.Option<Rational> =>
  value.numerator === 0n ? Option.none() : Option.some(normalize(value.denominator, value.numerator))

/**
 * Division by zero is a defect: callers check {@link isZero} first.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const divide = (left: Rational, right: Rational): Rational =>
  make(left.numerator * right.denominator, left.denominator * right.numerator)

/**
 * Integer power. A negative exponent of zero is a defect.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const pow = (base: Rational, exponent: number): Rational => {
  if (!Number.isInteger(exponent)) {
    throw new InvalidRationalError({ input: String(exponent), reason: "exponent must be an integer" })
  }
  const magnitude = BigInt(Math.abs(exponent))
  const raised = normalize(base.numerator ** magnitude, base.denominator ** magnitude)
  return exponent >= 0 ? raised : divide(one, raised)
}

/**
 * Exact `degree`-th root, or `Option.none()` when it is irrational.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const root = (value: Rational, degree: bigint): Option.Option<Rational> => {
  const numerator = exactRoot(value.numerator, degree)
  const denominator = exactRoot(value.denominator, degree)
  return numerator === undefined || denominator === undefined
    ? Option.none()
    : Option.some(normalize(numerator, denominator))
}

/**
 * `base^(p/q)` when the result is rational.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const powRational = (base: Rational, exponent: Rational): Option.Option<Rational> => {
  if (isZero(base) && exponent.numerator < 0n) {
    return Option.none()
  }
  return Option.map(root(base, exponent.denominator), (rooted) =>
    pow(rooted, Number(exponent.numerator)),
  )
}

/**
 * @category Predicates
 * @since 0.1.0
 */
export const equals = (left: Rational, right: Rational): boolean =>
  left.numerator === right.numerator && left.denominator === right.denominator

/**
 * @category Predicates
 * @since 0.1.0
 */
export const compare = (left: Rational, right: Rational): -1 | 0 | 1 => {
  const difference = left.numerator * right.denominator - right.numerator * left.denominator
  return difference < 0n ? -1 : difference > 0n ? 1 : 0
}

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isZero = (value: Rational): boolean => value.numerator === 0n

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isPositive = (value: Rational): boolean => value.numerator > 0n

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isInteger = (value: Rational): boolean => value.denominator === 1n

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

/**
 * @category Conversions
 * @since 0.1.0
 */
export const toNumber = (value: Rational): number => {
  const { numerator, denominator } = value
  if (denominator === 1n) {
    return Number(numerator)
  }
  if (abs(numerator) <= MAX_SAFE && denominator <= MAX_SAFE) {
    return Number(numerator) / Number(denominator)
  }
  // 64-bit quotient, then the binary exponent; the scaling is split so that
  // neither power of two overflows on its own.
  const shift = bitLength(denominator) - bitLength(numerator) + 64
  const quotient = shift >= 0
    ? (numerator << BigInt(shift)) / denominator
    : numerator / (denominator << BigInt(-shift))
  const half = Math.trunc(shift / 2)
  return Number(quotient) * 2 ** -half * 2 ** -(shift - half)
}

/**
 * `"3/2"`, `"-4"`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const format = (value: Rational): string =>
  value.denominator === 1n ? `${value.numerator}` : `${value.numerator}/${value.denominator}`

/**
 * @category Schemas
 * @since 0.1.0
 */
export const RationalFromSelf: Schema.Schema<Rational> = Schema.declare(isRational, {
  identifier: "Rational",
})

/**
 * Decodes an already-deserialized number or string (`"0.25"`, `"3/2"`,
 * `"1e-3"`) into an exact rational; encodes back to the `p/q` string form.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const RationalFromInput: Schema.Schema<Rational, string | number> = Schema.transformOrFail(
  Schema.Union(Schema.String, Schema.Number),
  RationalFromSelf,
  {
    strict: true,
    decode: (input, _, ast) => {
      try {
        return ParseResult.succeed(from(input))
      } catch (error) {
        return ParseResult.fail(
          new ParseResult.Type(
            ast,
            input,
            error instanceof InvalidRationalError ? error.message : String(error),
          ),
        )
      }
    },
    encode: (value) => ParseResult.succeed(format(value)),
  },
)
