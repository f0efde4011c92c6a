/**
 * Pure bigint helpers backing the exact rational arithmetic.
 *
 * @internal
 */

export const abs = (value: bigint): bigint => (value < 0n ? -value : value)

/**
 * Number of binary digits of `|value|`, zero for zero.
 */
export const bitLength = (value: bigint): number => (value === 0n ? 0 : abs(value).toString(2).length)

export const gcd = (left: bigint, right: bigint): bigint => {
  let a = abs(left)
  let b = abs(right)
  while (b !== 0n) {
    const next = a % b
    a = b
    b = next
  }
  return a
}

/**
 * Largest integer `r` with `r^degree <= value`, for non-negative `value`.
 */
export const floorRoot = (value: bigint, degree: bigint): bigint => {
  if (value < 2n || degree === 1n) {
    return value
  }
  // Newton iteration from an upper bound; converges monotonically downwards.
  const bits = BigInt(value.toString(2).length)
  let current = 1n << (bits / degree + 1n)
  for (;;) {
    const next = ((degree - 1n) * current + value / current ** (degree - 1n)) / degree
    if (next >= current) {
      return current
    }
    current = next
  }
}

/**
 * Exact integer root, or `undefined` when `value` is not a perfect power.
 * Odd degrees accept negative values.
 */
export const exactRoot = (value: bigint, degree: bigint): bigint | undefined => {
  if (degree <= 0n) {
    return undefined
  }
  if (value < 0n) {
    if (degree % 2n === 0n) {
      return undefined
    }
    const positive = exactRoot(-value, degree)
    return positive === undefined ? undefined : -positive
  }
  const candidate = floorRoot(value, degree)
  return candidate ** degree === value ? candidate : undefined
}
