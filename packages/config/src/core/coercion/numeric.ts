import type { IntegralWidth } from "../../ports/value-type"

const INTEGER_PATTERN = /^[+-]?\d+$/

const FLOATING_PATTERN = /^[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?[fFdD]?)$/

export const INTEGRAL_RANGES: Record<IntegralWidth, readonly [min: number, max: number]> = {
  byte: [-128, 127],
  short: [-32_768, 32_767],
  int: [-2_147_483_648, 2_147_483_647],
}

const LONG_MIN = -(2n ** 63n)
const LONG_MAX = 2n ** 63n - 1n

export function parseBoolean(raw: string): boolean | undefined {
  switch (raw.toLowerCase()) {
    case "true":
      return true
    case "false":
      return false
    default:
      return undefined
  }
}

/**
 * Decimal integer with an optional sign and no whitespace, within the range
 * of `width`.
 */
export function parseIntegral(raw: string, width: IntegralWidth): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) return undefined

  const [min, max] = INTEGRAL_RANGES[width]
  const value = Number(raw)

  if (value < min || value > max) return undefined

  // "-0" parses to negative zero
  return value + 0
}

export function parseLong(raw: string): bigint | undefined {
  if (!INTEGER_PATTERN.test(raw)) return undefined

  const value = BigInt(raw)

  return value < LONG_MIN || value > LONG_MAX ? undefined : value
}

/**
 * Decimal floating point: surrounding whitespace is ignored, an exponent and
 * an `f`/`d` suffix are allowed, and `NaN` and `Infinity` may be signed.
 * `float` values are rounded to single precision, so overflow yields
 * `Infinity` rather than a failure.
 */
export function parseFloating(raw: string, precision: "float" | "double"): number | undefined {
  const text = raw.trim()

  if (!FLOATING_PATTERN.test(text)) return undefined

  const value = Number(text.replace(/[fFdD]$/, ""))

  return precision === "float" ? Math.fround(value) : value
}
