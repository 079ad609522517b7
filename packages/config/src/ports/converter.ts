import type { TargetType } from "./value-type"

/**
 * One entry of the coercion registry.
 */
export interface Converter {
  readonly name: string

  appliesTo(type: TargetType): boolean

  /**
   * @returns the converted value, or `undefined` (or `null`) when `raw`
   * cannot be converted. A throw counts as "cannot be converted".
   */
  convert(type: TargetType, raw: string): unknown
}

export interface Coercer {
  /**
   * Converts `raw` to `type` with the first applicable converter that
   * succeeds.
   *
   * @returns `undefined` when no converter produced a value
   */
  coerce(type: TargetType, raw: string): unknown
}
