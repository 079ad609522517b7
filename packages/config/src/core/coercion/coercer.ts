import type { Coercer, Converter } from "../../ports/converter"
import type { TargetType } from "../../ports/value-type"
import { builtinConverters } from "./converters"

export type CoercerOptions = {
  /** Tried before the built-in converters, in order */
  converters?: readonly Converter[]
}

/**
 * Tries each applicable converter in order. A converter that throws, or
 * returns `undefined` or `null`, does not apply and the next one is tried.
 */
class RegistryCoercer implements Coercer {
  constructor(private readonly converters: readonly Converter[]) {}

  coerce(type: TargetType, raw: string): unknown {
    for (const converter of this.converters) {
      if (!converter.appliesTo(type)) continue

      let value: unknown

      try {
        value = converter.convert(type, raw)
      } catch {
        continue
      }

      if (value != null) return value
    }

    return undefined
  }
}

export function createCoercer(options: CoercerOptions = {}): Coercer {
  return new RegistryCoercer([...(options.converters ?? []), ...builtinConverters])
}
