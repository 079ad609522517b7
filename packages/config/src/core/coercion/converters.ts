import type { Converter } from "../../ports/converter"
import type { TargetKind, TargetType, ValueClass } from "../../ports/value-type"
import { enumMember } from "./enum-members"
import { parseBoolean, parseFloating, parseIntegral, parseLong } from "./numeric"

type TargetOf<K extends TargetKind> = Extract<TargetType, { kind: K }>

function isKind<K extends TargetKind>(
  type: TargetType,
  kinds: readonly K[],
): type is TargetOf<K> {
  return kinds.some((kind) => kind === type.kind)
}

/**
 * Builds a converter for the given target kinds.
 *
 * @example
 * ```ts
 * const durations = defineConverter("duration", ["class"], (type, raw) =>
 *   type.valueClass === Duration ? Duration.parse(raw) : undefined,
 * )
 * ```
 */
export function defineConverter<K extends TargetKind>(
  name: string,
  kinds: readonly K[],
  convert: (type: TargetOf<K>, raw: string) => unknown,
): Converter {
  return {
    name,
    appliesTo: (type) => isKind(type, kinds),
    convert: (type, raw) => (isKind(type, kinds) ? convert(type, raw) : undefined),
  }
}

/**
 * An own or inherited static `valueOf(string)`. `Function.prototype.valueOf`,
 * which every class inherits, does not count.
 */
function staticFactory(valueClass: ValueClass): ((raw: string) => unknown) | undefined {
  const factory: unknown = Reflect.get(valueClass, "valueOf")

  if (typeof factory !== "function" || factory === Function.prototype.valueOf) {
    return undefined
  }

  return (raw) => factory.call(valueClass, raw)
}

export const stringConverter = defineConverter("string", ["string"], (_, raw) => raw)

export const booleanConverter = defineConverter("boolean", ["boolean"], (_, raw) =>
  parseBoolean(raw),
)

export const integralConverter = defineConverter("integral", ["integer"], (type, raw) =>
  parseIntegral(raw, type.width),
)

export const longConverter = defineConverter("long", ["long"], (_, raw) => parseLong(raw))

export const floatingConverter = defineConverter(
  "floating-point",
  ["float", "double"],
  (type, raw) => parseFloating(raw, type.kind),
)

export const enumConverter = defineConverter("enum", ["enum"], (type, raw) =>
  enumMember(type.members, raw),
)

export const staticFactoryConverter = defineConverter(
  "static-factory",
  ["class"],
  ({ valueClass }, raw) => {
    const factory = staticFactory(valueClass)

    if (!factory) return undefined

    const value = factory(raw)

    return value instanceof valueClass ? value : undefined
  },
)

/**
 * `new ValueClass(raw)` for classes whose constructor declares exactly one
 * parameter. Optional parameters count too, so `constructor(raw, opts?)`,
 * `Date` and `RegExp` are not built here; register a converter for them.
 */
export const stringConstructorConverter = defineConverter(
  "string-constructor",
  ["class"],
  ({ valueClass }, raw): unknown =>
    valueClass.length === 1 ? Reflect.construct(valueClass, [raw]) : undefined,
)

/**
 * Built-in converters in resolution order.
 */
export const builtinConverters: readonly Converter[] = Object.freeze([
  stringConverter,
  booleanConverter,
  integralConverter,
  longConverter,
  floatingConverter,
  enumConverter,
  staticFactoryConverter,
  stringConstructorConverter,
])
