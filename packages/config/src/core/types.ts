import type {
  EnumLike,
  EnumValue,
  IntegralWidth,
  ValueClass,
  ValueType,
} from "../ports/value-type"
import { enumMemberValues } from "./coercion/enum-members"
import { INTEGRAL_RANGES } from "./coercion/numeric"

function integral(width: IntegralWidth): ValueType<number> {
  const [min, max] = INTEGRAL_RANGES[width]

  return {
    kind: "integer",
    width,
    name: width,
    accepts: (value): value is number =>
      typeof value === "number" && Number.isInteger(value) && value >= min && value <= max,
  }
}

function floating(kind: "float" | "double"): ValueType<number> {
  return {
    kind,
    name: kind,
    accepts: (value): value is number => typeof value === "number",
  }
}

const string: ValueType<string> = {
  kind: "string",
  name: "string",
  accepts: (value): value is string => typeof value === "string",
}

const boolean: ValueType<boolean> = {
  kind: "boolean",
  name: "boolean",
  accepts: (value): value is boolean => typeof value === "boolean",
}

const long: ValueType<bigint> = {
  kind: "long",
  name: "long",
  accepts: (value): value is bigint => typeof value === "bigint",
}

function enumOf<E extends EnumLike>(name: string, members: E): ValueType<EnumValue<E>> {
  const values = new Set<unknown>(enumMemberValues(members))

  return {
    kind: "enum",
    members,
    name,
    accepts: (value): value is EnumValue<E> => values.has(value),
  }
}

/**
 * Values are made by the class's own static `valueOf(string)`, else by
 * `new valueClass(raw)` when the constructor declares exactly one parameter.
 * Classes that take more, optional ones included, need a converter
 * registered through `createCoercer({ converters })`.
 */
function classOf<T>(valueClass: ValueClass<T>, name: string = valueClass.name): ValueType<T> {
  return {
    kind: "class",
    valueClass,
    name,
    accepts: (value): value is T => value instanceof valueClass,
  }
}

/**
 * Declared types of setter arguments.
 *
 * @example
 * ```ts
 * types.int                          // number in [-2^31, 2^31 - 1]
 * types.long                         // bigint
 * types.enumOf("LogLevel", LogLevel) // member looked up by name
 * types.classOf(URL)                 // built with `new URL(raw)`
 * ```
 */
export const types = {
  string,
  boolean,
  byte: integral("byte"),
  short: integral("short"),
  int: integral("int"),
  long,
  float: floating("float"),
  double: floating("double"),
  enumOf,
  classOf,
} as const
