export type IntegralWidth = "byte" | "short" | "int"

/**
 * A TypeScript `enum` object or an `as const` record of members.
 */
export type EnumLike = Readonly<Record<string, string | number>>

/**
 * Value of an {@link EnumLike}, ignoring the reverse mappings of numeric enums.
 */
export type EnumValue<E extends EnumLike> = E[Exclude<keyof E, number>]

/**
 * A class whose instances can be made from a string, through either an own
 * static `valueOf(string)` or a constructor taking the string.
 */
export type ValueClass<T = unknown> = abstract new (...args: never[]) => T

export type TargetType =
  | { readonly kind: "string" }
  | { readonly kind: "boolean" }
  | { readonly kind: "integer"; readonly width: IntegralWidth }
  | { readonly kind: "long" }
  | { readonly kind: "float" }
  | { readonly kind: "double" }
  | { readonly kind: "enum"; readonly members: EnumLike }
  | { readonly kind: "class"; readonly valueClass: ValueClass }

export type TargetKind = TargetType["kind"]

/**
 * The declared type of an attribute's setter argument.
 *
 * `name` is what diagnostics print (`int`, `LogLevel`, `URL`), and `accepts`
 * is the runtime check that guards the typed setter.
 */
export type ValueType<T> = TargetType & {
  readonly name: string
  accepts(value: unknown): value is T
}
