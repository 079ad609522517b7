import type { AttributeMetadata } from "../../ports/metadata"
import type { ProblemSink } from "../../ports/problem"
import type { PropertyMap } from "../../ports/property-map"

export type OperativeProperty = Readonly<{
  key: string
  value: string
}>

export type ResolvableAttribute = Pick<
  AttributeMetadata<unknown>,
  "propertyName" | "deprecatedNames"
>

/**
 * Picks the one property-map entry that supplies an attribute's value.
 *
 * The canonical key wins when present; otherwise the first deprecated name
 * that has a value. Every deprecated name in use is reported as a warning,
 * and a deprecated value that differs from the operative one as an error.
 */
export class PropertyResolver {
  constructor(
    private readonly properties: PropertyMap,
    private readonly used: Set<string> = new Set(),
  ) {}

  /**
   * @param prefix - already normalized, i.e. empty or ending with "."
   * @returns `undefined` when no key has a value, when the attribute has no
   * property name, or when resolving it recorded an error
   */
  resolve(
    attribute: ResolvableAttribute,
    prefix: string,
    problems: ProblemSink,
  ): OperativeProperty | undefined {
    if (attribute.propertyName === undefined) return undefined

    const canonicalKey = prefix + attribute.propertyName
    const errorsBefore = problems.errors().length

    let operativeKey = canonicalKey
    let operativeValue = this.lookup(canonicalKey)

    for (const deprecatedName of attribute.deprecatedNames) {
      const key = prefix + deprecatedName
      const value = this.lookup(key)

      if (value === undefined) continue

      problems.addWarning(
        "deprecation",
        `Configuration property '${key}' has been deprecated. Use '${canonicalKey}' instead.`,
      )

      if (operativeValue === undefined) {
        operativeKey = key
        operativeValue = value
      } else if (value !== operativeValue) {
        problems.addError(
          "conflict",
          `Value for property '${key}' (=${value}) conflicts with property '${operativeKey}' (=${operativeValue})`,
        )
      }
    }

    if (operativeValue === undefined || problems.errors().length > errorsBefore) {
      return undefined
    }

    return { key: operativeKey, value: operativeValue }
  }

  private lookup(key: string): string | undefined {
    if (!Object.hasOwn(this.properties, key)) return undefined

    this.used.add(key)
    return this.properties[key]
  }
}
