import type { AttributeDefinition, ConfigDefinition } from "../../ports/metadata"
import type { ValueType } from "../../ports/value-type"

export type AttributeOptions<I, T> = {
  /** External key, relative to the build prefix. Omit for attributes never read from properties. */
  property?: string
  /** Legacy keys, checked in order when `property` has no value */
  deprecated?: readonly string[]
  type: ValueType<T>
  set: (instance: I, value: T) => void
  /** Name shown in diagnostics. Defaults to `set` + the capitalized attribute name. */
  setterName?: string
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (typeof value === "object" || typeof value === "function") {
    return value.constructor?.name ?? typeof value
  }
  return typeof value
}

function defaultSetterName(attribute: string): string {
  return `set${attribute.charAt(0).toUpperCase()}${attribute.slice(1)}`
}

export class ConfigDefinitionBuilder<I> {
  private readonly attributes: AttributeDefinition<I>[] = []

  attribute<T>(name: string, options: AttributeOptions<I, T>): this {
    const { type, set } = options

    this.attributes.push({
      name,
      property: options.property,
      deprecated: [...(options.deprecated ?? [])],
      setter: {
        name: options.setterName ?? defaultSetterName(name),
        type,
        apply(instance, value) {
          if (!type.accepts(value)) {
            throw new TypeError(
              `Expected a value of type ${type.name} but got ${describeValue(value)}`,
            )
          }

          set(instance, value)
        },
      },
    })

    return this
  }

  build(): ConfigDefinition<I> {
    return Object.freeze({ attributes: Object.freeze([...this.attributes]) })
  }
}

/**
 * Starts the attribute definition of a configuration class.
 *
 * @example
 * ```ts
 * class ServerConfig {
 *   port = 80
 *
 *   static readonly configuration = describeConfig<ServerConfig>()
 *     .attribute("port", {
 *       property: "port",
 *       deprecated: ["old-port"],
 *       type: types.int,
 *       set: (config, value) => {
 *         config.port = value
 *       },
 *     })
 *     .build()
 * }
 * ```
 */
export function describeConfig<I>(): ConfigDefinitionBuilder<I> {
  return new ConfigDefinitionBuilder<I>()
}
