import type { ProblemSink } from "./problem"
import type { ValueType } from "./value-type"

/**
 * Single-argument operation that stores a coerced value on an instance.
 */
export interface Setter<I> {
  /** Name used in diagnostics, e.g. `setPort` */
  readonly name: string
  readonly type: ValueType<unknown>

  /**
   * Throws if `value` is not accepted by {@link type} or if the underlying
   * assignment throws.
   */
  apply(instance: I, value: unknown): void
}

export type AttributeDefinition<I> = Readonly<{
  name: string
  property?: string | undefined
  deprecated: readonly string[]
  setter: Setter<I>
}>

export type ConfigDefinition<I> = Readonly<{
  attributes: readonly AttributeDefinition<I>[]
}>

/**
 * A configuration class: default-constructible, optionally carrying the
 * attribute definition read by `DefinitionMetadataProvider`.
 */
export type ConfigClass<T> = (new () => T) & {
  readonly configuration?: ConfigDefinition<T>
}

export type AttributeMetadata<I> = Readonly<{
  /** Internal identifier, used in diagnostics only */
  name: string
  /** External key; `undefined` means the attribute is never read from properties */
  propertyName: string | undefined
  /** Legacy keys, in declared order */
  deprecatedNames: readonly string[]
  setter: Setter<I>
}>

export type ConfigurationMetadata<T> = Readonly<{
  configClass: ConfigClass<T>
  attributes: ReadonlyMap<string, AttributeMetadata<T>>
  /** Structural problems found while extracting the metadata */
  problems: ProblemSink
}>
