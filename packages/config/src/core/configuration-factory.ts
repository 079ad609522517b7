import { createNullLogger, type Logger } from "@bindery/logger"
import { DefinitionMetadataProvider } from "../adapters/definition/definition-metadata-provider"
import { NULL_MONITOR } from "../adapters/null/null-monitor"
import type { Coercer } from "../ports/converter"
import type { AttributeMetadata, ConfigClass, ConfigurationMetadata } from "../ports/metadata"
import type { MetadataProvider } from "../ports/metadata-provider"
import type { ProblemMonitor, ProblemSink } from "../ports/problem"
import type { PropertyMap, PropertySource } from "../ports/property-map"
import { createCoercer } from "./coercion/coercer"
import { MetadataCache } from "./metadata/metadata-cache"
import { ConfigurationError } from "./problems/configuration-error"
import { Problems } from "./problems/problems"
import { normalizePrefix, toPropertyMap } from "./properties"
import { PropertyResolver } from "./resolution/property-resolver"

export type ConfigurationFactoryDeps = {
  /** Receives every problem as it is recorded. Defaults to discarding them. */
  monitor?: ProblemMonitor
  metadataProvider?: MetadataProvider
  coercer?: Coercer
  logger?: Logger
}

/**
 * Builds configuration objects from one immutable property map.
 *
 * @example
 * ```ts
 * const factory = new ConfigurationFactory(
 *   { "server.port": "8080" },
 *   { monitor: createLoggerMonitor(logger) },
 * )
 *
 * const server = factory.build(ServerConfig, "server")
 * server.port // 8080
 * ```
 */
export class ConfigurationFactory {
  private readonly properties: PropertyMap
  private readonly monitor: ProblemMonitor
  private readonly coercer: Coercer
  private readonly logger: Logger
  private readonly metadata: MetadataCache
  private readonly resolver: PropertyResolver
  private readonly used = new Set<string>()

  constructor(properties: PropertySource, deps: ConfigurationFactoryDeps = {}) {
    this.properties = toPropertyMap(properties)
    this.monitor = deps.monitor ?? NULL_MONITOR
    this.coercer = deps.coercer ?? createCoercer()
    this.logger = deps.logger ?? createNullLogger()
    this.metadata = new MetadataCache({
      provider: deps.metadataProvider ?? new DefinitionMetadataProvider(),
      monitor: this.monitor,
      logger: this.logger,
    })
    this.resolver = new PropertyResolver(this.properties, this.used)
  }

  getProperties(): PropertyMap {
    return this.properties
  }

  /**
   * Creates an instance of `configClass` (unless `instance` is given) and
   * applies every attribute that has a value under `prefix`.
   *
   * @throws ConfigurationError
   * - before instantiation, if the class's metadata has structural errors
   * - with a single `instantiation` problem, if the constructor throws
   * - after all attributes were processed, listing every problem of the
   *   build, if any attribute failed
   */
  build<T>(configClass: ConfigClass<T>, prefix?: string | null, instance?: T): T {
    if (configClass == null) {
      throw new TypeError("configClass is null")
    }

    const keyPrefix = normalizePrefix(prefix)

    this.logger.debug("Binding configuration", {
      configType: configClass.name,
      prefix: prefix ?? "",
    })

    const metadata = this.metadata.get(configClass)

    metadata.problems.raiseIfErrors()

    const target = instance ?? this.newInstance(metadata)
    const problems = new Problems(this.monitor)

    for (const attribute of metadata.attributes.values()) {
      this.bindAttribute(target, configClass.name, attribute, keyPrefix, problems)
    }

    problems.raiseIfErrors()

    return target
  }

  /**
   * Every key any build has read so far, canonical or deprecated.
   */
  usedProperties(): ReadonlySet<string> {
    return new Set(this.used)
  }

  /**
   * Keys of the property map no build has read, sorted.
   *
   * Useful for detecting typos and stale configuration.
   */
  unusedProperties(): string[] {
    return Object.keys(this.properties)
      .filter((key) => !this.used.has(key))
      .sort()
  }

  private newInstance<T>(metadata: ConfigurationMetadata<T>): T {
    const { configClass } = metadata

    try {
      return new configClass()
    } catch (err) {
      throw new ConfigurationError([
        {
          severity: "error",
          kind: "instantiation",
          message: `Error creating instance of configuration class [${configClass.name}]`,
          cause: err,
        },
      ])
    }
  }

  private bindAttribute<T>(
    target: T,
    className: string,
    attribute: AttributeMetadata<T>,
    prefix: string,
    problems: ProblemSink,
  ): void {
    const property = this.resolver.resolve(attribute, prefix, problems)

    if (!property) return

    const { setter } = attribute
    const signature = `${className}.${setter.name}(${setter.type.name})`
    const value = this.coercer.coerce(setter.type, property.value)

    if (value === undefined) {
      problems.addError(
        "coercion",
        `Could not coerce value '${property.value}' to ${setter.type.name} for attribute '${attribute.name}' (property '${property.key}') in [${signature}]`,
      )
      return
    }

    try {
      setter.apply(target, value)
    } catch (err) {
      problems.addError("application", `Error invoking configuration method [${signature}]`, err)
    }
  }
}
