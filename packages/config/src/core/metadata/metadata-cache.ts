import { BaseError } from "@bindery/errors"
import type { Logger } from "@bindery/logger"
import type { ConfigClass, ConfigurationMetadata } from "../../ports/metadata"
import type { MetadataProvider } from "../../ports/metadata-provider"
import type { ProblemMonitor } from "../../ports/problem"

export type MetadataCacheDeps = {
  provider: MetadataProvider
  monitor: ProblemMonitor
  logger: Logger
}

/**
 * Memoizes {@link MetadataProvider} results per configuration class.
 *
 * - Entries are keyed weakly by the class: a cached class can still be
 *   garbage collected, and its metadata with it.
 * - Metadata is computed at most once per class. A provider that asks for
 *   the class it is still computing gets an error instead of a second run.
 * - A provider that throws leaves no entry behind; the next call retries.
 *   Metadata carrying structural problems is a result and is cached.
 */
export class MetadataCache {
  private readonly entries = new WeakMap<object, ConfigurationMetadata<unknown>>()
  private readonly computing = new WeakSet<object>()

  constructor(private readonly deps: MetadataCacheDeps) {}

  get<T>(configClass: ConfigClass<T>): ConfigurationMetadata<T> {
    const cached = this.entries.get(configClass) as ConfigurationMetadata<T> | undefined

    if (cached) return cached

    if (this.computing.has(configClass)) {
      throw new BaseError(
        `Metadata for configuration class [${configClass.name}] is already being computed`,
        {
          code: "metadata_recursion",
          context: { configType: configClass.name },
          isOperational: false,
        },
      )
    }

    this.computing.add(configClass)

    try {
      const metadata = this.deps.provider.extract(configClass, this.deps.monitor)

      this.entries.set(configClass, metadata)
      this.deps.logger.debug("Computed configuration metadata", {
        configType: configClass.name,
        attributes: metadata.attributes.size,
        structuralErrors: metadata.problems.errors().length,
      })

      return metadata
    } finally {
      this.computing.delete(configClass)
    }
  }

  has(configClass: ConfigClass<unknown>): boolean {
    return this.entries.has(configClass)
  }
}
