import type { ConfigClass, ConfigurationMetadata } from "./metadata"
import type { ProblemMonitor } from "./problem"

/**
 * Derives the bindable attributes of a configuration class.
 *
 * Invalid definitions are not thrown; they are recorded as `structural`
 * errors on the returned metadata's `problems`, which forward to `monitor`.
 * Throwing is reserved for failures of the provider itself.
 */
export interface MetadataProvider {
  extract<T>(configClass: ConfigClass<T>, monitor: ProblemMonitor): ConfigurationMetadata<T>
}
