export {
  createDefinitionMetadataProvider,
  DefinitionMetadataProvider,
} from "./adapters/definition/definition-metadata-provider"
export { createLoggerMonitor, LoggerMonitor } from "./adapters/logger/logger-monitor"
export { MemoryMonitor } from "./adapters/memory/memory-monitor"
export { NULL_MONITOR, NullMonitor } from "./adapters/null/null-monitor"
export { createCoercer } from "./core/coercion/coercer"
export type { CoercerOptions } from "./core/coercion/coercer"
export { builtinConverters, defineConverter } from "./core/coercion/converters"
export { ConfigurationFactory } from "./core/configuration-factory"
export type { ConfigurationFactoryDeps } from "./core/configuration-factory"
export { ConfigDefinitionBuilder, describeConfig } from "./core/definition/describe-config"
export type { AttributeOptions } from "./core/definition/describe-config"
export { MetadataCache } from "./core/metadata/metadata-cache"
export type { MetadataCacheDeps } from "./core/metadata/metadata-cache"
export { ConfigurationError } from "./core/problems/configuration-error"
export { Problems } from "./core/problems/problems"
export { normalizePrefix, toPropertyMap } from "./core/properties"
export { PropertyResolver } from "./core/resolution/property-resolver"
export type { OperativeProperty, ResolvableAttribute } from "./core/resolution/property-resolver"
export { types } from "./core/types"
export type { Coercer, Converter } from "./ports/converter"
export type {
  AttributeDefinition,
  AttributeMetadata,
  ConfigClass,
  ConfigDefinition,
  ConfigurationMetadata,
  Setter,
} from "./ports/metadata"
export type { MetadataProvider } from "./ports/metadata-provider"
export type {
  Problem,
  ProblemKind,
  ProblemMonitor,
  ProblemSink,
  Severity,
} from "./ports/problem"
export type { PropertyMap, PropertySource } from "./ports/property-map"
export type * from "./ports/value-type"
