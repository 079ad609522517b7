import { Problems } from "../../core/problems/problems"
import type {
  AttributeDefinition,
  AttributeMetadata,
  ConfigClass,
  ConfigurationMetadata,
} from "../../ports/metadata"
import type { MetadataProvider } from "../../ports/metadata-provider"
import type { ProblemMonitor } from "../../ports/problem"

function isValidName(name: string): boolean {
  return name.length > 0 && name.trim() === name
}

/**
 * Reads the static `configuration` definition of a class (see
 * `describeConfig`) and checks it:
 *
 * - names must be non-empty without surrounding whitespace
 * - attribute names and property names are unique
 * - a deprecated name is never a property name, nor repeated anywhere
 * - deprecated names require a property name
 * - every attribute has a callable setter
 *
 * A class without a definition has no attributes.
 */
export class DefinitionMetadataProvider implements MetadataProvider {
  extract<T>(configClass: ConfigClass<T>, monitor: ProblemMonitor): ConfigurationMetadata<T> {
    const problems = new Problems(monitor)
    const attributes = new Map<string, AttributeMetadata<T>>()
    const className = configClass.name
    const propertyOwners = new Map<string, string>()

    for (const definition of configClass.configuration?.attributes ?? []) {
      const { name } = definition
      const where = `attribute '${name}' of [${className}]`

      if (attributes.has(name)) {
        problems.addError("structural", `Attribute '${name}' is defined more than once in [${className}]`)
        continue
      }

      if (typeof definition.setter?.apply !== "function") {
        problems.addError("structural", `Setter of ${where} is not callable`)
      }

      const property = definition.property

      if (property !== undefined) {
        const owner = propertyOwners.get(property)

        if (!isValidName(property)) {
          problems.addError("structural", `Property name '${property}' of ${where} is invalid`)
        } else if (owner !== undefined) {
          problems.addError(
            "structural",
            `Property name '${property}' of ${where} is already used by attribute '${owner}'`,
          )
        } else {
          propertyOwners.set(property, name)
        }
      } else if (definition.deprecated.length > 0) {
        problems.addError(
          "structural",
          `Deprecated names of ${where} have no replacement property name`,
        )
      }

      attributes.set(name, toMetadata(definition))
    }

    this.checkDeprecatedNames(attributes, propertyOwners, className, problems)

    return {
      configClass,
      attributes,
      problems,
    }
  }

  private checkDeprecatedNames<T>(
    attributes: ReadonlyMap<string, AttributeMetadata<T>>,
    propertyOwners: ReadonlyMap<string, string>,
    className: string,
    problems: Problems,
  ): void {
    const deprecatedOwners = new Map<string, string>()

    for (const attribute of attributes.values()) {
      const where = `attribute '${attribute.name}' of [${className}]`

      for (const deprecatedName of attribute.deprecatedNames) {
        const propertyOwner = propertyOwners.get(deprecatedName)
        const deprecatedOwner = deprecatedOwners.get(deprecatedName)

        if (!isValidName(deprecatedName)) {
          problems.addError("structural", `Deprecated name '${deprecatedName}' of ${where} is invalid`)
        } else if (propertyOwner !== undefined) {
          problems.addError(
            "structural",
            `Deprecated name '${deprecatedName}' of ${where} is the property name of attribute '${propertyOwner}'`,
          )
        } else if (deprecatedOwner !== undefined) {
          problems.addError(
            "structural",
            `Deprecated name '${deprecatedName}' of ${where} is already deprecated by attribute '${deprecatedOwner}'`,
          )
        } else {
          deprecatedOwners.set(deprecatedName, attribute.name)
        }
      }
    }
  }
}

function toMetadata<T>(definition: AttributeDefinition<T>): AttributeMetadata<T> {
  return {
    name: definition.name,
    propertyName: definition.property,
    deprecatedNames: Object.freeze([...definition.deprecated]),
    setter: definition.setter,
  }
}

export function createDefinitionMetadataProvider(): MetadataProvider {
  return new DefinitionMetadataProvider()
}
