import { z } from "zod"
import type { PropertyMap, PropertySource } from "../ports/property-map"

const propertyValue = z.string().optional()

function isMap(
  source: PropertySource,
): source is ReadonlyMap<string, string | undefined> {
  return source instanceof Map
}

function entriesOf(source: PropertySource): Iterable<[string, string | undefined]> {
  return isMap(source) ? source.entries() : Object.entries(source)
}

/**
 * Snapshots `source` into a frozen, prototype-less {@link PropertyMap}.
 * Entries whose value is `undefined` are dropped.
 */
export function toPropertyMap(source: PropertySource): PropertyMap {
  const properties: Record<string, string> = Object.create(null)

  for (const [key, value] of entriesOf(source)) {
    const result = propertyValue.safeParse(value)

    if (!result.success) {
      throw new TypeError(`Value of property '${key}' must be a string, got ${typeof value}`)
    }

    if (result.data !== undefined) properties[key] = result.data
  }

  return Object.freeze(properties)
}

/**
 * Joins a key prefix to attribute property names: empty or absent
 * contributes nothing, anything else is followed by one ".".
 */
export function normalizePrefix(prefix: string | null | undefined): string {
  return prefix ? `${prefix}.` : ""
}
