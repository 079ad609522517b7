import type { EnumLike } from "../../ports/value-type"

/**
 * Numeric TypeScript enums carry reverse mappings (`{ Low: 0, "0": "Low" }`);
 * those keys are not members.
 */
function isReverseMapping(members: EnumLike, key: string): boolean {
  const value = members[key]

  return typeof value === "string" && typeof members[value] === "number"
}

export function enumMemberNames(members: EnumLike): string[] {
  return Object.keys(members).filter((key) => !isReverseMapping(members, key))
}

export function enumMemberValues(members: EnumLike): Array<string | number> {
  return enumMemberNames(members).flatMap((name) => {
    const value = members[name]
    return value === undefined ? [] : [value]
  })
}

/**
 * Looks a member up by its exact name.
 */
export function enumMember(members: EnumLike, name: string): string | number | undefined {
  if (!Object.hasOwn(members, name) || isReverseMapping(members, name)) return undefined

  return members[name]
}
