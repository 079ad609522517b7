/**
 * Immutable snapshot of fully qualified property keys to raw string values.
 *
 * Keys are exact and case-sensitive. The object has no prototype, so keys
 * such as `constructor` or `__proto__` are plain entries.
 */
export type PropertyMap = Readonly<Record<string, string>>

/**
 * Anything a {@link PropertyMap} can be snapshotted from.
 *
 * An `undefined` value means "not provided" and is dropped.
 */
export type PropertySource =
  | Readonly<Record<string, string | undefined>>
  | ReadonlyMap<string, string | undefined>
