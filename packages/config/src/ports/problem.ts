export type Severity = "warning" | "error"

/**
 * What went wrong:
 * - `structural`: the configuration class's metadata is invalid
 * - `instantiation`: the class could not be default-constructed
 * - `conflict`: a property and one of its deprecated names disagree
 * - `coercion`: a value could not be converted to the attribute's type
 * - `application`: the setter threw
 * - `deprecation`: a deprecated property name is in use
 */
export type ProblemKind =
  | "structural"
  | "instantiation"
  | "conflict"
  | "coercion"
  | "application"
  | "deprecation"

export type Problem = Readonly<{
  severity: Severity
  kind: ProblemKind
  message: string
  cause?: unknown
}>

/**
 * Receives every problem at the moment it is recorded, whether or not the
 * build that recorded it later succeeds.
 */
export interface ProblemMonitor {
  onWarning(problem: Problem): void
  onError(problem: Problem): void
}

export interface ProblemSink {
  record(severity: Severity, kind: ProblemKind, message: string, cause?: unknown): void
  addError(kind: ProblemKind, message: string, cause?: unknown): void
  addWarning(kind: ProblemKind, message: string): void

  hasErrors(): boolean

  /** Problems in the order they were recorded */
  all(): readonly Problem[]
  errors(): readonly Problem[]
  warnings(): readonly Problem[]

  /**
   * Throws one aggregated error listing every recorded problem, if at least
   * one of them is an error. Warnings alone never throw.
   */
  raiseIfErrors(): void
}
