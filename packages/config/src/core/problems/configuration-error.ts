import { BaseError, serializeError } from "@bindery/errors"
import type { Problem } from "../../ports/problem"

function formatMessage(problems: readonly Problem[]): string {
  const errorCount = problems.filter((p) => p.severity === "error").length
  const entries = problems.map(
    (p, i) => `${i + 1}) ${p.severity === "error" ? "Error" : "Warning"}: ${p.message}`,
  )

  return [
    "Configuration errors:",
    ...entries,
    `${errorCount} ${errorCount === 1 ? "error" : "errors"}`,
  ].join("\n\n")
}

/**
 * Every problem of a failed build, raised at once.
 *
 * `cause` is the cause of the first problem that has one.
 */
export class ConfigurationError extends BaseError<"configuration_invalid"> {
  readonly problems: readonly Problem[]

  constructor(problems: readonly Problem[]) {
    super(formatMessage(problems), {
      code: "configuration_invalid",
      cause: problems.find((p) => p.cause !== undefined)?.cause,
      context: {
        problems: problems.map(({ severity, kind, message, cause }) => ({
          severity,
          kind,
          message,
          ...(cause !== undefined && { cause: serializeError(cause) }),
        })),
      },
      isOperational: !problems.some(
        (p) => p.kind === "structural" && p.severity === "error",
      ),
    })

    this.problems = Object.freeze([...problems])
  }

  /**
   * Messages of the error-severity problems, in order.
   */
  errorMessages(): string[] {
    return this.problems.filter((p) => p.severity === "error").map((p) => p.message)
  }
}
