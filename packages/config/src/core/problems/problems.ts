import type {
  Problem,
  ProblemKind,
  ProblemMonitor,
  ProblemSink,
  Severity,
} from "../../ports/problem"
import { ConfigurationError } from "./configuration-error"

export class Problems implements ProblemSink {
  private readonly entries: Problem[] = []

  constructor(private readonly monitor: ProblemMonitor) {}

  record(severity: Severity, kind: ProblemKind, message: string, cause?: unknown): void {
    const problem: Problem = {
      severity,
      kind,
      message,
      ...(cause !== undefined && { cause }),
    }

    this.entries.push(problem)

    if (severity === "error") {
      this.monitor.onError(problem)
    } else {
      this.monitor.onWarning(problem)
    }
  }

  addError(kind: ProblemKind, message: string, cause?: unknown): void {
    this.record("error", kind, message, cause)
  }

  addWarning(kind: ProblemKind, message: string): void {
    this.record("warning", kind, message)
  }

  hasErrors(): boolean {
    return this.entries.some((p) => p.severity === "error")
  }

  all(): readonly Problem[] {
    return [...this.entries]
  }

  errors(): readonly Problem[] {
    return this.entries.filter((p) => p.severity === "error")
  }

  warnings(): readonly Problem[] {
    return this.entries.filter((p) => p.severity === "warning")
  }

  raiseIfErrors(): void {
    if (this.hasErrors()) {
      throw new ConfigurationError(this.entries)
    }
  }
}
