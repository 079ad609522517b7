import type { Problem, ProblemMonitor } from "../../ports/problem"

/**
 * Keeps every forwarded problem, e.g. to print deprecation warnings once
 * start-up is complete.
 */
export class MemoryMonitor implements ProblemMonitor {
  private readonly entries: Problem[] = []

  onWarning(problem: Problem): void {
    this.entries.push(problem)
  }

  onError(problem: Problem): void {
    this.entries.push(problem)
  }

  all(): readonly Problem[] {
    return [...this.entries]
  }

  warnings(): readonly Problem[] {
    return this.entries.filter((p) => p.severity === "warning")
  }

  errors(): readonly Problem[] {
    return this.entries.filter((p) => p.severity === "error")
  }

  clear(): void {
    this.entries.length = 0
  }
}
