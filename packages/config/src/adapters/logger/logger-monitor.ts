import type { Logger } from "@bindery/logger"
import type { Problem, ProblemMonitor } from "../../ports/problem"

export class LoggerMonitor implements ProblemMonitor {
  constructor(private readonly logger: Logger) {}

  onWarning(problem: Problem): void {
    this.logger.warn(problem.message, { module: "config", problemKind: problem.kind })
  }

  onError(problem: Problem): void {
    this.logger.error(problem.message, {
      module: "config",
      problemKind: problem.kind,
      ...(problem.cause !== undefined && { err: problem.cause }),
    })
  }
}

export function createLoggerMonitor(logger: Logger): ProblemMonitor {
  return new LoggerMonitor(logger)
}
