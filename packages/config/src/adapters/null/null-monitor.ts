import type { Problem, ProblemMonitor } from "../../ports/problem"

export class NullMonitor implements ProblemMonitor {
  onWarning(_problem: Problem): void {}

  onError(_problem: Problem): void {}
}

export const NULL_MONITOR: ProblemMonitor = Object.freeze(new NullMonitor())
