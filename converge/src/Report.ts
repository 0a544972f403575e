import type { ChangeSet } from "./Diff.ts";
import type { FatalError, OperationError } from "./Errors.ts";
import type { Step } from "./Plan.ts";

export const ExitCode = {
  Success: 0,
  CompletedWithFailures: 1,
  FatalPlanningError: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type Outcome =
  | { status: "Applied" }
  | { status: "Unchanged" }
  | { status: "Failed"; cause: OperationError }
  | { status: "Blocked"; blockedBy: string }
  | { status: "Skipped" };

export type Status = Outcome["status"];

export interface RunReport {
  /** final outcome per resource key */
  resources: Record<string, Outcome>;
  completed: string[];
  failed: string[];
  blocked: string[];
  notAttempted: string[];
  exitCode: typeof ExitCode.Success | typeof ExitCode.CompletedWithFailures;
}

/**
 * Result of a whole run: a report when planning succeeded, the fatal error
 * otherwise.
 */
export type RunResult =
  | { exitCode: 0 | 1; report: RunReport }
  | { exitCode: 2; error: FatalError };

const severity: Record<Status, number> = {
  Unchanged: 0,
  Applied: 1,
  Skipped: 2,
  Blocked: 3,
  Failed: 4,
};

/**
 * Fold the outcomes of every step into one outcome per resource. A resource
 * takes the worst outcome among its steps.
 */
export const summarize = (
  changes: ChangeSet,
  steps: Record<string, Step>,
  outcomes: ReadonlyMap<string, Outcome>,
): RunReport => {
  const resources: Record<string, Outcome> = {};
  for (const key of Object.keys(changes)) {
    resources[key] = { status: "Unchanged" };
  }
  for (const step of Object.values(steps)) {
    const outcome = outcomes.get(step.id) ?? { status: "Skipped" };
    const current = resources[step.key];
    if (!current || severity[outcome.status] > severity[current.status]) {
      resources[step.key] = outcome;
    }
  }

  const keys = (status: Status) =>
    Object.entries(resources)
      .filter(([, outcome]) => outcome.status === status)
      .map(([key]) => key);

  const failed = keys("Failed");
  const blocked = keys("Blocked");
  const notAttempted = keys("Skipped");
  return {
    resources,
    completed: keys("Applied"),
    failed,
    blocked,
    notAttempted,
    exitCode:
      failed.length + blocked.length + notAttempted.length === 0
        ? ExitCode.Success
        : ExitCode.CompletedWithFailures,
  };
};
