import type { RunOutcome } from "../core/runner.js";
import type { RunStateSummary } from "../core/state.js";
import { formatErrorMessage } from "../core/error-format.js";

// =============================================================================
// OUTCOMES
// =============================================================================

export function formatRunOutcome(outcome: RunOutcome): string[] {
  switch (outcome.status) {
    case "finished":
      return [`forkline ${outcome.command}: done.`];
    case "paused":
      return [
        `forkline ${outcome.command} paused: "${outcome.step}" stopped with conflicts.`,
        outcome.reason,
        "",
        'Resolve the conflicts and stage the files, then run "forkline continue".',
        ...(outcome.canSkip ? ['To drop this change and go on, run "forkline skip".'] : []),
        `To undo everything "forkline ${outcome.command}" did, run "forkline abort".`,
      ];
    case "aborted": {
      const lines = outcome.error
        ? [
            `forkline ${outcome.command} failed and was rolled back.`,
            `Failed step: ${outcome.error.step}`,
            formatErrorMessage(outcome.error.error),
          ]
        : [`forkline ${outcome.command} aborted.`];
      if (outcome.abortFailures.length > 0) {
        lines.push("Rollback could not complete; check the repository by hand:");
        for (const failure of outcome.abortFailures) {
          lines.push(`  - ${failure.step}: ${formatErrorMessage(failure.error)}`);
        }
      }
      return lines;
    }
  }
}

export function printRunOutcome(outcome: RunOutcome): void {
  const lines = formatRunOutcome(outcome).join("\n");
  if (outcome.status === "finished") {
    console.log(lines);
  } else {
    console.error(lines);
  }
}

// =============================================================================
// STATUS
// =============================================================================

export function formatRunStatus(summary: RunStateSummary | null): string[] {
  if (!summary) {
    return ["No forkline run in progress."];
  }

  const lines = [
    `Run: ${summary.runId}`,
    `Command: ${summary.command}`,
    `Status: ${summary.status}`,
    `Started: ${summary.startedAt}`,
    `Updated: ${summary.updatedAt}`,
  ];
  if (summary.pausedStep) {
    lines.push(`Paused at: ${summary.pausedStep}`);
  }
  if (summary.pausedReason) {
    lines.push(`Reason: ${summary.pausedReason}`);
  }

  lines.push("", `Remaining steps (${summary.remainingSteps.length}):`);
  lines.push(...listOrNone(summary.remainingSteps));
  lines.push("", `Undo steps (${summary.undoSteps.length}):`);
  lines.push(...listOrNone(summary.undoSteps));
  return lines;
}

function listOrNone(items: string[]): string[] {
  return items.length === 0 ? ["  (none)"] : items.map((item) => `  - ${item}`);
}
