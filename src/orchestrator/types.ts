import type { ContainerDescriptor } from "../runtime/types.js";

export const UPDATE_STAGES = ["pull", "inspect", "stop", "remove", "create", "start"] as const;

/** One step of the per-container update pipeline that can fail the container. */
export type UpdateStage = (typeof UPDATE_STAGES)[number];

export interface SucceededOutcome {
  status: "succeeded";
  container: ContainerDescriptor;
  /** The freshly created container that replaced `container`. */
  replacement: ContainerDescriptor;
}

export interface SkippedOutcome {
  status: "skipped";
  container: ContainerDescriptor;
  reason: "not-monitored";
}

export interface FailedOutcome {
  status: "failed";
  container: ContainerDescriptor;
  stage: UpdateStage;
  error: string;
}

export type UpdateOutcome = SucceededOutcome | SkippedOutcome | FailedOutcome;

/** Outcomes of one webhook invocation, one per listed container, in listing order. */
export interface ProcessResult {
  group: string;
  outcomes: UpdateOutcome[];
}

/** Listing label-bearing containers failed; nothing was processed. */
export class DiscoveryError extends Error {
  readonly name = "DiscoveryError" as const;
  constructor(labelKey: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot list containers with label ${labelKey}: ${message}`, { cause });
  }
}

/** A pipeline stage failed for one container. Caught and turned into a FailedOutcome. */
export class StageError extends Error {
  readonly name = "StageError" as const;
  readonly stage: UpdateStage;
  constructor(stage: UpdateStage, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(message, { cause });
    this.stage = stage;
  }
}

/** Count outcomes by status, for logging and summaries. */
export function summarizeOutcomes(outcomes: UpdateOutcome[]): Record<UpdateOutcome["status"], number> {
  const summary = { succeeded: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) summary[outcome.status]++;
  return summary;
}
