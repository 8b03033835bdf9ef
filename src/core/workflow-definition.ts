import type { SummaryGenerator } from "../analysis/summary-generator";
import type { Critic } from "../analysis/critic";
import type { ColumnNames, RunState, StepName } from "./types";

export const END = "END" as const;

export type StepTarget = StepName | typeof END;

export type DecisionKind = "accept" | "refine";

export interface Decision {
  kind: DecisionKind;
}

/** Collaborators handed to every step. */
export interface StepServices {
  columns: ColumnNames;
  zScoreCutoff: number;
  summaryGenerator: SummaryGenerator;
  critic: Critic;
}

export interface TaskStep {
  type: "task";
  run: (state: RunState, services: StepServices) => Promise<void> | void;
  next: StepTarget;
}

/**
 * A branching step. The decision it returns is looked up in `transitions`;
 * steps never name their successor directly.
 */
export interface DecisionStep {
  type: "decision";
  decide: (
    state: RunState,
    services: StepServices,
  ) => Promise<Decision> | Decision;
  transitions: Record<DecisionKind, StepTarget>;
}

export type StepDefinition = TaskStep | DecisionStep;

export interface WorkflowDefinition {
  name: string;
  description: string;
  initialStep: StepName;
  /** Steps the engine pauses in front of until the caller resumes. */
  interruptBefore: StepName[];
  steps: Record<StepName, StepDefinition>;
}

export const defineWorkflow = (
  workflow: WorkflowDefinition,
): WorkflowDefinition => workflow;

export const task = (
  run: TaskStep["run"],
  config: { next: StepTarget },
): TaskStep => ({ type: "task", run, next: config.next });

export const decision = (
  decide: DecisionStep["decide"],
  config: { transitions: Record<DecisionKind, StepTarget> },
): DecisionStep => ({
  type: "decision",
  decide,
  transitions: config.transitions,
});
