import { createLogger } from "../observability/logger";
import airQualityWorkflow from "../workflows/air-quality";
import {
  SessionBusyError,
  UnknownSessionError,
  ValidationError,
  errorMessage,
} from "./errors";
import { type SessionStore, assertSessionId } from "./state-store";
import {
  type CheckpointRecord,
  type ExitReason,
  type RunInput,
  type RunState,
  type RunStatus,
  type SessionId,
  type StepHistory,
  type StepName,
  asSessionId,
} from "./types";
import {
  END,
  type StepDefinition,
  type StepServices,
  type StepTarget,
  type WorkflowDefinition,
} from "./workflow-definition";

const log = createLogger("engine");

export interface EngineOptions {
  definition?: WorkflowDefinition;
  /**
   * Upper bound on summary passes. Once reached, a `refine` decision follows
   * the `accept` edge instead.
   */
  maxIterations?: number;
}

export interface RunInspection {
  sessionId: SessionId;
  status: RunStatus;
  pendingStep: StepName | null;
  state: RunState;
  error?: string;
  exitReason?: ExitReason;
}

interface StepResult {
  next: StepTarget;
  outcome: string;
  exitReason?: ExitReason;
}

export const initialRunState = (input: RunInput): RunState => ({
  dataset: input.dataset.map((record) => ({ ...record })),
  anomalies: [],
  anomaly_threshold: input.anomaly_threshold,
  air_quality_class: { label: "Unknown", frequency: {} },
  trend_summary: {},
  final_summary: "",
  alert_triggered: false,
  feedback: "",
  iterations: 0,
  tool_outputs: [],
  approved: false,
});

const assertRunInput = (input: RunInput): void => {
  if (!Array.isArray(input.dataset)) {
    throw new ValidationError("dataset must be an array of records");
  }
  const threshold = input.anomaly_threshold;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ValidationError(
      `anomaly_threshold must be a fraction in [0, 1], got ${threshold}`,
      { anomaly_threshold: threshold },
    );
  }
};

export const toInspection = (record: CheckpointRecord): RunInspection => ({
  sessionId: record.session_id,
  status: record.status,
  pendingStep: record.next_step,
  state: record.state,
  ...(record.error !== undefined ? { error: record.error } : {}),
  ...(record.exit_reason !== undefined
    ? { exitReason: record.exit_reason }
    : {}),
});

export class WorkflowEngine {
  private readonly active = new Set<string>();
  private readonly definition: WorkflowDefinition;
  private readonly maxIterations: number | undefined;

  constructor(
    private readonly store: SessionStore,
    private readonly services: StepServices,
    options: EngineOptions = {},
  ) {
    this.definition = options.definition ?? airQualityWorkflow;
    if (
      options.maxIterations !== undefined &&
      (!Number.isInteger(options.maxIterations) || options.maxIterations < 1)
    ) {
      throw new Error(
        `maxIterations must be a positive integer, got ${options.maxIterations}`,
      );
    }
    this.maxIterations = options.maxIterations;
  }

  /**
   * Begins a fresh run, replacing whatever the session held before, and
   * executes until the first suspend point or the end of the graph.
   */
  async start(sessionId: string, input: RunInput): Promise<RunInspection> {
    assertSessionId(sessionId);
    assertRunInput(input);
    const id = asSessionId(sessionId);

    return this.exclusive(id, async () => {
      const now = new Date().toISOString();
      const record: CheckpointRecord = {
        session_id: id,
        workflow: this.definition.name,
        next_step: this.definition.initialStep,
        status: "running",
        history: [],
        state: initialRunState(input),
        created_at: now,
        updated_at: now,
      };

      this.store.save(record);
      log("started %s with %d records", id, input.dataset.length);
      await this.execute(record, false);
      return toInspection(record);
    });
  }

  /**
   * Continues a paused run from the step it is waiting before, or retries
   * the step a failed run stopped at.
   */
  async resume(sessionId: string): Promise<RunInspection> {
    assertSessionId(sessionId);
    const id = asSessionId(sessionId);

    return this.exclusive(id, async () => {
      const record = this.requireSession(id);
      if (record.status === "completed" || record.next_step === null) {
        throw new Error(`Session ${id} has already completed`);
      }

      log("resuming %s at %s (was %s)", id, record.next_step, record.status);
      record.status = "running";
      delete record.error;
      await this.execute(record, true);
      return toInspection(record);
    });
  }

  inspect(sessionId: string): RunInspection | null {
    assertSessionId(sessionId);
    const record = this.store.load(asSessionId(sessionId));
    return record ? toInspection(record) : null;
  }

  list(): RunInspection[] {
    return this.store.list().map(toInspection);
  }

  private async exclusive<T>(
    sessionId: SessionId,
    fn: () => Promise<T>,
  ): Promise<T> {
    if (this.active.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }
    this.active.add(sessionId);
    try {
      return await fn();
    } finally {
      this.active.delete(sessionId);
    }
  }

  private async execute(
    record: CheckpointRecord,
    resuming: boolean,
  ): Promise<void> {
    // The step a resume continues from has already been approved.
    let approvedStep: StepName | null = resuming ? record.next_step : null;

    while (record.next_step !== null) {
      const step = record.next_step;
      if (
        step !== approvedStep &&
        this.definition.interruptBefore.includes(step)
      ) {
        record.status = "paused";
        record.updated_at = new Date().toISOString();
        this.store.save(record);
        log("paused %s before %s", record.session_id, step);
        return;
      }
      approvedStep = null;

      const entry: StepHistory = {
        step,
        started_at: new Date().toISOString(),
      };
      record.history.push(entry);
      const threshold = record.state.anomaly_threshold;

      let result: StepResult;
      try {
        log("%s: entering %s", record.session_id, step);
        result = await this.runStep(record.state, this.definition.steps[step]);
      } catch (error) {
        const message = errorMessage(error);
        const now = new Date().toISOString();
        entry.finished_at = now;
        entry.outcome = `error: ${message}`;
        record.status = "failed";
        record.error = message;
        record.updated_at = now;
        this.store.save(record);
        log("%s: %s failed: %s", record.session_id, step, message);
        throw error;
      }

      if (record.state.anomaly_threshold !== threshold) {
        log("%s: %s changed anomaly_threshold", record.session_id, step);
        record.state.anomaly_threshold = threshold;
      }

      const now = new Date().toISOString();
      entry.finished_at = now;
      entry.outcome = result.outcome;
      record.updated_at = now;

      if (result.next === END) {
        record.next_step = null;
        record.status = "completed";
        record.exit_reason = result.exitReason ?? "accepted";
        log(
          "%s: completed after %d iterations (%s)",
          record.session_id,
          record.state.iterations,
          record.exit_reason,
        );
      } else {
        record.next_step = result.next;
      }
      this.store.save(record);
    }
  }

  private async runStep(
    state: RunState,
    definition: StepDefinition,
  ): Promise<StepResult> {
    if (definition.type === "task") {
      await definition.run(state, this.services);
      return { next: definition.next, outcome: "done" };
    }

    const verdict = await definition.decide(state, this.services);
    if (
      verdict.kind === "refine" &&
      this.maxIterations !== undefined &&
      state.iterations >= this.maxIterations
    ) {
      log("iteration cap %d reached, accepting", this.maxIterations);
      return {
        next: definition.transitions.accept,
        outcome: "refine (iteration cap)",
        exitReason: "iteration_cap",
      };
    }

    return {
      next: definition.transitions[verdict.kind],
      outcome: verdict.kind,
      ...(verdict.kind === "accept" ? { exitReason: "accepted" as const } : {}),
    };
  }

  private requireSession(sessionId: SessionId): CheckpointRecord {
    const record = this.store.load(sessionId);
    if (!record) {
      throw new UnknownSessionError(sessionId);
    }
    return record;
  }
}
