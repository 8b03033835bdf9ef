export type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;

export const asSessionId = (value: string): SessionId => value as SessionId;

export type CellValue = string | number | boolean | null;

export type DatasetRecord = Record<string, CellValue>;

export const AQI_CATEGORIES = [
  "Good",
  "Moderate",
  "Unhealthy for Sensitive Groups",
  "Unhealthy",
  "Hazardous",
] as const;

export type AqiCategory = (typeof AQI_CATEGORIES)[number];

export interface AirQualityClass {
  label: AqiCategory | "Unknown";
  frequency: Partial<Record<AqiCategory, number>>;
}

export interface ColumnNames {
  primary: string;
  secondary: string;
  timestamp: string;
}

/**
 * The record threaded through every step of one run. Steps mutate it in
 * place; the engine persists it after each step.
 */
export interface RunState {
  dataset: DatasetRecord[];
  anomalies: string[];
  /** Fraction in [0, 1]. Fixed for the lifetime of the run. */
  anomaly_threshold: number;
  air_quality_class: AirQualityClass;
  trend_summary: Record<string, number>;
  final_summary: string;
  alert_triggered: boolean;
  /** `"Good"` means the critic accepted the summary. */
  feedback: string;
  iterations: number;
  tool_outputs: string[];
  /** Reserved. No step reads or writes it. */
  approved: boolean;
}

export interface RunInput {
  dataset: DatasetRecord[];
  anomaly_threshold: number;
}

export const STEP_NAMES = [
  "validate",
  "detect_anomalies",
  "classify",
  "alert_decision",
  "trend_summary",
  "summarize",
  "critique",
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export type RunStatus = "running" | "paused" | "failed" | "completed";

export type ExitReason = "accepted" | "iteration_cap";

export interface StepHistory {
  step: StepName;
  started_at: string;
  finished_at?: string;
  outcome?: string;
}

export interface CheckpointRecord {
  session_id: SessionId;
  workflow: string;
  next_step: StepName | null;
  status: RunStatus;
  error?: string;
  exit_reason?: ExitReason;
  history: StepHistory[];
  state: RunState;
  created_at: string;
  updated_at: string;
}
