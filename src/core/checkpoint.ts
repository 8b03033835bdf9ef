import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { CheckpointCorruptError } from "./errors";
import { type CheckpointRecord, asSessionId } from "./types";

const StepNameSchema = Type.Union([
  Type.Literal("validate"),
  Type.Literal("detect_anomalies"),
  Type.Literal("classify"),
  Type.Literal("alert_decision"),
  Type.Literal("trend_summary"),
  Type.Literal("summarize"),
  Type.Literal("critique"),
]);

const AqiCategorySchema = Type.Union([
  Type.Literal("Good"),
  Type.Literal("Moderate"),
  Type.Literal("Unhealthy for Sensitive Groups"),
  Type.Literal("Unhealthy"),
  Type.Literal("Hazardous"),
]);

const CellSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Null(),
]);

export const RunStateSchema = Type.Object({
  dataset: Type.Array(Type.Record(Type.String(), CellSchema)),
  anomalies: Type.Array(Type.String()),
  anomaly_threshold: Type.Number({ minimum: 0, maximum: 1 }),
  air_quality_class: Type.Object({
    label: Type.Union([AqiCategorySchema, Type.Literal("Unknown")]),
    frequency: Type.Partial(
      Type.Object({
        Good: Type.Number(),
        Moderate: Type.Number(),
        "Unhealthy for Sensitive Groups": Type.Number(),
        Unhealthy: Type.Number(),
        Hazardous: Type.Number(),
      }),
    ),
  }),
  trend_summary: Type.Record(Type.String(), Type.Number()),
  final_summary: Type.String(),
  alert_triggered: Type.Boolean(),
  feedback: Type.String(),
  iterations: Type.Integer({ minimum: 0 }),
  tool_outputs: Type.Array(Type.String()),
  approved: Type.Boolean(),
});

export const CheckpointRecordSchema = Type.Object({
  session_id: Type.String({ minLength: 1 }),
  workflow: Type.String(),
  next_step: Type.Union([StepNameSchema, Type.Null()]),
  status: Type.Union([
    Type.Literal("running"),
    Type.Literal("paused"),
    Type.Literal("failed"),
    Type.Literal("completed"),
  ]),
  error: Type.Optional(Type.String()),
  exit_reason: Type.Optional(
    Type.Union([Type.Literal("accepted"), Type.Literal("iteration_cap")]),
  ),
  history: Type.Array(
    Type.Object({
      step: StepNameSchema,
      started_at: Type.String(),
      finished_at: Type.Optional(Type.String()),
      outcome: Type.Optional(Type.String()),
    }),
  ),
  state: RunStateSchema,
  created_at: Type.String(),
  updated_at: Type.String(),
});

export const serializeCheckpoint = (record: CheckpointRecord): string =>
  JSON.stringify(record, null, 2);

export const parseCheckpoint = (
  sessionId: string,
  raw: string,
): CheckpointRecord => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CheckpointCorruptError(
      sessionId,
      error instanceof Error ? error.message : "invalid JSON",
    );
  }

  if (!Value.Check(CheckpointRecordSchema, parsed)) {
    const first = Value.Errors(CheckpointRecordSchema, parsed).First();
    throw new CheckpointCorruptError(
      sessionId,
      first ? `${first.path || "/"} ${first.message}` : "schema mismatch",
    );
  }

  return { ...parsed, session_id: asSessionId(parsed.session_id) };
};
