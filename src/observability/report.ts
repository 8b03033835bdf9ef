import { formatClassification } from "../analysis/categories";
import type { RunInspection } from "../core/workflow-engine";

const heading = (title: string): string => `=== ${title} ===`;

const formatMetric = (value: number | undefined): string =>
  (value ?? 0).toFixed(2);

export const buildCommandHelpLines = (): string[] => [
  "/airq start <csvPath> [sessionId] [thresholdPercent]",
  "/airq approve <sessionId>",
  "/airq status [sessionId]",
  "/airq help",
];

export const buildSessionLines = (runs: RunInspection[]): string[] =>
  runs.length > 0
    ? runs.map(
        (run) =>
          `${run.sessionId}: ${run.status}${run.pendingStep ? ` before ${run.pendingStep}` : ""}`,
      )
    : ["No analysis sessions"];

export const buildActionLines = (runs: RunInspection[]): string[] =>
  runs.flatMap((run) => {
    if (run.status === "paused") {
      return [`${run.sessionId}: /airq approve ${run.sessionId}`];
    }
    if (run.status === "failed") {
      return [`${run.sessionId}: /airq approve ${run.sessionId} (retry)`];
    }
    return [];
  });

/** Operator view of one run: progress, alert, metrics and summary. */
export const buildRunReportLines = (run: RunInspection | null): string[] => {
  if (!run) {
    return ["session not found"];
  }

  const { state } = run;
  const progress = [`session=${run.sessionId}`, `status=${run.status}`];
  if (run.status === "paused" && run.pendingStep) {
    progress.push(`waiting for approval before: ${run.pendingStep}`);
  }
  if (run.error) {
    progress.push(`error=${run.error}`);
  }
  if (run.exitReason) {
    progress.push(`exit=${run.exitReason}`);
  }

  const insights: string[] = [];
  if (state.alert_triggered) {
    insights.push("ALERT: Unusual air quality spikes detected!");
  }
  insights.push(
    `classification=${formatClassification(state.air_quality_class)}`,
  );
  if (state.final_summary) {
    insights.push(state.final_summary);
    if (state.iterations > 1) {
      insights.push(`Summary refined in ${state.iterations} iterations.`);
    }
  } else {
    insights.push("Summary will appear after approval.");
  }

  const trends = state.trend_summary;
  return [
    heading("run"),
    ...progress,
    heading("insights"),
    ...insights,
    heading("metrics"),
    `Average PM2.5: ${formatMetric(trends.mean_pm25)}`,
    `Max PM2.5: ${formatMetric(trends.max_pm25)}`,
    `Average PM10: ${formatMetric(trends.mean_pm10)}`,
    `Anomaly Count: ${state.anomalies.length}`,
  ];
};
