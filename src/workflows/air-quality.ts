import { feedbackFor } from "../analysis/critic";
import {
  ANOMALY_COLUMN,
  alertDecision,
  anomalyMask,
  classify,
  detectAnomalies,
  trendSummary,
  validate,
} from "../analysis/statistics";
import {
  END,
  decision,
  defineWorkflow,
  task,
} from "../core/workflow-definition";

/**
 * Air-quality analysis with a human checkpoint before the alert decision.
 *
 * Flow:
 *   validate → detect_anomalies → classify → (pause) → alert_decision
 *   → trend_summary → summarize → critique
 *   critique: accept → END, refine → summarize
 */
export default defineWorkflow({
  name: "air-quality",
  description: "Validate, analyse and summarise one air-quality dataset",
  initialStep: "validate",
  interruptBefore: ["alert_decision"],
  steps: {
    validate: task(
      (state, { columns }) => {
        state.dataset = validate(state.dataset, columns);
      },
      { next: "detect_anomalies" },
    ),
    detect_anomalies: task(
      (state, { columns, zScoreCutoff }) => {
        const mask = anomalyMask(state.dataset, columns, zScoreCutoff);
        state.dataset.forEach((record, index) => {
          record[ANOMALY_COLUMN] = mask[index] ?? false;
        });
        state.anomalies = detectAnomalies(state.dataset, columns, zScoreCutoff);
      },
      { next: "classify" },
    ),
    classify: task(
      (state, { columns }) => {
        state.air_quality_class = classify(state.dataset, columns);
      },
      { next: "alert_decision" },
    ),
    alert_decision: task(
      (state) => {
        state.alert_triggered = alertDecision(
          state.anomalies.length,
          state.dataset.length,
          state.anomaly_threshold,
        );
      },
      { next: "trend_summary" },
    ),
    trend_summary: task(
      (state, { columns }) => {
        state.trend_summary = trendSummary(state.dataset, columns);
      },
      { next: "summarize" },
    ),
    summarize: task(
      async (state, { summaryGenerator }) => {
        Object.assign(state, await summaryGenerator.summarize(state));
      },
      { next: "critique" },
    ),
    critique: decision(
      (state, { critic }) => {
        const verdict = critic.review(state.final_summary, state.iterations);
        state.feedback = feedbackFor(verdict);
        return verdict;
      },
      { transitions: { accept: END, refine: "summarize" } },
    ),
  },
});
