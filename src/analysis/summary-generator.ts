import { errorMessage } from "../core/errors";
import type { RunState } from "../core/types";
import type { TextGenerator } from "../llm/text-generator";
import { createLogger } from "../observability/logger";
import { formatClassification } from "./categories";
import { type GuidelineLookup, lookupGuidelines } from "./guidelines";

const log = createLogger("summary");

export interface SummaryOutcome {
  final_summary: string;
  iterations: number;
  tool_outputs: string[];
}

export const fallbackSummary = (error: unknown): string =>
  `AI summary currently unavailable. (Error: ${errorMessage(error)})`;

const formatStat = (value: number | undefined): string =>
  (value ?? 0).toFixed(2);

export const buildSummaryPrompt = (
  state: Pick<
    RunState,
    | "trend_summary"
    | "air_quality_class"
    | "alert_triggered"
    | "feedback"
    | "tool_outputs"
  >,
): string => {
  const trends = state.trend_summary;
  const lines = [
    "Analyze the following air quality report:",
    `- Average PM2.5: ${formatStat(trends.mean_pm25)}`,
    `- Max PM2.5: ${formatStat(trends.max_pm25)}`,
    `- Average PM10: ${formatStat(trends.mean_pm10)}`,
    `- Classification: ${formatClassification(state.air_quality_class)}`,
    `- Alert Status: ${state.alert_triggered ? "TRIGGERED" : "Not Triggered"}`,
    "",
    state.tool_outputs.length > 0
      ? `Health Guidelines Tool Output: ${state.tool_outputs.join(" ")}`
      : "The official health guidelines have not been checked yet.",
  ];

  if (state.feedback) {
    lines.push(`Previous Feedback for improvement: ${state.feedback}`);
  }

  lines.push(
    "",
    "Provide a professional summary. If you have the health guidelines, include them.",
  );
  return lines.join("\n");
};

/**
 * Writes the operator-facing report. Guidelines are fetched once per run,
 * and a failing text generator degrades to a placeholder summary.
 */
export class SummaryGenerator {
  constructor(
    private readonly textGenerator: TextGenerator,
    private readonly guidelines: GuidelineLookup = lookupGuidelines,
  ) {}

  async summarize(state: RunState): Promise<SummaryOutcome> {
    const category = state.air_quality_class.label;
    let toolOutputs = state.tool_outputs;
    let prompt = buildSummaryPrompt(state);

    if (
      toolOutputs.length === 0 &&
      category !== "Good" &&
      category !== "Unknown"
    ) {
      log("fetching health guidelines for %s", category);
      const guideline = this.guidelines(category);
      toolOutputs = [guideline];
      prompt += `\n\nNew information from tool: ${guideline}`;
    }

    let summary: string;
    try {
      summary = await this.textGenerator.generate(prompt);
    } catch (error) {
      log("text generation failed: %s", errorMessage(error));
      summary = fallbackSummary(error);
    }

    return {
      final_summary: summary,
      iterations: state.iterations + 1,
      tool_outputs: toolOutputs,
    };
  }
}
