export const ACCEPTANCE_SENTINEL = "Good";

export const MORE_DETAIL_FEEDBACK =
  "The summary is too short. Please provide more detail and health recommendations.";

export type CritiqueDecision =
  | { kind: "accept" }
  | { kind: "refine"; feedback: string };

export interface Critic {
  review(summary: string, iterations: number): CritiqueDecision;
}

export const countWords = (text: string): number =>
  text.split(/\s+/).filter((word) => word.length > 0).length;

/**
 * Asks for more detail while the summary is shorter than `minWords`, for at
 * most `maxRounds` passes.
 */
export const lengthCritic = (minWords = 30, maxRounds = 3): Critic => ({
  review(summary, iterations) {
    if (countWords(summary) < minWords && iterations < maxRounds) {
      return { kind: "refine", feedback: MORE_DETAIL_FEEDBACK };
    }
    return { kind: "accept" };
  },
});

export const feedbackFor = (decision: CritiqueDecision): string =>
  decision.kind === "accept" ? ACCEPTANCE_SENTINEL : decision.feedback;
