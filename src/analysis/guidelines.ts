import type { AqiCategory } from "../core/types";
import { isAqiCategory } from "./categories";

export type GuidelineLookup = (category: string) => string;

export const NO_GUIDELINES = "No specific guidelines available.";

const GUIDELINES: Record<AqiCategory, string> = {
  Good: "Air quality is satisfactory. Enjoy outdoor activities.",
  Moderate:
    "Sensitive individuals should consider reducing prolonged outdoor exertion.",
  "Unhealthy for Sensitive Groups":
    "Children, active adults, and people with respiratory disease should limit outdoor exertion.",
  Unhealthy: "Everyone should limit prolonged outdoor exertion.",
  Hazardous:
    "Health warning of emergency conditions. The entire population is more likely to be affected.",
};

export const lookupGuidelines: GuidelineLookup = (category) =>
  isAqiCategory(category) ? GUIDELINES[category] : NO_GUIDELINES;
