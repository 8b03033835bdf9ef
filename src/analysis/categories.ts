import {
  type AirQualityClass,
  AQI_CATEGORIES,
  type AqiCategory,
} from "../core/types";

/** Upper bounds (exclusive) on a daily PM2.5 average, in ascending order. */
const CATEGORY_BOUNDS: ReadonlyArray<readonly [number, AqiCategory]> = [
  [12, "Good"],
  [35, "Moderate"],
  [55, "Unhealthy for Sensitive Groups"],
  [150, "Unhealthy"],
];

export const categorize = (average: number): AqiCategory => {
  for (const [bound, category] of CATEGORY_BOUNDS) {
    if (average < bound) {
      return category;
    }
  }
  return "Hazardous";
};

export const isAqiCategory = (value: string): value is AqiCategory =>
  AQI_CATEGORIES.some((category) => category === value);

export const formatClassification = (aqc: AirQualityClass): string => {
  const entries = Object.entries(aqc.frequency);
  if (entries.length === 0) {
    return aqc.label;
  }
  const breakdown = entries
    .map(([category, count]) => `${category}: ${count}`)
    .join(", ");
  return `${aqc.label} (Frequency: ${breakdown})`;
};
