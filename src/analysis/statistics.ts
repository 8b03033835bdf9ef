import { EmptyDatasetError, ValidationError } from "../core/errors";
import type {
  AirQualityClass,
  AqiCategory,
  CellValue,
  ColumnNames,
  DatasetRecord,
} from "../core/types";
import { categorize } from "./categories";

export const DATE_COLUMN = "Date";
export const ANOMALY_COLUMN = "anomaly";
export const UNKNOWN_DATE = "Unknown";
export const DEFAULT_Z_SCORE_CUTOFF = 3;

export type TrendSummary = {
  mean_pm25: number;
  max_pm25: number;
  min_pm25: number;
  mean_pm10: number;
};

const toFiniteNumber = (value: CellValue | undefined): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const mean = (values: number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Calendar day of a timestamp. The written `YYYY-MM-DD` prefix wins so that
 * naive timestamps keep their day regardless of the host time zone.
 */
export const calendarDate = (raw: string): string | null => {
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  const prefix = /^(\d{4}-\d{2}-\d{2})/.exec(raw.trim());
  if (prefix?.[1]) {
    return prefix[1];
  }
  const month = pad(parsed.getMonth() + 1);
  return `${parsed.getFullYear()}-${month}-${pad(parsed.getDate())}`;
};

const hasColumn = (dataset: DatasetRecord[], column: string): boolean =>
  dataset.some((record) => Object.hasOwn(record, column));

const coerceColumn = (
  dataset: DatasetRecord[],
  column: string,
): number[] => {
  if (!hasColumn(dataset, column)) {
    throw new ValidationError(`Missing measurement column: ${column}`, {
      column,
    });
  }

  const parsed = dataset.map((record) => toFiniteNumber(record[column]));
  const valid = parsed.filter((value): value is number => value !== null);
  if (valid.length === 0) {
    throw new ValidationError(`Column ${column} has no numeric values`, {
      column,
    });
  }

  const fill = mean(valid);
  return parsed.map((value) => value ?? fill);
};

const isBlank = (value: CellValue | undefined): boolean =>
  value === undefined ||
  value === null ||
  (typeof value === "string" && value.trim().length === 0);

/**
 * Coerces both measurement columns and derives each record's `Date`. A blank
 * timestamp leaves the date null, so the record drops out of daily grouping.
 */
export const validate = (
  dataset: DatasetRecord[],
  columns: ColumnNames,
): DatasetRecord[] => {
  const withTimestamp = hasColumn(dataset, columns.timestamp);
  const dates = dataset.map((record, index): string | null => {
    if (!withTimestamp) {
      return UNKNOWN_DATE;
    }
    const raw = record[columns.timestamp];
    if (isBlank(raw)) {
      return null;
    }
    const date = typeof raw === "string" ? calendarDate(raw) : null;
    if (date === null) {
      throw new ValidationError(
        `Unparseable ${columns.timestamp} at row ${index}: ${String(raw)}`,
        { column: columns.timestamp, row: index },
      );
    }
    return date;
  });

  const primary = coerceColumn(dataset, columns.primary);
  const secondary = coerceColumn(dataset, columns.secondary);

  return dataset.map((record, index) => ({
    ...record,
    [DATE_COLUMN]: dates[index] ?? null,
    [columns.primary]: primary[index] ?? null,
    [columns.secondary]: secondary[index] ?? null,
  }));
};

/**
 * Stable identifier for a record: the original timestamp string when the
 * dataset carries a timestamp column, otherwise the positional index. A
 * record with a blank timestamp falls back to its index.
 */
export const recordIdentifier = (
  record: DatasetRecord,
  index: number,
  withTimestamp: boolean,
  columns: ColumnNames,
): string => {
  const raw = record[columns.timestamp];
  return withTimestamp && typeof raw === "string" && !isBlank(raw)
    ? raw
    : String(index);
};

const numericColumn = (
  dataset: DatasetRecord[],
  column: string,
): number[] =>
  dataset.map((record) => {
    const value = toFiniteNumber(record[column]);
    if (value === null) {
      throw new ValidationError(
        `Column ${column} must be validated before analysis`,
        { column },
      );
    }
    return value;
  });

export const zScores = (values: number[]): number[] => {
  if (values.length === 0) {
    return [];
  }
  const mu = mean(values);
  const sigma = Math.sqrt(mean(values.map((value) => (value - mu) ** 2)));
  if (sigma === 0 || !Number.isFinite(sigma)) {
    return values.map(() => 0);
  }
  return values.map((value) => (value - mu) / sigma);
};

export const anomalyMask = (
  dataset: DatasetRecord[],
  columns: ColumnNames,
  cutoff = DEFAULT_Z_SCORE_CUTOFF,
): boolean[] =>
  zScores(numericColumn(dataset, columns.primary)).map(
    (score) => Math.abs(score) > cutoff,
  );

export const detectAnomalies = (
  dataset: DatasetRecord[],
  columns: ColumnNames,
  cutoff = DEFAULT_Z_SCORE_CUTOFF,
): string[] => {
  const withTimestamp = hasColumn(dataset, columns.timestamp);
  const mask = anomalyMask(dataset, columns, cutoff);
  return dataset.flatMap((record, index) =>
    mask[index] ? [recordIdentifier(record, index, withTimestamp, columns)] : [],
  );
};

export const classify = (
  dataset: DatasetRecord[],
  columns: ColumnNames,
): AirQualityClass => {
  const values = numericColumn(dataset, columns.primary);
  const days = new Map<string, number[]>();
  dataset.forEach((record, index) => {
    const date = record[DATE_COLUMN];
    if (typeof date !== "string") {
      return;
    }
    const bucket = days.get(date) ?? [];
    bucket.push(values[index] ?? 0);
    days.set(date, bucket);
  });

  if (days.size === 0) {
    throw new EmptyDatasetError("No daily readings to classify");
  }

  const counts = new Map<AqiCategory, number>();
  for (const readings of days.values()) {
    const category = categorize(mean(readings));
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  // Map iteration follows first-seen day order, so ties go to the earliest.
  let label: AqiCategory = "Good";
  let best = 0;
  const frequency: Partial<Record<AqiCategory, number>> = {};
  for (const [category, count] of counts) {
    frequency[category] = count;
    if (count > best) {
      best = count;
      label = category;
    }
  }

  return { label, frequency };
};

export const trendSummary = (
  dataset: DatasetRecord[],
  columns: ColumnNames,
): TrendSummary => {
  if (dataset.length === 0) {
    throw new EmptyDatasetError("No readings to summarize");
  }
  const primary = numericColumn(dataset, columns.primary);
  const secondary = numericColumn(dataset, columns.secondary);
  return {
    mean_pm25: mean(primary),
    max_pm25: primary.reduce((max, value) => (value > max ? value : max)),
    min_pm25: primary.reduce((min, value) => (value < min ? value : min)),
    mean_pm10: mean(secondary),
  };
};

export const alertDecision = (
  anomalyCount: number,
  totalCount: number,
  threshold: number,
): boolean => {
  const ratio = totalCount > 0 ? anomalyCount / totalCount : 0;
  return ratio > threshold;
};
