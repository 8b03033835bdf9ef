import { describe, expect, it } from "vitest";
import { categorize, formatClassification } from "../src/analysis/categories";
import {
  alertDecision,
  calendarDate,
  classify,
  detectAnomalies,
  trendSummary,
  validate,
} from "../src/analysis/statistics";
import { EmptyDatasetError, ValidationError } from "../src/core/errors";
import { parseCsvDataset } from "../src/dataset/csv-loader";
import type {
  CellValue,
  ColumnNames,
  DatasetRecord,
} from "../src/core/types";

const columns: ColumnNames = {
  primary: "PM2.5 (µg/m³)",
  secondary: "PM10 (µg/m³)",
  timestamp: "Timestamp",
};

const reading = (
  pm25: CellValue,
  pm10: CellValue = 20,
  extra: DatasetRecord = {},
): DatasetRecord => ({
  "PM2.5 (µg/m³)": pm25,
  "PM10 (µg/m³)": pm10,
  ...extra,
});

describe("validate", () => {
  it("coerces measurements and fills invalid values with the column mean", () => {
    const cleaned = validate(
      [
        reading("10", "20", { Timestamp: "2024-03-01 08:00:00" }),
        reading("n/a", "30", { Timestamp: "2024-03-01 09:00:00" }),
        reading("40", "", { Timestamp: "2024-03-02T08:00:00" }),
      ],
      columns,
    );

    expect(cleaned).toEqual([
      {
        Timestamp: "2024-03-01 08:00:00",
        Date: "2024-03-01",
        "PM2.5 (µg/m³)": 10,
        "PM10 (µg/m³)": 20,
      },
      {
        Timestamp: "2024-03-01 09:00:00",
        Date: "2024-03-01",
        "PM2.5 (µg/m³)": 25,
        "PM10 (µg/m³)": 30,
      },
      {
        Timestamp: "2024-03-02T08:00:00",
        Date: "2024-03-02",
        "PM2.5 (µg/m³)": 40,
        "PM10 (µg/m³)": 25,
      },
    ]);
  });

  it("marks the date as Unknown when there is no timestamp column", () => {
    const cleaned = validate([reading(5), reading(7)], columns);
    expect(cleaned.map((record) => record.Date)).toEqual([
      "Unknown",
      "Unknown",
    ]);
  });

  it("does not mutate its input", () => {
    const input = [reading("8", "9")];
    validate(input, columns);
    expect(input).toEqual([reading("8", "9")]);
  });

  it("is idempotent", () => {
    const once = validate(
      [
        reading("12.5", "x", { Timestamp: "2024-05-01 00:00" }),
        reading(null, 44, { Timestamp: "2024-05-02 00:00" }),
      ],
      columns,
    );
    expect(validate(once, columns)).toEqual(once);
  });

  it("rejects a missing or entirely non-numeric measurement column", () => {
    expect(() => validate([{ "PM2.5 (µg/m³)": 3 }], columns)).toThrow(
      ValidationError,
    );
    expect(() => validate([reading("a", 1), reading("b", 2)], columns)).toThrow(
      "Column PM2.5 (µg/m³) has no numeric values",
    );
  });

  it("rejects unparseable timestamps", () => {
    expect(() =>
      validate([reading(1, 1, { Timestamp: "not a date" })], columns),
    ).toThrow(ValidationError);
  });
});

describe("blank timestamps", () => {
  const csv = [
    "Timestamp,PM2.5 (µg/m³),PM10 (µg/m³)",
    "2024-03-01 08:00,10,20",
    ",11,21",
    "2024-03-02 08:00,40,30",
  ].join("\n");

  it("leave the date empty instead of failing validation", () => {
    const cleaned = validate(parseCsvDataset(csv), columns);

    expect(cleaned.map((record) => record.Date)).toEqual([
      "2024-03-01",
      null,
      "2024-03-02",
    ]);
    expect(cleaned[1]?.["PM2.5 (µg/m³)"]).toBe(11);
  });

  it("treat a record without the timestamp field like a blank one", () => {
    const cleaned = validate(
      [reading(10, 20, { Timestamp: "2024-03-01 08:00" }), reading(12, 20)],
      columns,
    );
    expect(cleaned[1]?.Date).toBeNull();
  });

  it("drop undated records from daily classification", () => {
    expect(classify(validate(parseCsvDataset(csv), columns), columns)).toEqual({
      label: "Good",
      frequency: { Good: 1, "Unhealthy for Sensitive Groups": 1 },
    });
  });

  it("fail classification when no record has a date", () => {
    const cleaned = validate(
      [reading(10, 20, { Timestamp: "" }), reading(12, 20, { Timestamp: " " })],
      columns,
    );
    expect(() => classify(cleaned, columns)).toThrow(EmptyDatasetError);
  });

  it("identify an undated anomaly by its position", () => {
    const dataset = Array.from({ length: 21 }, (_, index) =>
      index === 20
        ? reading(100, 20, { Timestamp: "" })
        : reading(10, 20, {
            Timestamp: `2024-02-01 ${String(index).padStart(2, "0")}:00`,
          }),
    );
    expect(detectAnomalies(dataset, columns)).toEqual(["20"]);
  });
});

describe("calendarDate", () => {
  it("keeps the written day of ISO timestamps", () => {
    expect(calendarDate("2024-01-31T23:30:00Z")).toBe("2024-01-31");
    expect(calendarDate("2024-01-31 23:30")).toBe("2024-01-31");
    expect(calendarDate("garbage")).toBeNull();
  });
});

describe("detectAnomalies", () => {
  it("flags nothing when the readings have zero variance", () => {
    const dataset = Array.from({ length: 12 }, () => reading(20));
    expect(detectAnomalies(dataset, columns)).toEqual([]);
  });

  it("flags outliers by positional index without a timestamp column", () => {
    const dataset = [
      ...Array.from({ length: 20 }, () => reading(10)),
      reading(100),
    ];
    expect(detectAnomalies(dataset, columns)).toEqual(["20"]);
  });

  it("identifies outliers by their original timestamp", () => {
    const dataset = Array.from({ length: 21 }, (_, index) =>
      reading(index === 7 ? 100 : 10, 20, {
        Timestamp: `2024-02-01 ${String(index).padStart(2, "0")}:00`,
      }),
    );
    expect(detectAnomalies(dataset, columns)).toEqual(["2024-02-01 07:00"]);
  });

  it("honours a custom cutoff", () => {
    const dataset = [reading(10), reading(10), reading(10), reading(20)];
    // z of the last reading is sqrt(3), about 1.73
    expect(detectAnomalies(dataset, columns, 1.5)).toEqual(["3"]);
    expect(detectAnomalies(dataset, columns)).toEqual([]);
  });
});

describe("classify", () => {
  it("classifies a single clean day as Good", () => {
    expect(
      classify([reading(10, 20, { Date: "2024-01-01" })], columns),
    ).toEqual({ label: "Good", frequency: { Good: 1 } });
  });

  it("classifies a single very polluted day as Hazardous", () => {
    expect(
      classify([reading(200, 20, { Date: "2024-01-01" })], columns).label,
    ).toBe("Hazardous");
  });

  it("averages per day and returns the most frequent category", () => {
    const result = classify(
      [
        reading(10, 0, { Date: "2024-01-01" }),
        reading(20, 0, { Date: "2024-01-01" }),
        reading(40, 0, { Date: "2024-01-02" }),
        reading(20, 0, { Date: "2024-01-03" }),
      ],
      columns,
    );

    expect(result).toEqual({
      label: "Moderate",
      frequency: { Moderate: 2, "Unhealthy for Sensitive Groups": 1 },
    });
  });

  it("breaks ties in favour of the earliest day's category", () => {
    const result = classify(
      [
        reading(5, 0, { Date: "2024-01-01" }),
        reading(300, 0, { Date: "2024-01-02" }),
      ],
      columns,
    );
    expect(result.label).toBe("Good");
  });

  it("fails on an empty dataset", () => {
    expect(() => classify([], columns)).toThrow(EmptyDatasetError);
  });
});

describe("categorize", () => {
  it("uses exclusive upper bounds", () => {
    expect(categorize(11.99)).toBe("Good");
    expect(categorize(12)).toBe("Moderate");
    expect(categorize(35)).toBe("Unhealthy for Sensitive Groups");
    expect(categorize(55)).toBe("Unhealthy");
    expect(categorize(150)).toBe("Hazardous");
  });

  it("formats a classification with its breakdown", () => {
    expect(
      formatClassification({
        label: "Moderate",
        frequency: { Moderate: 2, Good: 1 },
      }),
    ).toBe("Moderate (Frequency: Moderate: 2, Good: 1)");
    expect(formatClassification({ label: "Unknown", frequency: {} })).toBe(
      "Unknown",
    );
  });
});

describe("trendSummary", () => {
  it("returns primary extremes and secondary mean", () => {
    expect(
      trendSummary([reading(10, 5), reading(20, 15), reading(30, 25)], columns),
    ).toEqual({ mean_pm25: 20, max_pm25: 30, min_pm25: 10, mean_pm10: 15 });
  });

  it("handles several years of hourly readings", () => {
    const dataset = Array.from({ length: 300_000 }, (_, index) =>
      reading(index === 123_456 ? 500 : index % 100),
    );
    expect(trendSummary(dataset, columns)).toMatchObject({
      max_pm25: 500,
      min_pm25: 0,
      mean_pm10: 20,
    });
  });

  it("fails on an empty dataset", () => {
    expect(() => trendSummary([], columns)).toThrow(EmptyDatasetError);
  });
});

describe("alertDecision", () => {
  it("never alerts on an empty dataset", () => {
    expect(alertDecision(0, 0, 0)).toBe(false);
    expect(alertDecision(3, 0, 0)).toBe(false);
  });

  it("alerts only when the ratio strictly exceeds the threshold", () => {
    expect(alertDecision(1, 10, 0.05)).toBe(true);
    expect(alertDecision(1, 100, 0.01)).toBe(false);
    expect(alertDecision(0, 10, 0)).toBe(false);
  });
});
