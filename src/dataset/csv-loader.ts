import fs from "node:fs";
import Papa from "papaparse";
import { ValidationError } from "../core/errors";
import type { DatasetRecord } from "../core/types";

// papaparse collects surplus cells of a long row under this key.
const EXTRA_FIELDS_KEY = "__parsed_extra";

/**
 * Parses CSV text with a header row into ordered records. Values stay
 * strings; numeric coercion belongs to validation.
 */
export const parseCsvDataset = (text: string): DatasetRecord[] => {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    dynamicTyping: false,
    transformHeader: (header) => header.trim(),
  });

  const fatal = result.errors.find((error) => error.type !== "FieldMismatch");
  if (fatal) {
    throw new ValidationError(`CSV parse error: ${fatal.message}`, {
      row: fatal.row,
      code: fatal.code,
    });
  }

  if (result.data.length === 0) {
    throw new ValidationError("CSV file contains no data rows");
  }

  return result.data.map((row) => {
    const record: DatasetRecord = {};
    for (const [key, value] of Object.entries(row)) {
      if (key.length > 0 && key !== EXTRA_FIELDS_KEY) {
        record[key] = value ?? null;
      }
    }
    return record;
  });
};

export const loadCsvDataset = (filePath: string): DatasetRecord[] => {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Dataset file not found: ${filePath}`, {
      filePath,
    });
  }
  return parseCsvDataset(fs.readFileSync(filePath, "utf8"));
};
