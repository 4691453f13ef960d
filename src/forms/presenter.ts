/**
 * Submission presenter — the human-readable summary and the JSON export
 * of a SubmissionRecord.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { isEmptyValue, isStringList } from "./model.js";
import type { FieldType, FieldValue, SubmissionRecord } from "./types.js";

export const EXPORT_FILE_NAME = "form_submission.json";
export const EXPORT_MIME_TYPE = "application/json";
export const NOT_PROVIDED = "Not provided";

export interface PresentedLine {
  label: string;
  value: string;
}

/** Shape of form_submission.json. */
export interface SubmissionExport {
  form_title: string;
  submitted_data: Record<string, FieldValue>;
  metadata: {
    fields: { name: string; label: string; type: FieldType }[];
  };
}

export interface Presentation {
  lines: PresentedLine[];
  /** One "Label: value" line per field. */
  humanView: string;
  json: string;
  fileName: string;
  mimeType: string;
}

export function formatValue(value: FieldValue | undefined): string {
  if (value === undefined || isEmptyValue(value)) return NOT_PROVIDED;
  if (isStringList(value)) return value.join(", ");
  if (typeof value === "boolean") return value ? "Yes" : "No";
  return String(value);
}

/**
 * Export object with keys in a fixed order and data in field order, so
 * identical submissions serialize to identical bytes.
 */
export function toSubmissionExport(record: SubmissionRecord): SubmissionExport {
  const submitted: Record<string, FieldValue> = {};
  for (const field of record.spec.fields) {
    const value = record.data[field.name];
    if (value !== undefined) submitted[field.name] = value;
  }

  return {
    form_title: record.spec.title,
    submitted_data: submitted,
    metadata: {
      fields: record.spec.fields.map((f) => ({ name: f.name, label: f.label, type: f.type })),
    },
  };
}

export function present(record: SubmissionRecord): Presentation {
  const lines = record.spec.fields.map((field) => ({
    label: field.label,
    value: formatValue(record.data[field.name]),
  }));

  return {
    lines,
    humanView: lines.map((l) => `${l.label}: ${l.value}`).join("\n"),
    json: JSON.stringify(toSubmissionExport(record), null, 2),
    fileName: EXPORT_FILE_NAME,
    mimeType: EXPORT_MIME_TYPE,
  };
}

/** Write the JSON export as UTF-8 into `dir`; returns the file path. */
export async function writeSubmission(presentation: Presentation, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, presentation.fileName);
  await writeFile(path, presentation.json, "utf-8");
  return path;
}
