import { PAPER_FIELDS, type PaperField, type PaperRecord, type PaperRecordView } from "./types.js";

function copyField<K extends PaperField>(target: PaperRecordView, source: PaperRecord, key: K): void {
  target[key] = source[key];
}

export function projectRecord(record: PaperRecord, fields: readonly PaperField[] = PAPER_FIELDS): PaperRecordView {
  const view: PaperRecordView = {};
  for (const field of fields) copyField(view, record, field);
  return view;
}

function formatValue(value: string | string[]): string {
  return Array.isArray(value) ? value.join("; ") : value;
}

/**
 * `key: value` pairs joined by ", ", in the order the fields were requested.
 */
export function formatRecord(view: PaperRecordView): string {
  return Object.entries(view)
    .filter((entry): entry is [string, string | string[]] => entry[1] !== undefined)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(", ");
}

export function formatRecords(views: PaperRecordView[], separator = "\n"): string {
  return views.map(formatRecord).join(separator);
}
