import type { PatientId, PatientView } from "./types";

export const CSV_COLUMNS = [
  "name",
  "city",
  "age",
  "gender",
  "height",
  "weight",
  "bmi",
  "verdict",
] as const;

function csvCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  const s = typeof value === "object" ? JSON.stringify(value) : String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/**
 * Renders patient rows as CSV with an `ID` column first.
 *
 * Rows are written in the order given; missing fields become empty cells.
 */
export function patientsToCsv(
  rows: Array<{ id: PatientId; view: PatientView }>
): string {
  const lines = [["ID", ...CSV_COLUMNS].join(",")];
  for (const { id, view } of rows) {
    lines.push([id, ...CSV_COLUMNS.map((c) => view[c])].map(csvCell).join(","));
  }
  return `${lines.join("\n")}\n`;
}
