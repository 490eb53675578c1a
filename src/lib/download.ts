// src/lib/download.ts

// Spreadsheet apps evaluate cells starting with =, +, - or @; a leading quote keeps them text.
const FORMULA_PREFIX = /^\s*[=+\-@]/;

export function sanitizeSpreadsheetCell(value: string): string {
  if (!value || value.startsWith("'")) return value;
  return FORMULA_PREFIX.test(value) ? `'${value}` : value;
}

export function toCsvCell(cell: unknown): string {
  if (cell === null || cell === undefined) return "";
  if (typeof cell === "number") return Number.isFinite(cell) ? String(cell) : "";
  if (typeof cell === "boolean") return cell ? "true" : "false";
  const safe = sanitizeSpreadsheetCell(String(cell));
  return /[",\n]/.test(safe) ? `"${safe.replace(/"/g, '""')}"` : safe;
}

export function csvFromRows(rows: ReadonlyArray<ReadonlyArray<unknown>>): string {
  return rows.map((row) => row.map(toCsvCell).join(",")).join("\n");
}

/** Browser-only: hand a string to the user as a file. */
export function downloadText(text: string, filename: string, mime = "text/plain;charset=utf-8") {
  const blob = new Blob([text], { type: mime });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  document.body.appendChild(a);
  a.click();
  a.remove();
  setTimeout(() => URL.revokeObjectURL(url), 500);
}

export function downloadCsv(csv: string, filename: string) {
  downloadText(csv, filename.endsWith(".csv") ? filename : `${filename}.csv`, "text/csv;charset=utf-8");
}
