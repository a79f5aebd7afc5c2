// src/lib/indent/requestNumber.ts
import { format } from "date-fns";

export const REQUEST_PREFIX = "MRN-";
const NUMBERED = /^MRN-(\d+)$/;

/**
 * Next sequential request number from the log's request-number column, oldest
 * first. The last `MRN-<digits>` entry wins; when none matches, the count of
 * non-empty cells minus one (the header) stands in for it. Padded to three
 * digits, wider numbers are kept as they are.
 */
export function nextRequestNumber(column: readonly string[]): string {
  let last: number | null = null;
  for (let i = column.length - 1; i >= 0; i--) {
    const m = NUMBERED.exec((column[i] ?? "").trim());
    if (m) {
      last = Number.parseInt(m[1], 10);
      break;
    }
  }
  if (last === null) {
    const nonEmpty = column.filter((v) => (v ?? "").trim() !== "").length;
    last = Math.max(0, nonEmpty - 1);
  }
  return `${REQUEST_PREFIX}${String(last + 1).padStart(3, "0")}`;
}

export function errorRequestNumber(now: Date = new Date()): string {
  return `${REQUEST_PREFIX}ERR-${format(now, "HHmmss")}`;
}

export function isErrorRequestNumber(id: string): boolean {
  return id.includes("ERR");
}
