// src/lib/indent/history.ts
import { daysAgo, isoDay, logTimestamp, parseWithFormats, REQUIRED_DATE_FORMATS, TIMESTAMP_FORMATS } from "./dates";
import { columnOf, resolveColumns, type LogField } from "./logColumns";
import { DEFAULT_CATEGORY, DEFAULT_SUB_CATEGORY, type HistoryFilters, type HistoryRow, type IndentRequest } from "./types";

export const DEFAULT_HISTORY_DAYS = 90;

function toNumber(raw: string): number {
  const n = Number(raw.replace(/,/g, "").trim());
  return raw.trim() !== "" && Number.isFinite(n) ? n : 0;
}

/**
 * Typed rows from the raw log values. The first row is the header; columns are
 * found through it. Unparseable dates become null and quantities 0 instead of
 * failing the load.
 */
export function parseLogRows(values: readonly (readonly unknown[])[]): HistoryRow[] {
  if (values.length === 0) return [];
  const map = resolveColumns(values[0]);
  const body = map.fromHeader ? values.slice(1) : values;
  const idx = (f: LogField) => columnOf(map, f);
  const get = (row: readonly unknown[], f: LogField) => {
    const i = idx(f);
    const v = i >= 0 ? row[i] : undefined;
    return v === undefined || v === null ? "" : String(v).trim();
  };

  const out: HistoryRow[] = [];
  for (const row of body) {
    if (!row.some((c) => String(c ?? "").trim() !== "")) continue;
    const note = get(row, "note");
    out.push({
      requestId: get(row, "requestId"),
      timestamp: parseWithFormats(get(row, "timestamp"), TIMESTAMP_FORMATS),
      requestedBy: get(row, "requestedBy"),
      department: get(row, "department"),
      requiredDate: parseWithFormats(get(row, "requiredDate"), REQUIRED_DATE_FORMATS),
      itemName: get(row, "itemName"),
      quantity: toNumber(get(row, "quantity")),
      unit: get(row, "unit"),
      note: note === "N/A" ? "" : note,
      category: get(row, "category") || DEFAULT_CATEGORY,
      subCategory: get(row, "subCategory") || DEFAULT_SUB_CATEGORY,
    });
  }
  return out;
}

function dayValue(d: Date): number {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate()).getTime();
}

/** Conjunction of every filter that is set; an empty filter object keeps every row. */
export function applyHistoryFilters(rows: readonly HistoryRow[], filters: HistoryFilters): HistoryRow[] {
  const from = filters.from ? dayValue(filters.from) : null;
  const to = filters.to ? dayValue(filters.to) : null;
  const depts = filters.departments?.length ? new Set(filters.departments) : null;
  const requesters = filters.requesters?.length ? new Set(filters.requesters) : null;
  const idQ = (filters.requestId ?? "").trim().toLowerCase();
  const itemQ = (filters.item ?? "").trim().toLowerCase();

  return rows.filter((r) => {
    if (from !== null || to !== null) {
      if (!r.requiredDate) return false;
      const d = dayValue(r.requiredDate);
      if (from !== null && d < from) return false;
      if (to !== null && d > to) return false;
    }
    if (depts && !depts.has(r.department)) return false;
    if (requesters && !requesters.has(r.requestedBy)) return false;
    if (idQ && !r.requestId.toLowerCase().includes(idQ)) return false;
    if (itemQ && !r.itemName.toLowerCase().includes(itemQ)) return false;
    return true;
  });
}

/** Newest submission first; rows without a timestamp last. */
export function sortHistory(rows: readonly HistoryRow[]): HistoryRow[] {
  return [...rows].sort((a, b) => {
    const ta = a.timestamp?.getTime() ?? -Infinity;
    const tb = b.timestamp?.getTime() ?? -Infinity;
    if (ta !== tb) return tb > ta ? 1 : -1;
    return b.requestId.localeCompare(a.requestId);
  });
}

/** Trailing window on the required date, open-ended so upcoming requests stay visible. */
export function defaultHistoryFilters(now: Date = new Date(), days: number = DEFAULT_HISTORY_DAYS): HistoryFilters {
  return { from: daysAgo(now, days), to: null, departments: [], requesters: [], requestId: "", item: "" };
}

export function historyOptions(rows: readonly HistoryRow[]): { departments: string[]; requesters: string[] } {
  const uniq = (xs: string[]) => Array.from(new Set(xs.filter(Boolean))).sort((a, b) => a.localeCompare(b));
  return { departments: uniq(rows.map((r) => r.department)), requesters: uniq(rows.map((r) => r.requestedBy)) };
}

/** Rebuilds a submitted request from its log rows, or null when the id is not in the log. */
export function findRequest(rows: readonly HistoryRow[], requestId: string): IndentRequest | null {
  const mine = rows.filter((r) => r.requestId === requestId);
  const first = mine[0];
  if (!first) return null;
  return {
    requestId,
    createdAt: first.timestamp ? logTimestamp(first.timestamp) : "",
    department: first.department,
    requiredDate: first.requiredDate ? isoDay(first.requiredDate) : "",
    requestedBy: first.requestedBy,
    lines: mine.map((r) => ({
      itemName: r.itemName,
      quantity: r.quantity,
      unit: r.unit,
      note: r.note,
      category: r.category,
      subCategory: r.subCategory,
    })),
  };
}

/** JSON shape of a history row; dates as yyyy-MM-dd / yyyy-MM-dd HH:mm:ss, blank when unknown. */
export type HistoryRowView = Omit<HistoryRow, "timestamp" | "requiredDate"> & { timestamp: string; requiredDate: string };

export function toHistoryRowView(row: HistoryRow): HistoryRowView {
  return {
    ...row,
    timestamp: row.timestamp ? logTimestamp(row.timestamp) : "",
    requiredDate: row.requiredDate ? isoDay(row.requiredDate) : "",
  };
}
