// src/server/indent/history.service.ts
import { isoDay, parseIsoDate } from "@/lib/indent/dates";
import { applyHistoryFilters, defaultHistoryFilters, historyOptions, sortHistory, toHistoryRowView } from "@/lib/indent/history";
import type { HistoryFilters } from "@/lib/indent/types";
import { loadHistory, type IndentDeps } from "./indent.service";
import { getIndentConfig } from "./config";
import { ZHistoryQuery } from "./indent.validation";

/**
 * Filtered, newest-first history. Without a `from` date the trailing window
 * (INDENT_HISTORY_DAYS) applies; options are computed over the whole log.
 */
export async function queryHistory(query: unknown, deps?: Partial<IndentDeps>) {
  const q = ZHistoryQuery.parse(query);
  const config = deps?.config ?? getIndentConfig();
  const now = (deps?.now ?? (() => new Date()))();
  const { data, error } = await loadHistory({ refresh: q.refresh === "1" }, { ...deps, config });

  const defaults = defaultHistoryFilters(now, config.historyDays);
  const filters: HistoryFilters = {
    from: q.from ? parseIsoDate(q.from) : defaults.from,
    to: q.to ? parseIsoDate(q.to) : null,
    departments: q.department,
    requesters: q.requester,
    requestId: q.requestId,
    item: q.item,
  };
  const rows = sortHistory(applyHistoryFilters(data, filters));

  return {
    rows: rows.map(toHistoryRowView),
    total: data.length,
    options: historyOptions(data),
    defaults: { from: defaults.from ? isoDay(defaults.from) : "", to: "" },
    applied: {
      from: filters.from ? isoDay(filters.from) : "",
      to: filters.to ? isoDay(filters.to) : "",
    },
    error,
  };
}
