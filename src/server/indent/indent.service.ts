// src/server/indent/indent.service.ts
import { ConfigError, StoreError, ValidationError, errorMessage } from "@/lib/errors";
import { info, warn } from "@/lib/logger";
import { isoDay, logDay, logTimestamp, parseIsoDate, today } from "@/lib/indent/dates";
import { LineItemCollection } from "@/lib/indent/lineItems";
import { DEFAULT_LOG_HEADER, resolveColumns, toLogRow } from "@/lib/indent/logColumns";
import { buildReferenceTable, emptyReferenceTable, isPermitted } from "@/lib/indent/reference";
import { isErrorRequestNumber } from "@/lib/indent/requestNumber";
import { findRequest, parseLogRows } from "@/lib/indent/history";
import { UNIT_PLACEHOLDER, type HistoryRow, type IndentLine, type IndentRequest, type ReferenceItemView, type ReferenceTable } from "@/lib/indent/types";
import { allocateRequestNumber } from "./allocator";
import { TtlCache } from "./cache";
import { getIndentConfig, type IndentConfig } from "./config";
import type { SheetStore } from "./sheets";
import { getSheetStore } from "./store";
import { ZSubmitIndentInput } from "./indent.validation";

export type IndentDeps = {
  store: SheetStore;
  config: IndentConfig;
  now: () => Date;
};

export type LoadResult<T> = { data: T; error: string | null };

type StoreCaches = {
  reference: TtlCache<ReferenceTable>;
  log: TtlCache<HistoryRow[]>;
};

const caches = new WeakMap<SheetStore, StoreCaches>();

function resolveDeps(deps?: Partial<IndentDeps>): IndentDeps {
  return {
    config: deps?.config ?? getIndentConfig(),
    store: deps?.store ?? getSheetStore(),
    now: deps?.now ?? (() => new Date()),
  };
}

function cachesFor({ store, config }: IndentDeps): StoreCaches {
  let c = caches.get(store);
  if (!c) {
    c = {
      reference: new TtlCache(async () => buildReferenceTable(await store.getValues(config.referenceSheet))),
      log: new TtlCache(async () => parseLogRows(await store.getValues(config.logSheet))),
    };
    caches.set(store, c);
  }
  return c;
}

/** Reads degrade to an empty result plus a message; configuration errors stay fatal. */
async function degrade<T>(what: string, empty: T, load: () => Promise<T>): Promise<LoadResult<T>> {
  try {
    return { data: await load(), error: null };
  } catch (e) {
    if (e instanceof ConfigError) throw e;
    warn({ event: "indent.read_failed", what, error: errorMessage(e) });
    return { data: empty, error: `Could not load ${what}: ${errorMessage(e)}` };
  }
}

export async function loadReference(opts: { refresh?: boolean } = {}, deps?: Partial<IndentDeps>): Promise<LoadResult<ReferenceTable>> {
  const d = resolveDeps(deps);
  const cache = cachesFor(d).reference;
  if (opts.refresh) cache.invalidate();
  return degrade("reference items", emptyReferenceTable(), () => cache.get(d.config.referenceTtlMs));
}

export async function loadHistory(opts: { refresh?: boolean } = {}, deps?: Partial<IndentDeps>): Promise<LoadResult<HistoryRow[]>> {
  const d = resolveDeps(deps);
  const cache = cachesFor(d).log;
  if (opts.refresh) cache.invalidate();
  return degrade("indent log", [], () => cache.get(d.config.logTtlMs));
}

/** Departments plus the items the given department may request. */
export async function getDepartmentCatalog(department: string | null, opts: { refresh?: boolean } = {}, deps?: Partial<IndentDeps>) {
  const d = resolveDeps(deps);
  const { data: table, error } = await loadReference(opts, d);
  const dept = department?.trim() || null;
  const items: ReferenceItemView[] = dept
    ? table.items
        .filter((it) => isPermitted(it, dept))
        .map(({ name, unit, category, subCategory, baseUnit, conversionFactor }) => ({ name, unit, category, subCategory, baseUnit, conversionFactor }))
    : [];
  // the server's calendar day; the required-date check in submitIndent uses the same one
  return { departments: d.config.departments, items, totalItems: table.items.length, today: isoDay(today(d.now())), error };
}

function compareCI(a: string, b: string) {
  return a.toLowerCase().localeCompare(b.toLowerCase());
}

export function sortLines(lines: readonly IndentLine[]): IndentLine[] {
  return [...lines].sort(
    (a, b) => compareCI(a.category, b.category) || compareCI(a.subCategory, b.subCategory) || compareCI(a.itemName, b.itemName),
  );
}

/**
 * Validates, numbers and appends one indent request.
 *
 * Every check runs before the log is touched. Units and categories come from
 * the server's reference table, whatever the browser displayed. The lines go
 * out in one append; on failure nothing is reported as written.
 */
export async function submitIndent(input: unknown, deps?: Partial<IndentDeps>): Promise<IndentRequest> {
  const d = resolveDeps(deps);
  const { department, requiredDate, requestedBy, lines } = ZSubmitIndentInput.parse(input);
  const now = d.now();

  const dept = d.config.departments.find((x) => x.toLowerCase() === department.toLowerCase());
  if (!dept) throw new ValidationError(`Unknown department '${department}'`);
  const required = parseIsoDate(requiredDate);
  if (!required) throw new ValidationError("Invalid required date");
  if (required.getTime() < today(now).getTime()) throw new ValidationError("Date required cannot be in the past");

  const table = await cachesFor(d).reference.get(d.config.referenceTtlMs);
  const items = new LineItemCollection(table, lines.length);
  items.onDepartmentChange(dept);
  const ids = items.lines.map((r) => r.id);
  lines.forEach((line, i) => {
    items.setItem(ids[i], line.itemName);
    items.setQuantity(ids[i], line.quantity);
    items.setNote(ids[i], line.note);
  });

  const validity = items.computeValidity();
  if (validity.hasDuplicates) {
    throw new ValidationError("Duplicate items detected. Submission aborted.", Array.from(validity.duplicateNames));
  }
  const rows = items.lines;
  const unknown = rows.filter((r) => r.resolvedUnit === UNIT_PLACEHOLDER).map((r) => r.itemName ?? "");
  if (unknown.length) throw new ValidationError("Unknown items", unknown);
  const permitted = new Set(items.permittedItems);
  const blocked = rows.filter((r) => r.itemName && !permitted.has(r.itemName)).map((r) => r.itemName ?? "");
  if (blocked.length) throw new ValidationError(`Items not available for ${dept}`, blocked);
  if (!validity.hasAtLeastOneValidLine) throw new ValidationError("No valid items found to submit.");

  const { requestId, header } = await allocateRequestNumber(d.store, d.config.logSheet, now);
  if (isErrorRequestNumber(requestId)) {
    throw new StoreError(`Could not allocate a request number (${requestId}). Nothing was written; try again.`);
  }

  const createdAt = logTimestamp(now);
  const finalLines = sortLines(
    rows.map((r) => ({
      itemName: r.itemName ?? "",
      quantity: r.quantity,
      unit: r.resolvedUnit,
      note: r.note.trim(),
      category: r.resolvedCategory ?? "",
      subCategory: r.resolvedSubCategory ?? "",
    })),
  );

  const map = resolveColumns(header);
  const batch = finalLines.map((l) =>
    toLogRow(map, {
      requestId,
      timestamp: createdAt,
      requestedBy,
      department: dept,
      requiredDate: logDay(required),
      itemName: l.itemName,
      quantity: String(l.quantity),
      unit: l.unit,
      note: l.note || "N/A",
      category: l.category,
      subCategory: l.subCategory,
    }),
  );
  if (!header) batch.unshift([...DEFAULT_LOG_HEADER]);

  try {
    await d.store.appendRows(d.config.logSheet, batch);
  } catch (e) {
    if (e instanceof StoreError || e instanceof ConfigError) throw e;
    throw new StoreError(`Submitting ${requestId} failed: ${errorMessage(e)}`);
  }
  cachesFor(d).log.invalidate();

  info({ event: "indent.submitted", requestId, department: dept, lines: finalLines.length });

  return { requestId, createdAt, department: dept, requiredDate, requestedBy, lines: finalLines };
}

/**
 * The submitted request as recorded in the log, or null when the number is
 * unknown. A miss reloads the log once, since the cached copy may predate the
 * append or come from before another instance wrote.
 */
export async function getRequest(requestId: string, deps?: Partial<IndentDeps>): Promise<IndentRequest | null> {
  const d = resolveDeps(deps);
  const cache = cachesFor(d).log;
  const found = findRequest(await cache.get(d.config.logTtlMs), requestId);
  if (found) return found;
  cache.invalidate();
  return findRequest(await cache.get(d.config.logTtlMs), requestId);
}
