// src/lib/indent/reference.ts
import {
  DEFAULT_CATEGORY,
  DEFAULT_SUB_CATEGORY,
  UNIT_PLACEHOLDER,
  type PermittedDepartments,
  type ReferenceItem,
  type ReferenceItemView,
  type ReferenceTable,
  type ResolvedFields,
} from "./types";

const BLANK_FIELDS: ResolvedFields = { unit: UNIT_PLACEHOLDER, category: null, subCategory: null };

function cell(row: readonly unknown[], i: number): string {
  const v = row[i];
  return v === undefined || v === null ? "" : String(v).trim();
}

function isHeaderRow(row: readonly unknown[]): boolean {
  return cell(row, 0).toLowerCase().includes("item") || cell(row, 1).toLowerCase().includes("unit");
}

function parseDepartments(raw: string): PermittedDepartments {
  const parts = raw
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  if (parts.length === 0 || parts.some((p) => p.toLowerCase() === "all")) return "all";
  return parts;
}

function parseFactor(raw: string): number | null {
  if (!raw) return null;
  const n = Number(raw.replace(/,/g, ""));
  return Number.isFinite(n) && n > 0 ? n : null;
}

/**
 * Builds the lookup table from the raw reference worksheet.
 *
 * Columns: item, unit, permitted departments (comma list or "all"), category,
 * sub-category, and optionally base unit and conversion factor. The first row is
 * taken as a header when it mentions "item" or "unit". Names are unique without
 * regard to case; the first occurrence wins.
 */
export function buildReferenceTable(rows: readonly (readonly unknown[])[]): ReferenceTable {
  const byName = new Map<string, ReferenceItem>();
  rows.forEach((row, i) => {
    if (!row.some((_, j) => cell(row, j) !== "")) return;
    if (i === 0 && isHeaderRow(row)) return;
    const name = cell(row, 0);
    const key = name.toLowerCase();
    if (!name || byName.has(key)) return;
    const baseUnit = cell(row, 5) || null;
    byName.set(key, {
      name,
      unit: cell(row, 1) || "N/A",
      departments: parseDepartments(cell(row, 2)),
      category: cell(row, 3) || DEFAULT_CATEGORY,
      subCategory: cell(row, 4) || DEFAULT_SUB_CATEGORY,
      baseUnit,
      conversionFactor: baseUnit ? parseFactor(cell(row, 6)) : null,
    });
  });
  const items = Array.from(byName.values()).sort((a, b) => a.name.localeCompare(b.name));
  return { items, byName };
}

/** Table over items already filtered for one department; every item is permitted. */
export function tableFromItems(items: readonly ReferenceItemView[]): ReferenceTable {
  const byName = new Map<string, ReferenceItem>();
  for (const it of items) {
    const key = it.name.toLowerCase();
    if (!byName.has(key)) byName.set(key, { ...it, departments: "all" });
  }
  return { items: Array.from(byName.values()), byName };
}

export function emptyReferenceTable(): ReferenceTable {
  return { items: [], byName: new Map() };
}

export function findItem(table: ReferenceTable, name: string | null | undefined): ReferenceItem | null {
  if (!name) return null;
  return table.byName.get(name.trim().toLowerCase()) ?? null;
}

/** Derives unit and grouping for an item name; unknown or blank names get placeholders. */
export function resolveItem(table: ReferenceTable, name: string | null | undefined): ResolvedFields {
  const item = findItem(table, name);
  if (!item) return BLANK_FIELDS;
  return { unit: item.unit || UNIT_PLACEHOLDER, category: item.category, subCategory: item.subCategory };
}

export function isPermitted(item: ReferenceItem, department: string): boolean {
  if (item.departments === "all") return true;
  const d = department.trim().toLowerCase();
  return item.departments.some((p) => p.toLowerCase() === d);
}

/** Names of the items a department may request, sorted. */
export function permittedItems(table: ReferenceTable, department: string | null | undefined): string[] {
  if (!department) return [];
  return table.items.filter((it) => isPermitted(it, department)).map((it) => it.name);
}

export function toBaseQuantity(item: Pick<ReferenceItem, "baseUnit" | "conversionFactor">, quantity: number): { quantity: number; unit: string } | null {
  if (!item.baseUnit || item.conversionFactor === null) return null;
  return { quantity: quantity * item.conversionFactor, unit: item.baseUnit };
}
