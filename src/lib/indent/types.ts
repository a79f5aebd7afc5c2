// src/lib/indent/types.ts

/** Sentinel unit shown for a row whose item is blank or unknown. */
export const UNIT_PLACEHOLDER = "-";
export const DEFAULT_CATEGORY = "Uncategorized";
export const DEFAULT_SUB_CATEGORY = "General";

export type PermittedDepartments = "all" | readonly string[];

export type ReferenceItem = {
  name: string;
  unit: string;
  category: string;
  subCategory: string;
  departments: PermittedDepartments;
  baseUnit: string | null;
  conversionFactor: number | null;
};

/** Item as sent to the browser, already filtered for one department. */
export type ReferenceItemView = Omit<ReferenceItem, "departments">;

export type ReferenceTable = {
  readonly items: readonly ReferenceItem[];
  /** keyed by lower-cased item name */
  readonly byName: ReadonlyMap<string, ReferenceItem>;
};

export type ResolvedFields = {
  unit: string;
  category: string | null;
  subCategory: string | null;
};

export type LineItem = {
  readonly id: string;
  itemName: string | null;
  quantity: number;
  note: string;
  resolvedUnit: string;
  resolvedCategory: string | null;
  resolvedSubCategory: string | null;
};

export type IndentLine = {
  itemName: string;
  quantity: number;
  unit: string;
  note: string;
  category: string;
  subCategory: string;
};

/** One submission. Dates travel as strings: requiredDate is yyyy-MM-dd, createdAt is yyyy-MM-dd HH:mm:ss. */
export type IndentRequest = {
  requestId: string;
  createdAt: string;
  department: string;
  requiredDate: string;
  requestedBy: string;
  lines: IndentLine[];
};

export type HistoryRow = {
  requestId: string;
  timestamp: Date | null;
  requestedBy: string;
  department: string;
  requiredDate: Date | null;
  itemName: string;
  quantity: number;
  unit: string;
  note: string;
  category: string;
  subCategory: string;
};

export type HistoryFilters = {
  from?: Date | null;
  to?: Date | null;
  departments?: readonly string[];
  requesters?: readonly string[];
  requestId?: string;
  item?: string;
};

/** What the browser posts; units and categories are derived again on the server. */
export type SubmitIndentPayload = {
  department: string;
  requiredDate: string;
  requestedBy: string;
  lines: { itemName: string; quantity: number; note: string }[];
};
