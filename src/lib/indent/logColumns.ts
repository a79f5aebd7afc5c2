// src/lib/indent/logColumns.ts

export type LogField =
  | "requestId"
  | "timestamp"
  | "requestedBy"
  | "department"
  | "requiredDate"
  | "itemName"
  | "quantity"
  | "unit"
  | "note"
  | "category"
  | "subCategory";

/** Header written to an empty log. */
export const DEFAULT_LOG_HEADER = [
  "MRN",
  "Timestamp",
  "Requested By",
  "Department",
  "Date Required",
  "Item",
  "Qty",
  "Unit",
  "Note",
  "Category",
  "Sub-Category",
] as const;

const DEFAULT_FIELDS: readonly LogField[] = [
  "requestId",
  "timestamp",
  "requestedBy",
  "department",
  "requiredDate",
  "itemName",
  "quantity",
  "unit",
  "note",
  "category",
  "subCategory",
];

const ALIASES: Record<LogField, readonly string[]> = {
  requestId: ["mrn", "requestid", "requestno", "requestnumber", "indentno"],
  timestamp: ["timestamp", "submittedon", "createdat"],
  requestedBy: ["requestedby", "requester"],
  department: ["department", "dept"],
  requiredDate: ["daterequired", "requireddate", "datereqd"],
  itemName: ["item", "itemname", "material"],
  quantity: ["qty", "quantity"],
  unit: ["unit"],
  note: ["note", "notes", "remarks"],
  category: ["category"],
  subCategory: ["subcategory"],
};

function norm(header: unknown): string {
  return String(header ?? "")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "");
}

export type ColumnMap = {
  /** field per column index; null for columns this app does not know */
  fields: (LogField | null)[];
  /** whether the mapping came from a header row */
  fromHeader: boolean;
};

/**
 * Maps the log's header row onto fields. A row that does not name both the request
 * number and the item is not a header; the default layout applies then.
 */
export function resolveColumns(header: readonly unknown[] | undefined): ColumnMap {
  const fields = (header ?? []).map((h) => {
    const n = norm(h);
    const hit = DEFAULT_FIELDS.find((f) => ALIASES[f].includes(n));
    return hit ?? null;
  });
  if (fields.includes("requestId") && fields.includes("itemName")) return { fields, fromHeader: true };
  return { fields: [...DEFAULT_FIELDS], fromHeader: false };
}

export function columnOf(map: ColumnMap, field: LogField): number {
  return map.fields.indexOf(field);
}

export function toLogRow(map: ColumnMap, values: Record<LogField, string>): string[] {
  return map.fields.map((f) => (f ? values[f] : ""));
}
