/* In-process stand-in for the spreadsheet, plus fixtures shared by the indent specs */
import { StoreError } from "@/lib/errors";
import { DEFAULT_LOG_HEADER } from "@/lib/indent/logColumns";
import type { IndentConfig } from "@/server/indent/config";
import type { SheetStore } from "@/server/indent/sheets";

export class MemorySheetStore implements SheetStore {
  readonly sheets = new Map<string, string[][]>();
  readonly reads: string[] = [];
  readonly appends: { sheet: string; rows: string[][] }[] = [];
  failReads = new Set<string>();
  failAppend: Error | null = null;

  constructor(initial: Record<string, string[][]> = {}) {
    for (const [k, v] of Object.entries(initial)) this.sheets.set(k, v.map((r) => [...r]));
  }

  async getValues(sheet: string): Promise<string[][]> {
    this.reads.push(sheet);
    if (this.failReads.has(sheet)) throw new StoreError(`read ${sheet} failed`, 503);
    return (this.sheets.get(sheet) ?? []).map((r) => [...r]);
  }

  async appendRows(sheet: string, rows: string[][]): Promise<void> {
    if (this.failAppend) throw this.failAppend;
    this.appends.push({ sheet, rows: rows.map((r) => [...r]) });
    this.sheets.set(sheet, [...(this.sheets.get(sheet) ?? []), ...rows]);
  }
}

export const REFERENCE_ROWS: string[][] = [
  ["Item", "Unit", "Departments", "Category", "Sub-Category", "Base Unit", "Factor"],
  ["Salt", "kg", "Kitchen", "Dry Goods", "Spices"],
  ["Sugar", "kg", "Kitchen, Bar", "Dry Goods", "Sweeteners"],
  ["Soap", "pcs", "Housekeeping", "Cleaning", "Supplies"],
  ["Rice", "bag", "all", "Dry Goods", "Grains", "kg", "25"],
];

export const LOG_HEADER: string[] = [...DEFAULT_LOG_HEADER];

export function testConfig(overrides: Partial<IndentConfig> = {}): IndentConfig {
  return {
    serviceAccount: { client_email: "svc@example.com", private_key: "test-secret" },
    spreadsheetId: "sheet-test",
    logSheet: "Sheet1",
    referenceSheet: "reference",
    departments: ["Kitchen", "Bar", "Housekeeping", "Admin", "Maintenance"],
    referenceTtlMs: 300_000,
    logTtlMs: 60_000,
    historyDays: 90,
    sharePhone: null,
    phoneCountry: "",
    ...overrides,
  };
}
