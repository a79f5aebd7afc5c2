// src/lib/indent/lineItems.ts
import { findItem, permittedItems, resolveItem } from "./reference";
import { checkLines, isValidLine, submitGate, type GateResult, type Validity } from "./validity";
import { UNIT_PLACEHOLDER, type LineItem, type ReferenceTable, type SubmitIndentPayload } from "./types";

/**
 * Ordered rows the user is editing. Never empty: removing the last row or
 * clearing leaves one blank row behind.
 */
export class LineItemCollection {
  private rows: LineItem[] = [];
  private seq = 0;
  private reference: ReferenceTable;
  private permitted: string[] = [];

  constructor(reference: ReferenceTable, initialRows = 1) {
    this.reference = reference;
    this.addRows(Math.max(1, initialRows));
  }

  get lines(): readonly LineItem[] {
    return this.rows.map((r) => ({ ...r }));
  }

  get size(): number {
    return this.rows.length;
  }

  /** Item names selectable under the current department. */
  get permittedItems(): readonly string[] {
    return this.permitted;
  }

  private blank(): LineItem {
    this.seq += 1;
    return {
      id: `row-${this.seq}`,
      itemName: null,
      quantity: 1,
      note: "",
      resolvedUnit: UNIT_PLACEHOLDER,
      resolvedCategory: null,
      resolvedSubCategory: null,
    };
  }

  private find(id: string): LineItem | undefined {
    return this.rows.find((r) => r.id === id);
  }

  addRows(n = 1): string[] {
    const added: LineItem[] = [];
    for (let i = 0; i < n; i++) added.push(this.blank());
    this.rows.push(...added);
    return added.map((r) => r.id);
  }

  removeRow(id: string): boolean {
    if (!this.find(id)) return false;
    this.rows = this.rows.filter((r) => r.id !== id);
    if (this.rows.length === 0) this.rows.push(this.blank());
    return true;
  }

  clear(): void {
    this.rows = [this.blank()];
  }

  setItem(id: string, itemName: string | null): boolean {
    const row = this.find(id);
    if (!row) return false;
    const trimmed = itemName?.trim() || null;
    // keep the reference spelling when the name is known
    row.itemName = findItem(this.reference, trimmed)?.name ?? trimmed;
    const resolved = resolveItem(this.reference, row.itemName);
    row.resolvedUnit = resolved.unit;
    row.resolvedCategory = resolved.category;
    row.resolvedSubCategory = resolved.subCategory;
    return true;
  }

  setQuantity(id: string, value: number): boolean {
    const row = this.find(id);
    if (!row) return false;
    row.quantity = Number.isFinite(value) ? value : 0;
    return true;
  }

  setNote(id: string, text: string): boolean {
    const row = this.find(id);
    if (!row) return false;
    row.note = text;
    return true;
  }

  /**
   * Recomputes the permitted item set and blanks every row's selection, since
   * earlier picks may not be valid for the new department.
   */
  onDepartmentChange(department: string | null): readonly string[] {
    this.permitted = permittedItems(this.reference, department);
    for (const row of this.rows) {
      row.itemName = null;
      row.note = "";
      row.resolvedUnit = UNIT_PLACEHOLDER;
      row.resolvedCategory = null;
      row.resolvedSubCategory = null;
    }
    return this.permitted;
  }

  /** Swaps in a refreshed reference table and re-derives every row from it. */
  setReference(reference: ReferenceTable, department: string | null): void {
    this.reference = reference;
    this.permitted = permittedItems(reference, department);
    for (const row of this.rows) this.setItem(row.id, row.itemName);
  }

  computeValidity(): Validity {
    return checkLines(this.rows);
  }

  submittableLines(): SubmitIndentPayload["lines"] {
    return this.rows
      .filter(isValidLine)
      .map((r) => ({ itemName: r.itemName ?? "", quantity: r.quantity, note: r.note.trim() }));
  }
}

export type FormDefaults = { department: string | null; requestedBy: string };

export type IndentFormOptions = {
  initialRows?: number;
  defaults?: FormDefaults;
  requiredDate: string;
};

/** View-model for the new-indent view: header fields plus the line items. */
export class IndentForm {
  readonly items: LineItemCollection;
  department: string | null = null;
  requiredDate: string;
  requestedBy = "";
  lastUsed: FormDefaults;

  constructor(reference: ReferenceTable, opts: IndentFormOptions) {
    this.items = new LineItemCollection(reference, opts.initialRows ?? 5);
    this.requiredDate = opts.requiredDate;
    this.lastUsed = opts.defaults ?? { department: null, requestedBy: "" };
    this.requestedBy = this.lastUsed.requestedBy;
    if (this.lastUsed.department) this.setDepartment(this.lastUsed.department);
  }

  setDepartment(department: string | null): void {
    const next = department?.trim() || null;
    if (next === this.department) return;
    this.department = next;
    this.items.onDepartmentChange(next);
  }

  gate(): GateResult {
    return submitGate({ validity: this.items.computeValidity(), department: this.department, requestedBy: this.requestedBy });
  }

  toPayload(): SubmitIndentPayload {
    return {
      department: this.department ?? "",
      requiredDate: this.requiredDate,
      requestedBy: this.requestedBy.trim(),
      lines: this.items.submittableLines(),
    };
  }

  /** After a successful write: one blank row, department and requester kept for the next request. */
  markSubmitted(requiredDate: string): FormDefaults {
    this.lastUsed = { department: this.department, requestedBy: this.requestedBy.trim() };
    this.items.clear();
    this.requiredDate = requiredDate;
    return this.lastUsed;
  }
}
