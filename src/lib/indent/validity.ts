// src/lib/indent/validity.ts
import { UNIT_PLACEHOLDER, type LineItem } from "./types";

export type Validity = {
  validCount: number;
  hasAtLeastOneValidLine: boolean;
  hasDuplicates: boolean;
  duplicateNames: Set<string>;
};

type CheckedLine = Pick<LineItem, "itemName" | "quantity" | "resolvedUnit">;

export function isValidLine(line: CheckedLine): boolean {
  return (
    !!line.itemName &&
    Number.isFinite(line.quantity) &&
    line.quantity > 0 &&
    line.resolvedUnit !== UNIT_PLACEHOLDER
  );
}

/**
 * Counts valid lines and flags every item name selected more than once.
 * Names are compared exactly (case-sensitive); blank names are ignored.
 */
export function checkLines(lines: readonly CheckedLine[]): Validity {
  const counts = new Map<string, number>();
  let validCount = 0;
  for (const line of lines) {
    if (isValidLine(line)) validCount++;
    if (line.itemName) counts.set(line.itemName, (counts.get(line.itemName) ?? 0) + 1);
  }
  const duplicateNames = new Set<string>();
  counts.forEach((n, name) => {
    if (n > 1) duplicateNames.add(name);
  });
  return {
    validCount,
    hasAtLeastOneValidLine: validCount > 0,
    hasDuplicates: duplicateNames.size > 0,
    duplicateNames,
  };
}

export type GateInput = {
  validity: Validity;
  department: string | null;
  requestedBy: string;
};

export type GateResult = { ok: boolean; reasons: string[] };

export function submitGate({ validity, department, requestedBy }: GateInput): GateResult {
  const reasons: string[] = [];
  if (!validity.hasAtLeastOneValidLine) reasons.push("Add at least one valid item (with quantity > 0).");
  if (validity.hasDuplicates) reasons.push(`Remove duplicate item entries (${Array.from(validity.duplicateNames).join(", ")}).`);
  if (!department || !department.trim()) reasons.push("Select a department.");
  if (!requestedBy.trim()) reasons.push("Enter who is requesting.");
  return { ok: reasons.length === 0, reasons };
}
