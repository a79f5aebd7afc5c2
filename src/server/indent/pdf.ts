// src/server/indent/pdf.ts
import { jsPDF } from "jspdf";
import autoTable, { type RowInput } from "jspdf-autotable";
import { RenderError, errorMessage } from "@/lib/errors";
import { logDay, parseIsoDate } from "@/lib/indent/dates";
import type { IndentLine, IndentRequest } from "@/lib/indent/types";

export const PDF_HEAD = [["Item", "Qty", "Unit", "Note"]];

export function pdfFileName(requestId: string) {
  return `Indent_${requestId}.pdf`;
}

function groupLabel(l: IndentLine) {
  return `${l.category} / ${l.subCategory}`;
}

/**
 * Table body grouped by category and sub-category. Lines are expected in
 * sorted order; a spanning group row opens each new group.
 */
export function buildIndentTableBody(lines: readonly IndentLine[]): RowInput[] {
  const body: RowInput[] = [];
  let current: string | null = null;
  for (const l of lines) {
    const label = groupLabel(l);
    if (label !== current) {
      current = label;
      body.push([{ content: label, colSpan: 4, styles: { fontStyle: "bold", fillColor: [235, 235, 235] } }]);
    }
    body.push([l.itemName, l.quantity.toFixed(2), l.unit, l.note.trim() || "-"]);
  }
  return body;
}

export function headerLines(r: IndentRequest): string[] {
  const required = parseIsoDate(r.requiredDate);
  return [
    `MRN: ${r.requestId}`,
    `Requested By: ${r.requestedBy}`,
    `Department: ${r.department}`,
    `Date Required: ${required ? logDay(required) : r.requiredDate}`,
    `Submitted: ${r.createdAt}`,
  ];
}

export function renderIndentPdf(r: IndentRequest): Buffer {
  try {
    const doc = new jsPDF({ unit: "pt", format: "a4" });
    doc.setFontSize(14);
    doc.text("Material Indent Request", 40, 40);
    doc.setFontSize(10);
    const lines = headerLines(r);
    lines.forEach((t, i) => doc.text(t, 40, 62 + i * 14));

    autoTable(doc, {
      head: PDF_HEAD,
      body: buildIndentTableBody(r.lines),
      startY: 62 + lines.length * 14 + 10,
      styles: { fontSize: 9, cellPadding: 4 },
      headStyles: { fillColor: [30, 30, 30], textColor: 255 },
      columnStyles: { 1: { halign: "right" } },
    });

    const total = doc.getNumberOfPages();
    const width = doc.internal.pageSize.getWidth();
    const height = doc.internal.pageSize.getHeight();
    for (let page = 1; page <= total; page++) {
      doc.setPage(page);
      doc.setFontSize(9);
      doc.text(`${page} / ${total}`, width - 40, height - 20, { align: "right" });
    }

    return Buffer.from(doc.output("arraybuffer"));
  } catch (e) {
    throw new RenderError(`Could not render PDF for ${r.requestId}: ${errorMessage(e)}`);
  }
}
