// src/server/indent/indent.validation.ts
import { z } from "zod";

export const ZDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD");
export const ZDepartment = z.string().trim().min(1, "Select a department");
export const ZQty = z.number().positive();

export const ZIndentLineInput = z.object({
  itemName: z.string().trim().min(1),
  quantity: ZQty,
  note: z.string().max(300).default(""),
});

export const ZSubmitIndentInput = z.object({
  department: ZDepartment,
  requiredDate: ZDate,
  requestedBy: z.string().trim().min(1, "Enter who is requesting").max(120),
  lines: z.array(ZIndentLineInput).min(1, "Add at least one item").max(200),
});

const ZList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((v) => (v === undefined ? [] : (Array.isArray(v) ? v : v.split(","))).map((s) => s.trim()).filter(Boolean));

export const ZHistoryQuery = z.object({
  from: ZDate.optional(),
  to: ZDate.optional(),
  department: ZList,
  requester: ZList,
  requestId: z.string().trim().default(""),
  item: z.string().trim().default(""),
  refresh: z.string().optional(),
});

export const ZPdfQuery = z.object({
  requestId: z.string().trim().regex(/^MRN-\d+$/, "Unknown request number"),
});
