// Browser-side calls to the indent routes.
import type { HistoryRowView } from "./history";
import type { IndentRequest, ReferenceItemView, SubmitIndentPayload } from "./types";

export type ApiFailure = { ok: false; error: string; kind: string; fatal: boolean; details?: string[] };

export type CatalogResponse =
  | { ok: true; departments: string[]; items: ReferenceItemView[]; totalItems: number; today: string; error: string | null }
  | ApiFailure;

export type SubmitResponse = { ok: true; request: IndentRequest; pdfUrl: string; shareUrl: string } | ApiFailure;

export type HistoryResponse =
  | {
      ok: true;
      rows: HistoryRowView[];
      total: number;
      options: { departments: string[]; requesters: string[] };
      defaults: { from: string; to: string };
      applied: { from: string; to: string };
      error: string | null;
    }
  | ApiFailure;

export type HistoryQueryInput = {
  from?: string;
  to?: string;
  departments?: string[];
  requesters?: string[];
  requestId?: string;
  item?: string;
  refresh?: boolean;
};

async function readJson<T>(res: Response, fallback: string): Promise<T | ApiFailure> {
  try {
    const body: T = await res.json();
    return body;
  } catch {
    return { ok: false, error: `${fallback} (${res.status})`, kind: "internal", fatal: false };
  }
}

export function failureText(f: ApiFailure): string {
  return f.details?.length ? `${f.error}: ${f.details.join(", ")}` : f.error;
}

export async function fetchCatalog(department: string | null, refresh = false): Promise<CatalogResponse> {
  const qs = new URLSearchParams();
  if (department) qs.set("department", department);
  if (refresh) qs.set("refresh", "1");
  const res = await fetch(`/api/indent/reference?${qs.toString()}`, { cache: "no-store" });
  return readJson<CatalogResponse>(res, "Could not load reference items");
}

export async function postIndent(payload: SubmitIndentPayload): Promise<SubmitResponse> {
  const res = await fetch("/api/indent/submit", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  });
  return readJson<SubmitResponse>(res, "Submission failed");
}

export function historySearchParams(q: HistoryQueryInput): URLSearchParams {
  const qs = new URLSearchParams();
  if (q.from) qs.set("from", q.from);
  if (q.to) qs.set("to", q.to);
  for (const d of q.departments ?? []) qs.append("department", d);
  for (const r of q.requesters ?? []) qs.append("requester", r);
  if (q.requestId?.trim()) qs.set("requestId", q.requestId.trim());
  if (q.item?.trim()) qs.set("item", q.item.trim());
  if (q.refresh) qs.set("refresh", "1");
  return qs;
}

export async function fetchHistory(q: HistoryQueryInput): Promise<HistoryResponse> {
  const res = await fetch(`/api/indent/history?${historySearchParams(q).toString()}`, { cache: "no-store" });
  return readJson<HistoryResponse>(res, "Could not load history");
}
