"use client";
import Link from "next/link";
import React, { useCallback, useEffect, useReducer, useRef, useState } from "react";
import { z } from "zod";
import { useToast } from "@/components/ToastProvider";
import { confirmSync } from "@/lib/ui";
import { readJSON, writeJSON } from "@/utils/safeStorage";
import { fetchCatalog, failureText, postIndent } from "@/lib/indent/api";
import { isoDay, notBefore } from "@/lib/indent/dates";
import { IndentForm, type FormDefaults } from "@/lib/indent/lineItems";
import { emptyReferenceTable, tableFromItems, toBaseQuantity } from "@/lib/indent/reference";
import type { IndentRequest, ReferenceItemView } from "@/lib/indent/types";

const LAST_USED_KEY = "indent:lastUsed";
const ZLastUsed = z.object({ department: z.string().nullable(), requestedBy: z.string() });
const NO_DEFAULTS: FormDefaults = { department: null, requestedBy: "" };

type Submitted = { request: IndentRequest; pdfUrl: string; shareUrl: string };

function totalQuantity(r: IndentRequest) {
  return r.lines.reduce((a, l) => a + l.quantity, 0);
}

export default function NewIndentPage() {
  const { showToast } = useToast();
  const formRef = useRef<IndentForm | null>(null);
  const [, rerender] = useReducer((n: number) => n + 1, 0);
  const [departments, setDepartments] = useState<string[]>([]);
  const [catalog, setCatalog] = useState<ReferenceItemView[]>([]);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [fatal, setFatal] = useState<string | null>(null);
  const [busy, setBusy] = useState(false);
  const [submitted, setSubmitted] = useState<Submitted | null>(null);
  const latestDept = useRef<string | null>(null);
  // server calendar day; submit checks the required date against it
  const [serverToday, setServerToday] = useState<string | null>(null);

  const loadDepartment = useCallback(async (dept: string | null, refresh = false) => {
    latestDept.current = dept;
    const res = await fetchCatalog(dept, refresh);
    if (latestDept.current !== dept) return;
    if (!res.ok) {
      if (res.fatal) setFatal(failureText(res));
      else setLoadError(failureText(res));
      return;
    }
    setDepartments(res.departments);
    setCatalog(res.items);
    setLoadError(res.error);
    setServerToday(res.today);
    if (formRef.current) formRef.current.requiredDate = notBefore(formRef.current.requiredDate, res.today);
    formRef.current?.items.setReference(tableFromItems(res.items), dept);
    rerender();
  }, []);

  useEffect(() => {
    const defaults = readJSON(LAST_USED_KEY, ZLastUsed, NO_DEFAULTS);
    formRef.current = new IndentForm(emptyReferenceTable(), { defaults, requiredDate: isoDay(new Date()) });
    rerender();
    loadDepartment(formRef.current.department).catch((e: unknown) => setLoadError(e instanceof Error ? e.message : String(e)));
  }, [loadDepartment]);

  const form = formRef.current;
  if (fatal) {
    return (
      <main className="p-6">
        <div role="alert" className="rounded border border-rose-400 bg-rose-50 p-4 text-rose-800">
          <strong>Configuration error.</strong> {fatal}
        </div>
      </main>
    );
  }
  if (!form) return <main className="p-6">Loading…</main>;

  const validity = form.items.computeValidity();
  const gate = form.gate();
  const byName = new Map(catalog.map((c) => [c.name, c]));

  function onDepartment(value: string) {
    if (!form) return;
    form.setDepartment(value || null);
    form.items.setReference(emptyReferenceTable(), form.department);
    setCatalog([]);
    rerender();
    loadDepartment(form.department).catch((e: unknown) => setLoadError(e instanceof Error ? e.message : String(e)));
  }

  function onClear() {
    if (!form) return;
    if (!confirmSync("Clear all line items?")) return;
    form.items.clear();
    rerender();
  }

  async function onSubmit() {
    if (!form || !gate.ok || busy) return;
    setBusy(true);
    try {
      const res = await postIndent(form.toPayload());
      if (!res.ok) {
        if (res.fatal) setFatal(failureText(res));
        showToast({ type: "error", message: failureText(res) });
        return;
      }
      writeJSON(LAST_USED_KEY, form.markSubmitted(serverToday ?? isoDay(new Date())));
      setSubmitted({ request: res.request, pdfUrl: res.pdfUrl, shareUrl: res.shareUrl });
      showToast({ type: "success", message: `Indent ${res.request.requestId} submitted` });
    } catch (e) {
      showToast({ type: "error", message: e instanceof Error ? e.message : String(e) });
    } finally {
      setBusy(false);
    }
  }

  if (submitted) {
    const r = submitted.request;
    return (
      <main className="p-6 max-w-3xl mx-auto">
        <h1 className="text-2xl font-semibold mb-2">Indent {r.requestId} submitted</h1>
        <p>
          {r.department} · requested by {r.requestedBy} · required {r.requiredDate}
        </p>
        <p className="mb-4">
          {r.lines.length} line(s), total quantity {totalQuantity(r)}
        </p>
        <table className="w-full text-sm mb-4">
          <thead>
            <tr><th>Item</th><th>Qty</th><th>Unit</th><th>Note</th></tr>
          </thead>
          <tbody>
            {r.lines.map((l) => (
              <tr key={l.itemName}>
                <td>{l.itemName}</td>
                <td>{l.quantity}</td>
                <td>{l.unit}</td>
                <td>{l.note || "-"}</td>
              </tr>
            ))}
          </tbody>
        </table>
        <div className="flex gap-3">
          <a href={submitted.pdfUrl} download={`Indent_${r.requestId}.pdf`}>Download PDF</a>
          <a href={submitted.shareUrl} target="_blank" rel="noreferrer">Share on WhatsApp</a>
          <button type="button" onClick={() => setSubmitted(null)}>Start new indent</button>
        </div>
      </main>
    );
  }

  const permitted = form.items.permittedItems;
  return (
    <main className="p-6 max-w-4xl mx-auto">
      <div className="flex items-center justify-between mb-4">
        <h1 className="text-2xl font-semibold">New material indent</h1>
        <Link href="/indent/history">History</Link>
      </div>
      {loadError && <div role="status" className="mb-3 text-amber-700">{loadError}</div>}

      <div className="grid grid-cols-3 gap-3 mb-4">
        <label>
          Department
          <select value={form.department ?? ""} onChange={(e) => onDepartment(e.target.value)}>
            <option value="">Select…</option>
            {departments.map((d) => (
              <option key={d} value={d}>{d}</option>
            ))}
          </select>
        </label>
        <label>
          Date required
          <input
            type="date"
            value={form.requiredDate}
            min={serverToday ?? isoDay(new Date())}
            onChange={(e) => {
              form.requiredDate = e.target.value;
              rerender();
            }}
          />
        </label>
        <label>
          Requested by
          <input
            value={form.requestedBy}
            onChange={(e) => {
              form.requestedBy = e.target.value;
              rerender();
            }}
          />
        </label>
      </div>

      <table className="w-full text-sm">
        <thead>
          <tr><th>Item</th><th>Qty</th><th>Unit</th><th>Category</th><th>Note</th><th /></tr>
        </thead>
        <tbody>
          {form.items.lines.map((row) => {
            const dup = !!row.itemName && validity.duplicateNames.has(row.itemName);
            const ref = row.itemName ? byName.get(row.itemName) : undefined;
            const base = ref ? toBaseQuantity(ref, row.quantity) : null;
            return (
              <tr key={row.id} className={dup ? "bg-rose-50" : undefined} data-duplicate={dup || undefined}>
                <td>
                  <select
                    value={row.itemName ?? ""}
                    disabled={!form.department}
                    onChange={(e) => {
                      form.items.setItem(row.id, e.target.value || null);
                      rerender();
                    }}
                  >
                    <option value="">{form.department ? "Select item…" : "Select a department first"}</option>
                    {permitted.map((name) => (
                      <option key={name} value={name}>{name}</option>
                    ))}
                  </select>
                  {dup && <div className="text-rose-700 text-xs">Duplicate item</div>}
                </td>
                <td>
                  <input
                    type="number"
                    min={0}
                    step="any"
                    value={row.quantity}
                    onChange={(e) => {
                      form.items.setQuantity(row.id, e.target.valueAsNumber);
                      rerender();
                    }}
                  />
                </td>
                <td>
                  {row.resolvedUnit}
                  {base && <div className="text-xs text-slate-500">= {base.quantity} {base.unit}</div>}
                </td>
                <td>{row.resolvedCategory ? `${row.resolvedCategory} / ${row.resolvedSubCategory ?? ""}` : ""}</td>
                <td>
                  <input
                    value={row.note}
                    maxLength={300}
                    onChange={(e) => {
                      form.items.setNote(row.id, e.target.value);
                      rerender();
                    }}
                  />
                </td>
                <td>
                  <button
                    type="button"
                    aria-label="Remove row"
                    onClick={() => {
                      form.items.removeRow(row.id);
                      rerender();
                    }}
                  >
                    ✕
                  </button>
                </td>
              </tr>
            );
          })}
        </tbody>
      </table>

      <div className="flex gap-3 my-4">
        <button
          type="button"
          onClick={() => {
            form.items.addRows(1);
            rerender();
          }}
        >
          Add row
        </button>
        <button type="button" onClick={onClear}>Clear form</button>
        <button
          type="button"
          onClick={() => {
            loadDepartment(form.department, true).catch((e: unknown) => setLoadError(e instanceof Error ? e.message : String(e)));
          }}
        >
          Refresh items
        </button>
      </div>

      {!gate.ok && (
        <ul className="text-sm text-slate-600 mb-2">
          {gate.reasons.map((r) => (
            <li key={r}>{r}</li>
          ))}
        </ul>
      )}
      <button type="button" disabled={!gate.ok || busy} onClick={() => void onSubmit()}>
        {busy ? "Submitting…" : `Submit indent (${validity.validCount} item${validity.validCount === 1 ? "" : "s"})`}
      </button>
    </main>
  );
}
