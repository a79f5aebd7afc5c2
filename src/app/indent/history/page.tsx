"use client";
import Link from "next/link";
import { useCallback, useEffect, useState, type ChangeEvent } from "react";
import { useToast } from "@/components/ToastProvider";
import { fetchHistory, failureText, type HistoryQueryInput } from "@/lib/indent/api";
import type { HistoryRowView } from "@/lib/indent/history";

const EMPTY: HistoryQueryInput = { departments: [], requesters: [], requestId: "", item: "" };

function selected(e: ChangeEvent<HTMLSelectElement>) {
  return Array.from(e.target.selectedOptions).map((o) => o.value);
}

export default function IndentHistoryPage() {
  const { showToast } = useToast();
  const [query, setQuery] = useState<HistoryQueryInput>(EMPTY);
  const [rows, setRows] = useState<HistoryRowView[]>([]);
  const [total, setTotal] = useState(0);
  const [options, setOptions] = useState<{ departments: string[]; requesters: string[] }>({ departments: [], requesters: [] });
  const [warning, setWarning] = useState<string | null>(null);
  const [fatal, setFatal] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);

  const load = useCallback(
    async (q: HistoryQueryInput) => {
      setLoading(true);
      try {
        const res = await fetchHistory(q);
        if (!res.ok) {
          if (res.fatal) setFatal(failureText(res));
          else showToast({ type: "error", message: failureText(res) });
          return;
        }
        setRows(res.rows);
        setTotal(res.total);
        setOptions(res.options);
        setWarning(res.error);
        // show the window the server applied
        setQuery((prev) => ({ ...prev, from: res.applied.from, to: res.applied.to, refresh: false }));
      } catch (e) {
        showToast({ type: "error", message: e instanceof Error ? e.message : String(e) });
      } finally {
        setLoading(false);
      }
    },
    [showToast],
  );

  useEffect(() => {
    load(EMPTY).catch((e: unknown) => setWarning(String(e)));
  }, [load]);

  if (fatal) {
    return (
      <main className="p-6">
        <div role="alert" className="rounded border border-rose-400 bg-rose-50 p-4 text-rose-800">
          <strong>Configuration error.</strong> {fatal}
        </div>
      </main>
    );
  }

  return (
    <main className="p-6 max-w-6xl mx-auto">
      <div className="flex items-center justify-between mb-4">
        <h1 className="text-2xl font-semibold">Indent history</h1>
        <Link href="/indent/new">New indent</Link>
      </div>
      {warning && <div role="status" className="mb-3 text-amber-700">{warning}</div>}

      <form
        className="grid grid-cols-3 gap-3 mb-4"
        onSubmit={(e) => {
          e.preventDefault();
          void load(query);
        }}
      >
        <label>
          From
          <input type="date" value={query.from ?? ""} onChange={(e) => setQuery({ ...query, from: e.target.value })} />
        </label>
        <label>
          To
          <input type="date" value={query.to ?? ""} onChange={(e) => setQuery({ ...query, to: e.target.value })} />
        </label>
        <label>
          Department
          <select multiple value={query.departments ?? []} onChange={(e) => setQuery({ ...query, departments: selected(e) })}>
            {options.departments.map((d) => (
              <option key={d} value={d}>{d}</option>
            ))}
          </select>
        </label>
        <label>
          Requested by
          <select multiple value={query.requesters ?? []} onChange={(e) => setQuery({ ...query, requesters: selected(e) })}>
            {options.requesters.map((r) => (
              <option key={r} value={r}>{r}</option>
            ))}
          </select>
        </label>
        <label>
          MRN contains
          <input value={query.requestId ?? ""} onChange={(e) => setQuery({ ...query, requestId: e.target.value })} />
        </label>
        <label>
          Item contains
          <input value={query.item ?? ""} onChange={(e) => setQuery({ ...query, item: e.target.value })} />
        </label>
        <div className="flex gap-3">
          <button type="submit" disabled={loading}>Apply</button>
          <button
            type="button"
            onClick={() => {
              setQuery(EMPTY);
              void load(EMPTY);
            }}
          >
            Reset filters
          </button>
          <button type="button" onClick={() => void load({ ...query, refresh: true })}>
            Refresh
          </button>
        </div>
      </form>

      <p className="text-sm mb-2">
        Showing {rows.length} of {total} line(s)
      </p>
      {rows.length === 0 ? (
        <p>No indents match these filters.</p>
      ) : (
        <table className="w-full text-sm">
          <thead>
            <tr>
              <th>MRN</th><th>Submitted</th><th>Requested by</th><th>Department</th><th>Date required</th>
              <th>Item</th><th>Qty</th><th>Unit</th><th>Note</th><th>Category</th><th>Sub-category</th><th />
            </tr>
          </thead>
          <tbody>
            {rows.map((r, i) => (
              <tr key={`${r.requestId}-${r.itemName}-${i}`}>
                <td>{r.requestId}</td>
                <td>{r.timestamp}</td>
                <td>{r.requestedBy}</td>
                <td>{r.department}</td>
                <td>{r.requiredDate}</td>
                <td>{r.itemName}</td>
                <td>{r.quantity}</td>
                <td>{r.unit}</td>
                <td>{r.note}</td>
                <td>{r.category}</td>
                <td>{r.subCategory}</td>
                <td>
                  {/^MRN-\d+$/.test(r.requestId) && <a href={`/api/indent/pdf?requestId=${encodeURIComponent(r.requestId)}`}>PDF</a>}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </main>
  );
}
