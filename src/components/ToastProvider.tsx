"use client";
import React, { createContext, useCallback, useContext, useEffect, useState } from "react";

export type ToastKind = "success" | "error" | "info";
type Toast = { id: number; type: ToastKind; message: string };

const ToastContext = createContext<{ showToast: (t: Omit<Toast, "id">) => void } | undefined>(undefined);

let nextId = 0;

export function ToastProvider({ children, autoDismissMs = 3500 }: { children: React.ReactNode; autoDismissMs?: number }) {
  const [toasts, setToasts] = useState<Toast[]>([]);

  useEffect(() => {
    if (toasts.length === 0) return;
    const timers = toasts.map((t) =>
      setTimeout(() => {
        setToasts((prev) => prev.filter((x) => x.id !== t.id));
      }, autoDismissMs),
    );
    return () => timers.forEach(clearTimeout);
  }, [toasts, autoDismissMs]);

  const showToast = useCallback((payload: Omit<Toast, "id">) => {
    nextId += 1;
    const id = nextId;
    setToasts((prev) => [...prev, { ...payload, id }]);
  }, []);

  return (
    <ToastContext.Provider value={{ showToast }}>
      {children}
      <div className="fixed bottom-6 right-6 flex flex-col gap-2 z-50 pointer-events-none" aria-live="polite">
        {toasts.map((t) => (
          <div
            key={t.id}
            role={t.type === "error" ? "alert" : "status"}
            className={`pointer-events-auto px-4 py-2 rounded shadow-lg text-sm ${t.type === "success" ? "bg-emerald-600 text-white" : t.type === "error" ? "bg-rose-600 text-white" : "bg-slate-800 text-white"}`}
            data-testid={`toast-${t.type}`}
          >
            {t.message}
          </div>
        ))}
      </div>
    </ToastContext.Provider>
  );
}

export function useToast() {
  const ctx = useContext(ToastContext);
  if (!ctx) throw new Error("useToast must be used within a ToastProvider");
  return ctx;
}
