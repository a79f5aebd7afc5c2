// src/server/indent/store.ts
import { getIndentConfig } from "./config";
import { GoogleSheetsStore, type SheetStore } from "./sheets";

const globalForStore = globalThis as unknown as { indentStore?: SheetStore };

/** Process-wide store; kept on globalThis so dev reloads reuse one auth client. */
export function getSheetStore(): SheetStore {
  if (!globalForStore.indentStore) {
    const cfg = getIndentConfig();
    globalForStore.indentStore = new GoogleSheetsStore({ spreadsheetId: cfg.spreadsheetId, serviceAccount: cfg.serviceAccount });
  }
  return globalForStore.indentStore;
}
