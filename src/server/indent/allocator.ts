// src/server/indent/allocator.ts
import { errorMessage } from "@/lib/errors";
import { error as logError, info } from "@/lib/logger";
import { columnOf, resolveColumns } from "@/lib/indent/logColumns";
import { errorRequestNumber, nextRequestNumber } from "@/lib/indent/requestNumber";
import type { SheetStore } from "./sheets";

export type Allocation = {
  requestId: string;
  /** first row of the log as read, undefined when the log is empty or unreadable */
  header: string[] | undefined;
};

/**
 * Reads the request-number column straight from the log (never from a cache)
 * and returns the next number together with the header row it saw. Store
 * failures yield the MRN-ERR sentinel instead of throwing; callers must not
 * write with it.
 *
 * Two submitters reading the same last number get the same result. Nothing
 * here serialises allocation against the shared sheet.
 */
export async function allocateRequestNumber(store: SheetStore, logSheet: string, now: Date = new Date()): Promise<Allocation> {
  try {
    const values = await store.getValues(logSheet);
    const header = values[0];
    const col = Math.max(0, columnOf(resolveColumns(header), "requestId"));
    const column = values.map((row) => row[col] ?? "");
    const id = nextRequestNumber(column);
    info({ event: "indent.mrn.allocated", requestId: id, scanned: column.length });
    return { requestId: id, header };
  } catch (e) {
    const id = errorRequestNumber(now);
    logError({ event: "indent.mrn.failed", requestId: id, error: errorMessage(e) });
    return { requestId: id, header: undefined };
  }
}
