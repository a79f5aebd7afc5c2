// src/server/indent/sheets.ts
import { JWT } from "google-auth-library";
import { z } from "zod";
import { ConfigError, StoreError, errorMessage } from "@/lib/errors";
import { info, error as logError } from "@/lib/logger";
import type { ServiceAccount } from "./config";

/** Tabular store addressed by worksheet name. */
export interface SheetStore {
  getValues(sheet: string): Promise<string[][]>;
  /** Appends all rows in one call; either every row lands or the call fails. */
  appendRows(sheet: string, rows: string[][]): Promise<void>;
}

const SHEETS_API = "https://sheets.googleapis.com/v4/spreadsheets";
const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

const ZValuesResponse = z.object({
  values: z.array(z.array(z.unknown())).optional(),
});

function a1Range(sheet: string) {
  return `'${sheet.replace(/'/g, "''")}'!A:Z`;
}

function cellText(v: unknown): string {
  return v === undefined || v === null ? "" : String(v);
}

type GoogleSheetsOptions = {
  spreadsheetId: string;
  serviceAccount: ServiceAccount;
  timeoutMs?: number;
};

export class GoogleSheetsStore implements SheetStore {
  private readonly spreadsheetId: string;
  private readonly auth: JWT;
  private readonly timeoutMs: number;

  constructor(opts: GoogleSheetsOptions) {
    this.spreadsheetId = opts.spreadsheetId;
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.auth = new JWT({ email: opts.serviceAccount.client_email, key: opts.serviceAccount.private_key, scopes: SCOPES });
  }

  private async token(): Promise<string> {
    try {
      const { token } = await this.auth.getAccessToken();
      if (!token) throw new Error("empty access token");
      return token;
    } catch (e) {
      throw new StoreError(`Google auth failed: ${errorMessage(e)}`);
    }
  }

  private async call(sheet: string, path: string, init: RequestInit = {}): Promise<unknown> {
    const url = `${SHEETS_API}/${encodeURIComponent(this.spreadsheetId)}/values/${encodeURIComponent(a1Range(sheet))}${path}`;
    const token = await this.token();
    let res: Response;
    try {
      res = await fetch(url, {
        ...init,
        headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      throw new StoreError(`Google Sheets unreachable: ${errorMessage(e)}`);
    }
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      logError({ event: "sheets.http_error", sheet, status: res.status, body: text.slice(0, 500) });
      if (res.status === 404) throw new ConfigError("Spreadsheet not found. Check INDENT_SPREADSHEET_ID and sharing.");
      if (res.status === 400 && text.includes("Unable to parse range")) throw new ConfigError(`Worksheet '${sheet}' not found`);
      throw new StoreError(`Google Sheets API error ${res.status} ${res.statusText}`, res.status);
    }
    return res.json();
  }

  async getValues(sheet: string): Promise<string[][]> {
    const json = await this.call(sheet, "?majorDimension=ROWS");
    const parsed = ZValuesResponse.safeParse(json);
    if (!parsed.success) throw new StoreError(`Unexpected Google Sheets response for ${sheet}`);
    const rows = (parsed.data.values ?? []).map((r) => r.map(cellText));
    info({ event: "sheets.read", sheet, rows: rows.length });
    return rows;
  }

  async appendRows(sheet: string, rows: string[][]): Promise<void> {
    if (rows.length === 0) return;
    // RAW: cells hold the literal text, never a formula, number or date
    await this.call(sheet, ":append?valueInputOption=RAW&insertDataOption=INSERT_ROWS", {
      method: "POST",
      body: JSON.stringify({ majorDimension: "ROWS", values: rows }),
    });
    info({ event: "sheets.append", sheet, rows: rows.length });
  }
}
