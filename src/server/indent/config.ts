// src/server/indent/config.ts
import { z } from "zod";
import { ensureIndentEnv } from "@/lib/env_check";
import { ConfigError } from "@/lib/errors";

const DEFAULT_DEPARTMENTS = "Kitchen,Bar,Housekeeping,Admin,Maintenance";

const ZServiceAccount = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

export type ServiceAccount = z.infer<typeof ZServiceAccount>;

const ZEnv = z.object({
  GCP_SERVICE_ACCOUNT: z.string().min(1),
  INDENT_SPREADSHEET_ID: z.string().min(1),
  INDENT_LOG_SHEET: z.string().min(1).default("Sheet1"),
  INDENT_REFERENCE_SHEET: z.string().min(1).default("reference"),
  INDENT_DEPARTMENTS: z.string().default(DEFAULT_DEPARTMENTS),
  INDENT_REFERENCE_TTL_SEC: z.coerce.number().int().nonnegative().default(300),
  INDENT_LOG_TTL_SEC: z.coerce.number().int().nonnegative().default(60),
  INDENT_HISTORY_DAYS: z.coerce.number().int().positive().default(90),
  INDENT_SHARE_PHONE: z.string().optional(),
  INDENT_PHONE_COUNTRY: z.string().default(""),
});

export type IndentConfig = {
  serviceAccount: ServiceAccount;
  spreadsheetId: string;
  logSheet: string;
  referenceSheet: string;
  departments: string[];
  referenceTtlMs: number;
  logTtlMs: number;
  historyDays: number;
  sharePhone: string | null;
  phoneCountry: string;
};

function parseServiceAccount(raw: string): ServiceAccount {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError("GCP_SERVICE_ACCOUNT is not valid JSON");
  }
  const parsed = ZServiceAccount.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError("GCP_SERVICE_ACCOUNT is missing client_email or private_key", parsed.error.issues.map((i) => i.path.join(".")));
  }
  // keys pasted into env files often carry literal \n
  return { ...parsed.data, private_key: parsed.data.private_key.replace(/\\n/g, "\n") };
}

export function loadIndentConfig(env: NodeJS.ProcessEnv = process.env): IndentConfig {
  ensureIndentEnv(env);
  const parsed = ZEnv.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("Invalid indent configuration", parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    serviceAccount: parseServiceAccount(e.GCP_SERVICE_ACCOUNT),
    spreadsheetId: e.INDENT_SPREADSHEET_ID,
    logSheet: e.INDENT_LOG_SHEET,
    referenceSheet: e.INDENT_REFERENCE_SHEET,
    departments: e.INDENT_DEPARTMENTS.split(",").map((d) => d.trim()).filter(Boolean),
    referenceTtlMs: e.INDENT_REFERENCE_TTL_SEC * 1000,
    logTtlMs: e.INDENT_LOG_TTL_SEC * 1000,
    historyDays: e.INDENT_HISTORY_DAYS,
    sharePhone: e.INDENT_SHARE_PHONE?.trim() || null,
    phoneCountry: e.INDENT_PHONE_COUNTRY,
  };
}

let cached: IndentConfig | null = null;

export function getIndentConfig(): IndentConfig {
  if (!cached) cached = loadIndentConfig();
  return cached;
}
