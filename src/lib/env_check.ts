import { ConfigError } from "@/lib/errors";

export const REQUIRED_INDENT_ENV = ["GCP_SERVICE_ACCOUNT", "INDENT_SPREADSHEET_ID"] as const;

export function ensureIndentEnv(env: NodeJS.ProcessEnv = process.env) {
  const missing = REQUIRED_INDENT_ENV.filter((k) => !env[k]);
  if (missing.length) {
    // Do not print secrets; only keys missing
    throw new ConfigError(`Missing required env keys: ${missing.join(", ")}`, [...missing]);
  }
}
