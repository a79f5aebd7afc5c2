export type LogPayload = { event: string } & Record<string, unknown>;
type Level = "info" | "warn" | "error";

const SECRET_KEYS = /(private_?key|token|secret|password)/i;

function redactPhone(phone: unknown) {
  if (typeof phone !== "string" || !phone) return "";
  // keep only last 3 digits
  return `***${phone.slice(-3)}`;
}

function scrub(value: unknown, depth = 0): unknown {
  if (depth > 4 || value === null || typeof value !== "object") return value;
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (Array.isArray(value)) return value.map((v) => scrub(v, depth + 1));
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SECRET_KEYS.test(k) ? "***" : scrub(v, depth + 1);
  }
  return out;
}

function write(level: Level, payload: LogPayload) {
  const body = scrub(payload);
  const out: Record<string, unknown> = { ts: new Date().toISOString(), level };
  if (body && typeof body === "object") Object.assign(out, body);
  if (out.phone) out.phone = redactPhone(out.phone);
  const line = JSON.stringify(out);
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.info(line);
}

export function info(payload: LogPayload) {
  write("info", payload);
}

export function warn(payload: LogPayload) {
  write("warn", payload);
}

export function error(payload: LogPayload) {
  write("error", payload);
}

export default { info, warn, error };
