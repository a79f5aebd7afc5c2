// lib/wa_phone.ts

/**
 * Digits-only E.164 form with a leading "+". A national number written with a
 * leading 0 gets the country code when one is given.
 */
export function normalizeToPlusE164(anyPhone: string, countryCode = "") {
  const digits = String(anyPhone || "").replace(/[^\d]/g, "");
  const cc = countryCode.replace(/[^\d]/g, "");
  if (!digits) return "";
  if (cc && digits.startsWith(cc)) return `+${digits}`;
  if (cc && digits.startsWith("0")) return `+${cc}${digits.slice(1)}`;
  return `+${digits}`;
}

export function toGraphPhone(plusE164: string) {
  return String(plusE164 || "").replace(/^\+/, "");
}
