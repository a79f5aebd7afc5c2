// src/lib/indent/share.ts
import { normalizeToPlusE164, toGraphPhone } from "@/lib/wa_phone";
import { parseIsoDate, logDay } from "./dates";
import type { IndentRequest } from "./types";

export function shareMessage(request: Pick<IndentRequest, "requestId" | "department" | "requestedBy" | "requiredDate">): string {
  const d = parseIsoDate(request.requiredDate);
  return [
    `Material Indent ${request.requestId}`,
    `Department: ${request.department}`,
    `Requested by: ${request.requestedBy || "-"}`,
    `Date required: ${d ? logDay(d) : request.requiredDate}`,
    "PDF attached separately.",
  ].join("\n");
}

/**
 * WhatsApp deep link carrying the message text. The PDF is not attached; the
 * user attaches the downloaded file by hand.
 */
export function whatsappShareUrl(text: string, phone?: string | null, countryCode = ""): string {
  const q = `text=${encodeURIComponent(text)}`;
  const plus = phone ? normalizeToPlusE164(phone, countryCode) : "";
  return plus ? `https://wa.me/${toGraphPhone(plus)}?${q}` : `https://wa.me/?${q}`;
}
