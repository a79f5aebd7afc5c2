import { NextResponse } from "next/server";
import { ValidationError, toErrorResponse } from "@/lib/errors";
import { error as logError, warn } from "@/lib/logger";
import { rateLimit } from "@/lib/rateLimit";
import { shareMessage, whatsappShareUrl } from "@/lib/indent/share";
import { getIndentConfig } from "@/server/indent/config";
import { submitIndent } from "@/server/indent/indent.service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

export async function POST(req: Request) {
  const rl = rateLimit(req, "indent:submit", 20);
  if (!rl.allowed) {
    warn({ event: "api.indent.submit.rate_limited", retryAfter: rl.retryAfter });
    return NextResponse.json(
      { ok: false, error: "Too many submissions, slow down", kind: "validation", fatal: false },
      { status: 429, headers: { "Retry-After": String(rl.retryAfter) } },
    );
  }
  try {
    const input: unknown = await req.json().catch(() => {
      throw new ValidationError("Body must be JSON");
    });
    const request = await submitIndent(input);
    const config = getIndentConfig();
    return NextResponse.json({
      ok: true,
      request,
      pdfUrl: `/api/indent/pdf?requestId=${encodeURIComponent(request.requestId)}`,
      shareUrl: whatsappShareUrl(shareMessage(request), config.sharePhone, config.phoneCountry),
    });
  } catch (e) {
    const { status, body } = toErrorResponse(e);
    if (status >= 500) logError({ event: "api.indent.submit.failed", status, error: body.error });
    return NextResponse.json(body, { status });
  }
}
