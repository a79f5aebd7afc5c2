import { NextResponse } from "next/server";
import { toErrorResponse } from "@/lib/errors";
import { error as logError } from "@/lib/logger";
import { getRequest } from "@/server/indent/indent.service";
import { ZPdfQuery } from "@/server/indent/indent.validation";
import { pdfFileName, renderIndentPdf } from "@/server/indent/pdf";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const { requestId } = ZPdfQuery.parse({ requestId: searchParams.get("requestId") ?? "" });
    const request = await getRequest(requestId);
    if (!request) return NextResponse.json({ ok: false, error: `No indent ${requestId}`, kind: "validation", fatal: false }, { status: 404 });
    const buf = renderIndentPdf(request);
    return new Response(new Uint8Array(buf), {
      headers: {
        "content-type": "application/pdf",
        "content-disposition": `attachment; filename="${pdfFileName(request.requestId)}"`,
      },
    });
  } catch (e) {
    const { status, body } = toErrorResponse(e);
    logError({ event: "api.indent.pdf.failed", status, error: body.error });
    return NextResponse.json(body, { status });
  }
}
