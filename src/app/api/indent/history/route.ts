import { NextResponse } from "next/server";
import { toErrorResponse } from "@/lib/errors";
import { error as logError } from "@/lib/logger";
import { queryHistory } from "@/server/indent/history.service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

function queryObject(params: URLSearchParams) {
  const pick = (k: string) => params.get(k)?.trim() || undefined;
  return {
    from: pick("from"),
    to: pick("to"),
    department: params.getAll("department"),
    requester: params.getAll("requester"),
    requestId: pick("requestId"),
    item: pick("item"),
    refresh: pick("refresh"),
  };
}

export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const result = await queryHistory(queryObject(searchParams));
    return NextResponse.json({ ok: true, ...result });
  } catch (e) {
    const { status, body } = toErrorResponse(e);
    if (status >= 500) logError({ event: "api.indent.history.failed", status, error: body.error });
    return NextResponse.json(body, { status });
  }
}
