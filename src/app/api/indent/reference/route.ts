import { NextResponse } from "next/server";
import { toErrorResponse } from "@/lib/errors";
import { error as logError } from "@/lib/logger";
import { getDepartmentCatalog } from "@/server/indent/indent.service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const department = searchParams.get("department");
    const refresh = searchParams.get("refresh") === "1";
    const catalog = await getDepartmentCatalog(department, { refresh });
    return NextResponse.json({ ok: true, ...catalog });
  } catch (e) {
    const { status, body } = toErrorResponse(e);
    logError({ event: "api.indent.reference.failed", status, error: body.error });
    return NextResponse.json(body, { status });
  }
}
