import { NextResponse } from "next/server";
import { apiError, makeRequestId } from "@/lib/api/errors";
import { fetchExamInfo } from "@/lib/exam-info/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const ROUTE = "/api/exam-info";

function flag(value: string | null, fallback: boolean) {
  if (value === null) return fallback;
  const v = value.trim().toLowerCase();
  if (["0", "false", "no", "off"].includes(v)) return false;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  return fallback;
}

export async function GET(req: Request) {
  const requestId = makeRequestId();
  const params = new URL(req.url).searchParams;
  const query = String(params.get("q") || "").trim();
  if (!query) {
    return apiError({
      status: 400,
      code: "EXAM_INFO_QUERY_MISSING",
      userMessage: "Query parameter 'q' (exam name) is required.",
      route: ROUTE,
      requestId,
    });
  }

  try {
    const info = await fetchExamInfo(query, {
      includeVideos: flag(params.get("videos"), true),
      includeBooks: flag(params.get("books"), true),
    });
    return NextResponse.json(info, {
      headers: { "Cache-Control": "no-store", "x-request-id": requestId },
    });
  } catch (err) {
    return apiError({
      code: "EXAM_INFO_FAILED",
      userMessage: "Exam info lookup failed.",
      route: ROUTE,
      requestId,
      cause: err,
    });
  }
}
