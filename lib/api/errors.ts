import { randomUUID } from "crypto";
import { NextResponse } from "next/server";
import { logOpsEvent } from "@/lib/ops/eventLog";

type ApiErrorInput = {
  status?: number;
  code: string;
  userMessage: string;
  requestId?: string;
  route: string;
  cause?: unknown;
};

function toErrorMessage(cause: unknown) {
  if (!cause) return "";
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function makeRequestId() {
  return randomUUID();
}

export function apiError(input: ApiErrorInput) {
  const status = input.status ?? 500;
  const requestId = input.requestId || makeRequestId();

  logOpsEvent({
    level: status >= 500 ? "error" : "warn",
    type: input.code,
    status,
    details: {
      route: input.route,
      requestId,
      userMessage: input.userMessage,
      cause: toErrorMessage(input.cause),
    },
  });

  return NextResponse.json(
    { error: input.userMessage, code: input.code, requestId },
    { status, headers: { "x-request-id": requestId } }
  );
}
