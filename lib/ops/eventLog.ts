export type OpsEventLevel = "warn" | "error";

type OpsEvent = {
  ts?: string;
  level?: OpsEventLevel;
  type: string;
  source?: string | null;
  status?: number | null;
  details?: Record<string, unknown>;
};

function isSilenced() {
  return String(process.env.EXAM_INFO_LOG || "").trim().toLowerCase() === "silent";
}

export function logOpsEvent(event: OpsEvent) {
  if (isSilenced()) return;
  const level = event.level || "warn";
  const payload = {
    ts: event.ts || new Date().toISOString(),
    level,
    type: String(event.type || "UNKNOWN"),
    source: event.source || null,
    status: typeof event.status === "number" && Number.isFinite(event.status) ? event.status : null,
    details: event.details || {},
  };
  // stderr only; stdout belongs to the CLI report.
  if (level === "error") console.error(JSON.stringify(payload));
  else console.warn(JSON.stringify(payload));
}
