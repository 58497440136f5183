import type { ResolvedSourcesConfig } from "@/lib/sources/config";
import { maskApiKey } from "@/lib/sources/config";
import { logOpsEvent } from "@/lib/ops/eventLog";

export type SourceName = "wikipedia" | "youtube" | "google-books" | "pyq-archive";

export class SourceRequestError extends Error {
  status: number;
  source: SourceName;
  url: string;

  constructor(input: { message: string; status: number; source: SourceName; url: string }) {
    super(input.message);
    this.name = "SourceRequestError";
    this.status = Number(input.status || 0);
    this.source = input.source;
    this.url = input.url;
  }
}

export type QueryParams = Record<string, string | number | undefined>;

export function buildUrl(base: string, params?: QueryParams) {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params || {})) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

export function redactUrl(rawUrl: string) {
  try {
    const url = new URL(rawUrl);
    const key = url.searchParams.get("key");
    if (key) url.searchParams.set("key", maskApiKey(key));
    return url.toString();
  } catch {
    return rawUrl;
  }
}

function isAbortError(err: unknown) {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

export async function fetchSourceText(
  cfg: ResolvedSourcesConfig,
  source: SourceName,
  url: string,
  accept = "text/html"
): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), cfg.timeoutMs);
  try {
    const res = await fetch(url, {
      method: "GET",
      headers: { Accept: accept, "User-Agent": cfg.userAgent },
      signal: controller.signal,
    });
    const raw = await res.text();
    if (!res.ok) {
      throw new SourceRequestError({
        message: `${source} request failed (${res.status})`,
        status: res.status,
        source,
        url,
      });
    }
    return raw;
  } catch (err) {
    if (err instanceof SourceRequestError) throw err;
    const aborted = isAbortError(err);
    throw new SourceRequestError({
      message: aborted
        ? `${source} request timed out after ${cfg.timeoutMs}ms.`
        : `${source} request failed: ${err instanceof Error ? err.message : String(err)}`,
      status: aborted ? 408 : 0,
      source,
      url,
    });
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchSourceJson(
  cfg: ResolvedSourcesConfig,
  source: SourceName,
  url: string
): Promise<unknown> {
  const raw = await fetchSourceText(cfg, source, url, "application/json");
  try {
    return raw ? (JSON.parse(raw) as unknown) : {};
  } catch {
    throw new SourceRequestError({
      message: `${source} returned a body that is not JSON.`,
      status: 0,
      source,
      url,
    });
  }
}

export function reportSourceFailure(source: SourceName, operation: string, err: unknown) {
  const status = err instanceof SourceRequestError ? err.status : null;
  const url = err instanceof SourceRequestError ? redactUrl(err.url) : null;
  logOpsEvent({
    level: "warn",
    type: "SOURCE_REQUEST_FAILED",
    source,
    status,
    details: {
      operation,
      url,
      message: err instanceof Error ? err.message : String(err),
    },
  });
}

export function asRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === "object" && !Array.isArray(value) ? (value as Record<string, unknown>) : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
