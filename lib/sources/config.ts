import fs from "node:fs";
import path from "node:path";
import { logOpsEvent } from "@/lib/ops/eventLog";

export type SourcesConfig = {
  youtubeApiKey: string;
  timeoutMs: number;
  wikipediaApiUrl: string;
  wikipediaRestUrl: string;
  youtubeApiUrl: string;
  googleBooksApiUrl: string;
  userAgent: string;
};

export type ResolvedSourcesConfig = SourcesConfig & {
  apiKeySource: "settings" | "YOUTUBE_API_KEY" | "GOOGLE_API_KEY" | "missing";
};

export const DEFAULT_TIMEOUT_MS = 12_000;

const FILE_NAME = ".exam-info-config.json";

function settingsPath() {
  return path.join(process.cwd(), FILE_NAME);
}

function normalizeUrl(value: unknown, fallback: string) {
  const raw = String(value || "").trim();
  if (!raw) return fallback;
  return raw.replace(/\/+$/, "");
}

function normalizeTimeout(value: unknown, fallback: number) {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return Math.round(n);
}

function cleanKey(value: unknown) {
  return String(value || "").trim().replace(/^['"]|['"]$/g, "");
}

export function defaultSourcesConfig(): SourcesConfig {
  return {
    youtubeApiKey: "",
    timeoutMs: normalizeTimeout(process.env.EXAM_INFO_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    wikipediaApiUrl: normalizeUrl(process.env.WIKIPEDIA_API_URL, "https://en.wikipedia.org/w/api.php"),
    wikipediaRestUrl: normalizeUrl(process.env.WIKIPEDIA_REST_URL, "https://en.wikipedia.org/api/rest_v1"),
    youtubeApiUrl: normalizeUrl(process.env.YOUTUBE_API_URL, "https://www.googleapis.com/youtube/v3"),
    googleBooksApiUrl: normalizeUrl(process.env.GOOGLE_BOOKS_API_URL, "https://www.googleapis.com/books/v1"),
    userAgent: "exam-info-fetcher/0.1 (exam preparation lookup)",
  };
}

function normalize(input: Record<string, unknown>): SourcesConfig {
  const base = defaultSourcesConfig();
  return {
    youtubeApiKey: cleanKey(input.youtubeApiKey),
    timeoutMs: normalizeTimeout(input.timeoutMs, base.timeoutMs),
    wikipediaApiUrl: normalizeUrl(input.wikipediaApiUrl, base.wikipediaApiUrl),
    wikipediaRestUrl: normalizeUrl(input.wikipediaRestUrl, base.wikipediaRestUrl),
    youtubeApiUrl: normalizeUrl(input.youtubeApiUrl, base.youtubeApiUrl),
    googleBooksApiUrl: normalizeUrl(input.googleBooksApiUrl, base.googleBooksApiUrl),
    userAgent: String(input.userAgent || "").trim() || base.userAgent,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function readSourcesConfig(): SourcesConfig {
  const filePath = settingsPath();
  try {
    if (!fs.existsSync(filePath)) return defaultSourcesConfig();
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return isRecord(parsed) ? normalize(parsed) : defaultSourcesConfig();
  } catch {
    // An unreadable settings file falls back to the environment.
    return defaultSourcesConfig();
  }
}

export function resolveSourcesRuntimeConfig(): ResolvedSourcesConfig {
  const loaded = readSourcesConfig();
  const envCandidates: Array<{ key: ResolvedSourcesConfig["apiKeySource"]; value: string }> = [
    { key: "YOUTUBE_API_KEY", value: cleanKey(process.env.YOUTUBE_API_KEY) },
    { key: "GOOGLE_API_KEY", value: cleanKey(process.env.GOOGLE_API_KEY) },
  ];
  const envHit = envCandidates.find((entry) => !!entry.value);
  const settingsKey = loaded.youtubeApiKey;
  return {
    ...loaded,
    youtubeApiKey: settingsKey || envHit?.value || "",
    apiKeySource: settingsKey ? "settings" : envHit?.key || "missing",
  };
}

export function maskApiKey(value: string) {
  const key = String(value || "").trim();
  if (!key) return "";
  if (key.length <= 8) return `${"*".repeat(Math.max(0, key.length - 2))}${key.slice(-2)}`;
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}

/** Logs once when video lookups will be skipped for lack of a key. */
export function warnIfYoutubeKeyMissing(cfg: ResolvedSourcesConfig) {
  if (cfg.apiKeySource !== "missing") return false;
  logOpsEvent({
    level: "warn",
    type: "YOUTUBE_KEY_MISSING",
    source: "youtube",
    details: { hint: "Set YOUTUBE_API_KEY (or GOOGLE_API_KEY) to enable video and playlist results." },
  });
  return true;
}
