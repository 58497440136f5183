import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_TIMEOUT_MS,
  maskApiKey,
  resolveSourcesRuntimeConfig,
  warnIfYoutubeKeyMissing,
} from "@/lib/sources/config";

let dir = "";

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "exam-info-config-"));
  vi.spyOn(process, "cwd").mockReturnValue(dir);
  vi.stubEnv("YOUTUBE_API_KEY", "");
  vi.stubEnv("GOOGLE_API_KEY", "");
  vi.stubEnv("EXAM_INFO_TIMEOUT_MS", "");
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("resolveSourcesRuntimeConfig", () => {
  it("reports a missing key by default", () => {
    const cfg = resolveSourcesRuntimeConfig();
    expect(cfg.youtubeApiKey).toBe("");
    expect(cfg.apiKeySource).toBe("missing");
    expect(cfg.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(cfg.wikipediaApiUrl).toBe("https://en.wikipedia.org/w/api.php");
  });

  it("reads the key from the environment", () => {
    vi.stubEnv("GOOGLE_API_KEY", "'test-google-key'");
    const cfg = resolveSourcesRuntimeConfig();
    expect(cfg.youtubeApiKey).toBe("test-google-key");
    expect(cfg.apiKeySource).toBe("GOOGLE_API_KEY");
  });

  it("lets the settings file override the environment", () => {
    vi.stubEnv("YOUTUBE_API_KEY", "test-env-key");
    fs.writeFileSync(
      path.join(dir, ".exam-info-config.json"),
      JSON.stringify({ youtubeApiKey: "test-settings-key", timeoutMs: 5000, youtubeApiUrl: "https://yt.test/v3/" })
    );
    const cfg = resolveSourcesRuntimeConfig();
    expect(cfg.youtubeApiKey).toBe("test-settings-key");
    expect(cfg.apiKeySource).toBe("settings");
    expect(cfg.timeoutMs).toBe(5000);
    expect(cfg.youtubeApiUrl).toBe("https://yt.test/v3");
  });

  it("ignores an unreadable settings file", () => {
    vi.stubEnv("YOUTUBE_API_KEY", "test-env-key");
    fs.writeFileSync(path.join(dir, ".exam-info-config.json"), "{ not json");
    const cfg = resolveSourcesRuntimeConfig();
    expect(cfg.apiKeySource).toBe("YOUTUBE_API_KEY");
  });

  it("falls back to the default timeout for invalid values", () => {
    vi.stubEnv("EXAM_INFO_TIMEOUT_MS", "soon");
    expect(resolveSourcesRuntimeConfig().timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
  });
});

describe("maskApiKey", () => {
  it("keeps only the ends of the key", () => {
    expect(maskApiKey("test-secret-key")).toBe("test...-key");
    expect(maskApiKey("short")).toBe("***rt");
    expect(maskApiKey("")).toBe("");
  });
});

describe("warnIfYoutubeKeyMissing", () => {
  it("logs a YOUTUBE_KEY_MISSING event when no key is configured", () => {
    vi.stubEnv("EXAM_INFO_LOG", "");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(warnIfYoutubeKeyMissing(resolveSourcesRuntimeConfig())).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: "warn",
      type: "YOUTUBE_KEY_MISSING",
      source: "youtube",
    });
  });

  it("stays quiet when the key comes from the environment", () => {
    vi.stubEnv("EXAM_INFO_LOG", "");
    vi.stubEnv("YOUTUBE_API_KEY", "test-env-key");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(warnIfYoutubeKeyMissing(resolveSourcesRuntimeConfig())).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });
});
