import { resolveSourcesRuntimeConfig, type ResolvedSourcesConfig } from "@/lib/sources/config";
import { playlistSearchQuery, videoSearchQuery } from "@/lib/sources/queries";
import {
  asArray,
  asRecord,
  buildUrl,
  fetchSourceJson,
  reportSourceFailure,
} from "@/lib/sources/request";
import type { Playlist, Video } from "@/lib/sources/types";

type SearchKind = "video" | "playlist";

export function videoUrl(id: string) {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(id)}`;
}

export function playlistUrl(id: string) {
  return `https://www.youtube.com/playlist?list=${encodeURIComponent(id)}`;
}

export function isYoutubeEnabled(cfg: ResolvedSourcesConfig) {
  return !!cfg.youtubeApiKey;
}

async function searchItems(cfg: ResolvedSourcesConfig, kind: SearchKind, q: string, maxResults: number) {
  const url = buildUrl(`${cfg.youtubeApiUrl}/search`, {
    part: "snippet",
    q,
    type: kind,
    maxResults,
    relevanceLanguage: "en",
    key: cfg.youtubeApiKey,
  });
  const json = asRecord(await fetchSourceJson(cfg, "youtube", url));
  return asArray(json.items).map(asRecord);
}

function itemTitle(item: Record<string, unknown>) {
  const title = asRecord(item.snippet).title;
  return typeof title === "string" ? title : "";
}

function itemId(item: Record<string, unknown>, field: "videoId" | "playlistId") {
  const id = asRecord(item.id)[field];
  return typeof id === "string" && id ? id : null;
}

export async function searchVideos(
  query: string,
  limit: number,
  cfg: ResolvedSourcesConfig = resolveSourcesRuntimeConfig()
): Promise<Video[]> {
  if (!isYoutubeEnabled(cfg) || limit <= 0) return [];
  try {
    const items = await searchItems(cfg, "video", videoSearchQuery(query), limit);
    const videos: Video[] = [];
    for (const item of items) {
      const id = itemId(item, "videoId");
      if (!id) continue;
      videos.push({ title: itemTitle(item), id, url: videoUrl(id) });
    }
    return videos;
  } catch (err) {
    reportSourceFailure("youtube", "searchVideos", err);
    return [];
  }
}

export async function searchPlaylist(
  query: string,
  cfg: ResolvedSourcesConfig = resolveSourcesRuntimeConfig()
): Promise<Playlist | null> {
  if (!isYoutubeEnabled(cfg)) return null;
  try {
    const [item] = await searchItems(cfg, "playlist", playlistSearchQuery(query), 1);
    if (!item) return null;
    const id = itemId(item, "playlistId");
    if (!id) return null;
    return { title: itemTitle(item), id, url: playlistUrl(id) };
  } catch (err) {
    reportSourceFailure("youtube", "searchPlaylist", err);
    return null;
  }
}
