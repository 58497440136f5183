import { searchBooks } from "@/lib/sources/books";
import { resolveSourcesRuntimeConfig, type ResolvedSourcesConfig } from "@/lib/sources/config";
import { fetchPyqLinks } from "@/lib/sources/pyq";
import type { ExamInfo } from "@/lib/sources/types";
import { findWikiInfo } from "@/lib/sources/wikipedia";
import { searchPlaylist, searchVideos } from "@/lib/sources/youtube";

export const VIDEO_LIMIT = 6;
export const BOOK_LIMIT = 6;

export type FetchExamInfoOptions = {
  includeVideos?: boolean;
  /** Also gates the past-paper links. */
  includeBooks?: boolean;
  config?: ResolvedSourcesConfig;
};

export async function fetchExamInfo(query: string, opts: FetchExamInfoOptions = {}): Promise<ExamInfo> {
  const trimmed = String(query || "").trim();
  // Nothing to look up for a blank name.
  if (!trimmed) return { query, wikipedia: { sections: {} }, videos: [], playlist: null, books: [], pyqs: [] };

  const cfg = opts.config || resolveSourcesRuntimeConfig();
  const includeVideos = opts.includeVideos ?? true;
  const includeBooks = opts.includeBooks ?? true;

  // One outbound request at a time.
  const wikipedia = await findWikiInfo(trimmed, cfg);
  const videos = includeVideos ? await searchVideos(trimmed, VIDEO_LIMIT, cfg) : [];
  const playlist = includeVideos ? await searchPlaylist(trimmed, cfg) : null;
  const books = includeBooks ? await searchBooks(trimmed, BOOK_LIMIT, cfg) : [];
  const pyqs = includeBooks ? await fetchPyqLinks(trimmed, cfg) : [];

  return { query, wikipedia, videos, playlist, books, pyqs };
}
