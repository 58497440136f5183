import { resolveSourcesRuntimeConfig, type ResolvedSourcesConfig } from "@/lib/sources/config";
import { bookSearchQuery } from "@/lib/sources/queries";
import {
  asArray,
  asOptionalString,
  asRecord,
  buildUrl,
  fetchSourceJson,
  reportSourceFailure,
} from "@/lib/sources/request";
import type { Book } from "@/lib/sources/types";

export function toBook(item: unknown): Book {
  const info = asRecord(asRecord(item).volumeInfo);
  const authors = Array.isArray(info.authors)
    ? info.authors.filter((a): a is string => typeof a === "string")
    : undefined;
  return {
    title: asOptionalString(info.title),
    authors,
    publisher: asOptionalString(info.publisher),
    infoLink: asOptionalString(info.infoLink),
  };
}

export async function searchBooks(
  query: string,
  limit: number,
  cfg: ResolvedSourcesConfig = resolveSourcesRuntimeConfig()
): Promise<Book[]> {
  if (limit <= 0) return [];
  try {
    const url = buildUrl(`${cfg.googleBooksApiUrl}/volumes`, {
      q: bookSearchQuery(query),
      maxResults: limit,
    });
    const json = asRecord(await fetchSourceJson(cfg, "google-books", url));
    return asArray(json.items).slice(0, limit).map(toBook);
  } catch (err) {
    reportSourceFailure("google-books", "searchBooks", err);
    return [];
  }
}
