function clean(query: string) {
  return String(query || "").trim();
}

/** Searches tried in order until one returns a page title. */
export function wikiSearchQueries(query: string): string[] {
  const q = clean(query);
  return [`${q} exam`, q];
}

export function wikiSlug(title: string) {
  return String(title || "").trim().replace(/ /g, "_");
}

export function videoSearchQuery(query: string) {
  return `${clean(query)} preparation`;
}

export function playlistSearchQuery(query: string) {
  return `${clean(query)} preparation playlist`;
}

export function bookSearchQuery(query: string) {
  const q = clean(query);
  return `${q} preparation OR ${q} syllabus OR ${q} guide`;
}
