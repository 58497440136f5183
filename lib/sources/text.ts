export function normalizeWhitespace(s: string) {
  return (s || "").replace(/\s+/g, " ").trim();
}

export function truncate(text: string, limit: number) {
  if (text.length <= limit) return { text, cut: false };
  return { text: text.slice(0, limit), cut: true };
}
