import * as cheerio from "cheerio";
import { resolveSourcesRuntimeConfig, type ResolvedSourcesConfig } from "@/lib/sources/config";
import { fetchSourceText, reportSourceFailure } from "@/lib/sources/request";
import { normalizeWhitespace } from "@/lib/sources/text";
import type { PyqLink } from "@/lib/sources/types";

export const MAX_PYQ_LINKS = 5;

export type ArchivePage = {
  site: string;
  exam: string;
  url: string;
};

type ArchiveSite = {
  site: string;
  neet: string;
  jee: string;
};

// Only NEET and JEE pages are known; other exams get no archive pages.
const ARCHIVE_SITES: readonly ArchiveSite[] = [
  {
    site: "Examsnet",
    neet: "https://www.examsnet.com/exams/neet-chapterwise-previous-question-papers-online",
    jee: "https://www.examsnet.com/exams/jee-mains-chapterwise-previous-year-questions-online",
  },
  {
    site: "Selfstudys",
    neet: "https://www.selfstudys.com/books/neet-previous-year-paper/page/year-wise",
    jee: "https://www.selfstudys.com/books/jee-main-previous-year-paper/page/year-wise",
  },
];

export function archivePagesFor(query: string): ArchivePage[] {
  const q = String(query || "").toLowerCase();
  const pages: ArchivePage[] = [];
  for (const entry of ARCHIVE_SITES) {
    if (q.includes("neet")) pages.push({ site: entry.site, exam: "NEET", url: entry.neet });
    else if (q.includes("jee")) pages.push({ site: entry.site, exam: "JEE Mains", url: entry.jee });
  }
  return pages;
}

export function isPaperAnchor(href: string, text: string) {
  const t = text.toLowerCase();
  return href.toLowerCase().includes("pdf") || t.includes("previous") || t.includes("paper");
}

export function resolveHref(href: string, pageUrl: string): string | null {
  if (href.startsWith("http")) return href;
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

export function extractPaperLinks(html: string, page: ArchivePage): PyqLink[] {
  const $ = cheerio.load(html);
  const links: PyqLink[] = [];
  $("a[href]").each((_, anchor) => {
    const href = String($(anchor).attr("href") || "").trim();
    if (!href) return;
    const title = normalizeWhitespace($(anchor).text());
    if (!isPaperAnchor(href, title)) return;
    const link = resolveHref(href, page.url);
    if (!link) return;
    links.push({ site: page.site, exam: page.exam, title, link });
  });
  return links;
}

export async function fetchPyqLinks(
  query: string,
  cfg: ResolvedSourcesConfig = resolveSourcesRuntimeConfig()
): Promise<PyqLink[]> {
  const scraped: PyqLink[] = [];
  for (const page of archivePagesFor(query)) {
    try {
      const html = await fetchSourceText(cfg, "pyq-archive", page.url);
      scraped.push(...extractPaperLinks(html, page));
    } catch (err) {
      reportSourceFailure("pyq-archive", "fetchPyqLinks", err);
    }
  }
  return scraped.slice(0, MAX_PYQ_LINKS);
}
