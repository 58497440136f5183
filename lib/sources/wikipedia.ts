import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import { resolveSourcesRuntimeConfig, type ResolvedSourcesConfig } from "@/lib/sources/config";
import { wikiSearchQueries, wikiSlug } from "@/lib/sources/queries";
import {
  asArray,
  asRecord,
  buildUrl,
  fetchSourceJson,
  fetchSourceText,
  reportSourceFailure,
} from "@/lib/sources/request";
import { pickPattern, pickSyllabus, type SectionMap } from "@/lib/sources/sections";
import { normalizeWhitespace } from "@/lib/sources/text";
import type { WikiInfo } from "@/lib/sources/types";

const HEADING_SELECTOR = "h1, h2, h3, h4, h5, h6";
// Newer page HTML wraps each heading in <div class="mw-heading">.
const HEADING_WRAPPER_SELECTOR = "div.mw-heading";
const BODY_SELECTOR = "p, ul, ol, div";

function collectText(node: AnyNode, parts: string[]) {
  if (isText(node)) {
    const text = normalizeWhitespace(node.data);
    if (text) parts.push(text);
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, parts);
  }
}

export function elementText(node: AnyNode) {
  const parts: string[] = [];
  collectText(node, parts);
  return parts.join(" ");
}

async function searchTitle(cfg: ResolvedSourcesConfig, srsearch: string): Promise<string | null> {
  const url = buildUrl(cfg.wikipediaApiUrl, {
    action: "query",
    list: "search",
    srsearch,
    format: "json",
    srlimit: 5,
  });
  const json = asRecord(await fetchSourceJson(cfg, "wikipedia", url));
  const [first] = asArray(asRecord(json.query).search);
  const title = asRecord(first).title;
  return typeof title === "string" && title.trim() ? title : null;
}

export async function resolveTitle(
  query: string,
  cfg: ResolvedSourcesConfig = resolveSourcesRuntimeConfig()
): Promise<string | null> {
  for (const srsearch of wikiSearchQueries(query)) {
    try {
      const title = await searchTitle(cfg, srsearch);
      if (title) return title;
    } catch (err) {
      reportSourceFailure("wikipedia", "resolveTitle", err);
    }
  }
  return null;
}

export async function fetchRenderedHtml(
  title: string,
  cfg: ResolvedSourcesConfig = resolveSourcesRuntimeConfig()
): Promise<string | null> {
  const url = `${cfg.wikipediaRestUrl}/page/html/${encodeURIComponent(wikiSlug(title))}`;
  try {
    return await fetchSourceText(cfg, "wikipedia", url);
  } catch (err) {
    reportSourceFailure("wikipedia", "fetchRenderedHtml", err);
    return null;
  }
}

export function splitIntoSections(html: string): SectionMap {
  const $ = cheerio.load(html);
  $("table, style, script").remove();

  const sections: SectionMap = new Map();
  $(HEADING_SELECTOR).each((_, heading) => {
    const headText = elementText(heading).toLowerCase();
    const parent = $(heading).parent();
    const start = parent.is(HEADING_WRAPPER_SELECTOR) ? parent : $(heading);

    const parts: string[] = [];
    start.nextAll().each((__, sibling) => {
      const $sibling = $(sibling);
      if ($sibling.is(HEADING_SELECTOR) || $sibling.is(HEADING_WRAPPER_SELECTOR)) return false;
      if ($sibling.is(BODY_SELECTOR)) {
        const text = elementText(sibling);
        if (text) parts.push(text);
      }
      return undefined;
    });

    if (headText && parts.length > 0) sections.set(headText, parts.join("\n\n"));
  });

  if (!sections.has("summary")) {
    const firstParagraph = $("p").get(0);
    sections.set("summary", firstParagraph ? elementText(firstParagraph) : "");
  }
  return sections;
}

export function classifySections(title: string, sections: SectionMap): WikiInfo {
  return {
    title,
    summary: sections.get("summary") || sections.get("introduction") || undefined,
    syllabus: pickSyllabus(sections),
    pattern: pickPattern(sections),
    sections: Object.fromEntries(sections),
  };
}

export async function findWikiInfo(
  query: string,
  cfg: ResolvedSourcesConfig = resolveSourcesRuntimeConfig()
): Promise<WikiInfo> {
  const title = await resolveTitle(query, cfg);
  if (!title) return { sections: {} };
  const html = await fetchRenderedHtml(title, cfg);
  if (html === null) return { title, sections: {} };
  return classifySections(title, splitIntoSections(html));
}
