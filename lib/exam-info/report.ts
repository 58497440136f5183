import { truncate } from "@/lib/sources/text";
import type { Book, ExamInfo, PyqLink } from "@/lib/sources/types";

export const SUMMARY_LIMIT = 1000;
export const EXCERPT_LIMIT = 1500;
export const HEADING_LIMIT = 15;

function excerpt(text: string, limit: number) {
  const cut = truncate(text, limit);
  return cut.cut ? `${cut.text}...` : cut.text;
}

function bookLine(book: Book) {
  const authors = (book.authors || []).join(", ");
  return ` - ${book.title || "Untitled"} | ${authors || "Unknown author"} - ${book.infoLink || "no link"}`;
}

function pyqLine(pyq: PyqLink) {
  return ` - ${pyq.title || pyq.exam} | ${pyq.site}: ${pyq.link}`;
}

export function renderExamInfoReport(info: ExamInfo): string {
  const w = info.wikipedia;
  const lines: string[] = ["=== Result Summary ===", "", `Query: ${info.query}`];

  lines.push(w.title ? `Wikipedia Page Title: ${w.title}` : "Wikipedia page not found.");

  if (w.summary) lines.push("", "Summary (lead):", excerpt(w.summary, SUMMARY_LIMIT));
  else lines.push("", "Summary not available.");

  if (w.pattern) lines.push("", "Exam Pattern / Format:", excerpt(w.pattern, EXCERPT_LIMIT));
  else lines.push("", "Exam pattern not available.");

  if (w.syllabus) lines.push("", "Syllabus / Curriculum (excerpt):", excerpt(w.syllabus, EXCERPT_LIMIT));
  else lines.push("", "Syllabus not available.");

  const headings = Object.keys(w.sections);
  if (headings.length) {
    lines.push("", "Other sections found on Wikipedia (headings):");
    for (const heading of headings.slice(0, HEADING_LIMIT)) lines.push(` - ${heading}`);
  }

  if (info.videos.length) {
    lines.push("", "Suggested Videos:");
    for (const v of info.videos) lines.push(` - ${v.title}  (${v.url})`);
  } else {
    lines.push("", "YouTube results not available (no API key or no results).");
  }

  if (info.playlist) {
    lines.push("", "Suggested YouTube Playlist:", ` - ${info.playlist.title} (${info.playlist.url})`);
  } else {
    lines.push("", "YouTube playlist not available (no API key or no results).");
  }

  if (info.books.length) {
    lines.push("", "Suggested Books:");
    for (const b of info.books) lines.push(bookLine(b));
  } else {
    lines.push("", "No book suggestions found.");
  }

  if (info.pyqs.length) {
    lines.push("", "Free Solved PYQs Links (Examsnet / Selfstudys):");
    for (const p of info.pyqs) lines.push(pyqLine(p));
  } else {
    lines.push("", "No free PYQs links found.");
  }

  lines.push("", "--- End ---");
  return lines.join("\n");
}
