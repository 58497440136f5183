import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchExamInfo } from "@/lib/exam-info/service";
import { htmlResponse, jsonResponse, requestedUrls, stubFetch, testConfig } from "@/test/fakeFetch";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchExamInfo", () => {
  it("returns a well-formed aggregate when every source fails", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });

    await expect(fetchExamInfo("NEET 2024", { config: testConfig() })).resolves.toEqual({
      query: "NEET 2024",
      wikipedia: { sections: {} },
      videos: [],
      playlist: null,
      books: [],
      pyqs: [],
    });
  });

  it("skips videos, books and paper links when both flags are off", async () => {
    const fetchMock = stubFetch(() => jsonResponse({ query: { search: [] } }));

    const info = await fetchExamInfo("NEET", {
      includeVideos: false,
      includeBooks: false,
      config: testConfig(),
    });

    expect(info).toEqual({ query: "NEET", wikipedia: { sections: {} }, videos: [], playlist: null, books: [], pyqs: [] });
    expect(requestedUrls(fetchMock).map((u) => u.host)).toEqual(["wiki.test", "wiki.test"]);
  });

  it("queries every source in order", async () => {
    const fetchMock = stubFetch((url) => {
      if (url.host === "wiki.test" && url.pathname.endsWith("/api.php")) {
        return jsonResponse({ query: { search: [{ title: "JEE Main" }] } });
      }
      if (url.host === "wiki.test") return htmlResponse("<p>Lead.</p><h2>Exam pattern</h2><p>90 questions.</p>");
      if (url.host === "yt.test" && url.searchParams.get("type") === "video") {
        return jsonResponse({ items: [{ id: { videoId: "v1" }, snippet: { title: "JEE Maths" } }] });
      }
      if (url.host === "yt.test") {
        return jsonResponse({ items: [{ id: { playlistId: "p1" }, snippet: { title: "JEE Playlist" } }] });
      }
      if (url.host === "books.test") return jsonResponse({ items: [{ volumeInfo: { title: "JEE Guide" } }] });
      return htmlResponse('<a href="2023.pdf">JEE 2023</a>');
    });

    const info = await fetchExamInfo("JEE Main", { config: testConfig() });

    expect(info.wikipedia.pattern).toBe("90 questions.");
    expect(info.wikipedia.summary).toBe("Lead.");
    expect(info.videos).toEqual([{ title: "JEE Maths", id: "v1", url: "https://www.youtube.com/watch?v=v1" }]);
    expect(info.playlist?.id).toBe("p1");
    expect(info.books).toEqual([{ title: "JEE Guide" }]);
    expect(info.pyqs.map((p) => p.link)).toEqual([
      "https://www.examsnet.com/exams/2023.pdf",
      "https://www.selfstudys.com/books/jee-main-previous-year-paper/page/2023.pdf",
    ]);
    expect(requestedUrls(fetchMock).map((u) => u.host)).toEqual([
      "wiki.test",
      "wiki.test",
      "yt.test",
      "yt.test",
      "books.test",
      "www.examsnet.com",
      "www.selfstudys.com",
    ]);
  });

  it("returns an empty aggregate for a blank query without any request", async () => {
    const fetchMock = stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    await expect(fetchExamInfo("   ", { config: testConfig() })).resolves.toEqual({
      query: "   ",
      wikipedia: { sections: {} },
      videos: [],
      playlist: null,
      books: [],
      pyqs: [],
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
