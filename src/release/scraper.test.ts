import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { FetchError } from "../errors";
import { createReleaseScraper, parseReleaseNotes } from "./scraper";

const logger = pino({ level: "silent" });
const pageUrl = "https://example.com/release-notes";

const html = `
  <html>
    <body>
      <h1>Release notes</h1>
      <h2>Getting started</h2>
      <p>Intro text</p>
      <h2 id="n8n11042">n8n@1.104.2#</h2>
      <p>Release date: 2025-07-28</p>
      <p>This release contains bug fixes.</p>
      <ul>
        <li> Fixed credential sharing </li>
        <li>Improved editor performance</li>
      </ul>
      <p>See n8n@1.104.1 for details</p>
      <h2 id="n8n11041">n8n@1.104.1#</h2>
      <p>Release date: 2025-07-21</p>
      <ol><li>Security patch</li></ol>
      <h2>n8n@1.104.0</h2>
      <p></p>
    </body>
  </html>
`;

describe("parseReleaseNotes", () => {
  it("should split the page on version headings, newest first", () => {
    const releases = parseReleaseNotes(html, pageUrl, "n8n@", 10);

    expect(releases).toHaveLength(3);
    expect(releases[0]).toEqual({
      version: "n8n@1.104.2#",
      title: "n8n@1.104.2",
      content: [
        "Release date: 2025-07-28",
        "This release contains bug fixes.",
        "• Fixed credential sharing",
        "• Improved editor performance",
      ],
      url: "https://example.com/release-notes#n8n11042",
    });
    expect(releases[1]).toEqual({
      version: "n8n@1.104.1#",
      title: "n8n@1.104.1",
      content: ["Release date: 2025-07-21", "• Security patch"],
      url: "https://example.com/release-notes#n8n11041",
    });
  });

  it("should fall back to the page url when a heading has no id", () => {
    const releases = parseReleaseNotes(html, pageUrl, "n8n@", 10);

    expect(releases[2]).toEqual({
      version: "n8n@1.104.0",
      title: "n8n@1.104.0",
      content: [],
      url: pageUrl,
    });
  });

  it("should honour the limit", () => {
    const releases = parseReleaseNotes(html, pageUrl, "n8n@", 1);

    expect(releases).toHaveLength(1);
    expect(releases[0]?.["version"]).toBe("n8n@1.104.2#");
  });

  it("should return no releases when no heading carries the marker", () => {
    expect(parseReleaseNotes("<h2>Changelog</h2><p>text</p>", pageUrl, "n8n@", 5)).toEqual([]);
  });
});

describe("createReleaseScraper", () => {
  const options = {
    url: pageUrl,
    versionMarker: "n8n@",
    timeoutMs: 5000,
    userAgent: "release-watch-test",
  };

  it("should fetch the page and parse releases", async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      statusText: "OK",
      text: vi.fn().mockResolvedValue(html),
    });
    vi.stubGlobal("fetch", fetchMock);

    const fetchReleases = createReleaseScraper(options, logger);
    const releases = await fetchReleases(2);

    expect(releases).toHaveLength(2);
    expect(fetchMock).toHaveBeenCalledWith(
      pageUrl,
      expect.objectContaining({
        headers: {
          "User-Agent": "release-watch-test",
          Accept: "text/html,application/xhtml+xml",
        },
      }),
    );
  });

  it("should throw FetchError on a non-success response", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({ ok: false, status: 503, statusText: "Service Unavailable" }),
    );

    const fetchReleases = createReleaseScraper(options, logger);

    await expect(fetchReleases(1)).rejects.toThrow(FetchError);
    await expect(fetchReleases(1)).rejects.toThrow("HTTP 503: Service Unavailable");
  });

  it("should wrap transport errors in FetchError", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND")));

    const fetchReleases = createReleaseScraper(options, logger);

    await expect(fetchReleases(1)).rejects.toMatchObject({
      name: "FetchError",
      kind: "fetch",
      message: "getaddrinfo ENOTFOUND",
    });
  });
});
