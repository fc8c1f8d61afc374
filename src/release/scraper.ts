// pattern: Imperative Shell
import * as cheerio from "cheerio";
import type { Logger } from "pino";
import { FetchError, errorMessage } from "../errors";
import type { FetchReleasesFn, RawRelease } from "./types";

export type ScraperOptions = {
  readonly url: string;
  readonly versionMarker: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
};

/**
 * Splits a release-notes page into one raw release per version heading.
 * Content runs from a heading up to the next version heading; list items
 * become `• item` lines. Returned newest first, as the page lists them.
 */
export function parseReleaseNotes(
  html: string,
  pageUrl: string,
  versionMarker: string,
  limit: number,
): Array<RawRelease> {
  const $ = cheerio.load(html);

  const headers = $("h2")
    .filter((_, el) => $(el).text().includes(versionMarker))
    .toArray();

  return headers.slice(0, limit).map((header, i) => {
    const next = headers[i + 1];
    const siblings = next ? $(header).nextUntil(next) : $(header).nextAll();

    const content: Array<string> = [];
    siblings.each((_, el) => {
      const node = $(el);
      const text = node.text().trim();
      if (!text || text.includes(versionMarker)) return;

      if (node.is("ul, ol")) {
        node.find("li").each((_, li) => {
          content.push(`• ${$(li).text().trim()}`);
        });
      } else {
        content.push(text);
      }
    });

    const anchor = $(header).attr("id");
    const version = $(header).text().trim();

    return {
      version,
      title: version.replace(/#/g, "").trim(),
      content,
      url: anchor ? `${pageUrl}#${anchor}` : pageUrl,
    };
  });
}

/**
 * Creates the fetch collaborator that downloads the release-notes page and
 * parses its most recent releases.
 *
 * The returned function throws {@link FetchError} on transport errors and on
 * non-success responses; it never retries.
 */
export function createReleaseScraper(
  options: ScraperOptions,
  logger: Logger,
): FetchReleasesFn {
  return async function fetchReleases(limit: number) {
    let html: string;
    try {
      const response = await fetch(options.url, {
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: {
          "User-Agent": options.userAgent,
          Accept: "text/html,application/xhtml+xml",
        },
      });

      if (!response.ok) {
        throw new FetchError(
          `HTTP ${response.status}: ${response.statusText}`,
        );
      }

      html = await response.text();
    } catch (err) {
      const message = errorMessage(err);
      logger.error({ url: options.url, error: message }, "release notes fetch failed");
      if (err instanceof FetchError) throw err;
      throw new FetchError(message, { cause: err });
    }

    const releases = parseReleaseNotes(html, options.url, options.versionMarker, limit);
    logger.info(
      { url: options.url, releaseCount: releases.length },
      "release notes fetched",
    );
    return releases;
  };
}
