import { describe, it, expect } from "vitest";
import { NormalizationError } from "../errors";
import {
  cleanVersion,
  extractReleaseDate,
  normalizeRelease,
  sortByPublishedDesc,
} from "./normalizer";
import { makeRelease } from "../test-utils/fixtures";

const options = { fallbackUrl: "https://example.com/release-notes" };

describe("normalizeRelease", () => {
  it("should build a record from a complete payload", () => {
    const record = normalizeRelease(
      {
        version: "n8n@1.104.2",
        title: "n8n 1.104.2",
        body: "Bug fixes",
        url: "https://example.com/notes/1.104.2",
        publishedAt: "2025-07-28T10:00:00Z",
      },
      options,
    );

    expect(record).toEqual({
      version: "n8n@1.104.2",
      title: "n8n 1.104.2",
      body: "Bug fixes",
      url: "https://example.com/notes/1.104.2",
      publishedAt: new Date("2025-07-28T10:00:00Z"),
    });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("should fill defaults for missing optional fields", () => {
    const record = normalizeRelease({ version: "n8n@1.104.2" }, options);

    expect(record).toEqual({
      version: "n8n@1.104.2",
      title: "n8n@1.104.2",
      body: "",
      url: "https://example.com/release-notes",
      publishedAt: null,
    });
  });

  it("should strip heading anchors and whitespace from the version", () => {
    const record = normalizeRelease({ version: "  n8n@1.104.2#\n" }, options);

    expect(record.version).toBe("n8n@1.104.2");
  });

  it("should join scraped content lines into the body", () => {
    const record = normalizeRelease(
      {
        version: "n8n@1.104.2",
        content: ["Release date: 2025-07-28", "• Fixed a bug"],
      },
      options,
    );

    expect(record.body).toBe("Release date: 2025-07-28\n• Fixed a bug");
  });

  it("should take the publish date from the release date line when absent", () => {
    const record = normalizeRelease(
      { version: "n8n@1.104.2", body: "Release date: 2025-07-28\nNotes" },
      options,
    );

    expect(record.publishedAt).toEqual(new Date("2025-07-28"));
  });

  it("should leave the publish date unknown when it cannot be parsed", () => {
    const record = normalizeRelease(
      { version: "n8n@1.104.2", publishedAt: "sometime soon" },
      options,
    );

    expect(record.publishedAt).toBeNull();
  });

  it("should accept null optional fields", () => {
    const record = normalizeRelease(
      { version: "n8n@1.0.0", title: null, body: null, url: null, publishedAt: null },
      options,
    );

    expect(record.title).toBe("n8n@1.0.0");
    expect(record.body).toBe("");
  });

  it("should reject a payload without a version", () => {
    expect(() => normalizeRelease({ title: "No version" }, options)).toThrow(
      NormalizationError,
    );
    expect(() => normalizeRelease({ title: "No version" }, options)).toThrow(
      "version: version is required",
    );
  });

  it("should reject a blank version", () => {
    expect(() => normalizeRelease({ version: " # " }, options)).toThrow(
      "invalid release payload: version is empty",
    );
  });

  it("should reject a payload that is not an object", () => {
    expect(() => normalizeRelease("n8n@1.0.0", options)).toThrow(NormalizationError);
    expect(() => normalizeRelease(null, options)).toThrow(NormalizationError);
  });

  it("should reject a body of the wrong type", () => {
    expect(() => normalizeRelease({ version: "n8n@1.0.0", body: 42 }, options)).toThrow(
      /body/,
    );
  });
});

describe("cleanVersion", () => {
  it("should remove every hash", () => {
    expect(cleanVersion("#n8n@1.0.0#")).toBe("n8n@1.0.0");
  });
});

describe("extractReleaseDate", () => {
  it("should return the text after the label", () => {
    expect(extractReleaseDate("Intro\nRelease date: 2025-07-28 \nMore")).toBe("2025-07-28");
  });

  it("should return null when there is no date line", () => {
    expect(extractReleaseDate("Just notes")).toBeNull();
  });
});

describe("sortByPublishedDesc", () => {
  it("should order newest first with unknown dates last", () => {
    const a = makeRelease({ version: "a", publishedAt: new Date("2025-01-01T00:00:00Z") });
    const b = makeRelease({ version: "b", publishedAt: null });
    const c = makeRelease({ version: "c", publishedAt: new Date("2025-03-01T00:00:00Z") });

    expect(sortByPublishedDesc([a, b, c]).map((r) => r.version)).toEqual(["c", "a", "b"]);
  });

  it("should keep input order for equal dates", () => {
    const a = makeRelease({ version: "a", publishedAt: null });
    const b = makeRelease({ version: "b", publishedAt: null });

    expect(sortByPublishedDesc([a, b]).map((r) => r.version)).toEqual(["a", "b"]);
  });
});
