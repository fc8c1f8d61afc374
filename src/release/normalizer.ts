// pattern: Functional Core
import { z } from "zod";
import { NormalizationError } from "../errors";
import type { ReleaseRecord } from "./types";

const rawReleaseSchema = z.object({
  version: z.string({ required_error: "version is required" }),
  title: z.string().nullish(),
  body: z.string().nullish(),
  content: z.array(z.string()).nullish(),
  url: z.string().nullish(),
  publishedAt: z.union([z.string(), z.date()]).nullish(),
});

export type NormalizeOptions = {
  readonly fallbackUrl: string;
};

const RELEASE_DATE_PATTERN = /Release date:\s*(.+)$/im;

/**
 * Removes heading anchors and surrounding whitespace from a scraped version label.
 */
export function cleanVersion(raw: string): string {
  return raw.replace(/#/g, "").trim();
}

function parseDate(value: string | Date | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const date = value instanceof Date ? value : new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Finds the `Release date: ...` line the release notes carry, if any.
 */
export function extractReleaseDate(body: string): string | null {
  const match = RELEASE_DATE_PATTERN.exec(body);
  return match?.[1]?.trim() ?? null;
}

/**
 * Validates a raw release payload and converts it to a {@link ReleaseRecord}.
 *
 * Missing title, body, url and publish date are filled with defaults; a payload
 * without a non-empty version is rejected.
 *
 * @throws NormalizationError when the payload is not an object, the version is
 *         missing or blank, or an optional field has the wrong type.
 */
export function normalizeRelease(raw: unknown, options: NormalizeOptions): ReleaseRecord {
  const result = rawReleaseSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new NormalizationError(`invalid release payload: ${issues}`);
  }

  const payload = result.data;
  const version = cleanVersion(payload.version);
  if (version.length === 0) {
    throw new NormalizationError("invalid release payload: version is empty");
  }

  const body = payload.body ?? (payload.content ?? []).join("\n");
  const title = payload.title?.trim() || version;
  const url = payload.url?.trim() || options.fallbackUrl;
  const publishedAt =
    parseDate(payload.publishedAt) ?? parseDate(extractReleaseDate(body));

  return Object.freeze({ version, publishedAt, title, body, url });
}

/**
 * Orders records newest first; records with an unknown publish date sort last.
 * The sort is stable, so feed order is kept among equal dates.
 */
export function sortByPublishedDesc(
  records: ReadonlyArray<ReleaseRecord>,
): Array<ReleaseRecord> {
  return [...records].sort((a, b) => {
    if (a.publishedAt === null && b.publishedAt === null) return 0;
    if (a.publishedAt === null) return 1;
    if (b.publishedAt === null) return -1;
    return b.publishedAt.getTime() - a.publishedAt.getTime();
  });
}
