/**
 * Canonical, immutable view of one published release.
 * Two records describe the same release iff their `version` strings are equal.
 */
export type ReleaseRecord = Readonly<{
  version: string;
  publishedAt: Date | null;
  title: string;
  body: string;
  url: string;
}>;

/**
 * Release payload as handed over by a fetch collaborator, before validation.
 */
export type RawRelease = Readonly<Record<string, unknown>>;

export type FetchReleasesFn = (limit: number) => Promise<ReadonlyArray<RawRelease>>;
