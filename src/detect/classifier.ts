// pattern: Functional Core
import type { ReleaseRecord } from "../release/types";

export type ChangeKind = "first_run" | "new_version" | "content_update" | "no_change";

/**
 * Classifies `current` against the last known release.
 *
 * Versions are compared as exact strings: a version that sorts "lower" is still
 * a new version, since ordering is the feed's concern. Same version with an
 * edited title or body is a content update.
 */
export function classify(
  previous: ReleaseRecord | null,
  current: ReleaseRecord,
): ChangeKind {
  if (previous === null) return "first_run";
  if (current.version !== previous.version) return "new_version";
  if (current.body !== previous.body || current.title !== previous.title) {
    return "content_update";
  }
  return "no_change";
}

/**
 * One-line explanation of a classification, for logs and CLI output.
 */
export function describeChange(
  kind: ChangeKind,
  previous: ReleaseRecord | null,
  current: ReleaseRecord,
): string {
  switch (kind) {
    case "first_run":
      return "First run";
    case "new_version":
      return `New version: ${previous?.version ?? "none"} → ${current.version}`;
    case "content_update":
      return `Content updated for ${current.version}`;
    case "no_change":
      return "No changes";
  }
}
