// pattern: Functional Core
import { extractReleaseDate } from "../release/normalizer";
import type { ReleaseRecord } from "../release/types";
import type { NotificationEvent, NotificationKind } from "./types";

export type TemplateContext = Readonly<{
  projectName: string;
  projectTag: string;
  now: Date;
}>;

export type ReleaseEventKind = Extract<
  NotificationKind,
  "first_run" | "new_version" | "content_update"
>;

const PRIORITY: Record<NotificationKind, NotificationEvent["priority"]> = {
  error: 5,
  new_version: 4,
  first_run: 3,
  content_update: 3,
  test: 3,
};

const KIND_TAG: Record<NotificationKind, string> = {
  first_run: "new-release",
  new_version: "new-release",
  content_update: "content-update",
  error: "error",
  test: "test",
};

const MAX_HIGHLIGHTS = 2;
const MAX_HIGHLIGHT_LENGTH = 80;
const HIGHLIGHT_SCAN_LINES = 4;

export function priorityFor(kind: NotificationKind): NotificationEvent["priority"] {
  return PRIORITY[kind];
}

export function tagsFor(kind: NotificationKind, projectTag: string): Array<string> {
  return [...new Set([projectTag, KIND_TAG[kind]])];
}

/**
 * `2025-07-28 14:05 UTC`
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

/**
 * Picks up to two substantial lines from the release notes, skipping the date
 * line and anything of ten characters or fewer.
 */
export function extractHighlights(body: string): Array<string> {
  const highlights: Array<string> = [];
  const lines = body
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, HIGHLIGHT_SCAN_LINES);

  for (const line of lines) {
    if (line.includes("Release date:")) continue;

    const clean = line.replace(/^•\s*/, "");
    if (clean.length <= 10) continue;

    highlights.push(
      clean.length > MAX_HIGHLIGHT_LENGTH
        ? `${clean.slice(0, MAX_HIGHLIGHT_LENGTH - 3)}...`
        : clean,
    );
    if (highlights.length >= MAX_HIGHLIGHTS) break;
  }

  return highlights;
}

function releaseDateLabel(record: ReleaseRecord): string | null {
  const fromNotes = extractReleaseDate(record.body);
  if (fromNotes) return fromNotes;
  return record.publishedAt ? record.publishedAt.toISOString().slice(0, 10) : null;
}

function headline(kind: ReleaseEventKind, project: string, version: string) {
  switch (kind) {
    case "first_run":
      return {
        title: `Watching ${project} Releases: ${version}`,
        lead: `👀 Now watching ${project} releases, latest is ${version}`,
      };
    case "new_version":
      return {
        title: `New ${project} Release: ${version}`,
        lead: `🎉 New ${project} Release: ${version}`,
      };
    case "content_update":
      return {
        title: `${project} Release Notes Updated: ${version}`,
        lead: `📝 Release notes updated for ${version}`,
      };
  }
}

export function buildReleaseNotification(
  kind: ReleaseEventKind,
  record: ReleaseRecord,
  context: TemplateContext,
): NotificationEvent {
  const { title, lead } = headline(kind, context.projectName, record.version);
  const date = releaseDateLabel(record);
  const highlights = extractHighlights(record.body);

  let message = `${lead}${date ? `\n📅 ${date}` : ""}\n`;
  if (highlights.length > 0) {
    message += `\n🔍 Highlights:\n${highlights.map((h) => `• ${h}`).join("\n")}\n`;
  }
  message += `\n🔗 ${record.url}\n⏰ ${formatTimestamp(context.now)}`;

  return {
    kind,
    record,
    title,
    message,
    priority: priorityFor(kind),
    tags: tagsFor(kind, context.projectTag),
  };
}

export function buildErrorNotification(
  description: string,
  context: TemplateContext,
): NotificationEvent {
  return {
    kind: "error",
    record: null,
    title: `${context.projectName} Monitor Error`,
    message: `❌ ${description}\n⏰ ${formatTimestamp(context.now)}`,
    priority: priorityFor("error"),
    tags: tagsFor("error", context.projectTag),
  };
}

export function buildTestNotification(context: TemplateContext): NotificationEvent {
  return {
    kind: "test",
    record: null,
    title: `${context.projectName} Monitor Test`,
    message: `Test from ${context.projectName} monitor\n⏰ ${formatTimestamp(context.now)}`,
    priority: priorityFor("test"),
    tags: tagsFor("test", context.projectTag),
  };
}
