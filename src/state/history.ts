// pattern: Functional Core
import type { ReleaseRecord } from "../release/types";
import type { MonitorState } from "./types";

export type ApplyMode = "promote" | "replace";

/**
 * Returns the state that results from recording `record`.
 *
 * - `promote`: the record becomes the newest entry. An older entry with the
 *   same version is dropped so a version never appears twice.
 * - `replace`: the entry with the same version is overwritten in place (edited
 *   notes); if none exists the record is promoted instead.
 *
 * History is truncated to `limit` and `latest` is always `history[0]`.
 */
export function applyRelease(
  state: MonitorState,
  record: ReleaseRecord,
  mode: ApplyMode,
  limit: number,
): MonitorState {
  const index = state.history.findIndex((r) => r.version === record.version);

  let history: Array<ReleaseRecord>;
  if (mode === "replace" && index >= 0) {
    history = state.history.map((r, i) => (i === index ? record : r));
  } else {
    history = [record, ...state.history.filter((r) => r.version !== record.version)];
  }

  return truncateHistory({ latest: history[0] ?? null, history }, limit);
}

export function truncateHistory(state: MonitorState, limit: number): MonitorState {
  if (state.history.length <= limit) return state;
  const history = state.history.slice(0, limit);
  return { latest: history[0] ?? null, history };
}

/**
 * Looks up a version in history; exact, case-sensitive match.
 */
export function findByVersion(
  state: MonitorState,
  version: string,
): ReleaseRecord | null {
  return state.history.find((r) => r.version === version) ?? null;
}

export function recordsEqual(a: ReleaseRecord, b: ReleaseRecord): boolean {
  return (
    a.version === b.version &&
    a.title === b.title &&
    a.body === b.body &&
    a.url === b.url &&
    (a.publishedAt?.getTime() ?? null) === (b.publishedAt?.getTime() ?? null)
  );
}

/**
 * Restores `latest === history[0]` for state read from disk, where the two
 * files may have been written by different runs.
 */
export function reconcileState(state: MonitorState, limit: number): MonitorState {
  const head = state.history[0];
  if (state.latest === null) {
    return truncateHistory({ latest: head ?? null, history: state.history }, limit);
  }
  if (head && recordsEqual(head, state.latest)) {
    return truncateHistory(state, limit);
  }
  return applyRelease(state, state.latest, "promote", limit);
}
