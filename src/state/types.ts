import type { ReleaseRecord } from "../release/types";

/**
 * Everything the monitor remembers between runs. `history` is newest first;
 * when `latest` is set it is also `history[0]`.
 */
export type MonitorState = Readonly<{
  latest: ReleaseRecord | null;
  history: ReadonlyArray<ReleaseRecord>;
}>;

export const DEFAULT_HISTORY_LIMIT = 50;

export const EMPTY_STATE: MonitorState = Object.freeze({
  latest: null,
  history: Object.freeze([]),
});

export type StateStore = {
  readonly load: () => Promise<MonitorState>;
  readonly save: (state: MonitorState) => Promise<void>;
};
