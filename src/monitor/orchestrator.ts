// pattern: Imperative Shell
import type { Logger } from "pino";
import { classify, describeChange } from "../detect/classifier";
import type { ChangeKind } from "../detect/classifier";
import { FetchError, MonitorError, NormalizationError, errorMessage } from "../errors";
import {
  buildErrorNotification,
  buildReleaseNotification,
  buildTestNotification,
} from "../notify/templates";
import type { TemplateContext } from "../notify/templates";
import type { Notifier } from "../notify/notifier";
import type { DeliveryResult, NotificationEvent } from "../notify/types";
import { normalizeRelease, sortByPublishedDesc } from "../release/normalizer";
import type { FetchReleasesFn, RawRelease, ReleaseRecord } from "../release/types";
import { applyRelease, findByVersion } from "../state/history";
import type { MonitorState, StateStore } from "../state/types";

export type MonitorSettings = Readonly<{
  projectName: string;
  projectTag: string;
  releaseNotesUrl: string;
  historyLimit: number;
}>;

export type MonitorDeps = {
  readonly store: StateStore;
  readonly fetchReleases: FetchReleasesFn;
  readonly notifier: Notifier;
  readonly settings: MonitorSettings;
  readonly logger: Logger;
  readonly now?: () => Date;
};

export type RunOptions = {
  /** Defaults to the notifier's own setting. */
  readonly notify?: boolean;
};

export type DetectedChange = Readonly<{
  kind: Exclude<ChangeKind, "no_change">;
  reason: string;
  record: ReleaseRecord;
}>;

export type SentNotification = Readonly<{
  event: NotificationEvent;
  delivery: DeliveryResult;
}>;

/**
 * What one run did. `state` is the state after the run, whether or not it
 * was written.
 */
export type RunReport = Readonly<{
  outcome: "changed" | "unchanged" | "error";
  changes: ReadonlyArray<DetectedChange>;
  notifications: ReadonlyArray<SentNotification>;
  state: MonitorState;
  error: MonitorError | null;
}>;

export type ProcessResult = Readonly<{
  kind: ChangeKind;
  reason: string;
  state: MonitorState;
}>;

/**
 * Classifies `record` against `previous` and returns the resulting state.
 * State is returned unchanged for `no_change`; a content update rewrites the
 * existing entry in place, anything else becomes the newest entry.
 */
export function processRelease(
  state: MonitorState,
  record: ReleaseRecord,
  previous: ReleaseRecord | null,
  historyLimit: number,
): ProcessResult {
  const kind = classify(previous, record);
  const reason = describeChange(kind, previous, record);

  if (kind === "no_change") {
    return { kind, reason, state };
  }

  const mode = kind === "content_update" ? "replace" : "promote";
  return { kind, reason, state: applyRelease(state, record, mode, historyLimit) };
}

export type Monitor = {
  readonly runSingleCheck: (options?: RunOptions) => Promise<RunReport>;
  readonly runMultiCheck: (limit: number, options?: RunOptions) => Promise<RunReport>;
  readonly sendTestNotification: (options?: RunOptions) => Promise<DeliveryResult>;
  readonly fetchLatest: () => Promise<ReleaseRecord>;
};

/**
 * Creates the monitor for one deployment. Each run loads state, fetches,
 * classifies, notifies and persists; state lives in the store, not here.
 *
 * Fetch and normalization failures are reported through an error
 * notification and leave stored state untouched. A failed delivery never
 * prevents the save. Only a failed save rejects the run.
 */
export function createMonitor(deps: MonitorDeps): Monitor {
  const { store, notifier, settings, logger } = deps;
  const now = deps.now ?? (() => new Date());

  function templateContext(): TemplateContext {
    return {
      projectName: settings.projectName,
      projectTag: settings.projectTag,
      now: now(),
    };
  }

  async function fetchRecords(limit: number): Promise<Array<ReleaseRecord>> {
    let raw: ReadonlyArray<RawRelease>;
    try {
      raw = await deps.fetchReleases(limit);
    } catch (err) {
      if (err instanceof MonitorError) throw err;
      throw new FetchError(errorMessage(err), { cause: err });
    }

    if (raw.length === 0) {
      throw new FetchError(`no releases found at ${settings.releaseNotesUrl}`);
    }

    return raw
      .slice(0, limit)
      .map((r) => normalizeRelease(r, { fallbackUrl: settings.releaseNotesUrl }));
  }

  async function reportFailure(
    state: MonitorState,
    err: unknown,
    options: RunOptions,
  ): Promise<RunReport> {
    if (!(err instanceof FetchError) && !(err instanceof NormalizationError)) {
      throw err;
    }

    const description =
      err instanceof FetchError
        ? `Failed to fetch ${settings.projectName} releases: ${err.message}`
        : `Failed to read ${settings.projectName} release: ${err.message}`;

    logger.error({ kind: err.kind, error: err.message }, "release check failed");

    const event = buildErrorNotification(description, templateContext());
    const delivery = await notifier.notify(event, { enabled: options.notify });

    return {
      outcome: "error",
      changes: [],
      notifications: [{ event, delivery }],
      state,
      error: err,
    };
  }

  async function notifyChange(
    change: DetectedChange,
    options: RunOptions,
  ): Promise<SentNotification> {
    const event = buildReleaseNotification(change.kind, change.record, templateContext());
    const delivery = await notifier.notify(event, { enabled: options.notify });
    return { event, delivery };
  }

  async function runSingleCheck(options: RunOptions = {}): Promise<RunReport> {
    const state = await store.load();

    let current: ReleaseRecord;
    try {
      const records = await fetchRecords(1);
      const first = records[0];
      if (!first) throw new FetchError("no releases returned");
      current = first;
    } catch (err) {
      return reportFailure(state, err, options);
    }

    const step = processRelease(state, current, state.latest, settings.historyLimit);

    if (step.kind === "no_change") {
      logger.info({ version: current.version }, "no changes");
      return { outcome: "unchanged", changes: [], notifications: [], state, error: null };
    }

    const change: DetectedChange = { kind: step.kind, reason: step.reason, record: current };
    logger.info({ kind: step.kind, version: current.version }, step.reason);

    const sent = await notifyChange(change, options);
    await store.save(step.state);

    return {
      outcome: "changed",
      changes: [change],
      notifications: [sent],
      state: step.state,
      error: null,
    };
  }

  async function runMultiCheck(limit: number, options: RunOptions = {}): Promise<RunReport> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }

    // releases beyond the history bound could never be found again and
    // would be reported as new on every run
    const windowSize = Math.min(limit, settings.historyLimit);
    if (windowSize < limit) {
      logger.warn(
        { limit, historyLimit: settings.historyLimit },
        "limit exceeds history bound, checking fewer releases",
      );
    }

    const initial = await store.load();

    let records: Array<ReleaseRecord>;
    try {
      records = await fetchRecords(windowSize);
    } catch (err) {
      return reportFailure(initial, err, options);
    }

    // oldest first, so the newest release ends up at the head of history
    const ordered = sortByPublishedDesc(records).reverse();
    const changes: Array<DetectedChange> = [];
    let state = initial;

    if (initial.latest === null) {
      for (const record of ordered) {
        state = applyRelease(state, record, "promote", settings.historyLimit);
      }
      const newest = state.latest;
      if (newest) {
        changes.push({ kind: "first_run", reason: "First run", record: newest });
      }
    } else {
      for (const record of ordered) {
        const previous = findByVersion(state, record.version) ?? state.latest;
        const step = processRelease(state, record, previous, settings.historyLimit);
        if (step.kind === "no_change") continue;

        changes.push({ kind: step.kind, reason: step.reason, record });
        state = step.state;
      }
    }

    if (changes.length === 0) {
      logger.info({ checked: records.length }, "no changes");
      return { outcome: "unchanged", changes, notifications: [], state: initial, error: null };
    }

    const notifications: Array<SentNotification> = [];
    for (const change of changes) {
      logger.info({ kind: change.kind, version: change.record.version }, change.reason);
      notifications.push(await notifyChange(change, options));
    }

    await store.save(state);

    return { outcome: "changed", changes, notifications, state, error: null };
  }

  async function sendTestNotification(options: RunOptions = {}): Promise<DeliveryResult> {
    const event = buildTestNotification(templateContext());
    return notifier.notify(event, { enabled: options.notify });
  }

  async function fetchLatest(): Promise<ReleaseRecord> {
    const records = await fetchRecords(1);
    const first = records[0];
    if (!first) throw new FetchError("no releases returned");
    return first;
  }

  return { runSingleCheck, runMultiCheck, sendTestNotification, fetchLatest };
}
