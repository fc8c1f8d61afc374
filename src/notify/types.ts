import type { ReleaseRecord } from "../release/types";

export type NotificationKind =
  | "first_run"
  | "new_version"
  | "content_update"
  | "error"
  | "test";

/**
 * A rendered notification, ready to hand to a push endpoint. Never persisted.
 */
export type NotificationEvent = Readonly<{
  kind: NotificationKind;
  record: ReleaseRecord | null;
  title: string;
  message: string;
  priority: 1 | 2 | 3 | 4 | 5;
  tags: ReadonlyArray<string>;
}>;

/**
 * Outcome of delivering one event. `skipped` is set when notifications are
 * disabled and the endpoint was never contacted.
 */
export type DeliveryResult = Readonly<{
  success: boolean;
  attemptsUsed: number;
  lastError: string | null;
  skipped: boolean;
}>;

export type RetryPolicy = Readonly<{
  attempts: number;
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 8000,
};
