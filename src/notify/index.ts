export { createNtfySender, encodeHeaderValue, topicUrl } from "./ntfy";
export type { SendResult, SendNotificationFn, NtfyOptions } from "./ntfy";

export { createNotifier } from "./notifier";
export type { Notifier, NotifierDeps, NotifyOptions } from "./notifier";

export { backoffDelay, retryWithBackoff, sleep } from "./retry";
export type { SleepFn, RetryOutcome, AttemptOutcome } from "./retry";

export {
  buildReleaseNotification,
  buildErrorNotification,
  buildTestNotification,
  extractHighlights,
  formatTimestamp,
  priorityFor,
  tagsFor,
} from "./templates";
export type { TemplateContext, ReleaseEventKind } from "./templates";

export { DEFAULT_RETRY_POLICY } from "./types";
export type {
  NotificationEvent,
  NotificationKind,
  DeliveryResult,
  RetryPolicy,
} from "./types";
