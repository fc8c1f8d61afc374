// pattern: Imperative Shell
import type { Logger } from "pino";
import type { SendNotificationFn } from "./ntfy";
import { retryWithBackoff, sleep } from "./retry";
import type { SleepFn } from "./retry";
import type { DeliveryResult, NotificationEvent, RetryPolicy } from "./types";

export type Notifier = {
  readonly enabled: boolean;
  readonly notify: (
    event: NotificationEvent,
    options?: NotifyOptions,
  ) => Promise<DeliveryResult>;
};

export type NotifyOptions = {
  /** Overrides the notifier's `enabled` flag for one delivery. */
  readonly enabled?: boolean;
};

export type NotifierDeps = {
  readonly send: SendNotificationFn;
  readonly retry: RetryPolicy;
  /** false in dry-run mode: nothing is sent and delivery reports success. */
  readonly enabled: boolean;
  readonly logger: Logger;
  readonly sleep?: SleepFn;
};

/**
 * Creates the notifier used by the monitor. Delivery failures are logged and
 * returned, never thrown, so the caller can still persist state.
 */
export function createNotifier(deps: NotifierDeps): Notifier {
  const { logger } = deps;

  async function notify(
    event: NotificationEvent,
    options: NotifyOptions = {},
  ): Promise<DeliveryResult> {
    if (!(options.enabled ?? deps.enabled)) {
      logger.info(
        { kind: event.kind, title: event.title },
        "notifications disabled, skipping delivery",
      );
      return { success: true, attemptsUsed: 0, lastError: null, skipped: true };
    }

    const outcome = await retryWithBackoff(
      async () => {
        const result = await deps.send(event, logger);
        return result.success ? { ok: true } : { ok: false, error: result.error };
      },
      deps.retry,
      (attempt, error, delayMs) => {
        logger.warn(
          { kind: event.kind, attempt, delayMs, error },
          "notification delivery failed, retrying",
        );
      },
      deps.sleep ?? sleep,
    );

    if (outcome.ok) {
      logger.info(
        { kind: event.kind, priority: event.priority, attempts: outcome.attemptsUsed },
        "notification sent",
      );
    } else {
      logger.error(
        { kind: event.kind, attempts: outcome.attemptsUsed, error: outcome.lastError },
        "notification delivery gave up",
      );
    }

    return {
      success: outcome.ok,
      attemptsUsed: outcome.attemptsUsed,
      lastError: outcome.lastError,
      skipped: false,
    };
  }

  return { enabled: deps.enabled, notify };
}
