// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "../errors";
import type { NotificationEvent } from "./types";

/**
 * Discriminated union result type for a single push attempt.
 */
export type SendResult =
  | { readonly success: true; readonly status: number }
  | { readonly success: false; readonly error: string };

/**
 * Function signature for pushing one notification. Never throws; errors are
 * returned in the result.
 */
export type SendNotificationFn = (
  event: NotificationEvent,
  logger: Logger,
) => Promise<SendResult>;

export type NtfyOptions = {
  readonly server: string;
  readonly topic: string;
  readonly timeoutMs: number;
};

/**
 * HTTP header values must be Latin-1; anything else goes out RFC 2047 encoded,
 * which ntfy decodes.
 */
export function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, "utf-8").toString("base64")}?=`;
}

export function topicUrl(server: string, topic: string): string {
  return `${server.replace(/\/+$/, "")}/${encodeURIComponent(topic)}`;
}

/**
 * Creates an ntfy sender bound to one server and topic.
 *
 * @returns A SendNotificationFn that POSTs the message body with title,
 *          priority and tags headers.
 */
export function createNtfySender(options: NtfyOptions): SendNotificationFn {
  const url = topicUrl(options.server, options.topic);

  return async function sendNtfy(event, logger) {
    try {
      const response = await fetch(url, {
        method: "POST",
        body: event.message,
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: {
          "X-Title": encodeHeaderValue(event.title),
          "X-Priority": String(event.priority),
          "X-Tags": event.tags.join(","),
        },
      });

      if (!response.ok) {
        const error = `HTTP ${response.status}: ${response.statusText}`;
        logger.warn({ topic: options.topic, error }, "ntfy rejected notification");
        return { success: false, error };
      }

      logger.debug({ topic: options.topic, kind: event.kind }, "ntfy accepted notification");
      return { success: true, status: response.status };
    } catch (err) {
      const message = errorMessage(err);
      logger.warn({ topic: options.topic, error: message }, "ntfy request failed");
      return { success: false, error: message };
    }
  };
}
