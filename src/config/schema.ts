import { z } from "zod";
import { DEFAULT_RETRY_POLICY } from "../notify/types";

const projectConfigSchema = z.object({
  name: z.string().min(1).default("n8n"),
  tag: z.string().min(1).default("n8n"),
  releaseNotesUrl: z.string().url().default("https://docs.n8n.io/release-notes"),
  versionMarker: z.string().min(1).default("n8n@"),
});

const retryConfigSchema = z.object({
  attempts: z.number().int().positive().max(10).default(DEFAULT_RETRY_POLICY.attempts),
  baseDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  backoffFactor: z.number().min(1).default(DEFAULT_RETRY_POLICY.backoffFactor),
  maxDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
});

export const appConfigSchema = z.object({
  project: projectConfigSchema.default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(30000),
      userAgent: z.string().min(1).default("release-watch/0.1 (release notes monitor)"),
    })
    .default({}),
  ntfy: z
    .object({
      server: z.string().url().default("https://ntfy.sh"),
      topic: z
        .string()
        .min(1)
        .regex(/^[-_A-Za-z0-9]+$/, "topic may only contain letters, digits, - and _")
        .default("release-watch"),
      timeoutMs: z.number().int().positive().default(10000),
      retry: retryConfigSchema.default({}),
    })
    .default({}),
  storage: z
    .object({
      dataDir: z.string().min(1).default("data"),
      historyLimit: z.number().int().positive().default(50),
    })
    .default({}),
  notify: z.boolean().default(true),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
