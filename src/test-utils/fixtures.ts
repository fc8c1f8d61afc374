import { vi } from "vitest";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { ReleaseRecord } from "../release/types";
import type { MonitorState, StateStore } from "../state/types";
import { EMPTY_STATE } from "../state/types";

/**
 * Creates a mock Logger whose methods are spies.
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    setLevel: vi.fn(),
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  } as unknown as Logger;
}

export function createTestConfig(): AppConfig {
  return {
    project: {
      name: "n8n",
      tag: "n8n",
      releaseNotesUrl: "https://example.com/release-notes",
      versionMarker: "n8n@",
    },
    fetch: {
      timeoutMs: 5000,
      userAgent: "release-watch-test",
    },
    ntfy: {
      server: "https://ntfy.example.com",
      topic: "test-topic",
      timeoutMs: 1000,
      retry: { attempts: 3, baseDelayMs: 1000, backoffFactor: 2, maxDelayMs: 8000 },
    },
    storage: {
      dataDir: "data",
      historyLimit: 50,
    },
    notify: true,
  };
}

export function makeRelease(overrides: Partial<ReleaseRecord> = {}): ReleaseRecord {
  return {
    version: "n8n@1.104.2",
    publishedAt: new Date("2025-07-28T00:00:00.000Z"),
    title: "n8n@1.104.2",
    body: "Release date: 2025-07-28\n• Fixed workflow history pagination",
    url: "https://example.com/release-notes#n8n11042",
    ...overrides,
  };
}

/**
 * In-process stand-in for the file store. `saves` records every state written.
 */
export function createMemoryStateStore(initial: MonitorState = EMPTY_STATE): StateStore & {
  readonly saves: Array<MonitorState>;
  current: () => MonitorState;
} {
  let state = initial;
  const saves: Array<MonitorState> = [];

  return {
    saves,
    current: () => state,
    load: vi.fn(async () => state),
    save: vi.fn(async (next: MonitorState) => {
      state = next;
      saves.push(next);
    }),
  };
}
