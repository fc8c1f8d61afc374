// pattern: Imperative Shell
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "pino";
import { StateLoadError, StateSaveError, errorMessage } from "../errors";
import type { ReleaseRecord } from "../release/types";
import { reconcileState, truncateHistory } from "./history";
import { DEFAULT_HISTORY_LIMIT } from "./types";
import type { MonitorState, StateStore } from "./types";

export const LATEST_FILE = "latest.json";
export const HISTORY_FILE = "history.json";

const storedRecordSchema = z.object({
  version: z.string().min(1),
  publishedAt: z.string().datetime({ offset: true }).nullable(),
  title: z.string(),
  body: z.string(),
  url: z.string(),
});

const latestFileSchema = storedRecordSchema.nullable();
const historyFileSchema = z.array(storedRecordSchema);

type StoredRecord = z.infer<typeof storedRecordSchema>;

function toStored(record: ReleaseRecord): StoredRecord {
  return {
    version: record.version,
    publishedAt: record.publishedAt ? record.publishedAt.toISOString() : null,
    title: record.title,
    body: record.body,
    url: record.url,
  };
}

function fromStored(stored: StoredRecord): ReleaseRecord {
  return Object.freeze({
    version: stored.version,
    publishedAt: stored.publishedAt === null ? null : new Date(stored.publishedAt),
    title: stored.title,
    body: stored.body,
    url: stored.url,
  });
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads and validates one state file. Returns `undefined` when the file does not
 * exist; throws {@link StateLoadError} when it exists but cannot be used.
 */
async function readStateFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new StateLoadError(`failed to read ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new StateLoadError(`failed to parse JSON in ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new StateLoadError(`invalid state in ${path}: ${issues}`);
  }
  return result.data;
}

/**
 * Writes `contents` next to `path` and renames it over the target, so readers
 * see either the old file or the new one.
 */
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
  const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  try {
    await writeFile(tmpPath, contents, "utf-8");
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

function serialize(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export type FileStateStoreOptions = {
  readonly historyLimit?: number;
};

/**
 * Creates a state store backed by `latest.json` and `history.json` in `dataDir`.
 *
 * Missing files mean a first deployment. A file that exists but is corrupt is
 * logged and ignored, so one bad write never stops the scheduled job.
 */
export function createFileStateStore(
  dataDir: string,
  logger: Logger,
  options: FileStateStoreOptions = {},
): StateStore {
  const limit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  const latestPath = join(dataDir, LATEST_FILE);
  const historyPath = join(dataDir, HISTORY_FILE);

  async function readOrRecover<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | undefined> {
    try {
      return await readStateFile(path, schema);
    } catch (err) {
      if (!(err instanceof StateLoadError)) throw err;
      logger.warn({ path, error: err.message }, "stored state unreadable, starting fresh");
      return undefined;
    }
  }

  return {
    async load() {
      const latest = await readOrRecover(latestPath, latestFileSchema);
      const history = await readOrRecover(historyPath, historyFileSchema);

      const state = reconcileState(
        {
          latest: latest ? fromStored(latest) : null,
          history: (history ?? []).map(fromStored),
        },
        limit,
      );

      logger.debug(
        { dataDir, latest: state.latest?.version ?? null, historySize: state.history.length },
        "state loaded",
      );
      return state;
    },

    async save(state: MonitorState) {
      const bounded = truncateHistory(state, limit);
      try {
        await mkdir(dataDir, { recursive: true });
        await writeFileAtomic(historyPath, serialize(bounded.history.map(toStored)));
        await writeFileAtomic(
          latestPath,
          serialize(bounded.latest ? toStored(bounded.latest) : null),
        );
      } catch (err) {
        const message = errorMessage(err);
        logger.error({ dataDir, error: message }, "failed to save state");
        throw new StateSaveError(`failed to save state to ${dataDir}: ${message}`, {
          cause: err,
        });
      }

      logger.info(
        { dataDir, latest: bounded.latest?.version ?? null, historySize: bounded.history.length },
        "state saved",
      );
    },
  };
}
