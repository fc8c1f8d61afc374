import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./schema";

function validate(parsed: unknown, source: string): AppConfig {
  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${source}:\n${issues}`);
  }
  return result.data;
}

/**
 * Loads configuration from a YAML file, or the built-in defaults when no path
 * is given. Every section is optional.
 */
export function loadConfig(configPath?: string): AppConfig {
  if (configPath === undefined) {
    return validate({}, "defaults");
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  return validate(parsed, configPath);
}

const TRUTHY = new Set(["1", "true", "yes"]);

export function isTruthyEnv(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

export type ConfigOverrides = {
  readonly topic?: string;
  readonly dataDir?: string;
  readonly notify?: boolean;
};

/**
 * Applies topic, data dir and notify overrides and re-validates the result,
 * so overrides obey the same rules as the file.
 */
export function applyOverrides(
  config: AppConfig,
  overrides: ConfigOverrides,
  source: string,
): AppConfig {
  return validate(
    {
      ...config,
      ntfy: overrides.topic ? { ...config.ntfy, topic: overrides.topic } : config.ntfy,
      storage: overrides.dataDir
        ? { ...config.storage, dataDir: overrides.dataDir }
        : config.storage,
      notify: overrides.notify ?? config.notify,
    },
    source,
  );
}

/**
 * Layers the supported environment variables over a loaded config:
 * `N8N_NTFY_TOPIC`, `N8N_DATA_DIR` and `N8N_NO_NOTIFY`.
 */
export function applyEnvOverrides(
  config: AppConfig,
  env: Readonly<Record<string, string | undefined>>,
): AppConfig {
  return applyOverrides(
    config,
    {
      topic: env["N8N_NTFY_TOPIC"],
      dataDir: env["N8N_DATA_DIR"],
      notify: isTruthyEnv(env["N8N_NO_NOTIFY"]) ? false : undefined,
    },
    "environment",
  );
}

export type { AppConfig };
