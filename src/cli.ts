// pattern: Imperative Shell
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import cac from "cac";
import type { Logger } from "pino";
import { applyEnvOverrides, applyOverrides, loadConfig } from "./config";
import type { AppConfig } from "./config";
import { DeliveryError, MonitorError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { createMonitor } from "./monitor";
import type { Monitor, RunReport } from "./monitor";
import { createNotifier, createNtfySender, topicUrl } from "./notify";
import type { SleepFn } from "./notify";
import { createReleaseScraper } from "./release/scraper";
import { createFileStateStore } from "./state/store";
import type { ReleaseRecord } from "./release/types";

const DEFAULT_CONFIG_FILE = "config.yaml";
const DEFAULT_MULTI_LIMIT = 5;

/** Options shared by every command. */
interface GlobalOptions {
  /** Path to a YAML config file. */
  config?: string;

  /** ntfy topic, overrides config and N8N_NTFY_TOPIC. */
  topic?: string;

  /** State directory, overrides config and N8N_DATA_DIR. */
  dataDir?: string;

  /** false when --no-notify is passed. */
  notify: boolean;
}

interface CheckAllOptions extends GlobalOptions {
  limit: number | string;
}

export type CliDeps = {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly logger?: Logger;
  readonly sleep?: SleepFn;
  readonly print?: (line: string) => void;
};

/**
 * Resolves the effective config: YAML file, then environment, then flags.
 */
export function resolveConfig(
  options: GlobalOptions,
  env: CliDeps["env"],
): AppConfig {
  const configPath =
    options.config ??
    env["CONFIG_PATH"] ??
    (existsSync(DEFAULT_CONFIG_FILE) ? DEFAULT_CONFIG_FILE : undefined);

  const config = applyEnvOverrides(
    loadConfig(configPath === undefined ? undefined : resolve(configPath)),
    env,
  );

  return applyOverrides(
    config,
    {
      topic: options.topic,
      dataDir: options.dataDir,
      notify: config.notify && options.notify,
    },
    "command-line options",
  );
}

export function buildMonitor(
  config: AppConfig,
  logger: Logger,
  sleep?: SleepFn,
): Monitor {
  return createMonitor({
    store: createFileStateStore(resolve(config.storage.dataDir), logger, {
      historyLimit: config.storage.historyLimit,
    }),
    fetchReleases: createReleaseScraper(
      {
        url: config.project.releaseNotesUrl,
        versionMarker: config.project.versionMarker,
        timeoutMs: config.fetch.timeoutMs,
        userAgent: config.fetch.userAgent,
      },
      logger,
    ),
    notifier: createNotifier({
      send: createNtfySender({
        server: config.ntfy.server,
        topic: config.ntfy.topic,
        timeoutMs: config.ntfy.timeoutMs,
      }),
      retry: config.ntfy.retry,
      enabled: config.notify,
      logger,
      sleep,
    }),
    settings: {
      projectName: config.project.name,
      projectTag: config.project.tag,
      releaseNotesUrl: config.project.releaseNotesUrl,
      historyLimit: config.storage.historyLimit,
    },
    logger,
  });
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * First non-empty lines of the notes, for terminal output.
 */
export function summarizeRelease(record: ReleaseRecord, lines: number): Array<string> {
  return record.body
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, lines)
    .map((line) => `  ${truncate(line, 100)}`);
}

function printReport(report: RunReport, print: (line: string) => void): void {
  for (const change of report.changes) {
    print(`${change.reason}: ${change.record.version}`);
    for (const line of summarizeRelease(change.record, 3)) print(line);
  }
  if (report.outcome === "unchanged") {
    print(`No changes (latest: ${report.state.latest?.version ?? "none"})`);
  }
  if (report.error) {
    print(`Check failed: ${report.error.message}`);
  }
}

/**
 * Parses `argv` and runs the matched command.
 *
 * @returns The process exit code: 1 on configuration errors, a failed state
 *          save, a failed test notification or a failed `latest` fetch.
 */
export async function runCli(argv: ReadonlyArray<string>, deps: CliDeps): Promise<number> {
  const logger = deps.logger ?? createLogger();
  const print = deps.print ?? ((line: string) => console.info(line));

  const cli = cac("release-watch");

  const run = async (
    options: GlobalOptions,
    task: (monitor: Monitor, config: AppConfig) => Promise<number>,
  ) => {
    let config: AppConfig;
    try {
      config = resolveConfig(options, deps.env);
    } catch (err) {
      logger.fatal({ error: errorMessage(err) }, "configuration error");
      return 1;
    }

    logger.debug(
      { project: config.project.name, topic: config.ntfy.topic, notify: config.notify },
      "config loaded",
    );

    try {
      return await task(buildMonitor(config, logger, deps.sleep), config);
    } catch (err) {
      if (!(err instanceof MonitorError)) throw err;
      logger.fatal({ kind: err.kind, error: err.message }, "run failed");
      return 1;
    }
  };

  cli
    .help()
    .option("--config <path>", "YAML config file (env: CONFIG_PATH)")
    .option("--topic <topic>", "ntfy topic (env: N8N_NTFY_TOPIC)")
    .option("--data-dir <dir>", "State directory (env: N8N_DATA_DIR)")
    .option("--no-notify", "Disable notifications (env: N8N_NO_NOTIFY)");

  cli
    .command("check", "Check the latest release and notify on changes")
    .action((options: GlobalOptions) =>
      run(options, async (monitor) => {
        printReport(await monitor.runSingleCheck(), print);
        return 0;
      }),
    );

  cli
    .command("check-all", "Check several recent releases and notify on each change")
    .option("--limit <n>", "Number of releases to check", { default: DEFAULT_MULTI_LIMIT })
    .action((options: CheckAllOptions) =>
      run(options, async (monitor) => {
        const limit = Number(options.limit);
        if (!Number.isInteger(limit) || limit < 1) {
          logger.fatal({ limit: options.limit }, "--limit must be a positive integer");
          return 1;
        }
        printReport(await monitor.runMultiCheck(limit), print);
        return 0;
      }),
    );

  cli
    .command("test", "Send a test notification")
    .action((options: GlobalOptions) =>
      run(options, async (monitor, config) => {
        const result = await monitor.sendTestNotification();
        if (!result.success) {
          throw new DeliveryError(result.lastError ?? "test notification failed");
        }
        print(
          result.skipped
            ? "Notifications disabled, nothing sent"
            : `Sent, check ${topicUrl(config.ntfy.server, config.ntfy.topic)}`,
        );
        return 0;
      }),
    );

  cli
    .command("latest", "Print the latest release without touching state")
    .action((options: GlobalOptions) =>
      run(options, async (monitor) => {
        const release = await monitor.fetchLatest();
        print(`Latest: ${release.version}`);
        for (const line of summarizeRelease(release, 2)) print(line);
        return 0;
      }),
    );

  cli.parse([...argv], { run: false });

  if (!cli.matchedCommand) {
    // --help has already been printed by parse()
    if (cli.options["help"] === true) return 0;
    cli.outputHelp();
    return 1;
  }

  const code: unknown = await cli.runMatchedCommand();
  return typeof code === "number" ? code : 0;
}
