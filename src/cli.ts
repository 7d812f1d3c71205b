import { Command, InvalidArgumentError } from "commander";
import { StateStore } from "./cache.js";
import { channelKinds, resolveChannels } from "./channels.js";
import { DAEMON, NET, PATHS } from "./config.js";
import { createDispatcher } from "./dispatcher.js";
import { errorMessage } from "./errors.js";
import { error as logError, info, logger, useLogFile } from "./logger.js";
import { type CheckOptions, createMonitor, runDaemon } from "./orchestrator.js";
import { probeCertificate } from "./probe.js";
import { loadMonitorConfig } from "./sites.js";
import { formatDate } from "./utils/dates.js";
import { siteKey } from "./utils/site-key.js";

interface CheckCommandOptions {
  readonly daemon?: boolean;
  readonly interval: number;
  readonly config: string;
  readonly state: string;
  readonly concurrency: number;
}

function positiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Check mode entry point: run one cycle, or loop in daemon mode until SIGINT/SIGTERM.
 */
export async function checkAction(options: CheckCommandOptions): Promise<void> {
  const checkOptions: CheckOptions = {
    configPath: options.config,
    statePath: options.state,
    concurrency: options.concurrency,
    probeTimeoutMs: NET.PROBE_TIMEOUT
  };
  const monitor = createMonitor(checkOptions, {
    probe: probeCertificate,
    dispatch: createDispatcher(logger),
    logger
  });

  info("Starting SSL Monitor...");
  if (!options.daemon) {
    await monitor.runOnce();
    return;
  }

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  try {
    await runDaemon(monitor, { intervalSeconds: options.interval, logger, signal: controller.signal });
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}

/**
 * State mode entry point: print the persisted expiry tracking per site key.
 */
export async function stateAction(options: { readonly state: string }): Promise<void> {
  const store = new StateStore(options.state, logger);
  await store.load();
  const rows = store.entries().map(([key, siteState]) => ({
    site: key,
    lastExpiry: siteState.lastExpiry ? formatDate(siteState.lastExpiry) : "",
    notified: siteState.notifiedThresholds.join(", "),
    lastNotification: siteState.lastNotificationSent?.toISOString() ?? ""
  }));
  console.table(rows);
  console.log(store.stats());
}

/**
 * Reset mode entry point: clear the state file.
 */
export async function resetAction(options: { readonly state: string }): Promise<void> {
  const store = new StateStore(options.state, logger);
  await store.clear();
  info("State cache cleared.");
}

/**
 * Sites mode entry point: list configured sites with their key and channels.
 */
export async function sitesAction(options: { readonly config: string }): Promise<void> {
  const config = await loadMonitorConfig(options.config);
  for (const skipped of config.skippedSites ?? []) {
    logger.warn(skipped);
  }
  const rows = config.sites.map(site => ({
    name: site.name,
    key: siteKey(site),
    environment: site.environment ?? "",
    alertDays: site.alertDays.join(", "),
    channels: channelKinds(resolveChannels(site, config, process.env, logger)).join(", ") || "none"
  }));
  console.table(rows);
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program.name("ssl-monitor").description("SSL certificate expiry monitor").version("1.0.0");

  program
    .command("check")
    .description("Check every configured site and send due notifications")
    .option("--daemon", "Run continuously, sleeping between cycles")
    .option("--interval <seconds>", "Seconds between cycles in daemon mode", positiveInteger, DAEMON.INTERVAL_SECONDS)
    .option("--config <path>", "Monitor configuration file", PATHS.CONFIG)
    .option("--state <path>", "State file", PATHS.STATE)
    .option("--concurrency <count>", "Maximum certificate probes in flight", positiveInteger, NET.CONCURRENCY)
    .action(async (options: CheckCommandOptions) => checkAction(options));

  program
    .command("state")
    .description("Display persisted per-site state")
    .option("--state <path>", "State file", PATHS.STATE)
    .action(async (options: { readonly state: string }) => stateAction(options));

  program
    .command("reset")
    .description("Clear persisted state")
    .option("--state <path>", "State file", PATHS.STATE)
    .action(async (options: { readonly state: string }) => resetAction(options));

  program
    .command("sites")
    .description("List configured sites and their notification channels")
    .option("--config <path>", "Monitor configuration file", PATHS.CONFIG)
    .action(async (options: { readonly config: string }) => sitesAction(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    useLogFile();
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (cause) {
    logError(`CLI failed: ${errorMessage(cause)}`);
    process.exitCode = 1;
  }
}
