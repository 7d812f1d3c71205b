import pLimit from "p-limit";
import { StateStore } from "./cache.js";
import { type Environment, resolveChannels } from "./channels.js";
import { DEFAULTS, NET } from "./config.js";
import type { Dispatch } from "./dispatcher.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { EMPTY_SITE_STATE, type Evaluation, evaluateSite } from "./evaluator.js";
import type { Logger } from "./logger.js";
import { checkFailedEvent } from "./messages.js";
import type { CertificateProbe } from "./probe.js";
import { loadMonitorConfig } from "./sites.js";
import type { MonitorConfig, NotificationEvent, ResolvedChannels, SiteConfig } from "./types.js";
import { formatDate } from "./utils/dates.js";
import { normalizeHostname, siteKey } from "./utils/site-key.js";

/**
 * Explicit settings for one check cycle.
 *
 * @property concurrency - Maximum probes in flight; 1 probes sites one at a time.
 * @property env - Source of environment-variable channel references.
 */
export interface CheckOptions {
  readonly configPath: string;
  readonly statePath: string;
  readonly probeTimeoutMs?: number;
  readonly concurrency?: number;
  readonly env?: Environment;
}

/**
 * Collaborators of a check cycle. `loadConfig` and `now` default to the real ones.
 */
export interface CheckDependencies {
  readonly probe: CertificateProbe;
  readonly dispatch: Dispatch;
  readonly logger: Logger;
  readonly now?: () => Date;
  readonly loadConfig?: (path: string) => Promise<MonitorConfig>;
}

export type SiteOutcome =
  | {
      readonly site: string;
      readonly key: string;
      readonly status: "checked";
      readonly expiry: Date;
      readonly remainingDays: number;
      readonly renewed: boolean;
      readonly suppressed: boolean;
      readonly events: readonly NotificationEvent[];
    }
  | {
      readonly site: string;
      readonly key: string;
      readonly status: "failed";
      readonly reason: string;
    };

export interface CheckSummary {
  readonly outcomes: readonly SiteOutcome[];
  readonly notificationsSent: number;
  readonly stateSaved: boolean;
}

type ProbeOutcome = { readonly ok: true; readonly expiry: Date } | { readonly ok: false; readonly reason: string };

const NO_OP_SUMMARY: CheckSummary = { outcomes: [], notificationsSent: 0, stateSaved: false };

async function dispatchAll(
  dispatch: Dispatch,
  channels: ResolvedChannels,
  events: readonly NotificationEvent[]
): Promise<number> {
  let sent = 0;
  for (const event of events) {
    const report = await dispatch(channels, event);
    if (report.delivered.length > 0) {
      sent += 1;
    }
  }
  return sent;
}

/**
 * Run one full check cycle: probe every site, evaluate, notify and persist.
 *
 * Invariants: a failing site never stops the others; a site whose probe failed
 * keeps its prior state; the state file is written once, after every site.
 */
export async function runCheck(options: CheckOptions, deps: CheckDependencies): Promise<CheckSummary> {
  const { logger, dispatch, probe } = deps;
  const now = deps.now ?? (() => new Date());
  const loadConfig = deps.loadConfig ?? loadMonitorConfig;
  const env = options.env ?? process.env;
  const timeoutMs = options.probeTimeoutMs ?? NET.PROBE_TIMEOUT;

  let config: MonitorConfig;
  try {
    config = await loadConfig(options.configPath);
  } catch (cause) {
    if (cause instanceof ConfigurationError) {
      logger.error(cause.message);
      return NO_OP_SUMMARY;
    }
    throw cause;
  }
  for (const skipped of config.skippedSites ?? []) {
    logger.error(skipped);
  }
  if (config.sites.length === 0) {
    logger.warn(`No sites configured in ${options.configPath}`);
    return NO_OP_SUMMARY;
  }

  const store = new StateStore(options.statePath, logger);
  await store.load();

  const limit = pLimit(Math.max(1, options.concurrency ?? NET.CONCURRENCY));
  const probes = await Promise.all(
    config.sites.map(site =>
      limit(async (): Promise<ProbeOutcome> => {
        const hostname = normalizeHostname(site.hostname);
        logger.info(`Checking SSL for ${site.name} (${hostname})...`);
        try {
          return { ok: true, expiry: await probe(hostname, site.port, timeoutMs) };
        } catch (cause) {
          return { ok: false, reason: errorMessage(cause) };
        }
      })
    )
  );

  const outcomes: SiteOutcome[] = [];
  let notificationsSent = 0;

  for (const [index, site] of config.sites.entries()) {
    const key = siteKey(site);
    const probed = probes[index];
    try {
      const channels = resolveChannels(site, config, env, logger);
      if (!probed.ok) {
        const { reason } = probed;
        logger.error(`Error checking ${site.name} (${site.environment ?? DEFAULTS.ENVIRONMENT_LABEL}): ${reason}`);
        notificationsSent += await dispatchAll(dispatch, channels, [checkFailedEvent(site, reason)]);
        outcomes.push({ site: site.name, key, status: "failed", reason });
        continue;
      }

      const evaluation = evaluateSite(site, store.get(key) ?? EMPTY_SITE_STATE, probed.expiry, now());
      logSiteEvaluation(logger, site, probed.expiry, evaluation);
      notificationsSent += await dispatchAll(dispatch, channels, evaluation.events);
      store.set(key, evaluation.state);
      outcomes.push({
        site: site.name,
        key,
        status: "checked",
        expiry: probed.expiry,
        remainingDays: evaluation.remainingDays,
        renewed: evaluation.renewed,
        suppressed: evaluation.suppressed,
        events: evaluation.events
      });
    } catch (cause) {
      const reason = errorMessage(cause);
      logger.error(`Unexpected error processing ${site.name}: ${reason}`);
      outcomes.push({ site: site.name, key, status: "failed", reason });
    }
  }

  await store.save();
  logger.info("SSL Check cycle completed.");
  return { outcomes, notificationsSent, stateSaved: true };
}

function logSiteEvaluation(
  logger: Logger,
  site: SiteConfig,
  expiry: Date,
  evaluation: Evaluation
): void {
  const label = `${site.name} (${site.environment ?? DEFAULTS.ENVIRONMENT_LABEL})`;
  logger.info(`Site: ${site.name} | Expiry: ${formatDate(expiry)} | Days Left: ${evaluation.remainingDays}`);
  if (evaluation.renewed) {
    logger.info(`Renewal detected for ${label}`);
  }
  if (evaluation.suppressed) {
    logger.info(`Skipping alert for ${site.name} (threshold ${evaluation.triggeredThreshold}) - within interval.`);
  } else if (evaluation.events.some(event => event.severity !== "info")) {
    logger.info(`Sending alert for ${label} - ${evaluation.remainingDays} days left.`);
  }
}

export interface Monitor {
  /**
   * Run one cycle; concurrent calls queue so cycles never overlap.
   */
  runOnce(): Promise<CheckSummary>;
}

export function createMonitor(options: CheckOptions, deps: CheckDependencies): Monitor {
  // Tail of the cycle queue; always settles so one failed cycle does not block the next.
  let previous: Promise<unknown> = Promise.resolve();
  return {
    runOnce: () => {
      const cycle = previous.then(() => runCheck(options, deps));
      previous = cycle.catch(() => undefined);
      return cycle;
    }
  };
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait for `ms`, resolving early when `signal` aborts.
 */
export const sleep: Sleeper = (ms, signal) =>
  new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface DaemonOptions {
  readonly intervalSeconds: number;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
  readonly sleeper?: Sleeper;
}

/**
 * Run cycles back-to-back separated by the interval until `signal` aborts.
 *
 * An error escaping a cycle is logged and the next cycle is still scheduled.
 *
 * @returns Number of cycles started.
 */
export async function runDaemon(monitor: Monitor, options: DaemonOptions): Promise<number> {
  const wait = options.sleeper ?? sleep;
  let cycles = 0;
  options.logger.info(`Running in DAEMON mode. Check interval: ${options.intervalSeconds} seconds.`);
  while (!options.signal?.aborted) {
    cycles += 1;
    try {
      await monitor.runOnce();
    } catch (cause) {
      options.logger.error(`Unexpected error in daemon loop: ${errorMessage(cause)}`);
    }
    if (options.signal?.aborted) {
      break;
    }
    await wait(options.intervalSeconds * 1000, options.signal);
  }
  options.logger.info("Daemon stopped.");
  return cycles;
}
