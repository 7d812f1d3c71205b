import fs from "fs-extra";
import YAML from "yaml";
import { z } from "zod";
import { DEFAULTS } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { MonitorConfig, NotificationGroupConfig, SiteConfig } from "./types.js";

const SiteSchema = z.object({
  name: z.string().min(1),
  hostname: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULTS.PORT),
  environment: z.string().optional(),
  alert_days: z.array(z.number().int().nonnegative()).default([...DEFAULTS.ALERT_DAYS]),
  notification_interval_hours: z.number().positive().default(DEFAULTS.NOTIFICATION_INTERVAL_HOURS),
  notification_group: z.string().optional()
});

const NotificationGroupSchema = z.object({
  slack_webhook_url: z.string().optional(),
  discord_webhook_url: z.string().optional(),
  telegram_bot_token: z.string().optional(),
  // YAML reads unquoted chat ids such as -100123 as numbers
  telegram_chat_id: z.union([z.string(), z.number().int()]).optional()
});

const MonitorFileSchema = z.object({
  slack_webhook_env_name: z.string().default(DEFAULTS.SLACK_WEBHOOK_ENV_NAME),
  notification_groups: z.record(NotificationGroupSchema).nullish(),
  sites: z.array(z.unknown()).nullish()
});

function toSiteConfig(site: z.infer<typeof SiteSchema>): SiteConfig {
  return {
    name: site.name,
    hostname: site.hostname,
    port: site.port,
    environment: site.environment,
    alertDays: [...new Set(site.alert_days)].sort((a, b) => b - a),
    notificationIntervalHours: site.notification_interval_hours,
    notificationGroup: site.notification_group
  };
}

function toGroupConfig(group: z.infer<typeof NotificationGroupSchema>): NotificationGroupConfig {
  return {
    slackWebhookUrl: group.slack_webhook_url,
    discordWebhookUrl: group.discord_webhook_url,
    telegramBotToken: group.telegram_bot_token,
    telegramChatId: group.telegram_chat_id
  };
}

function describeIssues(error: z.ZodError, prefix: readonly (string | number)[] = []): string {
  return error.issues
    .map(issue => `${[...prefix, ...issue.path].join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function siteLabel(entry: unknown, index: number): string {
  if (entry && typeof entry === "object" && "name" in entry && typeof entry.name === "string") {
    return `'${entry.name}'`;
  }
  return `#${index + 1}`;
}

/**
 * Parse monitor configuration from YAML text.
 *
 * An empty document yields a configuration with no sites. Site entries are
 * validated one by one; an invalid entry is reported in `skippedSites` and the
 * others are kept.
 *
 * @param source - Path reported in errors.
 * @throws ConfigurationError on YAML syntax errors or an invalid top-level structure.
 */
export function parseMonitorConfig(text: string, source: string): MonitorConfig {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (cause) {
    throw new ConfigurationError(`Invalid YAML in ${source}: ${errorMessage(cause)}`, source, { cause });
  }

  const result = MonitorFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid monitor configuration in ${source}: ${describeIssues(result.error)}`, source, {
      cause: result.error
    });
  }

  const groups: Record<string, NotificationGroupConfig> = {};
  for (const [name, group] of Object.entries(result.data.notification_groups ?? {})) {
    groups[name] = toGroupConfig(group);
  }

  const sites: SiteConfig[] = [];
  const skippedSites: string[] = [];
  for (const [index, entry] of (result.data.sites ?? []).entries()) {
    const site = SiteSchema.safeParse(entry);
    if (site.success) {
      sites.push(toSiteConfig(site.data));
    } else {
      skippedSites.push(
        `Skipping site ${siteLabel(entry, index)} in ${source}: ${describeIssues(site.error, ["sites", index])}`
      );
    }
  }

  return {
    slackWebhookEnvName: result.data.slack_webhook_env_name,
    notificationGroups: groups,
    sites,
    skippedSites
  };
}

/**
 * Read and parse the monitor configuration file.
 *
 * @throws ConfigurationError when the file is missing, unreadable or invalid.
 */
export async function loadMonitorConfig(path: string): Promise<MonitorConfig> {
  if (!(await fs.pathExists(path))) {
    throw new ConfigurationError(`Config file not found: ${path}`, path);
  }
  let text: string;
  try {
    text = await fs.readFile(path, "utf8");
  } catch (cause) {
    throw new ConfigurationError(`Config file unreadable: ${path} (${errorMessage(cause)})`, path, { cause });
  }
  return parseMonitorConfig(text, path);
}
