import type { Logger } from "./logger.js";
import type { ChannelKind, MonitorConfig, ResolvedChannels, SiteConfig } from "./types.js";

export type Environment = { readonly [name: string]: string | undefined };

/**
 * Resolve a channel reference: numbers, numeric strings and literal http(s)
 * URLs are used as-is, anything else names an environment variable.
 *
 * @returns The value, or undefined when the reference or variable is empty.
 */
export function resolveReference(reference: string | number | undefined, env: Environment): string | undefined {
  if (typeof reference === "number") {
    return String(reference);
  }
  if (!reference) {
    return undefined;
  }
  if (/^https?:\/\//i.test(reference) || /^-?\d+$/.test(reference)) {
    return reference;
  }
  const value = env[reference];
  return value ? value : undefined;
}

/**
 * Determine the channels a site notifies through.
 *
 * The default Slack webhook applies unless the site's notification group
 * overrides it; Discord and Telegram come only from the group.
 */
export function resolveChannels(
  site: SiteConfig,
  config: MonitorConfig,
  env: Environment,
  logger?: Logger
): ResolvedChannels {
  const defaultSlack = resolveReference(config.slackWebhookEnvName, env);
  if (!site.notificationGroup) {
    return { slack: defaultSlack };
  }

  const group = config.notificationGroups[site.notificationGroup];
  if (!group) {
    logger?.warn(
      `Notification group '${site.notificationGroup}' defined in site '${site.name}' but not found in notification_groups.`
    );
    return { slack: defaultSlack };
  }

  const slack = group.slackWebhookUrl !== undefined ? resolveReference(group.slackWebhookUrl, env) : defaultSlack;
  const discord = resolveReference(group.discordWebhookUrl, env);
  const botToken = group.telegramChatId !== undefined ? resolveReference(group.telegramBotToken, env) : undefined;
  const chatId = group.telegramBotToken !== undefined ? resolveReference(group.telegramChatId, env) : undefined;

  return {
    slack,
    discord,
    telegram: botToken && chatId ? { botToken, chatId } : undefined
  };
}

/**
 * List the channel kinds present in a resolution, in dispatch order.
 */
export function channelKinds(channels: ResolvedChannels): ChannelKind[] {
  const kinds: ChannelKind[] = [];
  if (channels.slack) {
    kinds.push("slack");
  }
  if (channels.discord) {
    kinds.push("discord");
  }
  if (channels.telegram) {
    kinds.push("telegram");
  }
  return kinds;
}
