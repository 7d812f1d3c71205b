/**
 * Notification severity shared by every channel.
 */
export type Severity = "info" | "warning" | "critical";

/**
 * Channel transports a site can be notified through.
 */
export type ChannelKind = "slack" | "discord" | "telegram";

/**
 * Monitored endpoint as read from the monitor configuration file.
 *
 * @property hostname - Bare host or a URL whose host component is probed.
 * @property alertDays - Thresholds in days, deduplicated and non-negative.
 * @property notificationGroup - Key into the configured notification groups.
 *
 * Invariant: `port` is in 1..65535 and `notificationIntervalHours` is positive.
 */
export interface SiteConfig {
  readonly name: string;
  readonly hostname: string;
  readonly port: number;
  readonly environment?: string;
  readonly alertDays: readonly number[];
  readonly notificationIntervalHours: number;
  readonly notificationGroup?: string;
}

/**
 * Raw channel references of a notification group.
 *
 * Each value is a literal http(s) URL or the name of an environment variable.
 */
export interface NotificationGroupConfig {
  readonly slackWebhookUrl?: string;
  readonly discordWebhookUrl?: string;
  readonly telegramBotToken?: string;
  /** A numeric id is used as-is; a string is resolved like the other references. */
  readonly telegramChatId?: string | number;
}

/**
 * Fully parsed monitor configuration.
 */
export interface MonitorConfig {
  readonly slackWebhookEnvName: string;
  readonly notificationGroups: { readonly [group: string]: NotificationGroupConfig };
  readonly sites: readonly SiteConfig[];
  /** One message per site entry that failed validation and was left out of `sites`. */
  readonly skippedSites?: readonly string[];
}

export interface TelegramTarget {
  readonly botToken: string;
  readonly chatId: string;
}

/**
 * Channel endpoints that apply to one site. Absent entries are skipped.
 */
export interface ResolvedChannels {
  readonly slack?: string;
  readonly discord?: string;
  readonly telegram?: TelegramTarget;
}

/**
 * Persisted expiry tracking for one site key.
 *
 * Invariant: `notifiedThresholds` only holds thresholds announced for the
 * certificate whose expiry is `lastExpiry`.
 */
export interface SiteState {
  readonly lastExpiry: Date | null;
  readonly notifiedThresholds: readonly number[];
  readonly lastNotificationSent: Date | null;
}

export interface NotificationEvent {
  readonly severity: Severity;
  readonly title: string;
  readonly message: string;
}

/**
 * Serialized form of {@link SiteState} inside the state file.
 */
export interface StoredSiteState {
  readonly lastExpiry: string | null;
  readonly notifiedThresholds: readonly number[];
  readonly lastNotificationSent: string | null;
}

/**
 * Shape of the state file.
 *
 * @property version - Schema version; a mismatch reinitialises the store.
 * @property updatedAt - Timestamp of the latest persistence.
 */
export interface StateFile {
  readonly entries: { readonly [siteKey: string]: StoredSiteState };
  readonly version: number;
  readonly updatedAt: string;
}
