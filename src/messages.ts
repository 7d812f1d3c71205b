import { CRITICAL_THRESHOLD_DAYS, DEFAULTS } from "./config.js";
import type { NotificationEvent, SiteConfig } from "./types.js";
import { formatDate } from "./utils/dates.js";
import { normalizeHostname } from "./utils/site-key.js";

// Message bodies use Slack-style mrkdwn (*bold*, `code`); Telegram's legacy
// Markdown mode renders the same markup.

function siteLines(site: SiteConfig): string[] {
  const environment = site.environment ?? DEFAULTS.ENVIRONMENT_LABEL;
  return [`*Site*: ${site.name} (${environment})`, `*Host*: ${normalizeHostname(site.hostname)}`];
}

export function renewalEvent(site: SiteConfig, expiry: Date, daysLeft: number): NotificationEvent {
  return {
    severity: "info",
    title: "SSL Certificate Renewed",
    message: [
      "✅ *SSL Certificate Renewed*",
      ...siteLines(site),
      `*New Expiry*: ${formatDate(expiry)}`,
      `*Days remaining*: ${daysLeft}`
    ].join("\n")
  };
}

/**
 * Build the threshold alert; thresholds of a week or less escalate to critical.
 */
export function expiryWarningEvent(
  site: SiteConfig,
  expiry: Date,
  daysLeft: number,
  threshold: number
): NotificationEvent {
  const critical = threshold <= CRITICAL_THRESHOLD_DAYS;
  return {
    severity: critical ? "critical" : "warning",
    title: "SSL Expiry Warning",
    message: [
      `${critical ? "🚨" : "⚠️"} *SSL Expiry Warning*`,
      ...siteLines(site),
      `*Days remaining*: *${daysLeft}* (Threshold: ${threshold})`,
      `*Expiry Date*: ${formatDate(expiry)}`
    ].join("\n")
  };
}

export function checkFailedEvent(site: SiteConfig, reason: string): NotificationEvent {
  return {
    severity: "critical",
    title: "SSL Check Failed",
    message: ["❌ *SSL Check Failed*", ...siteLines(site), `*Error*: \`${reason}\``].join("\n")
  };
}
