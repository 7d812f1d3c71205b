import type { NotificationEvent, Severity } from "./types.js";
import { postJson } from "./utils/http.js";

const SLACK_COLORS: Record<Severity, string> = {
  info: "#2eb886",
  warning: "#daa038",
  critical: "#e01e5a"
};

// Green, gold, red
const DISCORD_COLORS: Record<Severity, number> = {
  info: 3061894,
  warning: 16766720,
  critical: 15158332
};

interface SlackAttachment {
  readonly text: string;
  readonly color: string;
  readonly ts: number;
}

export interface SlackPayload {
  readonly attachments: readonly SlackAttachment[];
}

interface DiscordEmbed {
  readonly description: string;
  readonly color: number;
  readonly timestamp: string;
}

export interface DiscordPayload {
  readonly embeds: readonly DiscordEmbed[];
}

export function buildSlackPayload(event: NotificationEvent, sentAt: Date): SlackPayload {
  return {
    attachments: [
      {
        text: event.message,
        color: SLACK_COLORS[event.severity],
        ts: sentAt.getTime() / 1000
      }
    ]
  };
}

export function buildDiscordPayload(event: NotificationEvent, sentAt: Date): DiscordPayload {
  return {
    embeds: [
      {
        description: event.message,
        color: DISCORD_COLORS[event.severity],
        timestamp: sentAt.toISOString()
      }
    ]
  };
}

/**
 * Post an event to a Slack incoming webhook.
 */
export async function sendSlackMessage(webhookUrl: string, event: NotificationEvent, sentAt = new Date()): Promise<void> {
  await postJson(webhookUrl, buildSlackPayload(event, sentAt));
}

/**
 * Post an event to a Discord webhook as a single embed.
 */
export async function sendDiscordMessage(webhookUrl: string, event: NotificationEvent, sentAt = new Date()): Promise<void> {
  await postJson(webhookUrl, buildDiscordPayload(event, sentAt));
}
