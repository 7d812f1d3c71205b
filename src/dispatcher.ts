import { ChannelSendError } from "./errors.js";
import type { Logger } from "./logger.js";
import { sendTelegramMessage } from "./telegram.js";
import type { ChannelKind, NotificationEvent, ResolvedChannels, TelegramTarget } from "./types.js";
import { describeHttpError } from "./utils/http.js";
import { sendDiscordMessage, sendSlackMessage } from "./webhook.js";

/**
 * Wire-level senders, one per channel kind.
 */
export interface ChannelSenders {
  readonly slack: (webhookUrl: string, event: NotificationEvent) => Promise<void>;
  readonly discord: (webhookUrl: string, event: NotificationEvent) => Promise<void>;
  readonly telegram: (target: TelegramTarget, event: NotificationEvent) => Promise<void>;
}

export const defaultSenders: ChannelSenders = {
  slack: (webhookUrl, event) => sendSlackMessage(webhookUrl, event),
  discord: (webhookUrl, event) => sendDiscordMessage(webhookUrl, event),
  telegram: sendTelegramMessage
};

export interface DispatchReport {
  readonly delivered: readonly ChannelKind[];
  readonly failed: readonly ChannelSendError[];
}

/**
 * Function shape the orchestrator depends on.
 */
export type Dispatch = (channels: ResolvedChannels, event: NotificationEvent) => Promise<DispatchReport>;

/**
 * Send one event to every resolved channel.
 *
 * Invariant: a failing channel is logged and reported, never thrown, and does not
 * stop delivery to the remaining channels.
 */
export async function dispatchNotification(
  channels: ResolvedChannels,
  event: NotificationEvent,
  logger: Logger,
  senders: ChannelSenders = defaultSenders
): Promise<DispatchReport> {
  const attempts: Array<{ readonly kind: ChannelKind; readonly send: () => Promise<void> }> = [];
  const { slack, discord, telegram } = channels;
  if (slack) {
    attempts.push({ kind: "slack", send: () => senders.slack(slack, event) });
  }
  if (discord) {
    attempts.push({ kind: "discord", send: () => senders.discord(discord, event) });
  }
  if (telegram) {
    attempts.push({ kind: "telegram", send: () => senders.telegram(telegram, event) });
  }

  if (attempts.length === 0) {
    logger.warn(`No notification channels configured; dropping "${event.title}".`);
    return { delivered: [], failed: [] };
  }

  const delivered: ChannelKind[] = [];
  const failed: ChannelSendError[] = [];
  for (const attempt of attempts) {
    try {
      await attempt.send();
      delivered.push(attempt.kind);
      logger.debug(`Delivered "${event.title}" via ${attempt.kind}.`);
    } catch (cause) {
      const failure = new ChannelSendError(
        `Failed to send ${attempt.kind} notification: ${describeHttpError(cause)}`,
        attempt.kind,
        { cause }
      );
      logger.error(failure.message);
      failed.push(failure);
    }
  }
  return { delivered, failed };
}

/**
 * Bind a logger and senders into the {@link Dispatch} shape.
 */
export function createDispatcher(logger: Logger, senders: ChannelSenders = defaultSenders): Dispatch {
  return (channels, event) => dispatchNotification(channels, event, logger, senders);
}
