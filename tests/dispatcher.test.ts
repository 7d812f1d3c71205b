import { describe, expect, it, vi } from "vitest";
import { type ChannelSenders, createDispatcher, dispatchNotification } from "../src/dispatcher.js";
import { ChannelSendError } from "../src/errors.js";
import type { Logger } from "../src/logger.js";
import type { NotificationEvent } from "../src/types.js";

const event: NotificationEvent = {
  severity: "warning",
  title: "SSL Expiry Warning",
  message: "⚠️ *SSL Expiry Warning*"
};

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function createSenders() {
  return {
    slack: vi.fn().mockResolvedValue(undefined),
    discord: vi.fn().mockResolvedValue(undefined),
    telegram: vi.fn().mockResolvedValue(undefined)
  } satisfies ChannelSenders;
}

describe("dispatchNotification", () => {
  it("sends to every resolved channel", async () => {
    const senders = createSenders();
    const report = await dispatchNotification(
      {
        slack: "https://hooks.example/slack",
        discord: "https://discord.example/webhook",
        telegram: { botToken: "test-token", chatId: "42" }
      },
      event,
      createLogger(),
      senders
    );

    expect(report).toEqual({ delivered: ["slack", "discord", "telegram"], failed: [] });
    expect(senders.slack).toHaveBeenCalledWith("https://hooks.example/slack", event);
    expect(senders.discord).toHaveBeenCalledWith("https://discord.example/webhook", event);
    expect(senders.telegram).toHaveBeenCalledWith({ botToken: "test-token", chatId: "42" }, event);
  });

  it("keeps delivering to other channels when one fails", async () => {
    const senders = createSenders();
    senders.slack.mockRejectedValueOnce(new Error("boom"));
    const logger = createLogger();

    const report = await dispatchNotification(
      {
        slack: "https://hooks.example/slack",
        discord: "https://discord.example/webhook",
        telegram: { botToken: "test-token", chatId: "42" }
      },
      event,
      logger,
      senders
    );

    expect(report.delivered).toEqual(["discord", "telegram"]);
    expect(report.failed).toHaveLength(1);
    const [failure] = report.failed;
    expect(failure).toBeInstanceOf(ChannelSendError);
    expect(failure?.channel).toBe("slack");
    expect(failure?.message).toBe("Failed to send slack notification: boom");
    expect(logger.error).toHaveBeenCalledWith("Failed to send slack notification: boom");
    expect(senders.discord).toHaveBeenCalledTimes(1);
    expect(senders.telegram).toHaveBeenCalledTimes(1);
  });

  it("does not throw when every channel fails", async () => {
    const senders = createSenders();
    senders.slack.mockRejectedValue(new Error("slack down"));
    senders.discord.mockRejectedValue(new Error("discord down"));

    const report = await dispatchNotification(
      { slack: "https://hooks.example/slack", discord: "https://discord.example/webhook" },
      event,
      createLogger(),
      senders
    );

    expect(report.delivered).toEqual([]);
    expect(report.failed.map(failure => failure.channel)).toEqual(["slack", "discord"]);
    expect(senders.telegram).not.toHaveBeenCalled();
  });

  it("skips channels that are not resolved and warns when none are", async () => {
    const senders = createSenders();
    const logger = createLogger();

    const report = await dispatchNotification({}, event, logger, senders);

    expect(report).toEqual({ delivered: [], failed: [] });
    expect(logger.warn).toHaveBeenCalledWith('No notification channels configured; dropping "SSL Expiry Warning".');
    expect(senders.slack).not.toHaveBeenCalled();
  });
});

describe("createDispatcher", () => {
  it("binds logger and senders", async () => {
    const senders = createSenders();
    const dispatch = createDispatcher(createLogger(), senders);

    const report = await dispatch({ discord: "https://discord.example/webhook" }, event);

    expect(report.delivered).toEqual(["discord"]);
    expect(senders.discord).toHaveBeenCalledWith("https://discord.example/webhook", event);
  });
});
