import type { AxiosResponse } from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildTelegramMessage, sendTelegramMessage, telegramEndpoint } from "../src/telegram.js";
import type { NotificationEvent } from "../src/types.js";
import { httpClient } from "../src/utils/http.js";
import { buildDiscordPayload, buildSlackPayload, sendDiscordMessage, sendSlackMessage } from "../src/webhook.js";

const event: NotificationEvent = {
  severity: "critical",
  title: "SSL Check Failed",
  message: "❌ *SSL Check Failed*\n*Site*: Shop (production)"
};

const sentAt = new Date("2026-01-01T00:00:00Z");

describe("channel payloads", () => {
  it("builds a Slack attachment coloured by severity", () => {
    expect(buildSlackPayload(event, sentAt)).toEqual({
      attachments: [{ text: event.message, color: "#e01e5a", ts: 1767225600 }]
    });
    expect(buildSlackPayload({ ...event, severity: "info" }, sentAt).attachments[0]?.color).toBe("#2eb886");
    expect(buildSlackPayload({ ...event, severity: "warning" }, sentAt).attachments[0]?.color).toBe("#daa038");
  });

  it("builds a Discord embed coloured by severity", () => {
    expect(buildDiscordPayload(event, sentAt)).toEqual({
      embeds: [{ description: event.message, color: 15158332, timestamp: "2026-01-01T00:00:00.000Z" }]
    });
    expect(buildDiscordPayload({ ...event, severity: "info" }, sentAt).embeds[0]?.color).toBe(3061894);
    expect(buildDiscordPayload({ ...event, severity: "warning" }, sentAt).embeds[0]?.color).toBe(16766720);
  });

  it("builds a Telegram Markdown message", () => {
    expect(telegramEndpoint("test-token")).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(buildTelegramMessage("42", event)).toEqual({
      chat_id: "42",
      text: event.message,
      parse_mode: "Markdown"
    });
  });
});

describe("channel senders", () => {
  beforeEach(() => {
    vi.spyOn(httpClient, "post").mockResolvedValue({ status: 200 } as AxiosResponse);
  });

  it("posts Slack payloads to the webhook URL", async () => {
    await sendSlackMessage("https://hooks.example/slack", event, sentAt);
    expect(httpClient.post).toHaveBeenCalledWith("https://hooks.example/slack", buildSlackPayload(event, sentAt));
  });

  it("posts Discord payloads to the webhook URL", async () => {
    await sendDiscordMessage("https://discord.example/webhook", event, sentAt);
    expect(httpClient.post).toHaveBeenCalledWith("https://discord.example/webhook", buildDiscordPayload(event, sentAt));
  });

  it("posts Telegram messages to the bot API", async () => {
    await sendTelegramMessage({ botToken: "test-token", chatId: "42" }, event);
    expect(httpClient.post).toHaveBeenCalledWith("https://api.telegram.org/bottest-token/sendMessage", {
      chat_id: "42",
      text: event.message,
      parse_mode: "Markdown"
    });
  });

  it("propagates HTTP failures to the caller", async () => {
    vi.mocked(httpClient.post).mockRejectedValueOnce(new Error("socket hang up"));
    await expect(sendSlackMessage("https://hooks.example/slack", event, sentAt)).rejects.toThrow("socket hang up");
  });
});
