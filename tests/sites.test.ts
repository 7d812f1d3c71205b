import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveChannels } from "../src/channels.js";
import { ConfigurationError } from "../src/errors.js";
import { loadMonitorConfig, parseMonitorConfig } from "../src/sites.js";

const yamlText = `
slack_webhook_env_name: OPS_SLACK
notification_groups:
  payments:
    discord_webhook_url: https://discord.example/payments
    telegram_bot_token: TG_TOKEN
    telegram_chat_id: -100123
sites:
  - name: Storefront
    hostname: https://shop.example.com
    environment: production
    alert_days: [7, 30, 7]
    notification_interval_hours: 12
    notification_group: payments
  - name: API
    hostname: api.example.com
    port: 8443
`;

describe("parseMonitorConfig", () => {
  it("maps YAML keys onto site configurations and applies defaults", () => {
    const config = parseMonitorConfig(yamlText, "sites.yaml");

    expect(config.slackWebhookEnvName).toBe("OPS_SLACK");
    expect(config.notificationGroups).toEqual({
      payments: {
        slackWebhookUrl: undefined,
        discordWebhookUrl: "https://discord.example/payments",
        telegramBotToken: "TG_TOKEN",
        telegramChatId: -100123
      }
    });
    expect(config.sites).toEqual([
      {
        name: "Storefront",
        hostname: "https://shop.example.com",
        port: 443,
        environment: "production",
        alertDays: [30, 7],
        notificationIntervalHours: 12,
        notificationGroup: "payments"
      },
      {
        name: "API",
        hostname: "api.example.com",
        port: 8443,
        environment: undefined,
        alertDays: [30, 15, 7, 3, 1],
        notificationIntervalHours: 24,
        notificationGroup: undefined
      }
    ]);
  });

  it("delivers to an unquoted numeric Telegram chat id", () => {
    const config = parseMonitorConfig(yamlText, "sites.yaml");
    const [storefront] = config.sites;

    expect(resolveChannels(storefront, config, { TG_TOKEN: "test-token" })).toEqual({
      slack: undefined,
      discord: "https://discord.example/payments",
      telegram: { botToken: "test-token", chatId: "-100123" }
    });
  });

  it("treats an empty document as no sites", () => {
    const config = parseMonitorConfig("", "sites.yaml");
    expect(config.sites).toEqual([]);
    expect(config.slackWebhookEnvName).toBe("SLACK_WEBHOOK_URL");
    expect(config.notificationGroups).toEqual({});
    expect(config.skippedSites).toEqual([]);
  });

  it("rejects invalid YAML", () => {
    expect(() => parseMonitorConfig("sites: [", "sites.yaml")).toThrow(ConfigurationError);
  });

  it("skips a site with negative thresholds, names the offending field and keeps the rest", () => {
    const text = [
      "sites:",
      "  - name: Bad",
      "    hostname: bad.example.com",
      "    alert_days: [-1]",
      "  - name: Good",
      "    hostname: good.example.com",
      ""
    ].join("\n");
    const config = parseMonitorConfig(text, "sites.yaml");

    expect(config.sites.map(site => site.name)).toEqual(["Good"]);
    expect(config.skippedSites).toEqual([
      "Skipping site 'Bad' in sites.yaml: sites.0.alert_days.0: Number must be greater than or equal to 0"
    ]);
  });

  it("skips an unnamed site with a non-positive notification interval", () => {
    const text = "sites:\n  - hostname: bad.example.com\n    notification_interval_hours: 0\n";
    const config = parseMonitorConfig(text, "sites.yaml");

    expect(config.sites).toEqual([]);
    expect(config.skippedSites).toHaveLength(1);
    expect(config.skippedSites?.[0]).toMatch(/^Skipping site #1 in sites\.yaml: sites\.0\.name: Required; /);
  });

  it("rejects a sites entry that is not a list", () => {
    expect(() => parseMonitorConfig("sites: 5\n", "sites.yaml")).toThrow(/Invalid monitor configuration in sites\.yaml: sites: /);
  });
});

describe("loadMonitorConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ssl-config-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("reads the configuration file", async () => {
    const file = path.join(dir, "sites.yaml");
    await fs.writeFile(file, yamlText, "utf8");
    const config = await loadMonitorConfig(file);
    expect(config.sites.map(site => site.name)).toEqual(["Storefront", "API"]);
  });

  it("reports a missing file as a configuration error", async () => {
    const file = path.join(dir, "missing.yaml");
    await expect(loadMonitorConfig(file)).rejects.toThrow(`Config file not found: ${file}`);
    await expect(loadMonitorConfig(file)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
