import { describe, expect, test } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  test("applies defaults", () => {
    const config = loadConfig({ BOT_TOKEN: "test-token" });

    expect(config).toEqual({
      env: "development",
      isDev: true,
      botToken: "test-token",
      apiKey: undefined,
      superAdminIds: new Set(),
      host: "0.0.0.0",
      port: 8080,
      dataDir: "data",
      registryFile: "data/admins.json",
      deliveryTimeoutMs: 10_000,
      pollTimeoutSeconds: 30,
    });
  });

  test("reads every variable", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      BOT_TOKEN: " test-token ",
      API_KEY: "test-secret",
      SUPER_ADMIN_IDS: "11, 22,,-33",
      HOST: "127.0.0.1",
      PORT: "9090",
      DATA_DIR: "/var/lib/soc-relay",
      DELIVERY_TIMEOUT_MS: "2500",
      POLL_TIMEOUT_SECONDS: "10",
    });

    expect(config).toMatchObject({
      isDev: false,
      botToken: "test-token",
      apiKey: "test-secret",
      host: "127.0.0.1",
      port: 9090,
      registryFile: "/var/lib/soc-relay/admins.json",
      deliveryTimeoutMs: 2500,
      pollTimeoutSeconds: 10,
    });
    expect([...config.superAdminIds]).toEqual([11, 22, -33]);
  });

  test("treats a blank API key as open mode", () => {
    expect(loadConfig({ BOT_TOKEN: "test-token", API_KEY: "  " }).apiKey).toBeUndefined();
  });

  test("treats blank values as unset", () => {
    const config = loadConfig({
      BOT_TOKEN: "test-token",
      PORT: "",
      HOST: " ",
      DELIVERY_TIMEOUT_MS: "",
      POLL_TIMEOUT_SECONDS: "",
    });

    expect(config).toMatchObject({
      host: "0.0.0.0",
      port: 8080,
      deliveryTimeoutMs: 10_000,
      pollTimeoutSeconds: 30,
    });
  });

  test("refuses to start without a bot token", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ BOT_TOKEN: "   " })).toThrow(/BOT_TOKEN is required/);
  });

  test("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "http", SUPER_ADMIN_IDS: "12,abc" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues).toContain('SUPER_ADMIN_IDS: "abc" is not an integer chat id');
    expect(issues).toContain("BOT_TOKEN: BOT_TOKEN is required (from BotFather)");
  });
});
