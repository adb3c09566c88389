import path from "path";
import { describe, expect, it } from "vitest";
import { botIdFromToken, loadConfig, parseAllowedChatIds } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      host: "0.0.0.0",
      port: 8000,
      botToken: undefined,
      botId: undefined,
      allowedChatIds: [],
      mtproto: undefined,
      downloadsDir: path.resolve("downloads"),
      staticDir: path.resolve("server", "static"),
      dashboard: { username: "admin", password: "changeme" },
    });
  });

  it("reads every setting", () => {
    const config = loadConfig({
      HOST: "127.0.0.1",
      PORT: "9000",
      TELEGRAM_BOT_TOKEN: "123456:test-token",
      ALLOWED_CHAT_IDS: "11, -22,33",
      TELEGRAM_API_ID: "42",
      TELEGRAM_API_HASH: "test-hash",
      TELEGRAM_SESSION: "test-session",
      DOWNLOADS_DIR: "/tmp/drop",
      DASHBOARD_USERNAME: "ops",
      DASHBOARD_PASSWORD: "test-secret",
    });

    expect(config.port).toBe(9000);
    expect(config.botId).toBe("123456");
    expect(config.allowedChatIds).toEqual([11, -22, 33]);
    expect(config.mtproto).toEqual({
      apiId: 42,
      apiHash: "test-hash",
      session: "test-session",
    });
    expect(config.downloadsDir).toBe("/tmp/drop");
    expect(config.dashboard).toEqual({ username: "ops", password: "test-secret" });
  });

  it("leaves large-file support off unless all credentials are set", () => {
    const config = loadConfig({
      TELEGRAM_API_ID: "42",
      TELEGRAM_API_HASH: "test-hash",
      TELEGRAM_SESSION: "",
    });

    expect(config.mtproto).toBeUndefined();
  });

  it.each([
    ["ALLOWED_CHAT_IDS", "12,abc"],
    ["PORT", "not-a-port"],
    ["TELEGRAM_API_ID", "abc"],
  ])("rejects an invalid %s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigError);
  });
});

describe("parseAllowedChatIds", () => {
  it("returns an empty list for an unset value", () => {
    expect(parseAllowedChatIds(undefined)).toEqual([]);
  });
});

describe("botIdFromToken", () => {
  it("takes the numeric prefix", () => {
    expect(botIdFromToken("987654:test-token")).toBe("987654");
    expect(botIdFromToken("test-token")).toBeUndefined();
  });
});
