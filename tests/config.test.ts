import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  applyConfigToEnv,
  getConfigDir,
  parseBool,
  parseCliConfig,
  resolveConfig,
  saveConfig,
} from "../src/config.js";
import { DEFAULT_MODELS } from "../src/types.js";

const ENV_KEYS = [
  "MADRIDISTA_PROVIDER",
  "MADRIDISTA_MODEL",
  "OPENAI_API_KEY",
  "ANTHROPIC_API_KEY",
  "GOOGLE_GENERATIVE_AI_API_KEY",
  "STRICT_FACTS",
  "CITATIONS",
  "LOG_TOOL_CALLS",
  "DEFAULT_TEAM",
  "MAX_RESPONSE_CHARS",
  "MAX_RESULT_AGE_DAYS",
  "FOOTBALL_DATA_API_KEY",
  "API_FOOTBALL_KEY",
  "RAPIDAPI_KEY",
  "TELEGRAM_BOT_TOKEN",
  "ALLOWED_USERS",
];

describe("parseBool", () => {
  it("should read common spellings", () => {
    expect(parseBool("true")).toBe(true);
    expect(parseBool(" YES ")).toBe(true);
    expect(parseBool("1")).toBe(true);
    expect(parseBool("off")).toBe(false);
    expect(parseBool("0")).toBe(false);
  });

  it("should leave anything else unset", () => {
    expect(parseBool(undefined)).toBeUndefined();
    expect(parseBool("maybe")).toBeUndefined();
  });
});

describe("parseCliConfig", () => {
  it("should drop fields with unexpected types", () => {
    expect(
      parseCliConfig({
        provider: "mistral",
        model: "",
        citations: "yes",
        strictFacts: false,
        telegram: { botToken: "test-token", allowedUsers: [1, 2] },
      })
    ).toEqual({
      strictFacts: false,
      providers: {},
      telegram: { botToken: "test-token" },
    });
  });

  it("should return an empty config for non-objects", () => {
    expect(parseCliConfig("config")).toEqual({});
    expect(parseCliConfig(null)).toEqual({});
  });
});

describe("resolveConfig", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "madridista-config-"));
    vi.stubEnv("MADRIDISTA_HOME", home);
    for (const key of ENV_KEYS) vi.stubEnv(key, "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(home, { recursive: true, force: true });
  });

  it("should use MADRIDISTA_HOME as the config directory", () => {
    expect(getConfigDir()).toBe(home);
  });

  it("should fall back to defaults without a config file", () => {
    const resolved = resolveConfig();

    expect(resolved.brain.provider).toBe("openai");
    expect(resolved.brain.model).toBe(DEFAULT_MODELS.openai);
    expect(resolved.brain.strictFacts).toBe(true);
    expect(resolved.brain.defaultTeam).toBe("Real Madrid");
    expect(resolved.apiKey).toBeUndefined();
    expect(resolved.credentials).toEqual({});
    expect(resolved.telegramBotToken).toBeUndefined();
    expect(resolved.telegramAllowedUsers).toBeUndefined();
  });

  it("should read the saved config file", () => {
    saveConfig({
      provider: "anthropic",
      model: "test-model",
      apiKey: "test-key",
      strictFacts: false,
      providers: { rapidApiKey: "test-rapid-key" },
      telegram: { botToken: "test-token", allowedUsers: ["42"] },
    });

    const resolved = resolveConfig();

    expect(resolved.brain.provider).toBe("anthropic");
    expect(resolved.brain.model).toBe("test-model");
    expect(resolved.brain.strictFacts).toBe(false);
    expect(resolved.apiKey).toBe("test-key");
    expect(resolved.credentials.rapidApiKey).toBe("test-rapid-key");
    expect(resolved.telegramBotToken).toBe("test-token");
    expect(resolved.telegramAllowedUsers).toEqual(["42"]);
  });

  it("should let environment variables win over the file", () => {
    saveConfig({ provider: "anthropic", model: "test-model", apiKey: "test-key", strictFacts: true });
    vi.stubEnv("MADRIDISTA_PROVIDER", "google");
    vi.stubEnv("GOOGLE_GENERATIVE_AI_API_KEY", "test-env-key");
    vi.stubEnv("STRICT_FACTS", "off");
    vi.stubEnv("DEFAULT_TEAM", "Arsenal");
    vi.stubEnv("ALLOWED_USERS", "1, 2,,3");
    vi.stubEnv("FOOTBALL_DATA_API_KEY", "test-fd-key");
    vi.stubEnv("MAX_RESPONSE_CHARS", "2000");
    vi.stubEnv("MAX_RESULT_AGE_DAYS", "soon");

    const resolved = resolveConfig();

    expect(resolved.brain.provider).toBe("google");
    expect(resolved.brain.model).toBe(DEFAULT_MODELS.google);
    expect(resolved.apiKey).toBe("test-env-key");
    expect(resolved.brain.strictFacts).toBe(false);
    expect(resolved.brain.defaultTeam).toBe("Arsenal");
    expect(resolved.telegramAllowedUsers).toEqual(["1", "2", "3"]);
    expect(resolved.credentials.footballDataApiKey).toBe("test-fd-key");
    expect(resolved.brain.maxResponseChars).toBe(2000);
    expect(resolved.brain.maxResultAgeDays).toBe(180);
  });

  it("should ignore an unreadable config file", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    writeFileSync(join(home, "config.json"), "{not json", "utf-8");

    expect(resolveConfig().brain.provider).toBe("openai");
    expect(errors).toHaveBeenCalledTimes(1);
  });

  it("should export the saved API key for the AI SDK", () => {
    saveConfig({ provider: "openai", apiKey: "test-key" });

    applyConfigToEnv();

    expect(process.env.OPENAI_API_KEY).toBe("test-key");
  });
});
