/**
 * madridista — Persistent CLI Configuration
 *
 * Reads/writes user config from ~/.madridista/config.json (or
 * $MADRIDISTA_HOME/config.json). Environment variables always override
 * config file values.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import pc from "picocolors";
import * as p from "@clack/prompts";
import {
  DEFAULT_CONFIG,
  DEFAULT_MODELS,
  PROVIDER_MODELS,
  isLLMProvider,
  withDefaults,
  type LLMProvider,
  type MadridistaConfig,
  type ProviderCredentials,
} from "./types.js";
import { isRecord, isStringArray } from "./data.js";
import { parsePositiveInt } from "./utils.js";

// ---------------------------------------------------------------------------
// Config shape persisted to disk
// ---------------------------------------------------------------------------

export interface TelegramIntegrationConfig {
  botToken?: string;
  allowedUsers?: string[]; // Telegram user ID strings
}

export interface CLIConfig {
  provider?: LLMProvider;
  model?: string;
  apiKey?: string;
  strictFacts?: boolean;
  citations?: boolean;
  verbose?: boolean;
  defaultTeam?: string;
  providers?: ProviderCredentials;
  telegram?: TelegramIntegrationConfig;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getConfigDir(): string {
  const override = process.env.MADRIDISTA_HOME;
  return override && override.trim() ? override : join(homedir(), ".madridista");
}

function configPath(): string {
  return join(getConfigDir(), "config.json");
}

// ---------------------------------------------------------------------------
// Provider ↔ API key env var mapping
// ---------------------------------------------------------------------------

export const PROVIDER_ENV: Record<LLMProvider, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
};

// ---------------------------------------------------------------------------
// Read / Write
// ---------------------------------------------------------------------------

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function optionalBool(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

/** Keep only the fields we recognise, with the types we expect */
export function parseCliConfig(raw: unknown): CLIConfig {
  if (!isRecord(raw)) return {};
  const providers = isRecord(raw.providers) ? raw.providers : {};
  const telegram = isRecord(raw.telegram) ? raw.telegram : {};
  return {
    provider: isLLMProvider(raw.provider) ? raw.provider : undefined,
    model: optionalString(raw.model),
    apiKey: optionalString(raw.apiKey),
    strictFacts: optionalBool(raw.strictFacts),
    citations: optionalBool(raw.citations),
    verbose: optionalBool(raw.verbose),
    defaultTeam: optionalString(raw.defaultTeam),
    providers: {
      footballDataApiKey: optionalString(providers.footballDataApiKey),
      apiFootballKey: optionalString(providers.apiFootballKey),
      rapidApiKey: optionalString(providers.rapidApiKey),
    },
    telegram: {
      botToken: optionalString(telegram.botToken),
      allowedUsers: isStringArray(telegram.allowedUsers) ? telegram.allowedUsers : undefined,
    },
  };
}

export function loadConfig(): CLIConfig {
  const file = configPath();
  if (!existsSync(file)) return {};
  try {
    return parseCliConfig(JSON.parse(readFileSync(file, "utf-8")));
  } catch (err: unknown) {
    console.error(
      `[madridista] ignoring unreadable config ${file}: ${err instanceof Error ? err.message : err}`
    );
    return {};
  }
}

export function saveConfig(config: CLIConfig): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(configPath(), JSON.stringify(config, null, 2) + "\n", "utf-8");
}

// ---------------------------------------------------------------------------
// Merge: config file + env vars (env wins)
// ---------------------------------------------------------------------------

export interface ResolvedConfig {
  brain: Required<MadridistaConfig>;
  apiKey: string | undefined;
  credentials: ProviderCredentials;
  telegramBotToken: string | undefined;
  telegramAllowedUsers: string[] | undefined;
}

function firstEnv(...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = process.env[key];
    if (value && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

/** "true"/"1"/"yes"/"on" and "false"/"0"/"no"/"off"; anything else is unset */
export function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(v)) return true;
  if (["false", "0", "no", "off"].includes(v)) return false;
  return undefined;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(",").map((id) => id.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function resolveConfig(): ResolvedConfig {
  const file = loadConfig();

  const envProvider = firstEnv("MADRIDISTA_PROVIDER");
  const provider: LLMProvider = isLLMProvider(envProvider)
    ? envProvider
    : file.provider ?? "openai";

  const model =
    firstEnv("MADRIDISTA_MODEL") ||
    (file.provider === provider ? file.model : undefined) ||
    DEFAULT_MODELS[provider];

  // env var > config-file apiKey (only if provider matches)
  const apiKey =
    firstEnv(PROVIDER_ENV[provider]) ||
    (file.provider === provider ? file.apiKey : undefined);

  const brain = withDefaults({
    provider,
    model,
    strictFacts: parseBool(firstEnv("STRICT_FACTS")) ?? file.strictFacts,
    citations: parseBool(firstEnv("CITATIONS")) ?? file.citations,
    verbose: parseBool(firstEnv("LOG_TOOL_CALLS")) ?? file.verbose,
    defaultTeam: firstEnv("DEFAULT_TEAM") || file.defaultTeam,
    maxResponseChars: parsePositiveInt(firstEnv("MAX_RESPONSE_CHARS"), DEFAULT_CONFIG.maxResponseChars),
    maxResultAgeDays: parsePositiveInt(firstEnv("MAX_RESULT_AGE_DAYS"), DEFAULT_CONFIG.maxResultAgeDays),
  });

  const credentials: ProviderCredentials = {
    footballDataApiKey:
      firstEnv("FOOTBALL_DATA_API_KEY") || file.providers?.footballDataApiKey,
    apiFootballKey: firstEnv("API_FOOTBALL_KEY") || file.providers?.apiFootballKey,
    rapidApiKey: firstEnv("RAPIDAPI_KEY") || file.providers?.rapidApiKey,
  };

  return {
    brain,
    apiKey,
    credentials,
    telegramBotToken: firstEnv("TELEGRAM_BOT_TOKEN") || file.telegram?.botToken,
    telegramAllowedUsers: parseList(firstEnv("ALLOWED_USERS")) ?? file.telegram?.allowedUsers,
  };
}

/**
 * Apply saved config into process.env so the AI SDK providers pick the key
 * up transparently. Env vars already set take precedence.
 */
export function applyConfigToEnv(): ResolvedConfig {
  const resolved = resolveConfig();
  const envVar = PROVIDER_ENV[resolved.brain.provider];
  if (resolved.apiKey && !process.env[envVar]) {
    process.env[envVar] = resolved.apiKey;
  }
  return resolved;
}

// ---------------------------------------------------------------------------
// Interactive setup via @clack/prompts
// ---------------------------------------------------------------------------

function cancelled(): never {
  p.cancel("Setup cancelled.");
  process.exit(0);
}

async function askOptionalKey(message: string, existing: string | undefined): Promise<string | undefined> {
  if (existing) {
    const keep = await p.confirm({ message: `${message} is configured. Keep it?`, initialValue: true });
    if (p.isCancel(keep)) cancelled();
    if (keep) return existing;
  }
  const value = await p.password({ message: `${message} (leave empty to skip):` });
  if (p.isCancel(value)) cancelled();
  return value.trim() || undefined;
}

export async function runConfigFlow(): Promise<CLIConfig> {
  console.log(pc.bold(pc.white("MadridistaAI")) + pc.dim("  ·  football answers you can verify"));
  p.intro("⚽ madridista configuration");

  const saved = loadConfig();

  const provider = await p.select<LLMProvider>({
    message: "Which LLM provider would you like to use?",
    initialValue: saved.provider ?? "openai",
    options: [
      { value: "openai", label: "OpenAI", hint: "GPT" },
      { value: "anthropic", label: "Anthropic", hint: "Claude" },
      { value: "google", label: "Google", hint: "Gemini" },
    ],
  });
  if (p.isCancel(provider)) cancelled();

  const model = await p.select<string>({
    message: "Which model?",
    options: PROVIDER_MODELS[provider],
  });
  if (p.isCancel(model)) cancelled();

  const envName = PROVIDER_ENV[provider];
  const existingKey =
    process.env[envName] || (saved.provider === provider ? saved.apiKey : undefined);
  let apiKey: string;
  if (existingKey && existingKey.trim()) {
    p.log.info(`Using existing ${envName} (already configured).`);
    apiKey = existingKey.trim();
  } else {
    const entered = await p.password({
      message: `Paste your ${envName}:`,
      validate: (val) => (!val || val.trim().length === 0 ? "API key is required." : undefined),
    });
    if (p.isCancel(entered)) cancelled();
    apiKey = entered.trim();
  }

  p.log.step("Football data providers");
  const footballDataApiKey = await askOptionalKey(
    "Football-Data.org key",
    saved.providers?.footballDataApiKey
  );
  const apiFootballKey = await askOptionalKey("API-Football key", saved.providers?.apiFootballKey);
  const rapidApiKey = await askOptionalKey(
    "RapidAPI key (SofaScore, LiveScore)",
    saved.providers?.rapidApiKey
  );

  const strictFacts = await p.confirm({
    message: "Refuse rather than guess when facts cannot be verified?",
    initialValue: saved.strictFacts ?? true,
  });
  if (p.isCancel(strictFacts)) cancelled();

  const defaultTeam = await p.text({
    message: "Default team",
    initialValue: saved.defaultTeam ?? "Real Madrid",
  });
  if (p.isCancel(defaultTeam)) cancelled();

  const config: CLIConfig = {
    ...saved,
    provider,
    model,
    apiKey,
    strictFacts,
    defaultTeam: defaultTeam.trim() || "Real Madrid",
    providers: { footballDataApiKey, apiFootballKey, rapidApiKey },
  };
  saveConfig(config);

  p.outro(`Saved to ${pc.cyan(configPath())}`);
  return config;
}
