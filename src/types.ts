/**
 * madridista — Type Definitions
 *
 * Shared types for the orchestration core, the tool registry, the LLM client
 * and configuration.
 */

import type { ModelMessage } from "ai";

// ---------------------------------------------------------------------------
// Supported LLM providers
// ---------------------------------------------------------------------------

export type LLMProvider = "anthropic" | "openai" | "google";

export interface ProviderModelOption {
  value: string;
  label: string;
  hint?: string;
}

export const PROVIDER_MODELS: Record<LLMProvider, ProviderModelOption[]> = {
  openai: [
    { value: "gpt-4o-mini", label: "GPT-4o mini", hint: "recommended" },
    { value: "gpt-4o", label: "GPT-4o", hint: "more capable" },
  ],
  anthropic: [
    {
      value: "claude-3-5-haiku-latest",
      label: "Claude 3.5 Haiku",
      hint: "recommended",
    },
    { value: "claude-sonnet-4-5", label: "Claude Sonnet 4.5" },
  ],
  google: [
    { value: "gemini-2.5-flash", label: "Gemini 2.5 Flash", hint: "recommended" },
    { value: "gemini-2.5-pro", label: "Gemini 2.5 Pro" },
  ],
};

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: PROVIDER_MODELS.openai[0].value,
  anthropic: PROVIDER_MODELS.anthropic[0].value,
  google: PROVIDER_MODELS.google[0].value,
};

export function isLLMProvider(value: unknown): value is LLMProvider {
  return value === "openai" || value === "anthropic" || value === "google";
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ProviderCredentials {
  footballDataApiKey?: string;
  apiFootballKey?: string;
  /** RapidAPI key shared by the SofaScore and LiveScore hosts */
  rapidApiKey?: string;
}

export interface MadridistaConfig {
  /** LLM provider to use (default: openai) */
  provider?: LLMProvider;
  /** Model ID for the chosen provider (default: depends on provider) */
  model?: string;
  /** Token cap for the first, tool-selecting completion (default: 220) */
  maxTokens?: number;
  /** Token cap for the composing completion (default: 380) */
  composeMaxTokens?: number;
  /** Sampling temperature for tool selection (default: 0.3) */
  temperature?: number;
  /** Refuse rather than guess when no tool can verify a factual claim (default: true) */
  strictFacts?: boolean;
  /** Append "(Source A • Source B)" to answers built from tool data (default: true) */
  citations?: boolean;
  /** Log tool calls and cascade attempts to stderr (default: false) */
  verbose?: boolean;
  /** Hard cap on the length of every returned answer (default: 3900) */
  maxResponseChars?: number;
  /** Timeout for one LLM completion, in ms (default: 25000) */
  llmTimeoutMs?: number;
  /** Timeout for one data-provider HTTP call, in ms (default: 15000) */
  providerTimeoutMs?: number;
  /** "Last result" payloads older than this are treated as stale (default: 180) */
  maxResultAgeDays?: number;
  /** Team assumed when a question names none (default: Real Madrid) */
  defaultTeam?: string;
  /** TTL for cached tool results, in ms; 0 disables caching (default: 60000) */
  cacheTtlMs?: number;
  /** Extra instructions appended to the system prompt */
  systemPrompt?: string;
}

export const DEFAULT_CONFIG: Required<MadridistaConfig> = {
  provider: "openai",
  model: DEFAULT_MODELS.openai,
  maxTokens: 220,
  composeMaxTokens: 380,
  temperature: 0.3,
  strictFacts: true,
  citations: true,
  verbose: false,
  maxResponseChars: 3900,
  llmTimeoutMs: 25_000,
  providerTimeoutMs: 15_000,
  maxResultAgeDays: 180,
  defaultTeam: "Real Madrid",
  cacheTtlMs: 60_000,
  systemPrompt: "",
};

/**
 * Fill unset fields from DEFAULT_CONFIG. A provider given without a model
 * gets that provider's default model.
 */
export function withDefaults(config: MadridistaConfig = {}): Required<MadridistaConfig> {
  const d = DEFAULT_CONFIG;
  const provider = config.provider ?? d.provider;
  return {
    provider,
    model: config.model ?? (config.provider ? DEFAULT_MODELS[provider] : d.model),
    maxTokens: config.maxTokens ?? d.maxTokens,
    composeMaxTokens: config.composeMaxTokens ?? d.composeMaxTokens,
    temperature: config.temperature ?? d.temperature,
    strictFacts: config.strictFacts ?? d.strictFacts,
    citations: config.citations ?? d.citations,
    verbose: config.verbose ?? d.verbose,
    maxResponseChars: config.maxResponseChars ?? d.maxResponseChars,
    llmTimeoutMs: config.llmTimeoutMs ?? d.llmTimeoutMs,
    providerTimeoutMs: config.providerTimeoutMs ?? d.providerTimeoutMs,
    maxResultAgeDays: config.maxResultAgeDays ?? d.maxResultAgeDays,
    defaultTeam: config.defaultTeam ?? d.defaultTeam,
    cacheTtlMs: config.cacheTtlMs ?? d.cacheTtlMs,
    systemPrompt: config.systemPrompt ?? d.systemPrompt,
  };
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export const TOOL_NAMES = [
  "tool_next_fixture",
  "tool_last_result",
  "tool_form",
  "tool_table",
  "tool_scorers",
  "tool_h2h_summary",
  "tool_compare_teams",
  "tool_player_stats",
  "tool_compare_players",
  "tool_live_now",
  "tool_af_next_fixture",
  "tool_af_last_result",
  "tool_af_last_result_vs",
  "tool_af_find_match_result",
  "tool_next_lineups",
  "tool_sofa_form",
  "tool_squad",
  "tool_injuries",
  "tool_club_elo",
  "tool_news_top",
  "tool_history_lookup",
  "tool_h2h_officialish",
  "tool_glossary",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(value);
}

export type ToolCategory =
  | "match_data"
  | "team_data"
  | "player_data"
  | "live_data"
  | "fixtures"
  | "news"
  | "history"
  | "comparison"
  | "reference";

export type DataFreshness = "real_time" | "recent" | "historical" | "static";

export interface ParameterProperty {
  type: "string" | "integer" | "number" | "boolean";
  description?: string;
}

/** JSON schema of a tool's flat argument object */
export interface ParameterSchema {
  type: "object";
  properties: Record<string, ParameterProperty>;
  required?: string[];
}

export interface ToolSpec {
  name: ToolName;
  description: string;
  input_schema: ParameterSchema;
  category: ToolCategory;
  freshness: DataFreshness;
  /** Provider name cited for this tool's data */
  source: string;
}

/** Flat argument object handed to a tool, as produced by the LLM or the cascade */
export type ToolArgs = Record<string, unknown>;

export interface ToolSuccess {
  ok: true;
  /** Provider name used for citations */
  __source: string;
  when?: string;
  home?: string;
  away?: string;
  home_score?: number | null;
  away_score?: number | null;
  fixture_id?: number;
  rows?: unknown[];
  items?: unknown[];
  events?: unknown[];
  extract?: string;
  [key: string]: unknown;
}

export interface ToolFailure {
  ok: false;
  message: string;
  __source?: string;
}

export type ToolPayload = ToolSuccess | ToolFailure;

export type ToolHandler = (args: ToolArgs) => Promise<ToolPayload>;

export interface ToolCallRecord {
  tool: ToolName;
  args: ToolArgs;
  payload: ToolPayload;
  /** ISO timestamp of the attempt */
  calledAt: string;
}

// ---------------------------------------------------------------------------
// Intent classification
// ---------------------------------------------------------------------------

export type IntentLabel =
  | "live"
  | "next_fixture"
  | "last_result"
  | "news"
  | "history"
  | "head_to_head"
  | "player_stats"
  | "comparison"
  | "general";

export interface IntentSignals {
  live: boolean;
  next: boolean;
  last: boolean;
  news: boolean;
  history: boolean;
  players: boolean;
  compare: boolean;
}

export interface Intent {
  label: IntentLabel;
  /** Advisory tool suggestion injected into the LLM system context */
  hint: string | null;
  looksFactual: boolean;
  looksHistorical: boolean;
  signals: IntentSignals;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type ValidationReason =
  | "ok"
  | "not_live"
  | "no_last_result"
  | "no_next_fixture";

export interface ValidationVerdict {
  isValid: boolean;
  reason: ValidationReason;
}

// ---------------------------------------------------------------------------
// LLM completion capability
// ---------------------------------------------------------------------------

export type Message = ModelMessage;

export interface LlmToolCall {
  id: string;
  name: string;
  args: ToolArgs;
}

export interface CompletionRequest {
  system: string;
  messages: Message[];
  /** Tools exposed for function calling; tool choice is always "auto" */
  tools?: ToolSpec[];
  maxOutputTokens?: number;
  temperature?: number;
}

export interface CompletionResult {
  text: string;
  toolCalls: LlmToolCall[];
}

export interface LlmClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
