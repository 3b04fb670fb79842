#!/usr/bin/env node
/**
 * madridista — CLI Entry Point
 *
 * Subcommands:
 *   madridista ask "<question>"   Answer one question (default)
 *   madridista plan "<question>"  Show the intent and tool plan, no network
 *   madridista chat               Interactive conversation (REPL)
 *   madridista listen telegram    Start the Telegram listener
 *   madridista config             Interactive setup
 *
 * Or import as a library:
 *   import { createFootballBrain } from "madridista-ai";
 *   const brain = createFootballBrain();
 *   const answer = await brain.answer("When do Real Madrid play next?");
 */

import { realpathSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { createFootballBrain, registryFor } from "./brain.js";
import { classifyIntent, isFootballQuery } from "./intent.js";
import { planTools } from "./arbiter.js";
import { applyConfigToEnv, getConfigDir, runConfigFlow, type ResolvedConfig } from "./config.js";
import { ConversationMemory, FileKeyValueStore, InMemoryKeyValueStore } from "./memory.js";

// ---------------------------------------------------------------------------
// Re-exports for library usage
// ---------------------------------------------------------------------------

export {
  FootballBrain,
  createFootballBrain,
  registryFor,
  answerNlQuestion,
  clampResponse,
  withCitations,
  SCOPE_REFUSAL,
  CANNOT_VERIFY,
  GENERIC_ERROR,
} from "./brain.js";
export type { BrainToolRegistry, FootballBrainOptions } from "./brain.js";
export { classifyIntent, isFootballQuery, looksFactual, preHint } from "./intent.js";
export { planTools, isEmptyPayload, validateRecency, FALLBACK_TOOLS } from "./arbiter.js";
export { runCascade, buildToolArgs } from "./cascade.js";
export type { CascadeOutcome, CascadeOptions, ToolDispatcher } from "./cascade.js";
export { TOOL_SPECS, ToolRegistry, createToolRegistry } from "./tools.js";
export { buildToolHandlers, createClients } from "./handlers.js";
export { AiSdkLlmClient, resolveModel } from "./llm.js";
export { renderPayload } from "./render.js";
export {
  ConversationMemory,
  FileKeyValueStore,
  InMemoryKeyValueStore,
} from "./memory.js";
export type { KeyValueStore, Exchange } from "./memory.js";
export { TelegramListener, routeMessage } from "./listeners/telegram.js";
export {
  loadConfig,
  saveConfig,
  resolveConfig,
  applyConfigToEnv,
  runConfigFlow,
} from "./config.js";
export type { CLIConfig, ResolvedConfig } from "./config.js";
export type {
  LLMProvider,
  MadridistaConfig,
  Intent,
  IntentLabel,
  LlmClient,
  CompletionRequest,
  CompletionResult,
  ToolName,
  ToolSpec,
  ToolPayload,
  ToolSuccess,
  ToolFailure,
  ValidationVerdict,
} from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function printHelp(): void {
  console.log(`${pc.bold("madridista")} — football answers backed by live data

${pc.bold("Usage:")}
  madridista ask "<question>"     Answer one question (default)
  madridista plan "<question>"    Show the intent and tool plan
  madridista chat                 Interactive conversation
  madridista listen telegram      Start the Telegram bot
  madridista config               Interactive setup

${pc.bold("Flags:")}
  -v, --verbose                   Log tool calls to stderr

${pc.bold("Examples:")}
  madridista "When do Real Madrid play next?"
  madridista plan "Last Madrid vs Barcelona result"`);
}

function stripFlags(args: string[]): { rest: string[]; verbose: boolean } {
  const verbose = args.includes("--verbose") || args.includes("-v");
  return { rest: args.filter((a) => a !== "--verbose" && a !== "-v"), verbose };
}

/** Resolve config; with no LLM key anywhere, run the interactive setup first */
async function ensureConfigured(verbose: boolean): Promise<ResolvedConfig> {
  let resolved = applyConfigToEnv();
  if (!resolved.apiKey) {
    await runConfigFlow();
    resolved = applyConfigToEnv();
  }
  if (verbose) resolved.brain.verbose = true;
  return resolved;
}

// ---------------------------------------------------------------------------
// CLI: `madridista plan "<question>"`
// ---------------------------------------------------------------------------

function cmdPlan(args: string[]): void {
  const question = args.join(" ").trim();
  if (!question) {
    console.error('Usage: madridista plan "<question>"');
    process.exit(1);
  }
  if (!isFootballQuery(question)) {
    console.log(`${pc.yellow("out of scope")} — the question would be refused`);
    return;
  }
  const intent = classifyIntent(question);
  console.log(`${pc.bold("intent:")}   ${intent.label}`);
  console.log(`${pc.bold("factual:")}  ${intent.looksFactual ? "yes" : "no"}`);
  if (intent.hint) console.log(`${pc.bold("hint:")}     ${pc.dim(intent.hint)}`);
  console.log(pc.bold("plan:"));
  planTools(question).forEach((tool, i) => {
    console.log(`  ${pc.dim(String(i + 1).padStart(2))}. ${tool}`);
  });
}

// ---------------------------------------------------------------------------
// CLI: `madridista ask "<question>"`
// ---------------------------------------------------------------------------

async function cmdAsk(args: string[]): Promise<void> {
  const { rest, verbose } = stripFlags(args);
  const question = rest.join(" ").trim();
  if (!question) {
    printHelp();
    return;
  }

  const brain = createFootballBrain(await ensureConfigured(verbose));

  if (verbose) {
    console.log(await brain.answer(question));
    return;
  }
  const s = p.spinner();
  s.start("Checking the data...");
  const answer = await brain.answer(question);
  s.stop("Done.");
  console.log(`\n${answer}\n`);
}

// ---------------------------------------------------------------------------
// CLI: `madridista chat`, a REPL with per-session memory
// ---------------------------------------------------------------------------

async function cmdChat(args: string[]): Promise<void> {
  const { verbose } = stripFlags(args);
  const brain = createFootballBrain(await ensureConfigured(verbose));
  const memory = new ConversationMemory(new InMemoryKeyValueStore());
  const chatId = "cli";

  p.intro("madridista chat — type 'exit' or 'quit' to leave");

  while (true) {
    const input = await p.text({ message: "You", placeholder: "Ask about football..." });
    if (p.isCancel(input)) break;
    const question = input.trim();
    if (!question) continue;
    if (question === "exit" || question === "quit") break;

    const s = p.spinner();
    s.start("Checking the data...");
    const answer = await brain.answer(question, await memory.buildSummary(chatId));
    s.stop("Done.");
    console.log(`\n${answer}\n`);
    await memory.append(chatId, question, answer);
  }
  p.outro("Hala Madrid.");
}

// ---------------------------------------------------------------------------
// CLI: `madridista listen telegram`
// ---------------------------------------------------------------------------

async function cmdListen(args: string[]): Promise<void> {
  const { rest, verbose } = stripFlags(args);
  const platform = rest[0]?.toLowerCase();
  if (platform !== "telegram") {
    console.error("Usage: madridista listen telegram");
    process.exit(1);
  }

  const resolved = await ensureConfigured(verbose);
  if (!resolved.telegramBotToken) {
    console.error("Error: TELEGRAM_BOT_TOKEN environment variable is required.");
    console.error("Get one from @BotFather on Telegram.");
    process.exit(1);
  }

  const registry = registryFor(resolved);
  const { TelegramListener } = await import("./listeners/telegram.js");
  const listener = new TelegramListener({
    token: resolved.telegramBotToken,
    brain: createFootballBrain(resolved, registry),
    registry,
    memory: new ConversationMemory(new FileKeyValueStore(join(getConfigDir(), "memory"))),
    allowedUsers: resolved.telegramAllowedUsers,
    config: resolved.brain,
  });

  process.once("SIGINT", () => listener.stop());
  process.once("SIGTERM", () => listener.stop());
  await listener.start();
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case "ask":
      await cmdAsk(args.slice(1));
      break;
    case "plan":
      cmdPlan(stripFlags(args.slice(1)).rest);
      break;
    case "chat":
      await cmdChat(args.slice(1));
      break;
    case "listen":
      await cmdListen(args.slice(1));
      break;
    case "config":
      await runConfigFlow();
      break;
    case "help":
    case "--help":
    case "-h":
      printHelp();
      break;
    case undefined:
      printHelp();
      break;
    default:
      await cmdAsk(args);
  }
}

// Only run the CLI when executed directly, not when imported as a library
function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  const self = fileURLToPath(import.meta.url);
  try {
    return realpathSync(entry) === realpathSync(self);
  } catch {
    return entry === self;
  }
}

if (isDirectRun()) {
  main().catch((error: unknown) => {
    console.error(`[madridista] ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
