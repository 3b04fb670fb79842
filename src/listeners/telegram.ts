/**
 * madridista — Telegram Listener
 *
 * Long-polls the Telegram Bot API and answers with the football brain.
 *   - private chats: every message is a question
 *   - groups: `/ask <question>` or a message mentioning the bot
 *   - `/start`, `/help`, and the data shortcuts `/matches`, `/table`, `/live`
 *
 * Talks to the Telegram Bot API directly with fetch.
 *
 * Environment:
 *   TELEGRAM_BOT_TOKEN   Bot token from @BotFather
 *   ALLOWED_USERS        Comma-separated Telegram user IDs (optional whitelist)
 */

import type { MadridistaConfig, ToolName } from "../types.js";
import { withDefaults } from "../types.js";
import { runCascade, type ToolDispatcher } from "../cascade.js";
import { renderPayload } from "../render.js";
import { withCitations } from "../brain.js";
import type { ConversationMemory } from "../memory.js";
import { asArray, asNumber, asString, pick } from "../providers/http.js";
import { sleep, splitMessage } from "../utils.js";

export const TELEGRAM_MAX_MESSAGE = 4096;

export const HELP_TEXT = [
  "⚽ MadridistaAI answers football questions with live data.",
  "",
  "Ask anything: \"When do Madrid play next?\", \"LaLiga table\", \"Who won the 1960 European Cup?\"",
  "",
  "Shortcuts:",
  "/matches [team] — next fixture",
  "/table [competition] — league table",
  "/live [team] — match in progress",
  "/ask <question> — ask in a group chat",
].join("\n");

// ---------------------------------------------------------------------------
// Telegram API types
// ---------------------------------------------------------------------------

export interface TelegramMessage {
  message_id: number;
  chat: { id: number; type: string };
  text?: string;
  from?: { id: number; first_name?: string };
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

/** Narrow one raw update from getUpdates; null when it carries nothing we use */
export function parseUpdate(raw: unknown): TelegramUpdate | null {
  const updateId = asNumber(pick(raw, "update_id"));
  if (updateId === undefined) return null;
  const messageId = asNumber(pick(raw, "message", "message_id"));
  const chatId = asNumber(pick(raw, "message", "chat", "id"));
  if (messageId === undefined || chatId === undefined) return { update_id: updateId };
  const fromId = asNumber(pick(raw, "message", "from", "id"));
  return {
    update_id: updateId,
    message: {
      message_id: messageId,
      chat: { id: chatId, type: asString(pick(raw, "message", "chat", "type")) ?? "private" },
      text: asString(pick(raw, "message", "text")),
      from:
        fromId !== undefined
          ? { id: fromId, first_name: asString(pick(raw, "message", "from", "first_name")) }
          : undefined,
    },
  };
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export type Route =
  | { kind: "help" }
  | { kind: "shortcut"; command: ShortcutCommand; argument: string }
  | { kind: "question"; text: string };

type ShortcutCommand = "/matches" | "/table" | "/live";

interface Shortcut {
  plan: ToolName[];
  /** Question the cascade validates against; the argument is appended */
  question: string;
}

const SHORTCUTS: Record<ShortcutCommand, Shortcut> = {
  "/matches": { plan: ["tool_af_next_fixture", "tool_next_fixture"], question: "next fixture" },
  "/table": { plan: ["tool_table"], question: "table" },
  "/live": { plan: ["tool_live_now"], question: "live now" },
};

function isShortcut(command: string): command is ShortcutCommand {
  return command === "/matches" || command === "/table" || command === "/live";
}

/**
 * Decide what to do with a message. Commands may carry a "@botname"
 * suffix in groups; in groups a plain message is only answered when it
 * mentions the bot.
 */
export function routeMessage(
  text: string,
  chatType: string,
  botUsername?: string
): Route | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const commandMatch = /^(\/[a-z_]+)(?:@([\w_]+))?(?:\s+([\s\S]*))?$/i.exec(trimmed);
  if (commandMatch) {
    const command = commandMatch[1].toLowerCase();
    const addressedTo = commandMatch[2];
    const argument = (commandMatch[3] ?? "").trim();
    if (addressedTo && botUsername && addressedTo.toLowerCase() !== botUsername.toLowerCase()) {
      return null;
    }
    if (command === "/start" || command === "/help") return { kind: "help" };
    if (isShortcut(command)) return { kind: "shortcut", command, argument };
    if (command === "/ask") return argument ? { kind: "question", text: argument } : { kind: "help" };
    return null;
  }

  if (chatType === "private") return { kind: "question", text: trimmed };

  if (botUsername) {
    const mention = new RegExp(`@${botUsername}\\b`, "i");
    if (mention.test(trimmed)) {
      const question = trimmed.replace(mention, "").trim();
      return question ? { kind: "question", text: question } : { kind: "help" };
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Listener
// ---------------------------------------------------------------------------

export interface Answerer {
  answer(text: string, contextSummary?: string): Promise<string>;
}

export interface TelegramListenerOptions {
  token: string;
  brain: Answerer;
  registry: ToolDispatcher;
  memory?: ConversationMemory;
  allowedUsers?: string[];
  config?: MadridistaConfig;
  /** Long-poll timeout in seconds (default: 30) */
  pollTimeoutSec?: number;
}

export class TelegramListener {
  private apiBase: string;
  private brain: Answerer;
  private registry: ToolDispatcher;
  private memory?: ConversationMemory;
  private allowedUsers: Set<string> | null;
  private config: Required<MadridistaConfig>;
  private pollTimeoutSec: number;
  private offset = 0;
  private running = false;
  private botUsername?: string;

  constructor(options: TelegramListenerOptions) {
    this.apiBase = `https://api.telegram.org/bot${options.token}`;
    this.brain = options.brain;
    this.registry = options.registry;
    this.memory = options.memory;
    this.allowedUsers =
      options.allowedUsers && options.allowedUsers.length > 0 ? new Set(options.allowedUsers) : null;
    this.config = withDefaults(options.config);
    this.pollTimeoutSec = options.pollTimeoutSec ?? 30;
  }

  private async call(method: string, body: Record<string, unknown>): Promise<unknown> {
    const res = await fetch(`${this.apiBase}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      throw new Error(`Telegram ${method} failed (${res.status}): ${await res.text()}`);
    }
    const json: unknown = await res.json();
    return pick(json, "result");
  }

  /** Resolve the bot's username so group mentions can be recognised */
  async identify(): Promise<string | undefined> {
    const me = await this.call("getMe", {});
    this.botUsername = asString(pick(me, "username"));
    return this.botUsername;
  }

  async sendMessage(chatId: number, text: string, replyTo?: number): Promise<void> {
    for (const chunk of splitMessage(text, TELEGRAM_MAX_MESSAGE)) {
      const body: Record<string, unknown> = { chat_id: chatId, text: chunk };
      if (replyTo) body.reply_to_message_id = replyTo;
      await this.call("sendMessage", body);
    }
  }

  private async sendTyping(chatId: number): Promise<void> {
    try {
      await this.call("sendChatAction", { chat_id: chatId, action: "typing" });
    } catch (err: unknown) {
      if (this.config.verbose) {
        console.error(`[madridista] typing indicator failed: ${err instanceof Error ? err.message : err}`);
      }
    }
  }

  /** Fetch one batch of updates and advance the offset past all of them */
  async pollOnce(): Promise<TelegramUpdate[]> {
    const result = await this.call("getUpdates", {
      offset: this.offset,
      timeout: this.pollTimeoutSec,
      allowed_updates: ["message"],
    });
    const updates = asArray(result)
      .map(parseUpdate)
      .filter((u): u is TelegramUpdate => u !== null);
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
    }
    return updates;
  }

  private async runShortcut(command: ShortcutCommand, argument: string): Promise<string> {
    const shortcut = SHORTCUTS[command];
    const question = argument ? `${argument} ${shortcut.question}` : shortcut.question;
    const outcome = await runCascade(shortcut.plan, question, this.registry, {
      defaultTeam: this.config.defaultTeam,
      verbose: this.config.verbose,
      maxResultAgeDays: this.config.maxResultAgeDays,
    });
    if (outcome.tool === null) {
      return outcome.firstFailureMessage ?? "No data available right now.";
    }
    const text = renderPayload(outcome.payload);
    return this.config.citations ? withCitations(text, outcome.sources) : text;
  }

  /** Handle one update end to end; errors are reported to the chat, not thrown */
  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const msg = update.message;
    if (!msg?.text) return;

    if (this.allowedUsers && !(msg.from && this.allowedUsers.has(String(msg.from.id)))) {
      return;
    }

    const route = routeMessage(msg.text, msg.chat.type, this.botUsername);
    if (!route) return;

    try {
      if (route.kind === "help") {
        await this.sendMessage(msg.chat.id, HELP_TEXT, msg.message_id);
        return;
      }

      await this.sendTyping(msg.chat.id);

      if (route.kind === "shortcut") {
        const reply = await this.runShortcut(route.command, route.argument);
        await this.sendMessage(msg.chat.id, reply, msg.message_id);
        return;
      }

      const chatKey = String(msg.chat.id);
      const summary = this.memory ? await this.memory.buildSummary(chatKey) : "";
      const reply = await this.brain.answer(route.text, summary);
      await this.sendMessage(msg.chat.id, reply, msg.message_id);
      if (this.memory) await this.memory.append(chatKey, route.text, reply);
    } catch (error: unknown) {
      const errMsg = error instanceof Error ? error.message : String(error);
      console.error(`[madridista] Telegram error: ${errMsg}`);
      try {
        await this.sendMessage(
          msg.chat.id,
          "Sorry, I encountered an error processing your request.",
          msg.message_id
        );
      } catch (sendErr: unknown) {
        console.error(
          `[madridista] could not report error to chat ${msg.chat.id}: ${sendErr instanceof Error ? sendErr.message : sendErr}`
        );
      }
    }
  }

  /** Poll until `stop()` is called. Network errors back off for 5 s. */
  async start(): Promise<void> {
    this.running = true;
    const name = await this.identify();
    console.error(`[madridista] Telegram bot connected as @${name ?? "unknown"}`);

    while (this.running) {
      try {
        const updates = await this.pollOnce();
        // Messages are answered in order; one slow answer delays the next
        for (const update of updates) {
          await this.handleUpdate(update);
        }
      } catch (error: unknown) {
        const errMsg = error instanceof Error ? error.message : String(error);
        console.error(`[madridista] Polling error: ${errMsg}`);
        await sleep(5000);
      }
    }
  }

  stop(): void {
    this.running = false;
  }
}
