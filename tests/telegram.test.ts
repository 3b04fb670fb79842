import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import {
  HELP_TEXT,
  TelegramListener,
  parseUpdate,
  routeMessage,
  type Answerer,
  type TelegramUpdate,
} from "../src/listeners/telegram.js";
import { ConversationMemory, InMemoryKeyValueStore } from "../src/memory.js";
import { MockToolRegistry } from "./mocks/MockToolRegistry.js";

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();
vi.stubGlobal("fetch", mockFetch);

/** Answer every Bot API call with `{ ok: true, result }` */
function telegramApi(results: Record<string, unknown> = {}): void {
  mockFetch.mockImplementation(async (input) => {
    const method = String(input).split("/").pop() ?? "";
    return new Response(JSON.stringify({ ok: true, result: results[method] ?? true }), {
      status: 200,
      headers: { "Content-Type": "application/json" },
    });
  });
}

/** Bodies of every call made to one Bot API method */
function bodiesOf(method: string): unknown[] {
  return mockFetch.mock.calls
    .filter(([input]) => String(input).endsWith(`/${method}`))
    .map(([, init]) => JSON.parse(String(init?.body)));
}

function message(text: string, overrides: { chatType?: string; fromId?: number } = {}): TelegramUpdate {
  return {
    update_id: 1,
    message: {
      message_id: 3,
      chat: { id: 7, type: overrides.chatType ?? "private" },
      text,
      from: { id: overrides.fromId ?? 100 },
    },
  };
}

describe("routeMessage", () => {
  it("should treat any private message as a question", () => {
    expect(routeMessage("  When do Madrid play?  ", "private")).toEqual({
      kind: "question",
      text: "When do Madrid play?",
    });
  });

  it("should answer /start and /help with help", () => {
    expect(routeMessage("/start", "private")).toEqual({ kind: "help" });
    expect(routeMessage("/help@madridista_bot", "group", "madridista_bot")).toEqual({ kind: "help" });
  });

  it("should ignore commands addressed to another bot", () => {
    expect(routeMessage("/table@other_bot", "group", "madridista_bot")).toBeNull();
  });

  it("should route data shortcuts with their argument", () => {
    expect(routeMessage("/matches Arsenal", "private")).toEqual({
      kind: "shortcut",
      command: "/matches",
      argument: "Arsenal",
    });
    expect(routeMessage("/TABLE", "group")).toEqual({ kind: "shortcut", command: "/table", argument: "" });
  });

  it("should need a question after /ask", () => {
    expect(routeMessage("/ask Who won in 1960?", "group")).toEqual({
      kind: "question",
      text: "Who won in 1960?",
    });
    expect(routeMessage("/ask", "group")).toEqual({ kind: "help" });
  });

  it("should ignore unknown commands and blank text", () => {
    expect(routeMessage("/weather", "private")).toBeNull();
    expect(routeMessage("   ", "private")).toBeNull();
  });

  it("should only answer group messages that mention the bot", () => {
    expect(routeMessage("who won?", "group", "madridista_bot")).toBeNull();
    expect(routeMessage("@madridista_bot who won?", "supergroup", "madridista_bot")).toEqual({
      kind: "question",
      text: "who won?",
    });
    expect(routeMessage("@Madridista_Bot", "group", "madridista_bot")).toEqual({ kind: "help" });
  });
});

describe("parseUpdate", () => {
  it("should narrow a message update", () => {
    expect(
      parseUpdate({
        update_id: 10,
        message: {
          message_id: 3,
          chat: { id: -5, type: "group" },
          text: "hola",
          from: { id: 100, first_name: "Ana", is_bot: false },
        },
      })
    ).toEqual({
      update_id: 10,
      message: {
        message_id: 3,
        chat: { id: -5, type: "group" },
        text: "hola",
        from: { id: 100, first_name: "Ana" },
      },
    });
  });

  it("should keep the id of updates without a usable message", () => {
    expect(parseUpdate({ update_id: 11, edited_message: {} })).toEqual({ update_id: 11 });
  });

  it("should reject values without an update id", () => {
    expect(parseUpdate({ message: {} })).toBeNull();
    expect(parseUpdate("junk")).toBeNull();
  });
});

describe("TelegramListener", () => {
  let answer: Mock<Answerer["answer"]>;
  let registry: MockToolRegistry;

  beforeEach(() => {
    mockFetch.mockReset();
    telegramApi({ getMe: { id: 1, username: "madridista_bot" } });
    answer = vi.fn<Answerer["answer"]>(async () => "Sunday.");
    registry = new MockToolRegistry({
      tool_table: {
        ok: true,
        __source: "Football-Data",
        competition: "LaLiga",
        rows: [{ pos: 1, team: "Real Madrid CF", pts: 24 }],
      },
    });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  function listener(extra: { allowedUsers?: string[]; memory?: ConversationMemory } = {}) {
    return new TelegramListener({ token: "test-token", brain: { answer }, registry, ...extra });
  }

  it("should call the Bot API under the token", async () => {
    expect(await listener().identify()).toBe("madridista_bot");
    expect(String(mockFetch.mock.calls[0][0])).toBe("https://api.telegram.org/bottest-token/getMe");
  });

  it("should answer questions as a reply and remember the exchange", async () => {
    const memory = new ConversationMemory(new InMemoryKeyValueStore());
    const bot = listener({ memory });

    await bot.handleUpdate(message("When do Madrid play next?"));
    await bot.handleUpdate(message("Against whom?"));

    expect(answer).toHaveBeenNthCalledWith(1, "When do Madrid play next?", "");
    expect(answer).toHaveBeenNthCalledWith(
      2,
      "Against whom?",
      "User: When do Madrid play next?\nAssistant: Sunday."
    );
    expect(bodiesOf("sendChatAction")[0]).toEqual({ chat_id: 7, action: "typing" });
    expect(bodiesOf("sendMessage")[0]).toEqual({ chat_id: 7, text: "Sunday.", reply_to_message_id: 3 });
  });

  it("should send help without asking the brain", async () => {
    await listener().handleUpdate(message("/help"));

    expect(answer).not.toHaveBeenCalled();
    expect(bodiesOf("sendMessage")).toEqual([{ chat_id: 7, text: HELP_TEXT, reply_to_message_id: 3 }]);
  });

  it("should ignore users outside the whitelist", async () => {
    await listener({ allowedUsers: ["1"] }).handleUpdate(message("When do Madrid play next?", { fromId: 2 }));

    expect(answer).not.toHaveBeenCalled();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should answer shortcuts straight from the data tools", async () => {
    await listener().handleUpdate(message("/table"));

    expect(answer).not.toHaveBeenCalled();
    expect(registry.calls).toEqual([{ name: "tool_table", args: {} }]);
    expect(bodiesOf("sendMessage")[0]).toEqual({
      chat_id: 7,
      text: "• pos: 1 | team: Real Madrid CF | pts: 24\n\n(Football-Data)",
      reply_to_message_id: 3,
    });
  });

  it("should pass on the tool's message when a shortcut finds nothing", async () => {
    await listener().handleUpdate(message("/live"));

    expect(registry.calledTools()).toEqual(["tool_live_now"]);
    expect(bodiesOf("sendMessage")[0]).toMatchObject({ text: "No data from tool_live_now" });
  });

  it("should apologise in the chat when answering fails", async () => {
    answer.mockRejectedValueOnce(new Error("boom"));

    await listener().handleUpdate(message("When do Madrid play next?"));

    expect(bodiesOf("sendMessage")).toEqual([
      {
        chat_id: 7,
        text: "Sorry, I encountered an error processing your request.",
        reply_to_message_id: 3,
      },
    ]);
    expect(console.error).toHaveBeenCalledWith("[madridista] Telegram error: boom");
  });

  it("should ignore group chatter once it knows its name", async () => {
    const bot = listener();
    await bot.identify();
    mockFetch.mockClear();

    await bot.handleUpdate(message("great game", { chatType: "group" }));

    expect(answer).not.toHaveBeenCalled();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should advance the polling offset past every update", async () => {
    telegramApi({
      getUpdates: [
        { update_id: 10, message: { message_id: 1, chat: { id: 7, type: "private" }, text: "hi" } },
        { update_id: 11 },
        { nothing: true },
      ],
    });
    const bot = listener();

    const updates = await bot.pollOnce();
    await bot.pollOnce();

    expect(updates.map((u) => u.update_id)).toEqual([10, 11]);
    expect(bodiesOf("getUpdates")).toEqual([
      { offset: 0, timeout: 30, allowed_updates: ["message"] },
      { offset: 12, timeout: 30, allowed_updates: ["message"] },
    ]);
  });
});
