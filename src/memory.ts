/**
 * Key-value store and per-chat conversation memory
 *
 * Storage layout (file backend):
 *   ~/.madridista/memory/<key>.json
 *
 * The store is an explicit object handed to whoever needs it; nothing here
 * is a module-level singleton. All file I/O is async so the listener's
 * event loop never blocks on disk.
 */

import { mkdir, readFile, writeFile, rm } from "node:fs/promises";
import { join } from "node:path";

// ---------------------------------------------------------------------------
// Key-value store
// ---------------------------------------------------------------------------

export interface KeyValueStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private data = new Map<string, string>();

  async get(key: string): Promise<unknown> {
    const raw = this.data.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  /** Values are stored as JSON; every get returns a fresh copy */
  async set(key: string, value: unknown): Promise<void> {
    this.data.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileKeyValueStore implements KeyValueStore {
  private dir: string;
  private dirReady: Promise<void>;

  constructor(dir: string) {
    this.dir = dir;
    this.dirReady = mkdir(dir, { recursive: true }).then(() => {});
  }

  private pathFor(key: string): string {
    return join(this.dir, `${sanitizeKey(key)}.json`);
  }

  /**
   * Read a key, returning undefined if it doesn't exist.
   * Only swallows ENOENT; all other errors propagate.
   */
  async get(key: string): Promise<unknown> {
    await this.dirReady;
    try {
      return JSON.parse(await readFile(this.pathFor(key), "utf-8"));
    } catch (err: unknown) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.dirReady;
    await writeFile(this.pathFor(key), JSON.stringify(value, null, 2) + "\n", "utf-8");
  }

  async delete(key: string): Promise<void> {
    await this.dirReady;
    await rm(this.pathFor(key), { force: true });
  }
}

/**
 * Sanitize a key for safe use as a file name.
 * Appends a hash suffix when characters are replaced.
 */
export function sanitizeKey(key: string): string {
  const safe = key.replace(/[^a-zA-Z0-9_-]/g, "_").slice(0, 128);
  if (safe !== key) {
    let hash = 0;
    for (let i = 0; i < key.length; i++) {
      hash = ((hash << 5) - hash + key.charCodeAt(i)) | 0;
    }
    const suffix = Math.abs(hash).toString(36).slice(0, 6);
    return `${safe.slice(0, 121)}_${suffix}`;
  }
  return safe;
}

// ---------------------------------------------------------------------------
// Conversation memory
// ---------------------------------------------------------------------------

export interface Exchange {
  question: string;
  answer: string;
  /** ISO timestamp */
  at: string;
}

export interface ConversationMemoryOptions {
  /** Exchanges kept per chat (default: 5) */
  maxExchanges?: number;
  /** Each side of an exchange is cut to this many characters in the summary (default: 280) */
  maxChars?: number;
}

function isExchange(value: unknown): value is Exchange {
  return (
    typeof value === "object" &&
    value !== null &&
    "question" in value &&
    "answer" in value &&
    "at" in value &&
    typeof value.question === "string" &&
    typeof value.answer === "string" &&
    typeof value.at === "string"
  );
}

function cut(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

export class ConversationMemory {
  private store: KeyValueStore;
  private maxExchanges: number;
  private maxChars: number;

  constructor(store: KeyValueStore, options: ConversationMemoryOptions = {}) {
    this.store = store;
    this.maxExchanges = options.maxExchanges ?? 5;
    this.maxChars = options.maxChars ?? 280;
  }

  private key(chatId: string): string {
    return `chat-${chatId}`;
  }

  async history(chatId: string): Promise<Exchange[]> {
    const raw = await this.store.get(this.key(chatId));
    return Array.isArray(raw) ? raw.filter(isExchange) : [];
  }

  async append(chatId: string, question: string, answer: string): Promise<void> {
    const exchanges = await this.history(chatId);
    exchanges.push({ question, answer, at: new Date().toISOString() });
    await this.store.set(this.key(chatId), exchanges.slice(-this.maxExchanges));
  }

  async clear(chatId: string): Promise<void> {
    await this.store.delete(this.key(chatId));
  }

  /** Recent exchanges as plain text, oldest first; empty when there are none */
  async buildSummary(chatId: string): Promise<string> {
    const exchanges = await this.history(chatId);
    return exchanges
      .map((e) => `User: ${cut(e.question, this.maxChars)}\nAssistant: ${cut(e.answer, this.maxChars)}`)
      .join("\n");
  }
}
