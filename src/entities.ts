/**
 * Entity resolution
 *
 * Maps free text onto the teams and competitions the data providers know.
 * Alias tables live in data/*.json and are loaded once on first use.
 */

import { readDataFile, isRecord, isStringArray } from "./data.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TeamEntry {
  name: string;
  footballDataId?: number;
  apiFootballId?: number;
  sofascoreId?: number;
  /** Club name as ClubElo spells it in its URLs */
  clubElo?: string;
  aliases: string[];
}

export interface CompetitionEntry {
  name: string;
  footballDataCode: string;
  apiFootballId: number;
  aliases: string[];
}

interface AliasMatch<T> {
  entry: T;
  index: number;
}

// ---------------------------------------------------------------------------
// Data loading
// ---------------------------------------------------------------------------

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function parseTeams(raw: unknown): TeamEntry[] {
  if (!Array.isArray(raw)) throw new Error("teams.json must be an array");
  return raw.map((item, idx) => {
    if (!isRecord(item) || typeof item.name !== "string" || !isStringArray(item.aliases)) {
      throw new Error(`teams.json: invalid entry at index ${idx}`);
    }
    return {
      name: item.name,
      footballDataId: optionalNumber(item.footballDataId),
      apiFootballId: optionalNumber(item.apiFootballId),
      sofascoreId: optionalNumber(item.sofascoreId),
      clubElo: typeof item.clubElo === "string" ? item.clubElo : undefined,
      aliases: item.aliases.map((a) => a.toLowerCase()),
    };
  });
}

function parseCompetitions(raw: unknown): CompetitionEntry[] {
  if (!Array.isArray(raw)) throw new Error("competitions.json must be an array");
  return raw.map((item, idx) => {
    if (
      !isRecord(item) ||
      typeof item.name !== "string" ||
      typeof item.footballDataCode !== "string" ||
      typeof item.apiFootballId !== "number" ||
      !isStringArray(item.aliases)
    ) {
      throw new Error(`competitions.json: invalid entry at index ${idx}`);
    }
    return {
      name: item.name,
      footballDataCode: item.footballDataCode,
      apiFootballId: item.apiFootballId,
      aliases: item.aliases.map((a) => a.toLowerCase()),
    };
  });
}

let teamsCache: TeamEntry[] | null = null;
let competitionsCache: CompetitionEntry[] | null = null;

export function loadTeams(): TeamEntry[] {
  if (!teamsCache) {
    teamsCache = parseTeams(readDataFile("teams.json"));
  }
  return teamsCache;
}

export function loadCompetitions(): CompetitionEntry[] {
  if (!competitionsCache) {
    competitionsCache = parseCompetitions(readDataFile("competitions.json"));
  }
  return competitionsCache;
}

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

export function normalizeText(value: string): string {
  return value.toLowerCase().replace(/\s+/g, " ").trim();
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a matcher for a phrase bounded by non-word characters. Unicode-aware,
 * so "barça" and "atlético" match like plain ASCII words. A trailing "*"
 * turns the phrase into a prefix ("goal*" matches "goals", "goalkeeper").
 */
export function phrasePattern(phrase: string, flags = "u"): RegExp {
  const prefix = phrase.endsWith("*");
  const body = escapeRegex(prefix ? phrase.slice(0, -1) : phrase).replace(/ /g, "\\s+");
  const tail = prefix ? "" : "(?![\\p{L}\\p{N}])";
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}${tail}`, flags);
}

export function containsPhrase(text: string, phrase: string): boolean {
  return phrasePattern(phrase).test(text);
}

export function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((p) => containsPhrase(text, p));
}

// ---------------------------------------------------------------------------
// Alias scanning
// ---------------------------------------------------------------------------

/**
 * Find every entry whose alias occurs in the text, ordered by position.
 * Longer aliases claim their span first so "atletico madrid" never also
 * yields "madrid".
 */
function scanAliases<T extends { aliases: string[] }>(text: string, entries: T[]): AliasMatch<T>[] {
  const lower = text.toLowerCase();
  const candidates: { alias: string; entry: T }[] = [];
  for (const entry of entries) {
    for (const alias of entry.aliases) candidates.push({ alias, entry });
  }
  candidates.sort((a, b) => b.alias.length - a.alias.length);

  const claimed: Array<[number, number]> = [];
  const found: AliasMatch<T>[] = [];
  for (const { alias, entry } of candidates) {
    const re = phrasePattern(alias, "gu");
    for (const m of lower.matchAll(re)) {
      const start = m.index ?? 0;
      const end = start + m[0].length;
      if (claimed.some(([s, e]) => start < e && end > s)) continue;
      claimed.push([start, end]);
      found.push({ entry, index: start });
    }
  }

  found.sort((a, b) => a.index - b.index);
  const seen = new Set<T>();
  return found.filter((f) => {
    if (seen.has(f.entry)) return false;
    seen.add(f.entry);
    return true;
  });
}

/** Teams mentioned in the text, in order of first appearance */
export function extractTeams(text: string): TeamEntry[] {
  return scanAliases(text, loadTeams()).map((m) => m.entry);
}

export function findTeam(name: string): TeamEntry | undefined {
  const norm = normalizeText(name);
  if (!norm) return undefined;
  const teams = loadTeams();
  const exact = teams.find(
    (t) => t.name.toLowerCase() === norm || t.aliases.includes(norm)
  );
  return exact ?? extractTeams(norm)[0];
}

export function findCompetition(text: string): CompetitionEntry | undefined {
  return scanAliases(text, loadCompetitions())[0]?.entry;
}

export function mentionsKnownEntity(text: string): boolean {
  return extractTeams(text).length > 0 || findCompetition(text) !== undefined;
}

// ---------------------------------------------------------------------------
// Outcome winner extraction
// ---------------------------------------------------------------------------

const WIN_VERBS = ["beat", "beats", "defeated", "defeat", "won against", "thrashed", "knocked out"];
const LOSS_VERBS = ["lost to", "lost against", "were beaten by", "was beaten by"];

/**
 * Detect the winning side in outcome phrasing: "when X beat Y",
 * "X defeated Y", "X won against Y", "Y lost to X".
 */
export function extractWinner(text: string): TeamEntry | undefined {
  const lower = text.toLowerCase();
  const mentions = scanAliases(lower, loadTeams());
  if (mentions.length === 0) return undefined;

  for (const verb of WIN_VERBS) {
    const m = phrasePattern(verb).exec(lower);
    if (!m) continue;
    const before = mentions.filter((t) => t.index < m.index);
    if (before.length > 0) return before[before.length - 1].entry;
  }

  for (const verb of LOSS_VERBS) {
    const m = phrasePattern(verb).exec(lower);
    if (!m) continue;
    const after = mentions.find((t) => t.index > m.index);
    if (after) return after.entry;
  }

  return undefined;
}

// ---------------------------------------------------------------------------
// Person names
// ---------------------------------------------------------------------------

const NAME_RE = /\p{Lu}[\p{L}'’-]*(?:\s+(?:de\s+|da\s+|van\s+|von\s+)?\p{Lu}[\p{L}'’-]*)*/gu;
const NAME_STOPWORDS = new Set([
  "what", "who", "whos", "who's", "how", "when", "where", "which", "why", "is", "are",
  "does", "did", "do", "compare", "show", "tell", "give", "list", "and", "vs", "versus",
  "the", "stats", "goals", "assists", "i", "me", "can", "should", "has", "have",
]);

/**
 * Capitalized name sequences that are not teams or competitions:
 * "Compare Mbappé and Erling Haaland" → ["Mbappé", "Erling Haaland"].
 */
export function extractPersonNames(text: string): string[] {
  const names: string[] = [];
  for (const m of text.matchAll(NAME_RE)) {
    const words = m[0].split(/\s+/);
    while (words.length > 0 && NAME_STOPWORDS.has(words[0].toLowerCase())) words.shift();
    const name = words.join(" ");
    if (!name || NAME_STOPWORDS.has(name.toLowerCase())) continue;
    if (extractTeams(name).length > 0 || findCompetition(name)) continue;
    if (!names.includes(name)) names.push(name);
  }
  return names;
}
