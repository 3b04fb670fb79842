/**
 * Intent classifier
 *
 * Pure keyword heuristics over the question text. Sub-intents are detected
 * independently and may overlap ("beat" counts as last-result, history and
 * comparison language at once); precedence is decided by fixed order in
 * the label, the hint and the planner.
 */

import type { Intent, IntentLabel, IntentSignals } from "./types.js";
import { readDataFile, isRecord, isStringArray } from "./data.js";
import { containsAny, mentionsKnownEntity, normalizeText } from "./entities.js";

// ---------------------------------------------------------------------------
// Vocabulary
// ---------------------------------------------------------------------------

const YEAR_RE = /\b(19\d{2}|20\d{2})\b/;

const LIVE_WORDS = ["live", "now", "right now", "currently", "minute", "ht", "ft", "in play"];
const NEXT_WORDS = ["next", "upcoming", "who do", "fixture", "fixtures", "play next", "schedule"];
const LAST_WORDS = [
  "last", "previous", "most recent", "result", "results", "score", "scores",
  "final score", "ft", "ended", "beat", "defeated", "won", "happened when",
];
const NEWS_WORDS = [
  "news", "headline", "headlines", "rumor", "rumors", "rumour", "rumours",
  "transfer", "transfers", "breaking",
];
const HISTORY_WORDS = [
  "history", "historical", "winner", "winners", "champion", "finals", "season",
  "decade", "record", "happened when", "beat", "defeated", "won", "past", "ago",
];
const PLAYER_WORDS = ["player", "players", "stats", "per 90", "goals", "assists", "rating", "ratings"];
const COMPARE_WORDS = [
  "compare", "comparison", "vs", "versus", "h2h", "head to head", "head-to-head",
  "last score between", "last result between", "beat", "defeated", "won against", "between",
];

/** Explicit "did X beat Y" language that makes a comparison an outcome lookup */
export const OUTCOME_WORDS = ["happened when", "beat", "defeated", "defeat", "won against", "when did"];

const H2H_WORDS = [
  "h2h", "head to head", "head-to-head", "last score between", "last result between",
  "record against", "record vs",
];
const LINEUP_WORDS = ["lineup", "lineups", "line-up", "line-ups", "line up", "xi", "starting eleven"];
const INJURY_WORDS = ["injur*", "unavailable", "sidelined", "ruled out", "fitness", "out injured"];
const SQUAD_WORDS = ["squad", "squad list", "roster", "goalkeepers", "defenders", "midfielders", "forwards"];
const ELO_WORDS = ["elo", "club elo", "clubelo", "strength rating", "power ranking", "world ranking"];
const DEFINITION_RE = /^\s*(what\s+is|what's|whats|what\s+are|explain|define|meaning\s+of|how\s+does)\b/i;
const LAST_N_WINNERS_RE =
  /\b(last|past|previous)\s+(\d+|few|ten|five|three)\s+(?:[\p{L}'-]+\s+){0,4}(winners|champions)\b/iu;

interface Vocabulary {
  football: string[];
  factual: string[];
}

let vocabularyCache: Vocabulary | null = null;

function loadVocabulary(): Vocabulary {
  if (vocabularyCache) return vocabularyCache;
  const raw = readDataFile("vocabulary.json");
  if (!isRecord(raw) || !isStringArray(raw.football) || !isStringArray(raw.factual)) {
    throw new Error("vocabulary.json must hold string arrays `football` and `factual`");
  }
  vocabularyCache = { football: raw.football, factual: raw.factual };
  return vocabularyCache;
}

// ---------------------------------------------------------------------------
// Gates
// ---------------------------------------------------------------------------

/** Scope gate: does the text mention anything football at all? */
export function isFootballQuery(text: string): boolean {
  const t = normalizeText(text);
  if (!t) return false;
  return containsAny(t, loadVocabulary().football) || mentionsKnownEntity(t);
}

/**
 * Does the question demand externally verified data? A year or any
 * fact-indicating word makes it factual; definitions and opinions do not.
 */
export function looksFactual(text: string): boolean {
  const t = normalizeText(text);
  return YEAR_RE.test(t) || containsAny(t, loadVocabulary().factual);
}

// ---------------------------------------------------------------------------
// Sub-intents
// ---------------------------------------------------------------------------

export function detectSignals(text: string): IntentSignals {
  const t = normalizeText(text);
  return {
    live: containsAny(t, LIVE_WORDS),
    next: containsAny(t, NEXT_WORDS),
    last: containsAny(t, LAST_WORDS),
    news: containsAny(t, NEWS_WORDS),
    history: YEAR_RE.test(t) || containsAny(t, HISTORY_WORDS),
    players: containsAny(t, PLAYER_WORDS),
    compare: containsAny(t, COMPARE_WORDS),
  };
}

export type TeamDataTopic = "injuries" | "squad" | "elo";

/** Questions about a team's injury list, squad or Elo rating */
export function teamDataTopic(text: string): TeamDataTopic | null {
  const t = normalizeText(text);
  if (containsAny(t, INJURY_WORDS)) return "injuries";
  if (containsAny(t, SQUAD_WORDS)) return "squad";
  if (containsAny(t, ELO_WORDS)) return "elo";
  return null;
}

const TEAM_DATA_HINTS: Record<TeamDataTopic, string> = {
  injuries: "Use tool_injuries.",
  squad: "Use tool_squad; pass position to list one line of the team.",
  elo: "Use tool_club_elo.",
};

export function hasOutcomeLanguage(text: string): boolean {
  return containsAny(normalizeText(text), OUTCOME_WORDS);
}

function hasHeadToHeadLanguage(text: string): boolean {
  return containsAny(text, H2H_WORDS);
}

// ---------------------------------------------------------------------------
// Advisory hint
// ---------------------------------------------------------------------------

/** Pick the single advisory hint by fixed priority; null when nothing fits. */
export function preHint(text: string, signals: IntentSignals = detectSignals(text)): string | null {
  const t = normalizeText(text);

  if (LAST_N_WINNERS_RE.test(t)) {
    return 'Use tool_history_lookup with query "List of European Cup and UEFA Champions League finals" (or the matching competition) and read the most recent winners from the extract.';
  }
  if (hasHeadToHeadLanguage(t)) {
    return "Use tool_af_last_result_vs first, then tool_h2h_officialish.";
  }
  if (containsAny(t, ["happened when", "when did"]) || (signals.compare && hasOutcomeLanguage(t))) {
    return "Use tool_af_find_match_result with team_a, team_b and winner first, then tool_af_last_result_vs.";
  }
  if (signals.history) {
    return "Use tool_history_lookup for historical facts; pass the question as the query.";
  }
  const topic = teamDataTopic(t);
  if (topic) {
    return TEAM_DATA_HINTS[topic];
  }
  if (signals.news) {
    return "Use tool_news_top.";
  }
  if (signals.compare) {
    return "Use tool_compare_teams or tool_h2h_summary for teams, tool_compare_players for players.";
  }
  if (containsAny(t, LINEUP_WORDS)) {
    return "Use tool_next_lineups.";
  }
  if (signals.players) {
    return "Use tool_player_stats or tool_compare_players.";
  }
  if (signals.next) {
    return "Use tool_af_next_fixture first, then tool_next_fixture.";
  }
  if (signals.last) {
    return "Use tool_af_last_result first, then tool_last_result.";
  }
  if (DEFINITION_RE.test(t)) {
    return "If this is a football term, tool_glossary may define it; otherwise answer briefly from general knowledge.";
  }
  return null;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function pickLabel(text: string, signals: IntentSignals): IntentLabel {
  if (signals.compare && hasOutcomeLanguage(text)) return "head_to_head";
  if (signals.live) return "live";
  if (signals.next) return "next_fixture";
  if (signals.last) return "last_result";
  if (signals.news) return "news";
  if (signals.players) return "player_stats";
  if (signals.compare) return hasHeadToHeadLanguage(text) ? "head_to_head" : "comparison";
  if (signals.history) return "history";
  return "general";
}

export function classifyIntent(text: string): Intent {
  const t = normalizeText(text);
  const signals = detectSignals(t);
  return {
    label: pickLabel(t, signals),
    hint: preHint(t, signals),
    looksFactual: looksFactual(t),
    looksHistorical: signals.history,
    signals,
  };
}
