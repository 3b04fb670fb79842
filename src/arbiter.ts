/**
 * Arbiter
 *
 * Plans an ordered list of candidate tools for a question and judges the
 * payloads they return: "empty" (nothing content-bearing) and "valid" (the
 * shape and recency the question implies). The two checks are independent.
 */

import type {
  ToolName,
  ToolPayload,
  ValidationVerdict,
} from "./types.js";
import { detectSignals, hasOutcomeLanguage, teamDataTopic, type TeamDataTopic } from "./intent.js";
import { containsAny, extractTeams, normalizeText } from "./entities.js";

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/** Appended to every plan so the cascade never dead-ends */
export const FALLBACK_TOOLS: readonly ToolName[] = [
  "tool_sofa_form",
  "tool_table",
  "tool_history_lookup",
];

const TEAM_DATA_TOOLS: Record<TeamDataTopic, ToolName> = {
  injuries: "tool_injuries",
  squad: "tool_squad",
  elo: "tool_club_elo",
};

function dedupe(names: ToolName[]): ToolName[] {
  const seen = new Set<ToolName>();
  const ordered: ToolName[] = [];
  for (const name of names) {
    if (seen.has(name)) continue;
    seen.add(name);
    ordered.push(name);
  }
  return ordered;
}

/**
 * Return an ordered plan of tool names to try for this question.
 * Most specific first; generic fallbacks last; no duplicates.
 */
export function planTools(question: string): ToolName[] {
  const q = normalizeText(question);
  const signals = detectSignals(q);
  const topic = teamDataTopic(q);
  const plan: ToolName[] = [];

  if (signals.compare && hasOutcomeLanguage(q)) {
    plan.push(
      "tool_af_find_match_result",
      "tool_af_last_result_vs",
      "tool_h2h_officialish",
      "tool_h2h_summary",
      "tool_compare_teams"
    );
  } else if (topic) {
    plan.push(TEAM_DATA_TOOLS[topic]);
  } else if (signals.live) {
    plan.push("tool_live_now", "tool_af_last_result");
  } else if (signals.next) {
    plan.push("tool_af_next_fixture", "tool_next_fixture");
  } else if (signals.last) {
    // "last score between A and B" is a head-to-head result, not A's last match
    if (signals.compare || extractTeams(q).length >= 2) {
      plan.push("tool_af_last_result_vs", "tool_h2h_officialish");
    }
    plan.push("tool_af_last_result", "tool_last_result");
  } else if (signals.news) {
    plan.push("tool_news_top");
  } else if (signals.players) {
    plan.push("tool_player_stats", "tool_compare_players");
  } else if (signals.compare) {
    plan.push(
      "tool_af_last_result_vs",
      "tool_h2h_officialish",
      "tool_h2h_summary",
      "tool_compare_teams"
    );
  } else if (signals.history) {
    plan.push("tool_history_lookup");
  }

  plan.push(...FALLBACK_TOOLS);
  return dedupe(plan);
}

// ---------------------------------------------------------------------------
// Emptiness
// ---------------------------------------------------------------------------

const CONTENT_KEYS = [
  "items",
  "rows",
  "events",
  "extract",
  "fixture_id",
  "when",
  "home",
  "away",
] as const;

function hasContent(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === "string") return value.trim().length > 0;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return Object.keys(value).length > 0;
  return true;
}

/** A payload is empty when it failed or carries none of the content keys. */
export function isEmptyPayload(payload: ToolPayload | null | undefined): boolean {
  if (!payload || !payload.ok) return true;
  return !CONTENT_KEYS.some((key) => hasContent(payload[key]));
}

// ---------------------------------------------------------------------------
// Recency validation
// ---------------------------------------------------------------------------

const LIVE_TERMS = ["today", "now", "live", "tonight", "right now"];
const LAST_TERMS = ["last", "previous", "most recent"];
const NEXT_TERMS = ["next", "upcoming", "fixture", "fixtures", "play next"];

const DAY_MS = 86_400_000;
/** Kickoffs this close behind "now" still count as the next fixture */
const NEXT_FIXTURE_GRACE_MS = 3 * 3_600_000;

export interface RecencyOptions {
  now?: Date;
  maxResultAgeDays?: number;
}

function parseWhen(value: unknown): number | null {
  if (typeof value !== "string" || !value.trim()) return null;
  const ts = Date.parse(value);
  return Number.isNaN(ts) ? null : ts;
}

function present(payload: Record<string, unknown>, key: string): boolean {
  return hasContent(payload[key]);
}

const OK: ValidationVerdict = { isValid: true, reason: "ok" };

/**
 * Check the payload against the recency and shape the question implies.
 * Conservative and shape-based: a wrong team with the right shape passes.
 */
export function validateRecency(
  question: string,
  payload: ToolPayload,
  options: RecencyOptions = {}
): ValidationVerdict {
  const q = normalizeText(question);
  const now = (options.now ?? new Date()).getTime();
  const maxAgeDays = options.maxResultAgeDays ?? 180;
  const fields: Record<string, unknown> = payload.ok ? payload : {};

  if (containsAny(q, LIVE_TERMS)) {
    const liveish =
      "events" in fields || (present(fields, "when") && present(fields, "fixture_id"));
    return liveish ? OK : { isValid: false, reason: "not_live" };
  }

  if (containsAny(q, LAST_TERMS)) {
    const shaped = ["home", "away", "when"].every((k) => present(fields, k));
    if (!shaped) return { isValid: false, reason: "no_last_result" };
    const ts = parseWhen(fields.when);
    if (ts === null) return OK;
    if (ts > now) return { isValid: false, reason: "no_last_result" };
    // Head-to-heads can be years apart; only a team's own last match ages out
    const headToHead = detectSignals(q).compare || extractTeams(q).length >= 2;
    if (!headToHead && now - ts > maxAgeDays * DAY_MS) {
      return { isValid: false, reason: "no_last_result" };
    }
    return OK;
  }

  if (containsAny(q, NEXT_TERMS)) {
    const shaped = ["when", "home", "away"].every((k) => present(fields, k));
    if (!shaped) return { isValid: false, reason: "no_next_fixture" };
    const ts = parseWhen(fields.when);
    if (ts !== null && now - ts > NEXT_FIXTURE_GRACE_MS) {
      return { isValid: false, reason: "no_next_fixture" };
    }
    return OK;
  }

  return OK;
}
