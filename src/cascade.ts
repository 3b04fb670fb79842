/**
 * Execution cascade
 *
 * Tries the planner's candidates strictly one at a time and stops at the
 * first payload that is both non-empty and valid for the question.
 */

import type {
  ToolArgs,
  ToolCallRecord,
  ToolName,
  ToolPayload,
  ToolSuccess,
  ValidationReason,
} from "./types.js";
import { isEmptyPayload, validateRecency } from "./arbiter.js";
import { extractPersonNames, extractTeams, extractWinner, findCompetition } from "./entities.js";

/** Anything that can run a tool by name; the ToolRegistry in production */
export interface ToolDispatcher {
  dispatch(name: string, args: ToolArgs): Promise<ToolPayload>;
}

export interface CascadeOptions {
  defaultTeam?: string;
  verbose?: boolean;
  now?: Date;
  maxResultAgeDays?: number;
}

export interface CascadeSuccess {
  tool: ToolName;
  payload: ToolSuccess;
  sources: string[];
  attempts: ToolCallRecord[];
}

export interface CascadeExhausted {
  tool: null;
  attempts: ToolCallRecord[];
  /** `message` of the first attempt that carried one, for best-effort replies */
  firstFailureMessage: string | null;
}

export type CascadeOutcome = CascadeSuccess | CascadeExhausted;

const SINGLE_TEAM_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>([
  "tool_next_fixture",
  "tool_last_result",
  "tool_form",
  "tool_live_now",
  "tool_af_next_fixture",
  "tool_af_last_result",
  "tool_next_lineups",
  "tool_sofa_form",
  "tool_squad",
  "tool_injuries",
  "tool_club_elo",
]);

const TWO_TEAM_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>([
  "tool_h2h_summary",
  "tool_compare_teams",
  "tool_af_last_result_vs",
  "tool_af_find_match_result",
  "tool_h2h_officialish",
]);

/**
 * Resolve a tool's arguments from the question text. Teams come in order of
 * appearance; when only one team other than the default is named, the
 * default team becomes the first side.
 */
export function buildToolArgs(tool: ToolName, question: string, defaultTeam = "Real Madrid"): ToolArgs {
  const teams = extractTeams(question).map((t) => t.name);

  if (SINGLE_TEAM_TOOLS.has(tool)) {
    const args: ToolArgs = { team_name: teams[0] ?? defaultTeam };
    if (tool === "tool_form" || tool === "tool_sofa_form") args.k = 5;
    return args;
  }

  if (TWO_TEAM_TOOLS.has(tool)) {
    const [teamA, teamB] =
      teams.length >= 2
        ? [teams[0], teams[1]]
        : teams.length === 1 && teams[0] !== defaultTeam
          ? [defaultTeam, teams[0]]
          : [teams[0] ?? defaultTeam, undefined];
    const args: ToolArgs = { team_a: teamA };
    if (teamB) args.team_b = teamB;
    if (tool === "tool_af_find_match_result") {
      const winner = extractWinner(question);
      if (winner) args.winner = winner.name;
    }
    return args;
  }

  switch (tool) {
    case "tool_table":
    case "tool_scorers": {
      const comp = findCompetition(question);
      return comp ? { competition: comp.name } : {};
    }
    case "tool_player_stats": {
      const [player] = extractPersonNames(question);
      return player ? { player_name: player } : {};
    }
    case "tool_compare_players": {
      const [a, b] = extractPersonNames(question);
      const args: ToolArgs = {};
      if (a) args.player_a = a;
      if (b) args.player_b = b;
      return args;
    }
    case "tool_news_top":
      return teams[0] ? { query: teams[0] } : {};
    case "tool_history_lookup":
      return { query: question.trim() };
    case "tool_glossary":
      return { term: question.trim() };
    default:
      return {};
  }
}

function describeVerdict(reason: ValidationReason): string {
  switch (reason) {
    case "not_live":
      return "not a live match";
    case "no_last_result":
      return "no recent finished result";
    case "no_next_fixture":
      return "no upcoming fixture";
    default:
      return "ok";
  }
}

/**
 * Run the plan in order. Tools never throw, so neither does the cascade;
 * exhaustion is reported as `{ tool: null }`.
 */
export async function runCascade(
  plan: readonly ToolName[],
  question: string,
  registry: ToolDispatcher,
  options: CascadeOptions = {}
): Promise<CascadeOutcome> {
  const attempts: ToolCallRecord[] = [];
  let firstFailureMessage: string | null = null;

  for (const tool of plan) {
    const args = buildToolArgs(tool, question, options.defaultTeam);
    if (options.verbose) {
      console.error(`[madridista] cascade: ${tool}(${JSON.stringify(args)})`);
    }

    const payload = await registry.dispatch(tool, args);
    attempts.push({ tool, args, payload, calledAt: new Date().toISOString() });

    if (!payload.ok) {
      if (firstFailureMessage === null) firstFailureMessage = payload.message;
      if (options.verbose) console.error(`[madridista] cascade: ${tool} failed: ${payload.message}`);
      continue;
    }
    if (isEmptyPayload(payload)) {
      if (options.verbose) console.error(`[madridista] cascade: ${tool} returned no content`);
      continue;
    }
    const verdict = validateRecency(question, payload, {
      now: options.now,
      maxResultAgeDays: options.maxResultAgeDays,
    });
    if (!verdict.isValid) {
      if (options.verbose) {
        console.error(`[madridista] cascade: ${tool} rejected (${describeVerdict(verdict.reason)})`);
      }
      continue;
    }

    return { tool, payload, sources: payload.__source ? [payload.__source] : [], attempts };
  }

  return { tool: null, attempts, firstFailureMessage };
}
