/**
 * Football-Data.org v4 client: team matches, standings, scorers.
 */

import { asArray, asNumber, asString, getJson, pick, requireKey } from "./http.js";
import type { MatchSummary, ScorerRow, StandingRow } from "./types.js";

const BASE = "https://api.football-data.org/v4";
const PROVIDER = "Football-Data";

export interface FootballDataOptions {
  apiKey?: string;
  timeoutMs?: number;
}

function toMatch(raw: unknown): MatchSummary {
  return {
    id: asNumber(pick(raw, "id")),
    when: asString(pick(raw, "utcDate")) ?? "",
    home: asString(pick(raw, "homeTeam", "name")) ?? "",
    away: asString(pick(raw, "awayTeam", "name")) ?? "",
    homeId: asNumber(pick(raw, "homeTeam", "id")),
    awayId: asNumber(pick(raw, "awayTeam", "id")),
    homeScore: asNumber(pick(raw, "score", "fullTime", "home")) ?? null,
    awayScore: asNumber(pick(raw, "score", "fullTime", "away")) ?? null,
    status: asString(pick(raw, "status")) ?? "",
    competition: asString(pick(raw, "competition", "name")),
  };
}

export class FootballDataClient {
  private apiKey?: string;
  private timeoutMs: number;

  constructor(options: FootballDataOptions = {}) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  private get(path: string, params?: Record<string, string | number | undefined>) {
    const key = requireKey(PROVIDER, this.apiKey);
    return getJson(PROVIDER, `${BASE}${path}`, {
      headers: { "X-Auth-Token": key },
      params,
      timeoutMs: this.timeoutMs,
    });
  }

  /** All matches of a team this season, oldest first */
  async teamMatches(teamId: number): Promise<MatchSummary[]> {
    const js = await this.get(`/teams/${teamId}/matches`);
    return asArray(pick(js, "matches"))
      .map(toMatch)
      .filter((m) => m.when)
      .sort((a, b) => a.when.localeCompare(b.when));
  }

  async finishedMatches(teamId: number, limit: number): Promise<MatchSummary[]> {
    const all = await this.teamMatches(teamId);
    return all
      .filter((m) => m.status === "FINISHED")
      .reverse()
      .slice(0, limit);
  }

  async upcomingMatches(teamId: number, limit: number): Promise<MatchSummary[]> {
    const all = await this.teamMatches(teamId);
    return all
      .filter((m) => m.status === "SCHEDULED" || m.status === "TIMED")
      .slice(0, limit);
  }

  async standings(competitionCode: string): Promise<StandingRow[]> {
    const js = await this.get(`/competitions/${competitionCode}/standings`);
    const tables = asArray(pick(js, "standings"));
    const total = tables.find((t) => pick(t, "type") === "TOTAL") ?? tables[0];
    return asArray(pick(total, "table")).map((r) => ({
      pos: asNumber(pick(r, "position")) ?? 0,
      team: asString(pick(r, "team", "name")) ?? "",
      played: asNumber(pick(r, "playedGames")) ?? 0,
      won: asNumber(pick(r, "won")) ?? 0,
      draw: asNumber(pick(r, "draw")) ?? 0,
      lost: asNumber(pick(r, "lost")) ?? 0,
      gd: asNumber(pick(r, "goalDifference")) ?? 0,
      pts: asNumber(pick(r, "points")) ?? 0,
    }));
  }

  async scorers(competitionCode: string, limit: number): Promise<ScorerRow[]> {
    const js = await this.get(`/competitions/${competitionCode}/scorers`, { limit });
    return asArray(pick(js, "scorers")).map((s) => ({
      player: asString(pick(s, "player", "name")) ?? "",
      team: asString(pick(s, "team", "name")) ?? "",
      goals: asNumber(pick(s, "goals")) ?? asNumber(pick(s, "numberOfGoals")) ?? 0,
      assists: asNumber(pick(s, "assists")) ?? null,
      penalties: asNumber(pick(s, "penalties")) ?? null,
      played: asNumber(pick(s, "playedMatches")) ?? null,
    }));
  }
}
