/**
 * API-Football (api-sports.io v3) client: fixtures, head-to-head, live
 * matches and lineups.
 */

import {
  ProviderError,
  asArray,
  asNumber,
  asRecord,
  asString,
  getJson,
  pick,
  requireKey,
  type ProviderErrorCode,
} from "./http.js";
import type { LiveMatch, MatchEvent, MatchSummary, TeamLineup } from "./types.js";

const BASE = "https://v3.football.api-sports.io";
const PROVIDER = "API-Football";

const FINISHED_STATUSES = new Set(["FT", "AET", "PEN"]);

export interface ApiFootballOptions {
  apiKey?: string;
  timeoutMs?: number;
}

function toFixture(raw: unknown): MatchSummary {
  return {
    id: asNumber(pick(raw, "fixture", "id")),
    when: asString(pick(raw, "fixture", "date")) ?? "",
    home: asString(pick(raw, "teams", "home", "name")) ?? "",
    away: asString(pick(raw, "teams", "away", "name")) ?? "",
    homeId: asNumber(pick(raw, "teams", "home", "id")),
    awayId: asNumber(pick(raw, "teams", "away", "id")),
    homeScore: asNumber(pick(raw, "goals", "home")) ?? null,
    awayScore: asNumber(pick(raw, "goals", "away")) ?? null,
    status: asString(pick(raw, "fixture", "status", "short")) ?? "",
    competition: asString(pick(raw, "league", "name")),
  };
}

function toEvent(raw: unknown): MatchEvent {
  return {
    minute: asNumber(pick(raw, "time", "elapsed")) ?? null,
    team: asString(pick(raw, "team", "name")) ?? "",
    type: asString(pick(raw, "type")) ?? "",
    detail: asString(pick(raw, "detail")) ?? "",
    player: asString(pick(raw, "player", "name")) ?? "",
  };
}

/**
 * API-Football answers bad keys and spent quotas with HTTP 200 and an
 * `errors` object (or array) next to an empty `response`.
 */
function reportedError(js: unknown): ProviderError | null {
  const raw = pick(js, "errors");
  const entries: Array<[string, unknown]> = Array.isArray(raw)
    ? raw.map((value: unknown, i): [string, unknown] => [String(i), value])
    : Object.entries(asRecord(raw));
  if (entries.length === 0) return null;
  const message = entries
    .map(([, value]) => (typeof value === "string" ? value : JSON.stringify(value)))
    .join("; ");
  const keys = entries.map(([key]) => key.toLowerCase()).join(" ");
  const lowered = `${keys} ${message.toLowerCase()}`;
  let code: ProviderErrorCode = "bad_response";
  if (/request|ratelimit|rate limit|quota/.test(lowered)) code = "rate_limited";
  else if (/token|access|key|subscription/.test(lowered)) code = "unauthorized";
  return new ProviderError(PROVIDER, code, `${PROVIDER} error: ${message}`);
}

export function isFinished(match: MatchSummary): boolean {
  return FINISHED_STATUSES.has(match.status);
}

export class ApiFootballClient {
  private apiKey?: string;
  private timeoutMs: number;

  constructor(options: ApiFootballOptions = {}) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  private async response(path: string, params: Record<string, string | number | undefined>) {
    const key = requireKey(PROVIDER, this.apiKey);
    const js = await getJson(PROVIDER, `${BASE}${path}`, {
      headers: { "x-apisports-key": key },
      params,
      timeoutMs: this.timeoutMs,
    });
    const error = reportedError(js);
    if (error) throw error;
    return asArray(pick(js, "response"));
  }

  async nextFixtures(teamId: number, count = 1): Promise<MatchSummary[]> {
    const arr = await this.response("/fixtures", { team: teamId, next: count });
    return arr.map(toFixture).sort((a, b) => a.when.localeCompare(b.when));
  }

  /** Most recent first */
  async lastFixtures(teamId: number, count = 1): Promise<MatchSummary[]> {
    const arr = await this.response("/fixtures", { team: teamId, last: count });
    return arr.map(toFixture).sort((a, b) => b.when.localeCompare(a.when));
  }

  /** Meetings between two teams, most recent first */
  async headToHead(teamA: number, teamB: number, last = 10): Promise<MatchSummary[]> {
    const arr = await this.response("/fixtures/headtohead", { h2h: `${teamA}-${teamB}`, last });
    return arr.map(toFixture).sort((a, b) => b.when.localeCompare(a.when));
  }

  async liveForTeam(teamId: number): Promise<LiveMatch | null> {
    const arr = await this.response("/fixtures", { live: "all" });
    const raw = arr.find((f) => {
      const home = asNumber(pick(f, "teams", "home", "id"));
      const away = asNumber(pick(f, "teams", "away", "id"));
      return home === teamId || away === teamId;
    });
    if (!raw) return null;
    return {
      ...toFixture(raw),
      minute: asNumber(pick(raw, "fixture", "status", "elapsed")) ?? null,
      events: asArray(pick(raw, "events")).map(toEvent),
    };
  }

  async lineups(fixtureId: number): Promise<TeamLineup[]> {
    const arr = await this.response("/fixtures/lineups", { fixture: fixtureId });
    return arr.map((l) => ({
      team: asString(pick(l, "team", "name")) ?? "",
      formation: asString(pick(l, "formation")) ?? "",
      coach: asString(pick(l, "coach", "name")) ?? "",
      startXI: asArray(pick(l, "startXI"))
        .map((p) => asString(pick(p, "player", "name")))
        .filter((n): n is string => Boolean(n)),
    }));
  }
}
