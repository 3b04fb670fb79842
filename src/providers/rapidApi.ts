/**
 * RapidAPI-hosted providers: SofaScore (team form, squad, injuries) and
 * LiveScore (news). Both share one RapidAPI key.
 */

import { asArray, asNumber, asString, getJson, pick, requireKey } from "./http.js";
import type { InjuredPlayer, MatchSummary, NewsItem, SquadPlayer } from "./types.js";

const SOFA_HOST = "sofascore.p.rapidapi.com";
const LIVESCORE_HOST = "livescore6.p.rapidapi.com";

export interface RapidApiOptions {
  apiKey?: string;
  timeoutMs?: number;
}

abstract class RapidApiClient {
  protected abstract readonly host: string;
  protected abstract readonly provider: string;
  private apiKey?: string;
  private timeoutMs: number;

  constructor(options: RapidApiOptions = {}) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  protected get(path: string, params: Record<string, string | number | undefined>) {
    const key = requireKey(this.provider, this.apiKey);
    return getJson(this.provider, `https://${this.host}${path}`, {
      headers: { "x-rapidapi-key": key, "x-rapidapi-host": this.host },
      params,
      timeoutMs: this.timeoutMs,
    });
  }
}

/** Squad entries come either bare or wrapped as `{ player: {...} }` */
function playerOf(raw: unknown): unknown {
  const inner = pick(raw, "player");
  return inner !== undefined ? inner : raw;
}

function playerName(p: unknown): string {
  return asString(pick(p, "name")) ?? asString(pick(p, "shortName")) ?? "";
}

export class SofascoreClient extends RapidApiClient {
  protected readonly host = SOFA_HOST;
  protected readonly provider = "SofaScore";

  /** A team's most recent finished events, most recent first */
  async lastMatches(teamId: number): Promise<MatchSummary[]> {
    const js = await this.get("/teams/get-last-matches", { teamId, pageIndex: 0 });
    return asArray(pick(js, "events"))
      .map((e) => {
        const ts = asNumber(pick(e, "startTimestamp"));
        return {
          id: asNumber(pick(e, "id")),
          when: ts !== undefined ? new Date(ts * 1000).toISOString() : "",
          home: asString(pick(e, "homeTeam", "name")) ?? "",
          away: asString(pick(e, "awayTeam", "name")) ?? "",
          homeId: asNumber(pick(e, "homeTeam", "id")),
          awayId: asNumber(pick(e, "awayTeam", "id")),
          homeScore: asNumber(pick(e, "homeScore", "current")) ?? null,
          awayScore: asNumber(pick(e, "awayScore", "current")) ?? null,
          status: asString(pick(e, "status", "type")) ?? "",
          competition: asString(pick(e, "tournament", "name")),
        };
      })
      .sort((a, b) => b.when.localeCompare(a.when));
  }

  async squad(teamId: number): Promise<SquadPlayer[]> {
    const js = await this.get("/teams/get-squad", { teamId });
    return asArray(pick(js, "players"))
      .map(playerOf)
      .map((p) => ({
        name: playerName(p),
        position: asString(pick(p, "position")) ?? "",
        shirtNumber: asNumber(pick(p, "shirtNumber")) ?? asNumber(pick(p, "jerseyNumber")),
      }))
      .filter((p) => p.name);
  }

  /** Players currently unavailable through injury or suspension */
  async injuries(teamId: number): Promise<InjuredPlayer[]> {
    const js = await this.get("/teams/get-injuries", { teamId });
    return asArray(pick(js, "players"))
      .map((raw) => {
        const p = playerOf(raw);
        const returnTs =
          asNumber(pick(raw, "injury", "expectedEndDateTimestamp")) ??
          asNumber(pick(p, "injury", "expectedEndDateTimestamp"));
        return {
          name: playerName(p),
          status:
            asString(pick(raw, "injury", "reason")) ??
            asString(pick(p, "injury", "reason")) ??
            asString(pick(raw, "injury", "type")) ??
            asString(pick(p, "injury", "type")) ??
            asString(pick(raw, "status")) ??
            "Unavailable",
          expectedReturn:
            returnTs !== undefined ? new Date(returnTs * 1000).toISOString().slice(0, 10) : undefined,
        };
      })
      .filter((p) => p.name);
  }
}

export class LiveScoreNewsClient extends RapidApiClient {
  protected readonly host = LIVESCORE_HOST;
  protected readonly provider = "LiveScore";

  async soccerNews(limit = 8): Promise<NewsItem[]> {
    const js = await this.get("/news/list", { category: "soccer" });
    const articles = asArray(pick(js, "data", "articles")).length
      ? asArray(pick(js, "data", "articles"))
      : asArray(pick(js, "articles"));
    return articles
      .map((a) => ({
        title: asString(pick(a, "title")) ?? "",
        url: asString(pick(a, "url")),
        publishedAt: asString(pick(a, "published_at")) ?? asString(pick(a, "publishedAt")),
        summary: asString(pick(a, "content")) ?? asString(pick(a, "summary")),
      }))
      .filter((a) => a.title)
      .slice(0, limit);
  }
}
