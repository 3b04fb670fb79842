/**
 * madridista — Tool Handlers
 *
 * One handler per ToolName. Handlers resolve names to provider ids through
 * the alias tables, call a provider client and reshape the answer into a
 * ToolPayload. Handlers may throw; the registry wraps each one with
 * `safely`, so a thrown error of any kind comes back as
 * `{ ok: false, message, __source }`.
 */

import type {
  ProviderCredentials,
  ToolArgs,
  ToolFailure,
  ToolHandler,
  ToolName,
  ToolSuccess,
} from "./types.js";
import {
  containsPhrase,
  findCompetition,
  findTeam,
  loadCompetitions,
  type CompetitionEntry,
  type TeamEntry,
} from "./entities.js";
import { readDataFile, isRecord } from "./data.js";
import { ProviderError } from "./providers/http.js";
import { FootballDataClient } from "./providers/footballData.js";
import { ApiFootballClient, isFinished } from "./providers/apiFootball.js";
import { LiveScoreNewsClient, SofascoreClient } from "./providers/rapidApi.js";
import { WikipediaClient } from "./providers/wikipedia.js";
import { ClubEloClient } from "./providers/clubElo.js";
import type { MatchSummary, ScorerRow } from "./providers/types.js";

// ---------------------------------------------------------------------------
// Sources (used verbatim in citations)
// ---------------------------------------------------------------------------

export const SOURCES = {
  footballData: "Football-Data",
  apiFootball: "API-Football",
  sofascore: "SofaScore",
  livescore: "LiveScore",
  wikipedia: "Wikipedia",
  glossary: "Glossary",
  clubElo: "ClubElo",
} as const;

export interface ToolClients {
  footballData: FootballDataClient;
  apiFootball: ApiFootballClient;
  sofascore: SofascoreClient;
  news: LiveScoreNewsClient;
  wikipedia: WikipediaClient;
  elo: ClubEloClient;
}

export interface HandlerOptions {
  /** Team assumed when the arguments name none */
  defaultTeam: string;
}

export function createClients(credentials: ProviderCredentials, timeoutMs?: number): ToolClients {
  return {
    footballData: new FootballDataClient({ apiKey: credentials.footballDataApiKey, timeoutMs }),
    apiFootball: new ApiFootballClient({ apiKey: credentials.apiFootballKey, timeoutMs }),
    sofascore: new SofascoreClient({ apiKey: credentials.rapidApiKey, timeoutMs }),
    news: new LiveScoreNewsClient({ apiKey: credentials.rapidApiKey, timeoutMs }),
    wikipedia: new WikipediaClient({ timeoutMs }),
    elo: new ClubEloClient({ timeoutMs }),
  };
}

// ---------------------------------------------------------------------------
// Failure plumbing
// ---------------------------------------------------------------------------

/** Bad or unresolvable arguments; becomes a failure payload, never escapes */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolInputError";
  }
}

function failure(source: string, message: string): ToolFailure {
  return { ok: false, message, __source: source };
}

export function safely(source: string, fn: ToolHandler): ToolHandler {
  return async (args) => {
    try {
      return await fn(args);
    } catch (err: unknown) {
      if (err instanceof ProviderError || err instanceof ToolInputError) {
        return failure(source, err.message);
      }
      const message = err instanceof Error ? err.message : String(err);
      return failure(source, `${source} lookup failed: ${message}`);
    }
  };
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

function argString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function argInt(args: ToolArgs, key: string, fallback: number, max: number): number {
  const value = args[key];
  const n =
    typeof value === "number" ? value : typeof value === "string" ? Number.parseInt(value, 10) : NaN;
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.min(Math.floor(n), max);
}

function requireTeam(args: ToolArgs, key: string, fallback?: string): TeamEntry {
  const name = argString(args, key) ?? fallback;
  if (!name) throw new ToolInputError(`Missing ${key}`);
  const team = findTeam(name);
  if (!team) throw new ToolInputError(`Unknown team: ${name}`);
  return team;
}

function requireTwoTeams(args: ToolArgs, fallback: string): [TeamEntry, TeamEntry] {
  const a = requireTeam(args, "team_a", fallback);
  if (!argString(args, "team_b")) throw new ToolInputError("Two teams are needed for this lookup");
  const b = requireTeam(args, "team_b");
  if (a.name === b.name) throw new ToolInputError("Two different teams are needed for this lookup");
  return [a, b];
}

function idFor(team: TeamEntry, provider: "footballDataId" | "apiFootballId" | "sofascoreId"): number {
  const id = team[provider];
  if (id === undefined) throw new ToolInputError(`${team.name} is not covered by this provider`);
  return id;
}

function competitionArg(args: ToolArgs): CompetitionEntry {
  const given = argString(args, "competition");
  if (given) {
    const comp = findCompetition(given);
    if (!comp) throw new ToolInputError(`Unknown competition: ${given}`);
    return comp;
  }
  return loadCompetitions()[0];
}

/** Lowercase and strip accents so "Mbappe" finds "Mbappé" */
function fold(value: string): string {
  return value.normalize("NFD").replace(/\p{M}/gu, "").toLowerCase().trim();
}

// ---------------------------------------------------------------------------
// Payload shaping
// ---------------------------------------------------------------------------

function matchFields(m: MatchSummary) {
  return {
    fixture_id: m.id,
    when: m.when,
    home: m.home,
    away: m.away,
    home_score: m.homeScore,
    away_score: m.awayScore,
    status: m.status,
    competition: m.competition,
  };
}

type Outcome = "W" | "D" | "L";

function outcomeFor(m: MatchSummary, teamId: number): Outcome | null {
  if (m.homeScore === null || m.awayScore === null) return null;
  const own = m.homeId === teamId ? m.homeScore : m.awayScore;
  const other = m.homeId === teamId ? m.awayScore : m.homeScore;
  if (own > other) return "W";
  if (own < other) return "L";
  return "D";
}

function winnerId(m: MatchSummary): number | null {
  if (m.homeScore === null || m.awayScore === null || m.homeScore === m.awayScore) return null;
  return (m.homeScore > m.awayScore ? m.homeId : m.awayId) ?? null;
}

interface FormSummary {
  team: string;
  form: string;
  points: number;
  goals_for: number;
  goals_against: number;
}

function summarizeForm(team: TeamEntry, teamId: number, matches: MatchSummary[]): FormSummary {
  let form = "";
  let points = 0;
  let goalsFor = 0;
  let goalsAgainst = 0;
  for (const m of matches) {
    const outcome = outcomeFor(m, teamId);
    if (!outcome) continue;
    form += outcome;
    points += outcome === "W" ? 3 : outcome === "D" ? 1 : 0;
    const home = m.homeId === teamId;
    goalsFor += (home ? m.homeScore : m.awayScore) ?? 0;
    goalsAgainst += (home ? m.awayScore : m.homeScore) ?? 0;
  }
  return { team: team.name, form, points, goals_for: goalsFor, goals_against: goalsAgainst };
}

// ---------------------------------------------------------------------------
// Glossary
// ---------------------------------------------------------------------------

let glossaryCache: Map<string, string> | null = null;

function loadGlossary(): Map<string, string> {
  if (glossaryCache) return glossaryCache;
  const raw = readDataFile("glossary.json");
  if (!isRecord(raw)) throw new Error("glossary.json must be an object");
  const entries = new Map<string, string>();
  for (const [term, definition] of Object.entries(raw)) {
    if (typeof definition === "string") entries.set(term.toLowerCase(), definition);
  }
  glossaryCache = entries;
  return entries;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export function buildToolHandlers(
  clients: ToolClients,
  options: HandlerOptions
): Record<ToolName, ToolHandler> {
  const { footballData, apiFootball, sofascore, news, wikipedia, elo } = clients;
  const fallbackTeam = options.defaultTeam;
  const FD = SOURCES.footballData;
  const AF = SOURCES.apiFootball;
  const SOFA = SOURCES.sofascore;

  async function findScorer(name: string, comps: CompetitionEntry[]) {
    const wanted = fold(name).split(/\s+/);
    for (const comp of comps) {
      const rows = await footballData.scorers(comp.footballDataCode, 100);
      const row = rows.find((r) => {
        const tokens = fold(r.player).split(/\s+/);
        return wanted.every((w) => tokens.includes(w));
      });
      if (row) return { row, competition: comp.name };
    }
    return null;
  }

  function playerComps(args: ToolArgs): CompetitionEntry[] {
    if (argString(args, "competition")) return [competitionArg(args)];
    return loadCompetitions().slice(0, 2);
  }

  function playerRow(row: ScorerRow, competition: string) {
    const perMatch =
      row.played && row.played > 0 ? Math.round((row.goals / row.played) * 100) / 100 : null;
    return { ...row, competition, goals_per_match: perMatch };
  }

  const handlers: Record<ToolName, ToolHandler> = {
    tool_next_fixture: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const [next] = await footballData.upcomingMatches(idFor(team, "footballDataId"), 1);
      if (!next) return failure(FD, `No upcoming fixture found for ${team.name}`);
      return { ok: true, __source: FD, team: team.name, ...matchFields(next) };
    },

    tool_last_result: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const [last] = await footballData.finishedMatches(idFor(team, "footballDataId"), 1);
      if (!last) return failure(FD, `No finished match found for ${team.name}`);
      return { ok: true, __source: FD, team: team.name, ...matchFields(last) };
    },

    tool_form: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const k = argInt(args, "k", 5, 20);
      const teamId = idFor(team, "footballDataId");
      const matches = await footballData.finishedMatches(teamId, k);
      if (matches.length === 0) return failure(FD, `No recent matches found for ${team.name}`);
      const rows = matches.map((m) => ({
        when: m.when,
        home: m.home,
        away: m.away,
        score: `${m.homeScore ?? "?"}-${m.awayScore ?? "?"}`,
        result: outcomeFor(m, teamId),
      }));
      return { ok: true, __source: FD, team: team.name, form: summarizeForm(team, teamId, matches).form, rows };
    },

    tool_table: async (args) => {
      const comp = competitionArg(args);
      const limit = argInt(args, "limit", 10, 20);
      const rows = await footballData.standings(comp.footballDataCode);
      if (rows.length === 0) return failure(FD, `No standings available for ${comp.name}`);
      return { ok: true, __source: FD, competition: comp.name, rows: rows.slice(0, limit) };
    },

    tool_scorers: async (args) => {
      const comp = competitionArg(args);
      const limit = argInt(args, "limit", 10, 50);
      const rows = await footballData.scorers(comp.footballDataCode, limit);
      if (rows.length === 0) return failure(FD, `No scorer data available for ${comp.name}`);
      return { ok: true, __source: FD, competition: comp.name, rows };
    },

    tool_h2h_summary: async (args) => {
      const [a, b] = requireTwoTeams(args, fallbackTeam);
      const aId = idFor(a, "footballDataId");
      const bId = idFor(b, "footballDataId");
      const meetings = (await footballData.finishedMatches(aId, 100)).filter(
        (m) => m.homeId === bId || m.awayId === bId
      );
      if (meetings.length === 0) {
        return failure(FD, `No recent meetings between ${a.name} and ${b.name}`);
      }
      const tally = { wins: 0, draws: 0, losses: 0 };
      for (const m of meetings) {
        const outcome = outcomeFor(m, aId);
        if (outcome === "W") tally.wins++;
        else if (outcome === "D") tally.draws++;
        else if (outcome === "L") tally.losses++;
      }
      return {
        ok: true,
        __source: FD,
        team_a: a.name,
        team_b: b.name,
        ...tally,
        rows: meetings.slice(0, 10).map(matchFields),
      };
    },

    tool_compare_teams: async (args) => {
      const [a, b] = requireTwoTeams(args, fallbackTeam);
      const k = argInt(args, "k", 5, 20);
      const aId = idFor(a, "footballDataId");
      const bId = idFor(b, "footballDataId");
      const aForm = summarizeForm(a, aId, await footballData.finishedMatches(aId, k));
      const bForm = summarizeForm(b, bId, await footballData.finishedMatches(bId, k));
      if (!aForm.form && !bForm.form) {
        return failure(FD, `No recent matches found for ${a.name} or ${b.name}`);
      }
      const verdict =
        aForm.points === bForm.points
          ? "Level on recent form"
          : `${aForm.points > bForm.points ? a.name : b.name} in better recent form`;
      return { ok: true, __source: FD, k, verdict, rows: [aForm, bForm] };
    },

    tool_player_stats: async (args) => {
      const name = argString(args, "player_name");
      if (!name) return failure(FD, "Missing player_name");
      const found = await findScorer(name, playerComps(args));
      if (!found) return failure(FD, `${name} is not among the listed scorers`);
      return { ok: true, __source: FD, rows: [playerRow(found.row, found.competition)] };
    },

    tool_compare_players: async (args) => {
      const nameA = argString(args, "player_a");
      const nameB = argString(args, "player_b");
      if (!nameA || !nameB) return failure(FD, "Two players are needed for a comparison");
      const comps = playerComps(args);
      const a = await findScorer(nameA, comps);
      const b = await findScorer(nameB, comps);
      if (!a || !b) {
        return failure(FD, `${!a ? nameA : nameB} is not among the listed scorers`);
      }
      return {
        ok: true,
        __source: FD,
        rows: [playerRow(a.row, a.competition), playerRow(b.row, b.competition)],
      };
    },

    tool_live_now: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const live = await apiFootball.liveForTeam(idFor(team, "apiFootballId"));
      if (!live) return failure(AF, `${team.name} are not playing right now`);
      return {
        ok: true,
        __source: AF,
        team: team.name,
        ...matchFields(live),
        minute: live.minute,
        events: live.events,
      };
    },

    tool_af_next_fixture: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const [next] = await apiFootball.nextFixtures(idFor(team, "apiFootballId"), 1);
      if (!next) return failure(AF, `No upcoming fixture found for ${team.name}`);
      return { ok: true, __source: AF, team: team.name, ...matchFields(next) };
    },

    tool_af_last_result: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const [last] = await apiFootball.lastFixtures(idFor(team, "apiFootballId"), 1);
      if (!last) return failure(AF, `No finished match found for ${team.name}`);
      return { ok: true, __source: AF, team: team.name, ...matchFields(last) };
    },

    tool_af_last_result_vs: async (args) => {
      const [a, b] = requireTwoTeams(args, fallbackTeam);
      const meetings = await apiFootball.headToHead(
        idFor(a, "apiFootballId"),
        idFor(b, "apiFootballId"),
        5
      );
      const last = meetings.find(isFinished);
      if (!last) return failure(AF, `No finished meeting between ${a.name} and ${b.name}`);
      return { ok: true, __source: AF, ...matchFields(last) };
    },

    tool_af_find_match_result: async (args) => {
      const [a, b] = requireTwoTeams(args, fallbackTeam);
      const winnerName = argString(args, "winner");
      if (!winnerName) return failure(AF, "Name the winning team to find that match");
      const winner = findTeam(winnerName);
      if (!winner || (winner.name !== a.name && winner.name !== b.name)) {
        return failure(AF, `${winnerName} is not one of ${a.name} and ${b.name}`);
      }
      const winnerAfId = idFor(winner, "apiFootballId");
      const meetings = await apiFootball.headToHead(
        idFor(a, "apiFootballId"),
        idFor(b, "apiFootballId"),
        20
      );
      const match = meetings.find((m) => isFinished(m) && winnerId(m) === winnerAfId);
      if (!match) {
        return failure(AF, `No recent match found where ${winner.name} won this fixture`);
      }
      return { ok: true, __source: AF, winner: winner.name, ...matchFields(match) };
    },

    tool_next_lineups: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const [next] = await apiFootball.nextFixtures(idFor(team, "apiFootballId"), 1);
      if (!next || next.id === undefined) {
        return failure(AF, `No upcoming fixture found for ${team.name}`);
      }
      const lineups = await apiFootball.lineups(next.id);
      const payload: ToolSuccess = { ok: true, __source: AF, team: team.name, ...matchFields(next) };
      if (lineups.length === 0) {
        payload.note = "Lineups are usually published about an hour before kickoff";
      } else {
        payload.rows = lineups;
      }
      return payload;
    },

    tool_sofa_form: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const k = argInt(args, "k", 5, 20);
      const matches = await sofascore.lastMatches(idFor(team, "sofascoreId"));
      if (matches.length === 0) return failure(SOFA, `No recent matches for ${team.name}`);
      return {
        ok: true,
        __source: SOFA,
        team: team.name,
        events: matches.slice(0, k).map(matchFields),
      };
    },

    tool_squad: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const position = argString(args, "position")?.toLowerCase() ?? "";
      const players = await sofascore.squad(idFor(team, "sofascoreId"));
      if (players.length === 0) return failure(SOFA, `No squad list available for ${team.name}`);
      const rows = position
        ? players.filter((p) => p.position.toLowerCase().startsWith(position))
        : players;
      if (rows.length === 0) {
        return failure(SOFA, `No ${team.name} players listed at position ${position.toUpperCase()}`);
      }
      return { ok: true, __source: SOFA, team: team.name, rows: rows.slice(0, 30) };
    },

    tool_injuries: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      const players = await sofascore.injuries(idFor(team, "sofascoreId"));
      if (players.length === 0) {
        return {
          ok: true,
          __source: SOFA,
          team: team.name,
          extract: `No injured or unavailable players reported for ${team.name}.`,
        };
      }
      return { ok: true, __source: SOFA, team: team.name, rows: players };
    },

    tool_club_elo: async (args) => {
      const team = requireTeam(args, "team_name", fallbackTeam);
      if (!team.clubElo) throw new ToolInputError(`${team.name} is not covered by this provider`);
      const ratings = await elo.history(team.clubElo);
      const latest = ratings[ratings.length - 1];
      if (!latest) return failure(SOURCES.clubElo, `No Elo rating found for ${team.name}`);
      return {
        ok: true,
        __source: SOURCES.clubElo,
        team: team.name,
        elo: latest.elo,
        rank: latest.rank,
        country: latest.country,
        from: latest.from,
        rows: ratings.slice(-5).reverse().map(({ elo: rating, rank, from, to }) => ({
          from,
          to,
          elo: rating,
          rank,
        })),
      };
    },

    tool_news_top: async (args) => {
      const limit = argInt(args, "limit", 5, 15);
      const query = argString(args, "query");
      const all = await news.soccerNews(30);
      if (all.length === 0) return failure(SOURCES.livescore, "No football news available");
      const needle = query ? fold(query) : "";
      const matching = needle
        ? all.filter((n) => fold(`${n.title} ${n.summary ?? ""}`).includes(needle))
        : all;
      const items = (matching.length > 0 ? matching : all).slice(0, limit);
      return {
        ok: true,
        __source: SOURCES.livescore,
        query: query ?? null,
        matched: !needle || matching.length > 0,
        items,
      };
    },

    tool_history_lookup: async (args) => {
      const query = argString(args, "query");
      if (!query) return failure(SOURCES.wikipedia, "Missing query");
      const page = await wikipedia.lookup(query);
      if (!page) return failure(SOURCES.wikipedia, `No Wikipedia article found for "${query}"`);
      return {
        ok: true,
        __source: SOURCES.wikipedia,
        title: page.title,
        url: page.url,
        description: page.description,
        extract: page.extract.slice(0, 1200),
      };
    },

    tool_h2h_officialish: async (args) => {
      const [a, b] = requireTwoTeams(args, fallbackTeam);
      const title = await wikipedia.search(`${a.name} ${b.name} rivalry`);
      const page = title ? await wikipedia.summary(title) : null;
      if (!page) {
        return failure(SOURCES.wikipedia, `No head-to-head article found for ${a.name} and ${b.name}`);
      }
      return {
        ok: true,
        __source: SOURCES.wikipedia,
        team_a: a.name,
        team_b: b.name,
        title: page.title,
        url: page.url,
        extract: page.extract.slice(0, 1200),
      };
    },

    tool_glossary: async (args) => {
      const term = argString(args, "term");
      if (!term) return failure(SOURCES.glossary, "Missing term");
      const glossary = loadGlossary();
      const folded = fold(term);
      for (const [key, definition] of glossary) {
        if (folded === fold(key) || containsPhrase(folded, fold(key))) {
          return { ok: true, __source: SOURCES.glossary, term: key, extract: definition };
        }
      }
      return failure(SOURCES.glossary, `No glossary entry for "${term}"`);
    },
  };

  return handlers;
}
