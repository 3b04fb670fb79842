/**
 * madridista — Tool Catalogue & Registry
 *
 * TOOL_SPECS describes every tool the LLM may call: name, JSON-schema input,
 * category and data freshness. The ToolRegistry binds specs to handlers,
 * guarantees dispatch never throws, and keeps a TTL cache of successful
 * results for everything except real-time data.
 */

import type {
  ParameterProperty,
  ProviderCredentials,
  ToolArgs,
  ToolHandler,
  ToolName,
  ToolPayload,
  ToolSpec,
} from "./types.js";
import { isToolName } from "./types.js";
import { isEmptyPayload } from "./arbiter.js";
import { SOURCES, buildToolHandlers, createClients, safely } from "./handlers.js";

// ---------------------------------------------------------------------------
// Parameter fragments
// ---------------------------------------------------------------------------

const TEAM_NAME: ParameterProperty = {
  type: "string",
  description: 'Team name or common nickname, e.g. "Real Madrid", "Barça". Defaults to Real Madrid.',
};
const TEAM_A: ParameterProperty = { type: "string", description: "First team (defaults to Real Madrid)" };
const TEAM_B: ParameterProperty = { type: "string", description: "Second team" };
const COMPETITION: ParameterProperty = {
  type: "string",
  description: 'Competition name, e.g. "LaLiga", "Champions League", "Premier League". Defaults to LaLiga.',
};
const K: ParameterProperty = { type: "integer", description: "Number of recent matches (default 5)" };
const LIMIT: ParameterProperty = { type: "integer", description: "Maximum rows to return" };

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

export const TOOL_SPECS: readonly ToolSpec[] = [
  {
    name: "tool_next_fixture",
    description: "Next scheduled match of a team (Football-Data).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "fixtures",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_last_result",
    description: "Most recent finished match of a team with the final score (Football-Data).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "match_data",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_form",
    description: "A team's last k results as W/D/L with scores (Football-Data).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME, k: K } },
    category: "team_data",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_table",
    description: "Current league table of a competition (Football-Data).",
    input_schema: { type: "object", properties: { competition: COMPETITION, limit: LIMIT } },
    category: "team_data",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_scorers",
    description: "Top scorers of a competition this season (Football-Data).",
    input_schema: { type: "object", properties: { competition: COMPETITION, limit: LIMIT } },
    category: "player_data",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_h2h_summary",
    description: "Wins, draws and losses between two teams in their recent meetings (Football-Data).",
    input_schema: {
      type: "object",
      properties: { team_a: TEAM_A, team_b: TEAM_B },
      required: ["team_b"],
    },
    category: "comparison",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_compare_teams",
    description: "Compare two teams' recent form: points, goals for and against over the last k matches.",
    input_schema: {
      type: "object",
      properties: { team_a: TEAM_A, team_b: TEAM_B, k: K },
      required: ["team_b"],
    },
    category: "comparison",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_player_stats",
    description: "Season goals, assists and appearances of a player from the scorer charts.",
    input_schema: {
      type: "object",
      properties: {
        player_name: { type: "string", description: 'Player name, e.g. "Vinícius Júnior"' },
        competition: COMPETITION,
      },
      required: ["player_name"],
    },
    category: "player_data",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_compare_players",
    description: "Side-by-side season scoring stats of two players.",
    input_schema: {
      type: "object",
      properties: {
        player_a: { type: "string", description: "First player" },
        player_b: { type: "string", description: "Second player" },
        competition: COMPETITION,
      },
      required: ["player_a", "player_b"],
    },
    category: "comparison",
    freshness: "recent",
    source: SOURCES.footballData,
  },
  {
    name: "tool_live_now",
    description: "A team's match in progress right now: score, minute and events (API-Football).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "live_data",
    freshness: "real_time",
    source: SOURCES.apiFootball,
  },
  {
    name: "tool_af_next_fixture",
    description: "Next fixture of a team with kickoff time and competition (API-Football).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "fixtures",
    freshness: "recent",
    source: SOURCES.apiFootball,
  },
  {
    name: "tool_af_last_result",
    description: "Most recent finished match of a team with the final score (API-Football).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "match_data",
    freshness: "recent",
    source: SOURCES.apiFootball,
  },
  {
    name: "tool_af_last_result_vs",
    description: "Most recent finished meeting between two specific teams with the score (API-Football).",
    input_schema: {
      type: "object",
      properties: { team_a: TEAM_A, team_b: TEAM_B },
      required: ["team_b"],
    },
    category: "match_data",
    freshness: "recent",
    source: SOURCES.apiFootball,
  },
  {
    name: "tool_af_find_match_result",
    description:
      "Find the most recent meeting of two teams that a given team won, e.g. \"when did Arsenal beat Real Madrid\".",
    input_schema: {
      type: "object",
      properties: {
        team_a: TEAM_A,
        team_b: TEAM_B,
        winner: { type: "string", description: "The team that won (one of team_a, team_b)" },
      },
      required: ["team_b", "winner"],
    },
    category: "match_data",
    freshness: "historical",
    source: SOURCES.apiFootball,
  },
  {
    name: "tool_next_lineups",
    description: "Announced starting lineups for a team's next match, when published (API-Football).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "fixtures",
    freshness: "recent",
    source: SOURCES.apiFootball,
  },
  {
    name: "tool_sofa_form",
    description: "A team's last k matches across all competitions (SofaScore).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME, k: K } },
    category: "team_data",
    freshness: "recent",
    source: SOURCES.sofascore,
  },
  {
    name: "tool_squad",
    description: "A team's current squad with positions, optionally filtered by position (SofaScore).",
    input_schema: {
      type: "object",
      properties: {
        team_name: TEAM_NAME,
        position: {
          type: "string",
          description: 'Position or its first letter: "G", "D", "M" or "F"',
        },
      },
    },
    category: "team_data",
    freshness: "recent",
    source: SOURCES.sofascore,
  },
  {
    name: "tool_injuries",
    description: "Players of a team currently out injured or unavailable (SofaScore).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "team_data",
    freshness: "recent",
    source: SOURCES.sofascore,
  },
  {
    name: "tool_club_elo",
    description: "A club's current Elo strength rating and world rank, with its recent trend (ClubElo).",
    input_schema: { type: "object", properties: { team_name: TEAM_NAME } },
    category: "team_data",
    freshness: "recent",
    source: SOURCES.clubElo,
  },
  {
    name: "tool_news_top",
    description: "Top football headlines, optionally filtered by a team or player name (LiveScore).",
    input_schema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Team or player to filter headlines by" },
        limit: LIMIT,
      },
    },
    category: "news",
    freshness: "recent",
    source: SOURCES.livescore,
  },
  {
    name: "tool_history_lookup",
    description:
      "Historical facts from Wikipedia: past winners, finals, records, famous matches. Pass the question or an article title as the query.",
    input_schema: {
      type: "object",
      properties: { query: { type: "string", description: "Article title or search text" } },
      required: ["query"],
    },
    category: "history",
    freshness: "historical",
    source: SOURCES.wikipedia,
  },
  {
    name: "tool_h2h_officialish",
    description: "Wikipedia's account of the rivalry and all-time record between two teams.",
    input_schema: {
      type: "object",
      properties: { team_a: TEAM_A, team_b: TEAM_B },
      required: ["team_b"],
    },
    category: "history",
    freshness: "historical",
    source: SOURCES.wikipedia,
  },
  {
    name: "tool_glossary",
    description: "Definition of a football term such as offside, xG or clean sheet.",
    input_schema: {
      type: "object",
      properties: { term: { type: "string", description: "The term to define" } },
      required: ["term"],
    },
    category: "reference",
    freshness: "static",
    source: SOURCES.glossary,
  },
];

// ---------------------------------------------------------------------------
// Tool Result Cache (TTL, in memory)
// ---------------------------------------------------------------------------

interface CacheEntry {
  result: ToolPayload;
  timestamp: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

export interface ToolRegistryOptions {
  /** TTL for cached results in ms; 0 disables caching (default: 60000) */
  cacheTtlMs?: number;
  /** Entries kept at most; the oldest go first (default: 500) */
  cacheMaxEntries?: number;
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Tool Registry
// ---------------------------------------------------------------------------

export class ToolRegistry {
  private handlers = new Map<ToolName, ToolHandler>();
  private specs = new Map<ToolName, ToolSpec>();
  private cache = new Map<string, CacheEntry>();
  private cacheHits = 0;
  private cacheMisses = 0;
  private cacheEnabled: boolean;
  private cacheTtlMs: number;
  private cacheMaxEntries: number;
  private verbose: boolean;

  constructor(
    handlers: Partial<Record<ToolName, ToolHandler>>,
    options: ToolRegistryOptions = {}
  ) {
    for (const spec of TOOL_SPECS) {
      const handler = handlers[spec.name];
      if (!handler) continue;
      this.specs.set(spec.name, spec);
      this.handlers.set(spec.name, safely(spec.source, handler));
    }
    this.cacheTtlMs = options.cacheTtlMs ?? 60_000;
    this.cacheEnabled = this.cacheTtlMs > 0;
    this.cacheMaxEntries = Math.max(1, options.cacheMaxEntries ?? 500);
    this.verbose = options.verbose ?? false;
  }

  getCacheStats(): CacheStats {
    return {
      hits: this.cacheHits,
      misses: this.cacheMisses,
      size: this.cache.size,
    };
  }

  has(name: string): boolean {
    return isToolName(name) && this.handlers.has(name);
  }

  /** Specs of every registered tool, in catalogue order */
  getAllToolSpecs(): ToolSpec[] {
    return [...this.specs.values()];
  }

  private generateCacheKey(name: ToolName, args: ToolArgs): string {
    const sorted = Object.keys(args)
      .sort()
      .map((key) => [key, args[key]]);
    return `${name}:${JSON.stringify(sorted)}`;
  }

  /** Drop expired entries, then the oldest ones until there is room for one more */
  private makeRoom(now: number): void {
    for (const [key, entry] of this.cache) {
      if (now - entry.timestamp >= this.cacheTtlMs) this.cache.delete(key);
    }
    // Map iteration follows insertion order, so the first key is the oldest
    for (const key of this.cache.keys()) {
      if (this.cache.size < this.cacheMaxEntries) break;
      this.cache.delete(key);
    }
  }

  private shouldSkipCache(name: ToolName): boolean {
    return !this.cacheEnabled || this.specs.get(name)?.freshness === "real_time";
  }

  /**
   * Run a tool by name. Never throws: unknown tools and handler errors come
   * back as failure payloads.
   */
  async dispatch(name: string, args: ToolArgs = {}): Promise<ToolPayload> {
    if (!isToolName(name)) {
      return { ok: false, message: `Unknown tool: ${name}` };
    }
    const handler = this.handlers.get(name);
    if (!handler) {
      return { ok: false, message: `Tool unavailable: ${name}` };
    }

    const skipCache = this.shouldSkipCache(name);
    const cacheKey = this.generateCacheKey(name, args);
    if (!skipCache) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        const age = Date.now() - cached.timestamp;
        if (age < this.cacheTtlMs) {
          this.cacheHits++;
          if (this.verbose) {
            console.error(
              `[madridista] cache hit for ${name} (age: ${Math.round(age / 1000)}s)`
            );
          }
          return cached.result;
        }
        this.cache.delete(cacheKey);
      }
      this.cacheMisses++;
    }

    const result = await handler(args);

    if (!skipCache && result.ok && !isEmptyPayload(result)) {
      const now = Date.now();
      this.makeRoom(now);
      this.cache.set(cacheKey, { result, timestamp: now });
    }
    return result;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface RegistryConfig extends ToolRegistryOptions {
  credentials: ProviderCredentials;
  defaultTeam: string;
  providerTimeoutMs?: number;
}

/** Registry wired to the real provider clients */
export function createToolRegistry(config: RegistryConfig): ToolRegistry {
  const clients = createClients(config.credentials, config.providerTimeoutMs);
  const handlers = buildToolHandlers(clients, { defaultTeam: config.defaultTeam });
  return new ToolRegistry(handlers, {
    cacheTtlMs: config.cacheTtlMs,
    verbose: config.verbose,
  });
}
