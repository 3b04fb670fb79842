/**
 * Normalized shapes returned by the provider clients.
 */

export interface MatchSummary {
  id?: number;
  /** ISO 8601 kickoff time */
  when: string;
  home: string;
  away: string;
  homeId?: number;
  awayId?: number;
  homeScore: number | null;
  awayScore: number | null;
  status: string;
  competition?: string;
}

export interface MatchEvent {
  minute: number | null;
  team: string;
  type: string;
  detail: string;
  player: string;
}

export interface LiveMatch extends MatchSummary {
  minute: number | null;
  events: MatchEvent[];
}

export interface StandingRow {
  pos: number;
  team: string;
  played: number;
  won: number;
  draw: number;
  lost: number;
  gd: number;
  pts: number;
}

export interface ScorerRow {
  player: string;
  team: string;
  goals: number;
  assists: number | null;
  penalties: number | null;
  played: number | null;
}

export interface TeamLineup {
  team: string;
  formation: string;
  coach: string;
  startXI: string[];
}

export interface NewsItem {
  title: string;
  url?: string;
  publishedAt?: string;
  summary?: string;
}

export interface WikiSummary {
  title: string;
  url: string;
  description: string;
  extract: string;
}

export interface SquadPlayer {
  name: string;
  position: string;
  shirtNumber?: number;
}

export interface InjuredPlayer {
  name: string;
  status: string;
  expectedReturn?: string;
}

export interface EloRating {
  club: string;
  country: string;
  elo: number;
  rank: number | null;
  /** First and last day (YYYY-MM-DD) the rating held */
  from: string;
  to: string;
}
