/**
 * ClubElo client. The public API needs no key and answers with CSV:
 * one row per rating period, oldest first.
 *
 *   Rank,Club,Country,Level,Elo,From,To
 *   1,RealMadrid,ESP,1,2011.48,2026-10-13,2026-10-19
 */

import { ProviderError, getText } from "./http.js";
import type { EloRating } from "./types.js";

const PROVIDER = "ClubElo";
const BASE = "http://api.clubelo.com/";

export interface ClubEloOptions {
  timeoutMs?: number;
}

/** Parse ClubElo's CSV; rows without a numeric Elo are skipped */
export function parseEloCsv(csv: string): EloRating[] {
  const lines = csv.split(/\r?\n/).filter((line) => line.trim());
  if (lines.length < 2) return [];
  const header = lines[0].split(",").map((h) => h.trim().toLowerCase());
  const col = (name: string) => header.indexOf(name);
  const [rank, club, country, elo, from, to] = ["rank", "club", "country", "elo", "from", "to"].map(col);
  if (elo === -1 || club === -1) {
    throw new ProviderError(PROVIDER, "bad_response", `${PROVIDER} returned an unexpected CSV header`);
  }

  const ratings: EloRating[] = [];
  for (const line of lines.slice(1)) {
    const cells = line.split(",").map((c) => c.trim());
    const value = Number.parseFloat(cells[elo]);
    if (!Number.isFinite(value)) continue;
    const rankValue = rank === -1 ? NaN : Number.parseInt(cells[rank], 10);
    ratings.push({
      club: cells[club] ?? "",
      country: country === -1 ? "" : cells[country] ?? "",
      elo: Math.round(value * 10) / 10,
      rank: Number.isFinite(rankValue) ? rankValue : null,
      from: from === -1 ? "" : cells[from] ?? "",
      to: to === -1 ? "" : cells[to] ?? "",
    });
  }
  return ratings;
}

export class ClubEloClient {
  private timeoutMs: number;

  constructor(options: ClubEloOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  /** Rating history of one club, oldest first; empty when ClubElo does not know it */
  async history(clubName: string): Promise<EloRating[]> {
    const csv = await getText(PROVIDER, `${BASE}${encodeURIComponent(clubName)}`, {
      timeoutMs: this.timeoutMs,
    });
    return csv === null ? [] : parseEloCsv(csv);
  }
}
