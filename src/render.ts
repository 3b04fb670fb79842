/**
 * Plain-text rendering of a tool payload, used when the LLM cannot compose.
 */

import type { ToolSuccess } from "./types.js";
import { isRecord } from "./data.js";

const MAX_ROWS = 10;

/** "2025-03-08T20:00:00Z" → "2025-03-08 20:00 UTC"; anything else unchanged */
export function formatWhen(value: unknown): string {
  if (typeof value !== "string") return "";
  const ts = Date.parse(value);
  if (Number.isNaN(ts)) return value;
  return `${new Date(ts).toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

function scoreOf(value: unknown): string | null {
  return typeof value === "number" ? String(value) : null;
}

function renderMatch(payload: ToolSuccess): string | null {
  if (typeof payload.home !== "string" || typeof payload.away !== "string") return null;
  const homeGoals = scoreOf(payload.home_score);
  const awayGoals = scoreOf(payload.away_score);
  const line =
    homeGoals !== null && awayGoals !== null
      ? `${payload.home} ${homeGoals}-${awayGoals} ${payload.away}`
      : `${payload.home} vs ${payload.away}`;
  const details = [
    typeof payload.competition === "string" ? payload.competition : "",
    formatWhen(payload.when),
  ].filter(Boolean);
  return details.length > 0 ? `${line} (${details.join(", ")})` : line;
}

function renderValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.map(renderValue).filter(Boolean).join(", ");
  if (isRecord(value)) return renderRow(value);
  return String(value);
}

function renderRow(row: unknown): string {
  if (!isRecord(row)) return renderValue(row);
  if (typeof row.home === "string" && typeof row.away === "string") {
    const homeGoals = scoreOf(row.home_score);
    const awayGoals = scoreOf(row.away_score);
    let score = " vs ";
    if (homeGoals !== null && awayGoals !== null) score = ` ${homeGoals}-${awayGoals} `;
    else if (typeof row.score === "string") score = ` ${row.score} `;
    const when = formatWhen(row.when);
    return `${row.home}${score}${row.away}${when ? ` (${when})` : ""}`;
  }
  return Object.entries(row)
    .filter(([, v]) => v !== null && v !== undefined && v !== "")
    .map(([k, v]) => `${k}: ${renderValue(v)}`)
    .join(" | ");
}

function renderList(values: unknown[]): string {
  return values
    .slice(0, MAX_ROWS)
    .map((v) => {
      if (isRecord(v) && typeof v.title === "string") {
        return `• ${v.title}${typeof v.url === "string" ? ` (${v.url})` : ""}`;
      }
      return `• ${renderRow(v)}`;
    })
    .join("\n");
}

/** Render a successful payload as plain text; never invents content. */
export function renderPayload(payload: ToolSuccess): string {
  const parts: string[] = [];

  const match = renderMatch(payload);
  if (match) parts.push(match);

  if (typeof payload.title === "string" && typeof payload.extract === "string") {
    parts.push(`${payload.title}: ${payload.extract}`);
  } else if (typeof payload.extract === "string" && payload.extract) {
    parts.push(payload.extract);
  }

  for (const key of ["rows", "items", "events"] as const) {
    const list = payload[key];
    if (Array.isArray(list) && list.length > 0) parts.push(renderList(list));
  }

  if (typeof payload.note === "string") parts.push(payload.note);

  return parts.join("\n\n");
}
