import { describe, it, expect } from "vitest";
import { FALLBACK_TOOLS, isEmptyPayload, planTools, validateRecency } from "../src/arbiter.js";
import type { ToolPayload } from "../src/types.js";

const NOW = new Date("2026-10-19T12:00:00Z");

const QUESTIONS = [
  "",
  "asdkjasjd random text",
  "When do Madrid play next?",
  "What was the last score between Real Madrid and Arsenal?",
  "When did Arsenal beat Real Madrid?",
  "Is Madrid playing right now?",
  "Latest transfer news",
  "Compare Mbappé and Haaland stats",
  "Real Madrid vs Barcelona",
  "Who won the European Cup in 1960?",
  "History of the Champions League",
];

describe("planTools", () => {
  it("should never return an empty plan", () => {
    for (const q of QUESTIONS) {
      expect(planTools(q).length).toBeGreaterThan(0);
    }
  });

  it("should never repeat a tool", () => {
    for (const q of QUESTIONS) {
      const plan = planTools(q);
      expect(new Set(plan).size).toBe(plan.length);
    }
  });

  it("should always include the generic fallbacks", () => {
    for (const q of QUESTIONS) {
      expect(planTools(q)).toEqual(expect.arrayContaining([...FALLBACK_TOOLS]));
    }
  });

  it("should plan only the fallbacks for text with no signals", () => {
    expect(planTools("asdkjasjd random text")).toEqual([
      "tool_sofa_form",
      "tool_table",
      "tool_history_lookup",
    ]);
  });

  it("should try API-Football first for the next fixture", () => {
    expect(planTools("When do Madrid play next?")).toEqual([
      "tool_af_next_fixture",
      "tool_next_fixture",
      "tool_sofa_form",
      "tool_table",
      "tool_history_lookup",
    ]);
  });

  it("should put head-to-head tools first for a last score between two teams", () => {
    expect(planTools("What was the last score between Real Madrid and Arsenal?")).toEqual([
      "tool_af_last_result_vs",
      "tool_h2h_officialish",
      "tool_af_last_result",
      "tool_last_result",
      "tool_sofa_form",
      "tool_table",
      "tool_history_lookup",
    ]);
  });

  it("should start outcome questions with the match finder", () => {
    expect(planTools("When did Arsenal beat Real Madrid?")).toEqual([
      "tool_af_find_match_result",
      "tool_af_last_result_vs",
      "tool_h2h_officialish",
      "tool_h2h_summary",
      "tool_compare_teams",
      "tool_sofa_form",
      "tool_table",
      "tool_history_lookup",
    ]);
  });

  it("should start live questions with the live tool", () => {
    expect(planTools("Is Madrid playing right now?").slice(0, 2)).toEqual([
      "tool_live_now",
      "tool_af_last_result",
    ]);
  });

  it("should send injury, squad and Elo questions to their own tools", () => {
    expect(planTools("Who is injured at Real Madrid?")).toEqual([
      "tool_injuries",
      "tool_sofa_form",
      "tool_table",
      "tool_history_lookup",
    ]);
    expect(planTools("Which defenders are in the Arsenal squad?")[0]).toBe("tool_squad");
    expect(planTools("What is Real Madrid's Elo rating?")[0]).toBe("tool_club_elo");
  });

  it("should keep the history lookup once when history comes first", () => {
    expect(planTools("History of the Champions League")).toEqual([
      "tool_history_lookup",
      "tool_sofa_form",
      "tool_table",
    ]);
  });
});

describe("isEmptyPayload", () => {
  it("should flag a success with no content keys", () => {
    expect(isEmptyPayload({ ok: true, __source: "Football-Data" })).toBe(true);
  });

  it("should flag failures regardless of content", () => {
    expect(isEmptyPayload({ ok: false, message: "down", __source: "Football-Data" })).toBe(true);
  });

  it("should treat blank values as no content", () => {
    const payload: ToolPayload = {
      ok: true,
      __source: "Football-Data",
      rows: [],
      home: " ",
      fixture_id: 0,
      extract: "",
    };
    expect(isEmptyPayload(payload)).toBe(true);
  });

  it("should accept any one content key", () => {
    expect(isEmptyPayload({ ok: true, __source: "Wikipedia", extract: "Final" })).toBe(false);
    expect(isEmptyPayload({ ok: true, __source: "LiveScore", items: [{ title: "x" }] })).toBe(false);
  });

  it("should handle missing payloads", () => {
    expect(isEmptyPayload(null)).toBe(true);
    expect(isEmptyPayload(undefined)).toBe(true);
  });
});

describe("validateRecency", () => {
  const match = (when: string): ToolPayload => ({
    ok: true,
    __source: "API-Football",
    home: "Real Madrid",
    away: "Arsenal",
    home_score: 2,
    away_score: 1,
    when,
  });

  it("should reject a last result dated far in the past even though it is not empty", () => {
    const old = match("2019-05-01T19:00:00Z");
    expect(isEmptyPayload(old)).toBe(false);
    expect(validateRecency("What was the last match?", old, { now: NOW })).toEqual({
      isValid: false,
      reason: "no_last_result",
    });
  });

  it("should accept a recent last result", () => {
    expect(
      validateRecency(
        "What was the last score between Real Madrid and Arsenal?",
        match("2026-10-05T19:00:00Z"),
        { now: NOW }
      )
    ).toEqual({ isValid: true, reason: "ok" });
  });

  it("should reject a last result dated in the future", () => {
    expect(validateRecency("last result", match("2026-11-01T19:00:00Z"), { now: NOW }).reason).toBe(
      "no_last_result"
    );
  });

  it("should honour a custom maximum age", () => {
    const payload = match("2026-09-01T19:00:00Z");
    expect(validateRecency("last result", payload, { now: NOW }).isValid).toBe(true);
    expect(
      validateRecency("last result", payload, { now: NOW, maxResultAgeDays: 30 }).isValid
    ).toBe(false);
  });

  it("should accept an old head-to-head result when the question names two teams", () => {
    const rare = match("2025-04-16T19:00:00Z");
    expect(
      validateRecency("What was the last score between Real Madrid and Arsenal?", rare, { now: NOW })
    ).toEqual({ isValid: true, reason: "ok" });
    expect(validateRecency("last result Madrid vs Arsenal", rare, { now: NOW }).isValid).toBe(true);
    expect(validateRecency("What was the last match?", rare, { now: NOW }).isValid).toBe(false);
  });

  it("should still reject a future head-to-head result", () => {
    expect(
      validateRecency(
        "What was the last score between Real Madrid and Arsenal?",
        match("2026-11-01T19:00:00Z"),
        { now: NOW }
      ).reason
    ).toBe("no_last_result");
  });

  it("should require live shape for live questions", () => {
    expect(validateRecency("Is Madrid playing now?", match("2026-10-19T11:00:00Z"), { now: NOW })).toEqual({
      isValid: false,
      reason: "not_live",
    });
    expect(
      validateRecency(
        "Is Madrid playing now?",
        { ok: true, __source: "API-Football", events: [{ minute: 12 }] },
        { now: NOW }
      ).isValid
    ).toBe(true);
  });

  it("should reject a next fixture that kicked off hours ago", () => {
    expect(
      validateRecency("next fixture", match("2026-10-19T07:00:00Z"), { now: NOW }).reason
    ).toBe("no_next_fixture");
    expect(validateRecency("next fixture", match("2026-10-19T10:00:00Z"), { now: NOW }).isValid).toBe(
      true
    );
  });

  it("should reject a next fixture without teams", () => {
    expect(
      validateRecency(
        "When is the next match?",
        { ok: true, __source: "Football-Data", when: "2026-10-25T19:00:00Z" },
        { now: NOW }
      )
    ).toEqual({ isValid: false, reason: "no_next_fixture" });
  });

  it("should accept anything for questions with no recency language", () => {
    expect(
      validateRecency("Who won in 1960?", { ok: true, __source: "Wikipedia", extract: "Real Madrid" })
    ).toEqual({ isValid: true, reason: "ok" });
  });
});
