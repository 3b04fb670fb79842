import { describe, it, expect, vi } from "vitest";
import { buildToolArgs, runCascade } from "../src/cascade.js";
import { planTools } from "../src/arbiter.js";
import { MockToolRegistry } from "./mocks/MockToolRegistry.js";
import type { ToolSuccess } from "../src/types.js";

const NOW = new Date("2026-10-19T12:00:00Z");

const nextFixture: ToolSuccess = {
  ok: true,
  __source: "API-Football",
  fixture_id: 1208,
  when: "2026-10-25T19:00:00Z",
  home: "Real Madrid",
  away: "FC Barcelona",
};

describe("buildToolArgs", () => {
  it("should fall back to the default team for single-team tools", () => {
    expect(buildToolArgs("tool_af_next_fixture", "When is the next match?")).toEqual({
      team_name: "Real Madrid",
    });
  });

  it("should add k for form tools", () => {
    expect(buildToolArgs("tool_sofa_form", "How is Liverpool's form?")).toEqual({
      team_name: "Liverpool",
      k: 5,
    });
  });

  it("should take both named teams in order", () => {
    expect(
      buildToolArgs("tool_af_last_result_vs", "Last score between Real Madrid and Arsenal?")
    ).toEqual({ team_a: "Real Madrid", team_b: "Arsenal" });
  });

  it("should pair a lone opponent with the default team", () => {
    expect(buildToolArgs("tool_h2h_summary", "How do we do against Barcelona?")).toEqual({
      team_a: "Real Madrid",
      team_b: "FC Barcelona",
    });
    expect(buildToolArgs("tool_h2h_summary", "Chelsea against Arsenal", "Chelsea")).toEqual({
      team_a: "Chelsea",
      team_b: "Arsenal",
    });
  });

  it("should extract the winner for the match finder", () => {
    expect(buildToolArgs("tool_af_find_match_result", "When did Arsenal beat Real Madrid?")).toEqual({
      team_a: "Arsenal",
      team_b: "Real Madrid",
      winner: "Arsenal",
    });
  });

  it("should resolve competitions, players and free-text queries", () => {
    expect(buildToolArgs("tool_table", "Premier League table")).toEqual({
      competition: "Premier League",
    });
    expect(buildToolArgs("tool_table", "What does the table look like?")).toEqual({});
    expect(buildToolArgs("tool_compare_players", "Compare Mbappé and Erling Haaland")).toEqual({
      player_a: "Mbappé",
      player_b: "Erling Haaland",
    });
    expect(buildToolArgs("tool_history_lookup", "  Who won in 1960? ")).toEqual({
      query: "Who won in 1960?",
    });
    expect(buildToolArgs("tool_news_top", "Any Juventus news?")).toEqual({ query: "Juventus" });
  });
});

describe("runCascade", () => {
  it("should stop at the first valid payload", async () => {
    const registry = new MockToolRegistry({
      tool_af_next_fixture: nextFixture,
      tool_next_fixture: { ...nextFixture, __source: "Football-Data" },
    });
    const dispatch = vi.spyOn(registry, "dispatch");

    const outcome = await runCascade(
      ["tool_af_next_fixture", "tool_next_fixture", "tool_table"],
      "When do Madrid play next?",
      registry,
      { now: NOW }
    );

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(outcome.tool).toBe("tool_af_next_fixture");
    if (outcome.tool === null) throw new Error("expected a result");
    expect(outcome.payload).toBe(nextFixture);
    expect(outcome.sources).toEqual(["API-Football"]);
    expect(outcome.attempts).toHaveLength(1);
    expect(outcome.attempts[0].args).toEqual({ team_name: "Real Madrid" });
  });

  it("should move past a payload with no content", async () => {
    const registry = new MockToolRegistry({
      tool_af_next_fixture: { ok: true, __source: "API-Football" },
      tool_next_fixture: { ...nextFixture, __source: "Football-Data" },
    });

    const outcome = await runCascade(
      ["tool_af_next_fixture", "tool_next_fixture"],
      "When do Madrid play next?",
      registry,
      { now: NOW }
    );

    expect(registry.calledTools()).toEqual(["tool_af_next_fixture", "tool_next_fixture"]);
    expect(outcome.tool).toBe("tool_next_fixture");
    if (outcome.tool === null) throw new Error("expected a result");
    expect(outcome.sources).toEqual(["Football-Data"]);
  });

  it("should move past a stale payload", async () => {
    const registry = new MockToolRegistry({
      tool_af_last_result: {
        ok: true,
        __source: "API-Football",
        home: "Real Madrid",
        away: "Getafe",
        when: "2020-02-01T15:00:00Z",
      },
      tool_last_result: {
        ok: true,
        __source: "Football-Data",
        home: "Villarreal",
        away: "Real Madrid",
        when: "2026-10-12T19:00:00Z",
      },
    });

    const outcome = await runCascade(
      ["tool_af_last_result", "tool_last_result"],
      "What was Madrid's last result?",
      registry,
      { now: NOW }
    );

    expect(outcome.tool).toBe("tool_last_result");
    expect(outcome.attempts.map((a) => a.tool)).toEqual(["tool_af_last_result", "tool_last_result"]);
  });

  it("should stop at the head-to-head tool for a last score between two teams", async () => {
    const question = "What was the last score between Real Madrid and Arsenal?";
    const registry = new MockToolRegistry({
      tool_af_last_result_vs: {
        ok: true,
        __source: "API-Football",
        home: "Real Madrid",
        away: "Arsenal",
        home_score: 2,
        away_score: 1,
        when: "2026-10-05T19:00:00Z",
      },
    });

    const outcome = await runCascade(planTools(question), question, registry, { now: NOW });

    expect(outcome.tool).toBe("tool_af_last_result_vs");
    expect(registry.calls).toEqual([
      { name: "tool_af_last_result_vs", args: { team_a: "Real Madrid", team_b: "Arsenal" } },
    ]);
  });

  it("should keep a head-to-head result from long ago over a recent match against someone else", async () => {
    const question = "What was the last score between Real Madrid and Arsenal?";
    const registry = new MockToolRegistry({
      tool_af_last_result_vs: {
        ok: true,
        __source: "API-Football",
        home: "Arsenal",
        away: "Real Madrid",
        home_score: 0,
        away_score: 1,
        when: "2025-04-16T19:00:00Z",
      },
      tool_af_last_result: {
        ok: true,
        __source: "API-Football",
        home: "Real Madrid",
        away: "Getafe",
        home_score: 2,
        away_score: 0,
        when: "2026-10-12T19:00:00Z",
      },
    });

    const outcome = await runCascade(planTools(question), question, registry, { now: NOW });

    expect(outcome.tool).toBe("tool_af_last_result_vs");
    expect(registry.calledTools()).toEqual(["tool_af_last_result_vs"]);
  });

  it("should report the first failure message when every tool fails", async () => {
    const registry = new MockToolRegistry({
      tool_af_next_fixture: { ok: false, message: "API-Football responded 503", __source: "API-Football" },
      tool_next_fixture: { ok: true, __source: "Football-Data" },
    });

    const outcome = await runCascade(
      ["tool_af_next_fixture", "tool_next_fixture", "tool_table"],
      "When do Madrid play next?",
      registry
    );

    expect(outcome.tool).toBeNull();
    if (outcome.tool !== null) throw new Error("expected exhaustion");
    expect(outcome.attempts).toHaveLength(3);
    expect(outcome.firstFailureMessage).toBe("API-Football responded 503");
  });

  it("should report no failure message when tools only came back empty", async () => {
    const registry = new MockToolRegistry({ tool_table: { ok: true, __source: "Football-Data" } });

    const outcome = await runCascade(["tool_table"], "LaLiga table", registry);

    expect(outcome).toEqual({ tool: null, attempts: expect.any(Array), firstFailureMessage: null });
  });
});
