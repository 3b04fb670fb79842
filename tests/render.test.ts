import { describe, it, expect } from "vitest";
import { formatWhen, renderPayload } from "../src/render.js";

describe("formatWhen", () => {
  it("should print ISO timestamps in UTC to the minute", () => {
    expect(formatWhen("2025-03-08T20:00:00Z")).toBe("2025-03-08 20:00 UTC");
    expect(formatWhen("2026-10-05T21:00:00+02:00")).toBe("2026-10-05 19:00 UTC");
  });

  it("should leave unparseable strings alone", () => {
    expect(formatWhen("next weekend")).toBe("next weekend");
  });

  it("should print nothing for non-strings", () => {
    expect(formatWhen(undefined)).toBe("");
    expect(formatWhen(1791831600)).toBe("");
  });
});

describe("renderPayload", () => {
  it("should render a finished match with its score", () => {
    expect(
      renderPayload({
        ok: true,
        __source: "Football-Data",
        home: "Real Madrid CF",
        away: "Villarreal CF",
        home_score: 3,
        away_score: 1,
        competition: "Primera Division",
        when: "2026-10-04T19:00:00Z",
      })
    ).toBe("Real Madrid CF 3-1 Villarreal CF (Primera Division, 2026-10-04 19:00 UTC)");
  });

  it("should render table rows as key-value lines", () => {
    expect(
      renderPayload({
        ok: true,
        __source: "Football-Data",
        competition: "LaLiga",
        rows: [
          { pos: 1, team: "Real Madrid CF", pts: 24 },
          { pos: 2, team: "FC Barcelona", pts: 22, note: null },
        ],
      })
    ).toBe("• pos: 1 | team: Real Madrid CF | pts: 24\n• pos: 2 | team: FC Barcelona | pts: 22");
  });

  it("should render form rows with their score string", () => {
    expect(
      renderPayload({
        ok: true,
        __source: "Football-Data",
        team: "Real Madrid",
        form: "D",
        rows: [
          {
            when: "2026-10-12T14:00:00Z",
            home: "Getafe CF",
            away: "Real Madrid CF",
            score: "1-1",
            result: "D",
          },
        ],
      })
    ).toBe("• Getafe CF 1-1 Real Madrid CF (2026-10-12 14:00 UTC)");
  });

  it("should render news items as titled links", () => {
    expect(
      renderPayload({
        ok: true,
        __source: "LiveScore",
        items: [
          { title: "Real Madrid injury update", url: "https://example.com/b" },
          { title: "Arsenal sign winger" },
        ],
      })
    ).toBe("• Real Madrid injury update (https://example.com/b)\n• Arsenal sign winger");
  });

  it("should render an article as title and extract", () => {
    expect(
      renderPayload({
        ok: true,
        __source: "Wikipedia",
        title: "1960 European Cup final",
        extract: "Real Madrid won 7–3.",
      })
    ).toBe("1960 European Cup final: Real Madrid won 7–3.");
  });

  it("should render a fixture with a note", () => {
    expect(
      renderPayload({
        ok: true,
        __source: "API-Football",
        home: "Real Madrid",
        away: "FC Barcelona",
        home_score: null,
        away_score: null,
        when: "2026-10-25T19:00:00Z",
        note: "Lineups are usually published about an hour before kickoff",
      })
    ).toBe(
      "Real Madrid vs FC Barcelona (2026-10-25 19:00 UTC)\n\n" +
        "Lineups are usually published about an hour before kickoff"
    );
  });

  it("should render live events under the match line", () => {
    expect(
      renderPayload({
        ok: true,
        __source: "API-Football",
        home: "Real Madrid",
        away: "Barcelona",
        home_score: 1,
        away_score: 0,
        events: [{ minute: 23, team: "Real Madrid", type: "Goal", player: "K. Mbappé" }],
      })
    ).toBe(
      "Real Madrid 1-0 Barcelona\n\n• minute: 23 | team: Real Madrid | type: Goal | player: K. Mbappé"
    );
  });

  it("should list at most ten rows", () => {
    const rows = Array.from({ length: 12 }, (_, i) => ({ pos: i + 1 }));
    const text = renderPayload({ ok: true, __source: "Football-Data", rows });
    expect(text.split("\n")).toHaveLength(10);
    expect(text.split("\n")[9]).toBe("• pos: 10");
  });

  it("should render nothing for a payload without content", () => {
    expect(renderPayload({ ok: true, __source: "Football-Data" })).toBe("");
  });
});
