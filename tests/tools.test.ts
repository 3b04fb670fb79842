import { describe, it, expect, vi } from "vitest";
import { TOOL_SPECS, ToolRegistry } from "../src/tools.js";
import { ToolInputError } from "../src/handlers.js";
import { ProviderError } from "../src/providers/http.js";
import { TOOL_NAMES, type ToolHandler, type ToolSuccess } from "../src/types.js";

const table: ToolSuccess = {
  ok: true,
  __source: "Football-Data",
  competition: "LaLiga",
  rows: [{ pos: 1, team: "Real Madrid CF", pts: 24 }],
};

describe("TOOL_SPECS", () => {
  it("should describe every tool exactly once", () => {
    expect(TOOL_SPECS.map((s) => s.name).sort()).toEqual([...TOOL_NAMES].sort());
  });

  it("should give every tool an object schema and a source", () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.input_schema.type).toBe("object");
      expect(spec.source).not.toBe("");
      expect(spec.description.length).toBeGreaterThan(10);
    }
  });

  it("should mark only the live tool as real-time", () => {
    expect(TOOL_SPECS.filter((s) => s.freshness === "real_time").map((s) => s.name)).toEqual([
      "tool_live_now",
    ]);
  });
});

describe("ToolRegistry", () => {
  describe("dispatch", () => {
    it("should report unknown tools as failures", async () => {
      const registry = new ToolRegistry({});
      expect(await registry.dispatch("tool_weather")).toEqual({
        ok: false,
        message: "Unknown tool: tool_weather",
      });
    });

    it("should report catalogued tools without a handler as unavailable", async () => {
      const registry = new ToolRegistry({});
      expect(await registry.dispatch("tool_table")).toEqual({
        ok: false,
        message: "Tool unavailable: tool_table",
      });
      expect(registry.has("tool_table")).toBe(false);
    });

    it("should turn unexpected handler errors into failures", async () => {
      const registry = new ToolRegistry({
        tool_table: async () => {
          throw new Error("boom");
        },
      });
      expect(await registry.dispatch("tool_table", {})).toEqual({
        ok: false,
        message: "Football-Data lookup failed: boom",
        __source: "Football-Data",
      });
    });

    it("should pass provider and input error messages through", async () => {
      const registry = new ToolRegistry({
        tool_af_next_fixture: async () => {
          throw new ProviderError("API-Football", "rate_limited", "API-Football responded 429", 429);
        },
        tool_history_lookup: async () => {
          throw new ToolInputError("Missing query");
        },
      });
      expect(await registry.dispatch("tool_af_next_fixture", {})).toEqual({
        ok: false,
        message: "API-Football responded 429",
        __source: "API-Football",
      });
      expect(await registry.dispatch("tool_history_lookup", {})).toEqual({
        ok: false,
        message: "Missing query",
        __source: "Wikipedia",
      });
    });
  });

  describe("getAllToolSpecs", () => {
    it("should list only registered tools, in catalogue order", () => {
      const handler: ToolHandler = async () => table;
      const registry = new ToolRegistry({ tool_glossary: handler, tool_table: handler });
      expect(registry.getAllToolSpecs().map((s) => s.name)).toEqual(["tool_table", "tool_glossary"]);
    });
  });

  describe("caching", () => {
    it("should serve repeated calls from the cache regardless of argument order", async () => {
      const handler = vi.fn<ToolHandler>(async () => table);
      const registry = new ToolRegistry({ tool_table: handler });

      await registry.dispatch("tool_table", { competition: "LaLiga", limit: 5 });
      const second = await registry.dispatch("tool_table", { limit: 5, competition: "LaLiga" });

      expect(second).toBe(table);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(registry.getCacheStats()).toEqual({ hits: 1, misses: 1, size: 1 });
    });

    it("should not cache failures or empty payloads", async () => {
      const handler = vi
        .fn<ToolHandler>()
        .mockResolvedValueOnce({ ok: false, message: "down", __source: "Football-Data" })
        .mockResolvedValueOnce({ ok: true, __source: "Football-Data" })
        .mockResolvedValue(table);
      const registry = new ToolRegistry({ tool_table: handler });

      await registry.dispatch("tool_table", {});
      await registry.dispatch("tool_table", {});
      await registry.dispatch("tool_table", {});

      expect(handler).toHaveBeenCalledTimes(3);
      expect(registry.getCacheStats().size).toBe(1);
    });

    it("should never cache real-time tools", async () => {
      const live: ToolSuccess = { ok: true, __source: "API-Football", events: [{ minute: 10 }] };
      const handler = vi.fn<ToolHandler>(async () => live);
      const registry = new ToolRegistry({ tool_live_now: handler });

      await registry.dispatch("tool_live_now", { team_name: "Real Madrid" });
      await registry.dispatch("tool_live_now", { team_name: "Real Madrid" });

      expect(handler).toHaveBeenCalledTimes(2);
    });

    it("should expire entries after the TTL", async () => {
      vi.useFakeTimers();
      try {
        const handler = vi.fn<ToolHandler>(async () => table);
        const registry = new ToolRegistry({ tool_table: handler }, { cacheTtlMs: 1_000 });

        await registry.dispatch("tool_table", {});
        vi.advanceTimersByTime(1_500);
        await registry.dispatch("tool_table", {});

        expect(handler).toHaveBeenCalledTimes(2);
      } finally {
        vi.useRealTimers();
      }
    });

    it("should drop expired entries when storing new ones", async () => {
      vi.useFakeTimers();
      try {
        const handler: ToolHandler = async () => table;
        const registry = new ToolRegistry({ tool_table: handler }, { cacheTtlMs: 1_000 });

        await registry.dispatch("tool_table", { competition: "LaLiga" });
        await registry.dispatch("tool_table", { competition: "Serie A" });
        vi.advanceTimersByTime(1_500);
        await registry.dispatch("tool_table", { competition: "Bundesliga" });

        expect(registry.getCacheStats().size).toBe(1);
      } finally {
        vi.useRealTimers();
      }
    });

    it("should evict the oldest entry once the cache is full", async () => {
      const handler = vi.fn<ToolHandler>(async () => table);
      const registry = new ToolRegistry({ tool_table: handler }, { cacheMaxEntries: 2 });

      await registry.dispatch("tool_table", { competition: "LaLiga" });
      await registry.dispatch("tool_table", { competition: "Serie A" });
      await registry.dispatch("tool_table", { competition: "Bundesliga" });
      expect(registry.getCacheStats().size).toBe(2);

      await registry.dispatch("tool_table", { competition: "Serie A" });
      expect(handler).toHaveBeenCalledTimes(3);
      await registry.dispatch("tool_table", { competition: "LaLiga" });
      expect(handler).toHaveBeenCalledTimes(4);
    });

    it("should be disabled by a zero TTL", async () => {
      const handler = vi.fn<ToolHandler>(async () => table);
      const registry = new ToolRegistry({ tool_table: handler }, { cacheTtlMs: 0 });

      await registry.dispatch("tool_table", {});
      await registry.dispatch("tool_table", {});

      expect(handler).toHaveBeenCalledTimes(2);
      expect(registry.getCacheStats()).toEqual({ hits: 0, misses: 0, size: 0 });
    });
  });
});
