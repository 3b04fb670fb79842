/**
 * Registry of canned tool payloads for testing.
 * Every dispatch is recorded; tools without a canned payload answer with a
 * failure, like a provider that has nothing for the question.
 */

import { TOOL_SPECS } from "../../src/tools.js";
import type { BrainToolRegistry } from "../../src/brain.js";
import type { ToolArgs, ToolName, ToolPayload, ToolSpec } from "../../src/types.js";

export interface DispatchRecord {
  name: string;
  args: ToolArgs;
}

export class MockToolRegistry implements BrainToolRegistry {
  public calls: DispatchRecord[] = [];
  private payloads: Partial<Record<ToolName, ToolPayload>>;

  constructor(payloads: Partial<Record<ToolName, ToolPayload>> = {}) {
    this.payloads = payloads;
  }

  async dispatch(name: string, args: ToolArgs): Promise<ToolPayload> {
    this.calls.push({ name, args });
    const canned = TOOL_SPECS.find((s) => s.name === name);
    if (!canned) return { ok: false, message: `Unknown tool: ${name}` };
    return this.payloads[canned.name] ?? { ok: false, message: `No data from ${name}` };
  }

  getAllToolSpecs(): ToolSpec[] {
    return [...TOOL_SPECS];
  }

  // ── Test Helpers ──

  calledTools(): string[] {
    return this.calls.map((c) => c.name);
  }
}
