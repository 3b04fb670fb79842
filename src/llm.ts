/**
 * LLM completion over the Vercel AI SDK
 *
 * One call, one step: tools are declared without `execute`, so requested
 * calls come back to the caller instead of being run by the SDK. The brain
 * decides what to execute and when to compose.
 */

import { generateText, jsonSchema, tool as defineTool, type ToolSet } from "ai";
import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";

import type {
  CompletionRequest,
  CompletionResult,
  LLMProvider,
  LlmClient,
  ToolSpec,
} from "./types.js";
import { DEFAULT_MODELS } from "./types.js";
import { isRecord } from "./data.js";

/** Create a Vercel AI SDK model instance for the given provider + model ID */
export function resolveModel(provider: LLMProvider, modelId: string) {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "google":
      return google(modelId);
    default:
      throw new Error(
        `Unsupported provider: "${String(provider)}". Use "anthropic", "openai", or "google".`
      );
  }
}

function buildTools(specs: ToolSpec[]): ToolSet {
  const toolMap: ToolSet = {};
  for (const spec of specs) {
    toolMap[spec.name] = defineTool({
      description: spec.description,
      inputSchema: jsonSchema(spec.input_schema),
    });
  }
  return toolMap;
}

export interface AiSdkLlmOptions {
  provider: LLMProvider;
  model?: string;
  /** Abort a completion after this many ms (default: 25000) */
  timeoutMs?: number;
  verbose?: boolean;
}

export class AiSdkLlmClient implements LlmClient {
  private model: ReturnType<typeof resolveModel>;
  private timeoutMs: number;
  private verbose: boolean;

  constructor(options: AiSdkLlmOptions) {
    this.model = resolveModel(options.provider, options.model ?? DEFAULT_MODELS[options.provider]);
    this.timeoutMs = options.timeoutMs ?? 25_000;
    this.verbose = options.verbose ?? false;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const hasTools = (request.tools?.length ?? 0) > 0;
    const result = await generateText({
      model: this.model,
      system: request.system,
      messages: request.messages,
      tools: hasTools && request.tools ? buildTools(request.tools) : undefined,
      toolChoice: hasTools ? "auto" : undefined,
      maxOutputTokens: request.maxOutputTokens,
      temperature: request.temperature,
      abortSignal: AbortSignal.timeout(this.timeoutMs),
    });

    const toolCalls = result.toolCalls.map((tc) => ({
      id: tc.toolCallId,
      name: tc.toolName,
      args: isRecord(tc.input) ? tc.input : {},
    }));

    if (this.verbose) {
      console.error(
        `[madridista] llm: ${toolCalls.length} tool call(s), ${result.text.length} chars`
      );
    }

    return { text: result.text, toolCalls };
  }
}
