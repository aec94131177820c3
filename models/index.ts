import { GeminiAdapter } from "./gemini";
import { OpenAIAdapter } from "./openai";

export interface ModelConfig {
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Static system prompt. If set, `prompt` in callModel is just the user message. */
  systemPrompt?: string;
}

export interface ModelResponse {
  raw_response: string | null;
  latency_ms: number;
  model: string;
  tokens_used?: number;
  finish_reason?: string;
}

/** One-line summary of a response for the logs. */
export function describeResponse(response: ModelResponse): string {
  const tokens = response.tokens_used !== undefined ? `${response.tokens_used} tokens` : "tokens unknown";
  return `${response.model}, ${response.latency_ms}ms, ${tokens}`;
}

export interface ModelAdapter {
  name: string;
  displayName: string;
  callModel(prompt: string, config: ModelConfig): Promise<ModelResponse>;
}

// Direct Gemini API adapters — these use GEMINI_API_KEY directly
const GEMINI_ALIASES: Record<string, () => ModelAdapter> = {
  "gemini-2.5-pro": () => new GeminiAdapter("gemini-2.5-pro", "Gemini 2.5 Pro", "gemini-2.5-pro"),
  "gemini-2.5-flash": () => new GeminiAdapter("gemini-2.5-flash", "Gemini 2.5 Flash", "gemini-2.5-flash"),
  "gemini-2.0-flash": () => new GeminiAdapter("gemini-2.0-flash", "Gemini 2.0 Flash", "gemini-2.0-flash"),
};

/**
 * Create an oracle adapter by model name.
 *
 * Known Gemini model names use the direct Gemini API. Everything else
 * (e.g., "gpt-4o-mini") goes through the OpenAI chat completions API, or
 * any compatible endpoint set in OPENAI_BASE_URL.
 */
export function getModel(name: string): ModelAdapter {
  const factory = GEMINI_ALIASES[name.toLowerCase()];
  if (factory) {
    return factory();
  }
  return new OpenAIAdapter(name);
}

export { GeminiAdapter, OpenAIAdapter };
